/**
 * Drug formularies: tier structure, coverage lookup by NDC and utilization
 * management flags (prior authorization, step therapy, quantity limits).
 */

import { normalizeNdc } from "../data/identifiers";
import { num, readCsv } from "../data/loaders/reference";
import { NotFoundError } from "../errors";

export interface TierDefinition {
  tier: number;
  name: string;
  /** Flat copay in dollars, or null when the tier uses coinsurance. */
  copay: number | null;
  /** Coinsurance percent, or null when the tier uses a copay. */
  coinsurance: number | null;
  deductibleApplies: boolean;
}

export interface QuantityLimit {
  quantity: number;
  days: number;
}

export interface FormularyDrug {
  ndc: string;
  name: string;
  genericName: string;
  gpi: string;
  tier: number;
  requiresPa: boolean;
  paCriteria: string | null;
  stepTherapy: boolean;
  /** GPI prefixes of drugs that satisfy the step. */
  stepPrerequisites: string[];
  quantityLimit: QuantityLimit | null;
  specialty: boolean;
}

export interface CoverageStatus {
  ndc: string;
  covered: boolean;
  drugName?: string;
  tier?: number;
  tierName?: string;
  copay?: number;
  coinsurance?: number;
  requiresPa: boolean;
  stepTherapy: boolean;
  quantityLimit?: QuantityLimit;
  message: string;
}

export class Formulary {
  private readonly drugs: Map<string, FormularyDrug>;

  constructor(
    readonly formularyId: string,
    readonly name: string,
    readonly tiers: TierDefinition[],
    drugs: FormularyDrug[],
  ) {
    this.drugs = new Map(drugs.map((d) => [d.ndc, d]));
  }

  getDrug(ndc: string): FormularyDrug | null {
    const normalized = normalizeNdc(ndc);
    return normalized === null ? null : this.drugs.get(normalized) ?? null;
  }

  listDrugs(): FormularyDrug[] {
    return [...this.drugs.values()];
  }

  tierDefinition(tier: number): TierDefinition {
    const def = this.tiers.find((t) => t.tier === tier);
    if (!def) throw new NotFoundError(`Formulary ${this.formularyId} has no tier ${tier}`);
    return def;
  }

  checkCoverage(ndc: string): CoverageStatus {
    const normalized = normalizeNdc(ndc);
    if (normalized === null) {
      return { ndc, covered: false, requiresPa: false, stepTherapy: false, message: `Invalid NDC: ${ndc}` };
    }
    const drug = this.drugs.get(normalized);
    if (!drug) {
      return {
        ndc: normalized,
        covered: false,
        requiresPa: false,
        stepTherapy: false,
        message: `NDC ${normalized} is not on formulary ${this.formularyId}`,
      };
    }

    const tier = this.tierDefinition(drug.tier);
    const notes = [`Covered: Tier ${tier.tier} ${tier.name}`];
    if (drug.requiresPa) notes.push("prior authorization required");
    if (drug.stepTherapy) notes.push("step therapy required");
    if (drug.quantityLimit) notes.push(`quantity limit ${drug.quantityLimit.quantity} per ${drug.quantityLimit.days} days`);

    const status: CoverageStatus = {
      ndc: normalized,
      covered: true,
      drugName: drug.name,
      tier: tier.tier,
      tierName: tier.name,
      requiresPa: drug.requiresPa,
      stepTherapy: drug.stepTherapy,
      message: notes.join("; "),
    };
    if (tier.copay !== null) status.copay = tier.copay;
    if (tier.coinsurance !== null) status.coinsurance = tier.coinsurance;
    if (drug.quantityLimit) status.quantityLimit = drug.quantityLimit;
    return status;
  }
}

/** ---------- Tier structures ---------- */

export const COMMERCIAL_TIERS: TierDefinition[] = [
  { tier: 1, name: "Preferred Generic", copay: 10, coinsurance: null, deductibleApplies: false },
  { tier: 2, name: "Non-Preferred Generic", copay: 25, coinsurance: null, deductibleApplies: false },
  { tier: 3, name: "Preferred Brand", copay: 40, coinsurance: null, deductibleApplies: true },
  { tier: 4, name: "Non-Preferred Brand", copay: 80, coinsurance: null, deductibleApplies: true },
  { tier: 5, name: "Specialty", copay: null, coinsurance: 25, deductibleApplies: true },
];

export const PART_D_TIERS: TierDefinition[] = [
  { tier: 1, name: "Preferred Generic", copay: 0, coinsurance: null, deductibleApplies: false },
  { tier: 2, name: "Generic", copay: 10, coinsurance: null, deductibleApplies: false },
  { tier: 3, name: "Preferred Brand", copay: 47, coinsurance: null, deductibleApplies: true },
  { tier: 4, name: "Non-Preferred Drug", copay: null, coinsurance: 40, deductibleApplies: true },
  { tier: 5, name: "Specialty", copay: null, coinsurance: 25, deductibleApplies: true },
];

function parseBool(val: string): boolean {
  return val === "true" || val === "1";
}

function parseArray(val: string): string[] {
  if (!val) return [];
  return val.split("|").filter(Boolean);
}

let catalogCache: FormularyDrug[] | null = null;

export function loadDrugCatalog(): FormularyDrug[] {
  if (catalogCache) return catalogCache;
  catalogCache = readCsv("formulary_drugs.csv").map(
    (r): FormularyDrug => ({
      ndc: r.ndc,
      name: r.name,
      genericName: r.generic_name,
      gpi: r.gpi,
      tier: num(r.tier),
      requiresPa: parseBool(r.requires_pa),
      paCriteria: r.pa_criteria || null,
      stepTherapy: parseBool(r.step_therapy),
      stepPrerequisites: parseArray(r.step_prerequisites),
      quantityLimit: r.quantity_limit ? { quantity: num(r.quantity_limit), days: num(r.quantity_limit_days) } : null,
      specialty: parseBool(r.specialty),
    }),
  );
  return catalogCache;
}

export class FormularyGenerator {
  generateStandardCommercial(): Formulary {
    return new Formulary("STD-COMMERCIAL", "Standard Commercial 5-Tier", COMMERCIAL_TIERS, loadDrugCatalog());
  }

  generateMedicarePartD(): Formulary {
    return new Formulary("MEDICARE-PART-D", "Medicare Part D 5-Tier", PART_D_TIERS, loadDrugCatalog());
  }

  /** By formulary id: STD-COMMERCIAL (default) or MEDICARE-PART-D. */
  generate(formularyId = "STD-COMMERCIAL"): Formulary {
    switch (formularyId.toUpperCase()) {
      case "STD-COMMERCIAL":
        return this.generateStandardCommercial();
      case "MEDICARE-PART-D":
        return this.generateMedicarePartD();
      default:
        throw new NotFoundError(`Unknown formulary: ${formularyId}. Available: STD-COMMERCIAL, MEDICARE-PART-D`);
    }
  }
}
