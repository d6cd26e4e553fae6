/**
 * Professional claims: drafting (provider, procedures, charges) and
 * adjudication against the member's plan and running accumulators.
 *
 * Amounts are computed in whole cents and reported in dollars.
 */

import { daysBetween } from "../dates";
import type { SeededRandom } from "../random";
import { loadProcedures, loadProviders, type Plan, type Procedure, type Provider, type ProviderRole } from "../data/loaders/reference";
import type { Accumulators, Adjustment, ClaimLine, Member, ProfessionalClaim } from "./models";

export interface DraftLine {
  procedureCode: string;
  description: string;
  units: number;
  charge: number;
  allowed: number;
  kind: Procedure["kind"];
}

export interface ClaimDraft {
  claimId: string;
  serviceDate: string;
  provider: Provider;
  placeOfService: string;
  diagnosisCodes: string[];
  lines: DraftLine[];
  /** Set when the payer's review denies or holds the claim regardless of benefits. */
  outcome?: "denied" | "pending";
}

export const CARC = {
  deductible: "1",
  coinsurance: "2",
  copay: "3",
  beforeCoverage: "26",
  afterCoverage: "27",
  contractual: "45",
  notMedicallyNecessary: "50",
} as const;

const PREVENTIVE_CODE = "99396";
const PREVENTIVE_DIAGNOSIS = "Z00.00";

export const toCents = (dollars: number): number => Math.round(dollars * 100);
export const fromCents = (cents: number): number => cents / 100;

/** ---------- Drafting ---------- */

export function draftClaim(
  rng: SeededRandom,
  claimId: string,
  serviceDate: string,
  diagnosisCodes: string[],
): ClaimDraft {
  const role = rng.weighted<ProviderRole>([
    ["pcp", 0.45],
    ["specialist", 0.25],
    ["lab", 0.2],
    ["imaging", 0.05],
    ["emergency", 0.05],
  ]);
  const provider = rng.pick(loadProviders().filter((p) => p.role === role));
  const procedures = loadProcedures().filter((p) => p.role === role);
  const primaries = procedures.filter((p) => p.kind !== "other");
  const ancillary = procedures.filter((p) => p.kind === "other");

  let chosen: Procedure[];
  if (primaries.length > 0) {
    chosen = [rng.pick(primaries)];
    if (ancillary.length > 0 && rng.chance(0.3)) chosen.push(rng.pick(ancillary));
  } else {
    chosen = rng.sample(ancillary, rng.int(1, Math.min(3, ancillary.length)));
  }

  const lines = chosen.map((p): DraftLine => {
    const charge = rng.float(p.chargeMin, p.chargeMax, 2);
    return {
      procedureCode: p.code,
      description: p.description,
      units: 1,
      charge,
      allowed: fromCents(Math.round(toCents(charge) * p.allowedFraction)),
      kind: p.kind,
    };
  });

  const outcomeRoll = rng.next();
  return {
    claimId,
    serviceDate,
    provider,
    placeOfService: chosen[0].placeOfService,
    diagnosisCodes: chosen.some((p) => p.code === PREVENTIVE_CODE) ? [PREVENTIVE_DIAGNOSIS] : diagnosisCodes,
    lines,
    outcome: outcomeRoll < 0.04 ? "denied" : outcomeRoll < 0.08 ? "pending" : undefined,
  };
}

/** ---------- Adjudication ---------- */

interface Running {
  deductibleUsed: number;
  deductibleLimit: number;
  oopUsed: number;
  oopLimit: number;
}

function copayFor(line: DraftLine, provider: Provider, plan: Plan): number | null {
  if (plan.planType === "HDHP") return null;
  if (line.kind === "emergency") return plan.copayEr > 0 ? plan.copayEr : null;
  if (line.kind === "office") {
    const copay = provider.role === "pcp" ? plan.copayPcp : plan.copaySpecialist;
    return copay > 0 ? copay : null;
  }
  return null;
}

function adjudicateLine(line: DraftLine, index: number, provider: Provider, plan: Plan, acc: Running): ClaimLine {
  const charge = toCents(line.charge);
  const allowed = toCents(line.allowed);
  const oopRemaining = acc.oopLimit - acc.oopUsed;
  let deductible = 0;
  let copay = 0;
  let coinsurance = 0;

  const planCopay = copayFor(line, provider, plan);
  if (planCopay !== null) {
    copay = Math.min(toCents(planCopay), allowed, oopRemaining);
  } else {
    deductible = Math.min(allowed, acc.deductibleLimit - acc.deductibleUsed);
    coinsurance = Math.round(((allowed - deductible) * plan.coinsurance) / 100);
    let overflow = deductible + coinsurance - oopRemaining;
    if (overflow > 0) {
      const cut = Math.min(coinsurance, overflow);
      coinsurance -= cut;
      overflow -= cut;
      deductible -= overflow;
    }
  }

  acc.deductibleUsed += deductible;
  acc.oopUsed += deductible + copay + coinsurance;

  const adjustments: Adjustment[] = [];
  if (charge > allowed) adjustments.push({ group: "CO", reason: CARC.contractual, amount: fromCents(charge - allowed) });
  if (deductible > 0) adjustments.push({ group: "PR", reason: CARC.deductible, amount: fromCents(deductible) });
  if (coinsurance > 0) adjustments.push({ group: "PR", reason: CARC.coinsurance, amount: fromCents(coinsurance) });
  if (copay > 0) adjustments.push({ group: "PR", reason: CARC.copay, amount: fromCents(copay) });

  return {
    lineNumber: index + 1,
    procedureCode: line.procedureCode,
    description: line.description,
    units: line.units,
    charge: line.charge,
    allowed: line.allowed,
    paid: fromCents(allowed - deductible - copay - coinsurance),
    deductible: fromCents(deductible),
    copay: fromCents(copay),
    coinsurance: fromCents(coinsurance),
    adjustments,
  };
}

function unpaidLine(line: DraftLine, index: number, denialReason?: string): ClaimLine {
  return {
    lineNumber: index + 1,
    procedureCode: line.procedureCode,
    description: line.description,
    units: line.units,
    charge: line.charge,
    allowed: 0,
    paid: 0,
    deductible: 0,
    copay: 0,
    coinsurance: 0,
    adjustments: denialReason ? [{ group: "CO", reason: denialReason, amount: line.charge }] : [],
  };
}

function coverageDenial(member: Member, serviceDate: string): string | undefined {
  if (daysBetween(member.coverageStart, serviceDate) < 0) return CARC.beforeCoverage;
  if (member.coverageEnd !== null && daysBetween(member.coverageEnd, serviceDate) > 0) return CARC.afterCoverage;
  return undefined;
}

function sumCents(values: number[]): number {
  return fromCents(values.reduce((total, v) => total + toCents(v), 0));
}

/**
 * Prices a drafted claim under the member's plan. Accumulators are threaded
 * through: the returned ones include this claim's patient share.
 */
export function adjudicateClaim(
  draft: ClaimDraft,
  member: Member,
  plan: Plan,
  accumulators: Accumulators,
): { claim: ProfessionalClaim; accumulators: Accumulators } {
  const running: Running = {
    deductibleUsed: toCents(accumulators.deductible.used),
    deductibleLimit: toCents(accumulators.deductible.limit),
    oopUsed: toCents(accumulators.oop.used),
    oopLimit: toCents(accumulators.oop.limit),
  };

  const denialReason =
    coverageDenial(member, draft.serviceDate) ?? (draft.outcome === "denied" ? CARC.notMedicallyNecessary : undefined);
  const status = denialReason ? "denied" : draft.outcome === "pending" ? "pending" : "paid";

  const lines =
    status === "paid"
      ? draft.lines.map((l, i) => adjudicateLine(l, i, draft.provider, plan, running))
      : draft.lines.map((l, i) => unpaidLine(l, i, denialReason));

  const deductible = sumCents(lines.map((l) => l.deductible));
  const copay = sumCents(lines.map((l) => l.copay));
  const coinsurance = sumCents(lines.map((l) => l.coinsurance));

  const claim: ProfessionalClaim = {
    claimId: draft.claimId,
    memberId: member.memberId,
    subscriberId: member.subscriberId,
    groupId: member.groupId,
    planCode: member.planCode,
    patient: {
      firstName: member.demographics.firstName,
      lastName: member.demographics.lastName,
      dateOfBirth: member.demographics.dateOfBirth,
      gender: member.demographics.gender,
    },
    relationship: member.relationship,
    serviceDate: draft.serviceDate,
    providerNpi: draft.provider.npi,
    providerName: draft.provider.name,
    providerTaxonomy: draft.provider.taxonomy,
    placeOfService: draft.placeOfService,
    diagnosisCodes: draft.diagnosisCodes,
    lines,
    totalCharge: sumCents(lines.map((l) => l.charge)),
    totalAllowed: sumCents(lines.map((l) => l.allowed)),
    totalPaid: sumCents(lines.map((l) => l.paid)),
    patientResponsibility: {
      deductible,
      copay,
      coinsurance,
      total: sumCents([deductible, copay, coinsurance]),
    },
    status,
  };
  if (denialReason) claim.denialReason = denialReason;

  return {
    claim,
    accumulators: {
      deductible: { used: fromCents(running.deductibleUsed), limit: accumulators.deductible.limit },
      oop: { used: fromCents(running.oopUsed), limit: accumulators.oop.limit },
    },
  };
}
