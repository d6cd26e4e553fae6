/**
 * Drug utilization review.
 *
 * Screens a prescription against the patient's current medications, prior
 * fills and demographics. Rules are keyed by GPI prefix and live in
 * data/dur_rules.json.
 */

import { config } from "../config";
import { daysBetween } from "../dates";
import { readJson } from "../data/loaders/reference";
import type { Gender } from "../data/loaders/reference";

export type DurAlertType = "DD" | "TD" | "ER" | "HD" | "DA" | "DG";
export type DurSeverity = 1 | 2 | 3;

export const ALERT_TYPE_NAMES: Record<DurAlertType, string> = {
  DD: "Drug-Drug Interaction",
  TD: "Therapeutic Duplication",
  ER: "Early Refill",
  HD: "High Dose",
  DA: "Drug-Age",
  DG: "Drug-Gender",
};

export const SEVERITY_NAMES: Record<DurSeverity, string> = {
  1: "Contraindicated",
  2: "Serious",
  3: "Moderate",
};

export type DurClinicalSignificance = "major" | "moderate" | "minor";

export const CLINICAL_SIGNIFICANCE: Record<DurSeverity, DurClinicalSignificance> = {
  1: "major",
  2: "moderate",
  3: "minor",
};

export interface DurAlert {
  alertType: DurAlertType;
  severity: DurSeverity;
  clinicalSignificance: DurClinicalSignificance;
  message: string;
  conflictingDrug?: string;
}

function alert(alertType: DurAlertType, severity: DurSeverity, message: string, conflictingDrug?: string): DurAlert {
  const result: DurAlert = { alertType, severity, clinicalSignificance: CLINICAL_SIGNIFICANCE[severity], message };
  if (conflictingDrug !== undefined) result.conflictingDrug = conflictingDrug;
  return result;
}

export interface DurMedication {
  ndc: string;
  gpi: string;
  name: string;
}

export interface PriorFill extends DurMedication {
  fillDate: string;
  daysSupply: number;
}

export interface DurRequest {
  ndc: string;
  gpi: string;
  drugName: string;
  memberId: string;
  serviceDate: string;
  currentMedications?: DurMedication[];
  patientAge: number;
  patientGender: Gender;
  quantity?: number;
  daysSupply?: number;
  priorFills?: PriorFill[];
}

export interface DurResult {
  passed: boolean;
  totalAlerts: number;
  alerts: DurAlert[];
  /** True when any alert is severity 1; such claims are rejected with 88. */
  hasRejectingAlert: boolean;
}

export interface DurRules {
  duplicationPrefixLength: number;
  therapeuticClasses: Record<string, string>;
  interactions: Array<{ gpiA: string; gpiB: string; severity: DurSeverity; message: string }>;
  ageRules: Array<{ gpiPrefix: string; ageAtLeast?: number; ageBelow?: number; severity: DurSeverity; message: string }>;
  genderRules: Array<{ gpiPrefix: string; contraindicatedGender: Gender; severity: DurSeverity; message: string }>;
  doseRules: Array<{ gpiPrefix: string; maxDailyUnits: number; message: string }>;
}

let rulesCache: DurRules | null = null;

export function loadDurRules(): DurRules {
  if (!rulesCache) rulesCache = readJson<DurRules>("dur_rules.json");
  return rulesCache;
}

export interface DurValidatorOptions {
  /** Share of the previous fill's days supply that must elapse before a refill. */
  refillThreshold?: number;
  rules?: DurRules;
}

export class DurValidator {
  readonly refillThreshold: number;
  private readonly rules: DurRules;

  constructor(options: DurValidatorOptions = {}) {
    this.refillThreshold = options.refillThreshold ?? config.DUR_REFILL_THRESHOLD;
    this.rules = options.rules ?? loadDurRules();
  }

  validateSimple(request: DurRequest): DurResult {
    const alerts = [
      ...this.checkInteractions(request),
      ...this.checkDuplication(request),
      ...this.checkEarlyRefill(request),
      ...this.checkDose(request),
      ...this.checkAge(request),
      ...this.checkGender(request),
    ].sort((a, b) => a.severity - b.severity);

    return {
      passed: alerts.length === 0,
      totalAlerts: alerts.length,
      alerts,
      hasRejectingAlert: alerts.some((a) => a.severity === 1),
    };
  }

  checkInteractions(request: DurRequest): DurAlert[] {
    const alerts: DurAlert[] = [];
    for (const med of request.currentMedications ?? []) {
      if (med.ndc === request.ndc) continue;
      const rule = this.rules.interactions.find(
        (r) =>
          (request.gpi.startsWith(r.gpiA) && med.gpi.startsWith(r.gpiB)) ||
          (request.gpi.startsWith(r.gpiB) && med.gpi.startsWith(r.gpiA)),
      );
      if (rule) {
        alerts.push(alert("DD", rule.severity, `${rule.message} (${request.drugName} + ${med.name})`, med.name));
      }
    }
    return alerts;
  }

  checkDuplication(request: DurRequest): DurAlert[] {
    const length = this.rules.duplicationPrefixLength;
    const prefix = request.gpi.slice(0, length);
    const className = this.rules.therapeuticClasses[prefix] ?? `GPI class ${prefix}`;
    return (request.currentMedications ?? [])
      // a medication known only by GPI matches the product on GPI
      .filter((m) => (m.ndc ? m.ndc !== request.ndc : m.gpi !== request.gpi) && m.gpi.slice(0, length) === prefix)
      .map((m) => alert("TD", 2, `Therapeutic duplication in ${className}: ${request.drugName} and ${m.name}`, m.name));
  }

  checkEarlyRefill(request: DurRequest): DurAlert[] {
    const last = (request.priorFills ?? [])
      .filter((f) => f.gpi === request.gpi && daysBetween(f.fillDate, request.serviceDate) >= 0)
      .sort((a, b) => b.fillDate.localeCompare(a.fillDate))[0];
    if (!last || last.daysSupply <= 0) return [];

    const elapsed = daysBetween(last.fillDate, request.serviceDate);
    if (elapsed >= this.refillThreshold * last.daysSupply) return [];
    const percent = Math.round((elapsed / last.daysSupply) * 100);
    const required = Math.round(this.refillThreshold * 100);
    return [
      alert(
        "ER",
        2,
        `Refill too soon: ${elapsed} of ${last.daysSupply} days elapsed (${percent}%, ${required}% required)`,
        last.name,
      ),
    ];
  }

  checkDose(request: DurRequest): DurAlert[] {
    const { quantity, daysSupply } = request;
    if (quantity === undefined || daysSupply === undefined || daysSupply <= 0) return [];
    const daily = quantity / daysSupply;
    return this.rules.doseRules
      .filter((r) => request.gpi.startsWith(r.gpiPrefix) && daily > r.maxDailyUnits)
      .map((r) => alert("HD", 2, `${r.message} (${Math.round(daily * 100) / 100} units/day, max ${r.maxDailyUnits})`));
  }

  checkAge(request: DurRequest): DurAlert[] {
    return this.rules.ageRules
      .filter(
        (r) =>
          request.gpi.startsWith(r.gpiPrefix) &&
          ((r.ageAtLeast !== undefined && request.patientAge >= r.ageAtLeast) ||
            (r.ageBelow !== undefined && request.patientAge < r.ageBelow)),
      )
      .map((r) => alert("DA", r.severity, `${r.message} (age ${request.patientAge})`));
  }

  checkGender(request: DurRequest): DurAlert[] {
    return this.rules.genderRules
      .filter((r) => request.gpi.startsWith(r.gpiPrefix) && request.patientGender === r.contraindicatedGender)
      .map((r) => alert("DG", r.severity, r.message));
  }
}
