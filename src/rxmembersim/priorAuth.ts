/**
 * Prior authorization criteria evaluation.
 *
 * Criteria sets (data/pa_criteria.json) combine required diagnoses, recent
 * lab thresholds, prior drug trials, prescriber specialty and exclusions.
 * A request is approved only when every criterion is met.
 */

import { addDays, compactDate, daysBetween } from "../dates";
import { readJson } from "../data/loaders/reference";
import { hashSeed } from "../random";
import type { Formulary, FormularyDrug } from "./formulary";

type Operator = ">=" | ">" | "<=" | "<";

export interface PaCriteria {
  name: string;
  requiredDiagnoses: string[];
  labRequirements: Array<{ loinc: string; name: string; operator: Operator; value: number; unit: string; withinDays: number }>;
  priorTrials: Array<{ gpiPrefix: string; name: string; minDays: number }>;
  exclusions: Array<{ diagnosis: string; reason: string }>;
  specialties: string[];
  approvalDays: number;
}

export interface LabResult {
  loinc: string;
  value: number;
  date: string;
}

export interface MedicationHistoryEntry {
  gpi: string;
  name: string;
  startDate: string;
  endDate?: string;
  daysSupply?: number;
}

export interface PriorAuthRequest {
  requestId?: string;
  memberId: string;
  ndc: string;
  diagnoses: string[];
  labResults?: LabResult[];
  medicationHistory?: MedicationHistoryEntry[];
  prescriberNpi?: string;
  prescriberSpecialty?: string;
  requestDate: string;
}

export type PriorAuthStatus = "approved" | "denied" | "not_required";

export interface PriorAuthDecision {
  requestId: string;
  memberId: string;
  ndc: string;
  drugName?: string;
  status: PriorAuthStatus;
  authorizationNumber?: string;
  effectiveDate?: string;
  expirationDate?: string;
  criteriaMet: string[];
  criteriaFailed: string[];
  message: string;
}

/** An approval on file, as consulted by claim adjudication. */
export interface PriorAuthorization {
  authorizationNumber: string;
  memberId: string;
  ndc: string;
  gpi: string;
  effectiveDate: string;
  expirationDate: string;
}

let criteriaCache: Record<string, PaCriteria> | null = null;

export function loadPaCriteria(): Record<string, PaCriteria> {
  if (!criteriaCache) criteriaCache = readJson<Record<string, PaCriteria>>("pa_criteria.json");
  return criteriaCache;
}

/** ICD-10 match; `E11*` matches any code in the E11 category, dots ignored. */
export function matchesDiagnosis(code: string, pattern: string): boolean {
  const c = code.replace(/\./g, "").toUpperCase();
  const p = pattern.replace(/\./g, "").toUpperCase();
  return p.endsWith("*") ? c.startsWith(p.slice(0, -1)) : c === p;
}

function compare(value: number, op: Operator, threshold: number): boolean {
  switch (op) {
    case ">=":
      return value >= threshold;
    case ">":
      return value > threshold;
    case "<=":
      return value <= threshold;
    case "<":
      return value < threshold;
  }
}

function trialDays(entry: MedicationHistoryEntry, asOf: string): number {
  const end = entry.endDate ?? (entry.daysSupply !== undefined ? addDays(entry.startDate, entry.daysSupply) : asOf);
  return Math.max(0, daysBetween(entry.startDate, end));
}

export function authorizationNumberFor(memberId: string, ndc: string, date: string): string {
  return `PA${compactDate(date)}${String(hashSeed(`${memberId}:${ndc}:${date}`) % 1_000_000).padStart(6, "0")}`;
}

function evaluateCriteria(criteria: PaCriteria, request: PriorAuthRequest): { met: string[]; failed: string[] } {
  const met: string[] = [];
  const failed: string[] = [];

  for (const exclusion of criteria.exclusions) {
    const hit = request.diagnoses.find((d) => matchesDiagnosis(d, exclusion.diagnosis));
    if (hit) failed.push(`Exclusion: ${exclusion.reason} (${hit})`);
  }

  if (criteria.requiredDiagnoses.length > 0) {
    const hit = request.diagnoses.find((d) => criteria.requiredDiagnoses.some((p) => matchesDiagnosis(d, p)));
    if (hit) met.push(`Qualifying diagnosis ${hit}`);
    else failed.push(`Qualifying diagnosis not documented (${criteria.requiredDiagnoses.join(", ")})`);
  }

  for (const lab of criteria.labRequirements) {
    const recent = (request.labResults ?? [])
      .filter((r) => {
        const age = daysBetween(r.date, request.requestDate);
        return r.loinc === lab.loinc && age >= 0 && age <= lab.withinDays;
      })
      .sort((a, b) => b.date.localeCompare(a.date))[0];
    if (!recent) {
      failed.push(`${lab.name} within ${lab.withinDays} days not documented`);
    } else if (compare(recent.value, lab.operator, lab.value)) {
      met.push(`${lab.name} ${recent.value}${lab.unit} ${lab.operator} ${lab.value}${lab.unit}`);
    } else {
      failed.push(`${lab.name} ${recent.value}${lab.unit} does not meet ${lab.operator} ${lab.value}${lab.unit}`);
    }
  }

  for (const trial of criteria.priorTrials) {
    const days = Math.max(
      0,
      ...(request.medicationHistory ?? [])
        .filter((m) => m.gpi.startsWith(trial.gpiPrefix))
        .map((m) => trialDays(m, request.requestDate)),
    );
    if (days >= trial.minDays) met.push(`Trial of ${trial.name} for ${days} days`);
    else failed.push(`Trial of ${trial.name} for at least ${trial.minDays} days not documented`);
  }

  if (criteria.specialties.length > 0) {
    if (request.prescriberSpecialty && criteria.specialties.includes(request.prescriberSpecialty)) {
      met.push(`Prescribed by ${request.prescriberSpecialty}`);
    } else {
      failed.push(`Prescriber specialty must be one of: ${criteria.specialties.join(", ")}`);
    }
  }

  return { met, failed };
}

export function evaluatePriorAuthorization(request: PriorAuthRequest, formulary: Formulary): PriorAuthDecision {
  const requestId = request.requestId ?? `PAR${compactDate(request.requestDate)}${hashSeed(request.memberId + request.ndc) % 100_000}`;
  const base = { requestId, memberId: request.memberId, ndc: request.ndc };
  const drug = formulary.getDrug(request.ndc);

  if (!drug) {
    return {
      ...base,
      status: "denied",
      criteriaMet: [],
      criteriaFailed: [`NDC ${request.ndc} is not on formulary ${formulary.formularyId}`],
      message: "Denied: drug not covered",
    };
  }
  if (!drug.requiresPa || drug.paCriteria === null) {
    return {
      ...base,
      drugName: drug.name,
      status: "not_required",
      criteriaMet: [],
      criteriaFailed: [],
      message: `${drug.name} does not require prior authorization`,
    };
  }

  const criteria = loadPaCriteria()[drug.paCriteria];
  if (!criteria) throw new Error(`Missing prior authorization criteria: ${drug.paCriteria}`);
  const { met, failed } = evaluateCriteria(criteria, request);

  if (failed.length > 0) {
    return {
      ...base,
      drugName: drug.name,
      status: "denied",
      criteriaMet: met,
      criteriaFailed: failed,
      message: `Denied: ${failed.length} of ${met.length + failed.length} ${criteria.name} criteria not met`,
    };
  }

  return {
    ...base,
    drugName: drug.name,
    status: "approved",
    authorizationNumber: authorizationNumberFor(request.memberId, drug.ndc, request.requestDate),
    effectiveDate: request.requestDate,
    expirationDate: addDays(request.requestDate, criteria.approvalDays),
    criteriaMet: met,
    criteriaFailed: [],
    message: `Approved for ${criteria.approvalDays} days`,
  };
}

/** The approval record for an approved decision; null otherwise. */
export function toAuthorization(decision: PriorAuthDecision, drug: FormularyDrug): PriorAuthorization | null {
  if (
    decision.status !== "approved" ||
    decision.authorizationNumber === undefined ||
    decision.effectiveDate === undefined ||
    decision.expirationDate === undefined
  ) {
    return null;
  }
  return {
    authorizationNumber: decision.authorizationNumber,
    memberId: decision.memberId,
    ndc: drug.ndc,
    gpi: drug.gpi,
    effectiveDate: decision.effectiveDate,
    expirationDate: decision.expirationDate,
  };
}
