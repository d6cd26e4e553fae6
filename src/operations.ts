/**
 * The operations behind the HTTP API, the MCP tools and the CLI. Each takes
 * loosely typed parameters (a JSON body, tool arguments, CLI flags), validates
 * them and calls into the generators and engines.
 */

import { referenceDate as defaultReferenceDate } from "./config";
import { ageOn, isIsoDate } from "./dates";
import { parseGender } from "./data/demographics";
import { npiFor } from "./data/identifiers";
import { InvalidRequestError, NotFoundError } from "./errors";
import { FhirExporter, type Bundle } from "./formats/fhir";
import { toAdtA01, toOruR01 } from "./formats/hl7v2";
import { encodeClaimRequest, encodeClaimResponse } from "./formats/ncpdp";
import { toPaResponse } from "./formats/script";
import { generate270, generate271, generate834, generate835, generate837p } from "./formats/x12";
import { MemberGenerator } from "./membersim/generator";
import type { Member } from "./membersim/models";
import { listPlans } from "./membersim/plans";
import {
  asParams,
  optionalAgeRange,
  optionalBoolean,
  optionalEnum,
  optionalNumber,
  optionalObjectArray,
  optionalRange,
  optionalString,
  optionalStringArray,
  requireNumber,
  requireString,
  type Params,
} from "./params";
import type { Patient, ScenarioSummary } from "./patientsim/models";
import { PatientGenerator } from "./patientsim/generator";
import { TRANSACTION_CODES, type ClaimResponse, type PharmacyClaim, type TransactionCode } from "./rxmembersim/claim";
import { DurValidator, type DurMedication, type DurResult, type PriorFill } from "./rxmembersim/dur";
import { FormularyGenerator, type CoverageStatus, type Formulary, type FormularyDrug } from "./rxmembersim/formulary";
import { RxMemberGenerator, type RxMember } from "./rxmembersim/member";
import type { LabResult, MedicationHistoryEntry, PriorAuthDecision } from "./rxmembersim/priorAuth";
import type { PharmacySessionInstance } from "./session";
import { saveSessionSnapshot, type OutputStore } from "./storage";

export const PATIENT_FORMATS = ["json", "fhir", "hl7"] as const;
export type PatientFormat = (typeof PATIENT_FORMATS)[number];

export const X12_EXPORTS = ["834", "837p", "835", "270", "271"] as const;
export type X12Export = (typeof X12_EXPORTS)[number];

const DEFAULT_PHARMACY = "HealthSim Community Pharmacy";
const DEFAULT_PRESCRIBER = "HealthSim Prescriber";

function optionalDate(p: Params, key: string): string | undefined {
  const v = optionalString(p, key);
  if (v !== undefined && !isIsoDate(v)) throw new InvalidRequestError(`${key} must be a YYYY-MM-DD date`);
  return v;
}

function generatorOptions(p: Params): { seed?: number; referenceDate?: string } {
  return { seed: optionalNumber(p, "seed"), referenceDate: optionalDate(p, "referenceDate") };
}

// ── Reference lists ──

export function listScenarios(): ScenarioSummary[] {
  return new PatientGenerator().listScenarios();
}

export { listPlans };

// ── Patients ──

export type PatientsResult =
  | { format: "json"; seed: number; count: number; patients: Patient[] }
  | { format: "fhir"; seed: number; count: number; bundle: Bundle }
  | { format: "hl7"; seed: number; count: number; messages: string[] };

export function generatePatients(input: unknown): PatientsResult {
  const p = asParams(input);
  const generator = new PatientGenerator(generatorOptions(p));
  const patients = generator.generateBatch({
    count: optionalNumber(p, "count") ?? 1,
    scenario: optionalString(p, "scenario"),
    conditions: optionalStringArray(p, "conditions"),
    ageRange: optionalAgeRange(p),
    gender: parseGender(optionalString(p, "gender")),
  });
  const format = optionalEnum(p, "format", PATIENT_FORMATS) ?? "json";
  const base = { seed: generator.seed, count: patients.length };

  switch (format) {
    case "fhir":
      return { ...base, format, bundle: new FhirExporter().toBundle(patients) };
    case "hl7":
      return {
        ...base,
        format,
        messages: patients.flatMap((patient) => [
          toAdtA01(patient, patient.encounters[patient.encounters.length - 1]),
          toOruR01(patient),
        ]),
      };
    case "json":
      return { ...base, format, patients };
  }
}

// ── Members ──

export function generateMembers(input: unknown): { seed: number; count: number; members: Member[] } {
  const p = asParams(input);
  const generator = new MemberGenerator(generatorOptions(p));
  const planCode = optionalString(p, "planCode");
  const withClaims = optionalBoolean(p, "withClaims") ?? false;
  const start = optionalDate(p, "startDate");
  const end = optionalDate(p, "endDate");
  const dateRange: [string, string] | undefined = start && end ? [start, end] : undefined;

  let members: Member[];
  if (optionalBoolean(p, "family")) {
    members = generator.generateFamily({
      planCode,
      dependentConfig: { spouse: optionalBoolean(p, "spouse"), children: optionalNumber(p, "children") },
    });
    if (withClaims) {
      const [min, max] = optionalRange(p, "claimsPerMember") ?? [1, 5];
      members = members.map((m, i) => generator.attachClaims(m, Math.min(max, min + i), dateRange));
    }
  } else {
    members = generator.generatePopulation({
      count: optionalNumber(p, "count") ?? 1,
      planCode,
      withClaims,
      claimsPerMember: optionalRange(p, "claimsPerMember"),
      dateRange,
    });
  }
  return { seed: generator.seed, count: members.length, members };
}

// ── X12 ──

export function exportX12(transaction: string, input: unknown): { transaction: X12Export; content: string } {
  const tx = X12_EXPORTS.find((t) => t === transaction.toLowerCase());
  if (!tx) throw new NotFoundError(`Unknown X12 transaction ${transaction}. Available: ${X12_EXPORTS.join(", ")}`);
  const p = asParams(input);
  const generator = new MemberGenerator(generatorOptions(p));
  const planCode = optionalString(p, "planCode");
  const options = {
    controlNumber: optionalNumber(p, "controlNumber"),
    senderId: optionalString(p, "senderId"),
    receiverId: optionalString(p, "receiverId"),
  };

  const population = (withClaims: boolean) =>
    generator.generatePopulation({
      count: optionalNumber(p, "count") ?? 1,
      planCode,
      withClaims,
      claimsPerMember: optionalRange(p, "claimsPerMember") ?? [1, 3],
    });

  switch (tx) {
    case "834":
      return { transaction: tx, content: generate834(population(false), options) };
    case "837p":
      return { transaction: tx, content: generate837p(population(true).flatMap((m) => m.claims), options) };
    case "835":
      return { transaction: tx, content: generate835(population(true).flatMap((m) => m.claims), options) };
    case "270":
      return { transaction: tx, content: generate270(generator.generateMember({ planCode }), options) };
    case "271":
      return {
        transaction: tx,
        content: generate271(generator.generateMember({ planCode, status: "active" }), {
          ...options,
          includeBenefits: optionalBoolean(p, "includeBenefits") ?? true,
        }),
      };
  }
}

// ── Formulary / DUR ──

function formularyFor(p: Params, session?: PharmacySessionInstance): Formulary {
  const id = optionalString(p, "formularyId");
  if (id === undefined && session) return session.adjudicationEngine.formulary;
  return new FormularyGenerator().generate(id);
}

export function checkFormulary(ndc: string, input: unknown = {}, session?: PharmacySessionInstance): CoverageStatus {
  return formularyFor(asParams(input), session).checkCoverage(ndc);
}

function requireDrug(formulary: Formulary, ndc: string): FormularyDrug {
  const drug = formulary.getDrug(ndc);
  if (!drug) throw new NotFoundError(`NDC ${ndc} is not on formulary ${formulary.formularyId}`);
  return drug;
}

function durMedication(formulary: Formulary, p: Params): DurMedication {
  const gpi = optionalString(p, "gpi");
  const ndc = optionalString(p, "ndc") ?? "";
  if (gpi !== undefined) return { ndc, gpi, name: optionalString(p, "name") ?? gpi };
  const drug = requireDrug(formulary, requireString(p, "ndc"));
  return { ndc: drug.ndc, gpi: drug.gpi, name: drug.name };
}

export function screenDur(input: unknown, session?: PharmacySessionInstance): DurResult {
  const p = asParams(input);
  const formulary = formularyFor(p, session);
  const drug = requireDrug(formulary, requireString(p, "ndc"));
  const serviceDate = optionalDate(p, "serviceDate") ?? defaultReferenceDate();
  const dob = optionalDate(p, "dateOfBirth");
  const patientAge = optionalNumber(p, "patientAge") ?? (dob ? ageOn(dob, serviceDate) : undefined);
  if (patientAge === undefined) throw new InvalidRequestError("patientAge or dateOfBirth is required");
  const patientGender = parseGender(requireString(p, "patientGender"));
  if (patientGender === undefined) throw new InvalidRequestError("patientGender is required");

  const priorFills = (optionalObjectArray(p, "priorFills") ?? []).map((f): PriorFill => {
    const fillDate = optionalDate(f, "fillDate");
    if (fillDate === undefined) throw new InvalidRequestError("priorFills[].fillDate is required");
    return { ...durMedication(formulary, f), fillDate, daysSupply: requireNumber(f, "daysSupply") };
  });

  const validator = session?.adjudicationEngine.durValidator ?? new DurValidator();
  return validator.validateSimple({
    ndc: drug.ndc,
    gpi: drug.gpi,
    drugName: drug.name,
    memberId: optionalString(p, "memberId") ?? "UNKNOWN",
    serviceDate,
    currentMedications: (optionalObjectArray(p, "currentMedications") ?? []).map((m) => durMedication(formulary, m)),
    patientAge,
    patientGender,
    quantity: optionalNumber(p, "quantity"),
    daysSupply: optionalNumber(p, "daysSupply"),
    priorFills,
  });
}

// ── Prior authorization ──

export function evaluatePriorAuth(
  session: PharmacySessionInstance,
  input: unknown,
): { decision: PriorAuthDecision; paResponse?: string } {
  const p = asParams(input);
  const formulary = session.adjudicationEngine.formulary;
  const requestDate = optionalDate(p, "requestDate") ?? defaultReferenceDate();

  const labResults = (optionalObjectArray(p, "labResults") ?? []).map(
    (l): LabResult => ({
      loinc: requireString(l, "loinc"),
      value: requireNumber(l, "value"),
      date: optionalDate(l, "date") ?? requestDate,
    }),
  );
  const medicationHistory = (optionalObjectArray(p, "medicationHistory") ?? []).map((m): MedicationHistoryEntry => {
    const med = durMedication(formulary, m);
    const startDate = optionalDate(m, "startDate");
    if (startDate === undefined) throw new InvalidRequestError("medicationHistory[].startDate is required");
    return {
      gpi: med.gpi,
      name: med.name,
      startDate,
      endDate: optionalDate(m, "endDate"),
      daysSupply: optionalNumber(m, "daysSupply"),
    };
  });

  const request = {
    requestId: optionalString(p, "requestId"),
    memberId: requireString(p, "memberId"),
    ndc: requireString(p, "ndc"),
    diagnoses: optionalStringArray(p, "diagnoses") ?? [],
    labResults,
    medicationHistory,
    prescriberNpi: optionalString(p, "prescriberNpi"),
    prescriberSpecialty: optionalString(p, "prescriberSpecialty"),
    requestDate,
  };
  const decision = session.requestPriorAuthorization(request);
  return optionalBoolean(p, "includeEpa") ? { decision, paResponse: toPaResponse(decision, request) } : { decision };
}

// ── Pharmacy members and claims ──

export function createRxMember(session: PharmacySessionInstance, input: unknown): RxMember {
  const p = asParams(input);
  const member = new RxMemberGenerator(generatorOptions(p)).generate({
    bin: optionalString(p, "bin") ?? "610014",
    pcn: optionalString(p, "pcn") ?? "HSIMRX",
    groupNumber: optionalString(p, "groupNumber") ?? "RXGROUP01",
    ageRange: optionalAgeRange(p),
    gender: parseGender(optionalString(p, "gender")),
  });
  session.registerMember(member);
  return member;
}

export function getRxMember(session: PharmacySessionInstance, memberId: string): RxMember {
  const member = session.getMember(memberId);
  if (!member) throw new NotFoundError(`Member ${memberId} not found`);
  return member;
}

const TRANSACTION_CODE_LIST: readonly TransactionCode[] = ["B1", "B2", "B3"];

/** Claim fields not given are taken from the member's card and sensible pharmacy defaults. */
export function buildPharmacyClaim(session: PharmacySessionInstance, input: unknown): PharmacyClaim {
  const p = asParams(input);
  const member = getRxMember(session, requireString(p, "memberId"));
  const transactionCode = optionalEnum(p, "transactionCode", TRANSACTION_CODE_LIST) ?? "B1";
  const ingredientCostSubmitted = optionalNumber(p, "ingredientCostSubmitted") ?? 0;
  const dispensingFeeSubmitted = optionalNumber(p, "dispensingFeeSubmitted") ?? 0;

  return {
    claimId: optionalString(p, "claimId") ?? `RXC${String(session.claims.length + 1).padStart(8, "0")}`,
    transactionCode,
    serviceDate: optionalString(p, "serviceDate") ?? defaultReferenceDate(),
    pharmacyNpi: optionalString(p, "pharmacyNpi") ?? npiFor(DEFAULT_PHARMACY),
    memberId: member.memberId,
    cardholderId: optionalString(p, "cardholderId") ?? member.cardholderId,
    personCode: optionalString(p, "personCode") ?? member.personCode,
    bin: optionalString(p, "bin") ?? member.bin,
    pcn: optionalString(p, "pcn") ?? member.pcn,
    groupNumber: optionalString(p, "groupNumber") ?? member.groupNumber,
    prescriptionNumber: requireString(p, "prescriptionNumber"),
    fillNumber: optionalNumber(p, "fillNumber") ?? 0,
    ndc: requireString(p, "ndc"),
    quantityDispensed: requireNumber(p, "quantityDispensed"),
    daysSupply: requireNumber(p, "daysSupply"),
    dawCode: optionalString(p, "dawCode") ?? "0",
    prescriberNpi: optionalString(p, "prescriberNpi") ?? npiFor(DEFAULT_PRESCRIBER),
    ingredientCostSubmitted,
    dispensingFeeSubmitted,
    patientPaidSubmitted: optionalNumber(p, "patientPaidSubmitted") ?? 0,
    usualCustomaryCharge: optionalNumber(p, "usualCustomaryCharge") ?? 0,
    grossAmountDue: optionalNumber(p, "grossAmountDue") ?? ingredientCostSubmitted + dispensingFeeSubmitted,
  };
}

export interface AdjudicationResult {
  claim: PharmacyClaim;
  response: ClaimResponse;
  transaction: string;
  ncpdp?: { request: string; response: string };
}

export function adjudicatePharmacyClaim(session: PharmacySessionInstance, input: unknown): AdjudicationResult {
  const claim = buildPharmacyClaim(session, input);
  const member = getRxMember(session, claim.memberId);
  const response = session.submitClaim(claim);
  const result: AdjudicationResult = { claim, response, transaction: TRANSACTION_CODES[claim.transactionCode] };
  if (optionalEnum(asParams(input), "encoding", ["ncpdp"] as const) === "ncpdp") {
    result.ncpdp = { request: encodeClaimRequest(claim, member), response: encodeClaimResponse(response, claim) };
  }
  return result;
}

// ── Session ──

export async function saveSession(session: PharmacySessionInstance, store: OutputStore): Promise<{ key: string }> {
  return { key: await saveSessionSnapshot(store, session) };
}
