/**
 * FHIR R4 export.
 *
 * Patients become a `collection` Bundle holding Patient, Condition,
 * Encounter, Observation and MedicationStatement resources. Resource ids are
 * derived from the patient's own identifiers, so exporting the same patient
 * twice yields the same resources.
 */

import { randomUUID } from "crypto";
import type { Diagnosis, Encounter, Medication, Observation, Patient } from "../patientsim/models";

/** ---------- Resource shapes (the subset this exporter writes) ---------- */

export interface Coding {
  system: string;
  code: string;
  display?: string;
}

export interface CodeableConcept {
  coding: Coding[];
  text?: string;
}

export interface Reference {
  reference: string;
}

interface ResourceBase {
  id: string;
  meta?: { profile: string[] };
}

export interface PatientResource extends ResourceBase {
  resourceType: "Patient";
  identifier: Array<{ use: string; type: CodeableConcept; system: string; value: string }>;
  name: Array<{ use: string; family: string; given: string[] }>;
  gender: "male" | "female";
  birthDate: string;
  address: Array<{ use: string; line: string[]; city: string; state: string; postalCode: string; country: string }>;
  telecom: Array<{ system: "phone"; value: string; use: "home" }>;
}

export interface ConditionResource extends ResourceBase {
  resourceType: "Condition";
  clinicalStatus: CodeableConcept;
  verificationStatus: CodeableConcept;
  category: CodeableConcept[];
  code: CodeableConcept;
  subject: Reference;
  onsetDateTime: string;
}

export interface EncounterResource extends ResourceBase {
  resourceType: "Encounter";
  status: "finished";
  class: Coding;
  subject: Reference;
  period: { start: string; end?: string };
  reasonCode: CodeableConcept[];
  participant: Array<{ individual: { identifier: { system: string; value: string }; display: string } }>;
}

export interface ObservationResource extends ResourceBase {
  resourceType: "Observation";
  status: "final";
  category: CodeableConcept[];
  code: CodeableConcept;
  subject: Reference;
  effectiveDateTime: string;
  valueQuantity: { value: number; unit: string; system: string; code: string };
  interpretation: CodeableConcept[];
  referenceRange: Array<{ low: { value: number; unit: string }; high: { value: number; unit: string } }>;
}

export interface MedicationStatementResource extends ResourceBase {
  resourceType: "MedicationStatement";
  status: "active" | "stopped";
  medicationCodeableConcept: CodeableConcept;
  subject: Reference;
  effectivePeriod: { start: string };
  dosage: Array<{ text: string }>;
}

export type Resource =
  | PatientResource
  | ConditionResource
  | EncounterResource
  | ObservationResource
  | MedicationStatementResource;

export type ResourceType = Resource["resourceType"];

export interface BundleEntry {
  fullUrl: string;
  resource: Resource;
}

export interface Bundle {
  resourceType: "Bundle";
  id: string;
  type: "collection";
  timestamp: string;
  entry: BundleEntry[];
}

/** ---------- Code systems ---------- */

export const SYSTEMS = {
  icd10: "http://hl7.org/fhir/sid/icd-10-cm",
  loinc: "http://loinc.org",
  rxnorm: "http://www.nlm.nih.gov/research/umls/rxnorm",
  ndc: "http://hl7.org/fhir/sid/ndc",
  ucum: "http://unitsofmeasure.org",
  npi: "http://hl7.org/fhir/sid/us-npi",
  actCode: "http://terminology.hl7.org/CodeSystem/v3-ActCode",
  identifierType: "http://terminology.hl7.org/CodeSystem/v2-0203",
  conditionClinical: "http://terminology.hl7.org/CodeSystem/condition-clinical",
  conditionVerification: "http://terminology.hl7.org/CodeSystem/condition-ver-status",
  conditionCategory: "http://terminology.hl7.org/CodeSystem/condition-category",
  observationCategory: "http://terminology.hl7.org/CodeSystem/observation-category",
  interpretation: "http://terminology.hl7.org/CodeSystem/v3-ObservationInterpretation",
  mrn: "urn:healthsim:mrn",
} as const;

const ENCOUNTER_CLASS: Record<Encounter["type"], Coding> = {
  outpatient: { system: SYSTEMS.actCode, code: "AMB", display: "ambulatory" },
  inpatient: { system: SYSTEMS.actCode, code: "IMP", display: "inpatient encounter" },
  emergency: { system: SYSTEMS.actCode, code: "EMER", display: "emergency" },
};

const INTERPRETATION_DISPLAY: Record<Observation["interpretation"], string> = {
  N: "Normal",
  H: "High",
  L: "Low",
};

/** ---------- Resource builders ---------- */

export function patientResource(patient: Patient): PatientResource {
  const d = patient.demographics;
  return {
    resourceType: "Patient",
    id: patient.patientId,
    identifier: [
      {
        use: "usual",
        type: { coding: [{ system: SYSTEMS.identifierType, code: "MR", display: "Medical record number" }] },
        system: SYSTEMS.mrn,
        value: patient.mrn,
      },
    ],
    name: [{ use: "official", family: d.lastName, given: [d.firstName] }],
    gender: d.gender === "M" ? "male" : "female",
    birthDate: d.dateOfBirth,
    address: [
      {
        use: "home",
        line: [d.address.line],
        city: d.address.city,
        state: d.address.state,
        postalCode: d.address.postalCode,
        country: "US",
      },
    ],
    telecom: [{ system: "phone", value: d.phone, use: "home" }],
  };
}

export function conditionResource(patient: Patient, diagnosis: Diagnosis, index: number): ConditionResource {
  return {
    resourceType: "Condition",
    id: `${patient.patientId}-condition-${index + 1}`,
    clinicalStatus: { coding: [{ system: SYSTEMS.conditionClinical, code: "active" }] },
    verificationStatus: { coding: [{ system: SYSTEMS.conditionVerification, code: "confirmed" }] },
    category: [{ coding: [{ system: SYSTEMS.conditionCategory, code: "problem-list-item", display: "Problem List Item" }] }],
    code: {
      coding: [{ system: SYSTEMS.icd10, code: diagnosis.code, display: diagnosis.description }],
      text: diagnosis.description,
    },
    subject: { reference: `Patient/${patient.patientId}` },
    onsetDateTime: diagnosis.diagnosedDate,
  };
}

export function encounterResource(patient: Patient, encounter: Encounter, diagnoses: Diagnosis[]): EncounterResource {
  const byCode = new Map(diagnoses.map((d) => [d.code, d.description]));
  return {
    resourceType: "Encounter",
    id: encounter.encounterId,
    status: "finished",
    class: ENCOUNTER_CLASS[encounter.type],
    subject: { reference: `Patient/${patient.patientId}` },
    period: encounter.dischargeDate
      ? { start: encounter.admitDate, end: encounter.dischargeDate }
      : { start: encounter.admitDate },
    reasonCode: encounter.reasonCodes.map((code) => ({
      coding: [{ system: SYSTEMS.icd10, code, display: byCode.get(code) }],
    })),
    participant: [
      { individual: { identifier: { system: SYSTEMS.npi, value: encounter.providerNpi }, display: encounter.providerName } },
    ],
  };
}

export function observationResource(patient: Patient, observation: Observation): ObservationResource {
  return {
    resourceType: "Observation",
    id: observation.observationId,
    status: "final",
    category: [{ coding: [{ system: SYSTEMS.observationCategory, code: observation.category }] }],
    code: { coding: [{ system: SYSTEMS.loinc, code: observation.code, display: observation.display }], text: observation.display },
    subject: { reference: `Patient/${patient.patientId}` },
    effectiveDateTime: observation.effectiveDate,
    valueQuantity: { value: observation.value, unit: observation.unit, system: SYSTEMS.ucum, code: observation.unit },
    interpretation: [
      {
        coding: [
          {
            system: SYSTEMS.interpretation,
            code: observation.interpretation,
            display: INTERPRETATION_DISPLAY[observation.interpretation],
          },
        ],
      },
    ],
    referenceRange: [
      {
        low: { value: observation.referenceLow, unit: observation.unit },
        high: { value: observation.referenceHigh, unit: observation.unit },
      },
    ],
  };
}

export function medicationStatementResource(
  patient: Patient,
  medication: Medication,
  index: number,
): MedicationStatementResource {
  return {
    resourceType: "MedicationStatement",
    id: `${patient.patientId}-medication-${index + 1}`,
    status: medication.status,
    medicationCodeableConcept: {
      coding: [
        { system: SYSTEMS.rxnorm, code: medication.rxnorm, display: `${medication.name} ${medication.dose}` },
        { system: SYSTEMS.ndc, code: medication.ndc },
      ],
      text: `${medication.name} ${medication.dose}`,
    },
    subject: { reference: `Patient/${patient.patientId}` },
    effectivePeriod: { start: medication.startDate },
    dosage: [{ text: `${medication.dose} ${medication.frequency}` }],
  };
}

export function patientResources(patient: Patient): Resource[] {
  return [
    patientResource(patient),
    ...patient.diagnoses.map((d, i) => conditionResource(patient, d, i)),
    ...patient.encounters.map((e) => encounterResource(patient, e, patient.diagnoses)),
    ...patient.observations.map((o) => observationResource(patient, o)),
    ...patient.medications.map((m, i) => medicationStatementResource(patient, m, i)),
  ];
}

/** ---------- Bundle ---------- */

export interface FhirExporterOptions {
  bundleId?: string;
  /** ISO instant; defaults to now. */
  timestamp?: string;
}

export class FhirExporter {
  constructor(private readonly options: FhirExporterOptions = {}) {}

  toBundle(patients: Patient | Patient[]): Bundle {
    const list = Array.isArray(patients) ? patients : [patients];
    return {
      resourceType: "Bundle",
      id: this.options.bundleId ?? randomUUID(),
      type: "collection",
      timestamp: this.options.timestamp ?? new Date().toISOString(),
      entry: list.flatMap(patientResources).map((resource) => ({
        fullUrl: `urn:uuid:${resource.id}`,
        resource,
      })),
    };
  }

  toJson(bundle: Bundle, indent = 2): string {
    return JSON.stringify(bundle, null, indent);
  }
}

export function countResources(bundle: Bundle): Partial<Record<ResourceType, number>> {
  const counts: Partial<Record<ResourceType, number>> = {};
  for (const { resource } of bundle.entry) {
    counts[resource.resourceType] = (counts[resource.resourceType] ?? 0) + 1;
  }
  return counts;
}

const FHIR_ID = /^[A-Za-z0-9\-.]{1,64}$/;

function referencesOf(resource: Resource): string[] {
  return resource.resourceType === "Patient" ? [] : [resource.subject.reference];
}

/**
 * Structural checks: every resource has a valid id, ids are unique per type,
 * and every subject reference points at a resource in the same bundle.
 */
export function validateBundle(bundle: Bundle): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  bundle.entry.forEach(({ resource }, i) => {
    if (!resource.resourceType) issues.push(`entry[${i}]: missing resourceType`);
    if (!FHIR_ID.test(resource.id)) issues.push(`entry[${i}]: invalid id "${resource.id}"`);
    const key = `${resource.resourceType}/${resource.id}`;
    if (seen.has(key)) issues.push(`entry[${i}]: duplicate ${key}`);
    seen.add(key);
  });

  bundle.entry.forEach(({ resource }, i) => {
    for (const ref of referencesOf(resource)) {
      if (!seen.has(ref)) issues.push(`entry[${i}]: unresolved reference ${ref}`);
    }
  });

  return issues;
}
