import type { Address } from "../data/demographics";
import type { Gender } from "../data/loaders/reference";

export interface Demographics {
  firstName: string;
  lastName: string;
  dateOfBirth: string;
  gender: Gender;
  address: Address;
  phone: string;
}

export interface Diagnosis {
  code: string;
  description: string;
  diagnosedDate: string;
  rank: "primary" | "secondary";
  conditionKey: string;
}

export type EncounterType = "outpatient" | "inpatient" | "emergency";

export interface Encounter {
  encounterId: string;
  type: EncounterType;
  admitDate: string;
  dischargeDate?: string;
  reasonCodes: string[];
  providerNpi: string;
  providerName: string;
}

export interface Medication {
  name: string;
  dose: string;
  frequency: string;
  rxnorm: string;
  ndc: string;
  startDate: string;
  status: "active" | "stopped";
}

export type Interpretation = "N" | "H" | "L";

export interface Observation {
  observationId: string;
  code: string;
  display: string;
  value: number;
  unit: string;
  effectiveDate: string;
  category: "vital-signs" | "laboratory";
  interpretation: Interpretation;
  referenceLow: number;
  referenceHigh: number;
}

export interface Patient {
  patientId: string;
  mrn: string;
  demographics: Demographics;
  gender: Gender;
  age: number;
  fullName: string;
  diagnoses: Diagnosis[];
  encounters: Encounter[];
  medications: Medication[];
  observations: Observation[];
  allergies: string[];
}

export interface ScenarioSummary {
  id: string;
  name: string;
  description: string;
}
