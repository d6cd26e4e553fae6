import type { Address } from "../data/demographics";
import type { Gender } from "../data/loaders/reference";

export type Relationship = "self" | "spouse" | "child";
export type MemberStatus = "active" | "termed";

export interface Accumulator {
  used: number;
  limit: number;
}

export interface Accumulators {
  deductible: Accumulator;
  oop: Accumulator;
}

export interface MemberDemographics {
  firstName: string;
  lastName: string;
  fullName: string;
  dateOfBirth: string;
  age: number;
  gender: Gender;
  address: Address;
  phone: string;
}

export interface ClaimPatient {
  firstName: string;
  lastName: string;
  dateOfBirth: string;
  gender: Gender;
}

/** X12 claim adjustment: group (CO contractual, PR patient responsibility) and CARC reason. */
export interface Adjustment {
  group: "CO" | "PR" | "OA";
  reason: string;
  amount: number;
}

export interface ClaimLine {
  lineNumber: number;
  procedureCode: string;
  description: string;
  units: number;
  charge: number;
  allowed: number;
  paid: number;
  deductible: number;
  copay: number;
  coinsurance: number;
  adjustments: Adjustment[];
}

export type ClaimStatus = "paid" | "denied" | "pending";

export interface ProfessionalClaim {
  claimId: string;
  memberId: string;
  subscriberId: string;
  groupId: string;
  planCode: string;
  patient: ClaimPatient;
  relationship: Relationship;
  serviceDate: string;
  providerNpi: string;
  providerName: string;
  providerTaxonomy: string;
  placeOfService: string;
  diagnosisCodes: string[];
  lines: ClaimLine[];
  totalCharge: number;
  totalAllowed: number;
  totalPaid: number;
  patientResponsibility: {
    deductible: number;
    copay: number;
    coinsurance: number;
    total: number;
  };
  status: ClaimStatus;
  denialReason?: string;
}

export interface Member {
  memberId: string;
  subscriberId: string;
  relationship: Relationship;
  demographics: MemberDemographics;
  planCode: string;
  groupId: string;
  status: MemberStatus;
  coverageStart: string;
  coverageEnd: string | null;
  accumulators: Accumulators;
  claims: ProfessionalClaim[];
}
