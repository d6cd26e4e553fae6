import type { DurAlert } from "./dur";
import type { AccumulatorDelta } from "./member";

export type TransactionCode = "B1" | "B2" | "B3";

export const TRANSACTION_CODES: Record<TransactionCode, string> = {
  B1: "Billing",
  B2: "Reversal",
  B3: "Rebill",
};

/** Dispense-as-written / product selection codes. */
export const DAW_CODES: Record<string, string> = {
  "0": "No product selection indicated",
  "1": "Substitution not allowed by prescriber",
  "2": "Substitution allowed - patient requested product dispensed",
  "3": "Substitution allowed - pharmacist selected product dispensed",
  "4": "Substitution allowed - generic drug not in stock",
};

export interface PharmacyClaim {
  claimId: string;
  transactionCode: TransactionCode;
  serviceDate: string;
  pharmacyNpi: string;
  memberId: string;
  cardholderId: string;
  personCode: string;
  bin: string;
  pcn: string;
  groupNumber: string;
  prescriptionNumber: string;
  fillNumber: number;
  ndc: string;
  quantityDispensed: number;
  daysSupply: number;
  dawCode: string;
  prescriberNpi: string;
  ingredientCostSubmitted: number;
  dispensingFeeSubmitted: number;
  patientPaidSubmitted: number;
  usualCustomaryCharge: number;
  grossAmountDue: number;
}

/** P paid, R rejected, D duplicate of a paid claim, A accepted reversal. */
export type ResponseStatus = "P" | "R" | "D" | "A";

export interface Reject {
  code: string;
  message: string;
}

export interface ClaimResponse {
  claimId: string;
  transactionCode: TransactionCode;
  status: ResponseStatus;
  authorizationNumber?: string;
  rejectCode?: string;
  rejectMessage?: string;
  rejects: Reject[];
  drugName?: string;
  tier?: number;
  ingredientCostPaid: number;
  dispensingFeePaid: number;
  allowedAmount: number;
  planPaid: number;
  patientPay: number;
  copay: number;
  coinsurance: number;
  deductibleApplied: number;
  remainingDeductible: number;
  remainingOop: number;
  /** Net change to the member's accumulators from this transaction. */
  accumulatorDelta: AccumulatorDelta;
  /**
   * Set on paid rebills: what the new fill alone carries in the accumulators.
   * Reversing or rebilling this claim later backs out this amount.
   */
  fillAccumulatorDelta?: AccumulatorDelta;
  durAlerts: DurAlert[];
  /** Set on reversals and rebills: the claim whose payment was backed out. */
  reversedClaimId?: string;
  message: string;
}

/** A claim and its response as kept in a ledger. */
export interface ClaimRecord {
  claim: PharmacyClaim;
  response: ClaimResponse;
  reversed: boolean;
}

export const REJECT_CODES = {
  "01": "M/I BIN Number",
  "04": "M/I Processor Control Number",
  "06": "M/I Group ID",
  "08": "M/I Person Code",
  "15": "M/I Date of Service",
  "19": "M/I Days Supply",
  "21": "M/I Product/Service ID",
  "52": "Non-Matched Cardholder ID",
  "70": "Product/Service Not Covered",
  "75": "Prior Authorization Required",
  "76": "Plan Limitations Exceeded",
  "79": "Refill Too Soon",
  "87": "Reversal Not Processed",
  "88": "DUR Reject Error",
  "608": "Step Therapy, Alternate Drug Therapy Required Prior To Use Of Submitted Product Service ID",
  E7: "M/I Quantity Dispensed",
} as const;

export type RejectCode = keyof typeof REJECT_CODES;

export function reject(code: RejectCode): Reject {
  return { code, message: REJECT_CODES[code] };
}
