/**
 * Pharmacy claim adjudication.
 *
 * Edits run in a fixed order and the first failing stage rejects the claim:
 * eligibility, field edits, duplicate check, formulary, prior authorization,
 * step therapy, quantity limit, early refill, then DUR. A claim that clears
 * every edit is priced and cost-shared against the member's accumulators.
 *
 * The engine never mutates the member; the response carries the
 * accumulator delta to apply.
 */

import { config } from "../config";
import { addDays, ageOn, compactDate, daysBetween, isIsoDate } from "../dates";
import { normalizeNdc } from "../data/identifiers";
import { createLogger } from "../logger";
import { DurValidator, type DurAlert, type DurMedication, type PriorFill } from "./dur";
import type { Formulary, FormularyDrug, TierDefinition } from "./formulary";
import { applyAccumulatorDelta, type AccumulatorDelta, type RxMember } from "./member";
import type { PriorAuthorization } from "./priorAuth";
import {
  reject,
  type ClaimRecord,
  type ClaimResponse,
  type PharmacyClaim,
  type Reject,
  type ResponseStatus,
} from "./claim";

const log = createLogger("adjudication");

const STEP_THERAPY_LOOKBACK_DAYS = 180;

export interface AdjudicationEngineOptions {
  formulary: Formulary;
  durValidator?: DurValidator;
  maxDaysSupply?: number;
}

export interface AdjudicationContext {
  claimHistory?: ClaimRecord[];
  priorAuthorizations?: PriorAuthorization[];
  /** Medications known from outside the claim history (e.g. cash fills, samples). */
  currentMedications?: DurMedication[];
}

interface Pricing {
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
}

const cents = (dollars: number): number => Math.round(dollars * 100);
const dollars = (c: number): number => c / 100;
const negate = (d: AccumulatorDelta): AccumulatorDelta => ({ deductible: 0 - d.deductible, oop: 0 - d.oop });

const sameFill = (a: PharmacyClaim, b: PharmacyClaim): boolean =>
  a.pharmacyNpi === b.pharmacyNpi && a.prescriptionNumber === b.prescriptionNumber && a.fillNumber === b.fillNumber;

/** Paid claims for the member that have not been reversed. */
export function activePaidClaims(history: ClaimRecord[], memberId: string): ClaimRecord[] {
  return history.filter((r) => r.claim.memberId === memberId && r.response.status === "P" && !r.reversed);
}

/** What a paid claim left in the accumulators, and so what backing it out removes. */
function carriedDelta(response: ClaimResponse): AccumulatorDelta {
  return response.fillAccumulatorDelta ?? response.accumulatorDelta;
}

export class AdjudicationEngine {
  readonly formulary: Formulary;
  readonly durValidator: DurValidator;
  readonly maxDaysSupply: number;
  private sequence = 0;

  constructor(options: AdjudicationEngineOptions) {
    this.formulary = options.formulary;
    this.durValidator = options.durValidator ?? new DurValidator();
    this.maxDaysSupply = options.maxDaysSupply ?? config.RX_MAX_DAYS_SUPPLY;
  }

  adjudicate(claim: PharmacyClaim, member: RxMember, context: AdjudicationContext = {}): ClaimResponse {
    const response =
      claim.transactionCode === "B2"
        ? this.reverse(claim, member, context)
        : claim.transactionCode === "B3"
          ? this.rebill(claim, member, context)
          : this.bill(claim, member, context);

    log.debug(
      `${claim.transactionCode} ${claim.claimId} -> ${response.status}` +
        (response.rejectCode ? ` (${response.rejectCode} ${response.rejectMessage})` : ` plan ${response.planPaid} patient ${response.patientPay}`),
    );
    return response;
  }

  /** ---------- B1 ---------- */

  private bill(claim: PharmacyClaim, member: RxMember, context: AdjudicationContext): ClaimResponse {
    const history = context.claimHistory ?? [];

    const eligibility = this.checkEligibility(claim, member);
    if (eligibility.length > 0) return this.rejected(claim, member, eligibility);
    const fieldErrors = this.checkFields(claim);
    if (fieldErrors.length > 0) return this.rejected(claim, member, fieldErrors);

    const original = activePaidClaims(history, member.memberId).find((r) => sameFill(r.claim, claim));
    if (original) {
      return {
        ...original.response,
        claimId: claim.claimId,
        status: "D",
        accumulatorDelta: { deductible: 0, oop: 0 },
        message: `Duplicate of paid claim ${original.claim.claimId}`,
      };
    }

    const drug = this.formulary.getDrug(claim.ndc);
    if (!drug) return this.rejected(claim, member, [reject("70")]);
    const extras = { drugName: drug.name, tier: drug.tier };

    if (drug.requiresPa && !this.hasPriorAuthorization(claim, drug, context.priorAuthorizations ?? [])) {
      return this.rejected(claim, member, [reject("75")], extras);
    }
    if (drug.stepTherapy && !this.stepTherapySatisfied(claim, drug, history, context.currentMedications ?? [])) {
      return this.rejected(claim, member, [reject("608")], extras);
    }
    if (drug.quantityLimit && claim.quantityDispensed * drug.quantityLimit.days > drug.quantityLimit.quantity * claim.daysSupply) {
      return this.rejected(claim, member, [reject("76")], extras);
    }

    const dur = this.durValidator.validateSimple({
      ndc: drug.ndc,
      gpi: drug.gpi,
      drugName: drug.name,
      memberId: member.memberId,
      serviceDate: claim.serviceDate,
      currentMedications: this.currentMedications(claim, history, context.currentMedications ?? []),
      patientAge: ageOn(member.dateOfBirth, claim.serviceDate),
      patientGender: member.gender,
      quantity: claim.quantityDispensed,
      daysSupply: claim.daysSupply,
      priorFills: this.priorFills(claim, history),
    });
    if (dur.alerts.some((a) => a.alertType === "ER")) {
      return this.rejected(claim, member, [reject("79")], { ...extras, durAlerts: dur.alerts });
    }
    if (dur.hasRejectingAlert) {
      return this.rejected(claim, member, [reject("88")], { ...extras, durAlerts: dur.alerts });
    }

    const pricing = this.price(claim, member, this.formulary.tierDefinition(drug.tier));
    return {
      claimId: claim.claimId,
      transactionCode: claim.transactionCode,
      status: "P",
      authorizationNumber: this.nextAuthorization(claim.serviceDate),
      rejects: [],
      ...extras,
      ...pricing,
      accumulatorDelta: { deductible: pricing.deductibleApplied, oop: pricing.patientPay },
      durAlerts: dur.alerts,
      message: dur.alerts.length > 0 ? `Paid with ${dur.alerts.length} DUR warning(s)` : "Paid",
    };
  }

  /** ---------- B2 / B3 ---------- */

  private findOriginal(claim: PharmacyClaim, member: RxMember, context: AdjudicationContext): ClaimRecord | undefined {
    return activePaidClaims(context.claimHistory ?? [], member.memberId).find((r) => sameFill(r.claim, claim));
  }

  private reverse(claim: PharmacyClaim, member: RxMember, context: AdjudicationContext): ClaimResponse {
    const original = this.findOriginal(claim, member, context);
    if (!original) return this.rejected(claim, member, [reject("87")]);
    const backout = negate(carriedDelta(original.response));
    const restored = applyAccumulatorDelta(member, backout);
    return {
      ...this.zeroPricing(restored),
      claimId: claim.claimId,
      transactionCode: "B2",
      status: "A",
      authorizationNumber: original.response.authorizationNumber,
      rejects: [],
      drugName: original.response.drugName,
      tier: original.response.tier,
      accumulatorDelta: backout,
      durAlerts: [],
      reversedClaimId: original.claim.claimId,
      message: `Reversed claim ${original.claim.claimId}`,
    };
  }

  private rebill(claim: PharmacyClaim, member: RxMember, context: AdjudicationContext): ClaimResponse {
    const original = this.findOriginal(claim, member, context);
    if (!original) return this.rejected(claim, member, [reject("87")]);
    const delta = carriedDelta(original.response);
    const restored = applyAccumulatorDelta(member, negate(delta));
    const history = (context.claimHistory ?? []).filter((r) => r !== original);
    const billed = this.bill({ ...claim, transactionCode: "B1" }, restored, { ...context, claimHistory: history });

    // a rejected rebill leaves the original payment in place
    if (billed.status !== "P") return { ...billed, transactionCode: "B3" };
    return {
      ...billed,
      transactionCode: "B3",
      accumulatorDelta: {
        deductible: dollars(cents(billed.accumulatorDelta.deductible) - cents(delta.deductible)),
        oop: dollars(cents(billed.accumulatorDelta.oop) - cents(delta.oop)),
      },
      fillAccumulatorDelta: billed.accumulatorDelta,
      reversedClaimId: original.claim.claimId,
      message: `Rebilled claim ${original.claim.claimId}: ${billed.message}`,
    };
  }

  /** ---------- Edits ---------- */

  checkEligibility(claim: PharmacyClaim, member: RxMember): Reject[] {
    const rejects: Reject[] = [];
    if (claim.bin !== member.bin) rejects.push(reject("01"));
    if (claim.pcn !== member.pcn) rejects.push(reject("04"));
    if (claim.groupNumber !== member.groupNumber) rejects.push(reject("06"));
    if (claim.cardholderId !== member.cardholderId || claim.memberId !== member.memberId) rejects.push(reject("52"));
    if (claim.personCode !== member.personCode) rejects.push(reject("08"));
    return rejects;
  }

  checkFields(claim: PharmacyClaim): Reject[] {
    const rejects: Reject[] = [];
    if (!isIsoDate(claim.serviceDate)) rejects.push(reject("15"));
    if (normalizeNdc(claim.ndc) === null) rejects.push(reject("21"));
    if (!(claim.quantityDispensed > 0)) rejects.push(reject("E7"));
    if (!Number.isInteger(claim.daysSupply) || claim.daysSupply < 1 || claim.daysSupply > this.maxDaysSupply) {
      rejects.push(reject("19"));
    }
    return rejects;
  }

  private hasPriorAuthorization(claim: PharmacyClaim, drug: FormularyDrug, auths: PriorAuthorization[]): boolean {
    return auths.some(
      (a) =>
        a.memberId === claim.memberId &&
        (a.ndc === drug.ndc || a.gpi === drug.gpi) &&
        daysBetween(a.effectiveDate, claim.serviceDate) >= 0 &&
        daysBetween(claim.serviceDate, a.expirationDate) >= 0,
    );
  }

  private stepTherapySatisfied(
    claim: PharmacyClaim,
    drug: FormularyDrug,
    history: ClaimRecord[],
    known: DurMedication[],
  ): boolean {
    const matches = (gpi: string) => drug.stepPrerequisites.some((prefix) => gpi.startsWith(prefix));
    if (known.some((m) => matches(m.gpi))) return true;
    return activePaidClaims(history, claim.memberId).some((r) => {
      const filled = this.formulary.getDrug(r.claim.ndc);
      const age = daysBetween(r.claim.serviceDate, claim.serviceDate);
      return filled !== null && matches(filled.gpi) && age >= 0 && age <= STEP_THERAPY_LOOKBACK_DAYS;
    });
  }

  /** Fills still on hand at the service date, plus externally known medications. */
  private currentMedications(claim: PharmacyClaim, history: ClaimRecord[], known: DurMedication[]): DurMedication[] {
    const fromClaims = activePaidClaims(history, claim.memberId).flatMap((r): DurMedication[] => {
      const drug = this.formulary.getDrug(r.claim.ndc);
      const onHand = daysBetween(claim.serviceDate, addDays(r.claim.serviceDate, r.claim.daysSupply)) > 0;
      return drug && onHand ? [{ ndc: drug.ndc, gpi: drug.gpi, name: drug.name }] : [];
    });
    return [...known, ...fromClaims];
  }

  private priorFills(claim: PharmacyClaim, history: ClaimRecord[]): PriorFill[] {
    return activePaidClaims(history, claim.memberId).flatMap((r): PriorFill[] => {
      const drug = this.formulary.getDrug(r.claim.ndc);
      return drug
        ? [{ ndc: drug.ndc, gpi: drug.gpi, name: drug.name, fillDate: r.claim.serviceDate, daysSupply: r.claim.daysSupply }]
        : [];
    });
  }

  /** ---------- Pricing ---------- */

  /**
   * Allowed amount is the lesser of gross amount due and U&C. Deductible
   * applies first on tiers that use it, then copay or coinsurance; the
   * patient's share is capped by the remaining out-of-pocket maximum.
   */
  price(claim: PharmacyClaim, member: RxMember, tier: TierDefinition): Pricing {
    const ingredient = cents(claim.ingredientCostSubmitted);
    const fee = cents(claim.dispensingFeeSubmitted);
    const gross = claim.grossAmountDue > 0 ? cents(claim.grossAmountDue) : ingredient + fee;
    const allowed = claim.usualCustomaryCharge > 0 ? Math.min(gross, cents(claim.usualCustomaryCharge)) : gross;
    const feePaid = Math.min(fee, allowed);
    const ingredientPaid = allowed - feePaid;

    const deductibleRemaining = Math.max(0, cents(member.deductibleLimit) - cents(member.deductibleMet));
    const oopRemaining = Math.max(0, cents(member.oopLimit) - cents(member.oopMet));

    let deductible = tier.deductibleApplies ? Math.min(allowed, deductibleRemaining) : 0;
    const afterDeductible = allowed - deductible;
    let copay = tier.copay !== null ? Math.min(cents(tier.copay), afterDeductible) : 0;
    let coinsurance = tier.coinsurance !== null ? Math.round((afterDeductible * tier.coinsurance) / 100) : 0;

    let overflow = deductible + copay + coinsurance - oopRemaining;
    if (overflow > 0) {
      const fromCoinsurance = Math.min(coinsurance, overflow);
      coinsurance -= fromCoinsurance;
      overflow -= fromCoinsurance;
      const fromCopay = Math.min(copay, overflow);
      copay -= fromCopay;
      overflow -= fromCopay;
      deductible -= overflow;
    }
    const patientPay = deductible + copay + coinsurance;

    return {
      ingredientCostPaid: dollars(ingredientPaid),
      dispensingFeePaid: dollars(feePaid),
      allowedAmount: dollars(allowed),
      planPaid: dollars(allowed - patientPay),
      patientPay: dollars(patientPay),
      copay: dollars(copay),
      coinsurance: dollars(coinsurance),
      deductibleApplied: dollars(deductible),
      remainingDeductible: dollars(deductibleRemaining - deductible),
      remainingOop: dollars(oopRemaining - patientPay),
    };
  }

  private zeroPricing(member: RxMember): Pricing {
    return {
      ingredientCostPaid: 0,
      dispensingFeePaid: 0,
      allowedAmount: 0,
      planPaid: 0,
      patientPay: 0,
      copay: 0,
      coinsurance: 0,
      deductibleApplied: 0,
      remainingDeductible: dollars(Math.max(0, cents(member.deductibleLimit) - cents(member.deductibleMet))),
      remainingOop: dollars(Math.max(0, cents(member.oopLimit) - cents(member.oopMet))),
    };
  }

  private rejected(
    claim: PharmacyClaim,
    member: RxMember,
    rejects: Reject[],
    extras: { drugName?: string; tier?: number; durAlerts?: DurAlert[] } = {},
  ): ClaimResponse {
    const status: ResponseStatus = "R";
    return {
      claimId: claim.claimId,
      transactionCode: claim.transactionCode,
      status,
      rejectCode: rejects[0].code,
      rejectMessage: rejects[0].message,
      rejects,
      drugName: extras.drugName,
      tier: extras.tier,
      ...this.zeroPricing(member),
      accumulatorDelta: { deductible: 0, oop: 0 },
      durAlerts: extras.durAlerts ?? [],
      message: `Rejected: ${rejects.map((r) => `${r.code} ${r.message}`).join("; ")}`,
    };
  }

  /** Continue numbering after authorizations already issued, e.g. by a restored session. */
  resumeAuthorizations(issued: number): void {
    this.sequence = Math.max(this.sequence, issued);
  }

  private nextAuthorization(serviceDate: string): string {
    this.sequence++;
    return `${compactDate(serviceDate).slice(2)}${String(this.sequence).padStart(6, "0")}`;
  }
}
