import { getSnapshot } from "mobx-state-tree";
import { beforeEach, describe, it, expect, vi } from "vitest";
import { NotFoundError } from "./errors";
import { AdjudicationEngine } from "./rxmembersim/adjudication";
import type { PharmacyClaim } from "./rxmembersim/claim";
import { FormularyGenerator } from "./rxmembersim/formulary";
import type { RxMember } from "./rxmembersim/member";
import type { PriorAuthRequest } from "./rxmembersim/priorAuth";
import { createPharmacySession, type HookEvent, type PharmacySessionInstance } from "./session";

const member: RxMember = {
  memberId: "RXM000000001",
  cardholderId: "ZX000000001",
  personCode: "01",
  bin: "610014",
  pcn: "HSIMRX",
  groupNumber: "RXGROUP01",
  firstName: "Ada",
  lastName: "Example",
  dateOfBirth: "1970-04-12",
  gender: "F",
  deductibleMet: 0,
  deductibleLimit: 250,
  oopMet: 100,
  oopLimit: 2000,
};

function claim(overrides: Partial<PharmacyClaim> = {}): PharmacyClaim {
  return {
    claimId: "RXC1",
    transactionCode: "B1",
    serviceDate: "2024-03-01",
    pharmacyNpi: "1234567893",
    memberId: member.memberId,
    cardholderId: member.cardholderId,
    personCode: "01",
    bin: "610014",
    pcn: "HSIMRX",
    groupNumber: "RXGROUP01",
    prescriptionNumber: "RX1",
    fillNumber: 0,
    ndc: "00093017101",
    quantityDispensed: 60,
    daysSupply: 30,
    dawCode: "0",
    prescriberNpi: "1234567893",
    ingredientCostSubmitted: 12.5,
    dispensingFeeSubmitted: 2,
    patientPaidSubmitted: 0,
    usualCustomaryCharge: 20,
    grossAmountDue: 14.5,
    ...overrides,
  };
}

let session: PharmacySessionInstance;
let events: HookEvent[];

beforeEach(() => {
  session = createPharmacySession({ id: "test" });
  events = [];
  session.hooks.onAny((e) => events.push(e));
});

describe("member registration", () => {
  it("reports new and updated members", () => {
    session.registerMember(member);
    session.registerMember({ ...member, firstName: "Ava" });
    expect(events.map((e) => e.type === "member:registered" && e.isNew)).toEqual([true, false]);
    expect(session.getMember(member.memberId)?.firstName).toBe("Ava");
    expect(session.memberList).toHaveLength(1);
    expect(events[0].sessionId).toBe("test");
  });

  it("rejects claims for unknown members", () => {
    expect(() => session.submitClaim(claim())).toThrow(NotFoundError);
    expect(() => session.submitClaim(claim())).toThrow("Member RXM000000001 not found");
  });
});

describe("claim ledger", () => {
  beforeEach(() => session.registerMember(member));

  it("records a paid claim and moves accumulators", () => {
    const response = session.submitClaim(claim());
    expect(response.status).toBe("P");
    expect(session.claims).toHaveLength(1);
    expect(session.claims[0].sequence).toBe(1);
    expect(session.getMember(member.memberId)).toMatchObject({ deductibleMet: 0, oopMet: 110 });
    expect(events.slice(1).map((e) => e.type)).toEqual(["claim:adjudicated", "accumulator:updated"]);
    expect(events[2]).toMatchObject({ delta: { deductible: 0, oop: 10 }, oopMet: 110 });
  });

  it("marks the original reversed and restores accumulators", () => {
    session.submitClaim(claim());
    const reversal = session.submitClaim(claim({ claimId: "RXC2", transactionCode: "B2" }));
    expect(reversal).toMatchObject({ status: "A", reversedClaimId: "RXC1" });
    expect(session.claims.map((e) => e.reversed)).toEqual([true, false]);
    expect(session.getMember(member.memberId)?.oopMet).toBe(100);
    expect(events.map((e) => e.type)).toContain("claim:reversed");
    expect(session.claimsFor(member.memberId)).toHaveLength(2);
    expect(session.claimsFor("RXM999999999")).toEqual([]);
  });

  it("leaves accumulators where they started after a bill, rebill and reversal", () => {
    const eliquis = { ndc: "00003089421", grossAmountDue: 0, usualCustomaryCharge: 0 };
    session.submitClaim(claim({ ...eliquis, ingredientCostSubmitted: 500 }));
    const rebill = session.submitClaim(
      claim({ ...eliquis, claimId: "RXC2", transactionCode: "B3", ingredientCostSubmitted: 100 }),
    );
    expect(rebill.status).toBe("P");
    const reversal = session.submitClaim(claim({ ...eliquis, claimId: "RXC3", transactionCode: "B2" }));

    expect(reversal).toMatchObject({ status: "A", reversedClaimId: "RXC2" });
    expect(reversal.accumulatorDelta).toEqual({
      deductible: 0 - (rebill.fillAccumulatorDelta?.deductible ?? 0),
      oop: 0 - (rebill.fillAccumulatorDelta?.oop ?? 0),
    });
    expect(session.claims.map((e) => e.reversed)).toEqual([true, true, false]);
    expect(session.getMember(member.memberId)).toMatchObject({ deductibleMet: 0, oopMet: 100 });
  });

  it("adjudicates with a replacement engine", () => {
    session.useEngine(
      new AdjudicationEngine({ formulary: new FormularyGenerator().generateStandardCommercial(), maxDaysSupply: 30 }),
    );
    expect(session.adjudicationEngine.maxDaysSupply).toBe(30);
    expect(session.submitClaim(claim({ daysSupply: 60, quantityDispensed: 120 })).rejectCode).toBe("19");
  });

  it("keeps numbering authorizations across a replacement engine", () => {
    session.submitClaim(claim());
    session.useEngine(new AdjudicationEngine({ formulary: new FormularyGenerator().generateStandardCommercial() }));
    const second = session.submitClaim(claim({ claimId: "RXC2", prescriptionNumber: "RX2" }));
    expect(second.authorizationNumber).toBe("240301000002");
  });

  it("leaves accumulators alone on a reject", () => {
    const response = session.submitClaim(claim({ bin: "999999" }));
    expect(response.status).toBe("R");
    expect(session.getMember(member.memberId)?.oopMet).toBe(100);
    expect(events.slice(1).map((e) => e.type)).toEqual(["claim:adjudicated"]);
  });
});

describe("prior authorization", () => {
  const request: PriorAuthRequest = {
    requestId: "PA-TEST-1",
    memberId: member.memberId,
    ndc: "00169413512",
    diagnoses: ["E11.65"],
    labResults: [{ loinc: "4548-4", value: 8.1, date: "2024-05-01" }],
    medicationHistory: [{ gpi: "27250050000310", name: "Metformin", startDate: "2023-10-01", endDate: "2024-04-01" }],
    requestDate: "2024-06-01",
  };
  const ozempic = claim({
    ndc: "00169413512",
    serviceDate: "2024-06-10",
    quantityDispensed: 3,
    daysSupply: 28,
    ingredientCostSubmitted: 900,
    dispensingFeeSubmitted: 0,
    grossAmountDue: 900,
    usualCustomaryCharge: 0,
  });

  it("lets an approved request pay the claim it covers", () => {
    session.registerMember(member);
    expect(session.submitClaim(ozempic).rejectCode).toBe("75");

    const decision = session.requestPriorAuthorization(request);
    expect(decision.status).toBe("approved");
    expect(session.priorAuthorizations).toHaveLength(1);
    expect(events.find((e) => e.type === "priorAuth:decided")).toMatchObject({
      requestId: "PA-TEST-1",
      status: "approved",
      authorizationNumber: decision.authorizationNumber,
    });

    const paid = session.submitClaim({ ...ozempic, claimId: "RXC2" });
    expect(paid).toMatchObject({ status: "P", patientPay: 412.5, planPaid: 487.5 });
    expect(session.getMember(member.memberId)).toMatchObject({ deductibleMet: 250, oopMet: 512.5 });
  });

  it("keeps denials out of the authorization list", () => {
    const decision = session.requestPriorAuthorization({ ...request, labResults: [] });
    expect(decision.status).toBe("denied");
    expect(session.priorAuthorizations).toHaveLength(0);
    expect(session.priorAuthDecisions).toHaveLength(1);
  });
});

describe("hooks", () => {
  it("filters typed listeners and unsubscribes", () => {
    const seen: string[] = [];
    const off = session.hooks.on("member:registered", (e) => seen.push(e.memberId));
    session.registerMember(member);
    off();
    session.registerMember({ ...member, memberId: "RXM000000002" });
    expect(seen).toEqual(["RXM000000001"]);
  });

  it("fires once listeners a single time", () => {
    const listener = vi.fn();
    session.hooks.once("member:registered", listener);
    session.registerMember(member);
    session.registerMember(member);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("keeps notifying after a listener throws", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    session.hooks.on("member:registered", () => {
      throw new Error("listener failed");
    });
    session.registerMember(member);
    expect(events).toHaveLength(1);
    error.mockRestore();
  });

  it("counts and clears listeners", () => {
    session.hooks.on("claim:adjudicated", () => undefined);
    expect(session.hooks.listenerCount).toBe(2);
    session.hooks.off("claim:adjudicated");
    expect(session.hooks.listenerCount).toBe(1);
    session.hooks.offAll();
    expect(session.hooks.listenerCount).toBe(0);
  });
});

describe("snapshots", () => {
  it("restores members and the ledger into a new session", () => {
    session.registerMember(member);
    session.submitClaim(claim());
    const restored = createPharmacySession(getSnapshot(session));
    expect(restored.id).toBe("test");
    expect(restored.getMember(member.memberId)?.oopMet).toBe(110);
    expect(restored.claimHistory).toEqual(session.claimHistory);
    expect(restored.hooks.listenerCount).toBe(0);
  });

  it("continues authorization numbers in a restored session", () => {
    session.registerMember(member);
    session.submitClaim(claim());
    session.submitClaim(claim({ claimId: "RXC2", prescriptionNumber: "RX2" }));
    const restored = createPharmacySession(getSnapshot(session));
    expect(restored.issuedAuthorizations).toBe(2);
    const third = restored.submitClaim(claim({ claimId: "RXC3", prescriptionNumber: "RX3" }));
    expect(third.authorizationNumber).toBe("240301000003");
  });

  it("resets state", () => {
    session.registerMember(member);
    session.submitClaim(claim());
    session.reset();
    expect(session.members.size).toBe(0);
    expect(session.claims).toHaveLength(0);
  });
});
