import { describe, it, expect } from "vitest";
import { SeededRandom } from "../random";
import type { Plan, Provider } from "../data/loaders/reference";
import { adjudicateClaim, CARC, draftClaim, fromCents, toCents, type ClaimDraft } from "./claims";
import type { Accumulators, Member } from "./models";
import { getPlan } from "./plans";

const pcp: Provider = {
  npi: "1234567893",
  name: "Test Family Clinic",
  specialty: "Family Medicine",
  taxonomy: "207Q00000X",
  role: "pcp",
};
const lab: Provider = { ...pcp, name: "Test Lab", specialty: "Clinical Laboratory", taxonomy: "291U00000X", role: "lab" };

const member: Member = {
  memberId: "SUB000000001-01",
  subscriberId: "SUB000000001",
  relationship: "self",
  demographics: {
    firstName: "Ada",
    lastName: "Example",
    fullName: "Ada Example",
    dateOfBirth: "1980-05-05",
    age: 44,
    gender: "F",
    address: { line: "1 Test Way", city: "Springfield", state: "IL", postalCode: "62701" },
    phone: "217-555-0100",
  },
  planCode: "PPO-GOLD",
  groupId: "GRP000001",
  status: "active",
  coverageStart: "2024-01-01",
  coverageEnd: null,
  accumulators: { deductible: { used: 0, limit: 500 }, oop: { used: 0, limit: 3000 } },
  claims: [],
};

const hdhp: Plan = {
  code: "HDHP-TEST",
  name: "Test HDHP",
  planType: "HDHP",
  deductibleIndividual: 1000,
  deductibleFamily: 2000,
  oopMaxIndividual: 3000,
  oopMaxFamily: 6000,
  copayPcp: 0,
  copaySpecialist: 0,
  copayEr: 0,
  coinsurance: 20,
};

function draft(overrides: Partial<ClaimDraft>): ClaimDraft {
  return {
    claimId: "CLM0000000001",
    serviceDate: "2024-03-01",
    provider: pcp,
    placeOfService: "11",
    diagnosisCodes: ["I10"],
    lines: [{ procedureCode: "99213", description: "Office visit", units: 1, charge: 150, allowed: 105, kind: "office" }],
    ...overrides,
  };
}

const acc = (deductibleUsed: number, deductibleLimit: number, oopUsed: number, oopLimit: number): Accumulators => ({
  deductible: { used: deductibleUsed, limit: deductibleLimit },
  oop: { used: oopUsed, limit: oopLimit },
});

describe("cents", () => {
  it("round-trips dollars", () => {
    expect(toCents(12.34)).toBe(1234);
    expect(fromCents(1234)).toBe(12.34);
  });
});

describe("adjudicateClaim", () => {
  it("charges the PCP copay on an office visit", () => {
    const { claim, accumulators } = adjudicateClaim(draft({}), member, getPlan("PPO-GOLD"), acc(0, 500, 0, 3000));
    expect(claim.status).toBe("paid");
    expect(claim.lines[0]).toMatchObject({ allowed: 105, copay: 20, deductible: 0, coinsurance: 0, paid: 85 });
    expect(claim.lines[0].adjustments).toEqual([
      { group: "CO", reason: CARC.contractual, amount: 45 },
      { group: "PR", reason: CARC.copay, amount: 20 },
    ]);
    expect(claim.patientResponsibility).toEqual({ deductible: 0, copay: 20, coinsurance: 0, total: 20 });
    expect(accumulators).toEqual(acc(0, 500, 20, 3000));
  });

  it("applies the remaining deductible, then coinsurance", () => {
    const labDraft = draft({
      provider: lab,
      placeOfService: "81",
      lines: [{ procedureCode: "80053", description: "Metabolic panel", units: 1, charge: 100, allowed: 70, kind: "other" }],
    });
    const { claim, accumulators } = adjudicateClaim(labDraft, member, getPlan("PPO-GOLD"), acc(450, 500, 450, 3000));
    expect(claim.lines[0]).toMatchObject({ deductible: 50, coinsurance: 4, copay: 0, paid: 16 });
    expect(claim.lines[0].adjustments).toEqual([
      { group: "CO", reason: CARC.contractual, amount: 30 },
      { group: "PR", reason: CARC.deductible, amount: 50 },
      { group: "PR", reason: CARC.coinsurance, amount: 4 },
    ]);
    expect(claim.totalCharge).toBe(100);
    expect(claim.totalAllowed).toBe(70);
    expect(claim.totalPaid).toBe(16);
    expect(accumulators).toEqual(acc(500, 500, 504, 3000));
  });

  it("caps the patient share at the out-of-pocket maximum", () => {
    const hdhpDraft = draft({
      lines: [{ procedureCode: "99213", description: "Office visit", units: 1, charge: 100, allowed: 100, kind: "office" }],
    });
    const { claim, accumulators } = adjudicateClaim(hdhpDraft, { ...member, planCode: "HDHP-TEST" }, hdhp, acc(1000, 1000, 2990, 3000));
    expect(claim.lines[0]).toMatchObject({ copay: 0, deductible: 0, coinsurance: 10, paid: 90 });
    expect(claim.lines[0].adjustments).toEqual([{ group: "PR", reason: CARC.coinsurance, amount: 10 }]);
    expect(accumulators.oop.used).toBe(3000);
  });

  it("pays in full once the out-of-pocket maximum is met", () => {
    const { claim } = adjudicateClaim(draft({}), member, getPlan("PPO-GOLD"), acc(500, 500, 3000, 3000));
    expect(claim.lines[0]).toMatchObject({ copay: 0, paid: 105 });
    expect(claim.patientResponsibility.total).toBe(0);
  });

  it("denies service before coverage starts", () => {
    const early = draft({ serviceDate: "2023-12-15" });
    const start = acc(100, 500, 100, 3000);
    const { claim, accumulators } = adjudicateClaim(early, member, getPlan("PPO-GOLD"), start);
    expect(claim.status).toBe("denied");
    expect(claim.denialReason).toBe(CARC.beforeCoverage);
    expect(claim.lines[0]).toMatchObject({ allowed: 0, paid: 0 });
    expect(claim.lines[0].adjustments).toEqual([{ group: "CO", reason: "26", amount: 150 }]);
    expect(claim.totalPaid).toBe(0);
    expect(accumulators).toEqual(start);
  });

  it("denies service after coverage ends", () => {
    const termed = { ...member, status: "termed" as const, coverageEnd: "2024-02-29" };
    const { claim } = adjudicateClaim(draft({}), termed, getPlan("PPO-GOLD"), acc(0, 500, 0, 3000));
    expect(claim.denialReason).toBe(CARC.afterCoverage);
  });

  it("denies on review and holds pending claims", () => {
    const denied = adjudicateClaim(draft({ outcome: "denied" }), member, getPlan("PPO-GOLD"), acc(0, 500, 0, 3000));
    expect(denied.claim.status).toBe("denied");
    expect(denied.claim.denialReason).toBe(CARC.notMedicallyNecessary);

    const pending = adjudicateClaim(draft({ outcome: "pending" }), member, getPlan("PPO-GOLD"), acc(0, 500, 0, 3000));
    expect(pending.claim.status).toBe("pending");
    expect(pending.claim.denialReason).toBeUndefined();
    expect(pending.claim.lines[0].adjustments).toEqual([]);
  });

  it("copies member and provider details onto the claim", () => {
    const { claim } = adjudicateClaim(draft({}), member, getPlan("PPO-GOLD"), acc(0, 500, 0, 3000));
    expect(claim.patient).toEqual({ firstName: "Ada", lastName: "Example", dateOfBirth: "1980-05-05", gender: "F" });
    expect(claim.providerNpi).toBe("1234567893");
    expect(claim.providerTaxonomy).toBe("207Q00000X");
    expect(claim.subscriberId).toBe("SUB000000001");
  });
});

describe("draftClaim", () => {
  it("drafts lines whose allowed amount never exceeds the charge", () => {
    const rng = new SeededRandom(12);
    for (let i = 0; i < 30; i++) {
      const d = draftClaim(rng, `CLM${i}`, "2024-03-01", ["I10"]);
      expect(d.lines.length).toBeGreaterThan(0);
      for (const line of d.lines) expect(line.allowed).toBeLessThanOrEqual(line.charge);
      if (d.lines.some((l) => l.procedureCode === "99396")) expect(d.diagnosisCodes).toEqual(["Z00.00"]);
    }
  });
});
