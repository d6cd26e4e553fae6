import { describe, it, expect } from "vitest";
import { daysBetween } from "../dates";
import { MemberGenerator } from "./generator";

const REF = "2024-06-01";

describe("MemberGenerator", () => {
  it("is reproducible for a seed", () => {
    const a = new MemberGenerator({ seed: 8, referenceDate: REF }).generateMemberBatch(3);
    const b = new MemberGenerator({ seed: 8, referenceDate: REF }).generateMemberBatch(3);
    expect(a).toEqual(b);
  });

  it("builds a subscriber with coverage and accumulators", () => {
    const member = new MemberGenerator({ seed: 1, referenceDate: REF }).generateMember({
      planCode: "PPO-GOLD",
      status: "active",
      groupId: "GRP-TEST",
    });
    expect(member.memberId).toMatch(/^SUB\d{9}-01$/);
    expect(member.memberId.startsWith(member.subscriberId)).toBe(true);
    expect(member.relationship).toBe("self");
    expect(member.groupId).toBe("GRP-TEST");
    expect(member.coverageEnd).toBeNull();
    expect(member.coverageStart.endsWith("-01")).toBe(true);
    expect(member.accumulators.deductible.limit).toBe(500);
    expect(member.accumulators.oop.limit).toBe(3000);
    expect(member.accumulators.deductible.used).toBeLessThanOrEqual(500);
    expect(member.accumulators.oop.used).toBeGreaterThanOrEqual(member.accumulators.deductible.used);
  });

  it("ends termed coverage at a month end before the reference date", () => {
    const gen = new MemberGenerator({ seed: 2, referenceDate: REF });
    for (const m of gen.generateMemberBatch(10, { status: "termed" })) {
      expect(m.coverageEnd).not.toBeNull();
      const end = m.coverageEnd ?? "";
      expect(daysBetween(m.coverageStart, end)).toBeGreaterThan(0);
      expect(daysBetween(end, REF)).toBeGreaterThan(0);
    }
  });

  it("generates a family sharing subscriber, plan and address", () => {
    const family = new MemberGenerator({ seed: 3, referenceDate: REF }).generateFamily({
      planCode: "HMO-BASIC",
      dependentConfig: { spouse: true, children: 2 },
    });
    expect(family.map((m) => m.relationship)).toEqual(["self", "spouse", "child", "child"]);
    expect(family.map((m) => m.memberId.slice(-3))).toEqual(["-01", "-02", "-03", "-04"]);
    const [head, ...rest] = family;
    for (const m of rest) {
      expect(m.subscriberId).toBe(head.subscriberId);
      expect(m.planCode).toBe("HMO-BASIC");
      expect(m.demographics.lastName).toBe(head.demographics.lastName);
      expect(m.demographics.address).toEqual(head.demographics.address);
      expect(m.coverageStart).toBe(head.coverageStart);
    }
    for (const child of family.filter((m) => m.relationship === "child")) {
      expect(child.demographics.age).toBeLessThanOrEqual(25);
      expect(child.demographics.age).toBeLessThanOrEqual(head.demographics.age - 18);
    }
  });

  it("rejects an impossible number of children", () => {
    const gen = new MemberGenerator({ seed: 3, referenceDate: REF });
    expect(() => gen.generateFamily({ dependentConfig: { children: 11 } })).toThrow("Invalid number of children: 11");
  });

  it("attaches adjudicated claims in service-date order within the range", () => {
    const member = new MemberGenerator({ seed: 4, referenceDate: REF }).generateMemberWithClaims({
      planCode: "PPO-SILVER",
      status: "active",
      claimCount: 6,
      dateRange: ["2024-01-01", "2024-05-31"],
    });
    expect(member.claims).toHaveLength(6);
    const dates = member.claims.map((c) => c.serviceDate);
    expect(dates).toEqual([...dates].sort());
    for (const c of member.claims) {
      expect(c.memberId).toBe(member.memberId);
      expect(c.claimId).toMatch(/^CLM\d{10}$/);
      expect(daysBetween("2024-01-01", c.serviceDate)).toBeGreaterThanOrEqual(0);
      expect(daysBetween(c.serviceDate, "2024-05-31")).toBeGreaterThanOrEqual(0);
    }
    expect(member.accumulators.oop.used).toBeLessThanOrEqual(member.accumulators.oop.limit);
  });

  it("rejects an inverted date range", () => {
    const gen = new MemberGenerator({ seed: 4, referenceDate: REF });
    const member = gen.generateMember();
    expect(() => gen.attachClaims(member, 1, ["2024-05-01", "2024-01-01"])).toThrow(
      "Invalid date range: 2024-05-01 is after 2024-01-01",
    );
  });

  it("builds populations with claim counts in range", () => {
    const members = new MemberGenerator({ seed: 5, referenceDate: REF }).generatePopulation({
      count: 8,
      planCode: "EPO-STANDARD",
      withClaims: true,
      claimsPerMember: [2, 3],
    });
    expect(members).toHaveLength(8);
    for (const m of members) {
      expect(m.planCode).toBe("EPO-STANDARD");
      expect(m.claims.length).toBeGreaterThanOrEqual(2);
      expect(m.claims.length).toBeLessThanOrEqual(3);
    }
    expect(new Set(members.map((m) => m.subscriberId)).size).toBe(8);
  });

  it("validates the claims-per-member range", () => {
    const gen = new MemberGenerator({ seed: 5, referenceDate: REF });
    expect(() => gen.generatePopulation({ count: 1, withClaims: true, claimsPerMember: [3, 1] })).toThrow(
      "Invalid claims per member range [3, 1]",
    );
  });
});
