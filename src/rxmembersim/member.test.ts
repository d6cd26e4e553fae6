import { describe, it, expect } from "vitest";
import { applyAccumulatorDelta, RxMemberGenerator, validateRoutingIdentifiers, type RxMember } from "./member";

const routing = { bin: "610014", pcn: "HSIMRX", groupNumber: "RXGROUP01" };

describe("RxMemberGenerator", () => {
  it("generates a carded member within its accumulator limits", () => {
    const member = new RxMemberGenerator({ seed: 6, referenceDate: "2024-06-01" }).generate({ ...routing, gender: "F" });
    expect(member.memberId).toMatch(/^RXM\d{9}$/);
    expect(member.cardholderId).toMatch(/^ZX\d{9}$/);
    expect(member.personCode).toBe("01");
    expect(member).toMatchObject(routing);
    expect(member.gender).toBe("F");
    expect(member.deductibleMet).toBeLessThanOrEqual(member.deductibleLimit);
    expect(member.oopMet).toBeGreaterThanOrEqual(member.deductibleMet);
    expect(member.oopMet).toBeLessThanOrEqual(member.oopLimit);
  });

  it("is reproducible and issues unique ids", () => {
    const a = new RxMemberGenerator({ seed: 6, referenceDate: "2024-06-01" });
    const b = new RxMemberGenerator({ seed: 6, referenceDate: "2024-06-01" });
    expect(a.generate(routing)).toEqual(b.generate(routing));
    const ids = Array.from({ length: 20 }, () => a.generate(routing).memberId);
    expect(new Set(ids).size).toBe(20);
  });
});

describe("validateRoutingIdentifiers", () => {
  it("checks BIN, PCN and group number", () => {
    expect(() => validateRoutingIdentifiers("12345", "PCN", "G")).toThrow("Invalid BIN 12345: expected 6 digits");
    expect(() => validateRoutingIdentifiers("123456", "PCN-1", "G")).toThrow("Invalid PCN PCN-1");
    expect(() => validateRoutingIdentifiers("123456", "PCN", "")).toThrow("Invalid group number");
    expect(() => validateRoutingIdentifiers("123456", "PCN", "G1")).not.toThrow();
  });
});

describe("applyAccumulatorDelta", () => {
  const member: RxMember = {
    memberId: "RXM000000001",
    cardholderId: "ZX000000001",
    personCode: "01",
    ...routing,
    firstName: "Ada",
    lastName: "Example",
    dateOfBirth: "1980-05-05",
    gender: "F",
    deductibleMet: 90,
    deductibleLimit: 100,
    oopMet: 500,
    oopLimit: 2000,
  };

  it("adds and clamps at the limit", () => {
    const next = applyAccumulatorDelta(member, { deductible: 20, oop: 20 });
    expect(next.deductibleMet).toBe(100);
    expect(next.oopMet).toBe(520);
  });

  it("never goes below zero", () => {
    const next = applyAccumulatorDelta(member, { deductible: -200, oop: -600 });
    expect(next.deductibleMet).toBe(0);
    expect(next.oopMet).toBe(0);
  });

  it("leaves the input untouched", () => {
    applyAccumulatorDelta(member, { deductible: 5, oop: 5 });
    expect(member.deductibleMet).toBe(90);
  });
});
