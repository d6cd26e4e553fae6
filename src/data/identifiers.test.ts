import { describe, it, expect } from "vitest";
import { SeededRandom } from "../random";
import { generateNpi, isValidNpi, normalizeNdc, npiCheckDigit, npiFor } from "./identifiers";

describe("NPI", () => {
  it("computes the Luhn check digit with the 80840 prefix", () => {
    expect(npiCheckDigit("123456789")).toBe(3);
    expect(isValidNpi("1234567893")).toBe(true);
    expect(isValidNpi("1234567890")).toBe(false);
  });

  it("rejects malformed input", () => {
    expect(isValidNpi("12345")).toBe(false);
    expect(() => npiCheckDigit("12345678")).toThrow("NPI base must be 9 digits");
  });

  it("generates valid NPIs starting with 1 or 2", () => {
    const rng = new SeededRandom(21);
    for (let i = 0; i < 25; i++) {
      const npi = generateNpi(rng);
      expect(npi).toMatch(/^[12]\d{9}$/);
      expect(isValidNpi(npi)).toBe(true);
    }
  });

  it("derives a stable NPI from an organisation name", () => {
    expect(npiFor("Lakeside Pharmacy")).toBe(npiFor("Lakeside Pharmacy"));
    expect(isValidNpi(npiFor("Lakeside Pharmacy"))).toBe(true);
  });
});

describe("normalizeNdc", () => {
  it("accepts 11 digits with or without hyphens", () => {
    expect(normalizeNdc("00093-0171-01")).toBe("00093017101");
    expect(normalizeNdc("00093017101")).toBe("00093017101");
  });

  it("returns null for anything else", () => {
    expect(normalizeNdc("0093-0171-01")).toBeNull();
    expect(normalizeNdc("abc")).toBeNull();
  });
});
