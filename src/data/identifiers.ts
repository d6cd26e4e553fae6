import { hashSeed, SeededRandom } from "../random";

/**
 * NPI check digit: Luhn over the 9-digit base with the 80840 card-issuer
 * prefix folded into the constant 24.
 */
export function npiCheckDigit(base: string): number {
  if (!/^\d{9}$/.test(base)) throw new Error(`NPI base must be 9 digits: ${base}`);
  let sum = 24;
  for (let i = 0; i < 9; i++) {
    let d = Number(base[8 - i]);
    if (i % 2 === 0) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
  }
  return (10 - (sum % 10)) % 10;
}

export function isValidNpi(npi: string): boolean {
  return /^\d{10}$/.test(npi) && npiCheckDigit(npi.slice(0, 9)) === Number(npi[9]);
}

export function generateNpi(rng: SeededRandom): string {
  const base = String(rng.int(1, 2)) + rng.digits(8);
  return base + String(npiCheckDigit(base));
}

/** Stable NPI for a named organisation. */
export function npiFor(name: string): string {
  return generateNpi(new SeededRandom(hashSeed(name)));
}

/** Normalise an NDC to 11 digits; hyphenated 5-4-2 input is accepted. */
export function normalizeNdc(ndc: string): string | null {
  const digits = ndc.replace(/-/g, "").trim();
  return /^\d{11}$/.test(digits) ? digits : null;
}
