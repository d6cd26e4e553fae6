/** Readers for untrusted request bodies and tool arguments. Each throws InvalidRequestError on a bad value. */

import type { AgeRange } from "./data/demographics";
import { InvalidRequestError } from "./errors";

export type Params = Record<string, unknown>;

export function asParams(value: unknown, what = "request body"): Params {
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) throw new InvalidRequestError(`${what} must be an object`);
  return Object.fromEntries(Object.entries(value));
}

export function optionalString(p: Params, key: string): string | undefined {
  const v = p[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new InvalidRequestError(`${key} must be a string`);
  return v;
}

export function requireString(p: Params, key: string): string {
  const v = optionalString(p, key);
  if (v === undefined || v === "") throw new InvalidRequestError(`${key} is required`);
  return v;
}

export function optionalNumber(p: Params, key: string): number | undefined {
  const v = p[key];
  if (v === undefined || v === null) return undefined;
  const n = typeof v === "string" && v.trim() !== "" ? Number(v) : v;
  if (typeof n !== "number" || !Number.isFinite(n)) throw new InvalidRequestError(`${key} must be a number`);
  return n;
}

export function requireNumber(p: Params, key: string): number {
  const v = optionalNumber(p, key);
  if (v === undefined) throw new InvalidRequestError(`${key} is required`);
  return v;
}

export function optionalBoolean(p: Params, key: string): boolean | undefined {
  const v = p[key];
  if (v === undefined || v === null) return undefined;
  if (v === "true") return true;
  if (v === "false") return false;
  if (typeof v !== "boolean") throw new InvalidRequestError(`${key} must be a boolean`);
  return v;
}

export function optionalEnum<T extends string>(p: Params, key: string, values: readonly T[]): T | undefined {
  const v = optionalString(p, key);
  if (v === undefined) return undefined;
  const match = values.find((allowed) => allowed === v);
  if (match === undefined) throw new InvalidRequestError(`${key} must be one of: ${values.join(", ")}`);
  return match;
}

export function optionalStringArray(p: Params, key: string): string[] | undefined {
  const v = p[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v === "string") return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  if (!Array.isArray(v) || !v.every((item): item is string => typeof item === "string")) {
    throw new InvalidRequestError(`${key} must be an array of strings`);
  }
  return v;
}

/** Two numbers, as `[min, max]` or `"min-max"`. Range checks are left to the generators. */
export function optionalRange(p: Params, key: string): [number, number] | undefined {
  const v = p[key];
  if (v === undefined || v === null) return undefined;
  const parts = typeof v === "string" ? v.split("-").map((s) => Number(s.trim())) : v;
  if (!Array.isArray(parts) || parts.length !== 2) throw new InvalidRequestError(`${key} must be [min, max]`);
  const [min, max] = parts;
  if (typeof min !== "number" || typeof max !== "number" || Number.isNaN(min) || Number.isNaN(max)) {
    throw new InvalidRequestError(`${key} must be [min, max]`);
  }
  return [min, max];
}

export function optionalAgeRange(p: Params, key = "ageRange"): AgeRange | undefined {
  return optionalRange(p, key);
}

export function optionalObjectArray(p: Params, key: string): Params[] | undefined {
  const v = p[key];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v)) throw new InvalidRequestError(`${key} must be an array`);
  return v.map((item, i) => asParams(item, `${key}[${i}]`));
}
