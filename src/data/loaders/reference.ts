/**
 * Reference data loaders.
 *
 * Name pools, addresses, conditions, labs, providers, procedures, plans and
 * pharmacy rules live under data/ and are parsed once, on first use.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { parse } from "csv-parse/sync";
import { npiFor } from "../identifiers";

export type Gender = "M" | "F";

export interface NameEntry {
  name: string;
  gender: Gender;
}

export interface AddressEntry {
  city: string;
  state: string;
  postalCode: string;
  areaCode: string;
}

export interface LabDefinition {
  key: string;
  loinc: string;
  display: string;
  unit: string;
  category: "laboratory" | "vital-signs";
  referenceLow: number;
  referenceHigh: number;
  min: number;
  max: number;
  decimals: number;
}

export interface ConditionMedication {
  name: string;
  dose: string;
  frequency: string;
  rxnorm: string;
  ndc: string;
}

export interface ValueRange {
  lab: string;
  min: number;
  max: number;
}

export interface ConditionDefinition {
  key: string;
  code: string;
  description: string;
  medications: ConditionMedication[];
  labs: ValueRange[];
  vitals: ValueRange[];
}

export interface ScenarioDefinition {
  id: string;
  name: string;
  description: string;
  required: string[];
  optional: string[];
  ageRange: [number, number];
  encounters: [number, number];
}

export type ProviderRole = "pcp" | "specialist" | "imaging" | "lab" | "emergency";

export interface Provider {
  npi: string;
  name: string;
  specialty: string;
  taxonomy: string;
  role: ProviderRole;
}

export interface Procedure {
  code: string;
  description: string;
  chargeMin: number;
  chargeMax: number;
  allowedFraction: number;
  kind: "office" | "emergency" | "other";
  role: ProviderRole;
  placeOfService: string;
}

export type PlanType = "HMO" | "PPO" | "EPO" | "HDHP";

export interface Plan {
  code: string;
  name: string;
  planType: PlanType;
  deductibleIndividual: number;
  deductibleFamily: number;
  oopMaxIndividual: number;
  oopMaxFamily: number;
  copayPcp: number;
  copaySpecialist: number;
  copayEr: number;
  coinsurance: number;
}

type Row = Record<string, string>;

export function dataPath(file: string): string {
  return fileURLToPath(new URL(`../../../data/${file}`, import.meta.url));
}

function readCsv(file: string): Row[] {
  const rows: Row[] = parse(readFileSync(dataPath(file), "utf-8"), {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  return rows;
}

function readJson<T>(file: string): T {
  return JSON.parse(readFileSync(dataPath(file), "utf-8"));
}

function num(val: string | undefined): number {
  const n = Number(val);
  if (val === undefined || val === "" || Number.isNaN(n)) throw new Error(`Expected a number, got "${val}"`);
  return n;
}

function oneOf<T extends string>(val: string, allowed: readonly T[], field: string): T {
  const match = allowed.find((a) => a === val);
  if (match === undefined) throw new Error(`Unexpected ${field}: ${val}`);
  return match;
}

function cached<T>(load: () => T): () => T {
  let holder: { value: T } | null = null;
  return () => {
    if (!holder) holder = { value: load() };
    return holder.value;
  };
}

const PROVIDER_ROLES = ["pcp", "specialist", "imaging", "lab", "emergency"] as const;

export const loadFirstNames = cached((): NameEntry[] =>
  readCsv("first_names.csv").map((r) => ({ name: r.name, gender: oneOf(r.gender, ["M", "F"] as const, "gender") })),
);

export const loadLastNames = cached((): string[] => readCsv("last_names.csv").map((r) => r.name));

export const loadAddresses = cached((): AddressEntry[] =>
  readCsv("addresses.csv").map((r) => ({
    city: r.city,
    state: r.state,
    postalCode: r.postal_code,
    areaCode: r.area_code,
  })),
);

export const loadStreets = cached((): string[] =>
  readFileSync(dataPath("streets.txt"), "utf-8")
    .split("\n")
    .map((s) => s.trim())
    .filter(Boolean),
);

export const loadLabs = cached((): Map<string, LabDefinition> => {
  const labs = new Map<string, LabDefinition>();
  for (const r of readCsv("labs.csv")) {
    labs.set(r.key, {
      key: r.key,
      loinc: r.loinc,
      display: r.display,
      unit: r.unit,
      category: oneOf(r.category, ["laboratory", "vital-signs"] as const, "lab category"),
      referenceLow: num(r.ref_low),
      referenceHigh: num(r.ref_high),
      min: num(r.min),
      max: num(r.max),
      decimals: num(r.decimals),
    });
  }
  return labs;
});

export const loadConditions = cached((): Map<string, ConditionDefinition> => {
  const raw = readJson<Record<string, Omit<ConditionDefinition, "key">>>("conditions.json");
  return new Map(Object.entries(raw).map(([key, def]) => [key, { key, ...def }]));
});

export const loadScenarios = cached((): ScenarioDefinition[] =>
  readJson<ScenarioDefinition[]>("scenarios.json"),
);

export const loadProviders = cached((): Provider[] =>
  readCsv("providers.csv").map((r) => ({
    npi: npiFor(r.name),
    name: r.name,
    specialty: r.specialty,
    taxonomy: r.taxonomy,
    role: oneOf(r.role, PROVIDER_ROLES, "provider role"),
  })),
);

export const loadProcedures = cached((): Procedure[] =>
  readCsv("procedures.csv").map((r) => ({
    code: r.code,
    description: r.description,
    chargeMin: num(r.charge_min),
    chargeMax: num(r.charge_max),
    allowedFraction: num(r.allowed_fraction),
    kind: oneOf(r.kind, ["office", "emergency", "other"] as const, "procedure kind"),
    role: oneOf(r.role, PROVIDER_ROLES, "procedure role"),
    placeOfService: r.place_of_service,
  })),
);

export const loadPlans = cached((): Plan[] => readJson<Plan[]>("plans.json"));

export { readCsv, readJson, num, oneOf };
