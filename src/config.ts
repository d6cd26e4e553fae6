import dotenv from "dotenv";

dotenv.config();

export const TEST_MODE = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

export function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Invalid number in env var ${name}: ${raw}`);
  return n;
}

export function parseEnvDate(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return undefined;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(raw) || Number.isNaN(Date.parse(`${raw}T00:00:00Z`))) {
    throw new Error(`Invalid date in env var ${name}: ${raw} (expected YYYY-MM-DD)`);
  }
  return raw;
}

function usageFromEnv(): "T" | "P" {
  const raw = (process.env.X12_USAGE ?? "T").toUpperCase();
  if (raw === "T" || raw === "P") return raw;
  throw new Error(`Invalid X12_USAGE: ${raw} (expected T or P)`);
}

const seedRaw = process.env.HEALTHSIM_SEED;

export const config = {
  LOG_LEVEL: process.env.LOG_LEVEL ?? "info",
  PORT: numberFromEnv("PORT", 3333),
  SEED: seedRaw === undefined || seedRaw === "" ? undefined : numberFromEnv("HEALTHSIM_SEED", 0),
  REFERENCE_DATE: parseEnvDate("HEALTHSIM_REFERENCE_DATE"),
  OUTPUT_DIR: process.env.HEALTHSIM_OUTPUT_DIR ?? ".data/healthsim",
  MAX_BATCH: numberFromEnv("HEALTHSIM_MAX_BATCH", 10_000),
  X12_SENDER_ID: process.env.X12_SENDER_ID ?? "HEALTHSIM",
  X12_RECEIVER_ID: process.env.X12_RECEIVER_ID ?? "PAYER",
  X12_USAGE: usageFromEnv(),
  DUR_REFILL_THRESHOLD: numberFromEnv("DUR_REFILL_THRESHOLD", 0.75),
  RX_MAX_DAYS_SUPPLY: numberFromEnv("RX_MAX_DAYS_SUPPLY", 90),
} as const;

export type Config = typeof config;

/** The "today" used for ages, coverage windows and claim dates (YYYY-MM-DD). */
export function referenceDate(): string {
  return config.REFERENCE_DATE ?? new Date().toISOString().slice(0, 10);
}
