/**
 * Synthetic patient generator.
 *
 * A patient is assembled from conditions (picked directly, from a clinical
 * scenario, or at random); diagnoses, medications and observations all
 * follow from those conditions. Everything is drawn from one seeded source,
 * so a generator created with the same seed and reference date replays the
 * same patients.
 */

import { config, referenceDate as defaultReferenceDate } from "../config";
import { addDays, daysBetween, addYears } from "../dates";
import { InvalidRequestError } from "../errors";
import { createLogger } from "../logger";
import { SeededRandom } from "../random";
import { generatePerson, validateAgeRange, type AgeRange } from "../data/demographics";
import {
  loadConditions,
  loadLabs,
  loadProviders,
  loadScenarios,
  type ConditionDefinition,
  type Gender,
  type ScenarioDefinition,
  type ValueRange,
} from "../data/loaders/reference";
import type {
  Diagnosis,
  Encounter,
  EncounterType,
  Interpretation,
  Medication,
  Observation,
  Patient,
  ScenarioSummary,
} from "./models";

const log = createLogger("patientsim");

const DEFAULT_AGE_RANGE: AgeRange = [18, 90];
const DEFAULT_ENCOUNTERS: [number, number] = [1, 4];
const ENCOUNTER_WINDOW_DAYS = 730;
const WELLNESS_REASON = "Z00.00";
const VITAL_KEYS = ["systolic", "diastolic", "heart_rate", "bmi", "spo2"];
const ALLERGENS = ["Penicillin", "Sulfonamide antibiotics", "Latex", "Codeine", "Peanuts"];

export interface PatientGeneratorOptions {
  seed?: number;
  /** YYYY-MM-DD; defaults to the configured reference date. */
  referenceDate?: string;
}

export interface PatientConstraints {
  ageRange?: AgeRange;
  gender?: Gender;
  /** Condition keys, e.g. "diabetes" or "hypertension". */
  conditions?: string[];
  scenario?: string;
}

export interface PatientBatchOptions extends PatientConstraints {
  count: number;
}

export function validateCount(count: number): number {
  if (!Number.isInteger(count) || count < 1 || count > config.MAX_BATCH) {
    throw new InvalidRequestError(`Invalid count ${count}: expected an integer between 1 and ${config.MAX_BATCH}`);
  }
  return count;
}

export function findScenario(id: string): ScenarioDefinition {
  const scenario = loadScenarios().find((s) => s.id === id);
  if (!scenario) {
    const available = loadScenarios()
      .map((s) => s.id)
      .join(", ");
    throw new InvalidRequestError(`Unknown scenario: ${id}. Available: ${available}`);
  }
  return scenario;
}

export function findCondition(key: string): ConditionDefinition {
  const condition = loadConditions().get(key);
  if (!condition) {
    const available = [...loadConditions().keys()].join(", ");
    throw new InvalidRequestError(`Unknown condition: ${key}. Available: ${available}`);
  }
  return condition;
}

export function listConditions(): Array<{ key: string; code: string; description: string }> {
  return [...loadConditions().values()].map(({ key, code, description }) => ({ key, code, description }));
}

function interpret(value: number, low: number, high: number): Interpretation {
  if (value < low) return "L";
  if (value > high) return "H";
  return "N";
}

export class PatientGenerator {
  readonly seed: number;
  readonly referenceDate: string;
  private readonly rng: SeededRandom;
  private readonly issuedIds = new Set<string>();

  constructor(options: PatientGeneratorOptions = {}) {
    this.rng = new SeededRandom(options.seed ?? config.SEED);
    this.seed = this.rng.seed;
    this.referenceDate = options.referenceDate ?? defaultReferenceDate();
  }

  listScenarios(): ScenarioSummary[] {
    return loadScenarios().map(({ id, name, description }) => ({ id, name, description }));
  }

  generatePatient(constraints: PatientConstraints = {}): Patient {
    const scenario = constraints.scenario === undefined ? undefined : findScenario(constraints.scenario);
    const ageRange = validateAgeRange(constraints.ageRange, scenario?.ageRange ?? DEFAULT_AGE_RANGE);
    const conditions = this.resolveConditions(constraints.conditions, scenario);

    const patientId = this.nextPatientId();
    const mrn = `MRN${this.rng.digits(8)}`;
    const person = generatePerson(this.rng, this.referenceDate, { ageRange, gender: constraints.gender });

    const encounters = this.generateEncounters(person.dateOfBirth, conditions, scenario);
    const firstVisit = encounters[0]?.admitDate ?? this.referenceDate;
    const diagnoses = this.generateDiagnoses(person.dateOfBirth, firstVisit, conditions);
    const medications = this.generateMedications(conditions, diagnoses);
    const lastVisit = encounters[encounters.length - 1]?.admitDate ?? this.referenceDate;
    const observations = this.generateObservations(conditions, lastVisit);
    const allergies = this.rng.chance(0.2) ? [this.rng.pick(ALLERGENS)] : [];

    return {
      patientId,
      mrn,
      demographics: {
        firstName: person.firstName,
        lastName: person.lastName,
        dateOfBirth: person.dateOfBirth,
        gender: person.gender,
        address: person.address,
        phone: person.phone,
      },
      gender: person.gender,
      age: person.age,
      fullName: `${person.firstName} ${person.lastName}`,
      diagnoses,
      encounters,
      medications,
      observations,
      allergies,
    };
  }

  generateBatch(options: PatientBatchOptions): Patient[] {
    const { count, ...constraints } = options;
    validateCount(count);
    const patients: Patient[] = [];
    for (let i = 0; i < count; i++) patients.push(this.generatePatient(constraints));
    log.debug(`generated ${count} patients (seed ${this.seed}${constraints.scenario ? `, scenario ${constraints.scenario}` : ""})`);
    return patients;
  }

  private nextPatientId(): string {
    let id = `PAT-${this.rng.alphanumeric(8)}`;
    while (this.issuedIds.has(id)) id = `PAT-${this.rng.alphanumeric(8)}`;
    this.issuedIds.add(id);
    return id;
  }

  private resolveConditions(keys: string[] | undefined, scenario: ScenarioDefinition | undefined): ConditionDefinition[] {
    const picked: string[] = [];
    if (scenario) {
      picked.push(...scenario.required);
      for (const key of scenario.optional) if (this.rng.chance(0.5)) picked.push(key);
    }
    if (keys) picked.push(...keys);
    if (!scenario && !keys) {
      const pool = [...loadConditions().keys()].filter((k) => k !== "asthma");
      picked.push(...this.rng.sample(pool, this.rng.int(1, 3)));
    }
    return [...new Set(picked)].map(findCondition);
  }

  private generateEncounters(
    dateOfBirth: string,
    conditions: ConditionDefinition[],
    scenario: ScenarioDefinition | undefined,
  ): Encounter[] {
    const [min, max] = scenario?.encounters ?? DEFAULT_ENCOUNTERS;
    const count = this.rng.int(min, max);
    const windowStart = addDays(this.referenceDate, -ENCOUNTER_WINDOW_DAYS);
    const start = daysBetween(dateOfBirth, windowStart) >= 0 ? windowStart : dateOfBirth;
    const dayBefore = addDays(this.referenceDate, -1);
    const end = daysBetween(start, dayBefore) >= 0 ? dayBefore : start;
    const dates = Array.from({ length: count }, () => this.rng.dateBetween(start, end)).sort();

    const reasonCodes = conditions.length > 0 ? conditions.map((c) => c.code) : [WELLNESS_REASON];
    const clinics = loadProviders().filter((p) => p.role === "pcp" || p.role === "specialist");
    const hospitals = loadProviders().filter((p) => p.role === "emergency");

    return dates.map((admitDate) => {
      const type: EncounterType =
        conditions.length === 0
          ? "outpatient"
          : this.rng.weighted<EncounterType>([
              ["outpatient", 0.75],
              ["emergency", 0.15],
              ["inpatient", 0.1],
            ]);
      const provider = this.rng.pick(type === "outpatient" ? clinics : hospitals);
      const encounter: Encounter = {
        encounterId: `ENC-${this.rng.alphanumeric(10)}`,
        type,
        admitDate,
        reasonCodes,
        providerNpi: provider.npi,
        providerName: provider.name,
      };
      if (type === "inpatient") {
        const discharge = addDays(admitDate, this.rng.int(1, 5));
        encounter.dischargeDate = daysBetween(discharge, this.referenceDate) >= 0 ? discharge : this.referenceDate;
      } else if (type === "emergency") {
        encounter.dischargeDate = admitDate;
      }
      return encounter;
    });
  }

  private generateDiagnoses(dateOfBirth: string, firstVisit: string, conditions: ConditionDefinition[]): Diagnosis[] {
    const tenYearsBack = addYears(firstVisit, -10);
    const earliest = daysBetween(dateOfBirth, tenYearsBack) >= 0 ? tenYearsBack : dateOfBirth;
    return conditions.map((c, i) => ({
      code: c.code,
      description: c.description,
      diagnosedDate: this.rng.dateBetween(earliest, firstVisit),
      rank: i === 0 ? "primary" : "secondary",
      conditionKey: c.key,
    }));
  }

  private generateMedications(conditions: ConditionDefinition[], diagnoses: Diagnosis[]): Medication[] {
    const seen = new Set<string>();
    const meds: Medication[] = [];
    conditions.forEach((c, i) => {
      for (const m of c.medications) {
        if (seen.has(m.rxnorm)) continue;
        seen.add(m.rxnorm);
        const start = addDays(diagnoses[i].diagnosedDate, this.rng.int(0, 30));
        meds.push({
          ...m,
          startDate: daysBetween(start, this.referenceDate) >= 0 ? start : this.referenceDate,
          status: "active",
        });
      }
    });
    return meds;
  }

  private generateObservations(conditions: ConditionDefinition[], effectiveDate: string): Observation[] {
    const labs = loadLabs();
    const overrides = new Map<string, ValueRange>();
    for (const c of conditions) {
      for (const r of [...c.labs, ...c.vitals]) if (!overrides.has(r.lab)) overrides.set(r.lab, r);
    }
    const labKeys = [...overrides.keys()].filter((k) => labs.get(k)?.category === "laboratory");

    return [...VITAL_KEYS, ...labKeys].map((key) => {
      const def = labs.get(key);
      if (!def) throw new Error(`Unknown lab definition: ${key}`);
      const range = overrides.get(key) ?? def;
      const value = this.rng.float(range.min, range.max, def.decimals);
      return {
        observationId: `OBS-${this.rng.alphanumeric(10)}`,
        code: def.loinc,
        display: def.display,
        value,
        unit: def.unit,
        effectiveDate,
        category: def.category,
        interpretation: interpret(value, def.referenceLow, def.referenceHigh),
        referenceLow: def.referenceLow,
        referenceHigh: def.referenceHigh,
      };
    });
  }
}
