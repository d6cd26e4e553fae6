import { ageOn, addDays, addYears } from "../dates";
import { InvalidRequestError } from "../errors";
import type { SeededRandom } from "../random";
import { loadAddresses, loadFirstNames, loadLastNames, loadStreets, type Gender } from "./loaders/reference";

export type AgeRange = [number, number];

export interface Address {
  line: string;
  city: string;
  state: string;
  postalCode: string;
}

export interface Person {
  firstName: string;
  lastName: string;
  gender: Gender;
  dateOfBirth: string;
  age: number;
  address: Address;
  phone: string;
}

export interface PersonConstraints {
  ageRange: AgeRange;
  gender?: Gender;
  lastName?: string;
  address?: Address;
}

export const MAX_AGE = 110;

export function validateAgeRange(range: readonly number[] | undefined, fallback: AgeRange): AgeRange {
  if (range === undefined) return fallback;
  const [min, max] = range;
  if (
    range.length !== 2 ||
    !Number.isInteger(min) ||
    !Number.isInteger(max) ||
    min < 0 ||
    max > MAX_AGE ||
    min > max
  ) {
    throw new InvalidRequestError(`Invalid age range [${range.join(", ")}]: expected 0 <= min <= max <= ${MAX_AGE}`);
  }
  return [min, max];
}

export function parseGender(value: string | undefined): Gender | undefined {
  if (value === undefined) return undefined;
  const g = value.toUpperCase();
  if (g === "M" || g === "F") return g;
  throw new InvalidRequestError(`Invalid gender: ${value} (expected M or F)`);
}

/** Date of birth that makes the person exactly `age` on `referenceDate`. */
export function dateOfBirthForAge(rng: SeededRandom, age: number, referenceDate: string): string {
  const latest = addYears(referenceDate, -age);
  const earliest = addDays(addYears(referenceDate, -(age + 1)), 1);
  return rng.dateBetween(earliest, latest);
}

export function generateAddress(rng: SeededRandom): { address: Address; areaCode: string } {
  const place = rng.pick(loadAddresses());
  return {
    address: {
      line: `${rng.int(100, 9999)} ${rng.pick(loadStreets())}`,
      city: place.city,
      state: place.state,
      postalCode: place.postalCode,
    },
    areaCode: place.areaCode,
  };
}

export function generatePerson(rng: SeededRandom, referenceDate: string, constraints: PersonConstraints): Person {
  const gender = constraints.gender ?? rng.pick<Gender>(["M", "F"]);
  const firstName = rng.pick(loadFirstNames().filter((n) => n.gender === gender)).name;
  const lastName = constraints.lastName ?? rng.pick(loadLastNames());
  const age = rng.int(constraints.ageRange[0], constraints.ageRange[1]);
  const dateOfBirth = dateOfBirthForAge(rng, age, referenceDate);
  const generated = generateAddress(rng);

  return {
    firstName,
    lastName,
    gender,
    dateOfBirth,
    age: ageOn(dateOfBirth, referenceDate),
    address: constraints.address ?? generated.address,
    // 555-01xx is reserved for fictional use
    phone: `${generated.areaCode}-555-01${rng.digits(2)}`,
  };
}
