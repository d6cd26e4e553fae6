import { config, referenceDate as defaultReferenceDate } from "../config";
import { InvalidRequestError } from "../errors";
import { SeededRandom } from "../random";
import { generatePerson, validateAgeRange, type AgeRange } from "../data/demographics";
import type { Gender } from "../data/loaders/reference";

export interface RxMember {
  memberId: string;
  cardholderId: string;
  personCode: string;
  bin: string;
  pcn: string;
  groupNumber: string;
  firstName: string;
  lastName: string;
  dateOfBirth: string;
  gender: Gender;
  deductibleMet: number;
  deductibleLimit: number;
  oopMet: number;
  oopLimit: number;
}

export interface RxMemberConstraints {
  bin: string;
  pcn: string;
  groupNumber: string;
  ageRange?: AgeRange;
  gender?: Gender;
}

export interface AccumulatorDelta {
  deductible: number;
  oop: number;
}

const DEDUCTIBLE_LIMITS = [0, 100, 250, 500];
const OOP_LIMITS = [2000, 3500, 5000];

/** BIN is 6 digits, PCN up to 10 alphanumerics, group number up to 15 characters. */
export function validateRoutingIdentifiers(bin: string, pcn: string, groupNumber: string): void {
  if (!/^\d{6}$/.test(bin)) throw new InvalidRequestError(`Invalid BIN ${bin}: expected 6 digits`);
  if (!/^[A-Za-z0-9]{1,10}$/.test(pcn)) throw new InvalidRequestError(`Invalid PCN ${pcn}: expected 1-10 alphanumerics`);
  if (groupNumber.length < 1 || groupNumber.length > 15) {
    throw new InvalidRequestError(`Invalid group number ${groupNumber}: expected 1-15 characters`);
  }
}

export class RxMemberGenerator {
  readonly seed: number;
  readonly referenceDate: string;
  private readonly rng: SeededRandom;
  private readonly issued = new Set<string>();

  constructor(options: { seed?: number; referenceDate?: string } = {}) {
    this.rng = new SeededRandom(options.seed ?? config.SEED);
    this.seed = this.rng.seed;
    this.referenceDate = options.referenceDate ?? defaultReferenceDate();
  }

  generate(constraints: RxMemberConstraints): RxMember {
    const { bin, pcn, groupNumber } = constraints;
    validateRoutingIdentifiers(bin, pcn, groupNumber);
    const ageRange = validateAgeRange(constraints.ageRange, [18, 85]);

    let memberId = `RXM${this.rng.digits(9)}`;
    while (this.issued.has(memberId)) memberId = `RXM${this.rng.digits(9)}`;
    this.issued.add(memberId);

    const person = generatePerson(this.rng, this.referenceDate, { ageRange, gender: constraints.gender });
    const deductibleLimit = this.rng.pick(DEDUCTIBLE_LIMITS);
    const oopLimit = this.rng.pick(OOP_LIMITS);
    const deductibleMet = this.rng.float(0, deductibleLimit, 2);
    const oopMet = this.rng.float(deductibleMet, oopLimit * 0.4, 2);

    return {
      memberId,
      cardholderId: `ZX${this.rng.digits(9)}`,
      personCode: "01",
      bin,
      pcn,
      groupNumber,
      firstName: person.firstName,
      lastName: person.lastName,
      dateOfBirth: person.dateOfBirth,
      gender: person.gender,
      deductibleMet,
      deductibleLimit,
      oopMet,
      oopLimit,
    };
  }
}

/** Applies a (possibly negative) accumulator delta, clamped to [0, limit]. */
export function applyAccumulatorDelta(member: RxMember, delta: AccumulatorDelta): RxMember {
  const clamp = (value: number, limit: number) => Math.min(limit, Math.max(0, Math.round(value * 100) / 100));
  return {
    ...member,
    deductibleMet: clamp(member.deductibleMet + delta.deductible, member.deductibleLimit),
    oopMet: clamp(member.oopMet + delta.oop, member.oopLimit),
  };
}
