/**
 * Health plan member generator: subscribers, families, claims and whole
 * populations, all reproducible from a seed.
 */

import { config, referenceDate as defaultReferenceDate } from "../config";
import { addDays, addMonths, addYears, daysBetween, endOfMonth, firstOfMonth, parseIsoDate } from "../dates";
import { InvalidRequestError } from "../errors";
import { createLogger } from "../logger";
import { SeededRandom } from "../random";
import { generatePerson, validateAgeRange, type AgeRange, type Person } from "../data/demographics";
import { loadConditions, type Gender, type Plan } from "../data/loaders/reference";
import { validateCount } from "../patientsim/generator";
import { adjudicateClaim, draftClaim } from "./claims";
import type { Accumulators, Member, MemberStatus, ProfessionalClaim, Relationship } from "./models";
import { getPlan, listPlans } from "./plans";

const log = createLogger("membersim");

const DEFAULT_AGE_RANGE: AgeRange = [18, 64];
const SUBSCRIBER_AGE_RANGE: AgeRange = [26, 64];
const MAX_CHILD_AGE = 25;
const MAX_CLAIMS_PER_MEMBER = 1000;

export type DateRange = [string, string];

export interface MemberGeneratorOptions {
  seed?: number;
  referenceDate?: string;
}

export interface MemberConstraints {
  planCode?: string;
  ageRange?: AgeRange;
  status?: MemberStatus;
  gender?: Gender;
  groupId?: string;
}

export interface FamilyOptions {
  planCode?: string;
  status?: MemberStatus;
  dependentConfig?: { spouse?: boolean; children?: number };
}

export interface MemberWithClaimsOptions extends MemberConstraints {
  claimCount: number;
  dateRange?: DateRange;
}

export interface PopulationOptions {
  count: number;
  planCode?: string;
  withClaims?: boolean;
  claimsPerMember?: [number, number];
  dateRange?: DateRange;
}

interface Enrollment {
  subscriberId: string;
  planCode: string;
  groupId: string;
  status: MemberStatus;
  coverageStart: string;
  coverageEnd: string | null;
}

export class MemberGenerator {
  readonly seed: number;
  readonly referenceDate: string;
  private readonly rng: SeededRandom;
  private readonly subscriberIds = new Set<string>();
  private readonly claimIds = new Set<string>();

  constructor(options: MemberGeneratorOptions = {}) {
    this.rng = new SeededRandom(options.seed ?? config.SEED);
    this.seed = this.rng.seed;
    this.referenceDate = options.referenceDate ?? defaultReferenceDate();
  }

  listPlans(): Plan[] {
    return listPlans();
  }

  generateMember(constraints: MemberConstraints = {}): Member {
    const ageRange = validateAgeRange(constraints.ageRange, DEFAULT_AGE_RANGE);
    const enrollment = this.enroll(constraints.planCode, constraints.status, constraints.groupId);
    const person = generatePerson(this.rng, this.referenceDate, { ageRange, gender: constraints.gender });
    return this.buildMember(enrollment, person, "self", 1);
  }

  generateMemberBatch(count: number, constraints: MemberConstraints = {}): Member[] {
    validateCount(count);
    return Array.from({ length: count }, () => this.generateMember(constraints));
  }

  /** Subscriber first, then spouse, then children; all share the subscriber id and coverage. */
  generateFamily(options: FamilyOptions = {}): Member[] {
    const spouse = options.dependentConfig?.spouse ?? true;
    const children = options.dependentConfig?.children ?? 2;
    if (!Number.isInteger(children) || children < 0 || children > 10) {
      throw new InvalidRequestError(`Invalid number of children: ${children} (expected 0-10)`);
    }

    const enrollment = this.enroll(options.planCode, options.status);
    const head = generatePerson(this.rng, this.referenceDate, { ageRange: SUBSCRIBER_AGE_RANGE });
    const shared = { lastName: head.lastName, address: head.address };
    const family = [this.buildMember(enrollment, head, "self", 1)];

    if (spouse) {
      const partner = generatePerson(this.rng, this.referenceDate, {
        ...shared,
        ageRange: [Math.max(18, head.age - 8), Math.min(75, head.age + 8)],
      });
      family.push(this.buildMember(enrollment, partner, "spouse", family.length + 1));
    }
    const maxChildAge = Math.min(MAX_CHILD_AGE, head.age - 18);
    for (let i = 0; i < children; i++) {
      const child = generatePerson(this.rng, this.referenceDate, { ...shared, ageRange: [0, maxChildAge] });
      family.push(this.buildMember(enrollment, child, "child", family.length + 1));
    }

    log.debug(`generated family ${enrollment.subscriberId} with ${family.length} members on ${enrollment.planCode}`);
    return family;
  }

  generateMemberWithClaims(options: MemberWithClaimsOptions): Member {
    const { claimCount, dateRange, ...constraints } = options;
    const member = this.generateMember(constraints);
    return this.attachClaims(member, claimCount, dateRange);
  }

  generatePopulation(options: PopulationOptions): Member[] {
    validateCount(options.count);
    const [minClaims, maxClaims] = options.claimsPerMember ?? [1, 5];
    if (!Number.isInteger(minClaims) || !Number.isInteger(maxClaims) || minClaims < 0 || minClaims > maxClaims) {
      throw new InvalidRequestError(`Invalid claims per member range [${minClaims}, ${maxClaims}]`);
    }

    const members: Member[] = [];
    for (let i = 0; i < options.count; i++) {
      const member = this.generateMember({ planCode: options.planCode });
      members.push(
        options.withClaims ? this.attachClaims(member, this.rng.int(minClaims, maxClaims), options.dateRange) : member,
      );
    }
    log.info(`generated population of ${members.length} members${options.withClaims ? " with claims" : ""}`);
    return members;
  }

  /** Drafts and adjudicates claims in service-date order, threading the accumulators. */
  attachClaims(member: Member, claimCount: number, dateRange?: DateRange): Member {
    if (!Number.isInteger(claimCount) || claimCount < 0 || claimCount > MAX_CLAIMS_PER_MEMBER) {
      throw new InvalidRequestError(`Invalid claim count ${claimCount} (expected 0-${MAX_CLAIMS_PER_MEMBER})`);
    }
    const [start, end] = this.validateDateRange(dateRange);
    const plan = getPlan(member.planCode);
    const codes = [...loadConditions().values()].map((c) => c.code);
    const diagnosisCodes = this.rng.sample(codes, this.rng.int(1, 2));

    const dates = Array.from({ length: claimCount }, () => this.rng.dateBetween(start, end)).sort();
    let accumulators: Accumulators = member.accumulators;
    const claims: ProfessionalClaim[] = [];
    for (const serviceDate of dates) {
      const draft = draftClaim(this.rng, this.nextClaimId(), serviceDate, diagnosisCodes);
      const result = adjudicateClaim(draft, member, plan, accumulators);
      claims.push(result.claim);
      accumulators = result.accumulators;
    }
    return { ...member, accumulators, claims: [...member.claims, ...claims] };
  }

  private validateDateRange(range: DateRange | undefined): DateRange {
    if (range === undefined) return [addDays(addYears(this.referenceDate, -1), 1), this.referenceDate];
    const [start, end] = range;
    parseIsoDate(start);
    parseIsoDate(end);
    if (daysBetween(start, end) < 0) throw new InvalidRequestError(`Invalid date range: ${start} is after ${end}`);
    return [start, end];
  }

  private nextSubscriberId(): string {
    let id = `SUB${this.rng.digits(9)}`;
    while (this.subscriberIds.has(id)) id = `SUB${this.rng.digits(9)}`;
    this.subscriberIds.add(id);
    return id;
  }

  private nextClaimId(): string {
    let id = `CLM${this.rng.digits(10)}`;
    while (this.claimIds.has(id)) id = `CLM${this.rng.digits(10)}`;
    this.claimIds.add(id);
    return id;
  }

  private enroll(planCode: string | undefined, status: MemberStatus | undefined, groupId?: string): Enrollment {
    const plan = planCode === undefined ? this.rng.pick(listPlans()) : getPlan(planCode);
    const resolvedStatus =
      status ??
      this.rng.weighted<MemberStatus>([
        ["active", 0.9],
        ["termed", 0.1],
      ]);
    const coverageStart = firstOfMonth(
      this.rng.dateBetween(addYears(this.referenceDate, -3), addMonths(this.referenceDate, -2)),
    );
    const coverageEnd =
      resolvedStatus === "termed"
        ? endOfMonth(this.rng.dateBetween(addMonths(coverageStart, 1), addDays(this.referenceDate, -1)))
        : null;

    return {
      subscriberId: this.nextSubscriberId(),
      planCode: plan.code,
      groupId: groupId ?? `GRP${this.rng.digits(6)}`,
      status: resolvedStatus,
      coverageStart,
      coverageEnd,
    };
  }

  private accumulatorsFor(planCode: string): Accumulators {
    const plan = getPlan(planCode);
    const deductibleUsed = this.rng.float(0, plan.deductibleIndividual, 2);
    const oopUsed = this.rng.float(deductibleUsed, plan.oopMaxIndividual * 0.5, 2);
    return {
      deductible: { used: deductibleUsed, limit: plan.deductibleIndividual },
      oop: { used: Math.min(oopUsed, plan.oopMaxIndividual), limit: plan.oopMaxIndividual },
    };
  }

  private buildMember(enrollment: Enrollment, person: Person, relationship: Relationship, sequence: number): Member {
    const { subscriberId, planCode, groupId, status, coverageStart, coverageEnd } = enrollment;
    return {
      memberId: `${subscriberId}-${String(sequence).padStart(2, "0")}`,
      subscriberId,
      relationship,
      demographics: {
        firstName: person.firstName,
        lastName: person.lastName,
        fullName: `${person.firstName} ${person.lastName}`,
        dateOfBirth: person.dateOfBirth,
        age: person.age,
        gender: person.gender,
        address: person.address,
        phone: person.phone,
      },
      planCode,
      groupId,
      status,
      coverageStart,
      coverageEnd,
      accumulators: this.accumulatorsFor(planCode),
      claims: [],
    };
  }
}
