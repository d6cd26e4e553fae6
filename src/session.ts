import { getSnapshot, types, type Instance, type SnapshotIn } from "mobx-state-tree";
import { createLogger } from "./logger";
import { AdjudicationEngine } from "./rxmembersim/adjudication";
import type { ClaimRecord, ClaimResponse, PharmacyClaim } from "./rxmembersim/claim";
import { FormularyGenerator } from "./rxmembersim/formulary";
import type { AccumulatorDelta, RxMember } from "./rxmembersim/member";
import {
  evaluatePriorAuthorization,
  toAuthorization,
  type PriorAuthDecision,
  type PriorAuthorization,
  type PriorAuthRequest,
} from "./rxmembersim/priorAuth";
import { errorMessage, NotFoundError } from "./errors";

/**
 * Pharmacy session: the members, claim ledger and prior authorizations a
 * pharmacy benefit manager keeps between transactions.
 *
 * State lives in a mobx-state-tree so the whole session can be snapshotted
 * and restored. Listeners registered on `hooks` are notified after each
 * state change.
 */

const log = createLogger("session");

/** ---------- Hook Types ---------- */

export interface HookEventBase {
  type: string;
  timestamp: string;
  sessionId: string;
}

export interface MemberRegisteredEvent extends HookEventBase {
  type: "member:registered";
  memberId: string;
  isNew: boolean;
}

export interface ClaimAdjudicatedEvent extends HookEventBase {
  type: "claim:adjudicated";
  claimId: string;
  memberId: string;
  transactionCode: PharmacyClaim["transactionCode"];
  status: ClaimResponse["status"];
  rejectCode?: string;
}

export interface ClaimReversedEvent extends HookEventBase {
  type: "claim:reversed";
  claimId: string;
  reversedClaimId: string;
}

export interface AccumulatorUpdatedEvent extends HookEventBase {
  type: "accumulator:updated";
  memberId: string;
  delta: AccumulatorDelta;
  deductibleMet: number;
  oopMet: number;
}

export interface PriorAuthDecidedEvent extends HookEventBase {
  type: "priorAuth:decided";
  requestId: string;
  memberId: string;
  status: PriorAuthDecision["status"];
  authorizationNumber?: string;
}

export type HookEvent =
  | MemberRegisteredEvent
  | ClaimAdjudicatedEvent
  | ClaimReversedEvent
  | AccumulatorUpdatedEvent
  | PriorAuthDecidedEvent;

export type HookEventType = HookEvent["type"];

export interface HookEventMap {
  "member:registered": MemberRegisteredEvent;
  "claim:adjudicated": ClaimAdjudicatedEvent;
  "claim:reversed": ClaimReversedEvent;
  "accumulator:updated": AccumulatorUpdatedEvent;
  "priorAuth:decided": PriorAuthDecidedEvent;
}

export type HookListener<T extends HookEvent = HookEvent> = (event: T) => void;

export type Unsubscribe = () => void;

/** ---------- Hook Registry ---------- */

function isEventOf<K extends HookEventType>(event: HookEvent, type: K): event is HookEventMap[K] {
  return event.type === type;
}

const HookRegistry = types
  .model("HookRegistry", {})
  .volatile(() => ({
    listeners: new Map<HookEventType, Set<HookListener<HookEvent>>>(),
    wildcardListeners: new Set<HookListener<HookEvent>>(),
  }))
  .views((self) => ({
    get listenerCount(): number {
      let count = self.wildcardListeners.size;
      for (const set of self.listeners.values()) count += set.size;
      return count;
    },
  }))
  .actions((self) => ({
    on<K extends HookEventType>(eventType: K, listener: HookListener<HookEventMap[K]>): Unsubscribe {
      const typed: HookListener<HookEvent> = (event) => {
        if (isEventOf(event, eventType)) listener(event);
      };
      const set = self.listeners.get(eventType) ?? new Set();
      set.add(typed);
      self.listeners.set(eventType, set);

      return () => {
        const current = self.listeners.get(eventType);
        if (current) {
          current.delete(typed);
          if (current.size === 0) self.listeners.delete(eventType);
        }
      };
    },

    onAny(listener: HookListener<HookEvent>): Unsubscribe {
      self.wildcardListeners.add(listener);
      return () => {
        self.wildcardListeners.delete(listener);
      };
    },

    off(eventType: HookEventType): void {
      self.listeners.delete(eventType);
    },

    offAll(): void {
      self.listeners.clear();
      self.wildcardListeners.clear();
    },

    _emit(event: HookEvent): void {
      for (const listener of self.listeners.get(event.type) ?? []) {
        try {
          listener(event);
        } catch (e) {
          log.error(`Error in listener for ${event.type}: ${errorMessage(e)}`);
        }
      }

      for (const listener of self.wildcardListeners) {
        try {
          listener(event);
        } catch (e) {
          log.error(`Error in wildcard listener for ${event.type}: ${errorMessage(e)}`);
        }
      }
    },
  }))
  .actions((self) => ({
    once<K extends HookEventType>(eventType: K, listener: HookListener<HookEventMap[K]>): Unsubscribe {
      const unsub = self.on(eventType, (event) => {
        unsub();
        listener(event);
      });
      return unsub;
    },
  }));

/** ---------- State ---------- */

const Gender = types.enumeration<RxMember["gender"]>("Gender", ["M", "F"]);

const Money = types.refinement("Money", types.number, (v) => Number.isFinite(v) && v >= 0);

export const RxMemberModel = types
  .model("RxMember", {
    memberId: types.identifier,
    cardholderId: types.string,
    personCode: types.string,
    bin: types.string,
    pcn: types.string,
    groupNumber: types.string,
    firstName: types.string,
    lastName: types.string,
    dateOfBirth: types.string,
    gender: Gender,
    deductibleMet: Money,
    deductibleLimit: Money,
    oopMet: Money,
    oopLimit: Money,
  })
  .views((self) => ({
    get remainingDeductible(): number {
      return Math.max(0, Math.round((self.deductibleLimit - self.deductibleMet) * 100) / 100);
    },
    get remainingOop(): number {
      return Math.max(0, Math.round((self.oopLimit - self.oopMet) * 100) / 100);
    },
  }))
  .actions((self) => ({
    setAccumulators(deductibleMet: number, oopMet: number) {
      self.deductibleMet = deductibleMet;
      self.oopMet = oopMet;
    },
  }));

const ClaimLedgerEntry = types
  .model("ClaimLedgerEntry", {
    sequence: types.number,
    claim: types.frozen<PharmacyClaim>(),
    response: types.frozen<ClaimResponse>(),
    reversed: types.optional(types.boolean, false),
    recordedAt: types.optional(types.string, () => new Date().toISOString()),
  })
  .actions((self) => ({
    markReversed() {
      self.reversed = true;
    },
  }));

export const PharmacySession = types
  .model("PharmacySession", {
    id: types.optional(types.identifier, "default"),
    formularyId: types.optional(types.string, "STD-COMMERCIAL"),
    members: types.optional(types.map(RxMemberModel), {}),
    claims: types.optional(types.array(ClaimLedgerEntry), []),
    priorAuthorizations: types.optional(types.array(types.frozen<PriorAuthorization>()), []),
    priorAuthDecisions: types.optional(types.array(types.frozen<PriorAuthDecision>()), []),
    hooks: types.optional(HookRegistry, {}),
    createdAt: types.optional(types.string, () => new Date().toISOString()),
    updatedAt: types.optional(types.string, () => new Date().toISOString()),
  })
  .volatile((): { engine: AdjudicationEngine | undefined } => ({ engine: undefined }))
  .views((self) => ({
    get adjudicationEngine(): AdjudicationEngine {
      if (!self.engine) throw new Error(`Session ${self.id} has no adjudication engine`);
      return self.engine;
    },

    getMember(memberId: string): RxMember | undefined {
      const m = self.members.get(memberId);
      return m ? getSnapshot(m) : undefined;
    },

    get memberList(): RxMember[] {
      return Array.from(self.members.values()).map((m) => getSnapshot(m));
    },

    /** The ledger in the shape claim adjudication consumes. */
    get claimHistory(): ClaimRecord[] {
      return self.claims.map((e) => ({ claim: e.claim, response: e.response, reversed: e.reversed }));
    },

    /** Highest authorization sequence on the ledger; numbering continues from here. */
    get issuedAuthorizations(): number {
      return self.claims.reduce((highest, e) => {
        const auth = e.response.authorizationNumber;
        return auth && /^\d{12}$/.test(auth) ? Math.max(highest, Number(auth.slice(6))) : highest;
      }, 0);
    },

    claimsFor(memberId: string): ClaimRecord[] {
      return self.claims
        .filter((e) => e.claim.memberId === memberId)
        .map((e) => ({ claim: e.claim, response: e.response, reversed: e.reversed }));
    },
  }))
  .actions((self) => {
    const touch = () => {
      self.updatedAt = new Date().toISOString();
    };

    type EventWithoutMeta<T extends HookEvent> = Omit<T, "timestamp" | "sessionId">;

    const meta = () => ({ timestamp: new Date().toISOString(), sessionId: self.id });

    const emit = {
      memberRegistered: (e: EventWithoutMeta<MemberRegisteredEvent>) => self.hooks._emit({ ...e, ...meta() }),
      claimAdjudicated: (e: EventWithoutMeta<ClaimAdjudicatedEvent>) => self.hooks._emit({ ...e, ...meta() }),
      claimReversed: (e: EventWithoutMeta<ClaimReversedEvent>) => self.hooks._emit({ ...e, ...meta() }),
      accumulatorUpdated: (e: EventWithoutMeta<AccumulatorUpdatedEvent>) => self.hooks._emit({ ...e, ...meta() }),
      priorAuthDecided: (e: EventWithoutMeta<PriorAuthDecidedEvent>) => self.hooks._emit({ ...e, ...meta() }),
    };

    const requireMember = (memberId: string) => {
      const member = self.members.get(memberId);
      if (!member) throw new NotFoundError(`Member ${memberId} not found`);
      return member;
    };

    return {
      afterCreate() {
        const engine =
          self.engine ?? new AdjudicationEngine({ formulary: new FormularyGenerator().generate(self.formularyId) });
        engine.resumeAuthorizations(self.issuedAuthorizations);
        self.engine = engine;
      },

      /** Replaces the engine, e.g. to change the days-supply limit or DUR thresholds. */
      useEngine(engine: AdjudicationEngine) {
        engine.resumeAuthorizations(self.issuedAuthorizations);
        self.engine = engine;
      },

      registerMember(member: RxMember) {
        const isNew = !self.members.has(member.memberId);
        self.members.put({ ...member });
        touch();
        emit.memberRegistered({ type: "member:registered", memberId: member.memberId, isNew });
      },

      submitClaim(claim: PharmacyClaim): ClaimResponse {
        const member = requireMember(claim.memberId);
        const response = self.adjudicationEngine.adjudicate(claim, getSnapshot(member), {
          claimHistory: self.claimHistory,
          priorAuthorizations: self.priorAuthorizations.filter((a) => a.memberId === claim.memberId),
        });

        if (response.reversedClaimId) {
          const original = self.claims.find(
            (e) =>
              e.claim.claimId === response.reversedClaimId &&
              e.claim.memberId === claim.memberId &&
              e.response.status === "P" &&
              !e.reversed,
          );
          original?.markReversed();
        }

        self.claims.push({ sequence: self.claims.length + 1, claim, response });

        const delta = response.accumulatorDelta;
        if (delta.deductible !== 0 || delta.oop !== 0) {
          const clamp = (value: number, limit: number) => Math.min(limit, Math.max(0, Math.round(value * 100) / 100));
          member.setAccumulators(
            clamp(member.deductibleMet + delta.deductible, member.deductibleLimit),
            clamp(member.oopMet + delta.oop, member.oopLimit),
          );
        }
        touch();

        emit.claimAdjudicated({
          type: "claim:adjudicated",
          claimId: claim.claimId,
          memberId: claim.memberId,
          transactionCode: claim.transactionCode,
          status: response.status,
          rejectCode: response.rejectCode,
        });
        if (response.reversedClaimId) {
          emit.claimReversed({ type: "claim:reversed", claimId: claim.claimId, reversedClaimId: response.reversedClaimId });
        }
        if (delta.deductible !== 0 || delta.oop !== 0) {
          emit.accumulatorUpdated({
            type: "accumulator:updated",
            memberId: member.memberId,
            delta,
            deductibleMet: member.deductibleMet,
            oopMet: member.oopMet,
          });
        }
        return response;
      },

      requestPriorAuthorization(request: PriorAuthRequest): PriorAuthDecision {
        const formulary = self.adjudicationEngine.formulary;
        const decision = evaluatePriorAuthorization(request, formulary);
        const drug = formulary.getDrug(request.ndc);
        const authorization = drug ? toAuthorization(decision, drug) : null;
        if (authorization) self.priorAuthorizations.push(authorization);
        self.priorAuthDecisions.push(decision);
        touch();

        emit.priorAuthDecided({
          type: "priorAuth:decided",
          requestId: decision.requestId,
          memberId: decision.memberId,
          status: decision.status,
          authorizationNumber: decision.authorizationNumber,
        });
        return decision;
      },

      reset() {
        self.members.clear();
        self.claims.clear();
        self.priorAuthorizations.clear();
        self.priorAuthDecisions.clear();
        touch();
      },
    };
  });

export type PharmacySessionInstance = Instance<typeof PharmacySession>;
export type PharmacySessionSnapshot = SnapshotIn<typeof PharmacySession>;
export type HookRegistryInstance = Instance<typeof HookRegistry>;

export function createPharmacySession(snapshot: PharmacySessionSnapshot = {}): PharmacySessionInstance {
  return PharmacySession.create(snapshot);
}
