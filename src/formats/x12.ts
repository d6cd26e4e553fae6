/**
 * X12 005010 writers for enrollment (834), professional claims (837P),
 * remittance (835), eligibility (270/271) and service review (278), plus a
 * small parser for inspecting what was written.
 *
 * Delimiters: element `*`, component `:`, repetition `^`, segment `~`. Each
 * segment is written on its own line.
 */

import { config } from "../config";
import { compactDate, compactTimestamp } from "../dates";
import { InvalidRequestError } from "../errors";
import type { Gender } from "../data/loaders/reference";
import type { Adjustment, Member, ProfessionalClaim } from "../membersim/models";
import { getPlan } from "../membersim/plans";

export const ELEMENT_SEPARATOR = "*";
export const COMPONENT_SEPARATOR = ":";
export const REPETITION_SEPARATOR = "^";
export const SEGMENT_TERMINATOR = "~";

export interface X12Options {
  senderId?: string;
  receiverId?: string;
  /** Interchange and group control number; the transaction set is always 0001. */
  controlNumber?: number;
  usage?: "T" | "P";
  timestamp?: Date;
}

interface Envelope {
  senderId: string;
  receiverId: string;
  controlNumber: number;
  usage: "T" | "P";
  date: string;
  time: string;
}

type Segment = Array<string | number | undefined>;

interface TransactionSpec {
  functionalId: string;
  transactionSet: string;
  version: string;
}

const TRANSACTIONS = {
  "834": { functionalId: "BE", transactionSet: "834", version: "005010X220A1" },
  "837P": { functionalId: "HC", transactionSet: "837", version: "005010X222A1" },
  "835": { functionalId: "HP", transactionSet: "835", version: "005010X221A1" },
  "270": { functionalId: "HS", transactionSet: "270", version: "005010X279A1" },
  "271": { functionalId: "HB", transactionSet: "271", version: "005010X279A1" },
  "278": { functionalId: "HI", transactionSet: "278", version: "005010X217" },
} satisfies Record<string, TransactionSpec>;

export type X12Transaction = keyof typeof TRANSACTIONS;

/** ---------- Formatting ---------- */

export function formatAmount(amount: number): string {
  return String(Math.round(amount * 100) / 100);
}

const padId = (value: string): string => value.slice(0, 15).padEnd(15, " ");
const controlNumber = (n: number): string => String(n).padStart(9, "0");
const stripDots = (code: string): string => code.replace(/\./g, "");

function renderSegment(segment: Segment): string {
  const elements = segment.map((e) => (e === undefined ? "" : String(e)));
  while (elements.length > 1 && elements[elements.length - 1] === "") elements.pop();
  return elements.join(ELEMENT_SEPARATOR) + SEGMENT_TERMINATOR;
}

function resolveEnvelope(options: X12Options): Envelope {
  const controlNo = options.controlNumber ?? 1;
  if (!Number.isInteger(controlNo) || controlNo < 1 || controlNo > 999_999_999) {
    throw new InvalidRequestError(`Invalid control number ${controlNo}: expected 1-999999999`);
  }
  const { date, time } = compactTimestamp(options.timestamp ?? new Date());
  return {
    senderId: options.senderId ?? config.X12_SENDER_ID,
    receiverId: options.receiverId ?? config.X12_RECEIVER_ID,
    controlNumber: controlNo,
    usage: options.usage ?? config.X12_USAGE,
    date,
    time,
  };
}

function interchange(set: TransactionSpec, env: Envelope, body: Segment[]): string {
  const ctrl = controlNumber(env.controlNumber);
  const transaction: Segment[] = [["ST", set.transactionSet, "0001", set.version], ...body];
  transaction.push(["SE", transaction.length + 1, "0001"]);

  const isa: Segment = [
    "ISA",
    "00",
    " ".repeat(10),
    "00",
    " ".repeat(10),
    "ZZ",
    padId(env.senderId),
    "ZZ",
    padId(env.receiverId),
    env.date.slice(2),
    env.time,
    REPETITION_SEPARATOR,
    "00501",
    ctrl,
    "0",
    env.usage,
    COMPONENT_SEPARATOR,
  ];
  const segments: Segment[] = [
    isa,
    ["GS", set.functionalId, env.senderId, env.receiverId, env.date, env.time, env.controlNumber, "X", set.version],
    ...transaction,
    ["GE", 1, env.controlNumber],
    ["IEA", 1, ctrl],
  ];
  return segments.map(renderSegment).join("\n") + "\n";
}

function requireNonEmpty<T>(items: T[], what: string): void {
  if (items.length === 0) throw new InvalidRequestError(`At least one ${what} is required`);
}

function personName(qualifier: string, last: string, first: string, idQualifier: string, id: string): Segment {
  return ["NM1", qualifier, "1", last, first, undefined, undefined, undefined, idQualifier, id];
}

function orgName(qualifier: string, name: string, idQualifier: string, id: string): Segment {
  return ["NM1", qualifier, "2", name, undefined, undefined, undefined, undefined, idQualifier, id];
}

/** ---------- 834 Benefit Enrollment ---------- */

const INS_RELATIONSHIP = { self: "18", spouse: "01", child: "19" } as const;

export function generate834(members: Member[], options: X12Options = {}): string {
  requireNonEmpty(members, "member");
  const env = resolveEnvelope(options);
  const groupIds = new Set(members.map((m) => m.groupId));
  const body: Segment[] = [
    ["BGN", "00", `ENR${controlNumber(env.controlNumber)}`, env.date, env.time, undefined, undefined, undefined, "2"],
    ["REF", "38", groupIds.size === 1 ? members[0].groupId : "MULTIPLE"],
    ["N1", "P5", env.senderId, "FI", env.senderId],
    ["N1", "IN", env.receiverId, "FI", env.receiverId],
  ];

  for (const m of members) {
    const maintenance = m.status === "active" ? "021" : "024";
    const d = m.demographics;
    body.push(
      ["INS", m.relationship === "self" ? "Y" : "N", INS_RELATIONSHIP[m.relationship], maintenance, "20", "A"],
      ["REF", "0F", m.subscriberId],
      ["REF", "1L", m.groupId],
      ["DTP", "356", "D8", compactDate(m.coverageStart)],
    );
    if (m.coverageEnd) body.push(["DTP", "357", "D8", compactDate(m.coverageEnd)]);
    body.push(
      personName("IL", d.lastName, d.firstName, "ZZ", m.memberId),
      ["N3", d.address.line],
      ["N4", d.address.city, d.address.state, d.address.postalCode],
      ["DMG", "D8", compactDate(d.dateOfBirth), d.gender],
      ["HD", maintenance, undefined, "HLT", m.planCode, "IND"],
      ["DTP", "348", "D8", compactDate(m.coverageStart)],
    );
  }

  return interchange(TRANSACTIONS["834"], env, body);
}

/** ---------- 837P Professional Claim ---------- */

const PAT_RELATIONSHIP = { spouse: "01", child: "19" } as const;

export function generate837p(claims: ProfessionalClaim[], options: X12Options = {}): string {
  requireNonEmpty(claims, "claim");
  const env = resolveEnvelope(options);
  const body: Segment[] = [
    ["BHT", "0019", "00", `CLM${controlNumber(env.controlNumber)}`, env.date, env.time, "CH"],
    orgName("41", env.senderId, "46", env.senderId),
    orgName("40", env.receiverId, "46", env.receiverId),
  ];

  let hl = 0;
  for (const c of claims) {
    const provider = ++hl;
    body.push(["HL", provider, undefined, "20", "1"], orgName("85", c.providerName, "XX", c.providerNpi));
    body.push(["PRV", "BI", "PXC", c.providerTaxonomy]);

    const subscriber = ++hl;
    const self = c.relationship === "self";
    body.push(["HL", subscriber, provider, "22", self ? "0" : "1"]);
    body.push(["SBR", "P", self ? "18" : undefined, c.groupId, undefined, undefined, undefined, undefined, undefined, "CI"]);
    if (self) {
      body.push(
        personName("IL", c.patient.lastName, c.patient.firstName, "MI", c.memberId),
        ["DMG", "D8", compactDate(c.patient.dateOfBirth), c.patient.gender],
      );
    } else {
      body.push(["NM1", "IL", "1", c.patient.lastName, undefined, undefined, undefined, undefined, "MI", c.subscriberId]);
    }
    body.push(orgName("PR", env.receiverId, "PI", c.planCode));

    if (c.relationship !== "self") {
      body.push(
        ["HL", ++hl, subscriber, "23", "0"],
        ["PAT", PAT_RELATIONSHIP[c.relationship]],
        ["NM1", "QC", "1", c.patient.lastName, c.patient.firstName],
        ["DMG", "D8", compactDate(c.patient.dateOfBirth), c.patient.gender],
      );
    }

    const facility = [c.placeOfService, "B", "1"].join(COMPONENT_SEPARATOR);
    body.push(["CLM", c.claimId, formatAmount(c.totalCharge), undefined, undefined, facility, "Y", "A", "Y", "Y"]);
    body.push([
      "HI",
      ...c.diagnosisCodes.map((code, i) => `${i === 0 ? "ABK" : "ABF"}${COMPONENT_SEPARATOR}${stripDots(code)}`),
    ]);
    for (const line of c.lines) {
      body.push(
        ["LX", line.lineNumber],
        [
          "SV1",
          `HC${COMPONENT_SEPARATOR}${line.procedureCode}`,
          formatAmount(line.charge),
          "UN",
          line.units,
          undefined,
          undefined,
          "1",
        ],
        ["DTP", "472", "D8", compactDate(c.serviceDate)],
      );
    }
  }

  return interchange(TRANSACTIONS["837P"], env, body);
}

/** ---------- 835 Remittance Advice ---------- */

const CLP_STATUS = { paid: "1", denied: "4" } as const;

function casSegments(adjustments: Adjustment[]): Segment[] {
  const groups = new Map<string, Adjustment[]>();
  for (const a of adjustments) {
    if (a.amount === 0) continue;
    const list = groups.get(a.group) ?? [];
    list.push(a);
    groups.set(a.group, list);
  }
  return [...groups.entries()].map(([group, list]): Segment => [
    "CAS",
    group,
    ...list.flatMap((a, i) => (i === 0 ? [a.reason, formatAmount(a.amount)] : [undefined, a.reason, formatAmount(a.amount)])),
  ]);
}

/** Pending claims are not finalized and are left out of the remittance. */
export function generate835(claims: ProfessionalClaim[], options: X12Options = {}): string {
  const finalized = claims.filter((c) => c.status !== "pending");
  requireNonEmpty(finalized, "finalized claim");
  const env = resolveEnvelope(options);
  const totalPaid = finalized.reduce((sum, c) => sum + Math.round(c.totalPaid * 100), 0) / 100;
  const payee = finalized[0];

  const body: Segment[] = [
    totalPaid > 0
      ? ["BPR", "I", formatAmount(totalPaid), "C", "CHK", ...Array<undefined>(11).fill(undefined), env.date]
      : ["BPR", "H", "0", "C", "NON", ...Array<undefined>(11).fill(undefined), env.date],
    ["TRN", "1", `EFT${controlNumber(env.controlNumber)}`, env.senderId],
    ["DTM", "405", env.date],
    ["N1", "PR", env.receiverId],
    ["N1", "PE", payee.providerName, "XX", payee.providerNpi],
    ["LX", "1"],
  ];

  for (const c of finalized) {
    body.push(
      [
        "CLP",
        c.claimId,
        CLP_STATUS[c.status === "paid" ? "paid" : "denied"],
        formatAmount(c.totalCharge),
        formatAmount(c.totalPaid),
        formatAmount(c.patientResponsibility.total),
        "12",
        c.claimId,
        c.placeOfService,
      ],
      personName("QC", c.patient.lastName, c.patient.firstName, "MI", c.memberId),
      ["DTM", "232", compactDate(c.serviceDate)],
    );
    for (const line of c.lines) {
      body.push(
        [
          "SVC",
          `HC${COMPONENT_SEPARATOR}${line.procedureCode}`,
          formatAmount(line.charge),
          formatAmount(line.paid),
          undefined,
          line.units,
        ],
        ["DTM", "472", compactDate(c.serviceDate)],
        ...casSegments(line.adjustments),
      );
    }
  }

  return interchange(TRANSACTIONS["835"], env, body);
}

/** ---------- 270/271 Eligibility ---------- */

function eligibilityHeader(member: Member, env: Envelope, purpose: "13" | "11"): Segment[] {
  const d = member.demographics;
  return [
    ["BHT", "0022", purpose, `ELG${controlNumber(env.controlNumber)}`, env.date, env.time],
    ["HL", "1", undefined, "20", "1"],
    orgName("PR", env.receiverId, "PI", member.planCode),
    ["HL", "2", "1", "21", "1"],
    orgName("1P", env.senderId, "46", env.senderId),
    ["HL", "3", "2", "22", "0"],
    ["TRN", purpose === "13" ? "1" : "2", `ELG${controlNumber(env.controlNumber)}`, env.senderId],
    personName("IL", d.lastName, d.firstName, "MI", member.memberId),
    ["DMG", "D8", compactDate(d.dateOfBirth), d.gender],
  ];
}

export function generate270(member: Member, options: X12Options = {}): string {
  const env = resolveEnvelope(options);
  const body = eligibilityHeader(member, env, "13");
  body.push(["DTP", "291", "D8", env.date], ["EQ", "30"]);
  return interchange(TRANSACTIONS["270"], env, body);
}

export interface EligibilityResponseOptions extends X12Options {
  includeBenefits?: boolean;
}

export function generate271(member: Member, options: EligibilityResponseOptions = {}): string {
  const env = resolveEnvelope(options);
  const body = eligibilityHeader(member, env, "11");
  body.push(["DTP", "346", "D8", compactDate(member.coverageStart)]);
  if (member.coverageEnd) body.push(["DTP", "347", "D8", compactDate(member.coverageEnd)]);

  if (member.status !== "active") {
    body.push(["EB", "6", "IND", "30"]);
    return interchange(TRANSACTIONS["271"], env, body);
  }

  body.push(["EB", "1", "IND", "30", undefined, member.planCode]);
  if (options.includeBenefits) {
    const plan = getPlan(member.planCode);
    const { deductible, oop } = member.accumulators;
    const remaining = (a: { used: number; limit: number }): string =>
      formatAmount(Math.max(0, Math.round((a.limit - a.used) * 100) / 100));
    body.push(
      ["EB", "C", "IND", "30", undefined, undefined, "23", formatAmount(deductible.limit)],
      ["EB", "C", "IND", "30", undefined, undefined, "29", remaining(deductible)],
      ["EB", "G", "IND", "30", undefined, undefined, "23", formatAmount(oop.limit)],
      ["EB", "G", "IND", "30", undefined, undefined, "29", remaining(oop)],
    );
    if (plan.copayPcp > 0) body.push(["EB", "B", "IND", "98", undefined, undefined, "27", formatAmount(plan.copayPcp)]);
    if (plan.copayEr > 0) body.push(["EB", "B", "IND", "86", undefined, undefined, "27", formatAmount(plan.copayEr)]);
    body.push(["EB", "A", "IND", "30", undefined, undefined, undefined, undefined, formatAmount(plan.coinsurance / 100)]);
  }

  return interchange(TRANSACTIONS["271"], env, body);
}

/** ---------- 278 Services Review ---------- */

export interface ServiceReviewRequest {
  requestId: string;
  member: {
    memberId: string;
    firstName: string;
    lastName: string;
    dateOfBirth: string;
    gender: Gender;
  };
  providerNpi: string;
  providerName: string;
  diagnoses: string[];
  procedureCode: string;
  serviceDate: string;
  units?: number;
}

export function generate278(request: ServiceReviewRequest, options: X12Options = {}): string {
  requireNonEmpty(request.diagnoses, "diagnosis");
  const env = resolveEnvelope(options);
  const m = request.member;
  const body: Segment[] = [
    ["BHT", "0007", "13", request.requestId, env.date, env.time],
    ["HL", "1", undefined, "20", "1"],
    orgName("X3", env.receiverId, "PI", env.receiverId),
    ["HL", "2", "1", "21", "1"],
    orgName("1P", request.providerName, "XX", request.providerNpi),
    ["HL", "3", "2", "22", "1"],
    personName("IL", m.lastName, m.firstName, "MI", m.memberId),
    ["DMG", "D8", compactDate(m.dateOfBirth), m.gender],
    ["HL", "4", "3", "EV", "0"],
    ["TRN", "1", request.requestId, env.senderId],
    ["UM", "HS", "I", "1"],
    ["DTP", "472", "D8", compactDate(request.serviceDate)],
    ["HI", ...request.diagnoses.map((code, i) => `${i === 0 ? "ABK" : "ABF"}${COMPONENT_SEPARATOR}${stripDots(code)}`)],
    ["SV1", `HC${COMPONENT_SEPARATOR}${request.procedureCode}`, "0", "UN", request.units ?? 1],
  ];
  return interchange(TRANSACTIONS["278"], env, body);
}

/** ---------- Parsing ---------- */

/** A parsed segment: element 0 is the segment id. */
export type X12Segment = string[];

export function parseX12(text: string): X12Segment[] {
  const trimmed = text.replace(/^\s+/, "");
  if (!trimmed.startsWith("ISA") || trimmed.length < 106) {
    throw new InvalidRequestError("X12 interchange must start with a 106 character ISA segment");
  }
  const elementSep = trimmed[3];
  const terminator = trimmed[105];
  return trimmed
    .split(terminator)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => s.split(elementSep));
}

export function segmentsWithId(segments: X12Segment[], id: string): X12Segment[] {
  return segments.filter((s) => s[0] === id);
}

/** Envelope consistency problems; empty when the interchange is well formed. */
export function validateEnvelope(segments: X12Segment[]): string[] {
  const problems: string[] = [];
  const isa = segments[0];
  const iea = segments[segments.length - 1];
  if (isa?.[0] !== "ISA") problems.push("First segment is not ISA");
  if (iea?.[0] !== "IEA") problems.push("Last segment is not IEA");
  if (isa && iea && isa[13] !== iea[2]) problems.push(`IEA02 ${iea[2]} does not match ISA13 ${isa[13]}`);

  const gs = segmentsWithId(segments, "GS")[0];
  const ge = segmentsWithId(segments, "GE")[0];
  if (gs && ge && gs[6] !== ge[2]) problems.push(`GE02 ${ge[2]} does not match GS06 ${gs[6]}`);

  const st = segments.findIndex((s) => s[0] === "ST");
  const se = segments.findIndex((s) => s[0] === "SE");
  if (st < 0 || se < st) {
    problems.push("Missing ST/SE pair");
  } else if (Number(segments[se][1]) !== se - st + 1) {
    problems.push(`SE01 ${segments[se][1]} does not match segment count ${se - st + 1}`);
  }
  return problems;
}
