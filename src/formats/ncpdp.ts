/**
 * NCPDP Telecommunication Standard D.0 (subset): B1/B2/B3 request and
 * response encoding.
 *
 * A transmission is a fixed-width header followed by segments. Segments start
 * with the segment separator, fields with the field separator and a two
 * character field id; the group separator splits the header group from the
 * transaction group. Dollar amounts are signed overpunch with two implied
 * decimals, quantities carry three implied decimals.
 */

import { compactDate } from "../dates";
import type { ClaimResponse, PharmacyClaim } from "../rxmembersim/claim";
import type { DurClinicalSignificance } from "../rxmembersim/dur";
import type { RxMember } from "../rxmembersim/member";

export const SEGMENT_SEPARATOR = "\x1e";
export const GROUP_SEPARATOR = "\x1d";
export const FIELD_SEPARATOR = "\x1c";
export const VERSION = "D0";
const VENDOR_ID = "HEALTHSIM";

/** ---------- Overpunch ---------- */

const POSITIVE = "{ABCDEFGHI";
const NEGATIVE = "}JKLMNOPQR";

export function encodeOverpunch(amount: number): string {
  const c = Math.round(Math.abs(amount) * 100);
  const digits = String(c).padStart(3, "0");
  const last = Number(digits[digits.length - 1]);
  const table = amount < 0 && c !== 0 ? NEGATIVE : POSITIVE;
  return digits.slice(0, -1) + table[last];
}

export function decodeOverpunch(value: string): number {
  if (value.length === 0) throw new Error("Empty overpunch value");
  const lead = value.slice(0, -1);
  const signChar = value[value.length - 1];
  let sign = 1;
  let digit = POSITIVE.indexOf(signChar);
  if (digit < 0) {
    digit = NEGATIVE.indexOf(signChar);
    sign = -1;
  }
  if (digit < 0 || !/^\d*$/.test(lead)) throw new Error(`Invalid overpunch value: ${value}`);
  return (sign * Number(`${lead}${digit}`)) / 100;
}

/** ---------- Building blocks ---------- */

type FieldList = Array<[string, string]>;

function segment(id: string, fields: FieldList): string {
  return SEGMENT_SEPARATOR + FIELD_SEPARATOR + `AM${id}` + fields.map(([fid, v]) => FIELD_SEPARATOR + fid + v).join("");
}

const pad = (value: string, width: number): string => value.slice(0, width).padEnd(width, " ");
const quantity = (q: number): string => String(Math.round(q * 1000));

export function requestHeader(claim: PharmacyClaim): string {
  return [
    pad(claim.bin, 6),
    VERSION,
    claim.transactionCode,
    pad(claim.pcn, 10),
    "1",
    "01",
    pad(claim.pharmacyNpi, 15),
    compactDate(claim.serviceDate),
    pad(VENDOR_ID, 10),
  ].join("");
}

export function encodeClaimRequest(claim: PharmacyClaim, member?: RxMember): string {
  const header = [
    requestHeader(claim),
    segment("04", [
      ["C2", claim.cardholderId],
      ["C1", claim.groupNumber],
      ["C3", claim.personCode],
      ["C6", "1"],
    ]),
  ];
  if (member) {
    header.push(
      segment("01", [
        ["C4", compactDate(member.dateOfBirth)],
        ["C5", member.gender === "M" ? "1" : "2"],
        ["CA", member.firstName],
        ["CB", member.lastName],
      ]),
    );
  }

  const transaction = [
    segment("07", [
      ["EM", "1"],
      ["D2", claim.prescriptionNumber],
      ["E1", "03"],
      ["D7", claim.ndc],
      ["E7", quantity(claim.quantityDispensed)],
      ["D3", String(claim.fillNumber).padStart(2, "0")],
      ["D5", String(claim.daysSupply)],
      ["D6", "1"],
      ["D8", claim.dawCode],
    ]),
    segment("03", [
      ["EZ", "01"],
      ["DB", claim.prescriberNpi],
    ]),
  ];
  if (claim.transactionCode !== "B2") {
    transaction.push(
      segment("11", [
        ["D9", encodeOverpunch(claim.ingredientCostSubmitted)],
        ["DC", encodeOverpunch(claim.dispensingFeeSubmitted)],
        ["DX", encodeOverpunch(claim.patientPaidSubmitted)],
        ["DQ", encodeOverpunch(claim.usualCustomaryCharge)],
        ["DU", encodeOverpunch(claim.grossAmountDue)],
      ]),
    );
  }

  return header.join("") + GROUP_SEPARATOR + transaction.join("");
}

const CLINICAL_SIGNIFICANCE_CODES: Record<DurClinicalSignificance, string> = { major: "1", moderate: "2", minor: "3" };

export function encodeClaimResponse(response: ClaimResponse, claim: PharmacyClaim): string {
  const header = [
    VERSION,
    response.transactionCode,
    "1",
    "A",
    "01",
    pad(claim.pharmacyNpi, 15),
    compactDate(claim.serviceDate),
  ].join("");

  const status: FieldList = [["AN", response.status]];
  if (response.authorizationNumber) status.push(["F3", response.authorizationNumber]);
  if (response.rejects.length > 0) {
    status.push(["FA", String(response.rejects.length)]);
    for (const r of response.rejects) status.push(["FB", r.code]);
  }

  const transaction = [segment("21", status)];
  if (response.status === "P" || response.status === "D") {
    transaction.push(
      segment("23", [
        ["F5", encodeOverpunch(response.patientPay)],
        ["F6", encodeOverpunch(response.ingredientCostPaid)],
        ["F7", encodeOverpunch(response.dispensingFeePaid)],
        ["F9", encodeOverpunch(response.planPaid)],
        ["FH", encodeOverpunch(response.deductibleApplied)],
        ["FI", encodeOverpunch(response.copay)],
        ["4U", encodeOverpunch(response.coinsurance)],
      ]),
    );
  }
  if (response.durAlerts.length > 0) {
    transaction.push(
      segment(
        "24",
        response.durAlerts.flatMap((a): FieldList => [
          ["E4", a.alertType],
          ["FS", CLINICAL_SIGNIFICANCE_CODES[a.clinicalSignificance]],
          ["FY", a.message.slice(0, 30)],
        ]),
      ),
    );
  }

  return header + segment("20", [["F4", response.message.slice(0, 200)]]) + GROUP_SEPARATOR + transaction.join("");
}

/** ---------- Decoding ---------- */

export interface TelecomSegment {
  /** Segment id without the AM prefix, e.g. "07". */
  id: string;
  group: number;
  fields: Record<string, string[]>;
}

export interface TelecomMessage {
  header: string;
  segments: TelecomSegment[];
}

export function decodeTelecom(message: string): TelecomMessage {
  const groups = message.split(GROUP_SEPARATOR);
  const [first, ...rest] = groups;
  const headerEnd = first.indexOf(SEGMENT_SEPARATOR);
  const header = headerEnd < 0 ? first : first.slice(0, headerEnd);

  const segments: TelecomSegment[] = [];
  [headerEnd < 0 ? "" : first.slice(headerEnd), ...rest].forEach((group, index) => {
    for (const raw of group.split(SEGMENT_SEPARATOR)) {
      const parts = raw.split(FIELD_SEPARATOR).filter((p) => p.length > 0);
      if (parts.length === 0) continue;
      const [segId, ...fieldParts] = parts;
      if (!segId.startsWith("AM")) throw new Error(`Malformed segment: ${segId}`);
      const fields: Record<string, string[]> = {};
      for (const part of fieldParts) {
        const fid = part.slice(0, 2);
        (fields[fid] ??= []).push(part.slice(2));
      }
      segments.push({ id: segId.slice(2), group: index, fields });
    }
  });

  return { header, segments };
}

export function findSegment(message: TelecomMessage, id: string): TelecomSegment | undefined {
  return message.segments.find((s) => s.id === id);
}

export function fieldValue(segment: TelecomSegment | undefined, fieldId: string): string | undefined {
  return segment?.fields[fieldId]?.[0];
}

export interface RequestHeader {
  bin: string;
  version: string;
  transactionCode: string;
  pcn: string;
  transactionCount: string;
  serviceProviderIdQualifier: string;
  serviceProviderId: string;
  dateOfService: string;
  softwareVendorId: string;
}

export function parseRequestHeader(header: string): RequestHeader {
  if (header.length !== 56) throw new Error(`Request header must be 56 characters, got ${header.length}`);
  return {
    bin: header.slice(0, 6).trim(),
    version: header.slice(6, 8),
    transactionCode: header.slice(8, 10),
    pcn: header.slice(10, 20).trim(),
    transactionCount: header.slice(20, 21),
    serviceProviderIdQualifier: header.slice(21, 23),
    serviceProviderId: header.slice(23, 38).trim(),
    dateOfService: header.slice(38, 46),
    softwareVendorId: header.slice(46, 56).trim(),
  };
}
