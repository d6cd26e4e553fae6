/**
 * HL7 v2.5.1 messages: ADT^A01 (admit), ORM^O01 (lab order) and ORU^R01
 * (observation results).
 */

import { compactDate, compactTimestamp } from "../dates";
import { InvalidRequestError } from "../errors";
import type { Encounter, Observation, Patient } from "../patientsim/models";

export const FIELD_SEPARATOR = "|";
export const ENCODING_CHARACTERS = "^~\\&";
export const SEGMENT_TERMINATOR = "\r";
const VERSION = "2.5.1";

const ESCAPES: Record<string, string> = {
  "\\": "\\E\\",
  "|": "\\F\\",
  "^": "\\S\\",
  "&": "\\T\\",
  "~": "\\R\\",
};

const UNESCAPES: Record<string, string> = { E: "\\", F: "|", S: "^", T: "&", R: "~" };

export function escapeHl7(text: string): string {
  return text.replace(/[\\|^&~]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function unescapeHl7(text: string): string {
  return text.replace(/\\([EFSTR])\\/g, (_, code: string) => UNESCAPES[code] ?? code);
}

/** Components are escaped individually and joined with `^`. */
function comp(...components: Array<string | undefined>): string {
  const parts = components.map((c) => escapeHl7(c ?? ""));
  while (parts.length > 0 && parts[parts.length - 1] === "") parts.pop();
  return parts.join("^");
}

/** Builds a segment from sparse field positions; trailing empty fields are dropped. */
function seg(id: string, fields: Record<number, string>): string {
  const max = Math.max(0, ...Object.keys(fields).map(Number));
  const out: string[] = [id];
  for (let i = 1; i <= max; i++) out.push(fields[i] ?? "");
  while (out.length > 1 && out[out.length - 1] === "") out.pop();
  return out.join(FIELD_SEPARATOR);
}

function dateTime(timestamp: Date): string {
  const ts = compactTimestamp(timestamp);
  return `${ts.date}${ts.time}${ts.seconds}`;
}

export interface Hl7Options {
  sendingApplication?: string;
  sendingFacility?: string;
  receivingApplication?: string;
  receivingFacility?: string;
  timestamp?: Date;
  controlId?: string;
  processingId?: "P" | "T" | "D";
}

function msh(messageType: [string, string, string], options: Hl7Options): string {
  const timestamp = options.timestamp ?? new Date();
  const controlId = options.controlId ?? `HS${dateTime(timestamp)}`;
  return [
    "MSH",
    ENCODING_CHARACTERS,
    options.sendingApplication ?? "HEALTHSIM",
    options.sendingFacility ?? "HEALTHSIM",
    options.receivingApplication ?? "RECEIVER",
    options.receivingFacility ?? "RECEIVER",
    dateTime(timestamp),
    "",
    messageType.join("^"),
    controlId,
    options.processingId ?? "P",
    VERSION,
  ].join(FIELD_SEPARATOR);
}

export function pidSegment(patient: Patient): string {
  const d = patient.demographics;
  return seg("PID", {
    1: "1",
    3: [comp(patient.mrn, "", "", "HEALTHSIM", "MR"), comp(patient.patientId, "", "", "HEALTHSIM", "PI")].join("~"),
    5: comp(d.lastName, d.firstName),
    7: compactDate(d.dateOfBirth),
    8: d.gender,
    11: comp(d.address.line, "", d.address.city, d.address.state, d.address.postalCode, "USA"),
    13: escapeHl7(d.phone),
  });
}

const PATIENT_CLASS: Record<Encounter["type"], string> = {
  outpatient: "O",
  inpatient: "I",
  emergency: "E",
};

function pv1Segment(encounter: Encounter): string {
  return seg("PV1", {
    1: "1",
    2: PATIENT_CLASS[encounter.type],
    3: comp("", "", "", "HEALTHSIM"),
    7: comp(encounter.providerNpi, encounter.providerName),
    19: escapeHl7(encounter.encounterId),
    44: compactDate(encounter.admitDate),
    45: encounter.dischargeDate ? compactDate(encounter.dischargeDate) : "",
  });
}

/** ADT^A01 for an encounter (the most recent one by default). */
export function toAdtA01(patient: Patient, encounter?: Encounter, options: Hl7Options = {}): string {
  const visit = encounter ?? patient.encounters[patient.encounters.length - 1];
  if (!visit) throw new InvalidRequestError(`Patient ${patient.patientId} has no encounters`);
  const timestamp = options.timestamp ?? new Date();

  const segments = [
    msh(["ADT", "A01", "ADT_A01"], { ...options, timestamp }),
    seg("EVN", { 1: "A01", 2: dateTime(timestamp) }),
    pidSegment(patient),
    pv1Segment(visit),
    ...patient.diagnoses.map((d, i) =>
      seg("DG1", {
        1: String(i + 1),
        3: comp(d.code, d.description, "I10"),
        5: compactDate(d.diagnosedDate),
        6: d.rank === "primary" ? "A" : "W",
      }),
    ),
  ];
  return segments.join(SEGMENT_TERMINATOR);
}

export interface LabOrder {
  placerOrderNumber: string;
  loinc: string;
  display: string;
  orderedDate: string;
  orderingNpi: string;
  orderingName: string;
}

/** One order per laboratory observation on the patient's chart. */
export function labOrdersFor(patient: Patient): LabOrder[] {
  const provider = patient.encounters[patient.encounters.length - 1];
  return patient.observations
    .filter((o) => o.category === "laboratory")
    .map((o, i) => ({
      placerOrderNumber: `${patient.mrn}-${i + 1}`,
      loinc: o.code,
      display: o.display,
      orderedDate: o.effectiveDate,
      orderingNpi: provider?.providerNpi ?? "",
      orderingName: provider?.providerName ?? "",
    }));
}

/** ORM^O01 new lab order. */
export function toOrmO01(patient: Patient, order: LabOrder, options: Hl7Options = {}): string {
  const ordered = compactDate(order.orderedDate);
  const provider = comp(order.orderingNpi, order.orderingName);
  return [
    msh(["ORM", "O01", "ORM_O01"], options),
    pidSegment(patient),
    seg("ORC", { 1: "NW", 2: escapeHl7(order.placerOrderNumber), 5: "SC", 9: ordered, 12: provider }),
    seg("OBR", { 1: "1", 2: escapeHl7(order.placerOrderNumber), 4: comp(order.loinc, order.display, "LN"), 7: ordered, 16: provider }),
  ].join(SEGMENT_TERMINATOR);
}

const PANELS: Record<Observation["category"], [string, string]> = {
  "vital-signs": ["85353-1", "Vital signs panel"],
  laboratory: ["11502-2", "Laboratory report"],
};

export function obxSegment(observation: Observation, setId: number): string {
  return seg("OBX", {
    1: String(setId),
    2: "NM",
    3: comp(observation.code, observation.display, "LN"),
    5: String(observation.value),
    6: comp(observation.unit, "", "UCUM"),
    7: `${observation.referenceLow}-${observation.referenceHigh}`,
    8: observation.interpretation,
    11: "F",
    14: compactDate(observation.effectiveDate),
  });
}

/** ORU^R01 with one OBR per observation category, each followed by its OBX results. */
export function toOruR01(patient: Patient, observations?: Observation[], options: Hl7Options = {}): string {
  const results = observations ?? patient.observations;
  if (results.length === 0) throw new InvalidRequestError(`Patient ${patient.patientId} has no observations`);

  const segments = [msh(["ORU", "R01", "ORU_R01"], options), pidSegment(patient)];
  const categories: Observation["category"][] = ["vital-signs", "laboratory"];
  let obrId = 0;
  for (const category of categories) {
    const group = results.filter((o) => o.category === category);
    if (group.length === 0) continue;
    obrId++;
    const [code, display] = PANELS[category];
    const observed = compactDate(group[0].effectiveDate);
    segments.push(
      seg("OBR", {
        1: String(obrId),
        2: `${patient.mrn}-R${obrId}`,
        4: comp(code, display, "LN"),
        7: observed,
        22: observed,
        25: "F",
      }),
    );
    group.forEach((o, i) => segments.push(obxSegment(o, i + 1)));
  }
  return segments.join(SEGMENT_TERMINATOR);
}

/** ---------- Parsing ---------- */

export interface Hl7Segment {
  id: string;
  /** fields[n] is field n of the segment (MSH-1 is the field separator itself). */
  fields: string[];
}

export function parseHl7(message: string): Hl7Segment[] {
  return message
    .split(/\r\n|\r|\n/)
    .filter((line) => line.length > 0)
    .map((line) => {
      const parts = line.split(FIELD_SEPARATOR);
      const id = parts[0];
      const fields = id === "MSH" ? ["MSH", FIELD_SEPARATOR, ...parts.slice(1)] : parts;
      return { id, fields };
    });
}

export function field(segment: Hl7Segment, index: number): string {
  return segment.fields[index] ?? "";
}

export function components(value: string): string[] {
  return value.split("^").map(unescapeHl7);
}
