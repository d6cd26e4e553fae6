import { InvalidRequestError } from "./errors";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

export function parseIsoDate(value: string): Date {
  const m = ISO_DATE.exec(value);
  if (!m) throw new InvalidRequestError(`Invalid date: ${value} (expected YYYY-MM-DD)`);
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  if (d.getUTCMonth() !== Number(m[2]) - 1) throw new InvalidRequestError(`Invalid date: ${value}`);
  return d;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return formatIsoDate(new Date(parseIsoDate(date).getTime() + days * DAY_MS));
}

/** Whole months; the day is clamped to the end of the target month. */
export function addMonths(date: string, months: number): string {
  const d = parseIsoDate(date);
  const target = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + months, 1));
  const lastDay = new Date(Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)).getUTCDate();
  target.setUTCDate(Math.min(d.getUTCDate(), lastDay));
  return formatIsoDate(target);
}

export function addYears(date: string, years: number): string {
  return addMonths(date, years * 12);
}

export function firstOfMonth(date: string): string {
  return `${date.slice(0, 7)}-01`;
}

export function endOfMonth(date: string): string {
  return addDays(firstOfMonth(addMonths(firstOfMonth(date), 1)), -1);
}

/** Signed number of days from `start` to `end`. */
export function daysBetween(start: string, end: string): number {
  return Math.round((parseIsoDate(end).getTime() - parseIsoDate(start).getTime()) / DAY_MS);
}

/** Completed years of age on `asOf`. */
export function ageOn(dateOfBirth: string, asOf: string): number {
  const birth = parseIsoDate(dateOfBirth);
  const ref = parseIsoDate(asOf);
  let age = ref.getUTCFullYear() - birth.getUTCFullYear();
  const beforeBirthday =
    ref.getUTCMonth() < birth.getUTCMonth() ||
    (ref.getUTCMonth() === birth.getUTCMonth() && ref.getUTCDate() < birth.getUTCDate());
  if (beforeBirthday) age--;
  return age;
}

/** CCYYMMDD */
export function compactDate(date: string): string {
  return date.replace(/-/g, "");
}

/** CCYYMMDD and HHMM from a timestamp, in UTC. */
export function compactTimestamp(timestamp: Date): { date: string; time: string; seconds: string } {
  const iso = timestamp.toISOString();
  return {
    date: iso.slice(0, 10).replace(/-/g, ""),
    time: iso.slice(11, 16).replace(":", ""),
    seconds: iso.slice(17, 19),
  };
}

export function isIsoDate(value: string): boolean {
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return d.getUTCFullYear() === Number(m[1]) && d.getUTCMonth() === Number(m[2]) - 1 && d.getUTCDate() === Number(m[3]);
}
