/**
 * Calendar-date helpers. Dates travel through the pipeline as `YYYY-MM-DD`
 * strings; arithmetic happens in UTC so local time zones never shift a day.
 */

/** Calendar date formatted as `YYYY-MM-DD`. */
export type IsoDate = string;

/** Inclusive date window of a search. `since <= until` always holds. */
export interface DateRange {
  readonly since: IsoDate;
  readonly until: IsoDate;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DOTTED_DATE = /^(\d{2})\.(\d{2})\.(\d{4})$/;

function toUtcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function formatIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

/**
 * Parses one date token. Accepts `YYYY-MM-DD` and `DD.MM.YYYY`; rejects
 * impossible calendar dates such as `2025-02-30`.
 */
export function parseDate(token: string): IsoDate | null {
  const trimmed = token.trim();
  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    const date = toUtcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    return date ? formatIsoDate(date) : null;
  }
  const dotted = DOTTED_DATE.exec(trimmed);
  if (dotted) {
    const date = toUtcDate(Number(dotted[3]), Number(dotted[2]), Number(dotted[1]));
    return date ? formatIsoDate(date) : null;
  }
  return null;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Coerces a `Date` or date string to {@link IsoDate}, throwing on garbage. A
 * `Date` is read through its local calendar fields, so `new Date(2025, 9, 1)`
 * is `2025-10-01` in every time zone.
 */
export function toIsoDate(value: IsoDate | Date): IsoDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new RangeError("Invalid Date");
    }
    return `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1, 2)}-${pad(value.getDate(), 2)}`;
  }
  const parsed = parseDate(value);
  if (!parsed) {
    throw new RangeError(`Unrecognised date '${value}'`);
  }
  return parsed;
}

/** Returns {@link date} moved by {@link days} calendar days. */
export function addDays(date: IsoDate, days: number): IsoDate {
  const parsed = ISO_DATE.exec(date);
  if (!parsed) {
    throw new RangeError(`Expected YYYY-MM-DD, received '${date}'`);
  }
  const base = Date.UTC(Number(parsed[1]), Number(parsed[2]) - 1, Number(parsed[3]));
  return formatIsoDate(new Date(base + days * 86_400_000));
}

/** Builds a range, swapping the bounds when they arrive reversed. */
export function orderRange(since: IsoDate, until: IsoDate): DateRange {
  return since <= until ? { since, until } : { since: until, until: since };
}

/**
 * Grammar: `DATE SEP DATE`, where DATE is `YYYY-MM-DD` or `DD.MM.YYYY` and
 * SEP is one of `-`, `–`, `—`, `..`, `to` or plain whitespace (surrounding
 * spaces optional). Anything else returns `null`.
 */
const RANGE_PATTERN =
  /^\s*(\d{4}-\d{2}-\d{2}|\d{2}\.\d{2}\.\d{4})\s*(?:\s|-|–|—|\.\.|to\s)\s*(\d{4}-\d{2}-\d{2}|\d{2}\.\d{2}\.\d{4})\s*$/i;

/**
 * Parses a free-text range typed by a user. Reversed ranges come back
 * ordered.
 */
export function parseDateRange(text: string): DateRange | null {
  const match = RANGE_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const since = parseDate(match[1] ?? "");
  const until = parseDate(match[2] ?? "");
  if (!since || !until) {
    return null;
  }
  return orderRange(since, until);
}
