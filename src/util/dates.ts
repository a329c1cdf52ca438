/**
 * Calendar-date helpers. Scenario files and the search API use `MM/DD/YYYY`;
 * search results carry ISO dates. Everything is compared as a UTC calendar
 * day, never as an instant.
 */

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface CalendarWindow {
  start: CalendarDate;
  end: CalendarDate;
}

const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;
const EXPLICIT_ZONE =
  /(?:\d(?:Z|[+-]\d{2}:?\d{2})|\b(?:GMT|UTC|[ECMP][SD]T)\b|\s[+-]\d{4})/i;

function makeDate(
  year: number,
  month: number,
  day: number
): CalendarDate | undefined {
  if (month < 1 || month > 12 || day < 1) return undefined;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return undefined;
  }
  return { year, month, day };
}

/**
 * Parses a strict `MM/DD/YYYY` date. Returns undefined for anything else,
 * including impossible days such as 02/30/2025.
 */
export function parseUsDate(raw: string): CalendarDate | undefined {
  const m = US_DATE.exec(raw.trim());
  if (!m) return undefined;
  return makeDate(Number(m[3]), Number(m[1]), Number(m[2]));
}

/**
 * Lenient parser for publication dates reported by search providers.
 * Accepts `YYYY-MM-DD...`, `MM/DD/YYYY`, or anything `Date.parse` understands.
 * A date without a zone keeps the calendar day it names, whatever the host TZ.
 */
export function parseEvidenceDate(
  raw: string | null | undefined
): CalendarDate | undefined {
  if (!raw) return undefined;
  const trimmed = raw.trim();
  if (!trimmed) return undefined;

  const iso = ISO_DATE_PREFIX.exec(trimmed);
  if (iso) return makeDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = parseUsDate(trimmed);
  if (us) return us;

  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) return undefined;
  const d = new Date(ms);
  // Date.parse reads zone-less strings as local time
  if (!EXPLICIT_ZONE.test(trimmed)) {
    return {
      year: d.getFullYear(),
      month: d.getMonth() + 1,
      day: d.getDate(),
    };
  }
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

export function toOrdinal(date: CalendarDate): number {
  return date.year * 10000 + date.month * 100 + date.day;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toOrdinal(a) - toOrdinal(b);
}

/** Inclusive on both ends. */
export function isWithinWindow(
  date: CalendarDate,
  window: CalendarWindow
): boolean {
  const value = toOrdinal(date);
  return value >= toOrdinal(window.start) && value <= toOrdinal(window.end);
}

/**
 * Parses a `{ start, end }` pair of `MM/DD/YYYY` strings.
 * Returns undefined when either side is invalid or start is after end.
 */
export function parseUsWindow(window: {
  start: string;
  end: string;
}): CalendarWindow | undefined {
  const start = parseUsDate(window.start);
  const end = parseUsDate(window.end);
  if (!start || !end) return undefined;
  if (compareDates(start, end) > 0) return undefined;
  return { start, end };
}
