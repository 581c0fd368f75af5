import { isValid, parseISO } from 'date-fns';

/**
 * Wall-clock values as the store holds them: a date, optionally followed
 * by a time (space or `T` separated). These carry no offset and are UTC.
 */
const NAIVE_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?))?$/;

/** A date and time followed by `Z` or a numeric offset. */
const OFFSET_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

const MS_PER_DAY = 86_400_000;

/**
 * Parse a stored date-time string. Naive values are read as UTC, like
 * SQLite's CURRENT_TIMESTAMP, so the result does not depend on the host
 * time zone. Returns null for null, blank or unparsable input; never throws.
 */
export function parseTimestamp(raw: string | null | undefined): Date | null {
  if (typeof raw !== 'string') return null;
  const value = raw.trim();
  if (value.length === 0) return null;

  let parsed: Date;
  const naive = NAIVE_TIMESTAMP.exec(value);
  if (naive) {
    const [, date, time = '00:00:00'] = naive;
    parsed = parseISO(`${date}T${time}Z`);
  } else if (OFFSET_TIMESTAMP.test(value)) {
    parsed = parseISO(value);
  } else {
    return null;
  }

  return isValid(parsed) ? parsed : null;
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, the shape SQLite's date functions read. */
export function formatSqlTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function daysBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / MS_PER_DAY;
}

export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
