/**
 * Calendar-day utilities for backfill windows
 * All days are UTC and formatted as YYYY-MM-DD - sub-day precision is discarded
 */

export type IsoDay = string;

export interface DateWindow {
  start: IsoDay;
  end: IsoDay;
}

const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const UTC_TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|z|\+00:?00)?$/;
const DAY_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Check that a string is a real calendar day in YYYY-MM-DD form
 *
 * @example
 * isIsoDay('2024-02-29') // true
 * isIsoDay('2023-02-29') // false
 */
export function isIsoDay(value: string): boolean {
  if (!ISO_DAY_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && formatIsoDay(parsed) === value;
}

/**
 * Parse a YYYY-MM-DD string into a Date at UTC midnight
 */
export function parseIsoDay(value: string): Date {
  if (!isIsoDay(value)) {
    throw new RangeError(`Invalid calendar day: ${value}`);
  }
  return new Date(`${value}T00:00:00.000Z`);
}

/**
 * Format a Date as its UTC calendar day
 */
export function formatIsoDay(date: Date): IsoDay {
  return date.toISOString().slice(0, 10);
}

// =============================================================================
// Normalization from provider timestamps
// =============================================================================

/**
 * UTC day of an ISO-8601 timestamp, or null when it cannot be parsed
 *
 * @example
 * utcDayFromTimestamp('2024-01-01T23:30:00-02:00') // '2024-01-02'
 * utcDayFromTimestamp('2024-01-01') // '2024-01-01'
 */
export function utcDayFromTimestamp(value: string | null | undefined): IsoDay | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (isIsoDay(trimmed)) return trimmed;

  // UTC or zone-less timestamps: the day prefix is already the UTC day
  const utc = UTC_TIMESTAMP_PATTERN.exec(trimmed);
  if (utc && isIsoDay(utc[1])) return utc[1];

  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) return null;
  return formatIsoDay(parsed);
}

/**
 * UTC day of a unix timestamp in seconds, or null when it is not a finite number
 */
export function utcDayFromUnixSeconds(value: number | null | undefined): IsoDay | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  const parsed = new Date(value * 1000);
  if (Number.isNaN(parsed.getTime())) return null;
  return formatIsoDay(parsed);
}

/**
 * Unix seconds of a day's UTC midnight
 */
export function toUnixSeconds(day: IsoDay): number {
  return Math.floor(parseIsoDay(day).getTime() / 1000);
}

// =============================================================================
// Day arithmetic
// =============================================================================

export function addDays(day: IsoDay, days: number): IsoDay {
  return formatIsoDay(new Date(parseIsoDay(day).getTime() + days * DAY_MS));
}

/**
 * Every day of an inclusive window, in order
 *
 * @example
 * eachDay({ start: '2024-01-30', end: '2024-02-01' }) // ['2024-01-30', '2024-01-31', '2024-02-01']
 */
export function eachDay(window: DateWindow): IsoDay[] {
  assertWindow(window);
  const days: IsoDay[] = [];
  for (let day = window.start; day <= window.end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

export function isWithinWindow(day: IsoDay, window: DateWindow): boolean {
  return day >= window.start && day <= window.end;
}

/**
 * Throws unless both bounds are calendar days and start <= end
 */
export function assertWindow(window: DateWindow): void {
  parseIsoDay(window.start);
  parseIsoDay(window.end);
  if (window.start > window.end) {
    throw new RangeError(`Window start ${window.start} is after end ${window.end}`);
  }
}
