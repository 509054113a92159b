/**
 * Calendar-day utility unit tests
 */

import { describe, it, expect } from 'vitest';
import {
  addDays,
  assertWindow,
  eachDay,
  isIsoDay,
  isWithinWindow,
  parseIsoDay,
  toUnixSeconds,
  utcDayFromTimestamp,
  utcDayFromUnixSeconds,
} from '../date';

describe('isIsoDay', () => {
  it('accepts real calendar days only', () => {
    expect(isIsoDay('2024-02-29')).toBe(true);
    expect(isIsoDay('2023-02-29')).toBe(false);
    expect(isIsoDay('2024-1-01')).toBe(false);
    expect(isIsoDay('2024-01-01T00:00:00Z')).toBe(false);
  });

  it('parseIsoDay throws on invalid input', () => {
    expect(() => parseIsoDay('2024-13-01')).toThrow(RangeError);
    expect(parseIsoDay('2024-01-02').toISOString()).toBe('2024-01-02T00:00:00.000Z');
  });
});

describe('utcDayFromTimestamp', () => {
  it('keeps the day of UTC and zone-less timestamps', () => {
    expect(utcDayFromTimestamp('2024-01-01T23:59:59Z')).toBe('2024-01-01');
    expect(utcDayFromTimestamp('2024-01-01T00:00:00.0000000Z')).toBe('2024-01-01');
    expect(utcDayFromTimestamp('2024-01-01 12:30')).toBe('2024-01-01');
    expect(utcDayFromTimestamp('2024-01-01')).toBe('2024-01-01');
  });

  it('converts offset timestamps to the UTC day', () => {
    expect(utcDayFromTimestamp('2024-01-01T23:30:00-02:00')).toBe('2024-01-02');
    expect(utcDayFromTimestamp('2024-01-02T01:00:00+05:00')).toBe('2024-01-01');
  });

  it('returns null for missing or unparseable values', () => {
    expect(utcDayFromTimestamp(undefined)).toBeNull();
    expect(utcDayFromTimestamp(null)).toBeNull();
    expect(utcDayFromTimestamp('')).toBeNull();
    expect(utcDayFromTimestamp('yesterday')).toBeNull();
  });
});

describe('utcDayFromUnixSeconds', () => {
  it('converts seconds to the UTC day', () => {
    expect(utcDayFromUnixSeconds(1704067200)).toBe('2024-01-01');
    expect(utcDayFromUnixSeconds(1704153599)).toBe('2024-01-01');
  });

  it('returns null for non-finite values', () => {
    expect(utcDayFromUnixSeconds(undefined)).toBeNull();
    expect(utcDayFromUnixSeconds(Number.NaN)).toBeNull();
  });

  it('is the inverse of toUnixSeconds', () => {
    expect(toUnixSeconds('2024-01-01')).toBe(1704067200);
    expect(utcDayFromUnixSeconds(toUnixSeconds('2024-03-31'))).toBe('2024-03-31');
  });
});

describe('day arithmetic', () => {
  it('adds days across month and leap boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-02-29', 1)).toBe('2024-03-01');
    expect(addDays('2024-01-01', -1)).toBe('2023-12-31');
  });

  it('lists every day of an inclusive window once', () => {
    expect(eachDay({ start: '2024-01-30', end: '2024-02-01' })).toEqual(['2024-01-30', '2024-01-31', '2024-02-01']);
    expect(eachDay({ start: '2024-01-01', end: '2024-01-01' })).toEqual(['2024-01-01']);
  });

  it('rejects a window whose start is after its end', () => {
    expect(() => assertWindow({ start: '2024-01-02', end: '2024-01-01' })).toThrow(
      'Window start 2024-01-02 is after end 2024-01-01'
    );
    expect(() => eachDay({ start: '2024-01-02', end: '2024-01-01' })).toThrow(RangeError);
  });

  it('checks window membership inclusively', () => {
    const window = { start: '2024-01-01', end: '2024-01-31' };
    expect(isWithinWindow('2024-01-01', window)).toBe(true);
    expect(isWithinWindow('2024-01-31', window)).toBe(true);
    expect(isWithinWindow('2024-02-01', window)).toBe(false);
  });
});
