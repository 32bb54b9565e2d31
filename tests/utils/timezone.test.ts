import { describe, expect, it } from 'vitest';
import {
  addMinutesToWallClock,
  canonicalTimezone,
  formatWallClock,
  fromWallClock,
  isValidTimezone,
  normalizeLocalDateTime,
  offsetAt,
  parseLocalDateTime,
  toWallClock,
} from '../../src/utils/timezone';
import { InvalidTriggerError, UnknownTimezoneError } from '../../src/utils/errors';

describe('timezone utilities', () => {
  it('reads the wall clock of an instant in a zone', () => {
    expect(toWallClock(new Date('2025-01-15T12:00:00Z'), 'Asia/Tokyo')).toEqual({
      year: 2025,
      month: 1,
      day: 15,
      hour: 21,
      minute: 0,
      second: 0,
    });
  });

  it('computes offsets east of UTC as positive', () => {
    expect(offsetAt(Date.UTC(2025, 0, 15), 'America/New_York')).toBe(-5 * 3_600_000);
    expect(offsetAt(Date.UTC(2025, 6, 15), 'America/New_York')).toBe(-4 * 3_600_000);
    expect(offsetAt(Date.UTC(2025, 0, 15), 'Asia/Kolkata')).toBe(5.5 * 3_600_000);
  });

  it('moves wall clocks inside a spring-forward gap forward', () => {
    const instant = fromWallClock({ year: 2025, month: 3, day: 9, hour: 2, minute: 30, second: 0 }, 'America/New_York');
    expect(instant.toISOString()).toBe('2025-03-09T07:30:00.000Z');
  });

  it('resolves repeated fall-back wall clocks to the earlier offset', () => {
    const newYork = fromWallClock({ year: 2025, month: 11, day: 2, hour: 1, minute: 30, second: 0 }, 'America/New_York');
    expect(newYork.toISOString()).toBe('2025-11-02T05:30:00.000Z');

    const berlin = fromWallClock({ year: 2025, month: 10, day: 26, hour: 2, minute: 30, second: 0 }, 'Europe/Berlin');
    expect(berlin.toISOString()).toBe('2025-10-26T00:30:00.000Z');
  });

  it('carries minutes across the year boundary', () => {
    expect(addMinutesToWallClock({ year: 2024, month: 12, day: 31, hour: 23, minute: 30, second: 0 }, 45)).toEqual({
      year: 2025,
      month: 1,
      day: 1,
      hour: 0,
      minute: 15,
      second: 0,
    });
  });

  it('parses local date-times with a T or a space', () => {
    expect(parseLocalDateTime('2024-02-29T09:00')).toEqual({ year: 2024, month: 2, day: 29, hour: 9, minute: 0, second: 0 });
    expect(parseLocalDateTime(' 2025-03-08 17:45:30 ')).toEqual({
      year: 2025,
      month: 3,
      day: 8,
      hour: 17,
      minute: 45,
      second: 30,
    });
  });

  it('rejects impossible dates, offsets and other formats', () => {
    expect(() => parseLocalDateTime('2025-02-29T09:00')).toThrow(InvalidTriggerError);
    expect(() => parseLocalDateTime('2025-01-01T24:00')).toThrow(InvalidTriggerError);
    expect(() => parseLocalDateTime('2025-01-01T09:00Z')).toThrow(InvalidTriggerError);
    expect(() => parseLocalDateTime('tomorrow at nine')).toThrow(InvalidTriggerError);
  });

  it('formats wall clocks without zero seconds', () => {
    expect(formatWallClock({ year: 2025, month: 1, day: 5, hour: 9, minute: 0, second: 0 })).toBe('2025-01-05T09:00');
    expect(formatWallClock({ year: 2025, month: 1, day: 5, hour: 9, minute: 0, second: 7 })).toBe('2025-01-05T09:00:07');
    expect(normalizeLocalDateTime('2025-01-05 09:00:00')).toBe('2025-01-05T09:00');
  });

  it('validates and canonicalizes zone names', () => {
    expect(isValidTimezone('Europe/London')).toBe(true);
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
    expect(isValidTimezone('')).toBe(false);
    expect(canonicalTimezone('america/new_york')).toBe('America/New_York');
    expect(() => canonicalTimezone('Mars/Olympus_Mons')).toThrow(UnknownTimezoneError);
  });
});
