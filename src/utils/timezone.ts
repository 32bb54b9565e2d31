// MARK: - Timezone Utilities
// Wall-clock <-> instant conversion on top of Intl.DateTimeFormat

import { InvalidTriggerError, UnknownTimezoneError } from './errors';

export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

const DAY_MS = 86_400_000;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timezone);
  if (cached) {
    return cached;
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new UnknownTimezoneError(timezone);
    }
    throw error;
  }

  formatterCache.set(timezone, formatter);
  return formatter;
}

/**
 * Throws UnknownTimezoneError unless the runtime knows the IANA zone
 */
export function assertValidTimezone(timezone: string): void {
  if (!timezone || !timezone.trim()) {
    throw new UnknownTimezoneError(timezone);
  }
  getFormatter(timezone);
}

/**
 * Canonical IANA spelling of a zone the runtime accepts (america/new_york -> America/New_York)
 */
export function canonicalTimezone(timezone: string): string {
  assertValidTimezone(timezone.trim());
  return getFormatter(timezone.trim()).resolvedOptions().timeZone;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    assertValidTimezone(timezone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall clock shown in `timezone` at `instant`
 */
export function toWallClock(instant: Date, timezone: string): WallClock {
  const parts = getFormatter(timezone).formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(candidate => candidate.type === type);
    return part ? Number.parseInt(part.value, 10) : 0;
  };

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

export function wallClockAsUtcMs(wall: WallClock): number {
  return Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
}

/**
 * Offset of `timezone` from UTC at `epochMs`, in milliseconds (east positive)
 */
export function offsetAt(epochMs: number, timezone: string): number {
  const truncated = Math.floor(epochMs / 1000) * 1000;
  return wallClockAsUtcMs(toWallClock(new Date(truncated), timezone)) - truncated;
}

/**
 * Converts a local wall clock to an instant. Times skipped by a spring-forward
 * transition move forward by the gap; repeated fall-back times resolve to the
 * earlier offset.
 */
export function fromWallClock(wall: WallClock, timezone: string): Date {
  const naive = wallClockAsUtcMs(wall);
  // Zones shift at most once within a day on either side of the wall clock.
  const offsets = new Set([offsetAt(naive - DAY_MS, timezone), offsetAt(naive + DAY_MS, timezone)]);
  const candidates = [...offsets].map(offset => naive - offset);

  const matching = candidates.filter(candidate => offsetAt(candidate, timezone) === naive - candidate);
  if (matching.length > 0) {
    return new Date(Math.min(...matching));
  }

  // Inside a gap: neither offset reproduces the wall clock.
  return new Date(Math.max(...candidates));
}

/**
 * Adds minutes to a wall clock, carrying into hours, days, months and years
 */
export function addMinutesToWallClock(wall: WallClock, minutes: number): WallClock {
  const shifted = new Date(wallClockAsUtcMs(wall) + minutes * 60_000);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
  };
}

/**
 * Parses `YYYY-MM-DDTHH:mm[:ss]` (a space may replace the T) into a wall clock.
 * Rejects offsets and impossible calendar dates.
 */
export function parseLocalDateTime(input: string): WallClock {
  const match = LOCAL_DATE_TIME.exec(input.trim());
  if (!match) {
    throw new InvalidTriggerError(`"${input}" is not a local date-time like 2025-01-31T09:00`);
  }

  const [, year, month, day, hour, minute, second] = match;
  const wall: WallClock = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: second ? Number(second) : 0,
  };

  const roundTrip = addMinutesToWallClock(wall, 0);
  const sameFields =
    roundTrip.year === wall.year &&
    roundTrip.month === wall.month &&
    roundTrip.day === wall.day &&
    roundTrip.hour === wall.hour &&
    roundTrip.minute === wall.minute &&
    roundTrip.second === wall.second;

  if (!sameFields || wall.hour > 23 || wall.minute > 59 || wall.second > 59) {
    throw new InvalidTriggerError(`"${input}" is not a valid calendar date-time`);
  }

  return wall;
}

export function formatWallClock(wall: WallClock): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  const base = `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}T${pad(wall.hour)}:${pad(wall.minute)}`;
  return wall.second ? `${base}:${pad(wall.second)}` : base;
}

/**
 * Normalizes a local date-time string to its canonical form
 */
export function normalizeLocalDateTime(input: string): string {
  return formatWallClock(parseLocalDateTime(input));
}
