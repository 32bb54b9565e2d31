// MARK: - Time Resolver
// Pure next-fire computation for interval and absolute triggers

import { InvalidTriggerError } from '../utils/errors';
import {
  addMinutesToWallClock,
  assertValidTimezone,
  formatWallClock,
  fromWallClock,
  normalizeLocalDateTime,
  parseLocalDateTime,
  toWallClock,
  wallClockAsUtcMs,
} from '../utils/timezone';
import type { IntervalTrigger, TriggerSpec } from '../store/types';

export const MIN_INTERVAL_MINUTES = 1;
export const MAX_INTERVAL_MINUTES = 527_040; // 366 days

const DST_SHIFT_BOUND_MINUTES = 120;

export const EXHAUSTED = Symbol('exhausted');
export type Resolution = Date | typeof EXHAUSTED;

/**
 * Validates a trigger and returns it in canonical form
 */
export function normalizeTrigger(trigger: TriggerSpec): TriggerSpec {
  switch (trigger.kind) {
    case 'interval': {
      const { everyMinutes } = trigger;
      if (!Number.isInteger(everyMinutes) || everyMinutes < MIN_INTERVAL_MINUTES) {
        throw new InvalidTriggerError(`Interval must be a whole number of minutes, at least ${MIN_INTERVAL_MINUTES}`);
      }
      if (everyMinutes > MAX_INTERVAL_MINUTES) {
        throw new InvalidTriggerError(`Interval cannot exceed ${MAX_INTERVAL_MINUTES} minutes (366 days)`);
      }
      return trigger.startsAt
        ? { kind: 'interval', everyMinutes, startsAt: normalizeLocalDateTime(trigger.startsAt) }
        : { kind: 'interval', everyMinutes };
    }
    case 'absolute':
      return { kind: 'absolute', fireAt: normalizeLocalDateTime(trigger.fireAt) };
  }
}

/**
 * Adds `minutes` to the local wall clock of `reference` in `timezone`.
 * Daily intervals therefore keep their local hour across DST changes.
 */
export function addCivilMinutes(reference: Date, minutes: number, timezone: string): Date {
  const local = addMinutesToWallClock(toWallClock(reference, timezone), minutes);
  const candidate = fromWallClock(local, timezone);

  // A repeated fall-back hour can map back before the reference.
  if (candidate.getTime() <= reference.getTime()) {
    return new Date(reference.getTime() + minutes * 60_000);
  }
  return candidate;
}

export function localToInstant(localDateTime: string, timezone: string): Date {
  assertValidTimezone(timezone);
  return fromWallClock(parseLocalDateTime(localDateTime), timezone);
}

export class TimeResolver {
  /**
   * Next instant strictly after `reference`, or EXHAUSTED for a one-off
   * trigger whose time is not after it.
   */
  resolveNext(trigger: TriggerSpec, timezone: string, reference: Date): Resolution {
    assertValidTimezone(timezone);

    switch (trigger.kind) {
      case 'interval':
        return addCivilMinutes(reference, trigger.everyMinutes, timezone);
      case 'absolute': {
        const fireAt = localToInstant(trigger.fireAt, timezone);
        return fireAt.getTime() > reference.getTime() ? fireAt : EXHAUSTED;
      }
    }
  }

  /**
   * Local wall clock of `instant`, used as the origin of a new interval grid
   */
  localAnchor(instant: Date, timezone: string): string {
    assertValidTimezone(timezone);
    return formatWallClock(toWallClock(instant, timezone));
  }

  /**
   * Grid origin of an interval schedule: the stored anchor, else the trigger's
   * start, else the local wall clock of `fallback`.
   */
  anchorFor(trigger: IntervalTrigger, anchorLocal: string | undefined, timezone: string, fallback: Date): string {
    return anchorLocal ?? trigger.startsAt ?? this.localAnchor(fallback, timezone);
  }

  /**
   * First firing for a freshly created or edited schedule
   */
  firstFireAt(trigger: TriggerSpec, timezone: string, now: Date): Resolution {
    if (trigger.kind === 'interval') {
      const anchor = this.anchorFor(trigger, undefined, timezone, now);
      return this.nextOnGrid(anchor, trigger.everyMinutes, timezone, now);
    }
    return this.resolveNext(trigger, timezone, now);
  }

  /**
   * First point of the local grid `anchorLocal + k * everyMinutes` (k >= 0)
   * strictly after `after`. Grid points are local wall clocks, so only an
   * occurrence inside a spring-forward gap moves; later ones return to the
   * grid.
   */
  nextOnGrid(anchorLocal: string, everyMinutes: number, timezone: string, after: Date): Date {
    assertValidTimezone(timezone);

    const anchor = parseLocalDateTime(anchorLocal);
    const stepMs = everyMinutes * 60_000;
    const elapsedMs = wallClockAsUtcMs(toWallClock(after, timezone)) - wallClockAsUtcMs(anchor);

    // Start short of `after` by more than any DST shift, then walk forward.
    const margin = Math.ceil(DST_SHIFT_BOUND_MINUTES / everyMinutes) + 1;
    let step = Math.max(0, Math.floor(elapsedMs / stepMs) - margin);
    let next = fromWallClock(addMinutesToWallClock(anchor, step * everyMinutes), timezone);

    while (next.getTime() <= after.getTime()) {
      step += 1;
      next = fromWallClock(addMinutesToWallClock(anchor, step * everyMinutes), timezone);
    }
    return next;
  }
}
