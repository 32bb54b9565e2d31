import { describe, expect, it } from 'vitest';
import {
  EXHAUSTED,
  MAX_INTERVAL_MINUTES,
  TimeResolver,
  addCivilMinutes,
  normalizeTrigger,
} from '../../src/services/TimeResolver';
import { InvalidTriggerError, UnknownTimezoneError } from '../../src/utils/errors';

const resolver = new TimeResolver();

describe('TimeResolver', () => {
  describe('interval triggers', () => {
    it('adds the interval to the reference', () => {
      const next = resolver.resolveNext({ kind: 'interval', everyMinutes: 60 }, 'UTC', new Date('2025-01-01T00:00:00Z'));
      expect(next).toEqual(new Date('2025-01-01T01:00:00Z'));
    });

    it('keeps the local hour of a daily interval across spring-forward', () => {
      // 09:00 EST on March 8 -> 09:00 EDT on March 9
      const next = resolver.resolveNext(
        { kind: 'interval', everyMinutes: 1440 },
        'America/New_York',
        new Date('2025-03-08T14:00:00Z'),
      );
      expect(next).toEqual(new Date('2025-03-09T13:00:00Z'));
    });

    it('keeps the local hour of a daily interval across fall-back', () => {
      const next = resolver.resolveNext(
        { kind: 'interval', everyMinutes: 1440 },
        'America/New_York',
        new Date('2025-11-01T13:00:00Z'),
      );
      expect(next).toEqual(new Date('2025-11-02T14:00:00Z'));
    });

    it('falls back to elapsed time when the repeated hour maps backwards', () => {
      // 01:15 EST (second pass) + 30 minutes would be 01:45 EDT, before the reference
      const next = addCivilMinutes(new Date('2025-11-02T06:15:00Z'), 30, 'America/New_York');
      expect(next).toEqual(new Date('2025-11-02T06:45:00Z'));
    });
  });

  describe('absolute triggers', () => {
    it('resolves the local time in the tenant timezone', () => {
      const next = resolver.resolveNext(
        { kind: 'absolute', fireAt: '2025-06-01T09:00' },
        'Europe/London',
        new Date('2025-05-01T00:00:00Z'),
      );
      expect(next).toEqual(new Date('2025-06-01T08:00:00Z'));
    });

    it('is exhausted once the time is not after the reference', () => {
      const trigger = { kind: 'absolute', fireAt: '2025-06-01T09:00' } as const;
      expect(resolver.resolveNext(trigger, 'UTC', new Date('2025-06-01T09:00:00Z'))).toBe(EXHAUSTED);
      expect(resolver.resolveNext(trigger, 'UTC', new Date('2025-07-01T00:00:00Z'))).toBe(EXHAUSTED);
    });

    it('moves a time skipped by DST forward', () => {
      const next = resolver.resolveNext(
        { kind: 'absolute', fireAt: '2025-03-09T02:30' },
        'America/New_York',
        new Date('2025-03-01T00:00:00Z'),
      );
      expect(next).toEqual(new Date('2025-03-09T07:30:00Z'));
    });
  });

  it('fails closed on an unknown timezone', () => {
    expect(() =>
      resolver.resolveNext({ kind: 'absolute', fireAt: '2025-01-01T00:00' }, 'Not/AZone', new Date('2024-12-01T00:00:00Z')),
    ).toThrow(UnknownTimezoneError);
    expect(() =>
      resolver.resolveNext({ kind: 'interval', everyMinutes: 5 }, 'Not/AZone', new Date('2024-12-01T00:00:00Z')),
    ).toThrow(UnknownTimezoneError);
  });

  describe('firstFireAt', () => {
    it('uses a future start time as the first firing', () => {
      const first = resolver.firstFireAt(
        { kind: 'interval', everyMinutes: 60, startsAt: '2025-01-10T08:00' },
        'UTC',
        new Date('2025-01-01T00:00:00Z'),
      );
      expect(first).toEqual(new Date('2025-01-10T08:00:00Z'));
    });

    it('rolls a past start time forward on its grid', () => {
      const first = resolver.firstFireAt(
        { kind: 'interval', everyMinutes: 60, startsAt: '2025-01-01T08:00' },
        'UTC',
        new Date('2025-01-01T10:30:00Z'),
      );
      expect(first).toEqual(new Date('2025-01-01T11:00:00Z'));
    });

    it('starts one interval from now without a start time', () => {
      const first = resolver.firstFireAt({ kind: 'interval', everyMinutes: 15 }, 'UTC', new Date('2025-01-01T10:00:00Z'));
      expect(first).toEqual(new Date('2025-01-01T10:15:00Z'));
    });
  });

  describe('nextOnGrid', () => {
    it('returns an anchor that is still in the future', () => {
      expect(resolver.nextOnGrid('2025-01-01T12:00', 60, 'UTC', new Date('2025-01-01T11:00:00Z'))).toEqual(
        new Date('2025-01-01T12:00:00Z'),
      );
    });

    it('skips every missed step in one call', () => {
      const next = resolver.nextOnGrid('2025-01-01T08:00', 60, 'UTC', new Date('2025-01-02T10:30:00Z'));
      expect(next).toEqual(new Date('2025-01-02T11:00:00Z'));
    });

    it('stays on the local grid across a DST change', () => {
      const next = resolver.nextOnGrid('2025-03-01T09:00', 1440, 'America/New_York', new Date('2025-03-20T12:00:00Z'));
      // 09:00 EDT
      expect(next).toEqual(new Date('2025-03-20T13:00:00Z'));
    });

    it('moves only the occurrence that falls in a spring-forward gap', () => {
      const anchor = '2025-03-08T02:30';
      const zone = 'America/New_York';

      // 02:30 on March 9 does not exist and becomes 03:30 EDT
      const inGap = resolver.nextOnGrid(anchor, 1440, zone, new Date('2025-03-08T07:30:00Z'));
      expect(inGap).toEqual(new Date('2025-03-09T07:30:00Z'));

      const afterGap = resolver.nextOnGrid(anchor, 1440, zone, inGap);
      expect(afterGap).toEqual(new Date('2025-03-10T06:30:00Z'));
    });

    it('never repeats an instant when several grid points share a gap', () => {
      // 02:00 and 02:30 both land after the jump; the 03:00 point is not a repeat
      const anchor = '2025-03-09T01:30';
      const zone = 'America/New_York';
      const fired: string[] = [];
      let after = new Date('2025-03-09T06:29:00Z');
      for (let index = 0; index < 5; index++) {
        after = resolver.nextOnGrid(anchor, 30, zone, after);
        fired.push(after.toISOString());
      }

      expect(fired).toEqual([
        '2025-03-09T06:30:00.000Z',
        '2025-03-09T07:00:00.000Z',
        '2025-03-09T07:30:00.000Z',
        '2025-03-09T08:00:00.000Z',
        '2025-03-09T08:30:00.000Z',
      ]);
    });
  });

  it('derives grid anchors from the stored value, the start, or the local clock', () => {
    const trigger = { kind: 'interval', everyMinutes: 60, startsAt: '2025-01-05T08:00' } as const;
    const fallback = new Date('2025-01-01T14:45:10Z');

    expect(resolver.anchorFor(trigger, '2025-01-02T09:00', 'UTC', fallback)).toBe('2025-01-02T09:00');
    expect(resolver.anchorFor(trigger, undefined, 'UTC', fallback)).toBe('2025-01-05T08:00');
    expect(resolver.anchorFor({ kind: 'interval', everyMinutes: 60 }, undefined, 'America/New_York', fallback)).toBe(
      '2025-01-01T09:45:10',
    );
  });

  describe('normalizeTrigger', () => {
    it('canonicalizes local date-times', () => {
      expect(normalizeTrigger({ kind: 'interval', everyMinutes: 30, startsAt: '2025-03-08 09:00' })).toEqual({
        kind: 'interval',
        everyMinutes: 30,
        startsAt: '2025-03-08T09:00',
      });
      expect(normalizeTrigger({ kind: 'absolute', fireAt: '2025-03-08 09:00:00' })).toEqual({
        kind: 'absolute',
        fireAt: '2025-03-08T09:00',
      });
    });

    it('rejects intervals outside the allowed range', () => {
      expect(() => normalizeTrigger({ kind: 'interval', everyMinutes: 0 })).toThrow(InvalidTriggerError);
      expect(() => normalizeTrigger({ kind: 'interval', everyMinutes: 1.5 })).toThrow(InvalidTriggerError);
      expect(() => normalizeTrigger({ kind: 'interval', everyMinutes: MAX_INTERVAL_MINUTES + 1 })).toThrow(
        InvalidTriggerError,
      );
      expect(normalizeTrigger({ kind: 'interval', everyMinutes: MAX_INTERVAL_MINUTES })).toEqual({
        kind: 'interval',
        everyMinutes: MAX_INTERVAL_MINUTES,
      });
    });

    it('rejects malformed absolute times', () => {
      expect(() => normalizeTrigger({ kind: 'absolute', fireAt: '2025-1-1 9:00' })).toThrow(InvalidTriggerError);
    });
  });
});
