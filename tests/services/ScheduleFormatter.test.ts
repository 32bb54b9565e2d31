import { describe, expect, it } from 'vitest';
import {
  discordTimestamp,
  formatLocal,
  formatMinutes,
  formatScheduleLine,
  formatScheduleList,
  formatTarget,
  formatTemplateLine,
  formatTemplateList,
  formatTrigger,
  previewMessage,
} from '../../src/services/ScheduleFormatter';
import type { ScheduleRecord, TemplateRecord } from '../../src/store/types';

function schedule(overrides: Partial<ScheduleRecord> = {}): ScheduleRecord {
  return {
    id: 'abc123',
    tenantId: 'guild-1',
    kind: 'interval',
    trigger: { kind: 'interval', everyMinutes: 60 },
    payload: { message: 'Hi', targetUserId: 'u1', dm: false },
    state: 'active',
    nextFireAt: new Date('2025-01-01T00:00:00Z'),
    version: 0,
    fireCount: 0,
    createdAt: new Date('2024-12-31T00:00:00Z'),
    updatedAt: new Date('2024-12-31T00:00:00Z'),
    ...overrides,
  };
}

describe('ScheduleFormatter', () => {
  it('formats minute counts as days, hours and minutes', () => {
    expect(formatMinutes(0)).toBe('0m');
    expect(formatMinutes(45)).toBe('45m');
    expect(formatMinutes(90)).toBe('1h 30m');
    expect(formatMinutes(1440)).toBe('1d');
    expect(formatMinutes(1441)).toBe('1d 1m');
  });

  it('describes triggers', () => {
    expect(formatTrigger({ kind: 'interval', everyMinutes: 30 })).toBe('every 30m');
    expect(formatTrigger({ kind: 'interval', everyMinutes: 30, startsAt: '2025-03-08T09:00' })).toBe(
      'every 30m from 2025-03-08T09:00',
    );
    expect(formatTrigger({ kind: 'absolute', fireAt: '2025-01-01T09:00' })).toBe('at 2025-01-01T09:00');
  });

  it('describes delivery targets', () => {
    expect(formatTarget({ message: 'x', targetUserId: 'u1', dm: true })).toBe('DM <@u1>');
    expect(formatTarget({ message: 'x', targetUserId: 'u1', channelId: 'c1', dm: false })).toBe('<@u1> in <#c1>');
    expect(formatTarget({ message: 'x', targetUserId: 'u1', dm: false })).toBe('<@u1> in default channel');
    expect(formatTarget({ message: 'x', channelId: 'c1', dm: false })).toBe('<#c1>');
    expect(formatTarget({ message: 'x', dm: false })).toBe('default channel');
  });

  it('shortens message previews to one line', () => {
    expect(previewMessage('first\n  second')).toBe('first second');
    expect(previewMessage('x'.repeat(70))).toBe(`${'x'.repeat(57)}...`);
  });

  it('renders Discord timestamps', () => {
    expect(discordTimestamp(new Date('2025-01-01T00:00:00Z'))).toBe('<t:1735689600:R>');
    expect(discordTimestamp(new Date('2025-01-01T00:00:00Z'), 'F')).toBe('<t:1735689600:F>');
  });

  it('shows the next delivery for active schedules and the state otherwise', () => {
    expect(formatScheduleLine(schedule())).toBe(
      '🟢 `abc123` • every 1h • <@u1> in default channel • "Hi" • next <t:1735689600:R>',
    );
    expect(formatScheduleLine(schedule({ state: 'paused' }))).toBe(
      '⏸️ `abc123` • every 1h • <@u1> in default channel • "Hi" • paused',
    );
  });

  it('explains how to start when nothing is scheduled', () => {
    expect(formatScheduleList([])).toBe('No schedules yet. Use `/pings add` or `/remind` to create one.');
    expect(formatTemplateList([])).toBe('No templates yet. Use `/reminder-template create` to add one.');
  });

  it('truncates long listings with a count of what was left out', () => {
    const schedules = Array.from({ length: 40 }, (_, index) =>
      schedule({ id: `schedule-${index}`, payload: { message: 'y'.repeat(80), targetUserId: 'u1', dm: false } }),
    );

    const output = formatScheduleList(schedules);
    const lines = output.split('\n');
    const kept = lines.length - 1;

    expect(output.length).toBeLessThanOrEqual(1900 + 20);
    expect(lines[lines.length - 1]).toBe(`…and ${40 - kept} more`);
    expect(lines[0]).toBe(formatScheduleLine(schedules[0]));
  });

  it('formats templates', () => {
    const template: TemplateRecord = {
      id: 't1',
      tenantId: 'guild-1',
      name: 'standup',
      payload: { message: 'Stand-up time', channelId: 'c1', dm: false },
      trigger: { kind: 'interval', everyMinutes: 1440 },
      createdAt: new Date('2025-01-01T00:00:00Z'),
      updatedAt: new Date('2025-01-01T00:00:00Z'),
    };

    expect(formatTemplateLine(template)).toBe('📄 **standup** • every 1d • <#c1> • "Stand-up time"');
  });

  it('renders local times in the tenant timezone', () => {
    expect(formatLocal(new Date('2025-01-01T14:00:00Z'), 'America/New_York')).toMatch(/^Jan 1, 2025,? 9:00\sAM$/);
  });
});
