// MARK: - Schedule Formatter
// Discord-flavoured text for schedule and template listings

import type { ScheduleRecord, ScheduleState, SchedulePayload, TemplateRecord, TriggerSpec } from '../store/types';

const STATE_ICONS: Record<ScheduleState, string> = {
  active: '🟢',
  paused: '⏸️',
  completed: '✅',
  deleted: '🗑️',
};

const LIST_CHAR_LIMIT = 1900;
const MESSAGE_PREVIEW_LENGTH = 60;

export function formatMinutes(totalMinutes: number): string {
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;

  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes || parts.length === 0) parts.push(`${minutes}m`);
  return parts.join(' ');
}

export function formatTrigger(trigger: TriggerSpec): string {
  switch (trigger.kind) {
    case 'interval':
      return trigger.startsAt
        ? `every ${formatMinutes(trigger.everyMinutes)} from ${trigger.startsAt}`
        : `every ${formatMinutes(trigger.everyMinutes)}`;
    case 'absolute':
      return `at ${trigger.fireAt}`;
  }
}

export function formatTarget(payload: SchedulePayload): string {
  if (payload.dm && payload.targetUserId) {
    return `DM <@${payload.targetUserId}>`;
  }

  const channel = payload.channelId ? `<#${payload.channelId}>` : 'default channel';
  return payload.targetUserId ? `<@${payload.targetUserId}> in ${channel}` : channel;
}

export function previewMessage(message: string): string {
  const singleLine = message.replace(/\s+/g, ' ');
  return singleLine.length > MESSAGE_PREVIEW_LENGTH
    ? `${singleLine.slice(0, MESSAGE_PREVIEW_LENGTH - 3)}...`
    : singleLine;
}

export function discordTimestamp(date: Date, style: 'F' | 'f' | 'R' = 'R'): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:${style}>`;
}

export function formatScheduleLine(schedule: ScheduleRecord): string {
  let line = `${STATE_ICONS[schedule.state]} \`${schedule.id}\` • ${formatTrigger(schedule.trigger)}`;
  line += ` • ${formatTarget(schedule.payload)} • "${previewMessage(schedule.payload.message)}"`;

  if (schedule.nextFireAt && schedule.state === 'active') {
    line += ` • next ${discordTimestamp(schedule.nextFireAt)}`;
  } else if (schedule.state !== 'active') {
    line += ` • ${schedule.state}`;
  }

  return line;
}

/**
 * Joins lines until the Discord message budget runs out
 */
function joinWithinLimit(lines: string[]): string {
  const kept: string[] = [];
  let length = 0;

  for (const line of lines) {
    if (length + line.length + 1 > LIST_CHAR_LIMIT) {
      kept.push(`…and ${lines.length - kept.length} more`);
      break;
    }
    kept.push(line);
    length += line.length + 1;
  }

  return kept.join('\n');
}

export function formatScheduleList(schedules: ScheduleRecord[]): string {
  if (schedules.length === 0) {
    return 'No schedules yet. Use `/pings add` or `/remind` to create one.';
  }
  return joinWithinLimit(schedules.map(formatScheduleLine));
}

export function formatTemplateLine(template: TemplateRecord): string {
  return `📄 **${template.name}** • ${formatTrigger(template.trigger)} • ${formatTarget(template.payload)} • "${previewMessage(template.payload.message)}"`;
}

export function formatTemplateList(templates: TemplateRecord[]): string {
  if (templates.length === 0) {
    return 'No templates yet. Use `/reminder-template create` to add one.';
  }
  return joinWithinLimit(templates.map(formatTemplateLine));
}

/**
 * Local wall-clock rendering in the tenant timezone
 */
export function formatLocal(date: Date, timezone: string): string {
  return date.toLocaleString('en-US', {
    dateStyle: 'medium',
    timeStyle: 'short',
    timeZone: timezone,
  });
}
