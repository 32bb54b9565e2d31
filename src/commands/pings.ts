// MARK: - Pings Command
// Recurring pings: add, list, edit, pause, resume and remove

import {
  ChannelType,
  MessageFlags,
  PermissionFlagsBits,
  SlashCommandBuilder,
} from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { MAX_INTERVAL_MINUTES, MIN_INTERVAL_MINUTES } from '../services/TimeResolver';
import type { ScheduleRegistry } from '../services/ScheduleRegistry';
import {
  discordTimestamp,
  formatLocal,
  formatScheduleList,
  formatTarget,
  formatTrigger,
} from '../services/ScheduleFormatter';
import type { ScheduleRecord, SchedulePayload, TriggerSpec } from '../store/types';
import { InvalidTriggerError } from '../utils/errors';
import { replyEphemeral, replyWithCommandError } from '../utils/interactionReplies';
import { logger } from '../utils/logger';
import type { CommandServices } from './types';

export const DELIVERY_CHANNEL_TYPES = [
  ChannelType.GuildText,
  ChannelType.GuildAnnouncement,
  ChannelType.PublicThread,
  ChannelType.PrivateThread,
  ChannelType.AnnouncementThread,
] as const;

export type TriggerEdits = {
  everyMinutes?: number | null;
  startsAt?: string | null;
  fireAt?: string | null;
};

/**
 * Merges trigger options from `/pings edit` into the current trigger.
 * Returns undefined when no trigger option was given.
 */
export function buildEditedTrigger(current: TriggerSpec, edits: TriggerEdits): TriggerSpec | undefined {
  const { everyMinutes, startsAt, fireAt } = edits;

  if (fireAt) {
    if (everyMinutes || startsAt) {
      throw new InvalidTriggerError('Use either `at` for a one-off reminder or `interval` for a recurring ping');
    }
    return { kind: 'absolute', fireAt };
  }

  if (!everyMinutes && !startsAt) {
    return undefined;
  }

  const base = current.kind === 'interval' ? current : null;
  const minutes = everyMinutes ?? base?.everyMinutes;
  if (!minutes) {
    throw new InvalidTriggerError('Provide an `interval` to turn this reminder into a recurring ping');
  }

  const start = startsAt ?? base?.startsAt;
  return start ? { kind: 'interval', everyMinutes: minutes, startsAt: start } : { kind: 'interval', everyMinutes: minutes };
}

export function buildPingConfirmation(schedule: ScheduleRecord, timezone: string): string {
  const lines = [
    '✅ **Ping Scheduled**',
    `• ID: \`${schedule.id}\``,
    `• Schedule: ${formatTrigger(schedule.trigger)} (${timezone})`,
    `• Delivery: ${formatTarget(schedule.payload)}`,
    `• Message: ${schedule.payload.message}`,
  ];

  if (schedule.nextFireAt) {
    lines.push(
      `• Next: ${formatLocal(schedule.nextFireAt, timezone)} (${discordTimestamp(schedule.nextFireAt)})`,
    );
  }

  lines.push('\nManage it with `/pings list`, `/pings edit` or `/pings pause`.');
  return lines.join('\n');
}

export function buildUpdateConfirmation(schedule: ScheduleRecord, verb: string): string {
  const next = schedule.state === 'active' && schedule.nextFireAt
    ? ` Next delivery ${discordTimestamp(schedule.nextFireAt)}.`
    : '';
  return `✅ Schedule \`${schedule.id}\` ${verb} (${schedule.state}).${next}`;
}

export const data = new SlashCommandBuilder()
  .setName('pings')
  .setDescription('Manage recurring pings for this server (Admin only)')
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addSubcommand(sub =>
    sub
      .setName('add')
      .setDescription('Ping a member every N minutes')
      .addUserOption(option =>
        option.setName('target').setDescription('Member to ping').setRequired(true),
      )
      .addIntegerOption(option =>
        option
          .setName('interval')
          .setDescription('Minutes between pings')
          .setMinValue(MIN_INTERVAL_MINUTES)
          .setMaxValue(MAX_INTERVAL_MINUTES)
          .setRequired(true),
      )
      .addStringOption(option =>
        option.setName('message').setDescription('Message to send').setMaxLength(1800).setRequired(true),
      )
      .addBooleanOption(option =>
        option.setName('dm').setDescription('Send as a direct message instead of a channel ping').setRequired(false),
      )
      .addChannelOption(option =>
        option
          .setName('channel')
          .setDescription('Channel to ping in (default: the channel you run this in)')
          .addChannelTypes(...DELIVERY_CHANNEL_TYPES)
          .setRequired(false),
      )
      .addStringOption(option =>
        option
          .setName('start_at')
          .setDescription('Local time of the first ping, e.g. 2025-03-08 09:00')
          .setRequired(false),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('list')
      .setDescription('List pings and reminders for this server')
      .addBooleanOption(option =>
        option.setName('show_deleted').setDescription('Include deleted schedules').setRequired(false),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('edit')
      .setDescription('Edit a ping or reminder')
      .addStringOption(option => option.setName('id').setDescription('Schedule ID').setRequired(true))
      .addIntegerOption(option =>
        option
          .setName('interval')
          .setDescription('New minutes between pings')
          .setMinValue(MIN_INTERVAL_MINUTES)
          .setMaxValue(MAX_INTERVAL_MINUTES)
          .setRequired(false),
      )
      .addStringOption(option =>
        option.setName('start_at').setDescription('New local start time, e.g. 2025-03-08 09:00').setRequired(false),
      )
      .addStringOption(option =>
        option.setName('at').setDescription('Turn into a one-off reminder at this local time').setRequired(false),
      )
      .addStringOption(option =>
        option.setName('message').setDescription('New message').setMaxLength(1800).setRequired(false),
      )
      .addUserOption(option => option.setName('target').setDescription('New member to ping').setRequired(false))
      .addBooleanOption(option => option.setName('dm').setDescription('Deliver as a DM').setRequired(false))
      .addChannelOption(option =>
        option
          .setName('channel')
          .setDescription('New delivery channel')
          .addChannelTypes(...DELIVERY_CHANNEL_TYPES)
          .setRequired(false),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('pause')
      .setDescription('Pause a ping or reminder')
      .addStringOption(option => option.setName('id').setDescription('Schedule ID').setRequired(true)),
  )
  .addSubcommand(sub =>
    sub
      .setName('resume')
      .setDescription('Resume a paused ping; the clock restarts from now')
      .addStringOption(option => option.setName('id').setDescription('Schedule ID').setRequired(true)),
  )
  .addSubcommand(sub =>
    sub
      .setName('remove')
      .setDescription('Delete a ping or reminder')
      .addStringOption(option => option.setName('id').setDescription('Schedule ID').setRequired(true)),
  )
  .addSubcommand(sub => sub.setName('pause-all').setDescription('Pause every active ping and reminder in this server'));

async function handleAdd(interaction: ChatInputCommandInteraction, registry: ScheduleRegistry, guildId: string): Promise<void> {
  const target = interaction.options.getUser('target', true);
  const everyMinutes = interaction.options.getInteger('interval', true);
  const startsAt = interaction.options.getString('start_at') ?? undefined;
  const payload: SchedulePayload = {
    message: interaction.options.getString('message', true),
    targetUserId: target.id,
    // Posts where the command was run unless a channel is given
    channelId: interaction.options.getChannel('channel')?.id ?? interaction.channelId ?? undefined,
    dm: interaction.options.getBoolean('dm') ?? false,
  };

  const trigger: TriggerSpec = startsAt
    ? { kind: 'interval', everyMinutes, startsAt }
    : { kind: 'interval', everyMinutes };

  const schedule = await registry.createSchedule(guildId, 'interval', trigger, payload, {
    createdBy: interaction.user.id,
  });
  const tenant = await registry.getTenantSettings(guildId);

  await replyEphemeral(interaction, { content: buildPingConfirmation(schedule, tenant.timezone) });
}

async function handleEdit(interaction: ChatInputCommandInteraction, registry: ScheduleRegistry, guildId: string): Promise<void> {
  const id = interaction.options.getString('id', true).trim();
  const current = await registry.getSchedule(guildId, id);

  const trigger = buildEditedTrigger(current.trigger, {
    everyMinutes: interaction.options.getInteger('interval'),
    startsAt: interaction.options.getString('start_at'),
    fireAt: interaction.options.getString('at'),
  });

  const payload: Partial<SchedulePayload> = {};
  const message = interaction.options.getString('message');
  const target = interaction.options.getUser('target');
  const dm = interaction.options.getBoolean('dm');
  const channel = interaction.options.getChannel('channel');
  if (message !== null) payload.message = message;
  if (target) payload.targetUserId = target.id;
  if (dm !== null) payload.dm = dm;
  if (channel) payload.channelId = channel.id;

  if (!trigger && Object.keys(payload).length === 0) {
    await replyEphemeral(interaction, { content: '⚠️ Nothing to change. Pass at least one option to edit.' });
    return;
  }

  const updated = await registry.editSchedule(guildId, id, {
    trigger,
    payload: Object.keys(payload).length > 0 ? payload : undefined,
  });

  await replyEphemeral(interaction, { content: buildUpdateConfirmation(updated, 'updated') });
}

export async function execute(interaction: ChatInputCommandInteraction, { registry }: CommandServices): Promise<void> {
  const guildId = interaction.guildId;
  if (!guildId) {
    await replyEphemeral(interaction, { content: '❌ This command can only be used within a server.' });
    return;
  }

  const sub = interaction.options.getSubcommand(true);

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    switch (sub) {
      case 'add':
        await handleAdd(interaction, registry, guildId);
        break;
      case 'list': {
        const schedules = await registry.listSchedules(guildId, {
          includeDeleted: interaction.options.getBoolean('show_deleted') ?? false,
        });
        await replyEphemeral(interaction, { content: `📋 **Schedules**\n${formatScheduleList(schedules)}` });
        break;
      }
      case 'edit':
        await handleEdit(interaction, registry, guildId);
        break;
      case 'pause': {
        const schedule = await registry.pauseSchedule(guildId, interaction.options.getString('id', true).trim());
        await replyEphemeral(interaction, { content: buildUpdateConfirmation(schedule, 'paused') });
        break;
      }
      case 'resume': {
        const schedule = await registry.resumeSchedule(guildId, interaction.options.getString('id', true).trim());
        await replyEphemeral(interaction, { content: buildUpdateConfirmation(schedule, 'resumed') });
        break;
      }
      case 'remove': {
        const schedule = await registry.deleteSchedule(guildId, interaction.options.getString('id', true).trim());
        await replyEphemeral(interaction, { content: buildUpdateConfirmation(schedule, 'removed') });
        break;
      }
      case 'pause-all': {
        const paused = await registry.pauseAll(guildId);
        await replyEphemeral(interaction, {
          content: paused > 0
            ? `⏸️ Paused ${paused} schedule${paused === 1 ? '' : 's'}. Use \`/pings resume\` to restart them one by one.`
            : '⚠️ There were no active schedules to pause.',
        });
        break;
      }
      default:
        await replyEphemeral(interaction, { content: '❌ Unknown subcommand.' });
        return;
    }

    logger.info('Pings command handled', { guildId, subcommand: sub, userId: interaction.user.id });
  } catch (error) {
    await replyWithCommandError(interaction, `pings ${sub}`, error);
  }
}
