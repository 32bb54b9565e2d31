// MARK: - Remind Command
// One-off reminders at a local date and time in the server timezone

import { MessageFlags, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { discordTimestamp, formatLocal, formatTarget } from '../services/ScheduleFormatter';
import type { ScheduleRecord, SchedulePayload } from '../store/types';
import { replyEphemeral, replyWithCommandError } from '../utils/interactionReplies';
import { logger } from '../utils/logger';
import { DELIVERY_CHANNEL_TYPES } from './pings';
import type { CommandServices } from './types';

export function buildReminderConfirmation(schedule: ScheduleRecord, timezone: string): string {
  if (schedule.state === 'completed' || !schedule.nextFireAt) {
    const when = schedule.trigger.kind === 'absolute' ? schedule.trigger.fireAt : 'that time';
    return (
      `⚠️ **Reminder Not Scheduled**\n\n` +
      `${when} has already passed in ${timezone}, so the reminder was closed without firing.`
    );
  }

  const lines = [
    '⏰ **Reminder Scheduled**',
    `• ID: \`${schedule.id}\``,
    `• When: ${formatLocal(schedule.nextFireAt, timezone)} ${timezone} (${discordTimestamp(schedule.nextFireAt)})`,
    `• Delivery: ${formatTarget(schedule.payload)}`,
    `• Note: ${schedule.payload.message}`,
  ];

  lines.push('\nYou can queue additional reminders anytime with `/remind`.');
  return lines.join('\n');
}

export const data = new SlashCommandBuilder()
  .setName('remind')
  .setDescription('Schedule a one-off reminder at a local date and time (Admin only)')
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addStringOption(option =>
    option
      .setName('at')
      .setDescription('Local date and time in the server timezone, e.g. 2025-01-01 09:00')
      .setRequired(true),
  )
  .addStringOption(option =>
    option.setName('message').setDescription('What to remind about').setMaxLength(1800).setRequired(true),
  )
  .addUserOption(option =>
    option.setName('target').setDescription('Member to remind (default: you)').setRequired(false),
  )
  .addBooleanOption(option =>
    option.setName('dm').setDescription('Deliver as a direct message').setRequired(false),
  )
  .addChannelOption(option =>
    option
      .setName('channel')
      .setDescription('Deliver into this channel instead of the current one')
      .addChannelTypes(...DELIVERY_CHANNEL_TYPES)
      .setRequired(false),
  );

export async function execute(interaction: ChatInputCommandInteraction, { registry }: CommandServices): Promise<void> {
  const guildId = interaction.guildId;
  if (!guildId) {
    await replyEphemeral(interaction, { content: '❌ This command can only be used within a server.' });
    return;
  }

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const fireAt = interaction.options.getString('at', true);
    const target = interaction.options.getUser('target') ?? interaction.user;
    const payload: SchedulePayload = {
      message: interaction.options.getString('message', true),
      targetUserId: target.id,
      channelId: interaction.options.getChannel('channel')?.id ?? interaction.channelId ?? undefined,
      dm: interaction.options.getBoolean('dm') ?? false,
    };

    const schedule = await registry.createSchedule(guildId, 'absolute', { kind: 'absolute', fireAt }, payload, {
      createdBy: interaction.user.id,
    });
    const tenant = await registry.getTenantSettings(guildId);

    await replyEphemeral(interaction, { content: buildReminderConfirmation(schedule, tenant.timezone) });

    logger.info('Reminder scheduled via command', {
      guildId,
      userId: interaction.user.id,
      scheduleId: schedule.id,
      state: schedule.state,
    });
  } catch (error) {
    await replyWithCommandError(interaction, 'remind', error);
  }
}
