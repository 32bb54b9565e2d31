// MARK: - Reminder Template Command
// Named reminder definitions that can be reused with /reminder-template use

import { MessageFlags, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { MAX_INTERVAL_MINUTES, MIN_INTERVAL_MINUTES } from '../services/TimeResolver';
import type { TemplateOverrides } from '../services/ScheduleRegistry';
import { formatTemplateLine, formatTemplateList } from '../services/ScheduleFormatter';
import type { SchedulePayload, TriggerSpec } from '../store/types';
import { InvalidTriggerError } from '../utils/errors';
import { replyEphemeral, replyWithCommandError } from '../utils/interactionReplies';
import { logger } from '../utils/logger';
import { DELIVERY_CHANNEL_TYPES, buildPingConfirmation } from './pings';
import { buildReminderConfirmation } from './remind';
import type { CommandServices } from './types';

export type TriggerOptions = {
  at?: string | null;
  every?: number | null;
  startAt?: string | null;
};

/**
 * Builds a trigger from `at` (one-off) or `every` (+ optional `start_at`).
 * Returns undefined when neither was given.
 */
export function buildTriggerFromOptions(options: TriggerOptions): TriggerSpec | undefined {
  const { at, every, startAt } = options;

  if (at && every) {
    throw new InvalidTriggerError('Use either `at` or `every`, not both');
  }
  if (at) {
    return { kind: 'absolute', fireAt: at };
  }
  if (every) {
    return startAt ? { kind: 'interval', everyMinutes: every, startsAt: startAt } : { kind: 'interval', everyMinutes: every };
  }
  if (startAt) {
    throw new InvalidTriggerError('`start_at` only applies together with `every`');
  }
  return undefined;
}

export const data = new SlashCommandBuilder()
  .setName('reminder-template')
  .setDescription('Save and reuse reminder definitions (Admin only)')
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addSubcommand(sub =>
    sub
      .setName('create')
      .setDescription('Save a reusable reminder')
      .addStringOption(option => option.setName('name').setDescription('Template name').setMaxLength(64).setRequired(true))
      .addStringOption(option =>
        option.setName('message').setDescription('Reminder text').setMaxLength(1800).setRequired(true),
      )
      .addStringOption(option =>
        option.setName('at').setDescription('Default local date and time, e.g. 2025-01-01 09:00').setRequired(false),
      )
      .addIntegerOption(option =>
        option
          .setName('every')
          .setDescription('Make it a recurring ping every N minutes')
          .setMinValue(MIN_INTERVAL_MINUTES)
          .setMaxValue(MAX_INTERVAL_MINUTES)
          .setRequired(false),
      )
      .addStringOption(option =>
        option.setName('start_at').setDescription('Local time of the first recurring ping').setRequired(false),
      )
      .addUserOption(option => option.setName('target').setDescription('Member to mention').setRequired(false))
      .addBooleanOption(option => option.setName('dm').setDescription('Deliver as a direct message').setRequired(false))
      .addChannelOption(option =>
        option
          .setName('channel')
          .setDescription('Delivery channel (default: server delivery channel)')
          .addChannelTypes(...DELIVERY_CHANNEL_TYPES)
          .setRequired(false),
      ),
  )
  .addSubcommand(sub => sub.setName('list').setDescription('List saved templates'))
  .addSubcommand(sub =>
    sub
      .setName('delete')
      .setDescription('Delete a saved template')
      .addStringOption(option => option.setName('name').setDescription('Template name').setRequired(true)),
  )
  .addSubcommand(sub =>
    sub
      .setName('use')
      .setDescription('Schedule a reminder from a template')
      .addStringOption(option => option.setName('name').setDescription('Template name').setRequired(true))
      .addStringOption(option =>
        option.setName('at').setDescription('Override the local date and time').setRequired(false),
      )
      .addIntegerOption(option =>
        option
          .setName('every')
          .setDescription('Override with a recurring interval in minutes')
          .setMinValue(MIN_INTERVAL_MINUTES)
          .setMaxValue(MAX_INTERVAL_MINUTES)
          .setRequired(false),
      )
      .addUserOption(option => option.setName('target').setDescription('Override the member to mention').setRequired(false))
      .addChannelOption(option =>
        option
          .setName('channel')
          .setDescription('Override the delivery channel')
          .addChannelTypes(...DELIVERY_CHANNEL_TYPES)
          .setRequired(false),
      ),
  );

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
      case 'create': {
        const trigger = buildTriggerFromOptions({
          at: interaction.options.getString('at'),
          every: interaction.options.getInteger('every'),
          startAt: interaction.options.getString('start_at'),
        });
        if (!trigger) {
          await replyEphemeral(interaction, { content: '❌ Provide a default `at` time or an `every` interval.' });
          return;
        }

        const target = interaction.options.getUser('target');
        const payload: SchedulePayload = {
          message: interaction.options.getString('message', true),
          targetUserId: target?.id,
          channelId: interaction.options.getChannel('channel')?.id,
          dm: interaction.options.getBoolean('dm') ?? false,
        };

        const template = await registry.createTemplate(guildId, interaction.options.getString('name', true), payload, trigger, {
          createdBy: interaction.user.id,
        });
        await replyEphemeral(interaction, {
          content: `✅ **Template Saved**\n${formatTemplateLine(template)}\n\nUse \`/reminder-template use name:${template.name}\` to schedule it.`,
        });
        break;
      }
      case 'list': {
        const templates = await registry.listTemplates(guildId);
        await replyEphemeral(interaction, { content: `📄 **Templates**\n${formatTemplateList(templates)}` });
        break;
      }
      case 'delete': {
        await registry.deleteTemplate(guildId, interaction.options.getString('name', true));
        await replyEphemeral(interaction, { content: '🗑️ Template deleted. Schedules created from it keep running.' });
        break;
      }
      case 'use': {
        const overrides: TemplateOverrides = {};
        const trigger = buildTriggerFromOptions({
          at: interaction.options.getString('at'),
          every: interaction.options.getInteger('every'),
        });
        if (trigger) {
          overrides.trigger = trigger;
        }

        const target = interaction.options.getUser('target');
        const channel = interaction.options.getChannel('channel');
        if (target || channel) {
          overrides.payload = {
            ...(target ? { targetUserId: target.id } : {}),
            ...(channel ? { channelId: channel.id } : {}),
          };
        }

        const schedule = await registry.instantiateTemplateByName(guildId, interaction.options.getString('name', true), overrides, {
          createdBy: interaction.user.id,
        });
        const tenant = await registry.getTenantSettings(guildId);
        const content = schedule.kind === 'absolute'
          ? buildReminderConfirmation(schedule, tenant.timezone)
          : buildPingConfirmation(schedule, tenant.timezone);
        await replyEphemeral(interaction, { content });
        break;
      }
      default:
        await replyEphemeral(interaction, { content: '❌ Unknown subcommand.' });
        return;
    }

    logger.info('Reminder template command handled', { guildId, subcommand: sub, userId: interaction.user.id });
  } catch (error) {
    await replyWithCommandError(interaction, `reminder-template ${sub}`, error);
  }
}
