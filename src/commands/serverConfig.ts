// MARK: - Server Config Command
// Timezone and delivery channels used by this server's schedules

import { ChannelType, EmbedBuilder, MessageFlags, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { formatLocal } from '../services/ScheduleFormatter';
import type { TenantRecord } from '../store/types';
import { replyEphemeral, replyWithCommandError } from '../utils/interactionReplies';
import { logger } from '../utils/logger';
import type { CommandServices } from './types';

export function buildSettingsEmbed(tenant: TenantRecord, now: Date = new Date()): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('⚙️ Scheduling Settings')
    .setColor(0x5865f2)
    .addFields(
      { name: 'Timezone', value: `${tenant.timezone} (now ${formatLocal(now, tenant.timezone)})`, inline: false },
      {
        name: 'Delivery channel',
        value: tenant.destinationChannelId ? `<#${tenant.destinationChannelId}>` : 'Not set',
        inline: true,
      },
      {
        name: 'Error channel',
        value: tenant.errorChannelId ? `<#${tenant.errorChannelId}>` : 'Not set',
        inline: true,
      },
    );
}

export const data = new SlashCommandBuilder()
  .setName('server-config')
  .setDescription('Configure scheduling for this server (Admin only)')
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addSubcommand(sub =>
    sub
      .setName('timezone')
      .setDescription('Set the timezone used to read reminder times')
      .addStringOption(option =>
        option.setName('name').setDescription('IANA timezone, e.g. America/New_York').setRequired(true),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('channel')
      .setDescription('Set the default channel for pings and reminders')
      .addChannelOption(option =>
        option
          .setName('channel')
          .setDescription('Default delivery channel')
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
          .setRequired(true),
      ),
  )
  .addSubcommand(sub =>
    sub
      .setName('error-channel')
      .setDescription('Set the channel where failed deliveries are reported')
      .addChannelOption(option =>
        option
          .setName('channel')
          .setDescription('Channel for delivery failure reports')
          .addChannelTypes(ChannelType.GuildText)
          .setRequired(true),
      ),
  )
  .addSubcommand(sub => sub.setName('show').setDescription('Show the current scheduling settings'));

export async function execute(interaction: ChatInputCommandInteraction, { registry }: CommandServices): Promise<void> {
  const guildId = interaction.guildId;
  if (!guildId) {
    await replyEphemeral(interaction, { content: '❌ This command must be used inside the server.' });
    return;
  }

  const sub = interaction.options.getSubcommand(true);

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    switch (sub) {
      case 'timezone': {
        const { tenant, recomputed } = await registry.setTenantTimezone(guildId, interaction.options.getString('name', true));
        const suffix = recomputed > 0 ? ` Re-timed ${recomputed} active schedule${recomputed === 1 ? '' : 's'}.` : '';
        await replyEphemeral(interaction, { content: `✅ Timezone set to **${tenant.timezone}**.${suffix}` });
        break;
      }
      case 'channel': {
        const channel = interaction.options.getChannel('channel', true);
        await registry.setTenantDestination(guildId, channel.id);
        await replyEphemeral(interaction, { content: `✅ Pings and reminders will post in <#${channel.id}> by default.` });
        break;
      }
      case 'error-channel': {
        const channel = interaction.options.getChannel('channel', true);
        await registry.setTenantErrorChannel(guildId, channel.id);
        await replyEphemeral(interaction, { content: `✅ Failed deliveries will be reported in <#${channel.id}>.` });
        break;
      }
      case 'show': {
        const tenant = await registry.getTenantSettings(guildId);
        await replyEphemeral(interaction, { embeds: [buildSettingsEmbed(tenant)] });
        break;
      }
      default:
        await replyEphemeral(interaction, { content: '❌ Unknown subcommand.' });
        return;
    }

    logger.info('Server config updated', { guildId, subcommand: sub, userId: interaction.user.id });
  } catch (error) {
    await replyWithCommandError(interaction, `server-config ${sub}`, error);
  }
}
