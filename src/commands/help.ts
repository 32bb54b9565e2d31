// MARK: - Help Command
// Paged help for pings, reminders, templates and server settings

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
  EmbedBuilder,
  MessageFlags,
  SlashCommandBuilder,
} from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const COLLECTOR_TIMEOUT = 300000; // 5 minutes
const HELP_COLOR = 0x3498db;

type HelpPage = {
  title: string;
  description: string;
  fields: Array<{ name: string; value: string }>;
};

const HELP_PAGES: HelpPage[] = [
  {
    title: '📚 Ping Scheduler - Help',
    description:
      'Schedule recurring pings and one-off reminders for your server. ' +
      'Times you type are read in the server timezone (see `/server-config show`).',
    fields: [
      {
        name: '📖 Pages',
        value: '1️⃣ Overview (current)\n2️⃣ Recurring pings\n3️⃣ Reminders & templates\n4️⃣ Server settings',
      },
      {
        name: '🕒 Time format',
        value: '`YYYY-MM-DD HH:mm`, e.g. `2025-03-08 09:00`. Intervals are whole minutes.',
      },
    ],
  },
  {
    title: '🔁 Recurring Pings',
    description: 'Pings repeat on a fixed minute interval, keeping the local time of day across DST changes.',
    fields: [
      { name: '/pings add', value: 'Ping a member every N minutes, optionally from `start_at`, in a channel or by DM.' },
      { name: '/pings list', value: 'Show every schedule with its next delivery. `show_deleted` includes removed ones.' },
      { name: '/pings edit', value: 'Change the interval, start, message, target or channel. Use `at` to make it one-off.' },
      { name: '/pings pause • /pings resume', value: 'Pausing freezes a schedule. Resuming restarts the clock from now.' },
      { name: '/pings remove • /pings pause-all', value: 'Delete one schedule, or pause every active one in the server.' },
    ],
  },
  {
    title: '⏰ Reminders & Templates',
    description: 'One-off reminders fire once and then complete.',
    fields: [
      { name: '/remind', value: 'Remind a member (default: you) at a local date and time.' },
      { name: '/reminder-template create', value: 'Save a named reminder with a default `at` time or `every` interval.' },
      { name: '/reminder-template use', value: 'Schedule from a template, overriding the time, target or channel.' },
      { name: '/reminder-template list • delete', value: 'Browse or remove saved templates. Existing schedules keep running.' },
    ],
  },
  {
    title: '⚙️ Server Settings',
    description: 'Administrators configure where deliveries go and which timezone times are read in.',
    fields: [
      { name: '/server-config timezone', value: 'IANA name such as `Europe/Berlin`. Active schedules are re-timed.' },
      { name: '/server-config channel', value: 'Default channel for pings without their own channel.' },
      { name: '/server-config error-channel', value: 'Where failed deliveries (closed DMs, missing channels) are reported.' },
      { name: '/server-config show', value: 'Current timezone and channels.' },
    ],
  },
];

export function buildHelpEmbed(pageIndex: number): EmbedBuilder {
  const index = Math.min(Math.max(pageIndex, 0), HELP_PAGES.length - 1);
  const page = HELP_PAGES[index];

  return new EmbedBuilder()
    .setTitle(page.title)
    .setDescription(page.description)
    .setColor(HELP_COLOR)
    .addFields(page.fields.map(field => ({ ...field, inline: false })))
    .setFooter({ text: `Page ${index + 1} of ${HELP_PAGES.length}` });
}

export function helpPageCount(): number {
  return HELP_PAGES.length;
}

function createNavigationRow(currentPage: number, totalPages: number): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId('help_previous')
      .setLabel('Previous')
      .setStyle(ButtonStyle.Primary)
      .setEmoji('◀️')
      .setDisabled(currentPage === 0),
    new ButtonBuilder()
      .setCustomId('help_next')
      .setLabel('Next')
      .setStyle(ButtonStyle.Primary)
      .setEmoji('▶️')
      .setDisabled(currentPage === totalPages - 1),
    new ButtonBuilder()
      .setCustomId('help_close')
      .setLabel('Close')
      .setStyle(ButtonStyle.Danger)
      .setEmoji('❌'),
  );
}

export const data = new SlashCommandBuilder()
  .setName('help')
  .setDescription('How to schedule pings and reminders');

export async function execute(interaction: ChatInputCommandInteraction): Promise<void> {
  try {
    let currentPage = 0;
    const totalPages = helpPageCount();

    await interaction.reply({
      embeds: [buildHelpEmbed(currentPage)],
      components: [createNavigationRow(currentPage, totalPages)],
      flags: MessageFlags.Ephemeral,
    });
    const message = await interaction.fetchReply();

    const collector = message.createMessageComponentCollector({
      componentType: ComponentType.Button,
      time: COLLECTOR_TIMEOUT,
    });

    collector.on('collect', async buttonInteraction => {
      try {
        if (buttonInteraction.user.id !== interaction.user.id) {
          await buttonInteraction.reply({
            content: '❌ This help menu is not for you. Use `/help` to open your own.',
            flags: MessageFlags.Ephemeral,
          });
          return;
        }

        if (buttonInteraction.customId === 'help_close') {
          collector.stop('user_closed');
          await buttonInteraction.update({ content: '✅ Help menu closed.', embeds: [], components: [] });
          return;
        }

        currentPage = buttonInteraction.customId === 'help_previous'
          ? Math.max(0, currentPage - 1)
          : Math.min(totalPages - 1, currentPage + 1);

        await buttonInteraction.update({
          embeds: [buildHelpEmbed(currentPage)],
          components: [createNavigationRow(currentPage, totalPages)],
        });
      } catch (error) {
        logger.warn('Failed to update help menu', {
          userId: buttonInteraction.user.id,
          customId: buttonInteraction.customId,
          error: errorMessage(error),
        });
      }
    });

    collector.on('end', async (_, reason) => {
      if (reason !== 'time') {
        return;
      }
      try {
        await interaction.editReply({ content: '⏱️ Help menu timed out.', embeds: [], components: [] });
      } catch (error) {
        logger.debug('Failed to update timed-out help menu', { error: errorMessage(error) });
      }
    });

    logger.info('Help command executed', { userId: interaction.user.id });
  } catch (error) {
    logger.error('Help command failed', { userId: interaction.user.id, error: errorMessage(error) });

    if (!interaction.replied && !interaction.deferred) {
      await interaction
        .reply({
          content: '❌ An error occurred while loading help. Please try again.',
          flags: MessageFlags.Ephemeral,
        })
        .catch(replyError => {
          logger.error('Failed to send help error reply', { error: errorMessage(replyError) });
        });
    }
  }
}
