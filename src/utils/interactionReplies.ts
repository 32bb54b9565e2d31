// MARK: - Interaction Replies
// Ephemeral replies that clean themselves up, and error replies for commands

import { MessageFlags } from 'discord.js';
import type { InteractionReplyOptions, RepliableInteraction } from 'discord.js';
import { describeSchedulingError, errorMessage, errorStack, isSchedulingError } from './errors';
import { logger } from './logger';

export const EPHEMERAL_TTL_MS = 60_000;
const cleanupTimers = new WeakMap<RepliableInteraction, NodeJS.Timeout>();

export function scheduleReplyCleanup(interaction: RepliableInteraction, ttlMs = EPHEMERAL_TTL_MS): void {
  const existing = cleanupTimers.get(interaction);
  if (existing) {
    clearTimeout(existing);
  }

  const timeout = setTimeout(() => {
    cleanupTimers.delete(interaction);
    interaction.deleteReply().catch(error => {
      logger.debug('Ephemeral reply cleanup skipped', { error: errorMessage(error) });
    });
  }, ttlMs);

  cleanupTimers.set(interaction, timeout);
  timeout.unref();
}

/**
 * Replies (or follows up, when a reply already went out) with an ephemeral
 * message that is deleted after `ttlMs`
 */
export async function replyEphemeral(
  interaction: RepliableInteraction,
  options: Omit<InteractionReplyOptions, 'flags'>,
  ttlMs = EPHEMERAL_TTL_MS,
): Promise<void> {
  if (interaction.deferred) {
    await interaction.editReply({ content: options.content, embeds: options.embeds });
  } else if (interaction.replied) {
    await interaction.followUp({ ...options, flags: MessageFlags.Ephemeral });
    return;
  } else {
    await interaction.reply({ ...options, flags: MessageFlags.Ephemeral });
  }
  scheduleReplyCleanup(interaction, ttlMs);
}

/**
 * Scheduling errors become user-facing copy; anything else is logged and
 * answered with a generic failure. A reply that cannot be sent is logged.
 */
export async function replyWithCommandError(
  interaction: RepliableInteraction,
  commandName: string,
  error: unknown,
): Promise<void> {
  let content: string;
  if (isSchedulingError(error)) {
    logger.info('Command rejected', { commandName, code: error.code, reason: error.message });
    content = describeSchedulingError(error);
  } else {
    logger.error('Command failed', {
      commandName,
      userId: interaction.user.id,
      guildId: interaction.guildId,
      error: errorMessage(error),
      stack: errorStack(error),
    });
    content = '❌ Something went wrong while handling that command. Please try again later.';
  }

  try {
    await replyEphemeral(interaction, { content });
  } catch (replyError) {
    logger.error('Failed to send error reply', {
      commandName,
      guildId: interaction.guildId,
      error: errorMessage(replyError),
    });
  }
}
