// MARK: - Error Notifier Service
// Posts delivery failures to a tenant's configured error channel

import { EmbedBuilder } from 'discord.js';
import type { Client } from 'discord.js';
import type { DeliveryFailureReporter } from './Dispatcher';
import type { DeliveryRequest } from './DeliverySink';
import type { TenantRecord } from '../store/types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const EMBED_FIELD_LIMIT = 1024;

/**
 * Format context object as readable lines, capped to the embed field limit
 */
export function formatContext(context: Record<string, unknown>): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `**${key}**: ${JSON.stringify(value)}`)
    .join('\n')
    .slice(0, EMBED_FIELD_LIMIT);
}

export function buildDeliveryFailureEmbed(request: DeliveryRequest, reason: string): EmbedBuilder {
  const destination = request.destination
    ? request.destination.type === 'dm'
      ? `DM to <@${request.destination.userId}>`
      : `<#${request.destination.channelId}>`
    : 'none configured';

  return new EmbedBuilder()
    .setTitle('⚠️ Scheduled delivery failed')
    .setDescription(reason.slice(0, 4096))
    .setColor(0xffaa00)
    .setTimestamp()
    .addFields(
      { name: 'Destination', value: destination, inline: true },
      { name: 'Schedule', value: `\`${request.scheduleId}\``, inline: true },
      {
        name: 'Details',
        value: formatContext({ scheduledFor: request.scheduledFor.toISOString(), dm: request.payload.dm }),
        inline: false,
      },
    );
}

export class ErrorNotifier implements DeliveryFailureReporter {
  constructor(private readonly client: Client) {}

  async reportDeliveryFailure(tenant: TenantRecord, request: DeliveryRequest, reason: string): Promise<void> {
    if (!tenant.errorChannelId) {
      logger.debug('No error channel configured', { tenantId: tenant.tenantId });
      return;
    }

    // Never report into the channel that just failed
    if (request.destination?.type === 'channel' && request.destination.channelId === tenant.errorChannelId) {
      return;
    }

    try {
      const channel = await this.client.channels.fetch(tenant.errorChannelId);
      if (!channel || !channel.isTextBased() || !('send' in channel)) {
        logger.warn('Error channel not found or not text-based', {
          tenantId: tenant.tenantId,
          channelId: tenant.errorChannelId,
        });
        return;
      }

      await channel.send({ embeds: [buildDeliveryFailureEmbed(request, reason)] });
      logger.info('Delivery failure reported', { tenantId: tenant.tenantId, scheduleId: request.scheduleId });
    } catch (error) {
      logger.error('Failed to send error notification', {
        tenantId: tenant.tenantId,
        originalError: reason,
        notifyError: errorMessage(error),
      });
    }
  }
}
