// MARK: - Discord Delivery Sink
// Sends due pings and reminders through the Discord client

import type { Client } from 'discord.js';
import type { DeliveryRequest, DeliveryResult, DeliverySink } from './DeliverySink';
import type { SchedulePayload } from '../store/types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const DISCORD_MESSAGE_LIMIT = 2000;
const CANNOT_MESSAGE_USER = 50007;

type SendableChannel = { send: (content: string) => Promise<unknown> };

/**
 * Channel deliveries mention the target user; DMs carry the bare message
 */
export function buildDeliveryMessage(payload: SchedulePayload, via: 'channel' | 'dm'): string {
  const content = via === 'channel' && payload.targetUserId
    ? `<@${payload.targetUserId}> ${payload.message}`
    : payload.message;
  return content.slice(0, DISCORD_MESSAGE_LIMIT);
}

function isSendableChannel(channel: unknown): channel is SendableChannel {
  return typeof channel === 'object' && channel !== null && 'send' in channel && typeof channel.send === 'function';
}

function discordErrorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

export class DiscordDeliverySink implements DeliverySink {
  constructor(private readonly client: Client) {}

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    const { destination } = request;
    if (!destination) {
      return { status: 'failed', reason: 'No delivery destination configured' };
    }

    if (!this.client.isReady()) {
      return { status: 'failed', reason: 'Client not ready' };
    }

    try {
      if (destination.type === 'dm') {
        const user = await this.client.users.fetch(destination.userId);
        await user.send(buildDeliveryMessage(request.payload, 'dm'));
        return { status: 'acknowledged' };
      }

      const channel = await this.client.channels.fetch(destination.channelId);
      if (!channel || !channel.isTextBased() || !isSendableChannel(channel)) {
        return { status: 'failed', reason: 'Channel not found or not text-based' };
      }

      await channel.send(buildDeliveryMessage(request.payload, 'channel'));
      return { status: 'acknowledged' };
    } catch (error) {
      if (discordErrorCode(error) === CANNOT_MESSAGE_USER) {
        return { status: 'failed', reason: 'DMs closed' };
      }

      logger.error('Discord delivery failed', {
        scheduleId: request.scheduleId,
        tenantId: request.tenantId,
        destination: destination.type,
        error: errorMessage(error),
      });

      return { status: 'failed', reason: errorMessage(error) };
    }
  }
}
