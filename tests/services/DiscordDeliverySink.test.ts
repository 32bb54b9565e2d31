import { afterEach, describe, expect, it } from 'vitest';
import { Client } from 'discord.js';
import { DiscordDeliverySink, buildDeliveryMessage } from '../../src/services/DiscordDeliverySink';
import { resolveDestination } from '../../src/services/DeliverySink';
import type { DeliveryRequest } from '../../src/services/DeliverySink';

const request: DeliveryRequest = {
  tenantId: 'guild-1',
  scheduleId: 's1',
  destination: { type: 'channel', channelId: 'c1' },
  payload: { message: 'Stand-up', targetUserId: 'u1', dm: false },
  scheduledFor: new Date('2025-01-01T09:00:00Z'),
};

describe('DiscordDeliverySink', () => {
  let client: Client | null = null;

  afterEach(async () => {
    await client?.destroy();
    client = null;
  });

  it('mentions the target in channel deliveries only', () => {
    expect(buildDeliveryMessage(request.payload, 'channel')).toBe('<@u1> Stand-up');
    expect(buildDeliveryMessage(request.payload, 'dm')).toBe('Stand-up');
    expect(buildDeliveryMessage({ message: 'No target', dm: false }, 'channel')).toBe('No target');
  });

  it('caps messages at the Discord limit', () => {
    expect(buildDeliveryMessage({ message: 'z'.repeat(2100), targetUserId: 'u1', dm: false }, 'channel')).toHaveLength(
      2000,
    );
  });

  it('fails without a destination', async () => {
    client = new Client({ intents: [] });
    const sink = new DiscordDeliverySink(client);

    expect(await sink.deliver({ ...request, destination: null })).toEqual({
      status: 'failed',
      reason: 'No delivery destination configured',
    });
  });

  it('fails while the client is not logged in', async () => {
    client = new Client({ intents: [] });
    const sink = new DiscordDeliverySink(client);

    expect(await sink.deliver(request)).toEqual({ status: 'failed', reason: 'Client not ready' });
  });
});

describe('resolveDestination', () => {
  it('prefers a DM, then the payload channel, then the tenant default', () => {
    expect(resolveDestination({ message: 'x', targetUserId: 'u1', channelId: 'c1', dm: true }, null)).toEqual({
      type: 'dm',
      userId: 'u1',
    });
    expect(resolveDestination({ message: 'x', channelId: 'c1', dm: false }, { destinationChannelId: 'c2' })).toEqual({
      type: 'channel',
      channelId: 'c1',
    });
    expect(resolveDestination({ message: 'x', dm: false }, { destinationChannelId: 'c2' })).toEqual({
      type: 'channel',
      channelId: 'c2',
    });
    expect(resolveDestination({ message: 'x', dm: false }, {})).toBeNull();
  });
});
