// MARK: - Delivery Sink Contract
// What the dispatcher hands to the transport, and what it gets back

import type { SchedulePayload, TenantRecord } from '../store/types';

export type DeliveryDestination =
  | { type: 'channel'; channelId: string }
  | { type: 'dm'; userId: string };

export interface DeliveryRequest {
  tenantId: string;
  scheduleId: string;
  destination: DeliveryDestination | null;
  payload: SchedulePayload;
  scheduledFor: Date;
}

export type DeliveryResult =
  | { status: 'acknowledged' }
  | { status: 'failed'; reason: string };

export interface DeliverySink {
  deliver(request: DeliveryRequest): Promise<DeliveryResult>;
}

/**
 * Resolves where a payload goes at delivery time: a DM to the target user,
 * else the payload channel, else the tenant's default channel.
 */
export function resolveDestination(
  payload: SchedulePayload,
  tenant: Pick<TenantRecord, 'destinationChannelId'> | null,
): DeliveryDestination | null {
  if (payload.dm && payload.targetUserId) {
    return { type: 'dm', userId: payload.targetUserId };
  }

  const channelId = payload.channelId ?? tenant?.destinationChannelId;
  return channelId ? { type: 'channel', channelId } : null;
}
