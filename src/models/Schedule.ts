// MARK: - Schedule Model
// Recurring pings and one-off reminders with a denormalized next fire time

import mongoose, { Schema, Types } from 'mongoose';
import type { DeliveryStatus, ScheduleKind, ScheduleState } from '../store/types';

export const SCHEDULE_KINDS: ScheduleKind[] = ['interval', 'absolute'];
export const SCHEDULE_STATES: ScheduleState[] = ['active', 'paused', 'completed', 'deleted'];

export interface IStoredTrigger {
  kind: ScheduleKind;
  everyMinutes?: number;
  startsAt?: string;
  fireAt?: string;
}

export interface IStoredPayload {
  message: string;
  targetUserId?: string;
  channelId?: string;
  dm: boolean;
}

export interface ISchedule {
  tenantId: string;
  kind: ScheduleKind;
  trigger: IStoredTrigger;
  payload: IStoredPayload;
  state: ScheduleState;
  nextFireAt: Date | null;
  anchorLocal?: string;
  version: number;
  createdBy?: string;
  templateId?: string;
  fireCount: number;
  lastFiredAt?: Date;
  lastDeliveryStatus?: DeliveryStatus;
  failureReason?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanSchedule = ISchedule & { _id: Types.ObjectId };

export const TriggerSchema = new Schema<IStoredTrigger>(
  {
    kind: {
      type: String,
      enum: SCHEDULE_KINDS,
      required: true,
    },
    everyMinutes: {
      type: Number,
      min: 1,
    },
    startsAt: {
      type: String,
    },
    fireAt: {
      type: String,
    },
  },
  { _id: false },
);

export const PayloadSchema = new Schema<IStoredPayload>(
  {
    message: {
      type: String,
      required: true,
      maxlength: 1800,
    },
    targetUserId: {
      type: String,
    },
    channelId: {
      type: String,
    },
    dm: {
      type: Boolean,
      default: false,
    },
  },
  { _id: false },
);

const ScheduleSchema = new Schema<ISchedule>({
  tenantId: {
    type: String,
    required: true,
    index: true,
  },
  kind: {
    type: String,
    enum: SCHEDULE_KINDS,
    required: true,
  },
  trigger: {
    type: TriggerSchema,
    required: true,
  },
  payload: {
    type: PayloadSchema,
    required: true,
  },
  state: {
    type: String,
    enum: SCHEDULE_STATES,
    default: 'active',
  },
  nextFireAt: {
    type: Date,
    default: null,
  },
  anchorLocal: {
    type: String,
  },
  version: {
    type: Number,
    default: 0,
  },
  createdBy: {
    type: String,
  },
  templateId: {
    type: String,
  },
  fireCount: {
    type: Number,
    default: 0,
  },
  lastFiredAt: {
    type: Date,
  },
  lastDeliveryStatus: {
    type: String,
    enum: ['acknowledged', 'failed'],
  },
  failureReason: {
    type: String,
    maxlength: 300,
  },
  createdAt: {
    type: Date,
    default: Date.now,
  },
  updatedAt: {
    type: Date,
    default: Date.now,
  },
});

// Due scan
ScheduleSchema.index({ state: 1, nextFireAt: 1 });
ScheduleSchema.index({ tenantId: 1, state: 1 });
ScheduleSchema.index({ tenantId: 1, createdAt: 1 });

export const Schedule = mongoose.model<ISchedule>('Schedule', ScheduleSchema);
