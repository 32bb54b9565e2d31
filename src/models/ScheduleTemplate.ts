// MARK: - Schedule Template Model
// Named reminder definitions that can be instantiated into schedules

import mongoose, { Schema, Types } from 'mongoose';
import { PayloadSchema, TriggerSchema } from './Schedule';
import type { IStoredPayload, IStoredTrigger } from './Schedule';

export interface IScheduleTemplate {
  tenantId: string;
  name: string;
  payload: IStoredPayload;
  trigger: IStoredTrigger;
  createdBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanScheduleTemplate = IScheduleTemplate & { _id: Types.ObjectId };

const ScheduleTemplateSchema = new Schema<IScheduleTemplate>({
  tenantId: {
    type: String,
    required: true,
    index: true,
  },
  name: {
    type: String,
    required: true,
    lowercase: true,
    trim: true,
    maxlength: 64,
  },
  payload: {
    type: PayloadSchema,
    required: true,
  },
  trigger: {
    type: TriggerSchema,
    required: true,
  },
  createdBy: {
    type: String,
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

ScheduleTemplateSchema.index({ tenantId: 1, name: 1 }, { unique: true });

export const ScheduleTemplate = mongoose.model<IScheduleTemplate>('ScheduleTemplate', ScheduleTemplateSchema);
