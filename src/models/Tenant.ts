// MARK: - Tenant Model
// Per-guild scheduling settings: timezone and default delivery channels

import mongoose, { Schema, Types } from 'mongoose';

export interface ITenant {
  tenantId: string;
  timezone: string;
  destinationChannelId?: string;
  errorChannelId?: string;
  retainedAt?: Date; // Set on removal; tenants are never hard-deleted
  createdAt: Date;
  updatedAt: Date;
}

export type LeanTenant = ITenant & { _id: Types.ObjectId };

const TenantSchema = new Schema<ITenant>({
  tenantId: {
    type: String,
    required: true,
    unique: true,
    index: true,
  },
  timezone: {
    type: String,
    required: true,
    default: 'UTC',
  },
  destinationChannelId: {
    type: String,
  },
  errorChannelId: {
    type: String,
  },
  retainedAt: {
    type: Date,
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

export const Tenant = mongoose.model<ITenant>('Tenant', TenantSchema);
