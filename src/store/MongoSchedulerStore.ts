// MARK: - Mongo Scheduler Store
// SchedulerStore backed by the mongoose models

import { Types } from 'mongoose';
import type { UpdateQuery } from 'mongoose';
import { Schedule } from '../models/Schedule';
import type { ISchedule, IStoredPayload, IStoredTrigger, LeanSchedule } from '../models/Schedule';
import { ScheduleTemplate } from '../models/ScheduleTemplate';
import type { LeanScheduleTemplate } from '../models/ScheduleTemplate';
import { Tenant } from '../models/Tenant';
import type { LeanTenant } from '../models/Tenant';
import { ConflictError, TransientStoreError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type {
  DeliveryOutcome,
  NewSchedule,
  NewTemplate,
  ScheduleChanges,
  SchedulePayload,
  ScheduleRecord,
  SchedulerStore,
  ScheduleState,
  TemplateRecord,
  TenantPatch,
  TenantRecord,
  TriggerSpec,
} from './types';

const TRANSIENT_ERROR_NAMES = new Set([
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
  'MongoServerSelectionError',
  'MongooseServerSelectionError',
  'MongoNotConnectedError',
  'MongoTopologyClosedError',
]);

const DUPLICATE_KEY_CODE = 11000;

export function isTransientMongoError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return TRANSIENT_ERROR_NAMES.has(error.name) || /buffering timed out/i.test(error.message);
}

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_CODE;
}

async function withStoreErrors<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isTransientMongoError(error)) {
      throw new TransientStoreError(`Store unavailable during ${operation}: ${errorMessage(error)}`, error);
    }
    throw error;
  }
}

export function toTriggerSpec(stored: IStoredTrigger): TriggerSpec {
  if (stored.kind === 'interval' && typeof stored.everyMinutes === 'number') {
    return stored.startsAt
      ? { kind: 'interval', everyMinutes: stored.everyMinutes, startsAt: stored.startsAt }
      : { kind: 'interval', everyMinutes: stored.everyMinutes };
  }

  if (stored.kind === 'absolute' && typeof stored.fireAt === 'string') {
    return { kind: 'absolute', fireAt: stored.fireAt };
  }

  throw new Error(`Stored trigger is incomplete for kind "${stored.kind}"`);
}

export function toStoredTrigger(trigger: TriggerSpec): IStoredTrigger {
  switch (trigger.kind) {
    case 'interval':
      return { kind: 'interval', everyMinutes: trigger.everyMinutes, startsAt: trigger.startsAt };
    case 'absolute':
      return { kind: 'absolute', fireAt: trigger.fireAt };
  }
}

function toPayload(stored: IStoredPayload): SchedulePayload {
  return {
    message: stored.message,
    targetUserId: stored.targetUserId ?? undefined,
    channelId: stored.channelId ?? undefined,
    dm: Boolean(stored.dm),
  };
}

export function toScheduleRecord(doc: LeanSchedule): ScheduleRecord {
  return {
    id: doc._id.toString(),
    tenantId: doc.tenantId,
    kind: doc.kind,
    trigger: toTriggerSpec(doc.trigger),
    payload: toPayload(doc.payload),
    state: doc.state,
    nextFireAt: doc.nextFireAt ?? null,
    anchorLocal: doc.anchorLocal,
    version: doc.version ?? 0,
    createdBy: doc.createdBy,
    templateId: doc.templateId,
    fireCount: doc.fireCount ?? 0,
    lastFiredAt: doc.lastFiredAt,
    lastDeliveryStatus: doc.lastDeliveryStatus,
    failureReason: doc.failureReason,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

/**
 * Converts scanned documents one at a time; a record that no longer reads as a
 * schedule is logged and left out instead of failing the whole scan.
 */
function toReadableScheduleRecords(docs: LeanSchedule[], operation: string): ScheduleRecord[] {
  const records: ScheduleRecord[] = [];
  for (const doc of docs) {
    try {
      records.push(toScheduleRecord(doc));
    } catch (error) {
      logger.error('Skipping unreadable schedule', {
        operation,
        scheduleId: doc._id.toString(),
        error: errorMessage(error),
      });
    }
  }
  return records;
}

function toTemplateRecord(doc: LeanScheduleTemplate): TemplateRecord {
  return {
    id: doc._id.toString(),
    tenantId: doc.tenantId,
    name: doc.name,
    payload: toPayload(doc.payload),
    trigger: toTriggerSpec(doc.trigger),
    createdBy: doc.createdBy,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toTenantRecord(doc: LeanTenant): TenantRecord {
  return {
    tenantId: doc.tenantId,
    timezone: doc.timezone,
    destinationChannelId: doc.destinationChannelId,
    errorChannelId: doc.errorChannelId,
    retainedAt: doc.retainedAt,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoSchedulerStore implements SchedulerStore {
  // MARK: Tenants

  async findTenant(tenantId: string): Promise<TenantRecord | null> {
    return withStoreErrors('findTenant', async () => {
      const doc = await Tenant.findOne({ tenantId }).lean<LeanTenant>();
      return doc ? toTenantRecord(doc) : null;
    });
  }

  async listTenants(): Promise<TenantRecord[]> {
    return withStoreErrors('listTenants', async () => {
      const docs = await Tenant.find({}).lean<LeanTenant[]>();
      return docs.map(toTenantRecord);
    });
  }

  async upsertTenant(tenantId: string, patch: TenantPatch, defaults: { timezone: string }): Promise<TenantRecord> {
    return withStoreErrors('upsertTenant', async () => {
      const now = new Date();
      const $set: Record<string, unknown> = { updatedAt: now };
      for (const [key, value] of Object.entries(patch)) {
        if (value !== undefined) {
          $set[key] = value;
        }
      }

      const $setOnInsert: Record<string, unknown> = { createdAt: now };
      if (patch.timezone === undefined) {
        $setOnInsert.timezone = defaults.timezone;
      }

      const doc = await Tenant.findOneAndUpdate(
        { tenantId },
        { $set, $setOnInsert },
        { upsert: true, new: true },
      ).lean<LeanTenant>();

      if (!doc) {
        throw new Error(`Tenant upsert returned no document for ${tenantId}`);
      }
      return toTenantRecord(doc);
    });
  }

  // MARK: Schedules

  async insertSchedule(schedule: NewSchedule, now: Date): Promise<ScheduleRecord> {
    return withStoreErrors('insertSchedule', async () => {
      const created = await Schedule.create({
        ...schedule,
        trigger: toStoredTrigger(schedule.trigger),
        version: 0,
        fireCount: 0,
        createdAt: now,
        updatedAt: now,
      });
      return toScheduleRecord(created.toObject<LeanSchedule>());
    });
  }

  async findSchedule(id: string): Promise<ScheduleRecord | null> {
    if (!Types.ObjectId.isValid(id)) {
      return null;
    }

    return withStoreErrors('findSchedule', async () => {
      const doc = await Schedule.findById(id).lean<LeanSchedule>();
      return doc ? toScheduleRecord(doc) : null;
    });
  }

  async listSchedules(tenantId: string, options: { includeDeleted?: boolean } = {}): Promise<ScheduleRecord[]> {
    return withStoreErrors('listSchedules', async () => {
      const filter = options.includeDeleted
        ? { tenantId }
        : { tenantId, state: { $ne: 'deleted' as const } };
      const docs = await Schedule.find(filter).sort({ createdAt: 1, _id: 1 }).lean<LeanSchedule[]>();
      return toReadableScheduleRecords(docs, 'listSchedules');
    });
  }

  async findDueSchedules(now: Date, limit: number): Promise<ScheduleRecord[]> {
    return withStoreErrors('findDueSchedules', async () => {
      const docs = await Schedule.find({ state: 'active', nextFireAt: { $lte: now } })
        .sort({ nextFireAt: 1 })
        .limit(limit)
        .lean<LeanSchedule[]>();
      return toReadableScheduleRecords(docs, 'findDueSchedules');
    });
  }

  async compareAndCommit(
    id: string,
    expected: { version: number; state?: ScheduleState },
    changes: ScheduleChanges,
    now: Date,
  ): Promise<ScheduleRecord | null> {
    if (!Types.ObjectId.isValid(id)) {
      return null;
    }

    return withStoreErrors('compareAndCommit', async () => {
      const { incrementFireCount, trigger, ...fields } = changes;
      const $set: Partial<ISchedule> = { ...fields, updatedAt: now };
      if (trigger) {
        $set.trigger = toStoredTrigger(trigger);
      }

      const update: UpdateQuery<ISchedule> = {
        $set,
        $inc: incrementFireCount ? { version: 1, fireCount: 1 } : { version: 1 },
      };

      const filter = expected.state
        ? { _id: id, version: expected.version, state: expected.state }
        : { _id: id, version: expected.version };

      const doc = await Schedule.findOneAndUpdate(filter, update, { new: true }).lean<LeanSchedule>();
      return doc ? toScheduleRecord(doc) : null;
    });
  }

  async pauseActiveForTenant(tenantId: string, now: Date): Promise<number> {
    return withStoreErrors('pauseActiveForTenant', async () => {
      const result = await Schedule.updateMany(
        { tenantId, state: 'active' },
        { $set: { state: 'paused', updatedAt: now }, $inc: { version: 1 } },
      );
      return result.modifiedCount;
    });
  }

  async recordDeliveryOutcome(id: string, outcome: DeliveryOutcome): Promise<void> {
    await withStoreErrors('recordDeliveryOutcome', async () => {
      await Schedule.updateOne(
        { _id: id },
        outcome.status === 'acknowledged'
          ? { $set: { lastDeliveryStatus: outcome.status }, $unset: { failureReason: 1 } }
          : { $set: { lastDeliveryStatus: outcome.status, failureReason: outcome.failureReason?.slice(0, 300) } },
      );
    });
  }

  async countSchedules(state: ScheduleState): Promise<number> {
    return withStoreErrors('countSchedules', () => Schedule.countDocuments({ state }).exec());
  }

  // MARK: Templates

  async insertTemplate(template: NewTemplate, now: Date): Promise<TemplateRecord> {
    return withStoreErrors('insertTemplate', async () => {
      try {
        const created = await ScheduleTemplate.create({
          ...template,
          trigger: toStoredTrigger(template.trigger),
          createdAt: now,
          updatedAt: now,
        });
        return toTemplateRecord(created.toObject<LeanScheduleTemplate>());
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          throw new ConflictError(`A template named "${template.name}" already exists in this server`);
        }
        throw error;
      }
    });
  }

  async findTemplate(id: string): Promise<TemplateRecord | null> {
    if (!Types.ObjectId.isValid(id)) {
      return null;
    }

    return withStoreErrors('findTemplate', async () => {
      const doc = await ScheduleTemplate.findById(id).lean<LeanScheduleTemplate>();
      return doc ? toTemplateRecord(doc) : null;
    });
  }

  async findTemplateByName(tenantId: string, name: string): Promise<TemplateRecord | null> {
    return withStoreErrors('findTemplateByName', async () => {
      const doc = await ScheduleTemplate.findOne({ tenantId, name }).lean<LeanScheduleTemplate>();
      return doc ? toTemplateRecord(doc) : null;
    });
  }

  async listTemplates(tenantId: string): Promise<TemplateRecord[]> {
    return withStoreErrors('listTemplates', async () => {
      const docs = await ScheduleTemplate.find({ tenantId }).sort({ name: 1 }).lean<LeanScheduleTemplate[]>();
      return docs.map(toTemplateRecord);
    });
  }

  async deleteTemplate(tenantId: string, name: string): Promise<boolean> {
    return withStoreErrors('deleteTemplate', async () => {
      const result = await ScheduleTemplate.deleteOne({ tenantId, name });
      return result.deletedCount > 0;
    });
  }
}
