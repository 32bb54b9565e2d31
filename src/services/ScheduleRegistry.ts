// MARK: - Schedule Registry
// Creates, edits and transitions schedules and templates for each tenant

import { EXHAUSTED, normalizeTrigger } from './TimeResolver';
import { planTransition } from './scheduleState';
import type { ScheduleCommand, TransitionPlan } from './scheduleState';
import type { SchedulerContext } from './SchedulerContext';
import {
  InvalidPayloadError,
  InvalidTriggerError,
  NotFoundError,
  TransientStoreError,
} from '../utils/errors';
import { canonicalTimezone, isValidTimezone } from '../utils/timezone';
import { logger } from '../utils/logger';
import type {
  ScheduleChanges,
  ScheduleKind,
  SchedulePayload,
  ScheduleRecord,
  ScheduleState,
  TemplateRecord,
  TenantRecord,
  TriggerSpec,
} from '../store/types';

export const MAX_MESSAGE_LENGTH = 1800;
export const MAX_TEMPLATE_NAME_LENGTH = 64;
const MAX_COMMIT_ATTEMPTS = 3;
const TEMPLATE_NAME_PATTERN = /^[a-z0-9][a-z0-9 _-]*$/;

export type ScheduleEdit = {
  trigger?: TriggerSpec;
  payload?: Partial<SchedulePayload>;
};

export type TemplateOverrides = {
  trigger?: TriggerSpec;
  payload?: Partial<SchedulePayload>;
};

export type ScheduleOptions = {
  createdBy?: string;
  templateId?: string;
};

type FireTimeChanges = {
  state: ScheduleState;
  nextFireAt: Date | null;
  anchorLocal?: string;
};

export type TimezoneChangeResult = {
  tenant: TenantRecord;
  recomputed: number;
};

/**
 * Trims the message and rejects empty or oversized payloads
 */
export function sanitizePayload(payload: SchedulePayload): SchedulePayload {
  const message = payload.message.trim();
  if (!message) {
    throw new InvalidPayloadError('Message cannot be empty');
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    throw new InvalidPayloadError(`Message cannot exceed ${MAX_MESSAGE_LENGTH} characters`);
  }
  if (payload.dm && !payload.targetUserId) {
    throw new InvalidPayloadError('Direct-message delivery needs a target user');
  }

  return {
    message,
    targetUserId: payload.targetUserId || undefined,
    channelId: payload.channelId || undefined,
    dm: payload.dm,
  };
}

export function normalizeTemplateName(name: string): string {
  const normalized = name.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!normalized || normalized.length > MAX_TEMPLATE_NAME_LENGTH || !TEMPLATE_NAME_PATTERN.test(normalized)) {
    throw new InvalidPayloadError(
      `Template names use letters, digits, spaces, "-" or "_" (max ${MAX_TEMPLATE_NAME_LENGTH} characters)`,
    );
  }
  return normalized;
}

function sameTrigger(left: TriggerSpec, right: TriggerSpec): boolean {
  return JSON.stringify(left) === JSON.stringify(right);
}

function mergePayload(base: SchedulePayload, patch: Partial<SchedulePayload> | undefined): SchedulePayload {
  if (!patch) {
    return base;
  }

  const merged: SchedulePayload = { ...base };
  if (patch.message !== undefined) merged.message = patch.message;
  if (patch.targetUserId !== undefined) merged.targetUserId = patch.targetUserId;
  if (patch.channelId !== undefined) merged.channelId = patch.channelId;
  if (patch.dm !== undefined) merged.dm = patch.dm;
  return merged;
}

export class ScheduleRegistry {
  constructor(private readonly context: SchedulerContext) {}

  // MARK: Schedules

  async createSchedule(
    tenantId: string,
    kind: ScheduleKind,
    trigger: TriggerSpec,
    payload: SchedulePayload,
    options: ScheduleOptions = {},
  ): Promise<ScheduleRecord> {
    if (trigger.kind !== kind) {
      throw new InvalidTriggerError(`A ${kind} schedule needs a ${kind} trigger`);
    }

    const normalizedTrigger = normalizeTrigger(trigger);
    const cleanPayload = sanitizePayload(payload);
    const tenant = await this.context.ensureTenant(tenantId);
    const now = this.context.now();

    // Throws UnknownTimezoneError before anything is written
    const first = this.context.resolver.firstFireAt(normalizedTrigger, tenant.timezone, now);
    const exhausted = first === EXHAUSTED;
    const anchorLocal =
      normalizedTrigger.kind === 'interval'
        ? this.context.resolver.anchorFor(normalizedTrigger, undefined, tenant.timezone, now)
        : undefined;

    const schedule = await this.context.store.insertSchedule(
      {
        tenantId,
        kind,
        trigger: normalizedTrigger,
        payload: cleanPayload,
        state: exhausted ? 'completed' : 'active',
        nextFireAt: exhausted ? null : first,
        ...(anchorLocal ? { anchorLocal } : {}),
        createdBy: options.createdBy,
        templateId: options.templateId,
      },
      now,
    );

    logger.info('Schedule created', {
      tenantId,
      scheduleId: schedule.id,
      kind,
      state: schedule.state,
      nextFireAt: schedule.nextFireAt?.toISOString() ?? null,
      templateId: options.templateId,
    });

    if (exhausted) {
      logger.warn('Schedule created with a past fire time, completed without firing', {
        tenantId,
        scheduleId: schedule.id,
      });
    }

    return schedule;
  }

  async getSchedule(tenantId: string, id: string): Promise<ScheduleRecord> {
    const schedule = await this.context.store.findSchedule(id);
    if (!schedule || schedule.tenantId !== tenantId) {
      throw new NotFoundError('schedule', id);
    }
    return schedule;
  }

  async listSchedules(tenantId: string, options: { includeDeleted?: boolean } = {}): Promise<ScheduleRecord[]> {
    return this.context.store.listSchedules(tenantId, options);
  }

  async editSchedule(tenantId: string, id: string, fields: ScheduleEdit): Promise<ScheduleRecord> {
    const trigger = fields.trigger ? normalizeTrigger(fields.trigger) : undefined;

    return this.mutate(tenantId, id, 'edit', current => {
      const triggerChanged = trigger !== undefined && !sameTrigger(trigger, current.trigger);
      const payload = fields.payload ? sanitizePayload(mergePayload(current.payload, fields.payload)) : undefined;
      const changes: ScheduleChanges = {};

      if (triggerChanged && trigger) {
        changes.trigger = trigger;
        changes.kind = trigger.kind;
      }
      if (payload) {
        changes.payload = payload;
      }

      return { command: { type: 'edit', triggerChanged }, changes };
    });
  }

  async pauseSchedule(tenantId: string, id: string): Promise<ScheduleRecord> {
    return this.mutate(tenantId, id, 'pause', () => ({ command: { type: 'pause' }, changes: {} }));
  }

  async resumeSchedule(tenantId: string, id: string): Promise<ScheduleRecord> {
    return this.mutate(tenantId, id, 'resume', () => ({ command: { type: 'resume' }, changes: {} }));
  }

  async deleteSchedule(tenantId: string, id: string): Promise<ScheduleRecord> {
    return this.mutate(tenantId, id, 'delete', () => ({ command: { type: 'delete' }, changes: {} }));
  }

  /**
   * Pauses every active schedule of the tenant; returns how many were paused
   */
  async pauseAll(tenantId: string): Promise<number> {
    const paused = await this.context.store.pauseActiveForTenant(tenantId, this.context.now());
    logger.info('Paused all schedules for tenant', { tenantId, paused });
    return paused;
  }

  // MARK: Templates

  async createTemplate(
    tenantId: string,
    name: string,
    payload: SchedulePayload,
    trigger: TriggerSpec,
    options: { createdBy?: string } = {},
  ): Promise<TemplateRecord> {
    const template = await this.context.store.insertTemplate(
      {
        tenantId,
        name: normalizeTemplateName(name),
        payload: sanitizePayload(payload),
        trigger: normalizeTrigger(trigger),
        createdBy: options.createdBy,
      },
      this.context.now(),
    );

    logger.info('Template created', { tenantId, templateId: template.id, name: template.name });
    return template;
  }

  async listTemplates(tenantId: string): Promise<TemplateRecord[]> {
    return this.context.store.listTemplates(tenantId);
  }

  async getTemplateByName(tenantId: string, name: string): Promise<TemplateRecord> {
    const normalized = name.trim().toLowerCase();
    const template = await this.context.store.findTemplateByName(tenantId, normalized);
    if (!template) {
      throw new NotFoundError('template', normalized);
    }
    return template;
  }

  async deleteTemplate(tenantId: string, name: string): Promise<void> {
    const normalized = name.trim().toLowerCase();
    const deleted = await this.context.store.deleteTemplate(tenantId, normalized);
    if (!deleted) {
      throw new NotFoundError('template', normalized);
    }
    logger.info('Template deleted', { tenantId, name: normalized });
  }

  /**
   * Creates a new schedule from a template. When `tenantId` is given the
   * template must belong to that tenant.
   */
  async instantiateTemplate(
    templateId: string,
    overrides: TemplateOverrides = {},
    options: { tenantId?: string; createdBy?: string } = {},
  ): Promise<ScheduleRecord> {
    const template = await this.context.store.findTemplate(templateId);
    if (!template || (options.tenantId && template.tenantId !== options.tenantId)) {
      throw new NotFoundError('template', templateId);
    }

    return this.instantiate(template, overrides, options.createdBy);
  }

  async instantiateTemplateByName(
    tenantId: string,
    name: string,
    overrides: TemplateOverrides = {},
    options: { createdBy?: string } = {},
  ): Promise<ScheduleRecord> {
    const template = await this.getTemplateByName(tenantId, name);
    return this.instantiate(template, overrides, options.createdBy);
  }

  private async instantiate(
    template: TemplateRecord,
    overrides: TemplateOverrides,
    createdBy: string | undefined,
  ): Promise<ScheduleRecord> {
    const trigger = overrides.trigger ?? template.trigger;
    const payload = mergePayload(template.payload, overrides.payload);

    return this.createSchedule(template.tenantId, trigger.kind, trigger, payload, {
      createdBy,
      templateId: template.id,
    });
  }

  // MARK: Tenant settings

  async getTenantSettings(tenantId: string): Promise<TenantRecord> {
    return this.context.ensureTenant(tenantId);
  }

  /**
   * Stores a new timezone and re-resolves every active schedule under it
   */
  async setTenantTimezone(tenantId: string, timezone: string): Promise<TimezoneChangeResult> {
    const canonical = canonicalTimezone(timezone);
    const previous = await this.context.ensureTenant(tenantId);
    const tenant = await this.context.updateTenant(tenantId, { timezone: canonical });

    let recomputed = 0;
    if (previous.timezone !== canonical) {
      const schedules = await this.context.store.listSchedules(tenantId);
      for (const schedule of schedules) {
        if (schedule.state !== 'active') {
          continue;
        }
        if (await this.repinToTimezone(schedule, previous.timezone, canonical)) {
          recomputed += 1;
        }
      }
    }

    logger.info('Tenant timezone updated', {
      tenantId,
      from: previous.timezone,
      to: canonical,
      recomputed,
    });

    return { tenant, recomputed };
  }

  async setTenantDestination(tenantId: string, channelId: string): Promise<TenantRecord> {
    const tenant = await this.context.updateTenant(tenantId, { destinationChannelId: channelId });
    logger.info('Tenant destination updated', { tenantId, channelId });
    return tenant;
  }

  async setTenantErrorChannel(tenantId: string, channelId: string): Promise<TenantRecord> {
    const tenant = await this.context.updateTenant(tenantId, { errorChannelId: channelId });
    logger.info('Tenant error channel updated', { tenantId, channelId });
    return tenant;
  }

  /**
   * Soft-removes a tenant: the record is retained and its schedules paused
   */
  async removeTenant(tenantId: string): Promise<number> {
    await this.context.updateTenant(tenantId, { retainedAt: this.context.now() });
    const paused = await this.pauseAll(tenantId);
    logger.info('Tenant retained after removal', { tenantId, paused });
    return paused;
  }

  // MARK: Internals

  private async mutate(
    tenantId: string,
    id: string,
    operation: ScheduleCommand['type'],
    build: (current: ScheduleRecord) => { command: ScheduleCommand; changes: ScheduleChanges },
  ): Promise<ScheduleRecord> {
    for (let attempt = 1; attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
      const current = await this.getSchedule(tenantId, id);
      const { command, changes } = build(current);
      const plan = planTransition(current.state, command);
      const trigger = changes.trigger ?? current.trigger;
      const tenant = await this.context.ensureTenant(tenantId);
      const now = this.context.now();

      const fireTime = this.applyPlan(plan, command, trigger, tenant.timezone, current, now);
      const committed = await this.context.store.compareAndCommit(
        id,
        { version: current.version },
        { ...changes, ...fireTime },
        now,
      );

      if (committed) {
        logger.info('Schedule updated', {
          tenantId,
          scheduleId: id,
          operation,
          from: current.state,
          to: committed.state,
          nextFireAt: committed.nextFireAt?.toISOString() ?? null,
        });
        return committed;
      }

      logger.debug('Schedule changed concurrently, retrying', { tenantId, scheduleId: id, operation, attempt });
    }

    throw new TransientStoreError(`Schedule ${id} kept changing while trying to ${operation} it`);
  }

  private applyPlan(
    plan: TransitionPlan,
    command: ScheduleCommand,
    trigger: TriggerSpec,
    timezone: string,
    current: ScheduleRecord,
    now: Date,
  ): FireTimeChanges {
    const resolver = this.context.resolver;

    switch (plan.fireTime) {
      case 'keep':
      case 'freeze':
        return { state: plan.state, nextFireAt: current.nextFireAt };
      case 'clear':
        return { state: plan.state, nextFireAt: null };
      case 'from-now': {
        if (trigger.kind === 'absolute') {
          const resolution = resolver.resolveNext(trigger, timezone, now);
          return resolution === EXHAUSTED
            ? { state: 'completed', nextFireAt: null }
            : { state: plan.state, nextFireAt: resolution };
        }
        // An edited trigger may carry its own start; resuming restarts the clock
        const anchorLocal =
          command.type === 'edit'
            ? resolver.anchorFor(trigger, undefined, timezone, now)
            : resolver.localAnchor(now, timezone);
        return {
          state: plan.state,
          nextFireAt: resolver.nextOnGrid(anchorLocal, trigger.everyMinutes, timezone, now),
          anchorLocal,
        };
      }
      case 'from-previous': {
        const previous = current.nextFireAt ?? now;
        if (trigger.kind === 'absolute') {
          const resolution = resolver.resolveNext(trigger, timezone, previous);
          return resolution === EXHAUSTED
            ? { state: 'completed', nextFireAt: null }
            : { state: plan.state, nextFireAt: resolution };
        }
        const anchorLocal = resolver.anchorFor(trigger, current.anchorLocal, timezone, previous);
        return {
          state: plan.state,
          nextFireAt: resolver.nextOnGrid(anchorLocal, trigger.everyMinutes, timezone, previous),
          anchorLocal,
        };
      }
    }
  }

  private async repinToTimezone(schedule: ScheduleRecord, fromTimezone: string, toTimezone: string): Promise<boolean> {
    let current: ScheduleRecord | null = schedule;

    for (let attempt = 1; current && attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
      if (current.state !== 'active') {
        return false;
      }

      const now = this.context.now();
      const resolver = this.context.resolver;
      let nextFireAt: Date | null;
      let anchorLocal: string | undefined;

      if (current.trigger.kind === 'absolute') {
        const resolution = resolver.resolveNext(current.trigger, toTimezone, now);
        nextFireAt = resolution === EXHAUSTED ? null : resolution;
      } else {
        // The grid is local, so the same wall clock carries over to the new zone
        anchorLocal = resolver.anchorFor(
          current.trigger,
          current.anchorLocal,
          isValidTimezone(fromTimezone) ? fromTimezone : toTimezone,
          current.nextFireAt ?? now,
        );
        nextFireAt = resolver.nextOnGrid(anchorLocal, current.trigger.everyMinutes, toTimezone, now);
      }

      const changes: ScheduleChanges = nextFireAt
        ? { nextFireAt, ...(anchorLocal ? { anchorLocal } : {}) }
        : { state: 'completed', nextFireAt: null };
      const committed = await this.context.store.compareAndCommit(
        current.id,
        { version: current.version, state: 'active' },
        changes,
        now,
      );
      if (committed) {
        return true;
      }

      current = await this.context.store.findSchedule(current.id);
    }

    logger.warn('Could not re-pin schedule to new timezone', { scheduleId: schedule.id, toTimezone });
    return false;
  }
}
