// MARK: - Scheduler Store Types
// Plain records and the storage contract used by the scheduling engine

export type ScheduleKind = 'interval' | 'absolute';
export type ScheduleState = 'active' | 'paused' | 'completed' | 'deleted';
export type DeliveryStatus = 'acknowledged' | 'failed';

export type IntervalTrigger = {
  kind: 'interval';
  everyMinutes: number;
  /** Local wall-clock time of the first firing, e.g. 2025-03-08T09:00 */
  startsAt?: string;
};

export type AbsoluteTrigger = {
  kind: 'absolute';
  /** Local wall-clock time, interpreted in the tenant timezone */
  fireAt: string;
};

export type TriggerSpec = IntervalTrigger | AbsoluteTrigger;

export type SchedulePayload = {
  message: string;
  targetUserId?: string;
  channelId?: string;
  dm: boolean;
};

export interface TenantRecord {
  tenantId: string;
  timezone: string;
  destinationChannelId?: string;
  errorChannelId?: string;
  retainedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type TenantPatch = Partial<Pick<TenantRecord, 'timezone' | 'destinationChannelId' | 'errorChannelId' | 'retainedAt'>>;

export interface ScheduleRecord {
  id: string;
  tenantId: string;
  kind: ScheduleKind;
  trigger: TriggerSpec;
  payload: SchedulePayload;
  state: ScheduleState;
  nextFireAt: Date | null;
  /** Local wall clock an interval's fire times are counted from */
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

export type NewSchedule = Pick<ScheduleRecord, 'tenantId' | 'kind' | 'trigger' | 'payload' | 'state' | 'nextFireAt'> &
  Partial<Pick<ScheduleRecord, 'anchorLocal' | 'createdBy' | 'templateId'>>;

/** Fields a compare-and-commit may change; version and updatedAt are managed by the store */
export type ScheduleChanges = Partial<
  Pick<ScheduleRecord, 'kind' | 'trigger' | 'payload' | 'state' | 'nextFireAt' | 'anchorLocal' | 'lastFiredAt'>
> & {
  incrementFireCount?: boolean;
};

export type DeliveryOutcome = {
  status: DeliveryStatus;
  failureReason?: string;
};

export interface TemplateRecord {
  id: string;
  tenantId: string;
  name: string;
  payload: SchedulePayload;
  trigger: TriggerSpec;
  createdBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTemplate = Pick<TemplateRecord, 'tenantId' | 'name' | 'payload' | 'trigger'> &
  Partial<Pick<TemplateRecord, 'createdBy'>>;

export interface SchedulerStore {
  findTenant(tenantId: string): Promise<TenantRecord | null>;
  listTenants(): Promise<TenantRecord[]>;
  upsertTenant(tenantId: string, patch: TenantPatch, defaults: { timezone: string }): Promise<TenantRecord>;

  insertSchedule(schedule: NewSchedule, now: Date): Promise<ScheduleRecord>;
  findSchedule(id: string): Promise<ScheduleRecord | null>;
  /** Creation order; deleted schedules only when asked */
  listSchedules(tenantId: string, options?: { includeDeleted?: boolean }): Promise<ScheduleRecord[]>;
  /** Active schedules with nextFireAt <= now, oldest first */
  findDueSchedules(now: Date, limit: number): Promise<ScheduleRecord[]>;
  /**
   * Applies `changes` only if the stored record still carries `expectedVersion`
   * (and `expectedState`, when given). Returns the committed record, or null
   * when the precondition no longer holds.
   */
  compareAndCommit(
    id: string,
    expected: { version: number; state?: ScheduleState },
    changes: ScheduleChanges,
    now: Date,
  ): Promise<ScheduleRecord | null>;
  /** Moves every active schedule of the tenant to paused; returns how many moved */
  pauseActiveForTenant(tenantId: string, now: Date): Promise<number>;
  recordDeliveryOutcome(id: string, outcome: DeliveryOutcome): Promise<void>;
  countSchedules(state: ScheduleState): Promise<number>;

  /** Throws ConflictError when the tenant already has a template with that name */
  insertTemplate(template: NewTemplate, now: Date): Promise<TemplateRecord>;
  findTemplate(id: string): Promise<TemplateRecord | null>;
  findTemplateByName(tenantId: string, name: string): Promise<TemplateRecord | null>;
  listTemplates(tenantId: string): Promise<TemplateRecord[]>;
  deleteTemplate(tenantId: string, name: string): Promise<boolean>;
}
