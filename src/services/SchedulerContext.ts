// MARK: - Scheduler Context
// Lifecycle-scoped state shared by the registry and the dispatcher

import { TimeResolver } from './TimeResolver';
import { logger } from '../utils/logger';
import type { SchedulerStore, TenantPatch, TenantRecord } from '../store/types';

export interface SchedulerContextOptions {
  store: SchedulerStore;
  resolver?: TimeResolver;
  defaultTimezone?: string;
  clock?: () => Date;
}

export class SchedulerContext {
  readonly store: SchedulerStore;
  readonly resolver: TimeResolver;
  readonly defaultTimezone: string;
  private readonly clock: () => Date;
  private tenants = new Map<string, TenantRecord>();

  constructor(options: SchedulerContextOptions) {
    this.store = options.store;
    this.resolver = options.resolver ?? new TimeResolver();
    this.defaultTimezone = options.defaultTimezone ?? 'UTC';
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Warm the tenant cache from the store
   */
  async init(): Promise<void> {
    const tenants = await this.store.listTenants();
    this.tenants = new Map(tenants.map(tenant => [tenant.tenantId, tenant]));
    logger.info('SchedulerContext initialized', { tenants: this.tenants.size });
  }

  /**
   * Drop cached state. Tenant writes go straight to the store, so nothing
   * is pending here.
   */
  async teardown(): Promise<void> {
    this.tenants.clear();
    logger.info('SchedulerContext torn down');
  }

  now(): Date {
    return this.clock();
  }

  async getTenant(tenantId: string): Promise<TenantRecord | null> {
    const cached = this.tenants.get(tenantId);
    if (cached) {
      return cached;
    }

    const tenant = await this.store.findTenant(tenantId);
    if (tenant) {
      this.tenants.set(tenantId, tenant);
    }
    return tenant;
  }

  /**
   * Returns the tenant, creating it with defaults on first use
   */
  async ensureTenant(tenantId: string): Promise<TenantRecord> {
    const existing = await this.getTenant(tenantId);
    if (existing) {
      return existing;
    }
    return this.updateTenant(tenantId, {});
  }

  async updateTenant(tenantId: string, patch: TenantPatch): Promise<TenantRecord> {
    const tenant = await this.store.upsertTenant(tenantId, patch, { timezone: this.defaultTimezone });
    this.tenants.set(tenantId, tenant);
    return tenant;
  }
}
