// MARK: - Dispatcher
// Polls for due schedules, claims each one atomically and emits its delivery

import { isDispatchable, planTransition } from './scheduleState';
import { resolveDestination } from './DeliverySink';
import type { DeliveryRequest, DeliveryResult, DeliverySink } from './DeliverySink';
import type { SchedulerContext } from './SchedulerContext';
import { DeliveryFailedError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { ScheduleChanges, ScheduleRecord, TenantRecord } from '../store/types';

const DEFAULT_INTERVAL_MS = 15_000;
const DEFAULT_BATCH_LIMIT = 50;

export interface DeliveryFailureReporter {
  reportDeliveryFailure(tenant: TenantRecord, request: DeliveryRequest, reason: string): Promise<void>;
}

export interface DispatcherOptions {
  intervalMs?: number;
  batchLimit?: number;
  failureReporter?: DeliveryFailureReporter;
}

export type CycleStats = {
  scanned: number;
  claimed: number;
  delivered: number;
  failed: number;
  lostClaims: number;
  errors: number;
};

export type DispatcherTotals = CycleStats & {
  cycles: number;
  lastCycleAt: Date | null;
};

function emptyStats(): CycleStats {
  return { scanned: 0, claimed: 0, delivered: 0, failed: 0, lostClaims: 0, errors: 0 };
}

export class Dispatcher {
  private poller: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleStats> | null = null;
  private readonly intervalMs: number;
  private readonly batchLimit: number;
  private readonly totals: DispatcherTotals = { ...emptyStats(), cycles: 0, lastCycleAt: null };

  constructor(
    private readonly context: SchedulerContext,
    private readonly sink: DeliverySink,
    private readonly options: DispatcherOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.batchLimit = options.batchLimit ?? DEFAULT_BATCH_LIMIT;
  }

  start(): void {
    if (this.poller) {
      return;
    }

    this.poller = setInterval(() => {
      this.runCycle().catch(error => {
        logger.error('Dispatch cycle failed', { error: errorMessage(error) });
      });
    }, this.intervalMs);

    if (typeof this.poller.unref === 'function') {
      this.poller.unref();
    }

    logger.info('Dispatcher started', { intervalMs: this.intervalMs, batchLimit: this.batchLimit });
  }

  /**
   * Stops polling and waits for a cycle that is still running
   */
  async stop(): Promise<void> {
    if (this.poller) {
      clearInterval(this.poller);
      this.poller = null;
    }

    if (this.inFlight) {
      logger.info('Waiting for the running dispatch cycle to finish');
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.poller !== null;
  }

  getTotals(): DispatcherTotals {
    return { ...this.totals };
  }

  /**
   * One scan-claim-emit pass. Returns null when a previous cycle is still running.
   */
  async runCycle(now: Date = this.context.now()): Promise<CycleStats | null> {
    if (this.inFlight) {
      logger.debug('Dispatch cycle skipped, previous cycle still running');
      return null;
    }

    this.inFlight = this.scanAndDispatch(now);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async scanAndDispatch(now: Date): Promise<CycleStats> {
    const stats = emptyStats();

    try {
      let due: ScheduleRecord[];
      try {
        due = await this.context.store.findDueSchedules(now, this.batchLimit);
      } catch (error) {
        stats.errors += 1;
        logger.error('Due scan failed, retrying next cycle', { error: errorMessage(error) });
        return stats;
      }

      stats.scanned = due.length;
      for (const schedule of due) {
        try {
          await this.dispatchOne(schedule, now, stats);
        } catch (error) {
          stats.errors += 1;
          logger.error('Failed to dispatch schedule', {
            scheduleId: schedule.id,
            tenantId: schedule.tenantId,
            error: errorMessage(error),
          });
        }
      }

      if (stats.scanned > 0) {
        logger.info('Dispatch cycle completed', { ...stats });
      }
      return stats;
    } finally {
      this.accumulate(stats, now);
    }
  }

  private async dispatchOne(schedule: ScheduleRecord, now: Date, stats: CycleStats): Promise<void> {
    if (!isDispatchable(schedule.state)) {
      stats.lostClaims += 1;
      return;
    }

    const tenant = await this.context.ensureTenant(schedule.tenantId);
    const advanced = this.advance(schedule, tenant.timezone, now);

    // The claim and the advance are one conditional write
    const claimed = await this.context.store.compareAndCommit(
      schedule.id,
      { version: schedule.version, state: 'active' },
      { ...advanced, lastFiredAt: now, incrementFireCount: true },
      now,
    );

    if (!claimed) {
      stats.lostClaims += 1;
      logger.debug('Lost claim on schedule', { scheduleId: schedule.id, version: schedule.version });
      return;
    }

    stats.claimed += 1;

    const request: DeliveryRequest = {
      tenantId: schedule.tenantId,
      scheduleId: schedule.id,
      destination: resolveDestination(schedule.payload, tenant),
      payload: schedule.payload,
      scheduledFor: schedule.nextFireAt ?? now,
    };

    const result = await this.emit(request);

    if (result.status === 'acknowledged') {
      stats.delivered += 1;
      logger.info('Schedule delivered', {
        scheduleId: schedule.id,
        tenantId: schedule.tenantId,
        kind: schedule.kind,
        state: claimed.state,
        nextFireAt: claimed.nextFireAt?.toISOString() ?? null,
      });
    } else {
      stats.failed += 1;
      const failure = new DeliveryFailedError(result.reason);
      logger.warn('Schedule delivery failed, occurrence dropped', {
        scheduleId: schedule.id,
        tenantId: schedule.tenantId,
        code: failure.code,
        reason: failure.message,
      });
      await this.reportFailure(tenant, request, result.reason);
    }

    try {
      await this.context.store.recordDeliveryOutcome(
        schedule.id,
        result.status === 'acknowledged'
          ? { status: 'acknowledged' }
          : { status: 'failed', failureReason: result.reason },
      );
    } catch (error) {
      logger.error('Failed to record delivery outcome', { scheduleId: schedule.id, error: errorMessage(error) });
    }
  }

  /**
   * State after this firing: absolute schedules complete; interval schedules
   * move to the next point of their local grid after now, skipping steps
   * already past.
   */
  private advance(schedule: ScheduleRecord, timezone: string, now: Date): ScheduleChanges {
    const plan = planTransition(schedule.state, { type: 'fire', kind: schedule.kind });
    if (plan.fireTime === 'clear' || schedule.trigger.kind === 'absolute') {
      return { state: 'completed', nextFireAt: null };
    }

    const resolver = this.context.resolver;
    const previous = schedule.nextFireAt ?? now;
    const anchorLocal = resolver.anchorFor(schedule.trigger, schedule.anchorLocal, timezone, previous);
    const after = previous.getTime() > now.getTime() ? previous : now;

    return {
      state: plan.state,
      nextFireAt: resolver.nextOnGrid(anchorLocal, schedule.trigger.everyMinutes, timezone, after),
      anchorLocal,
    };
  }

  private async emit(request: DeliveryRequest): Promise<DeliveryResult> {
    if (!request.destination) {
      return { status: 'failed', reason: 'No delivery destination configured' };
    }

    try {
      return await this.sink.deliver(request);
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error) };
    }
  }

  private async reportFailure(tenant: TenantRecord, request: DeliveryRequest, reason: string): Promise<void> {
    if (!this.options.failureReporter) {
      return;
    }

    try {
      await this.options.failureReporter.reportDeliveryFailure(tenant, request, reason);
    } catch (error) {
      logger.error('Failed to report delivery failure', { scheduleId: request.scheduleId, error: errorMessage(error) });
    }
  }

  private accumulate(stats: CycleStats, now: Date): void {
    this.totals.cycles += 1;
    this.totals.lastCycleAt = now;
    this.totals.scanned += stats.scanned;
    this.totals.claimed += stats.claimed;
    this.totals.delivered += stats.delivered;
    this.totals.failed += stats.failed;
    this.totals.lostClaims += stats.lostClaims;
    this.totals.errors += stats.errors;
  }
}
