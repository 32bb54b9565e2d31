import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Dispatcher } from '../../src/services/Dispatcher';
import type { DeliveryRequest, DeliveryResult, DeliverySink } from '../../src/services/DeliverySink';
import { ScheduleRegistry } from '../../src/services/ScheduleRegistry';
import { SchedulerContext } from '../../src/services/SchedulerContext';
import type { ScheduleRecord, TenantRecord } from '../../src/store/types';
import { InMemorySchedulerStore } from '../helpers/InMemorySchedulerStore';

const GUILD = 'guild-1';

class RecordingSink implements DeliverySink {
  readonly requests: DeliveryRequest[] = [];

  constructor(private readonly respond: (request: DeliveryRequest) => Promise<DeliveryResult> = async () => ({
    status: 'acknowledged',
  })) {}

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    this.requests.push(request);
    return this.respond(request);
  }
}

describe('Dispatcher', () => {
  let store: InMemorySchedulerStore;
  let context: SchedulerContext;
  let registry: ScheduleRegistry;
  let sink: RecordingSink;

  const createdAt = new Date('2025-01-01T12:00:00Z');

  beforeEach(async () => {
    store = new InMemorySchedulerStore();
    context = new SchedulerContext({ store, defaultTimezone: 'UTC', clock: () => createdAt });
    registry = new ScheduleRegistry(context);
    sink = new RecordingSink();
    await registry.setTenantDestination(GUILD, 'channel-1');
  });

  async function stored(id: string): Promise<ScheduleRecord> {
    const schedule = await store.findSchedule(id);
    if (!schedule) {
      throw new Error(`schedule ${id} missing`);
    }
    return schedule;
  }

  it('delivers a due interval schedule and advances it from its previous fire time', async () => {
    const schedule = await registry.createSchedule(
      GUILD,
      'interval',
      { kind: 'interval', everyMinutes: 60 },
      { message: 'Hydrate', targetUserId: 'user-1', dm: false },
    );
    const dispatcher = new Dispatcher(context, sink);

    const stats = await dispatcher.runCycle(new Date('2025-01-01T13:00:20Z'));

    expect(stats).toEqual({ scanned: 1, claimed: 1, delivered: 1, failed: 0, lostClaims: 0, errors: 0 });
    expect(sink.requests).toHaveLength(1);
    expect(sink.requests[0].destination).toEqual({ type: 'channel', channelId: 'channel-1' });
    expect(sink.requests[0].scheduledFor).toEqual(new Date('2025-01-01T13:00:00Z'));

    const after = await stored(schedule.id);
    expect(after.state).toBe('active');
    expect(after.nextFireAt).toEqual(new Date('2025-01-01T14:00:00Z'));
    expect(after.fireCount).toBe(1);
    expect(after.version).toBe(1);
    expect(after.lastFiredAt).toEqual(new Date('2025-01-01T13:00:20Z'));
    expect(after.lastDeliveryStatus).toBe('acknowledged');
  });

  it('fires once for missed occurrences and skips to the next future step', async () => {
    const schedule = await registry.createSchedule(
      GUILD,
      'interval',
      { kind: 'interval', everyMinutes: 60 },
      { message: 'Hydrate', dm: false },
    );
    const dispatcher = new Dispatcher(context, sink);

    await dispatcher.runCycle(new Date('2025-01-01T16:30:00Z'));

    expect(sink.requests).toHaveLength(1);
    expect((await stored(schedule.id)).nextFireAt).toEqual(new Date('2025-01-01T17:00:00Z'));
  });

  it('completes an absolute schedule after its only delivery', async () => {
    const schedule = await registry.createSchedule(
      GUILD,
      'absolute',
      { kind: 'absolute', fireAt: '2025-01-01T12:30' },
      { message: 'Ship it', targetUserId: 'user-1', dm: true },
    );
    const dispatcher = new Dispatcher(context, sink);

    await dispatcher.runCycle(new Date('2025-01-01T12:31:00Z'));
    const second = await dispatcher.runCycle(new Date('2025-01-01T13:31:00Z'));

    expect(sink.requests).toHaveLength(1);
    expect(sink.requests[0].destination).toEqual({ type: 'dm', userId: 'user-1' });
    expect(second?.scanned).toBe(0);

    const after = await stored(schedule.id);
    expect(after.state).toBe('completed');
    expect(after.nextFireAt).toBeNull();
  });

  it('ignores schedules that are not yet due', async () => {
    await registry.createSchedule(GUILD, 'interval', { kind: 'interval', everyMinutes: 60 }, { message: 'Later', dm: false });
    const dispatcher = new Dispatcher(context, sink);

    const stats = await dispatcher.runCycle(new Date('2025-01-01T12:59:59Z'));
    expect(stats?.scanned).toBe(0);
    expect(sink.requests).toHaveLength(0);
  });

  it('delivers once when two dispatchers race for the same schedule', async () => {
    await registry.createSchedule(GUILD, 'interval', { kind: 'interval', everyMinutes: 60 }, { message: 'Race', dm: false });
    const first = new Dispatcher(context, sink);
    const second = new Dispatcher(context, sink);
    const now = new Date('2025-01-01T13:00:00Z');

    const [a, b] = await Promise.all([first.runCycle(now), second.runCycle(now)]);

    expect(sink.requests).toHaveLength(1);
    expect((a?.claimed ?? 0) + (b?.claimed ?? 0)).toBe(1);
    expect((a?.lostClaims ?? 0) + (b?.lostClaims ?? 0)).toBe(1);
  });

  it('records failed deliveries, reports them and keeps going', async () => {
    const failing = await registry.createSchedule(
      GUILD,
      'interval',
      { kind: 'interval', everyMinutes: 60 },
      { message: 'Closed DMs', targetUserId: 'user-1', dm: true },
    );
    const healthy = await registry.createSchedule(
      GUILD,
      'interval',
      { kind: 'interval', everyMinutes: 60 },
      { message: 'Fine', dm: false },
    );
    sink = new RecordingSink(async request =>
      request.destination?.type === 'dm' ? { status: 'failed', reason: 'DMs closed' } : { status: 'acknowledged' },
    );
    const reportDeliveryFailure = vi.fn(
      async (_tenant: TenantRecord, _request: DeliveryRequest, _reason: string): Promise<void> => undefined,
    );
    const dispatcher = new Dispatcher(context, sink, { failureReporter: { reportDeliveryFailure } });

    const stats = await dispatcher.runCycle(new Date('2025-01-01T13:00:00Z'));

    expect(stats).toEqual({ scanned: 2, claimed: 2, delivered: 1, failed: 1, lostClaims: 0, errors: 0 });
    const failed = await stored(failing.id);
    expect(failed.lastDeliveryStatus).toBe('failed');
    expect(failed.failureReason).toBe('DMs closed');
    expect(failed.nextFireAt).toEqual(new Date('2025-01-01T14:00:00Z'));
    expect((await stored(healthy.id)).lastDeliveryStatus).toBe('acknowledged');

    expect(reportDeliveryFailure).toHaveBeenCalledTimes(1);
    const [tenant, request, reason] = reportDeliveryFailure.mock.calls[0];
    expect(tenant.tenantId).toBe(GUILD);
    expect(request.scheduleId).toBe(failing.id);
    expect(reason).toBe('DMs closed');
  });

  it('fails a delivery with no destination without calling the sink', async () => {
    const schedule = await registry.createSchedule(
      'guild-without-channel',
      'interval',
      { kind: 'interval', everyMinutes: 5 },
      { message: 'Nowhere to go', dm: false },
    );
    const dispatcher = new Dispatcher(context, sink);

    const stats = await dispatcher.runCycle(new Date('2025-01-01T12:05:00Z'));

    expect(stats?.failed).toBe(1);
    expect(sink.requests).toHaveLength(0);
    expect((await stored(schedule.id)).failureReason).toBe('No delivery destination configured');
  });

  it('turns a throwing sink into a failed delivery', async () => {
    const schedule = await registry.createSchedule(
      GUILD,
      'interval',
      { kind: 'interval', everyMinutes: 5 },
      { message: 'Boom', dm: false },
    );
    sink = new RecordingSink(async () => {
      throw new Error('gateway closed');
    });
    const dispatcher = new Dispatcher(context, sink);

    const stats = await dispatcher.runCycle(new Date('2025-01-01T12:05:00Z'));

    expect(stats).toEqual({ scanned: 1, claimed: 1, delivered: 0, failed: 1, lostClaims: 0, errors: 0 });
    expect((await stored(schedule.id)).failureReason).toBe('gateway closed');
  });

  it('survives a failing due scan', async () => {
    vi.spyOn(store, 'findDueSchedules').mockRejectedValueOnce(new Error('connection reset'));
    const dispatcher = new Dispatcher(context, sink);

    const stats = await dispatcher.runCycle(new Date('2025-01-01T13:00:00Z'));

    expect(stats).toEqual({ scanned: 0, claimed: 0, delivered: 0, failed: 0, lostClaims: 0, errors: 1 });
    expect(dispatcher.getTotals().cycles).toBe(1);
  });

  it('skips a cycle while the previous one is still running', async () => {
    const dispatcher = new Dispatcher(context, sink);
    const now = new Date('2025-01-01T13:00:00Z');

    const running = dispatcher.runCycle(now);
    const overlapping = await dispatcher.runCycle(now);
    await running;

    expect(overlapping).toBeNull();
  });

  it('respects the batch limit', async () => {
    for (let index = 0; index < 3; index++) {
      await registry.createSchedule(GUILD, 'interval', { kind: 'interval', everyMinutes: 60 }, { message: `#${index}`, dm: false });
    }
    const dispatcher = new Dispatcher(context, sink, { batchLimit: 2 });

    const stats = await dispatcher.runCycle(new Date('2025-01-01T13:00:00Z'));
    expect(stats?.delivered).toBe(2);
  });

  it('starts and stops its poller', async () => {
    vi.useFakeTimers();
    try {
      const dispatcher = new Dispatcher(context, sink, { intervalMs: 5_000 });
      dispatcher.start();
      expect(dispatcher.isRunning()).toBe(true);
      await dispatcher.stop();
      expect(dispatcher.isRunning()).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });

  it('waits for the running cycle when stopped', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const slowSink = new RecordingSink(async () => {
      await gate;
      return { status: 'acknowledged' };
    });
    await registry.createSchedule(GUILD, 'interval', { kind: 'interval', everyMinutes: 60 }, { message: 'Hydrate', dm: false });
    const dispatcher = new Dispatcher(context, slowSink);

    const running = dispatcher.runCycle(new Date('2025-01-01T13:00:00Z'));
    let stopped = false;
    const stopping = dispatcher.stop().then(() => {
      stopped = true;
    });

    await new Promise(resolve => setImmediate(resolve));
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(stopped).toBe(true);
    expect((await running)?.delivered).toBe(1);
  });

  it('keeps a daily ping on its local hour after a time skipped by DST', async () => {
    await registry.setTenantTimezone(GUILD, 'America/New_York');
    const schedule = await registry.createSchedule(
      GUILD,
      'interval',
      { kind: 'interval', everyMinutes: 1440, startsAt: '2025-03-08T02:30' },
      { message: 'Nightly backup check', dm: false },
    );
    const dispatcher = new Dispatcher(context, sink);

    const fired: string[] = [];
    for (let day = 0; day < 4; day++) {
      const { nextFireAt } = await stored(schedule.id);
      if (!nextFireAt) {
        throw new Error('schedule stopped firing');
      }
      fired.push(nextFireAt.toISOString());
      await dispatcher.runCycle(nextFireAt);
    }

    // 02:30 EST, 03:30 EDT (02:30 does not exist on March 9), then 02:30 EDT again
    expect(fired).toEqual([
      '2025-03-08T07:30:00.000Z',
      '2025-03-09T07:30:00.000Z',
      '2025-03-10T06:30:00.000Z',
      '2025-03-11T06:30:00.000Z',
    ]);
    expect(sink.requests).toHaveLength(4);
    expect((await stored(schedule.id)).anchorLocal).toBe('2025-03-08T02:30');
  });
});
