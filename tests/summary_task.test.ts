import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MailSendError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { RunningStats } from '../src/notify/stats.js';
import { SummaryTask } from '../src/tasks/summary.js';
import { RecordingTransport, createSilentLogger } from './helpers/fakes.js';

const PERIOD_MS = 60 * 60_000;

async function flushMicrotasks() {
  for (let i = 0; i < 10; i += 1) {
    await Promise.resolve();
  }
}

describe('SummaryTask', () => {
  let stats: RunningStats;
  let transport: RecordingTransport;
  let metrics: MetricsRegistry;
  let logger: ReturnType<typeof createSilentLogger>;
  let task: SummaryTask | null;

  function createTask(enabled: boolean) {
    task = new SummaryTask({
      enabled,
      intervalMinutes: 60,
      subject: 'CEN hourly summary',
      to: 'owner@example.test',
      stats,
      transport,
      logger,
      metrics
    });
    return task;
  }

  async function advance(ms: number) {
    await vi.advanceTimersByTimeAsync(ms);
    await flushMicrotasks();
  }

  beforeEach(() => {
    vi.useFakeTimers();
    stats = new RunningStats();
    transport = new RecordingTransport();
    metrics = new MetricsRegistry();
    logger = createSilentLogger();
    task = null;
  });

  afterEach(() => {
    task?.stop();
    vi.useRealTimers();
  });

  it('waits a full period before the first summary', async () => {
    stats.record({ motionArea: 400, numContours: 2, anomaly: false });
    createTask(true).start();

    await advance(PERIOD_MS - 1);
    expect(transport.messages).toHaveLength(0);

    await advance(1);
    expect(transport.messages).toHaveLength(1);
    expect(transport.messages[0]).toMatchObject({
      to: 'owner@example.test',
      subject: 'CEN hourly summary'
    });
    expect(transport.messages[0]?.body).toContain('Events: 1');
    expect(stats.peek().events).toBe(0);
  });

  it('keeps its cadence while disabled', async () => {
    stats.record({ motionArea: 400, numContours: 2, anomaly: false });
    const summary = createTask(false);
    summary.start();

    await advance(PERIOD_MS * 2);

    expect(transport.messages).toHaveLength(0);
    expect(stats.peek().events).toBe(1);
    expect(metrics.snapshot().detectors.summary?.counters.skipped).toBe(2);
    expect(summary.isRunning()).toBe(true);
    expect(vi.getTimerCount()).toBe(1);
  });

  it('swallows send failures and still resets the counters', async () => {
    stats.record({ motionArea: 900, numContours: 6, anomaly: true });
    transport.failures.push(new MailSendError('Gmail send failed: 503'));
    createTask(true).start();

    await advance(PERIOD_MS);

    expect(transport.messages).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(stats.peek()).toEqual({
      events: 0,
      totalMotionArea: 0,
      maxMotionArea: 0,
      maxContours: 0,
      anomalies: 0
    });

    await advance(PERIOD_MS);

    expect(transport.messages).toHaveLength(1);
    expect(transport.messages[0]?.body).toContain('Events: 0');
    expect(metrics.snapshot().detectors.summary?.counters).toMatchObject({
      runs: 2,
      sent: 1,
      errors: 1
    });
  });

  it('sends nothing after stop', async () => {
    const summary = createTask(true);
    summary.start();
    summary.stop();

    await advance(PERIOD_MS * 3);

    expect(transport.messages).toHaveLength(0);
    expect(summary.isRunning()).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('reports the outcome of a single run', async () => {
    stats.record({ motionArea: 100, numContours: 1, anomaly: false });
    const summary = createTask(true);

    const result = await summary.runOnce();

    expect(result).toEqual({
      skipped: false,
      sent: true,
      messageId: 'msg-1',
      snapshot: { events: 1, totalMotionArea: 100, maxMotionArea: 100, maxContours: 1, anomalies: 0 }
    });

    await expect(createTask(false).runOnce()).resolves.toEqual({
      skipped: true,
      reason: 'disabled'
    });
  });
});
