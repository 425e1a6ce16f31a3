import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import { composeSummary } from '../notify/format.js';
import type { RunningStats } from '../notify/stats.js';
import type { MailTransport, StatsSnapshot } from '../types.js';

export interface SummaryTaskOptions {
  enabled: boolean;
  intervalMinutes: number;
  subject: string;
  to: string;
  from?: string;
  stats: RunningStats;
  transport: MailTransport;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export type SummaryRunResult =
  | { skipped: true; reason: 'disabled' }
  | { skipped: false; snapshot: StatsSnapshot; sent: true; messageId: string }
  | { skipped: false; snapshot: StatsSnapshot; sent: false; error: Error };

export class SummaryTask {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(private readonly options: SummaryTaskOptions) {
    this.intervalMs = Math.max(1000, Math.floor(options.intervalMinutes * 60_000));
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  /** The first tick fires one full period after start. */
  start() {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(this.intervalMs);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning() {
    return this.timer !== null || this.running;
  }

  async runOnce(): Promise<SummaryRunResult> {
    const { enabled, subject, intervalMinutes, to, from } = this.options;
    if (!enabled) {
      this.metrics.incrementDetectorCounter('summary', 'skipped', 1);
      return { skipped: true, reason: 'disabled' };
    }

    const snapshot = this.options.stats.drain();
    const message = composeSummary(snapshot, subject, intervalMinutes);
    this.metrics.incrementDetectorCounter('summary', 'runs', 1);

    try {
      const messageId = await this.options.transport.send({
        to,
        from,
        subject: message.subject,
        body: message.body
      });
      this.metrics.incrementDetectorCounter('summary', 'sent', 1);
      this.logger.info({ messageId, events: snapshot.events }, 'Summary sent');
      return { skipped: false, snapshot, sent: true, messageId };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.metrics.recordDetectorError('summary', failure.message);
      this.logger.error({ err: failure, events: snapshot.events }, 'Summary send failed');
      return { skipped: false, snapshot, sent: false, error: failure };
    }
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
    this.timer.unref();
  }

  private async tick() {
    if (this.running) {
      return;
    }

    this.running = true;
    try {
      await this.runOnce();
    } catch (error) {
      this.logger.error({ err: error }, 'Summary task failed');
    } finally {
      this.running = false;
      this.scheduleNext(this.intervalMs);
    }
  }
}
