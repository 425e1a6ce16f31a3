import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { MailAttachment, MailTransport, MotionEvent } from '../types.js';
import { jpegEncoder, type FrameEncoder } from '../video/vision.js';
import { composeNotification, isAnomaly } from './format.js';
import { RunningStats } from './stats.js';
import { Throttle } from './throttle.js';

export const SNAPSHOT_FILENAME = 'snapshot.jpg';
export const SNAPSHOT_CONTENT_TYPE = 'image/jpeg';
export const DEFAULT_JPEG_QUALITY = 90;

export type DispatchConfig = {
  to: string;
  from?: string;
  subject: string;
  body: string;
  minIntervalSeconds: number;
  anomalyThreshold: number;
  snapshot: boolean;
  jpegQuality?: number;
};

export type DispatchResult =
  | { status: 'suppressed' }
  | { status: 'sent'; messageId: string; anomaly: boolean; attachment: boolean };

export type NotificationDispatcherOptions = {
  transport: MailTransport;
  stats?: RunningStats;
  throttle?: Throttle;
  encoder?: FrameEncoder;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/**
 * Turns motion events into mail. Events inside the cooldown are dropped
 * without touching the statistics; everything else is counted before the send
 * is attempted, and a failed send propagates with the counts left in place.
 */
export class NotificationDispatcher {
  readonly stats: RunningStats;
  private readonly throttle: Throttle;
  private readonly encoder: FrameEncoder;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: NotificationDispatcherOptions) {
    this.stats = options.stats ?? new RunningStats();
    this.throttle = options.throttle ?? new Throttle();
    this.encoder = options.encoder ?? jpegEncoder;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  async onEvent(event: MotionEvent, config: DispatchConfig): Promise<DispatchResult> {
    if (!this.throttle.shouldSend(event.timestamp, config.minIntervalSeconds)) {
      this.metrics.incrementDetectorCounter('notifier', 'suppressed', 1);
      this.logger.debug(
        { motionArea: event.motionArea, lastSentAt: this.throttle.getLastSentAt() },
        'Notification suppressed by cooldown'
      );
      return { status: 'suppressed' };
    }

    const anomaly = isAnomaly(event.numContours, config.anomalyThreshold);
    this.stats.record({ motionArea: event.motionArea, numContours: event.numContours, anomaly });
    if (anomaly) {
      this.metrics.incrementDetectorCounter('notifier', 'anomalies', 1);
    }

    const message = composeNotification(event, config, anomaly);
    const attachment = config.snapshot ? this.buildSnapshot(event, config) : undefined;

    let messageId: string;
    try {
      messageId = await this.options.transport.send({
        to: config.to,
        from: config.from,
        subject: message.subject,
        body: message.body,
        attachment
      });
    } catch (error) {
      this.metrics.incrementDetectorCounter('notifier', 'failed', 1);
      throw error;
    }

    this.throttle.markSent(event.timestamp);
    this.metrics.incrementDetectorCounter('notifier', 'sent', 1);
    this.logger.info(
      {
        messageId,
        motionArea: event.motionArea,
        numContours: event.numContours,
        anomaly,
        attachment: attachment !== undefined
      },
      'Motion notification sent'
    );

    return { status: 'sent', messageId, anomaly, attachment: attachment !== undefined };
  }

  private buildSnapshot(event: MotionEvent, config: DispatchConfig): MailAttachment | undefined {
    if (!event.frame) {
      return undefined;
    }

    const result = this.encoder.encodeJpeg(event.frame, config.jpegQuality ?? DEFAULT_JPEG_QUALITY);
    if (!result.ok) {
      this.metrics.incrementDetectorCounter('notifier', 'snapshotFailures', 1);
      this.logger.warn({ err: result.error }, 'Snapshot encoding failed; sending without attachment');
      return undefined;
    }

    return { filename: SNAPSHOT_FILENAME, content: result.data, contentType: SNAPSHOT_CONTENT_TYPE };
  }
}
