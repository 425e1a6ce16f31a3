import loggerModule, { type Logger } from './logger.js';
import metricsModule, { type MetricsRegistry } from './metrics/index.js';
import { ConfigurationError, MailSendError } from './errors.js';
import type { CameraConfig, CenConfig } from './config/index.js';
import type { CenServices } from './app.js';
import { NotificationDispatcher } from './notify/dispatcher.js';
import { SummaryTask } from './tasks/summary.js';
import { MotionSampler } from './video/motionSampler.js';
import { CameraSource, resolveCameraInput } from './video/source.js';
import { CameraVision, type VisionBackend } from './video/vision.js';
import type { AuthorizationMode } from './types.js';

export type MonitorOptions = {
  config: CenConfig;
  services: Pick<CenServices, 'backend' | 'store' | 'transport'>;
  vision?: VisionBackend;
  mode?: AuthorizationMode;
  signal?: AbortSignal;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type MonitorResult = {
  events: number;
  sent: number;
  suppressed: number;
  failed: number;
};

export function createCameraVision(camera: CameraConfig, logger: Logger = loggerModule): VisionBackend {
  const input = resolveCameraInput(camera);
  const source = new CameraSource({
    ...input,
    framesPerSecond: camera.framesPerSecond,
    width: camera.width,
    frameTimeoutMs: camera.frameTimeoutMs,
    ffmpegPath: camera.ffmpegPath,
    logger
  });
  return new CameraVision(source, logger);
}

/**
 * Foreground loop: samples motion, dispatches each event to completion
 * before pulling the next frame, and runs the summary task alongside. Returns
 * once the signal aborts or the camera stream ends.
 */
export async function runMonitor(options: MonitorOptions): Promise<MonitorResult> {
  const { config, services } = options;
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? metricsModule;
  const notifications = config.notifications;

  if (!notifications.to) {
    throw new ConfigurationError('A recipient address is required (--to or CEN_NOTIFY_TO)');
  }

  await services.store.ensureValid(services.backend, {
    mode: options.mode,
    loginHint: config.oauth.loginHint,
    signal: options.signal
  });

  const result: MonitorResult = { events: 0, sent: 0, suppressed: 0, failed: 0 };
  if (options.signal?.aborted) {
    return result;
  }

  const vision = options.vision ?? createCameraVision(config.camera, logger);
  const sampler = new MotionSampler(vision, {
    sensitivity: config.motion.sensitivity,
    diffThreshold: config.camera.diffThreshold,
    retryDelayMs: config.camera.captureRetryMs,
    now: options.now,
    sleep: options.sleep,
    metrics
  });
  const dispatcher = new NotificationDispatcher({
    transport: services.transport,
    logger,
    metrics
  });
  const summary = new SummaryTask({
    enabled: config.summary.enabled,
    intervalMinutes: config.summary.intervalMinutes,
    subject: config.summary.subject,
    to: notifications.to,
    from: notifications.from,
    stats: dispatcher.stats,
    transport: services.transport,
    logger,
    metrics
  });

  const onAbort = () => {
    logger.info('Stopping monitor');
    sampler.close().catch(error => {
      logger.error({ err: error }, 'Failed to release camera');
    });
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  summary.start();
  logger.info(
    {
      sensitivity: config.motion.sensitivity,
      minIntervalSeconds: notifications.minIntervalSeconds,
      summary: config.summary.enabled
    },
    'Monitoring started'
  );

  try {
    for await (const event of sampler) {
      result.events += 1;
      try {
        const outcome = await dispatcher.onEvent(event, notifications);
        if (outcome.status === 'sent') {
          result.sent += 1;
        } else {
          result.suppressed += 1;
        }
      } catch (error) {
        if (!(error instanceof MailSendError)) {
          throw error;
        }
        result.failed += 1;
        logger.error({ err: error, motionArea: event.motionArea }, 'Motion notification failed');
      }
    }
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    summary.stop();
    await sampler.close();
    logger.info({ ...result, metrics: metrics.snapshot() }, 'Monitoring stopped');
  }

  return result;
}
