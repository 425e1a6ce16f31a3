import pino from 'pino';
import './config/directory.js';
import config from 'config';
import metrics from './metrics/index.js';
import { isRecord } from './types.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'cen';

const AVAILABLE_LOG_LEVELS = new Set([
  ...Object.keys(pino.levels.values).map(entry => entry.toLowerCase()),
  'silent'
]);

type LogContext = {
  message?: string;
  detector?: string;
};

export type Logger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let detector: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      const candidate = value;
      if (typeof candidate.detector === 'string' && candidate.detector.length > 0 && !detector) {
        detector = candidate.detector;
      }
      if (typeof candidate.message === 'string' && candidate.message.length > 0 && !message) {
        message = candidate.message;
      }
    }
  }

  return { message, detector };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, currentLevel);
});

function assertLevel(candidate: string) {
  if (!AVAILABLE_LOG_LEVELS.has(candidate)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${candidate}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = nextLevel.trim().toLowerCase();
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  logger.debug({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export default logger;
