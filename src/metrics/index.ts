import { EventEmitter } from 'node:events';

type CounterMap = Record<string, number>;

type DetectorMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

type DetectorSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    byDetector: Record<string, CounterMap>;
    currentLevel: string;
    lastLevelChangeAt: string | null;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  detectors: Record<string, DetectorSnapshot>;
};

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByDetector = new Map<string, Map<string, number>>();
  private readonly detectorMetrics = new Map<string, DetectorMetricState>();
  private readonly events = new EventEmitter();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByDetector.clear();
    this.detectorMetrics.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.events.emit('reset');
  }

  onReset(listener: () => void) {
    this.events.on('reset', listener);
    return () => {
      this.events.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; detector?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.detector) {
      const detectorMap =
        this.logLevelByDetector.get(context.detector) ?? new Map<string, number>();
      detectorMap.set(normalized, (detectorMap.get(normalized) ?? 0) + 1);
      this.logLevelByDetector.set(context.detector, detectorMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  incrementDetectorCounter(detector: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
    state.lastRunAt = Date.now();
  }

  setDetectorGauge(detector: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    state.gauges.set(gauge, value);
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  snapshot(): MetricsSnapshot {
    const detectors: Record<string, DetectorSnapshot> = {};
    for (const [name, state] of this.detectorMetrics) {
      detectors[name] = {
        counters: Object.fromEntries(state.counters),
        gauges: Object.fromEntries(state.gauges),
        lastRunAt: toIso(state.lastRunAt),
        lastErrorAt: toIso(state.lastErrorAt),
        lastErrorMessage: state.lastErrorMessage
      };
    }

    const byDetector: Record<string, CounterMap> = {};
    for (const [detector, levels] of this.logLevelByDetector) {
      byDetector[detector] = Object.fromEntries(levels);
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: Object.fromEntries(this.logLevelCounters),
        byDetector,
        currentLevel: this.currentLogLevel,
        lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      detectors
    };
  }
}

function getDetectorMetricState(
  map: Map<string, DetectorMetricState>,
  detector: string
): DetectorMetricState {
  const existing = map.get(detector);
  if (existing) {
    return existing;
  }
  const created: DetectorMetricState = {
    counters: new Map<string, number>(),
    gauges: new Map<string, number>(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null
  };
  map.set(detector, created);
  return created;
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

const defaultRegistry = new MetricsRegistry();

export type { DetectorSnapshot, MetricsSnapshot };
export { MetricsRegistry };
export default defaultRegistry;
