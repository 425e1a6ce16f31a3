import type { StatsSnapshot } from '../types.js';

export type StatsSample = {
  motionArea: number;
  numContours: number;
  anomaly: boolean;
};

function emptySnapshot(): StatsSnapshot {
  return { events: 0, totalMotionArea: 0, maxMotionArea: 0, maxContours: 0, anomalies: 0 };
}

/**
 * Counters shared by the event loop and the summary task. Every method is
 * synchronous, so a `record` can never interleave with a `drain`: the swap in
 * `drain` hands the old counters out and installs fresh ones in one step.
 */
export class RunningStats {
  private current: StatsSnapshot = emptySnapshot();

  record(sample: StatsSample) {
    const stats = this.current;
    stats.events += 1;
    stats.totalMotionArea += sample.motionArea;
    stats.maxMotionArea = Math.max(stats.maxMotionArea, sample.motionArea);
    stats.maxContours = Math.max(stats.maxContours, sample.numContours);
    if (sample.anomaly) {
      stats.anomalies += 1;
    }
  }

  /** Returns the counters accumulated so far and resets them to zero. */
  drain(): StatsSnapshot {
    const drained = this.current;
    this.current = emptySnapshot();
    return drained;
  }

  peek(): StatsSnapshot {
    return { ...this.current };
  }
}
