import { setTimeout as delay } from 'node:timers/promises';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { MotionEvent, RgbaFrame } from '../types.js';
import type { GrayscaleFrame } from './utils.js';
import type { VisionBackend } from './vision.js';

const DEFAULT_DIFF_THRESHOLD = 25;
const DEFAULT_RETRY_DELAY_MS = 100;

export interface MotionSamplerOptions {
  sensitivity: number;
  diffThreshold?: number;
  retryDelayMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  metrics?: MetricsRegistry;
}

/**
 * Frame-differencing motion detector exposed as a lazy async stream. The
 * reference frame slides forward every sample, so slow drift and objects that
 * stop moving fade out of the diff.
 *
 * The stream owns the vision backend: `close()` (or leaving a `for await`
 * loop) releases it. A closed sampler cannot be restarted.
 */
export class MotionSampler implements AsyncIterableIterator<MotionEvent> {
  private previousFrame: GrayscaleFrame | null = null;
  private closed = false;
  private closePromise: Promise<void> | null = null;
  private readonly diffThreshold: number;
  private readonly retryDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly metrics: MetricsRegistry;

  constructor(
    private readonly vision: VisionBackend,
    private readonly options: MotionSamplerOptions
  ) {
    this.diffThreshold = options.diffThreshold ?? DEFAULT_DIFF_THRESHOLD;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.metrics = options.metrics ?? metricsModule;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<MotionEvent> {
    return this;
  }

  async next(): Promise<IteratorResult<MotionEvent, undefined>> {
    while (!this.closed) {
      const frame = await this.vision.captureFrame();
      if (this.closed) {
        break;
      }

      if (!frame) {
        this.metrics.incrementDetectorCounter('motion', 'captureFailures', 1);
        await this.sleep(this.retryDelayMs);
        continue;
      }

      const event = this.observe(frame);
      if (event) {
        return { done: false, value: event };
      }
    }

    return { done: true, value: undefined };
  }

  async return(): Promise<IteratorResult<MotionEvent, undefined>> {
    await this.close();
    return { done: true, value: undefined };
  }

  /**
   * Feeds one captured frame through the detector and reports the motion it
   * carries relative to the previous frame, if any.
   */
  observe(frame: RgbaFrame): MotionEvent | null {
    this.metrics.incrementDetectorCounter('motion', 'frames', 1);
    const gray = this.vision.toGrayscale(frame);
    const previous = this.previousFrame;

    if (!previous || previous.width !== gray.width || previous.height !== gray.height) {
      this.previousFrame = gray;
      return null;
    }

    const diff = this.vision.absDiff(previous, gray);
    const mask = this.vision.threshold(diff, this.diffThreshold);
    const contours = this.vision.findContours(mask);

    let motionArea = 0;
    let numContours = 0;
    for (const contour of contours) {
      const area = this.vision.contourArea(contour);
      if (area >= this.options.sensitivity) {
        motionArea += Math.trunc(area);
        numContours += 1;
      }
    }

    this.previousFrame = gray;

    if (motionArea <= 0) {
      return null;
    }

    this.metrics.incrementDetectorCounter('motion', 'events', 1);
    this.metrics.setDetectorGauge('motion', 'lastMotionArea', motionArea);
    return Object.freeze({
      timestamp: this.now(),
      frame,
      motionArea,
      numContours
    });
  }

  close(): Promise<void> {
    if (!this.closePromise) {
      this.closed = true;
      this.previousFrame = null;
      this.closePromise = this.vision.release();
    }
    return this.closePromise;
  }

  isClosed() {
    return this.closed;
  }
}
