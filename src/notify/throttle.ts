/**
 * Global cooldown between sent notifications, keyed on event time in ms.
 * Intervals below one second are raised to one second.
 */
export class Throttle {
  private lastSentAt: number | null = null;

  shouldSend(timestamp: number, minIntervalSeconds: number): boolean {
    if (this.lastSentAt === null) {
      return true;
    }
    return timestamp - this.lastSentAt >= Math.max(1, minIntervalSeconds) * 1000;
  }

  markSent(timestamp: number) {
    this.lastSentAt = timestamp;
  }

  getLastSentAt() {
    return this.lastSentAt;
  }
}
