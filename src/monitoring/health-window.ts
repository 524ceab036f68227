/**
 * HealthWindow - fixed-duration sliding samples keyed by fact name
 *
 * Pure data structure with no timers and no I/O. Every read evicts samples
 * older than the window before computing its result, so memory is bounded
 * by arrival rate x window duration.
 *
 * All timestamps and durations are epoch milliseconds.
 */

import { ValidationError } from "../errors/app.errors";
import { systemClock, type Clock } from "../models/common";

export type HealthSampleValue = number | string | boolean;

export interface HealthSample {
  timestamp: number;
  value: HealthSampleValue;
}

export class HealthWindow {
  private readonly samples = new Map<string, HealthSample[]>();

  constructor(
    private readonly durationMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!(durationMs > 0)) {
      throw new ValidationError("Window duration must be positive", "durationMs");
    }
  }

  getDurationMs(): number {
    return this.durationMs;
  }

  /**
   * Append a sample. Late samples are inserted in timestamp order.
   */
  record(key: string, value: HealthSampleValue = 1, timestamp: number = this.clock()): void {
    let bucket = this.samples.get(key);
    if (!bucket) {
      bucket = [];
      this.samples.set(key, bucket);
    }

    let index = bucket.length;
    while (index > 0 && bucket[index - 1].timestamp > timestamp) {
      index--;
    }
    bucket.splice(index, 0, { timestamp, value });
  }

  /**
   * Number of samples within [now - durationMs, now]. The duration may be
   * shorter than the window but never longer.
   */
  countSince(key: string, durationMs: number, now: number = this.clock()): number {
    return this.samplesSince(key, durationMs, now).length;
  }

  /**
   * Events per second over the requested duration
   */
  rateSince(key: string, durationMs: number, now: number = this.clock()): number {
    const count = this.countSince(key, durationMs, now);
    return count / (durationMs / 1000);
  }

  /**
   * Most recent value still inside the window
   */
  lastValue(key: string, now: number = this.clock()): HealthSampleValue | undefined {
    const bucket = this.evict(key, now);
    if (bucket.length === 0) return undefined;
    return bucket[bucket.length - 1].value;
  }

  /**
   * Count per key over the full window
   */
  snapshot(now: number = this.clock()): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const key of this.samples.keys()) {
      counts[key] = this.evict(key, now).length;
    }
    return counts;
  }

  keys(): string[] {
    return Array.from(this.samples.keys());
  }

  /** Retained sample count across all keys, before eviction */
  size(): number {
    let total = 0;
    for (const bucket of this.samples.values()) total += bucket.length;
    return total;
  }

  clear(): void {
    this.samples.clear();
  }

  private samplesSince(key: string, durationMs: number, now: number): HealthSample[] {
    if (!(durationMs > 0)) {
      throw new ValidationError("Query duration must be positive", "durationMs");
    }
    if (durationMs > this.durationMs) {
      throw new ValidationError(
        `Query duration ${durationMs}ms exceeds window ${this.durationMs}ms`,
        "durationMs",
      );
    }
    const cutoff = now - durationMs;
    return this.evict(key, now).filter((s) => s.timestamp >= cutoff && s.timestamp <= now);
  }

  private evict(key: string, now: number): HealthSample[] {
    const bucket = this.samples.get(key);
    if (!bucket) return [];
    const cutoff = now - this.durationMs;
    let drop = 0;
    while (drop < bucket.length && bucket[drop].timestamp < cutoff) {
      drop++;
    }
    if (drop > 0) bucket.splice(0, drop);
    return bucket;
  }
}
