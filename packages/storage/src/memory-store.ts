/**
 * In-memory reading store
 *
 * Appends replace the backing array instead of mutating it, so a reader
 * holding a snapshot keeps a consistent sequence while the loop writes.
 */

import type { Reading, Timestamp } from "@glucose-alarm/core";
import type { AppendOutcome, ReadingStore } from "./reading-store.js";

export interface MemoryStoreOptions {
  /** Drop readings older than this many hours on every append */
  retentionHours?: number;
  /** Clock used for retention (default Date.now) */
  now?: () => number;
}

/**
 * Index of the first reading with timestamp >= target
 */
function lowerBound(readings: readonly Reading[], target: Timestamp): number {
  let lo = 0;
  let hi = readings.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (readings[mid].timestamp < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export class MemoryReadingStore implements ReadingStore {
  private readings: readonly Reading[] = [];
  private readonly retentionMs: number | null;
  private readonly now: () => number;

  constructor(options: MemoryStoreOptions = {}) {
    this.retentionMs =
      options.retentionHours !== undefined ? options.retentionHours * 60 * 60 * 1000 : null;
    this.now = options.now ?? Date.now;
  }

  append(reading: Reading): Promise<AppendOutcome> {
    const cutoff = this.retentionMs !== null ? this.now() - this.retentionMs : null;
    if (cutoff !== null && reading.timestamp < cutoff) {
      return Promise.resolve("expired");
    }

    const current = this.readings;
    const last = current[current.length - 1];

    let next: Reading[];
    if (!last || reading.timestamp > last.timestamp) {
      // Common case: the newest reading goes on the end
      next = [...current, reading];
    } else {
      const index = lowerBound(current, reading.timestamp);
      if (current[index]?.timestamp === reading.timestamp) {
        return Promise.resolve("duplicate");
      }
      next = [...current.slice(0, index), reading, ...current.slice(index)];
    }

    if (cutoff !== null) {
      next = next.slice(lowerBound(next, cutoff));
    }

    this.readings = next;
    return Promise.resolve("stored");
  }

  query(since: Timestamp, until: Timestamp = Number.MAX_SAFE_INTEGER): Promise<Reading[]> {
    const snapshot = this.readings;
    const start = lowerBound(snapshot, since);
    const end = lowerBound(snapshot, until + 1);
    return Promise.resolve(snapshot.slice(start, end));
  }

  latest(): Promise<Reading | null> {
    const snapshot = this.readings;
    return Promise.resolve(snapshot[snapshot.length - 1] ?? null);
  }

  /**
   * Remove readings older than a cutoff.
   * @returns number of readings removed
   */
  prune(before: Timestamp): number {
    const snapshot = this.readings;
    const index = lowerBound(snapshot, before);
    if (index > 0) this.readings = snapshot.slice(index);
    return index;
  }

  /** Number of readings held */
  get size(): number {
    return this.readings.length;
  }
}
