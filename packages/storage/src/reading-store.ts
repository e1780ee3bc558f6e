/**
 * ReadingStore contract
 *
 * Single writer (the monitor loop), any number of readers (history views).
 * Readings come back in chronological order.
 */

import type { Reading, Timestamp } from "@glucose-alarm/core";

/**
 * Outcome of an append. A reading with an already-stored timestamp is a
 * duplicate; one older than the store's retention window is expired and
 * not kept.
 */
export type AppendOutcome = "stored" | "duplicate" | "expired";

export interface ReadingStore {
  /** Persist a reading. Appending the same timestamp twice is harmless. */
  append(reading: Reading): Promise<AppendOutcome>;
  /** Readings with since <= timestamp <= until, oldest first */
  query(since: Timestamp, until?: Timestamp): Promise<Reading[]>;
  /** Most recent reading, if any */
  latest(): Promise<Reading | null>;
}
