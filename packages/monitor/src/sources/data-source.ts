import type { Reading } from "@glucose-alarm/core";

/**
 * Anything that can produce the most recent glucose reading.
 * Implementations reject on failure; the monitor applies its own timeout.
 */
export interface DataSource {
  readonly name: string;
  fetchLatest(signal?: AbortSignal): Promise<Reading>;
}
