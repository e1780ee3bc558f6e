import {
  MonitorErrorCode,
  SourceError,
  fromMgdl,
  trendFromDexcom,
  type GlucoseUnit,
  type Reading,
} from "@glucose-alarm/core";
import type { BackoffOptions } from "../backoff.js";
import type { Logger } from "../logger.js";
import type { DataSource } from "./data-source.js";
import {
  fetchGlucoseReadings,
  getSessionId,
  parseDexcomTimestamp,
  type DexcomReading,
  type DexcomRegion,
  type DexcomRequestOptions,
} from "./dexcom-client.js";

export interface DexcomShareSourceOptions {
  username: string;
  password: string;
  region?: DexcomRegion;
  /** Unit readings are converted into */
  unit: GlucoseUnit;
  /** Look-back window for the latest reading, in minutes (default: 10) */
  windowMinutes?: number;
  retry?: BackoffOptions;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Convert a raw Dexcom reading into the deployment's unit and trend enum
 */
export function toReading(raw: DexcomReading, unit: GlucoseUnit): Reading {
  const timestamp = parseDexcomTimestamp(raw.WT);
  if (timestamp === 0) {
    throw new SourceError(MonitorErrorCode.SOURCE_UNEXPECTED, `unparseable timestamp ${raw.WT}`);
  }
  return {
    value: fromMgdl(raw.Value, unit),
    timestamp,
    trend: trendFromDexcom(raw.Trend),
  };
}

/**
 * Latest reading from Dexcom Share. The session is reused across fetches
 * and re-established once when Dexcom reports it expired.
 */
export class DexcomShareSource implements DataSource {
  readonly name = "dexcom";
  private sessionId: string | null = null;

  constructor(private readonly options: DexcomShareSourceOptions) {}

  async fetchLatest(signal?: AbortSignal): Promise<Reading> {
    const readings = await this.withSession(
      (sessionId) =>
        fetchGlucoseReadings(sessionId, this.options.windowMinutes ?? 10, 1, {
          ...this.requestOptions(),
          signal,
        }),
      signal
    );

    const latest = readings[0];
    if (!latest) {
      throw new SourceError(MonitorErrorCode.NO_READINGS);
    }
    return toReading(latest, this.options.unit);
  }

  /** Drop the cached session so the next fetch logs in again */
  reset(): void {
    this.sessionId = null;
  }

  private async withSession<T>(
    operation: (sessionId: string) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const sessionId = this.sessionId ?? (await this.login(signal));
    try {
      return await operation(sessionId);
    } catch (error) {
      if (error instanceof SourceError && error.code === MonitorErrorCode.SOURCE_SESSION_INVALID) {
        this.options.logger?.warn("Dexcom session expired, logging in again");
        this.sessionId = null;
        return operation(await this.login(signal));
      }
      throw error;
    }
  }

  private async login(signal?: AbortSignal): Promise<string> {
    const sessionId = await getSessionId(
      { username: this.options.username, password: this.options.password },
      { ...this.requestOptions(), signal }
    );
    this.sessionId = sessionId;
    return sessionId;
  }

  private requestOptions(): DexcomRequestOptions {
    return {
      region: this.options.region,
      retry: this.options.retry,
      sleep: this.options.sleep,
      logger: this.options.logger,
    };
  }
}
