/**
 * Error taxonomy for the monitor.
 *
 * Only ConfigurationError is fatal. The others are reported and the
 * monitor keeps running.
 */

export enum MonitorErrorCode {
  CONFIG_INVALID = "Invalid configuration",
  SNOOZE_INVALID = "Snooze duration must be a positive integer number of seconds",

  FETCH_FAILED = "Failed to fetch latest reading",
  FETCH_TIMEOUT = "Timed out fetching latest reading",
  NO_READINGS = "No glucose readings available",

  PERSIST_FAILED = "Failed to store reading",
  SINK_FAILED = "Alert sink failed",

  SOURCE_AUTH_FAILED = "Failed to authenticate with glucose source",
  SOURCE_SESSION_INVALID = "Glucose source session not active or timed out",
  SOURCE_UNEXPECTED = "Unexpected response from glucose source",
}

export class MonitorError extends Error {
  constructor(
    public readonly code: MonitorErrorCode,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ? `${code}: ${message}` : code, options);
    this.name = "MonitorError";
  }
}

export class ConfigurationError extends MonitorError {
  constructor(
    public readonly issues: string[],
    code: MonitorErrorCode = MonitorErrorCode.CONFIG_INVALID
  ) {
    super(code, issues.join("; "));
    this.name = "ConfigurationError";
  }
}

export class FetchError extends MonitorError {
  constructor(
    public readonly timedOut: boolean,
    options?: { cause?: unknown; code?: MonitorErrorCode }
  ) {
    const code =
      options?.code ??
      (timedOut ? MonitorErrorCode.FETCH_TIMEOUT : MonitorErrorCode.FETCH_FAILED);
    super(code, describeCause(options?.cause), { cause: options?.cause });
    this.name = "FetchError";
  }
}

export class PersistenceError extends MonitorError {
  constructor(cause: unknown) {
    super(MonitorErrorCode.PERSIST_FAILED, describeCause(cause), { cause });
    this.name = "PersistenceError";
  }
}

export class SinkError extends MonitorError {
  constructor(
    public readonly action: "play" | "stop",
    cause: unknown
  ) {
    super(MonitorErrorCode.SINK_FAILED, `${action}: ${describeCause(cause) ?? "unknown"}`, {
      cause,
    });
    this.name = "SinkError";
  }
}

export class SourceError extends MonitorError {
  constructor(
    code: MonitorErrorCode,
    detail?: string,
    /** HTTP status of the failed request, when there was one */
    public readonly status?: number
  ) {
    super(code, detail);
    this.name = "SourceError";
  }
}

/**
 * Short human-readable description of an unknown thrown value
 */
export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
