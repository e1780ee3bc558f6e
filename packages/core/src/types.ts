/**
 * Core types for the glucose alarm
 */

/** Unix timestamp in milliseconds */
export type Timestamp = number;

/** Unit every reading of a deployment is expressed in */
export type GlucoseUnit = "mmol/L" | "mg/dL";

/** Direction of travel reported alongside a reading */
export type Trend = "rising" | "falling" | "steady" | "unknown";

/** A single glucose measurement */
export interface Reading {
  /** Glucose value in the deployment's unit */
  readonly value: number;
  readonly timestamp: Timestamp;
  readonly trend: Trend;
}

/** Classification of a reading against the thresholds */
export type AlertCondition = "normal" | "low" | "high";

/** Conditions that make a sink audible */
export type AlertKind = Exclude<AlertCondition, "normal">;

/** Low/high boundaries, in the deployment's unit */
export interface Thresholds {
  lowThreshold: number;
  highThreshold: number;
  /** At or below this a low sounds on every cycle, snoozed or not */
  urgentLow?: number;
  /** Minutes a low must last before it first sounds (default 0) */
  lowPersistMinutes?: number;
  /** Minutes a high must last before it first sounds (default 0) */
  highPersistMinutes?: number;
}

/** Settings a monitoring session runs with; fixed until the next session */
export interface ThresholdConfig extends Thresholds {
  pollIntervalSeconds: number;
  /** Minimum spacing between repeated alerts for the same condition */
  alertIntervalSeconds: number;
}

/** Alert bookkeeping owned by a single monitor */
export interface AlertState {
  readonly condition: AlertCondition;
  /** Onset of the current excursion */
  readonly activeSince: Timestamp | null;
  /** Null while an excursion is still waiting out its persistence time */
  readonly lastFiredAt: Timestamp | null;
  readonly snoozedUntil: Timestamp | null;
}

/** External request to silence repeats for a while */
export interface SnoozeRequest {
  durationSeconds: number;
}

/** What the state machine asks the sink to do */
export type SinkCommand =
  | { type: "play"; condition: AlertKind }
  | { type: "stop" };

/** Result of feeding one classification into the state machine */
export interface AlertTransition {
  state: AlertState;
  command: SinkCommand | null;
}

/** Per-cycle inputs to a transition beyond the classification */
export interface TransitionOptions {
  /** The reading is at or below the urgent-low threshold */
  urgent?: boolean;
  /** Minutes the condition has to last before its first alert */
  persistMinutes?: number;
}
