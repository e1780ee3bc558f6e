/**
 * Monitor loop
 *
 * Polls the data source on a fixed cadence, stores each reading, classifies
 * it against the thresholds in force and drives the alert sink through the
 * alert state machine. Failures of the source, store or sink are reported
 * as events and never end the loop; only invalid configuration is fatal.
 */

import { EventEmitter } from "events";
import {
  ConfigurationError,
  FetchError,
  INITIAL_ALERT_STATE,
  PersistenceError,
  SinkError,
  applySnooze,
  cancelSnooze,
  classify,
  effectiveThresholds,
  formatGlucose,
  isSnoozed,
  isUrgentLow,
  transition,
  trendArrow,
  validateSchedules,
  validateSnoozeRequest,
  validateThresholdConfig,
  type AlertCondition,
  type AlertState,
  type GlucoseUnit,
  type MonitorError,
  type Reading,
  type SinkCommand,
  type SnoozeRequest,
  type ThresholdConfig,
  type ThresholdSchedule,
  type Thresholds,
  type Timestamp,
} from "@glucose-alarm/core";
import type { AppendOutcome, ReadingStore } from "@glucose-alarm/storage";
import { nextTick, systemClock, type Clock } from "./clock.js";
import type { Logger } from "./logger.js";
import type { AlertSink } from "./sinks/alert-sink.js";
import type { DataSource } from "./sources/data-source.js";

export interface MonitorOptions {
  config: ThresholdConfig;
  source: DataSource;
  store: ReadingStore;
  sink: AlertSink;
  /** Unit readings and thresholds are expressed in (default: mmol/L) */
  unit?: GlucoseUnit;
  schedules?: ThresholdSchedule[];
  /** Timezone schedules are evaluated in (default: the system's) */
  timeZone?: string;
  /** Wait before the first fetch (default: 0) */
  startupDelayMinutes?: number;
  /** Give up on a fetch after this long (default: 10) */
  fetchTimeoutSeconds?: number;
  /** Failures in a row before the loop warns loudly (default: 5) */
  maxConsecutiveFailures?: number;
  clock?: Clock;
  logger?: Logger;
}

export type CycleResult =
  | {
      outcome: "completed";
      reading: Reading;
      condition: AlertCondition;
      command: SinkCommand | null;
      stored: AppendOutcome | "failed";
    }
  | { outcome: "failed"; error: FetchError }
  | { outcome: "aborted" };

export interface MonitorStatus {
  running: boolean;
  state: AlertState;
  snoozed: boolean;
  lastReading: Reading | null;
  consecutiveFailures: number;
  thresholds: Thresholds;
}

/** One snooze as requested, and when it was cancelled if it was */
export interface SnoozeEvent {
  startedAt: Timestamp;
  durationSeconds: number;
  cancelledAt: Timestamp | null;
}

/** Snoozes kept for snoozeHistory() */
const SNOOZE_HISTORY_LIMIT = 50;

export interface MonitorEvents {
  started: [];
  stopped: [];
  reading: [reading: Reading, condition: AlertCondition];
  transition: [previous: AlertState, next: AlertState];
  command: [command: SinkCommand];
  snooze: [state: AlertState];
  error: [error: MonitorError];
}

type FetchAttempt =
  | { status: "ok"; reading: Reading }
  | { status: "error"; error: unknown }
  | { status: "timeout" }
  | { status: "aborted" };

export class MonitorLoop {
  private readonly config: ThresholdConfig;
  private readonly schedules: ThresholdSchedule[];
  private readonly source: DataSource;
  private readonly store: ReadingStore;
  private readonly sink: AlertSink;
  private readonly unit: GlucoseUnit;
  private readonly timeZone: string | undefined;
  private readonly startupDelayMinutes: number;
  private readonly fetchTimeoutSeconds: number;
  private readonly maxConsecutiveFailures: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly events = new EventEmitter();

  private state: AlertState = INITIAL_ALERT_STATE;
  private lastReading: Reading | null = null;
  private consecutiveFailures = 0;
  private snoozes: SnoozeEvent[] = [];
  private controller: AbortController | null = null;
  /** Aborted by stop(); reaches every cycle, whoever started it */
  private halt = new AbortController();
  private loop: Promise<void> | null = null;
  private inFlight: Promise<CycleResult> | null = null;

  constructor(options: MonitorOptions) {
    this.config = validateThresholdConfig(options.config);
    this.schedules = validateSchedules(this.config, options.schedules ?? []);

    this.startupDelayMinutes = options.startupDelayMinutes ?? 0;
    this.fetchTimeoutSeconds = options.fetchTimeoutSeconds ?? 10;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 5;

    const issues: string[] = [];
    if (!Number.isFinite(this.startupDelayMinutes) || this.startupDelayMinutes < 0) {
      issues.push("startupDelayMinutes: must be zero or more");
    }
    if (!Number.isFinite(this.fetchTimeoutSeconds) || this.fetchTimeoutSeconds <= 0) {
      issues.push("fetchTimeoutSeconds: must be positive");
    }
    if (!Number.isInteger(this.maxConsecutiveFailures) || this.maxConsecutiveFailures < 1) {
      issues.push("maxConsecutiveFailures: must be a positive integer");
    }
    if (issues.length > 0) throw new ConfigurationError(issues);

    this.source = options.source;
    this.store = options.store;
    this.sink = options.sink;
    this.unit = options.unit ?? "mmol/L";
    this.timeZone = options.timeZone;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /**
   * Subscribe to a monitor event. Returns an unsubscribe function.
   */
  on<K extends keyof MonitorEvents>(
    event: K,
    listener: (...args: MonitorEvents[K]) => void
  ): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  /**
   * Run the loop until stop() is called. Resolves once the loop has ended.
   */
  start(): Promise<void> {
    if (this.loop) {
      return Promise.reject(new Error("Monitor is already running"));
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    return this.loop;
  }

  /**
   * Stop cooperatively: a pending sleep ends at once, and any cycle in
   * flight, including one started through runCycle(), finishes without
   * touching the sink.
   */
  async stop(): Promise<void> {
    const halt = this.halt;
    halt.abort();
    this.controller?.abort();
    await this.loop;
    if (this.halt === halt) this.halt = new AbortController();
  }

  /**
   * Run a single cycle now. A call while another cycle is in flight joins
   * that cycle instead of starting a second fetch.
   */
  runCycle(signal?: AbortSignal): Promise<CycleResult> {
    if (this.inFlight) return this.inFlight;
    const cycle = this.cycle(signal).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Fetch one reading to confirm the source is reachable. Nothing is
   * stored and the alert state is left alone.
   */
  async checkSource(): Promise<Reading> {
    return this.fetchWithTimeout([this.halt.signal]);
  }

  snooze(request: SnoozeRequest): AlertState {
    const { durationSeconds } = validateSnoozeRequest(request);
    const now = this.clock.now();
    this.state = applySnooze(this.state, { durationSeconds }, now);
    this.snoozes = [
      ...this.snoozes.slice(-(SNOOZE_HISTORY_LIMIT - 1)),
      { startedAt: now, durationSeconds, cancelledAt: null },
    ];
    this.logger.log(`Alerts snoozed for ${formatDuration(durationSeconds)}`);
    this.emit("snooze", this.state);
    return this.state;
  }

  cancelSnooze(): AlertState {
    const previous = this.state;
    this.state = cancelSnooze(previous);
    if (this.state !== previous) {
      const last = this.snoozes[this.snoozes.length - 1];
      if (last && last.cancelledAt === null) {
        this.snoozes = [...this.snoozes.slice(0, -1), { ...last, cancelledAt: this.clock.now() }];
      }
      this.logger.log("Snooze cancelled");
      this.emit("snooze", this.state);
    }
    return this.state;
  }

  /** Recent snoozes, oldest first */
  snoozeHistory(): readonly SnoozeEvent[] {
    return this.snoozes;
  }

  status(): MonitorStatus {
    const now = this.clock.now();
    return {
      running: this.running,
      state: this.state,
      snoozed: isSnoozed(this.state, now),
      lastReading: this.lastReading,
      consecutiveFailures: this.consecutiveFailures,
      thresholds: this.thresholdsAt(now),
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { lowThreshold, highThreshold, pollIntervalSeconds, alertIntervalSeconds } = this.config;
    this.logger.log(
      `Monitoring started: low ${this.format(lowThreshold)}, high ${this.format(highThreshold)} ${this.unit}, ` +
        `poll every ${pollIntervalSeconds}s, repeat every ${alertIntervalSeconds}s`
    );
    this.emit("started");

    try {
      if (this.startupDelayMinutes > 0) {
        this.logger.log(`Waiting ${this.startupDelayMinutes} minute(s) before the first check`);
        await this.clock.sleep(this.startupDelayMinutes * 60 * 1000, signal);
      }

      const intervalMs = pollIntervalSeconds * 1000;
      let tick = this.clock.now();
      while (!signal.aborted) {
        await this.runCycle(signal);
        if (signal.aborted) break;

        tick = nextTick(tick, intervalMs, this.clock.now());
        await this.clock.sleep(tick - this.clock.now(), signal);
      }
    } finally {
      this.logger.log("Monitoring stopped");
      this.emit("stopped");
    }
  }

  private async cycle(signal?: AbortSignal): Promise<CycleResult> {
    const halt = this.halt.signal;
    const aborted = () => halt.aborted || signal?.aborted === true;

    let reading: Reading;
    try {
      reading = await this.fetchWithTimeout(signal ? [halt, signal] : [halt]);
    } catch (error) {
      if (aborted()) return { outcome: "aborted" };
      const fetchError = error instanceof FetchError ? error : new FetchError(false, { cause: error });
      this.recordFailure(fetchError);
      return { outcome: "failed", error: fetchError };
    }
    if (aborted()) return { outcome: "aborted" };

    this.consecutiveFailures = 0;
    this.lastReading = reading;

    let stored: AppendOutcome | "failed";
    try {
      stored = await this.store.append(reading);
    } catch (error) {
      stored = "failed";
      this.report(new PersistenceError(error));
    }

    const now = this.clock.now();
    const thresholds = this.thresholdsAt(now);
    const condition = classify(reading, thresholds);
    const urgent = isUrgentLow(reading, thresholds);
    this.logReading(reading, thresholds, condition, urgent);
    this.emit("reading", reading, condition);

    if (aborted()) return { outcome: "aborted" };

    const persistMinutes =
      condition === "low"
        ? thresholds.lowPersistMinutes
        : condition === "high"
          ? thresholds.highPersistMinutes
          : undefined;

    // No await between reading and replacing the state
    const previous = this.state;
    const { state, command } = transition(previous, condition, now, this.config.alertIntervalSeconds, {
      urgent,
      persistMinutes,
    });
    this.state = state;
    if (state !== previous) {
      if (previous.condition !== "normal" && state.condition === "normal") {
        this.logger.log("Glucose returned to normal range");
      }
      this.emit("transition", previous, state);
    }
    if (!command && state.lastFiredAt === null && state.activeSince !== null && persistMinutes) {
      const elapsed = Math.floor((now - state.activeSince) / 60000);
      const label = condition === "low" ? "Low" : "High";
      this.logger.log(`${label} glucose, waiting for it to persist (${elapsed}/${persistMinutes} min)`);
    }

    if (command) {
      if (aborted()) return { outcome: "aborted" };
      this.emit("command", command);
      await this.execute(command);
    }

    return { outcome: "completed", reading, condition, command, stored };
  }

  /**
   * Fetch with an external deadline. A source that ignores the abort
   * signal is left to finish on its own; its result is discarded.
   */
  private async fetchWithTimeout(signals: AbortSignal[]): Promise<Reading> {
    const controller = new AbortController();
    const abort = () => controller.abort();

    try {
      for (const signal of signals) {
        if (signal.aborted) controller.abort();
        signal.addEventListener("abort", abort, { once: true });
      }

      const fetching = this.source.fetchLatest(controller.signal).then(
        (reading): FetchAttempt => ({ status: "ok", reading }),
        (error: unknown): FetchAttempt => ({ status: "error", error })
      );
      const expiry = this.clock
        .sleep(this.fetchTimeoutSeconds * 1000, controller.signal)
        .then((): FetchAttempt => ({ status: controller.signal.aborted ? "aborted" : "timeout" }));

      const attempt = await Promise.race([fetching, expiry]);
      switch (attempt.status) {
        case "ok":
          return attempt.reading;
        case "error":
          throw new FetchError(false, { cause: attempt.error });
        case "timeout":
          throw new FetchError(true, {
            cause: new Error(`no response from ${this.source.name} within ${this.fetchTimeoutSeconds}s`),
          });
        case "aborted":
          throw new FetchError(false, { cause: new Error("monitor stopped") });
      }
    } finally {
      for (const signal of signals) signal.removeEventListener("abort", abort);
      controller.abort();
    }
  }

  private async execute(command: SinkCommand): Promise<void> {
    try {
      if (command.type === "play") {
        await this.sink.play(command.condition);
      } else {
        await this.sink.stop();
      }
    } catch (error) {
      this.report(new SinkError(command.type, error));
    }
  }

  private recordFailure(error: FetchError): void {
    this.consecutiveFailures++;
    this.logger.error(
      `Error getting glucose reading (${this.consecutiveFailures}/${this.maxConsecutiveFailures}): ${error.message}`
    );
    if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
      this.logger.error(
        `CRITICAL: Failed to get glucose reading ${this.consecutiveFailures} times in a row. ` +
          "Please check your connection and credentials."
      );
    }
    this.emit("error", error);
  }

  private report(error: MonitorError): void {
    this.logger.error(error.message);
    this.emit("error", error);
  }

  private thresholdsAt(now: number): Thresholds {
    return effectiveThresholds(this.config, this.schedules, now, this.timeZone);
  }

  private logReading(
    reading: Reading,
    thresholds: Thresholds,
    condition: AlertCondition,
    urgent: boolean
  ): void {
    const value = formatGlucose(reading.value, this.unit);
    this.logger.log(
      `Glucose: ${value} ${trendArrow(reading.trend)} ` +
        `(thresholds: ${this.format(thresholds.lowThreshold)} - ${this.format(thresholds.highThreshold)})`
    );
    if (urgent && thresholds.urgentLow !== undefined) {
      this.logger.warn(`URGENT LOW GLUCOSE: ${value} (threshold: ${this.format(thresholds.urgentLow)})`);
    } else if (condition === "low") {
      this.logger.warn(`LOW GLUCOSE: ${value} (threshold: ${this.format(thresholds.lowThreshold)})`);
    } else if (condition === "high") {
      this.logger.warn(`HIGH GLUCOSE: ${value} (threshold: ${this.format(thresholds.highThreshold)})`);
    }
  }

  private format(value: number): string {
    return this.unit === "mmol/L" ? value.toFixed(1) : String(Math.round(value));
  }

  private emit<K extends keyof MonitorEvents>(event: K, ...args: MonitorEvents[K]): void {
    // An "error" event without listeners would throw
    if (this.events.listenerCount(event) === 0) return;
    try {
      this.events.emit(event, ...args);
    } catch (error) {
      this.logger.error(`Listener for "${event}" failed:`, error);
    }
  }
}

/**
 * "30 min", "1 h 15 min", "45 s"
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds} s`;
  const minutes = Math.round(seconds / 60);
  if (minutes < 60) return `${minutes} min`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest === 0 ? `${hours} h` : `${hours} h ${rest} min`;
}
