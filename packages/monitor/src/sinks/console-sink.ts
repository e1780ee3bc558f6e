import type { AlertKind } from "@glucose-alarm/core";
import type { Logger } from "../logger.js";
import type { AlertSink } from "./alert-sink.js";

/**
 * Writes alerts to the log. Every play is logged, so repeats show up too.
 */
export class ConsoleSink implements AlertSink {
  private active: AlertKind | null = null;

  constructor(private readonly logger: Logger = console) {}

  play(condition: AlertKind): Promise<void> {
    this.active = condition;
    this.logger.warn(`ALERT: ${condition.toUpperCase()} glucose`);
    return Promise.resolve();
  }

  stop(): Promise<void> {
    if (this.active !== null) {
      this.logger.log(`Alert cleared (${this.active})`);
      this.active = null;
    }
    return Promise.resolve();
  }
}
