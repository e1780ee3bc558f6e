import type { AlertKind } from "@glucose-alarm/core";
import type { AlertSink } from "./alert-sink.js";

/**
 * Fans every call out to all children. One failing child does not keep
 * the others from being tried; failures are reported together afterwards.
 */
export class CompositeSink implements AlertSink {
  constructor(private readonly sinks: readonly AlertSink[]) {}

  play(condition: AlertKind): Promise<void> {
    return this.fanOut((sink) => sink.play(condition));
  }

  stop(): Promise<void> {
    return this.fanOut((sink) => sink.stop());
  }

  close(): Promise<void> {
    return this.fanOut((sink) => (sink.close ? sink.close() : Promise.resolve()));
  }

  private async fanOut(action: (sink: AlertSink) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(action));
    const errors = results.flatMap((result) =>
      result.status === "rejected" ? [result.reason] : []
    );
    if (errors.length > 0) {
      throw new AggregateError(errors, `${errors.length} of ${this.sinks.length} alert sinks failed`);
    }
  }
}
