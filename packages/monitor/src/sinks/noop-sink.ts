import type { AlertSink } from "./alert-sink.js";

/** Silent sink for --no-sound runs and one-off checks */
export class NoOpSink implements AlertSink {
  play(): Promise<void> {
    return Promise.resolve();
  }

  stop(): Promise<void> {
    return Promise.resolve();
  }
}
