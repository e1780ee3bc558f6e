import type { AlertKind } from "@glucose-alarm/core";

/**
 * Where alerts go. Both calls are safe to repeat; a sink that is already
 * playing the requested condition may ignore the call.
 */
export interface AlertSink {
  play(condition: AlertKind): Promise<void>;
  stop(): Promise<void>;
  /** Release players and handles on shutdown */
  close?(): Promise<void>;
}
