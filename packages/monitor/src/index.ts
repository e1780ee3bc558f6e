/**
 * @glucose-alarm/monitor
 *
 * Monitor loop, data sources, alert sinks and settings
 */

export {
  MonitorLoop,
  formatDuration,
  type MonitorOptions,
  type MonitorStatus,
  type MonitorEvents,
  type CycleResult,
  type SnoozeEvent,
} from "./monitor.js";

export { systemClock, nextTick, type Clock } from "./clock.js";
export { maskSecret, type Logger } from "./logger.js";
export {
  calculateBackoff,
  createBackoffController,
  retryWithBackoff,
  type BackoffOptions,
  type BackoffState,
  type RetryOptions,
} from "./backoff.js";

export type { DataSource } from "./sources/data-source.js";
export {
  DexcomShareSource,
  toReading,
  type DexcomShareSourceOptions,
} from "./sources/dexcom-source.js";
export {
  DEXCOM_BASE_URLS,
  DEXCOM_APP_IDS,
  DEXCOM_REGIONS,
  getSessionId,
  fetchGlucoseReadings,
  parseDexcomTimestamp,
  type DexcomCredentials,
  type DexcomReading,
  type DexcomRegion,
  type DexcomRequestOptions,
} from "./sources/dexcom-client.js";
export { SimulatedSource, type SimulatedSourceOptions } from "./sources/simulated-source.js";

export type { AlertSink } from "./sinks/alert-sink.js";
export { AudioSink, playerCommand, type AudioSinkOptions } from "./sinks/audio-sink.js";
export { CompositeSink } from "./sinks/composite-sink.js";
export { ConsoleSink } from "./sinks/console-sink.js";
export { NoOpSink } from "./sinks/noop-sink.js";

export {
  CONFIG_FILE,
  DEFAULT_THRESHOLDS,
  defaultSettings,
  loadSettings,
  parseSettings,
  saveSettings,
  isConfigured,
  toThresholdConfig,
  type Settings,
  type LoadSettingsOptions,
} from "./settings.js";

export {
  buildMonitor,
  buildSink,
  buildSource,
  buildStore,
  type BuildOptions,
} from "./factory.js";
