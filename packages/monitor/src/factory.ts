/**
 * Wires settings into a data source, reading store and alert sink
 */

import { ConfigurationError } from "@glucose-alarm/core";
import {
  DynamoReadingStore,
  MemoryReadingStore,
  createDocClient,
  type ReadingStore,
} from "@glucose-alarm/storage";
import type { Clock } from "./clock.js";
import type { Logger } from "./logger.js";
import { MonitorLoop } from "./monitor.js";
import { isConfigured, toThresholdConfig, type Settings } from "./settings.js";
import type { AlertSink } from "./sinks/alert-sink.js";
import { AudioSink } from "./sinks/audio-sink.js";
import { CompositeSink } from "./sinks/composite-sink.js";
import { ConsoleSink } from "./sinks/console-sink.js";
import type { DataSource } from "./sources/data-source.js";
import { DexcomShareSource } from "./sources/dexcom-source.js";
import { SimulatedSource } from "./sources/simulated-source.js";

export interface BuildOptions {
  /** Simulated readings, console alerts only */
  demo?: boolean;
  /** Play alert sounds (default: true) */
  sound?: boolean;
  /** Overrides the configured startup delay */
  startupDelayMinutes?: number;
  /** Use these instead of building them from settings */
  store?: ReadingStore;
  sink?: AlertSink;
  clock?: Clock;
  logger?: Logger;
}

export function buildSource(settings: Settings, options: BuildOptions = {}): DataSource {
  if (options.demo) {
    return new SimulatedSource({ unit: settings.unit, noiseMgdl: 5 });
  }
  if (!isConfigured(settings)) {
    throw new ConfigurationError([
      "dexcom: username and password are required (set DEXCOM_USERNAME and DEXCOM_PASSWORD, or run with --demo)",
    ]);
  }
  return new DexcomShareSource({
    username: settings.dexcom.username,
    password: settings.dexcom.password,
    region: settings.dexcom.region,
    unit: settings.unit,
    logger: options.logger,
  });
}

/**
 * DynamoDB when a table is configured, otherwise history lives in memory
 * for the length of the session.
 */
export function buildStore(settings: Settings): ReadingStore {
  const { tableName, region, endpoint, userId, retentionDays } = settings.storage;
  if (tableName) {
    return new DynamoReadingStore(createDocClient({ region, endpoint }), {
      tableName,
      userId,
      retentionDays,
      timezone: settings.monitoring.timeZone,
    });
  }
  return new MemoryReadingStore({ retentionHours: retentionDays * 24 });
}

export function buildSink(settings: Settings, options: BuildOptions = {}): AlertSink {
  const consoleSink = new ConsoleSink(options.logger);
  if (options.demo || options.sound === false) {
    return consoleSink;
  }
  return new CompositeSink([
    consoleSink,
    new AudioSink({
      sounds: { low: settings.alerts.lowSound, high: settings.alerts.highSound },
      player: settings.alerts.player,
      logger: options.logger,
    }),
  ]);
}

export function buildMonitor(settings: Settings, options: BuildOptions = {}): MonitorLoop {
  return new MonitorLoop({
    config: toThresholdConfig(settings),
    source: buildSource(settings, options),
    store: options.store ?? buildStore(settings),
    sink: options.sink ?? buildSink(settings, options),
    unit: settings.unit,
    schedules: settings.alerts.schedules,
    timeZone: settings.monitoring.timeZone,
    startupDelayMinutes: options.startupDelayMinutes ?? settings.monitoring.startupDelayMinutes,
    fetchTimeoutSeconds: settings.monitoring.fetchTimeoutSeconds,
    clock: options.clock,
    logger: options.logger,
  });
}
