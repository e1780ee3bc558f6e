#!/usr/bin/env tsx
/**
 * Glucose Alarm CLI
 */

import { existsSync } from "fs";
import { createInterface } from "readline";
import { config as loadEnv } from "dotenv";
import { InvalidArgumentError, program } from "commander";
import {
  ConfigurationError,
  describeCause,
  formatGlucose,
  trendArrow,
  type Reading,
} from "@glucose-alarm/core";
import { MemoryReadingStore, calculateReadingStats } from "@glucose-alarm/storage";
import { CONTROL_HELP, formatStatus, parseControlCommand } from "./controls.js";
import { buildMonitor, buildSink, buildStore } from "./factory.js";
import { maskSecret } from "./logger.js";
import { createPrompt, promptStartupDelay } from "./prompt.js";
import {
  CONFIG_FILE,
  defaultSettings,
  loadSettings,
  saveSettings,
  toThresholdConfig,
  type Settings,
} from "./settings.js";
import { NoOpSink } from "./sinks/noop-sink.js";
import { DEXCOM_REGIONS, type DexcomRegion } from "./sources/dexcom-client.js";

loadEnv();

interface StartOptions {
  config: string;
  startupDelay?: number;
  demo?: boolean;
  sound: boolean;
}

interface CheckOptions {
  config: string;
  demo?: boolean;
}

interface HistoryOptions {
  config: string;
  hours: number;
}

interface InitOptions {
  config: string;
  force?: boolean;
}

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a number of zero or more.");
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

function isDexcomRegion(value: string): value is DexcomRegion {
  return DEXCOM_REGIONS.some((region) => region === value);
}

/**
 * Run a command action, turning failures into a message and exit code 1
 */
async function runCommand(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error("Configuration error:");
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
    } else {
      console.error("Error:", error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
  }
}

function printSettingsSummary(settings: Settings, demo: boolean): void {
  const { alerts, monitoring, unit } = settings;
  console.log("Starting Glucose Alarm...");
  console.log(
    `  Source: ${demo ? "simulated" : `Dexcom Share (${settings.dexcom.region}) as ${maskSecret(settings.dexcom.username)}`}`
  );
  console.log(`  Thresholds: ${alerts.lowThreshold} - ${alerts.highThreshold} ${unit}`);
  console.log(`  Poll interval: ${monitoring.pollIntervalSeconds}s, repeat interval: ${alerts.alertIntervalSeconds}s`);
  if (alerts.schedules.length > 0) {
    console.log(`  Schedules: ${alerts.schedules.map((s) => s.name).join(", ")}`);
  }
  console.log();
}

program
  .name("glucose-alarm")
  .description("Watch Dexcom Share readings and sound an alarm when glucose is out of range")
  .version("0.1.0");

program
  .command("start", { isDefault: true })
  .description("Monitor glucose and sound alerts until stopped")
  .option("-c, --config <path>", "settings file", CONFIG_FILE)
  .option("--startup-delay <minutes>", "minutes to wait before the first check", parseNonNegative)
  .option("--demo", "use simulated readings instead of Dexcom")
  .option("--no-sound", "log alerts instead of playing sounds")
  .action((options: StartOptions) =>
    runCommand(async () => {
      const settings = loadSettings({ path: options.config });
      const demo = options.demo ?? false;

      let startupDelayMinutes = options.startupDelay;
      if (startupDelayMinutes === undefined && process.stdin.isTTY) {
        const prompt = createPrompt();
        startupDelayMinutes = await promptStartupDelay(prompt, settings.monitoring.startupDelayMinutes);
        prompt.close();
      }

      const sink = buildSink(settings, { demo, sound: options.sound });
      const monitor = buildMonitor(settings, { demo, sound: options.sound, startupDelayMinutes, sink });

      printSettingsSummary(settings, demo);
      if (!demo) {
        console.log("Testing connection to Dexcom Share...");
        const reading = await monitor.checkSource().catch((error: unknown) => {
          throw new Error(
            `Cannot connect to Dexcom Share (${describeCause(error)}). ` +
              "Please check your credentials and internet connection.",
            { cause: error }
          );
        });
        console.log(
          `Connection test successful (${formatGlucose(reading.value, settings.unit)} ${trendArrow(reading.trend)})`
        );
        console.log();
      }
      console.log(CONTROL_HELP);
      console.log();

      const rl = createInterface({ input: process.stdin });
      let stopping: Promise<void> | null = null;
      const shutdown = (): Promise<void> => {
        stopping ??= (async () => {
          console.log("\nStopping...");
          rl.close();
          await monitor.stop();
        })();
        return stopping;
      };

      rl.on("line", (line) => {
        const command = parseControlCommand(line);
        switch (command.type) {
          case "snooze":
            monitor.snooze({ durationSeconds: command.minutes * 60 });
            break;
          case "cancel":
            if (monitor.status().state.snoozedUntil === null) console.log("No snooze active");
            monitor.cancelSnooze();
            break;
          case "status":
            console.log(formatStatus(monitor.status(), settings.unit, Date.now()));
            break;
          case "quit":
            void shutdown();
            break;
          case "help":
            console.log(CONTROL_HELP);
            break;
          case "invalid":
            console.log(`Unknown command "${command.input}"`);
            console.log(CONTROL_HELP);
            break;
        }
      });

      const onSignal = () => void shutdown();
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);

      try {
        await monitor.start();
      } finally {
        process.removeListener("SIGINT", onSignal);
        process.removeListener("SIGTERM", onSignal);
        rl.close();
        await (sink.close ? sink.close() : sink.stop());
      }
    })
  );

program
  .command("check")
  .description("Fetch the latest reading once and show how it classifies")
  .option("-c, --config <path>", "settings file", CONFIG_FILE)
  .option("--demo", "use simulated readings instead of Dexcom")
  .action((options: CheckOptions) =>
    runCommand(async () => {
      const settings = loadSettings({ path: options.config });
      const monitor = buildMonitor(settings, {
        demo: options.demo,
        startupDelayMinutes: 0,
        store: new MemoryReadingStore(),
        sink: new NoOpSink(),
      });

      const result = await monitor.runCycle();
      if (result.outcome !== "completed") {
        process.exitCode = 1;
        return;
      }

      const { thresholds } = monitor.status();
      console.log(
        `${formatGlucose(result.reading.value, settings.unit)} ${trendArrow(result.reading.trend)} ` +
          `at ${new Date(result.reading.timestamp).toLocaleTimeString()}: ${result.condition} ` +
          `(thresholds ${thresholds.lowThreshold} - ${thresholds.highThreshold})`
      );
    })
  );

program
  .command("history")
  .description("Show stored readings and statistics")
  .option("-c, --config <path>", "settings file", CONFIG_FILE)
  .option("--hours <n>", "how far back to look", parsePositive, 24)
  .action((options: HistoryOptions) =>
    runCommand(async () => {
      const settings = loadSettings({ path: options.config });
      if (!settings.storage.tableName) {
        console.log("No storage table configured (storage.tableName in the settings file).");
        console.log("Without one, readings are only kept while the monitor runs.");
        process.exitCode = 1;
        return;
      }

      const store = buildStore(settings);
      const readings = await store.query(Date.now() - options.hours * 60 * 60 * 1000);
      printHistory(readings, settings);
    })
  );

program
  .command("init")
  .description("Write a settings file with defaults")
  .option("-c, --config <path>", "settings file", CONFIG_FILE)
  .option("-f, --force", "overwrite an existing file")
  .action((options: InitOptions) =>
    runCommand(async () => {
      if (existsSync(options.config) && !options.force) {
        console.log(`Settings already exist at ${options.config} (use --force to overwrite)`);
        return;
      }

      const settings = defaultSettings();
      if (process.stdin.isTTY) {
        const prompt = createPrompt();
        const username = (await prompt.ask("Dexcom Share username (blank to skip): ")).trim();
        if (username) {
          const password = await prompt.askHidden("Dexcom Share password: ");
          const region = (await prompt.ask(`Region (${DEXCOM_REGIONS.join("/")}) [us]: `)).trim().toLowerCase();
          settings.dexcom = {
            username,
            password,
            region: isDexcomRegion(region) ? region : "us",
          };
        }
        prompt.close();
      }

      saveSettings(settings, options.config);
      console.log(`Wrote settings to ${options.config}`);
      console.log("Credentials can also come from DEXCOM_USERNAME / DEXCOM_PASSWORD.");
    })
  );

function printHistory(readings: Reading[], settings: Settings): void {
  if (readings.length === 0) {
    console.log("No readings in that period.");
    return;
  }

  const time = new Intl.DateTimeFormat(undefined, {
    timeZone: settings.monitoring.timeZone,
    month: "short",
    day: "numeric",
    hour: "2-digit",
    minute: "2-digit",
  });
  for (const reading of readings) {
    console.log(
      `  ${time.format(reading.timestamp)}  ${formatGlucose(reading.value, settings.unit)} ${trendArrow(reading.trend)}`
    );
  }

  const stats = calculateReadingStats(readings, toThresholdConfig(settings));
  console.log();
  console.log(`Readings: ${stats.count}`);
  console.log(`Min / mean / max: ${stats.min} / ${stats.mean} / ${stats.max} ${settings.unit}`);
  console.log(
    `In range: ${stats.timeInRange}%  below: ${stats.timeBelow}%  above: ${stats.timeAbove}%`
  );
}

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
