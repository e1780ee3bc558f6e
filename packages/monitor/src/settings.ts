/**
 * User settings
 *
 * Read from ~/.glucose-alarm/config.json (or --config), then overlaid with
 * DEXCOM_USERNAME / DEXCOM_PASSWORD / DEXCOM_REGION from the environment.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join, resolve } from "path";
import { z } from "zod";
import {
  ConfigurationError,
  describeCause,
  formatIssues,
  zThresholdSchedule,
  type GlucoseUnit,
  type ThresholdConfig,
} from "@glucose-alarm/core";

export const CONFIG_DIR = join(homedir(), ".glucose-alarm");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

/** Default thresholds per unit (3.9 / 15.0 mmol/L, urgent below 2.8) */
export const DEFAULT_THRESHOLDS: Record<GlucoseUnit, { low: number; high: number; urgentLow: number }> = {
  "mmol/L": { low: 3.9, high: 15.0, urgentLow: 2.8 },
  "mg/dL": { low: 70, high: 270, urgentLow: 50 },
};

const zRegion = z.enum(["us", "ous", "jp"]);
const positiveInt = z.number().int().positive();

export const zSettings = z
  .object({
    dexcom: z
      .object({
        username: z.string().default(""),
        password: z.string().default(""),
        region: zRegion.default("us"),
      })
      .default({}),
    unit: z.enum(["mmol/L", "mg/dL"]).default("mmol/L"),
    alerts: z
      .object({
        lowThreshold: z.number().positive().optional(),
        highThreshold: z.number().positive().optional(),
        urgentLow: z.number().positive().optional(),
        lowPersistMinutes: z.number().int().min(0).default(0),
        highPersistMinutes: z.number().int().min(0).default(0),
        alertIntervalSeconds: positiveInt.default(300),
        lowSound: z.string().min(1).default("sounds/low.wav"),
        highSound: z.string().min(1).default("sounds/high.wav"),
        /** Audio player command, e.g. ["mpv", "--no-video"] */
        player: z.array(z.string().min(1)).min(1).optional(),
        schedules: z.array(zThresholdSchedule).default([]),
      })
      .default({}),
    monitoring: z
      .object({
        pollIntervalSeconds: positiveInt.default(300),
        startupDelayMinutes: z.number().min(0).default(0),
        fetchTimeoutSeconds: z.number().positive().default(10),
        timeZone: z.string().min(1).optional(),
      })
      .default({}),
    storage: z
      .object({
        tableName: z.string().min(1).optional(),
        region: z.string().min(1).optional(),
        endpoint: z.string().url().optional(),
        userId: z.string().min(1).default("default"),
        retentionDays: positiveInt.default(90),
      })
      .default({}),
  })
  .transform((settings) => ({
    ...settings,
    alerts: {
      ...settings.alerts,
      lowThreshold: settings.alerts.lowThreshold ?? DEFAULT_THRESHOLDS[settings.unit].low,
      highThreshold: settings.alerts.highThreshold ?? DEFAULT_THRESHOLDS[settings.unit].high,
      urgentLow: settings.alerts.urgentLow ?? DEFAULT_THRESHOLDS[settings.unit].urgentLow,
    },
  }))
  .refine((settings) => settings.alerts.lowThreshold < settings.alerts.highThreshold, {
    message: "lowThreshold must be less than highThreshold",
    path: ["alerts", "highThreshold"],
  })
  .refine((settings) => settings.alerts.urgentLow < settings.alerts.lowThreshold, {
    message: "urgentLow must be less than lowThreshold",
    path: ["alerts", "urgentLow"],
  });

export type Settings = z.output<typeof zSettings>;

export interface LoadSettingsOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate raw settings, throwing ConfigurationError when invalid
 */
export function parseSettings(input: unknown): Settings {
  const result = zSettings.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Settings with every default filled in
 */
export function defaultSettings(): Settings {
  return parseSettings({});
}

/**
 * Load settings from disk and the environment. A missing file means defaults.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const path = options.path ?? CONFIG_FILE;
  const env = options.env ?? process.env;

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigurationError([`${path}: ${describeCause(error)}`]);
    }
  }

  const settings = parseSettings(raw);
  const baseDir = dirname(resolve(path));

  let region = settings.dexcom.region;
  if (env.DEXCOM_REGION) {
    const parsed = zRegion.safeParse(env.DEXCOM_REGION.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError([`DEXCOM_REGION: expected us, ous or jp, got "${env.DEXCOM_REGION}"`]);
    }
    region = parsed.data;
  }

  return {
    ...settings,
    dexcom: {
      username: env.DEXCOM_USERNAME || settings.dexcom.username,
      password: env.DEXCOM_PASSWORD || settings.dexcom.password,
      region,
    },
    alerts: {
      ...settings.alerts,
      lowSound: resolvePath(settings.alerts.lowSound, baseDir),
      highSound: resolvePath(settings.alerts.highSound, baseDir),
    },
  };
}

/**
 * Write settings back to disk. The file holds credentials, so it is
 * readable by the owner only.
 */
export function saveSettings(settings: Settings, path: string = CONFIG_FILE): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(settings, null, 2) + "\n", { mode: 0o600 });
}

/**
 * Expand "~/" and resolve relative paths against a base directory
 */
export function resolvePath(path: string, baseDir: string): string {
  if (path === "~" || path.startsWith("~/")) return join(homedir(), path.slice(1));
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

export function isConfigured(settings: Settings): boolean {
  return Boolean(settings.dexcom.username && settings.dexcom.password);
}

export function toThresholdConfig(settings: Settings): ThresholdConfig {
  return {
    lowThreshold: settings.alerts.lowThreshold,
    highThreshold: settings.alerts.highThreshold,
    pollIntervalSeconds: settings.monitoring.pollIntervalSeconds,
    alertIntervalSeconds: settings.alerts.alertIntervalSeconds,
    urgentLow: settings.alerts.urgentLow,
    lowPersistMinutes: settings.alerts.lowPersistMinutes,
    highPersistMinutes: settings.alerts.highPersistMinutes,
  };
}
