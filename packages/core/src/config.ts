/**
 * Zod schemas and validation for monitor settings.
 */

import { z } from "zod";
import { ConfigurationError, MonitorErrorCode } from "./errors.js";
import { applySchedule, parseClockTime, type ThresholdSchedule } from "./schedule.js";
import type { SnoozeRequest, ThresholdConfig } from "./types.js";

const positiveInt = z.number().int().positive();
const persistMinutes = z.number().int().min(0);

export const zClockTime = z
  .string()
  .refine((v) => parseClockTime(v) !== null, { message: "Expected HH:MM" });

export const zThresholdSchedule = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  priority: z.number().int().min(1).default(1),
  startTime: zClockTime.default("09:00"),
  endTime: zClockTime.default("17:00"),
  days: z.array(z.number().int().min(0).max(6)).default([0, 1, 2, 3, 4]),
  lowThreshold: z.number().positive().optional(),
  highThreshold: z.number().positive().optional(),
  lowPersistMinutes: persistMinutes.optional(),
  highPersistMinutes: persistMinutes.optional(),
});

export const zThresholdConfig = z
  .object({
    lowThreshold: z.number().positive(),
    highThreshold: z.number().positive(),
    pollIntervalSeconds: positiveInt,
    alertIntervalSeconds: positiveInt,
    urgentLow: z.number().positive().optional(),
    lowPersistMinutes: persistMinutes.optional(),
    highPersistMinutes: persistMinutes.optional(),
  })
  .refine((c) => c.lowThreshold < c.highThreshold, {
    message: "lowThreshold must be less than highThreshold",
    path: ["highThreshold"],
  })
  .refine((c) => c.urgentLow === undefined || c.urgentLow < c.lowThreshold, {
    message: "urgentLow must be less than lowThreshold",
    path: ["urgentLow"],
  });

export const zSnoozeRequest = z.object({
  durationSeconds: positiveInt,
});

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a threshold config, throwing ConfigurationError when invalid
 */
export function validateThresholdConfig(input: unknown): ThresholdConfig {
  const result = zThresholdConfig.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate schedules against the base thresholds: every schedule, once
 * overlaid on the base, must still keep low below high.
 */
export function validateSchedules(
  base: ThresholdConfig,
  schedules: readonly ThresholdSchedule[]
): ThresholdSchedule[] {
  const result = z.array(zThresholdSchedule).safeParse(schedules);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error).map((i) => `schedules.${i}`));
  }

  const issues: string[] = [];
  for (const schedule of result.data) {
    const effective = applySchedule(base, schedule);
    if (effective.lowThreshold >= effective.highThreshold) {
      issues.push(
        `schedule "${schedule.name}": low ${effective.lowThreshold} must be less than high ${effective.highThreshold}`
      );
    }
  }
  if (issues.length > 0) throw new ConfigurationError(issues);

  return result.data;
}

/**
 * Validate an incoming snooze request
 */
export function validateSnoozeRequest(input: unknown): SnoozeRequest {
  const result = zSnoozeRequest.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error), MonitorErrorCode.SNOOZE_INVALID);
  }
  return result.data;
}
