/**
 * Time-based threshold overrides
 *
 * A schedule swaps in its own low/high thresholds and persistence times
 * during a weekly time window (e.g. tighter limits overnight). The
 * urgent-low threshold is never overridden. When several schedules overlap,
 * the highest priority wins.
 */

import type { Thresholds, Timestamp } from "./types.js";

export interface ThresholdSchedule {
  name: string;
  enabled: boolean;
  /** Higher priority wins when schedules overlap */
  priority: number;
  /** Window start, "HH:MM" local time */
  startTime: string;
  /** Window end, "HH:MM" local time (inclusive) */
  endTime: string;
  /** Days of week, 0 = Monday ... 6 = Sunday */
  days: number[];
  lowThreshold?: number;
  highThreshold?: number;
  lowPersistMinutes?: number;
  highPersistMinutes?: number;
}

/** Local wall-clock position of an instant */
export interface LocalTime {
  /** 0 = Monday ... 6 = Sunday */
  weekday: number;
  /** Minutes since local midnight */
  minutes: number;
}

const WEEKDAYS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

/**
 * The machine's timezone, used when none is configured
 */
export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Get weekday and minute-of-day for a timestamp in a timezone.
 * Uses Intl so the result does not depend on the process TZ.
 */
export function getLocalTime(timestampMs: Timestamp, timeZone: string = systemTimeZone()): LocalTime {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "short",
    hour: "numeric",
    minute: "numeric",
    hourCycle: "h23",
  });

  let weekday = 0;
  let hour = 0;
  let minute = 0;
  for (const part of formatter.formatToParts(new Date(timestampMs))) {
    if (part.type === "weekday") weekday = WEEKDAYS.indexOf(part.value);
    else if (part.type === "hour") hour = parseInt(part.value, 10);
    else if (part.type === "minute") minute = parseInt(part.value, 10);
  }

  return { weekday, minutes: hour * 60 + minute };
}

/**
 * Parse "HH:MM" into minutes since midnight, or null when malformed
 */
export function parseClockTime(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) return null;
  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/**
 * Whether a schedule's window contains the given local time.
 * Overnight windows (e.g. 23:00-07:00) wrap past midnight; the part after
 * midnight counts towards the day the window started on.
 */
export function isScheduleActive(schedule: ThresholdSchedule, local: LocalTime): boolean {
  if (!schedule.enabled) return false;

  const start = parseClockTime(schedule.startTime);
  const end = parseClockTime(schedule.endTime);
  if (start === null || end === null) return false;

  if (start <= end) {
    return schedule.days.includes(local.weekday) && local.minutes >= start && local.minutes <= end;
  }

  if (local.minutes >= start) {
    return schedule.days.includes(local.weekday);
  }
  if (local.minutes <= end) {
    const previousDay = (local.weekday + 6) % 7;
    return schedule.days.includes(previousDay);
  }
  return false;
}

/**
 * Highest-priority schedule active at the given instant, if any
 */
export function activeSchedule(
  schedules: readonly ThresholdSchedule[],
  at: Timestamp,
  timeZone?: string
): ThresholdSchedule | null {
  const local = getLocalTime(at, timeZone);
  let best: ThresholdSchedule | null = null;
  for (const schedule of schedules) {
    if (!isScheduleActive(schedule, local)) continue;
    if (!best || schedule.priority > best.priority) best = schedule;
  }
  return best;
}

/**
 * Overlay a schedule's overrides on the base thresholds
 */
export function applySchedule(base: Thresholds, schedule: ThresholdSchedule | null): Thresholds {
  return {
    lowThreshold: schedule?.lowThreshold ?? base.lowThreshold,
    highThreshold: schedule?.highThreshold ?? base.highThreshold,
    urgentLow: base.urgentLow,
    lowPersistMinutes: schedule?.lowPersistMinutes ?? base.lowPersistMinutes,
    highPersistMinutes: schedule?.highPersistMinutes ?? base.highPersistMinutes,
  };
}

/**
 * Thresholds in force at an instant
 */
export function effectiveThresholds(
  base: Thresholds,
  schedules: readonly ThresholdSchedule[],
  at: Timestamp,
  timeZone?: string
): Thresholds {
  if (schedules.length === 0) return applySchedule(base, null);
  return applySchedule(base, activeSchedule(schedules, at, timeZone));
}
