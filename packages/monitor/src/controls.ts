/**
 * Keyboard commands accepted while the monitor runs
 */

import {
  alertDuration,
  formatGlucose,
  trendArrow,
  type GlucoseUnit,
} from "@glucose-alarm/core";
import { formatDuration, type MonitorStatus } from "./monitor.js";

export const DEFAULT_SNOOZE_MINUTES = 30;

export type ControlCommand =
  | { type: "snooze"; minutes: number }
  | { type: "cancel" }
  | { type: "status" }
  | { type: "quit" }
  | { type: "help" }
  | { type: "invalid"; input: string };

export const CONTROL_HELP = [
  "Commands:",
  `  s [minutes]  snooze repeat alerts (default ${DEFAULT_SNOOZE_MINUTES})`,
  "  c            cancel snooze",
  "  (enter)      show status",
  "  q            quit",
].join("\n");

/**
 * Parse one line typed by the user
 */
export function parseControlCommand(line: string): ControlCommand {
  const [word = "", arg, ...rest] = line.trim().toLowerCase().split(/\s+/);

  switch (word) {
    case "":
      return { type: "status" };
    case "s":
    case "snooze": {
      if (arg === undefined) return { type: "snooze", minutes: DEFAULT_SNOOZE_MINUTES };
      const minutes = Number(arg);
      if (rest.length > 0 || !Number.isInteger(minutes) || minutes <= 0) {
        return { type: "invalid", input: line.trim() };
      }
      return { type: "snooze", minutes };
    }
    case "c":
    case "cancel":
      return { type: "cancel" };
    case "q":
    case "quit":
    case "exit":
      return { type: "quit" };
    case "h":
    case "help":
    case "?":
      return { type: "help" };
    default:
      return { type: "invalid", input: line.trim() };
  }
}

/**
 * One-line summary of the monitor for the status command
 */
export function formatStatus(status: MonitorStatus, unit: GlucoseUnit, now: number): string {
  const parts: string[] = [];

  if (status.lastReading) {
    const ageMinutes = Math.max(0, Math.round((now - status.lastReading.timestamp) / 60000));
    parts.push(
      `Last: ${formatGlucose(status.lastReading.value, unit)} ${trendArrow(status.lastReading.trend)} (${ageMinutes} min ago)`
    );
  } else {
    parts.push("Last: no reading yet");
  }

  const { state } = status;
  if (state.condition === "normal") {
    parts.push("in range");
  } else {
    const duration = alertDuration(state, now) ?? 0;
    parts.push(`${state.condition.toUpperCase()} for ${formatDuration(Math.round(duration / 1000))}`);
  }

  if (status.snoozed && state.snoozedUntil !== null) {
    parts.push(`snoozed ${formatDuration(Math.round((state.snoozedUntil - now) / 1000))} more`);
  }
  if (status.consecutiveFailures > 0) {
    parts.push(`${status.consecutiveFailures} failed fetch(es)`);
  }

  return parts.join(" | ");
}
