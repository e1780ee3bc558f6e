/**
 * Alert state machine
 *
 * Pure functions over an immutable AlertState value. The monitor owns the
 * current value and replaces it wholesale after every transition, so a
 * snooze applied between two cycles is never half-visible to a transition.
 *
 * Rules:
 * - normal -> low/high: alert starts and plays immediately, unless the
 *   condition has a persistence time; then it first plays once the
 *   condition has lasted that long and no snooze is active
 * - low/high -> same: replays once alertInterval has elapsed and no snooze is active
 * - low <-> high: treated as a new alert, plays immediately even while snoozed
 * - low/high -> normal: everything is cleared and the sink is stopped
 * - urgent low: plays on every cycle, ignoring snooze, persistence and alertInterval
 */

import type {
  AlertCondition,
  AlertKind,
  AlertState,
  AlertTransition,
  SinkCommand,
  SnoozeRequest,
  Timestamp,
  TransitionOptions,
} from "./types.js";

export const INITIAL_ALERT_STATE: AlertState = Object.freeze({
  condition: "normal",
  activeSince: null,
  lastFiredAt: null,
  snoozedUntil: null,
});

/**
 * Whether repeat alerts are currently suppressed by a snooze
 */
export function isSnoozed(state: AlertState, now: Timestamp): boolean {
  return state.snoozedUntil !== null && state.snoozedUntil > now;
}

function play(condition: AlertKind): SinkCommand {
  return { type: "play", condition };
}

/**
 * Feed the latest classification into the state machine.
 * Emits at most one sink command.
 */
export function transition(
  state: AlertState,
  condition: AlertCondition,
  now: Timestamp,
  alertIntervalSeconds: number,
  options: TransitionOptions = {}
): AlertTransition {
  // Back in range
  if (condition === "normal") {
    if (state.condition === "normal") {
      return { state, command: null };
    }
    return { state: INITIAL_ALERT_STATE, command: { type: "stop" } };
  }

  const urgent = options.urgent === true && condition === "low";
  const persistMs = Math.max(0, options.persistMinutes ?? 0) * 60 * 1000;

  // Onset or polarity change. A snooze requested while in range stays in
  // force; one meant for the other condition does not.
  if (state.condition !== condition) {
    const polarityChange = state.condition !== "normal";
    const snoozedUntil = polarityChange ? null : state.snoozedUntil;

    if (urgent || persistMs === 0) {
      return {
        state: { condition, activeSince: now, lastFiredAt: now, snoozedUntil },
        command: play(condition),
      };
    }

    // Waiting out the persistence time; silence the other polarity meanwhile
    return {
      state: { condition, activeSince: now, lastFiredAt: null, snoozedUntil },
      command: polarityChange && state.lastFiredAt !== null ? { type: "stop" } : null,
    };
  }

  if (urgent) {
    return { state: { ...state, lastFiredAt: now }, command: play(condition) };
  }

  // Not sounded yet: due once the condition has persisted
  if (state.lastFiredAt === null) {
    const since = state.activeSince ?? now;
    if (now - since < persistMs || isSnoozed(state, now)) {
      return { state, command: null };
    }
    return { state: { ...state, lastFiredAt: now }, command: play(condition) };
  }

  // Same condition held: repeat only when due and not snoozed
  const due = now - state.lastFiredAt >= alertIntervalSeconds * 1000;
  if (!due || isSnoozed(state, now)) {
    return { state, command: null };
  }

  return {
    state: { ...state, lastFiredAt: now },
    command: play(condition),
  };
}

/**
 * Apply a snooze. The condition is left untouched.
 */
export function applySnooze(
  state: AlertState,
  request: SnoozeRequest,
  now: Timestamp
): AlertState {
  return { ...state, snoozedUntil: now + request.durationSeconds * 1000 };
}

/**
 * Lift any snooze so the next due repeat is audible again
 */
export function cancelSnooze(state: AlertState): AlertState {
  if (state.snoozedUntil === null) return state;
  return { ...state, snoozedUntil: null };
}

/**
 * How long the current alert has been active, in milliseconds.
 * Snoozing does not pause this clock.
 */
export function alertDuration(state: AlertState, now: Timestamp): number | null {
  if (state.activeSince === null) return null;
  return Math.max(0, now - state.activeSince);
}
