import { describe, it, expect } from "vitest";
import {
  INITIAL_ALERT_STATE,
  transition,
  applySnooze,
  cancelSnooze,
  isSnoozed,
  alertDuration,
} from "./alert-state.js";
import type { AlertCondition, AlertState, SinkCommand, TransitionOptions } from "./types.js";

const T0 = 1_700_000_000_000;
const MIN = 60_000;
const ALERT_INTERVAL = 300; // seconds

/**
 * Run a sequence of (condition, offset) steps and collect sink commands
 */
function run(
  steps: Array<[AlertCondition, number]>,
  start: AlertState = INITIAL_ALERT_STATE,
  options: TransitionOptions = {}
): { state: AlertState; commands: Array<SinkCommand | null> } {
  let state = start;
  const commands: Array<SinkCommand | null> = [];
  for (const [condition, offset] of steps) {
    const result = transition(state, condition, T0 + offset, ALERT_INTERVAL, options);
    state = result.state;
    commands.push(result.command);
  }
  return { state, commands };
}

describe("transition", () => {
  it("never plays while readings stay normal", () => {
    const { state, commands } = run([
      ["normal", 0],
      ["normal", 5 * MIN],
      ["normal", 10 * MIN],
    ]);
    expect(commands).toEqual([null, null, null]);
    expect(state).toBe(INITIAL_ALERT_STATE);
  });

  it("plays immediately on onset and records timestamps", () => {
    const { state, commands } = run([["low", 0]]);
    expect(commands).toEqual([{ type: "play", condition: "low" }]);
    expect(state).toEqual({
      condition: "low",
      activeSince: T0,
      lastFiredAt: T0,
      snoozedUntil: null,
    });
  });

  it("plays once while a low is held for less than the alert interval", () => {
    const { commands } = run([
      ["low", 0],
      ["low", 1 * MIN],
      ["low", 2 * MIN],
      ["low", 4 * MIN],
    ]);
    expect(commands.filter((c) => c !== null)).toHaveLength(1);
  });

  it("repeats exactly once when the alert interval has elapsed", () => {
    const { state, commands } = run([
      ["low", 0],
      ["low", 4 * MIN],
      ["low", 5 * MIN],
      ["low", 6 * MIN],
    ]);
    expect(commands).toEqual([
      { type: "play", condition: "low" },
      null,
      { type: "play", condition: "low" },
      null,
    ]);
    expect(state.activeSince).toBe(T0);
    expect(state.lastFiredAt).toBe(T0 + 5 * MIN);
  });

  it("stops and clears everything when back in range", () => {
    const snoozed = applySnooze(run([["high", 0]]).state, { durationSeconds: 900 }, T0);
    const result = transition(snoozed, "normal", T0 + MIN, ALERT_INTERVAL);
    expect(result.command).toEqual({ type: "stop" });
    expect(result.state).toEqual({
      condition: "normal",
      activeSince: null,
      lastFiredAt: null,
      snoozedUntil: null,
    });
  });

  it("emits exactly one stop per resolution", () => {
    const { commands } = run([
      ["high", 0],
      ["normal", 5 * MIN],
      ["normal", 10 * MIN],
    ]);
    expect(commands).toEqual([{ type: "play", condition: "high" }, { type: "stop" }, null]);
  });

  it("suppresses repeats while snoozed and resumes after the snooze ends", () => {
    const onset = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL).state;
    const snoozed = applySnooze(onset, { durationSeconds: 900 }, T0 + MIN);

    // Alert interval has elapsed but the snooze runs until T0 + 16min
    const at6 = transition(snoozed, "low", T0 + 6 * MIN, ALERT_INTERVAL);
    expect(at6.command).toBeNull();
    const at11 = transition(at6.state, "low", T0 + 11 * MIN, ALERT_INTERVAL);
    expect(at11.command).toBeNull();

    const at16 = transition(at11.state, "low", T0 + 16 * MIN, ALERT_INTERVAL);
    expect(at16.command).toEqual({ type: "play", condition: "low" });
    expect(at16.state.lastFiredAt).toBe(T0 + 16 * MIN);
    expect(at16.state.activeSince).toBe(T0);
    expect(at16.state.condition).toBe("low");
  });

  it("plays a polarity change immediately even while snoozed", () => {
    const onset = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL).state;
    const snoozed = applySnooze(onset, { durationSeconds: 3600 }, T0);

    const flipped = transition(snoozed, "high", T0 + MIN, ALERT_INTERVAL);
    expect(flipped.command).toEqual({ type: "play", condition: "high" });
    expect(flipped.state).toEqual({
      condition: "high",
      activeSince: T0 + MIN,
      lastFiredAt: T0 + MIN,
      snoozedUntil: null,
    });
  });

  it("keeps a snooze requested while in range for the next alert's repeats", () => {
    const snoozed = applySnooze(INITIAL_ALERT_STATE, { durationSeconds: 1800 }, T0);
    const onset = transition(snoozed, "high", T0 + MIN, ALERT_INTERVAL);
    expect(onset.command).toEqual({ type: "play", condition: "high" });
    expect(onset.state.snoozedUntil).toBe(T0 + 30 * MIN);

    const repeat = transition(onset.state, "high", T0 + 7 * MIN, ALERT_INTERVAL);
    expect(repeat.command).toBeNull();
  });

  it("follows the 3.9/10.0 reading example", () => {
    // readings 5.0, 3.5, 3.5, 3.5, 4.0 polled every 5 minutes
    const { commands } = run([
      ["normal", 0],
      ["low", 5 * MIN],
      ["low", 9 * MIN],
      ["low", 15 * MIN],
      ["normal", 20 * MIN],
    ]);
    expect(commands).toEqual([
      null,
      { type: "play", condition: "low" },
      null,
      { type: "play", condition: "low" },
      { type: "stop" },
    ]);
  });
});

describe("urgent low", () => {
  it("plays at once even when the low has a persistence time", () => {
    const result = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL, {
      urgent: true,
      persistMinutes: 15,
    });
    expect(result.command).toEqual({ type: "play", condition: "low" });
    expect(result.state.lastFiredAt).toBe(T0);
  });

  it("plays on every cycle through a snooze and before the alert interval", () => {
    const onset = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL).state;
    const snoozed = applySnooze(onset, { durationSeconds: 900 }, T0);

    const next = transition(snoozed, "low", T0 + MIN, ALERT_INTERVAL, { urgent: true });
    expect(next.command).toEqual({ type: "play", condition: "low" });
    expect(next.state.lastFiredAt).toBe(T0 + MIN);
    expect(next.state.snoozedUntil).toBe(T0 + 15 * MIN);

    const after = transition(next.state, "low", T0 + 2 * MIN, ALERT_INTERVAL, { urgent: true });
    expect(after.command).toEqual({ type: "play", condition: "low" });
  });

  it("falls back to the normal repeat rules once the reading climbs above it", () => {
    const urgent = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL, { urgent: true }).state;
    const snoozed = applySnooze(urgent, { durationSeconds: 900 }, T0);
    expect(transition(snoozed, "low", T0 + 6 * MIN, ALERT_INTERVAL).command).toBeNull();
  });

  it("has no effect on highs", () => {
    const result = transition(INITIAL_ALERT_STATE, "high", T0, ALERT_INTERVAL, {
      urgent: true,
      persistMinutes: 10,
    });
    expect(result.command).toBeNull();
  });
});

describe("persistence", () => {
  it("holds the first alert until the condition has lasted long enough", () => {
    const { state, commands } = run(
      [
        ["low", 0],
        ["low", 5 * MIN],
        ["low", 10 * MIN],
        ["low", 12 * MIN],
        ["low", 15 * MIN],
      ],
      INITIAL_ALERT_STATE,
      { persistMinutes: 10 }
    );
    expect(commands).toEqual([
      null,
      null,
      { type: "play", condition: "low" },
      null,
      { type: "play", condition: "low" },
    ]);
    expect(state.activeSince).toBe(T0);
    expect(state.lastFiredAt).toBe(T0 + 15 * MIN);
  });

  it("tracks the onset while waiting", () => {
    const pending = transition(INITIAL_ALERT_STATE, "high", T0, ALERT_INTERVAL, { persistMinutes: 20 });
    expect(pending.command).toBeNull();
    expect(pending.state).toEqual({
      condition: "high",
      activeSince: T0,
      lastFiredAt: null,
      snoozedUntil: null,
    });
  });

  it("starts over when the reading recovers before the alert sounds", () => {
    const { state, commands } = run(
      [
        ["low", 0],
        ["normal", 5 * MIN],
        ["low", 6 * MIN],
        ["low", 12 * MIN],
      ],
      INITIAL_ALERT_STATE,
      { persistMinutes: 10 }
    );
    expect(commands).toEqual([null, { type: "stop" }, null, null]);
    expect(state.activeSince).toBe(T0 + 6 * MIN);
    expect(state.lastFiredAt).toBeNull();
  });

  it("keeps a delayed first alert quiet while snoozed", () => {
    const pending = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL, { persistMinutes: 5 });
    const snoozed = applySnooze(pending.state, { durationSeconds: 900 }, T0 + MIN);

    const at5 = transition(snoozed, "low", T0 + 5 * MIN, ALERT_INTERVAL, { persistMinutes: 5 });
    expect(at5.command).toBeNull();
    const at16 = transition(at5.state, "low", T0 + 16 * MIN, ALERT_INTERVAL, { persistMinutes: 5 });
    expect(at16.command).toEqual({ type: "play", condition: "low" });
  });

  it("silences the old polarity while the new one is still pending", () => {
    const high = transition(INITIAL_ALERT_STATE, "high", T0, ALERT_INTERVAL).state;

    const flipped = transition(high, "low", T0 + 5 * MIN, ALERT_INTERVAL, { persistMinutes: 10 });
    expect(flipped.command).toEqual({ type: "stop" });
    expect(flipped.state).toEqual({
      condition: "low",
      activeSince: T0 + 5 * MIN,
      lastFiredAt: null,
      snoozedUntil: null,
    });

    const due = transition(flipped.state, "low", T0 + 15 * MIN, ALERT_INTERVAL, { persistMinutes: 10 });
    expect(due.command).toEqual({ type: "play", condition: "low" });
  });
});

describe("snooze helpers", () => {
  it("sets snoozedUntil without touching the condition", () => {
    const onset = transition(INITIAL_ALERT_STATE, "low", T0, ALERT_INTERVAL).state;
    const snoozed = applySnooze(onset, { durationSeconds: 900 }, T0 + MIN);
    expect(snoozed.condition).toBe("low");
    expect(snoozed.activeSince).toBe(T0);
    expect(snoozed.snoozedUntil).toBe(T0 + 16 * MIN);
  });

  it("treats a snooze ending exactly now as expired", () => {
    const snoozed = applySnooze(INITIAL_ALERT_STATE, { durationSeconds: 60 }, T0);
    expect(isSnoozed(snoozed, T0 + 59_999)).toBe(true);
    expect(isSnoozed(snoozed, T0 + MIN)).toBe(false);
    expect(isSnoozed(INITIAL_ALERT_STATE, T0)).toBe(false);
  });

  it("cancels a snooze", () => {
    const snoozed = applySnooze(INITIAL_ALERT_STATE, { durationSeconds: 60 }, T0);
    expect(cancelSnooze(snoozed).snoozedUntil).toBeNull();
    expect(cancelSnooze(INITIAL_ALERT_STATE)).toBe(INITIAL_ALERT_STATE);
  });
});

describe("alertDuration", () => {
  it("is null while normal", () => {
    expect(alertDuration(INITIAL_ALERT_STATE, T0)).toBeNull();
  });

  it("keeps counting through a snooze", () => {
    const onset = transition(INITIAL_ALERT_STATE, "high", T0, ALERT_INTERVAL).state;
    const snoozed = applySnooze(onset, { durationSeconds: 900 }, T0 + MIN);
    expect(alertDuration(snoozed, T0 + 10 * MIN)).toBe(10 * MIN);
  });
});
