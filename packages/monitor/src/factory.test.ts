import { describe, it, expect, vi } from "vitest";
import { ConfigurationError } from "@glucose-alarm/core";
import { DynamoReadingStore, MemoryReadingStore } from "@glucose-alarm/storage";
import { buildMonitor, buildSink, buildSource, buildStore } from "./factory.js";
import { parseSettings } from "./settings.js";
import { CompositeSink } from "./sinks/composite-sink.js";
import { ConsoleSink } from "./sinks/console-sink.js";
import { NoOpSink } from "./sinks/noop-sink.js";
import { DexcomShareSource } from "./sources/dexcom-source.js";
import { SimulatedSource } from "./sources/simulated-source.js";

const quietLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("buildSource", () => {
  it("uses simulated readings in demo mode", () => {
    expect(buildSource(parseSettings({}), { demo: true })).toBeInstanceOf(SimulatedSource);
  });

  it("requires Dexcom credentials otherwise", () => {
    expect(() => buildSource(parseSettings({}))).toThrow(ConfigurationError);
  });

  it("builds a Dexcom source from credentials", () => {
    const settings = parseSettings({ dexcom: { username: "test-user", password: "test-pass" } });
    expect(buildSource(settings)).toBeInstanceOf(DexcomShareSource);
  });
});

describe("buildStore", () => {
  it("keeps history in memory without a table", () => {
    expect(buildStore(parseSettings({}))).toBeInstanceOf(MemoryReadingStore);
  });

  it("uses DynamoDB when a table is configured", () => {
    const settings = parseSettings({ storage: { tableName: "readings", region: "us-east-1" } });
    expect(buildStore(settings)).toBeInstanceOf(DynamoReadingStore);
  });
});

describe("buildSink", () => {
  it("only logs when sound is off or in demo mode", () => {
    const settings = parseSettings({});
    expect(buildSink(settings, { sound: false })).toBeInstanceOf(ConsoleSink);
    expect(buildSink(settings, { demo: true })).toBeInstanceOf(ConsoleSink);
  });

  it("adds the audio sink otherwise", () => {
    expect(buildSink(parseSettings({}))).toBeInstanceOf(CompositeSink);
  });
});

describe("buildMonitor", () => {
  it("runs a demo cycle end to end", async () => {
    const monitor = buildMonitor(parseSettings({}), {
      demo: true,
      sink: new NoOpSink(),
      logger: quietLogger(),
    });

    const result = await monitor.runCycle();

    expect(result.outcome).toBe("completed");
    expect(monitor.status().lastReading).not.toBeNull();
  });

  it("rejects schedules that invert the thresholds", () => {
    const settings = parseSettings({
      alerts: { schedules: [{ name: "night", highThreshold: 3.0 }] },
    });
    expect(() => buildMonitor(settings, { demo: true, logger: quietLogger() })).toThrow(
      'schedule "night": low 3.9 must be less than high 3'
    );
  });
});
