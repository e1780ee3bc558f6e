import { describe, it, expect } from "vitest";
import { SimulatedSource } from "./simulated-source.js";

const MINUTE = 60 * 1000;

function sourceAt(times: number[], options: { noiseMgdl?: number; random?: () => number } = {}) {
  let index = 0;
  return new SimulatedSource({
    unit: "mg/dL",
    now: () => times[Math.min(index++, times.length - 1)],
    ...options,
  });
}

describe("SimulatedSource", () => {
  it("starts at the centre of the wave, rising", async () => {
    const source = sourceAt([0, 0]);
    expect(await source.fetchLatest()).toEqual({ value: 120, timestamp: 0, trend: "rising" });
  });

  it("peaks a quarter period in", async () => {
    const source = sourceAt([0, 15 * MINUTE]);
    expect(await source.fetchLatest()).toEqual({
      value: 200,
      timestamp: 15 * MINUTE,
      trend: "steady",
    });
  });

  it("bottoms out three quarters in", async () => {
    const source = sourceAt([0, 45 * MINUTE]);
    expect((await source.fetchLatest()).value).toBe(40);
  });

  it("snaps timestamps to the sample grid", async () => {
    const source = sourceAt([0, 7 * MINUTE]);
    expect((await source.fetchLatest()).timestamp).toBe(5 * MINUTE);
  });

  it("converts to mmol/L", async () => {
    let calls = 0;
    const source = new SimulatedSource({
      unit: "mmol/L",
      now: () => (calls++ === 0 ? 0 : 15 * MINUTE),
    });
    expect((await source.fetchLatest()).value).toBe(11.1);
  });

  it("adds bounded noise", async () => {
    const source = sourceAt([0, 0], { noiseMgdl: 10, random: () => 1 });
    expect((await source.fetchLatest()).value).toBe(130);
  });
});
