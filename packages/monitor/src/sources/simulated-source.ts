import { fromMgdl, type GlucoseUnit, type Reading, type Trend } from "@glucose-alarm/core";
import type { DataSource } from "./data-source.js";

export interface SimulatedSourceOptions {
  unit: GlucoseUnit;
  /** Centre of the wave in mg/dL (default: 120) */
  baseMgdl?: number;
  /** Swing either side of the centre in mg/dL (default: 80) */
  amplitudeMgdl?: number;
  /** Length of one full wave in minutes (default: 60) */
  periodMinutes?: number;
  /** Random noise added to each value, ± mg/dL (default: 0) */
  noiseMgdl?: number;
  /** Readings land on this grid, like a CGM's 5-minute cadence (default: 300) */
  sampleIntervalSeconds?: number;
  now?: () => number;
  random?: () => number;
}

/** Slope, in mg/dL per minute, beyond which a reading counts as moving */
const TREND_SLOPE = 1;

/**
 * Generate realistic-ish readings for demo runs without Dexcom credentials.
 * Values follow a sine wave that dips below and climbs above the usual
 * thresholds, so a demo run goes through both alert conditions.
 */
export class SimulatedSource implements DataSource {
  readonly name = "simulated";
  private readonly startedAt: number;

  constructor(private readonly options: SimulatedSourceOptions) {
    this.startedAt = this.now();
  }

  fetchLatest(): Promise<Reading> {
    const {
      unit,
      baseMgdl = 120,
      amplitudeMgdl = 80,
      periodMinutes = 60,
      noiseMgdl = 0,
      sampleIntervalSeconds = 300,
    } = this.options;

    const gridMs = sampleIntervalSeconds * 1000;
    const now = this.now();
    const timestamp = gridMs > 0 ? Math.floor(now / gridMs) * gridMs : now;

    const minutes = (timestamp - this.startedAt) / 60000;
    const phase = (2 * Math.PI * minutes) / periodMinutes;
    const random = this.options.random ?? Math.random;
    const noise = noiseMgdl > 0 ? (random() - 0.5) * 2 * noiseMgdl : 0;
    const mgdl = Math.round(Math.max(40, baseMgdl + Math.sin(phase) * amplitudeMgdl + noise));

    const slope = ((amplitudeMgdl * 2 * Math.PI) / periodMinutes) * Math.cos(phase);
    let trend: Trend = "steady";
    if (slope > TREND_SLOPE) trend = "rising";
    else if (slope < -TREND_SLOPE) trend = "falling";

    return Promise.resolve({ value: fromMgdl(mgdl, unit), timestamp, trend });
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }
}
