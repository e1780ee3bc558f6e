/**
 * Reading statistics for history views
 */

import { classify, type Reading, type Thresholds } from "@glucose-alarm/core";

/**
 * Summary statistics over a set of readings
 */
export interface ReadingStats {
  /** Number of readings analyzed */
  count: number;
  /** Minimum value, null when there are no readings */
  min: number | null;
  /** Maximum value */
  max: number | null;
  /** Mean value, one decimal */
  mean: number | null;
  /** Standard deviation, one decimal */
  stdDev: number | null;
  /** Percentage strictly between the thresholds */
  timeInRange: number | null;
  /** Percentage at or below the low threshold */
  timeBelow: number | null;
  /** Percentage at or above the high threshold */
  timeAbove: number | null;
}

const round1 = (n: number): number => Math.round(n * 10) / 10;

/**
 * Calculate statistics using the same closed-interval classification as
 * the alarm, so "time below" counts exactly the readings that would alert.
 */
export function calculateReadingStats(
  readings: readonly Reading[],
  thresholds: Thresholds
): ReadingStats {
  if (readings.length === 0) {
    return {
      count: 0,
      min: null,
      max: null,
      mean: null,
      stdDev: null,
      timeInRange: null,
      timeBelow: null,
      timeAbove: null,
    };
  }

  const values = readings.map((r) => r.value);
  const n = values.length;

  const min = values.reduce((a, b) => Math.min(a, b));
  const max = values.reduce((a, b) => Math.max(a, b));
  const mean = values.reduce((a, b) => a + b, 0) / n;
  const variance = values.reduce((acc, v) => acc + Math.pow(v - mean, 2), 0) / n;

  let below = 0;
  let above = 0;
  for (const reading of readings) {
    const condition = classify(reading, thresholds);
    if (condition === "low") below++;
    else if (condition === "high") above++;
  }

  return {
    count: n,
    min,
    max,
    mean: round1(mean),
    stdDev: round1(Math.sqrt(variance)),
    timeInRange: round1(((n - below - above) / n) * 100),
    timeBelow: round1((below / n) * 100),
    timeAbove: round1((above / n) * 100),
  };
}
