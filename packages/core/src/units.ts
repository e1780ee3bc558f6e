/**
 * Unit conversion and trend helpers
 */

import type { GlucoseUnit, Trend } from "./types.js";

/** mg/dL per mmol/L of glucose */
export const MGDL_PER_MMOL = 18.0182;

/**
 * Convert mg/dL to mmol/L, rounded to one decimal.
 */
export function mgdlToMmol(mgdl: number): number {
  return Math.round((mgdl / MGDL_PER_MMOL) * 10) / 10;
}

/**
 * Convert mmol/L to mg/dL, rounded to a whole number.
 */
export function mmolToMgdl(mmol: number): number {
  return Math.round(mmol * MGDL_PER_MMOL);
}

/**
 * Express a mg/dL value in the deployment's unit
 */
export function fromMgdl(mgdl: number, unit: GlucoseUnit): number {
  return unit === "mmol/L" ? mgdlToMmol(mgdl) : mgdl;
}

/**
 * Format a value for logs and the CLI, e.g. "5.4 mmol/L" or "97 mg/dL"
 */
export function formatGlucose(value: number, unit: GlucoseUnit): string {
  return unit === "mmol/L" ? `${value.toFixed(1)} ${unit}` : `${Math.round(value)} ${unit}`;
}

/** Dexcom trend names mapped onto the coarse trend enum */
const DEXCOM_TRENDS: Record<string, Trend> = {
  doubleup: "rising",
  singleup: "rising",
  fortyfiveup: "rising",
  flat: "steady",
  fortyfivedown: "falling",
  singledown: "falling",
  doubledown: "falling",
};

/** Trend arrow mappings */
const TREND_ARROWS: Record<string, string> = {
  doubleup: "↑↑",
  singleup: "↑",
  fortyfiveup: "↗",
  flat: "→",
  fortyfivedown: "↘",
  singledown: "↓",
  doubledown: "↓↓",
};

/**
 * Map a Dexcom trend string ("Flat", "SingleUp", ...) to a Trend.
 * "None", "NotComputable", "RateOutOfRange" and anything unknown map to "unknown".
 */
export function trendFromDexcom(direction: string): Trend {
  return DEXCOM_TRENDS[direction.toLowerCase()] ?? "unknown";
}

/**
 * Map a Dexcom trend string to a display arrow.
 */
export function mapTrendArrow(direction: string): string {
  return TREND_ARROWS[direction.toLowerCase()] ?? "?";
}

/**
 * Coarse arrow for a Trend
 */
export function trendArrow(trend: Trend): string {
  switch (trend) {
    case "rising":
      return "↑";
    case "falling":
      return "↓";
    case "steady":
      return "→";
    default:
      return "?";
  }
}
