/**
 * Threshold evaluation
 *
 * Both boundaries belong to the alert condition: a reading exactly at
 * lowThreshold is low, exactly at highThreshold is high.
 */

import type { AlertCondition, Reading, Thresholds } from "./types.js";

/**
 * Classify a reading against low/high thresholds.
 * Trend plays no part in the classification.
 */
export function classify(reading: Reading, thresholds: Thresholds): AlertCondition {
  if (reading.value <= thresholds.lowThreshold) return "low";
  if (reading.value >= thresholds.highThreshold) return "high";
  return "normal";
}

/**
 * Check whether a classification calls for an audible alert
 */
export function isAlerting(condition: AlertCondition): condition is "low" | "high" {
  return condition !== "normal";
}

/**
 * Whether a reading is at or below the urgent-low threshold, when one is set
 */
export function isUrgentLow(reading: Reading, thresholds: Thresholds): boolean {
  return thresholds.urgentLow !== undefined && reading.value <= thresholds.urgentLow;
}
