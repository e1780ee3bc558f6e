/**
 * DynamoDB key generation for glucose readings
 *
 * Key Design (date partitioned):
 * - PK: USR#{userId}#READING#{YYYY-MM-DD} - Partition by user and local date
 * - SK: {timestamp} - Sort by time within the day; one item per timestamp
 *
 * GSI1 (time-range queries across days):
 * - PK: USR#{userId}#READING
 * - SK: {timestamp}
 *
 * Timestamps are zero-padded to 15 digits so lexical order matches numeric order.
 */

import type { Reading, Timestamp } from "@glucose-alarm/core";

/**
 * Format a timestamp as YYYY-MM-DD in a timezone
 */
export function formatDateInTimezone(timestampMs: number, timezone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(new Date(timestampMs));
}

/**
 * Zero-pad a timestamp for use as a sort key
 */
export function timestampKey(timestamp: Timestamp): string {
  return timestamp.toString().padStart(15, "0");
}

/**
 * Partition key of the time-range index for a user
 */
export function readingIndexPk(userId: string): string {
  return `USR#${userId}#READING`;
}

/**
 * DynamoDB key structure for a reading
 */
export interface ReadingKeys {
  pk: string;
  sk: string;
  gsi1pk: string;
  gsi1sk: string;
}

/**
 * Generate DynamoDB keys for a reading
 */
export function generateReadingKeys(userId: string, reading: Reading, timezone: string): ReadingKeys {
  const timestamp = timestampKey(reading.timestamp);
  const date = formatDateInTimezone(reading.timestamp, timezone);

  return {
    pk: `USR#${userId}#READING#${date}`,
    sk: timestamp,
    gsi1pk: readingIndexPk(userId),
    gsi1sk: timestamp,
  };
}

/**
 * Calculate TTL value in epoch seconds.
 */
export function calculateTTL(retentionDays: number, now: number = Date.now()): number {
  return Math.floor(now / 1000) + retentionDays * 24 * 3600;
}
