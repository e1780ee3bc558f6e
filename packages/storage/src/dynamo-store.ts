/**
 * DynamoDB-backed reading store
 *
 * Writes are idempotent: a conditional put refuses to overwrite an item
 * with the same key, so re-appending a timestamp reports a duplicate.
 */

import { PutCommand, QueryCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { systemTimeZone, type Reading, type Timestamp, type Trend } from "@glucose-alarm/core";
import type { AppendOutcome, ReadingStore } from "./reading-store.js";
import { calculateTTL, generateReadingKeys, readingIndexPk, timestampKey } from "./keys.js";

/** Only the send method is used, which keeps the client easy to fake */
export type DocSender = Pick<DynamoDBDocumentClient, "send">;

export interface DynamoStoreOptions {
  tableName: string;
  /** Owner of the readings; one table can hold several users */
  userId: string;
  /** Items expire via DynamoDB TTL after this many days (omit to keep forever) */
  retentionDays?: number;
  /** Timezone used for date partitions (default: system timezone) */
  timezone?: string;
  /** Name of the time-range index (default: GSI1) */
  indexName?: string;
}

/**
 * DynamoDB item for a stored reading
 */
export interface ReadingItem {
  pk: string;
  sk: string;
  gsi1pk: string;
  gsi1sk: string;
  timestamp: number;
  value: number;
  trend: Trend;
  ttl?: number;
}

const TRENDS: readonly string[] = ["rising", "falling", "steady", "unknown"];

function isTrend(value: unknown): value is Trend {
  return typeof value === "string" && TRENDS.includes(value);
}

/**
 * Rebuild a reading from a stored item, skipping malformed items
 */
export function itemToReading(item: Record<string, unknown>): Reading | null {
  const { timestamp, value, trend } = item;
  if (typeof timestamp !== "number" || typeof value !== "number") return null;
  return { timestamp, value, trend: isTrend(trend) ? trend : "unknown" };
}

function isConditionalCheckFailure(error: unknown): boolean {
  return (
    !!error &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "ConditionalCheckFailedException"
  );
}

export class DynamoReadingStore implements ReadingStore {
  private readonly timezone: string;
  private readonly indexName: string;

  constructor(
    private readonly docClient: DocSender,
    private readonly options: DynamoStoreOptions
  ) {
    this.timezone = options.timezone ?? systemTimeZone();
    this.indexName = options.indexName ?? "GSI1";
  }

  async append(reading: Reading): Promise<AppendOutcome> {
    const item: ReadingItem = {
      ...generateReadingKeys(this.options.userId, reading, this.timezone),
      timestamp: reading.timestamp,
      value: reading.value,
      trend: reading.trend,
      ...(this.options.retentionDays !== undefined && {
        ttl: calculateTTL(this.options.retentionDays),
      }),
    };

    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.options.tableName,
          Item: item,
          ConditionExpression: "attribute_not_exists(pk)",
        })
      );
      return "stored";
    } catch (error: unknown) {
      if (isConditionalCheckFailure(error)) return "duplicate";
      throw error;
    }
  }

  async query(since: Timestamp, until: Timestamp = Date.now()): Promise<Reading[]> {
    const readings: Reading[] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.options.tableName,
          IndexName: this.indexName,
          KeyConditionExpression: "gsi1pk = :pk AND gsi1sk BETWEEN :since AND :until",
          ExpressionAttributeValues: {
            ":pk": readingIndexPk(this.options.userId),
            ":since": timestampKey(since),
            ":until": timestampKey(until),
          },
          ScanIndexForward: true, // Chronological order
          ExclusiveStartKey: startKey,
        })
      );

      for (const item of result.Items ?? []) {
        const reading = itemToReading(item);
        if (reading) readings.push(reading);
      }
      startKey = result.LastEvaluatedKey;
    } while (startKey);

    return readings;
  }

  async latest(): Promise<Reading | null> {
    const result = await this.docClient.send(
      new QueryCommand({
        TableName: this.options.tableName,
        IndexName: this.indexName,
        KeyConditionExpression: "gsi1pk = :pk",
        ExpressionAttributeValues: {
          ":pk": readingIndexPk(this.options.userId),
        },
        ScanIndexForward: false,
        Limit: 1,
      })
    );

    const item = result.Items?.[0];
    return item ? itemToReading(item) : null;
  }
}
