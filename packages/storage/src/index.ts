/**
 * @glucose-alarm/storage
 *
 * Reading history: in-memory and DynamoDB stores, plus statistics
 */

export type { ReadingStore, AppendOutcome } from "./reading-store.js";

export { MemoryReadingStore, type MemoryStoreOptions } from "./memory-store.js";

export {
  DynamoReadingStore,
  itemToReading,
  type DocSender,
  type DynamoStoreOptions,
  type ReadingItem,
} from "./dynamo-store.js";

export { createDocClient, type DocClientOptions } from "./client.js";

export {
  formatDateInTimezone,
  timestampKey,
  readingIndexPk,
  generateReadingKeys,
  calculateTTL,
  type ReadingKeys,
} from "./keys.js";

export { calculateReadingStats, type ReadingStats } from "./stats.js";
