/**
 * DynamoDB client configuration
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

export interface DocClientOptions {
  /** AWS region (default: AWS_REGION, then us-east-1) */
  region?: string;
  /** Endpoint override, e.g. http://localhost:8000 for DynamoDB Local */
  endpoint?: string;
}

/**
 * Create a DynamoDB Document Client with sensible defaults.
 */
export function createDocClient(options: DocClientOptions = {}): DynamoDBDocumentClient {
  const client = new DynamoDBClient({
    region: options.region ?? process.env.AWS_REGION ?? "us-east-1",
    ...(options.endpoint && { endpoint: options.endpoint }),
  });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}
