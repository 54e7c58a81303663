/**
 * DynamoDB client configuration
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

export interface DocClientOptions {
  /** AWS region (default: AWS_REGION, then us-east-1) */
  region?: string;
}

/**
 * The part of the Document client the storage functions use.
 * Tests pass `{ send: vi.fn() }`.
 */
export type DocClient = Pick<DynamoDBDocumentClient, "send">;

/**
 * Create a DynamoDB Document Client with sensible defaults.
 * Region is determined from the options, then the AWS_REGION environment
 * variable (set by Lambda runtime), then falls back to us-east-1.
 */
export function createDocClient(options: DocClientOptions = {}): DynamoDBDocumentClient {
  const client = new DynamoDBClient({
    region: options.region ?? process.env.AWS_REGION ?? "us-east-1",
  });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}
