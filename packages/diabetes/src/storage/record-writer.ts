/**
 * DynamoDB batch store for diabetes records
 *
 * The BatchWriter at the bottom of every import chain. Records go out as
 * BatchWriteCommands of up to 25 items, one chunk at a time, so the count
 * it reports is always a committed prefix of the batch it was given.
 */

import { BatchWriteCommand } from "@aws-sdk/lib-dynamodb";
import type { DiabetesRecord } from "../models/index.js";
import { StoreFailureError } from "../streaming/errors.js";
import type { BatchWriteResult, BatchWriter } from "../streaming/types.js";
import type { DocClient } from "./client.js";
import { generateRecordKeys } from "./keys.js";
import type { RecordKeys } from "./keys.js";

/** Maximum items per DynamoDB batch write */
const BATCH_WRITE_LIMIT = 25;

/**
 * DynamoDB item for a diabetes record
 */
export interface RecordItem extends RecordKeys {
  data: DiabetesRecord;
}

/**
 * Build one put request per distinct item. A batch write rejects repeated
 * keys, and identical records map to the same item anyway.
 */
export function toPutRequests(
  userId: string,
  records: readonly DiabetesRecord[]
): { PutRequest: { Item: RecordItem } }[] {
  const seen = new Set<string>();
  const requests: { PutRequest: { Item: RecordItem } }[] = [];

  for (const record of records) {
    const keys = generateRecordKeys(userId, record);
    const id = `${keys.pk}|${keys.sk}`;
    if (seen.has(id)) continue;
    seen.add(id);
    requests.push({ PutRequest: { Item: { ...keys, data: record } } });
  }

  return requests;
}

export class DynamoRecordWriter<T extends DiabetesRecord = DiabetesRecord> implements BatchWriter<T> {
  constructor(
    private readonly docClient: DocClient,
    private readonly tableName: string,
    private readonly userId: string
  ) {}

  /**
   * Write records chunk by chunk. The first chunk DynamoDB does not fully
   * process ends the call; the records before it are reported as written.
   */
  async writeBatch(records: readonly T[]): Promise<BatchWriteResult<T>> {
    if (records.length > 0) {
      console.log(`Writing ${records.length} ${records[0].type} records to ${this.tableName}`);
    }

    let written = 0;
    for (let i = 0; i < records.length; i += BATCH_WRITE_LIMIT) {
      const chunk = records.slice(i, i + BATCH_WRITE_LIMIT);
      const requests = toPutRequests(this.userId, chunk);

      let unprocessed: number;
      try {
        const result = await this.docClient.send(
          new BatchWriteCommand({
            RequestItems: {
              [this.tableName]: requests,
            },
          })
        );
        unprocessed = result.UnprocessedItems?.[this.tableName]?.length ?? 0;
      } catch (error: unknown) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        return {
          written,
          error: new StoreFailureError(
            `Batch write to ${this.tableName} failed after ${written} of ${records.length} records: ${errorMsg}`,
            { cause: error }
          ),
        };
      }

      if (unprocessed > 0) {
        console.warn(
          `DynamoDB left ${unprocessed} of ${requests.length} items unprocessed, ${written} of ${records.length} records committed`
        );
        return { written };
      }

      written += chunk.length;
    }

    return { written };
  }

  /**
   * Nothing is held back between batches
   */
  async flush(): Promise<BatchWriteResult<T>> {
    return { written: 0 };
  }
}
