/**
 * In-memory BatchWriter. Keeps every committed batch, in order.
 * Used for dry runs of an import and as the store behind buffer tests.
 */

import type { BatchWriteResult, BatchWriter, TimestampedRecord } from "./types.js";

export class MemoryBatchWriter<T extends TimestampedRecord> implements BatchWriter<T> {
  readonly batches: T[][] = [];
  private flushCount = 0;

  /** Every committed record, oldest batch first */
  get records(): T[] {
    return this.batches.flat();
  }

  /** Number of flush requests received */
  get flushes(): number {
    return this.flushCount;
  }

  async writeBatch(records: readonly T[]): Promise<BatchWriteResult<T>> {
    this.batches.push(records.slice());
    return { written: records.length };
  }

  async flush(): Promise<BatchWriteResult<T>> {
    this.flushCount++;
    return { written: 0 };
  }
}
