/**
 * Commits a window's records to the downstream writer and classifies the
 * outcome. Shared by both buffer representations.
 */

import { ShortWriteError, StoreFailureError } from "./errors.js";
import type { BatchWriteResult, BatchWriter, TimestampedRecord } from "./types.js";

export interface CommitOutcome<T extends TimestampedRecord> {
  /** Records committed, from the front of the batch */
  written: number;
  /** Set on a short write or a store failure */
  error?: Error;
  /** Writer to use for the next commit */
  writer: BatchWriter<T>;
}

/**
 * Hand `records` to `writer` as one batch.
 *
 * An empty batch never reaches the writer. A writer that accepts fewer
 * records than submitted without saying why gets a ShortWriteError; errors
 * the writer reports or throws are passed through as they are.
 */
export async function commitBatch<T extends TimestampedRecord>(
  writer: BatchWriter<T>,
  records: readonly T[]
): Promise<CommitOutcome<T>> {
  if (records.length === 0) {
    return { written: 0, writer };
  }

  try {
    const result = await writer.writeBatch(records);
    const next = result.writer ?? writer;
    const reported = Number.isFinite(result.written) ? Math.floor(result.written) : 0;
    const written = Math.min(Math.max(reported, 0), records.length);

    if (result.error) {
      return { written, error: result.error, writer: next };
    }
    if (written < records.length) {
      return { written, error: new ShortWriteError(written, records.length), writer: next };
    }
    return { written, writer: next };
  } catch (error: unknown) {
    if (error instanceof Error) {
      return { written: 0, error, writer };
    }
    return {
      written: 0,
      error: new StoreFailureError(`Batch writer failed: ${String(error)}`, { cause: error }),
      writer,
    };
  }
}

/**
 * Push everything below a buffer down to the store: the whole chain when
 * the writer is itself a buffer, a plain flush otherwise.
 */
export async function drainWriter<T extends TimestampedRecord>(
  writer: BatchWriter<T>
): Promise<BatchWriteResult<T>> {
  return writer.drain ? writer.drain() : writer.flush();
}
