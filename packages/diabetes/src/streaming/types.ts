/**
 * Contracts shared by the streaming write buffers and the stores they feed
 */

/**
 * Anything that carries a point in time. The buffers never look further.
 */
export interface TimestampedRecord {
  /** Unix timestamp in milliseconds */
  readonly timestamp: number;
}

/**
 * Outcome of handing a batch (or a flush request) to a writer
 */
export interface BatchWriteResult<T extends TimestampedRecord> {
  /** Records accepted, counted from the front of the batch */
  written: number;
  /** Set when fewer records than submitted were accepted, or the writer failed */
  error?: Error;
  /**
   * Writer to use from now on. Versioned writers hand back their next
   * version here; stateful writers leave it unset.
   */
  writer?: BatchWriter<T>;
}

/**
 * Batch store contract. Stores and buffers both implement it, so buffers
 * can be layered without special-casing.
 */
export interface BatchWriter<T extends TimestampedRecord> {
  /**
   * Write an ordered, non-empty batch of records of one kind.
   * Reporting zero written without an error is a short write.
   */
  writeBatch(records: readonly T[]): Promise<BatchWriteResult<T>>;
  /** Commit whatever this writer holds on to, one level down */
  flush(): Promise<BatchWriteResult<T>>;
  /**
   * Commit everything held here and in every writer further down the chain.
   * Writers that hold nothing of their own leave it out, and `flush` is
   * called instead.
   */
  drain?(): Promise<BatchWriteResult<T>>;
}

/**
 * Result of writing records into a buffer
 */
export interface WriteResult {
  /** Input records taken into the buffer's custody (committed or still buffered) */
  written: number;
  error?: Error;
}
