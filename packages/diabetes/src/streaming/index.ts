/**
 * @glucolog/diabetes - Streaming
 *
 * Time-windowed write buffers between a record source and a batch store
 */

export type { TimestampedRecord, BatchWriter, BatchWriteResult, WriteResult } from "./types.js";

export {
  StreamError,
  ShortWriteError,
  StoreFailureError,
  ContractViolationError,
} from "./errors.js";

export {
  ONE_MINUTE_MS,
  ONE_HOUR_MS,
  ONE_DAY_MS,
  truncateToGrid,
  createWindowPolicy,
  checkRecordOrder,
  type WindowAnchoring,
  type WindowPolicy,
  type WindowPolicyOptions,
} from "./window-policy.js";

export { RecordWindow } from "./record-window.js";
export { RecordSequence } from "./record-sequence.js";
export { commitBatch, drainWriter, type CommitOutcome } from "./flusher.js";
export { StreamBuffer, type StreamBufferOptions } from "./stream-buffer.js";
export { VersionedStreamBuffer, type VersionedResult } from "./versioned-stream-buffer.js";
export { MemoryBatchWriter } from "./memory-writer.js";
