/**
 * Time-windowed write buffer
 *
 * Sits in front of a BatchWriter and groups a time-ordered stream of records
 * into windows of a fixed duration. A window is committed as one batch when
 * a record falls outside of it, or when the buffer is flushed or closed.
 *
 * A failed commit keeps the uncommitted records and puts the buffer into a
 * fault state: further flushes return the same error without touching the
 * writer until the caller clears it.
 *
 * @example
 * ```typescript
 * const readings = new StreamBuffer(storeWriter, { durationMs: ONE_HOUR_MS });
 * const { written, error } = await readings.writeMany(sortedReadings);
 * await readings.close();
 * ```
 */

import { ContractViolationError } from "./errors.js";
import { commitBatch, drainWriter } from "./flusher.js";
import { RecordWindow } from "./record-window.js";
import { checkRecordOrder, createWindowPolicy } from "./window-policy.js";
import type { WindowPolicy, WindowPolicyOptions } from "./window-policy.js";
import type { BatchWriteResult, BatchWriter, TimestampedRecord, WriteResult } from "./types.js";

export interface StreamBufferOptions extends WindowPolicyOptions {
  /** Label used in log messages (e.g. the record type) */
  name?: string;
}

export class StreamBuffer<T extends TimestampedRecord> implements BatchWriter<T> {
  private readonly window = new RecordWindow<T>();
  private readonly policy: WindowPolicy;
  private readonly name: string;
  private writer: BatchWriter<T>;
  private fault: Error | null = null;
  private lastTimestamp: number | undefined;
  private closed = false;

  constructor(writer: BatchWriter<T>, options: StreamBufferOptions) {
    this.writer = writer;
    this.policy = createWindowPolicy(options);
    this.name = options.name ?? "stream";
  }

  /** Records buffered and not yet committed */
  buffered(): number {
    return this.window.size;
  }

  /** The recorded fault, if a commit has failed */
  get error(): Error | null {
    return this.fault;
  }

  /**
   * Forget the recorded fault so the retained records can be flushed again.
   * Nothing is retried until the next write, flush or close.
   */
  clearFault(): void {
    this.fault = null;
  }

  /**
   * Write a single record
   */
  async writeOne(record: T): Promise<WriteResult> {
    return this.writeMany([record]);
  }

  /**
   * Write records sorted oldest to newest.
   *
   * Every boundary crossing commits the open window before the crossing
   * record starts the next one. On a failed commit writing stops there:
   * `written` tells how many input records the buffer took, and the caller
   * resubmits the rest once the fault is dealt with.
   */
  async writeMany(records: readonly T[]): Promise<WriteResult> {
    if (this.fault) {
      return { written: 0, error: this.fault };
    }
    if (this.closed) {
      return { written: 0, error: new ContractViolationError(`${this.name} buffer is closed`) };
    }

    const violation = checkRecordOrder(records, this.lastTimestamp);
    if (violation) {
      return { written: 0, error: violation };
    }

    if (this.window.anchor === undefined) {
      this.window.open(this.policy.anchorFor(records[0].timestamp));
    }

    let written = 0;
    let start = 0;
    for (let i = 0; i < records.length; i++) {
      const timestamp = records[i].timestamp;
      const anchor = this.window.anchor;

      if (anchor !== undefined && this.policy.crosses(anchor, timestamp)) {
        this.window.append(records, start, i);
        written += i - start;
        if (i > start) {
          this.lastTimestamp = records[i - 1].timestamp;
        }

        const result = await this.flush();
        if (result.error) {
          return { written, error: result.error };
        }

        start = i;
        this.window.open(this.policy.anchorFor(timestamp));
      }
    }

    this.window.append(records, start);
    written += records.length - start;
    this.lastTimestamp = records[records.length - 1].timestamp;

    return { written };
  }

  /**
   * BatchWriter contract, so buffers can be chained
   */
  async writeBatch(records: readonly T[]): Promise<BatchWriteResult<T>> {
    return this.writeMany(records);
  }

  /**
   * Commit the open window now, whether or not a boundary was crossed
   */
  async flush(): Promise<BatchWriteResult<T>> {
    if (this.fault) {
      return { written: 0, error: this.fault };
    }

    const size = this.window.size;
    if (size === 0) {
      return { written: 0 };
    }

    const outcome = await commitBatch(this.writer, this.window.toArray());
    this.writer = outcome.writer;
    this.window.discard(outcome.written);

    if (outcome.error) {
      this.fault = outcome.error;
      console.error(
        `[${this.name}] Flush committed ${outcome.written} of ${size} records, ${this.window.size} retained:`,
        outcome.error.message
      );
      return { written: outcome.written, error: outcome.error };
    }

    return { written: outcome.written };
  }

  /**
   * Commit the open window, then drain the writer behind it, so nothing
   * stays unwritten anywhere down the chain. The buffer stays open.
   */
  async drain(): Promise<BatchWriteResult<T>> {
    const local = await this.flush();
    if (local.error) {
      return local;
    }

    const downstream = await drainWriter(this.writer);
    if (downstream.writer) {
      this.writer = downstream.writer;
    }
    if (downstream.error) {
      console.error(`[${this.name}] Downstream drain failed:`, downstream.error.message);
      return { written: local.written, error: downstream.error };
    }

    return { written: local.written };
  }

  /**
   * Drain the whole chain and refuse further writes. Closing twice is a
   * no-op; a close that failed can be retried.
   */
  async close(): Promise<BatchWriteResult<T>> {
    if (this.closed) {
      return { written: 0 };
    }

    const drained = await this.drain();
    if (!drained.error) {
      this.closed = true;
    }
    return drained;
  }
}
