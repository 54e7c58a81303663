/**
 * Versioned time-windowed write buffer
 *
 * Same windowing and recovery rules as StreamBuffer, but no operation
 * changes the buffer it is called on: every write, flush and close returns
 * the next version in `stream`, and any version a caller kept keeps seeing
 * exactly the records it saw.
 *
 * A failed commit returns a version holding the uncommitted records and the
 * fault, rather than dropping what was buffered.
 */

import { ContractViolationError } from "./errors.js";
import { commitBatch, drainWriter } from "./flusher.js";
import { RecordSequence } from "./record-sequence.js";
import { checkRecordOrder, createWindowPolicy } from "./window-policy.js";
import type { WindowPolicy } from "./window-policy.js";
import type { StreamBufferOptions } from "./stream-buffer.js";
import type { BatchWriteResult, BatchWriter, TimestampedRecord } from "./types.js";

export interface VersionedResult<T extends TimestampedRecord> extends BatchWriteResult<T> {
  /** The next version of the buffer */
  stream: VersionedStreamBuffer<T>;
}

interface StreamState<T extends TimestampedRecord> {
  readonly writer: BatchWriter<T>;
  readonly records: RecordSequence<T>;
  readonly anchor?: number;
  readonly lastTimestamp?: number;
  readonly fault?: Error;
  readonly closed: boolean;
}

export class VersionedStreamBuffer<T extends TimestampedRecord> implements BatchWriter<T> {
  private constructor(
    private readonly policy: WindowPolicy,
    private readonly name: string,
    private readonly state: StreamState<T>
  ) {}

  static create<T extends TimestampedRecord>(
    writer: BatchWriter<T>,
    options: StreamBufferOptions
  ): VersionedStreamBuffer<T> {
    return new VersionedStreamBuffer<T>(createWindowPolicy(options), options.name ?? "stream", {
      writer,
      records: RecordSequence.empty<T>(),
      closed: false,
    });
  }

  buffered(): number {
    return this.state.records.length;
  }

  /** Buffered records, oldest first */
  pending(): T[] {
    return this.state.records.toArray();
  }

  get error(): Error | null {
    return this.state.fault ?? null;
  }

  get isClosed(): boolean {
    return this.state.closed;
  }

  /** Version with the fault forgotten and the retained records kept */
  clearFault(): VersionedStreamBuffer<T> {
    return this.derive({ fault: undefined });
  }

  async writeOne(record: T): Promise<VersionedResult<T>> {
    return this.writeMany([record]);
  }

  /**
   * Write records sorted oldest to newest. See StreamBuffer.writeMany.
   */
  async writeMany(records: readonly T[]): Promise<VersionedResult<T>> {
    const { fault, closed, lastTimestamp } = this.state;
    if (fault) {
      return this.result(this, 0, fault);
    }
    if (closed) {
      return this.result(this, 0, new ContractViolationError(`${this.name} buffer is closed`));
    }

    const violation = checkRecordOrder(records, lastTimestamp);
    if (violation) {
      return this.result(this, 0, violation);
    }

    let current: VersionedStreamBuffer<T> = this;
    let sequence = this.state.records;
    let anchor = this.state.anchor ?? this.policy.anchorFor(records[0].timestamp);
    let written = 0;
    let start = 0;

    for (let i = 0; i < records.length; i++) {
      const timestamp = records[i].timestamp;
      if (!this.policy.crosses(anchor, timestamp)) {
        continue;
      }

      sequence = sequence.appendAll(records, start, i);
      written += i - start;
      const flushed = await current
        .derive({
          records: sequence,
          anchor,
          lastTimestamp: i > start ? records[i - 1].timestamp : current.state.lastTimestamp,
        })
        .flush();
      if (flushed.error) {
        return this.result(flushed.stream, written, flushed.error);
      }

      current = flushed.stream;
      sequence = current.state.records;
      anchor = this.policy.anchorFor(timestamp);
      start = i;
    }

    sequence = sequence.appendAll(records, start);
    written += records.length - start;

    const next = current.derive({
      records: sequence,
      anchor,
      lastTimestamp: records[records.length - 1].timestamp,
    });
    return this.result(next, written);
  }

  async writeBatch(records: readonly T[]): Promise<VersionedResult<T>> {
    return this.writeMany(records);
  }

  /**
   * Commit the open window. The returned version holds whatever the writer
   * did not commit, along with the fault.
   */
  async flush(): Promise<VersionedResult<T>> {
    const { fault, records, writer } = this.state;
    if (fault) {
      return this.result(this, 0, fault);
    }
    if (records.length === 0) {
      return this.result(this, 0);
    }

    const outcome = await commitBatch(writer, records.toArray());
    const remaining = records.drop(outcome.written);
    const next = this.derive({
      writer: outcome.writer,
      records: remaining,
      anchor: remaining.length > 0 ? this.state.anchor : undefined,
      fault: outcome.error,
    });

    if (outcome.error) {
      console.error(
        `[${this.name}] Flush committed ${outcome.written} of ${records.length} records, ${remaining.length} retained:`,
        outcome.error.message
      );
    }

    return this.result(next, outcome.written, outcome.error);
  }

  /**
   * Commit the open window, then drain the writer behind it. The returned
   * version stays open.
   */
  async drain(): Promise<VersionedResult<T>> {
    const flushed = await this.flush();
    if (flushed.error) {
      return flushed;
    }

    const drained = flushed.stream;
    const downstream = await drainWriter(drained.state.writer);
    const writer = downstream.writer ?? drained.state.writer;

    if (downstream.error) {
      console.error(`[${this.name}] Downstream drain failed:`, downstream.error.message);
      return this.result(drained.derive({ writer }), flushed.written, downstream.error);
    }

    return this.result(drained.derive({ writer }), flushed.written);
  }

  /**
   * Drain the whole chain and return a closed version. Closing a closed
   * version returns it unchanged.
   */
  async close(): Promise<VersionedResult<T>> {
    if (this.state.closed) {
      return this.result(this, 0);
    }

    const drained = await this.drain();
    if (drained.error) {
      return drained;
    }
    return this.result(drained.stream.derive({ closed: true }), drained.written);
  }

  private derive(changes: Partial<StreamState<T>>): VersionedStreamBuffer<T> {
    return new VersionedStreamBuffer<T>(this.policy, this.name, { ...this.state, ...changes });
  }

  private result(
    stream: VersionedStreamBuffer<T>,
    written: number,
    error?: Error
  ): VersionedResult<T> {
    return error ? { stream, writer: stream, written, error } : { stream, writer: stream, written };
  }
}
