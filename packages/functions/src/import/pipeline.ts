/**
 * Import pipeline
 *
 * Every record type gets its own chain of buffers: an inner window of a few
 * minutes to an hour feeding an outer window of one or more days, feeding
 * that type's store. Records are routed by type, so each chain only ever
 * sees records of one kind, in time order.
 */

import { RECORD_TYPES, StreamBuffer, checkRecordOrder } from "@glucolog/diabetes";
import type {
  BatchWriter,
  DiabetesRecord,
  DiabetesRecordType,
  WindowAnchoring,
} from "@glucolog/diabetes";

export interface ImportStreamOptions {
  /** Inner window duration in milliseconds */
  windowMs: number;
  /** Inner window anchoring (the outer window is always grid-aligned) */
  anchoring?: WindowAnchoring;
  /** Outer window duration in milliseconds */
  batchWindowMs: number;
}

export type ImportStreams = ReadonlyMap<DiabetesRecordType, StreamBuffer<DiabetesRecord>>;

export interface ImportSummary {
  /** Records taken by each type's chain */
  counts: Partial<Record<DiabetesRecordType, number>>;
  /** Records at or before the resume point that were skipped */
  skipped: number;
  /**
   * Newest imported timestamp, or the resume point when nothing new was
   * committed (unset when there was none)
   */
  lastDataProcessed?: number;
  errors: string[];
}

/**
 * Build one buffer chain per record type on top of `writerFor(type)`
 */
export function createImportStreams(
  writerFor: (type: DiabetesRecordType) => BatchWriter<DiabetesRecord>,
  options: ImportStreamOptions
): ImportStreams {
  const streams = new Map<DiabetesRecordType, StreamBuffer<DiabetesRecord>>();

  for (const type of RECORD_TYPES) {
    const batches = new StreamBuffer(writerFor(type), {
      durationMs: options.batchWindowMs,
      anchoring: "grid",
      name: `${type}/batch`,
    });
    streams.set(
      type,
      new StreamBuffer(batches, {
        durationMs: options.windowMs,
        anchoring: options.anchoring,
        name: type,
      })
    );
  }

  return streams;
}

/**
 * Group records by type, keeping their order
 */
export function groupByType(
  records: readonly DiabetesRecord[]
): Map<DiabetesRecordType, DiabetesRecord[]> {
  const groups = new Map<DiabetesRecordType, DiabetesRecord[]>();
  for (const record of records) {
    const group = groups.get(record.type);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.type, [record]);
    }
  }
  return groups;
}

/**
 * Write a time-ordered list of records through the streams, then close
 * every stream so everything accepted reaches the store.
 *
 * Records at or before `since` were committed by an earlier import and are
 * skipped. Input that is not in time order is rejected before anything is
 * written.
 */
export async function importRecords(
  streams: ImportStreams,
  records: readonly DiabetesRecord[],
  since?: number
): Promise<ImportSummary> {
  const counts: Partial<Record<DiabetesRecordType, number>> = {};
  const errors: string[] = [];

  if (records.length > 0) {
    const violation = checkRecordOrder(records);
    if (violation) {
      return { counts, skipped: 0, lastDataProcessed: since, errors: [violation.message] };
    }
  }

  const fresh = since === undefined ? records : records.filter((r) => r.timestamp > since);
  const skipped = records.length - fresh.length;
  console.log(`Importing ${fresh.length} records (${skipped} already imported)`);

  const failed = new Set<DiabetesRecordType>();
  for (const [type, group] of groupByType(fresh)) {
    const stream = streams.get(type);
    if (!stream) {
      errors.push(`${type}: no import stream`);
      failed.add(type);
      continue;
    }

    const result = await stream.writeMany(group);
    counts[type] = result.written;
    if (result.error) {
      errors.push(`${type}: ${result.error.message}`);
      failed.add(type);
    }
  }

  for (const [type, stream] of streams) {
    if (failed.has(type)) continue;
    const result = await stream.close();
    if (result.error) {
      errors.push(`${type}: ${result.error.message}`);
    }
  }

  if (errors.length > 0) {
    console.error(`Import failed with ${errors.length} error(s):`, errors.join("; "));
  }

  const newest = fresh.length > 0 ? fresh[fresh.length - 1].timestamp : since;
  return {
    counts,
    skipped,
    lastDataProcessed: errors.length > 0 ? since : newest,
    errors,
  };
}
