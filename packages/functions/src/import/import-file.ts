/**
 * Import one file's records into DynamoDB, resuming where the last import
 * of the same file stopped, and record the outcome in the import log.
 */

import {
  DynamoRecordWriter,
  IMPORT_SUCCESS,
  getImportLog,
  storeImportLog,
} from "@glucolog/diabetes";
import type { DocClient, FileImportLog } from "@glucolog/diabetes";
import type { ImportConfig } from "./config.js";
import { createImportStreams, importRecords } from "./pipeline.js";
import type { ImportSummary } from "./pipeline.js";
import type { ImportRequest } from "./request.js";

export interface FileImportResult {
  log: FileImportLog;
  summary: ImportSummary;
}

export async function importFile(
  docClient: DocClient,
  config: ImportConfig,
  request: ImportRequest
): Promise<FileImportResult> {
  const { userId, fileId, checksum, records } = request;
  const previous = await getImportLog(docClient, config.tableName, userId, fileId);

  const resumeAfter = previous?.lastDataProcessed;

  if (previous && resumeAfter !== undefined) {
    console.log(
      `Resuming ${fileId} after ${new Date(resumeAfter).toISOString()} (last result: ${previous.importResult})`
    );
  }

  const streams = createImportStreams(
    () => new DynamoRecordWriter(docClient, config.tableName, userId),
    config
  );
  const summary = await importRecords(streams, records, resumeAfter);

  const log: FileImportLog = {
    fileId,
    checksum,
    importResult: summary.errors.length > 0 ? summary.errors.join("; ") : IMPORT_SUCCESS,
    recordCounts: summary.counts,
    updatedAt: Date.now(),
  };
  if (summary.lastDataProcessed !== undefined) {
    log.lastDataProcessed = summary.lastDataProcessed;
  }
  await storeImportLog(docClient, config.tableName, userId, log);

  return { log, summary };
}
