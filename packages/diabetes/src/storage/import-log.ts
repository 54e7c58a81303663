/**
 * File import log
 *
 * One entry per imported file, overwritten on every re-import of that file.
 * `lastDataProcessed` is where the next import of the same file resumes.
 */

import { GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import type { DiabetesRecordType } from "../models/index.js";
import type { DocClient } from "./client.js";
import { generateImportLogKeys } from "./keys.js";

/** Import result recorded when every record was committed */
export const IMPORT_SUCCESS = "Success";

export interface FileImportLog {
  /** Source file identifier */
  fileId: string;
  /** Checksum of the file content that was imported */
  checksum?: string;
  /**
   * Timestamp (Unix ms) of the newest record committed from this file.
   * Unset until an import of the file succeeds.
   */
  lastDataProcessed?: number;
  /** "Success" or the error messages of the failed import */
  importResult: string;
  /** Records committed by the last import, by type */
  recordCounts?: Partial<Record<DiabetesRecordType, number>>;
  /** When this entry was written */
  updatedAt: number;
}

function isFileImportLog(value: unknown): value is FileImportLog {
  return (
    !!value &&
    typeof value === "object" &&
    "fileId" in value &&
    typeof value.fileId === "string" &&
    (!("lastDataProcessed" in value) || typeof value.lastDataProcessed === "number") &&
    "importResult" in value &&
    typeof value.importResult === "string"
  );
}

/**
 * Store (or replace) the import log entry for a file
 */
export async function storeImportLog(
  docClient: DocClient,
  tableName: string,
  userId: string,
  log: FileImportLog
): Promise<void> {
  const keys = generateImportLogKeys(userId, log.fileId);

  console.log(`Storing import log for file ${log.fileId}: ${log.importResult}`);
  await docClient.send(
    new PutCommand({
      TableName: tableName,
      Item: {
        ...keys,
        data: log,
      },
    })
  );
}

/**
 * Get the import log entry for a file, or null on its first import
 */
export async function getImportLog(
  docClient: DocClient,
  tableName: string,
  userId: string,
  fileId: string
): Promise<FileImportLog | null> {
  const keys = generateImportLogKeys(userId, fileId);

  const result = await docClient.send(
    new GetCommand({
      TableName: tableName,
      Key: { pk: keys.pk, sk: keys.sk },
    })
  );

  const data: unknown = result.Item?.data;
  return isFileImportLog(data) ? data : null;
}
