/**
 * Import request: one file's worth of normalised records
 */

import { isDiabetesRecord } from "@glucolog/diabetes";
import type { DiabetesRecord } from "@glucolog/diabetes";

export interface ImportRequest {
  userId: string;
  /** Source file identifier; the import log is keyed by it */
  fileId: string;
  checksum?: string;
  /** Records sorted oldest to newest */
  records: DiabetesRecord[];
}

export type ParseResult = { request: ImportRequest } | { error: string };

/**
 * Validate a decoded request body
 */
export function parseImportRequest(body: unknown): ParseResult {
  if (!body || typeof body !== "object") {
    return { error: "Request must be an object" };
  }
  if (!("userId" in body) || typeof body.userId !== "string" || body.userId === "") {
    return { error: "Missing userId" };
  }
  if (!("fileId" in body) || typeof body.fileId !== "string" || body.fileId === "") {
    return { error: "Missing fileId" };
  }
  if (!("records" in body) || !Array.isArray(body.records)) {
    return { error: "Missing records" };
  }

  const records: DiabetesRecord[] = [];
  for (const [i, value] of body.records.entries()) {
    if (!isDiabetesRecord(value)) {
      return { error: `Record ${i} is not a diabetes record` };
    }
    records.push(value);
  }

  const checksum = "checksum" in body && typeof body.checksum === "string" ? body.checksum : undefined;
  return {
    request: { userId: body.userId, fileId: body.fileId, checksum, records },
  };
}
