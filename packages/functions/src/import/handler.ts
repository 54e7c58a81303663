/**
 * Import Lambda
 *
 * Triggered by SQS. Each message carries one file's normalised records.
 * A failed import is logged against the file and rethrown so the message
 * is delivered again; the next attempt resumes from the import log.
 */

import { createDocClient } from "@glucolog/diabetes";
import type { DocClient } from "@glucolog/diabetes";
import type { SQSEvent, SQSHandler } from "aws-lambda";
import { loadImportConfig } from "./config.js";
import { importFile } from "./import-file.js";
import { parseImportRequest } from "./request.js";

let docClient: DocClient | undefined;

function decodeBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    console.error("Invalid JSON in import message:", error);
    return null;
  }
}

/**
 * Process every message in the event, in order
 */
export async function processImportEvent(event: SQSEvent): Promise<void> {
  const config = loadImportConfig();
  const client = (docClient ??= createDocClient({ region: config.region }));

  for (const message of event.Records) {
    const parsed = parseImportRequest(decodeBody(message.body));
    if ("error" in parsed) {
      // Redelivering a malformed message cannot fix it
      console.error(`Dropping import message ${message.messageId}: ${parsed.error}`);
      continue;
    }

    const { request } = parsed;
    console.log(`Importing ${request.records.length} records from ${request.fileId} for ${request.userId}`);

    const { log, summary } = await importFile(client, config, request);
    if (summary.errors.length > 0) {
      throw new Error(`Import of ${request.fileId} failed: ${log.importResult}`);
    }

    console.log(`Imported ${request.fileId}:`, JSON.stringify(summary.counts));
  }
}

export const handler: SQSHandler = async (event) => {
  try {
    await processImportEvent(event);
  } catch (error) {
    console.error("Import error:", error);
    throw error;
  }
};
