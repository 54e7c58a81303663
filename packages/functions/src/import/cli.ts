#!/usr/bin/env node
/**
 * Local import CLI
 * Run with: npm run import -- --file records.json --user <id>
 *
 * The file holds a JSON array of records sorted oldest to newest, or an
 * object with a `records` array.
 */

import { config } from "dotenv";
import { createHash } from "crypto";
import { readFileSync } from "fs";
import { basename, dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { program } from "commander";
import { IMPORT_SUCCESS, MemoryBatchWriter, createDocClient } from "@glucolog/diabetes";
import type { DiabetesRecord } from "@glucolog/diabetes";
import { loadImportConfig } from "./config.js";
import { importFile } from "./import-file.js";
import { createImportStreams, importRecords } from "./pipeline.js";
import { parseImportRequest } from "./request.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env.local from repo root
config({ path: resolve(__dirname, "../../../../.env.local") });

interface CliOptions {
  file: string;
  user: string;
  table?: string;
  fileId?: string;
  dryRun?: boolean;
}

async function main(options: CliOptions): Promise<void> {
  const content = readFileSync(options.file, "utf-8");
  const decoded: unknown = JSON.parse(content);
  const records = Array.isArray(decoded)
    ? decoded
    : decoded && typeof decoded === "object" && "records" in decoded
      ? decoded.records
      : undefined;

  const parsed = parseImportRequest({
    userId: options.user,
    fileId: options.fileId ?? basename(options.file),
    checksum: createHash("sha256").update(content).digest("hex"),
    records,
  });
  if ("error" in parsed) {
    console.error(`Cannot import ${options.file}: ${parsed.error}`);
    process.exit(1);
  }
  const { request } = parsed;

  const importConfig = loadImportConfig({
    ...process.env,
    TABLE_NAME: options.table ?? process.env.TABLE_NAME ?? (options.dryRun ? "dry-run" : undefined),
  });

  if (options.dryRun) {
    const stores = new Map<string, MemoryBatchWriter<DiabetesRecord>>();
    const streams = createImportStreams((type) => {
      const store = new MemoryBatchWriter<DiabetesRecord>();
      stores.set(type, store);
      return store;
    }, importConfig);

    const summary = await importRecords(streams, request.records);
    for (const [type, store] of stores) {
      if (store.batches.length === 0) continue;
      console.log(`${type}: ${store.records.length} records in ${store.batches.length} batches`);
      for (const batch of store.batches) {
        const first = new Date(batch[0].timestamp).toISOString();
        const last = new Date(batch[batch.length - 1].timestamp).toISOString();
        console.log(`  ${first} .. ${last} (${batch.length})`);
      }
    }
    if (summary.errors.length > 0) {
      process.exit(1);
    }
    return;
  }

  console.log(`Importing ${request.records.length} records from ${request.fileId} into ${importConfig.tableName}`);
  const docClient = createDocClient({ region: importConfig.region });
  const { log } = await importFile(docClient, importConfig, request);

  console.log(`\nResult: ${log.importResult}`);
  if (log.lastDataProcessed !== undefined) {
    console.log(`Last data processed: ${new Date(log.lastDataProcessed).toISOString()}`);
  }
  console.log(`Counts: ${JSON.stringify(log.recordCounts)}`);

  if (log.importResult !== IMPORT_SUCCESS) {
    process.exit(1);
  }
}

program
  .name("glucolog-import")
  .description("Import a JSON file of diabetes records into DynamoDB")
  .version("0.1.0")
  .requiredOption("--file <path>", "JSON file of records, oldest first")
  .requiredOption("--user <id>", "User ID to import for")
  .option("--table <name>", "DynamoDB table (default: TABLE_NAME)")
  .option("--file-id <id>", "Import log key (default: file name)")
  .option("--dry-run", "Window the records in memory and print the batches")
  .parse();

main(program.opts<CliOptions>()).catch((error: unknown) => {
  console.error("Import failed:", error);
  process.exit(1);
});
