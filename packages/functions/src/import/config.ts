/**
 * Import configuration, read from the environment
 *
 * TABLE_NAME               DynamoDB table (required)
 * AWS_REGION               AWS region (default: us-east-1)
 * IMPORT_WINDOW_MINUTES    Inner window per record type (default: 60)
 * IMPORT_WINDOW_ANCHORING  "grid" or "first-arrival" (default: grid)
 * IMPORT_BATCH_DAYS        Outer window per record type, in days (default: 1)
 */

import { ONE_DAY_MS, ONE_MINUTE_MS } from "@glucolog/diabetes";
import type { WindowAnchoring } from "@glucolog/diabetes";

export interface ImportConfig {
  tableName: string;
  region: string;
  /** Inner window duration in milliseconds */
  windowMs: number;
  anchoring: WindowAnchoring;
  /** Outer window duration in milliseconds */
  batchWindowMs: number;
}

const DEFAULT_REGION = "us-east-1";
const DEFAULT_WINDOW_MINUTES = 60;
const DEFAULT_BATCH_DAYS = 1;

function parsePositiveNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function parseAnchoring(value: string | undefined): WindowAnchoring {
  if (value === undefined || value === "" || value === "grid") return "grid";
  if (value === "first-arrival") return "first-arrival";
  throw new Error(`IMPORT_WINDOW_ANCHORING must be "grid" or "first-arrival", got "${value}"`);
}

/**
 * Read the import configuration. Throws on a missing table name or a
 * value that does not parse.
 */
export function loadImportConfig(env: NodeJS.ProcessEnv = process.env): ImportConfig {
  const tableName = env.TABLE_NAME;
  if (!tableName) {
    throw new Error("TABLE_NAME is not set");
  }

  const windowMinutes = parsePositiveNumber(
    "IMPORT_WINDOW_MINUTES",
    env.IMPORT_WINDOW_MINUTES,
    DEFAULT_WINDOW_MINUTES
  );
  const batchDays = parsePositiveNumber("IMPORT_BATCH_DAYS", env.IMPORT_BATCH_DAYS, DEFAULT_BATCH_DAYS);

  return {
    tableName,
    region: env.AWS_REGION || DEFAULT_REGION,
    windowMs: windowMinutes * ONE_MINUTE_MS,
    anchoring: parseAnchoring(env.IMPORT_WINDOW_ANCHORING),
    batchWindowMs: batchDays * ONE_DAY_MS,
  };
}
