/**
 * DynamoDB key generation for diabetes records
 *
 * Key Design (date partitioned):
 * - PK: USR#{userId}#{recordType}#{YYYY-MM-DD} - Partition by user, type, and date
 * - SK: {timestamp}#{uniqueHash} - Sort by time within day, hash for deduplication
 *
 * Keys are a pure function of the record, so writing the same record twice
 * lands on the same item. Retrying a partially committed batch is safe.
 */

import { createHash } from "crypto";
import type { DiabetesRecord } from "../models/index.js";

/**
 * The timezone for date partitions
 */
export const DATA_TIMEZONE = "America/Los_Angeles";

const dateFormatters = new Map<string, Intl.DateTimeFormat>();

/**
 * Calendar day (YYYY-MM-DD) a timestamp falls on in `timezone`.
 * Record partitions are one day each in the data timezone.
 */
export function formatDateInTimezone(timestampMs: number, timezone: string = DATA_TIMEZONE): string {
  let formatter = dateFormatters.get(timezone);
  if (!formatter) {
    // en-CA formats dates as YYYY-MM-DD
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    dateFormatters.set(timezone, formatter);
  }
  return formatter.format(new Date(timestampMs));
}

/**
 * Zero-pad a timestamp so string order matches numeric order
 */
export function padTimestamp(timestampMs: number): string {
  return timestampMs.toString().padStart(15, "0");
}

/**
 * Generate a short hash from the fields that make a record unique
 */
export function generateRecordHash(record: DiabetesRecord): string {
  let hashInput: string;

  switch (record.type) {
    case "cgm":
    case "calibration":
      hashInput = `${record.timestamp}:${record.glucoseMgDl}`;
      break;
    case "injection":
      hashInput = `${record.timestamp}:${record.units}:${record.insulinName ?? ""}`;
      break;
    case "carbs":
      hashInput = `${record.timestamp}:${record.carbsGrams}`;
      break;
    case "meal":
      hashInput = `${record.timestamp}:${record.carbsGrams}:${record.proteinGrams}:${record.fatGrams}:${record.saturatedFatGrams}`;
      break;
    case "exercise":
      hashInput = `${record.timestamp}:${record.durationMinutes}:${record.intensity ?? ""}`;
      break;
    default:
      hashInput = JSON.stringify(record);
  }

  return createHash("sha256").update(hashInput).digest("hex").substring(0, 12);
}

/**
 * Table and index keys of one item. Import log entries carry no GSI2 keys.
 */
export interface RecordKeys {
  /** Partition: user, type and day */
  pk: string;
  /** Padded timestamp and content hash */
  sk: string;
  /** All of a user's records, across types */
  gsi1pk: string;
  gsi1sk: string;
  /** One type of a user's records, sorted by day */
  gsi2pk?: string;
  gsi2sk?: string;
}

/**
 * Generate DynamoDB keys for a record
 *
 * Primary Table:
 * - PK: USR#{userId}#{TYPE}#{YYYY-MM-DD}
 * - SK: {timestamp}#{hash}
 *
 * GSI1 (cross-type time queries):
 * - PK: USR#{userId}#ALL
 * - SK: {timestamp}
 *
 * GSI2 (type-based date range):
 * - PK: USR#{userId}#{TYPE}
 * - SK: {YYYY-MM-DD}#{timestamp}
 */
export function generateRecordKeys(userId: string, record: DiabetesRecord): RecordKeys {
  const timestamp = padTimestamp(record.timestamp);
  const date = formatDateInTimezone(record.timestamp);
  const typeUpper = record.type.toUpperCase();
  const hash = generateRecordHash(record);

  return {
    pk: `USR#${userId}#${typeUpper}#${date}`,
    sk: `${timestamp}#${hash}`,
    gsi1pk: `USR#${userId}#ALL`,
    gsi1sk: timestamp,
    gsi2pk: `USR#${userId}#${typeUpper}`,
    gsi2sk: `${date}#${timestamp}`,
  };
}

/**
 * Generate keys for a file import log entry (one per file)
 */
export function generateImportLogKeys(userId: string, fileId: string): RecordKeys {
  return {
    pk: `USR#${userId}#IMPORT`,
    sk: fileId,
    gsi1pk: `USR#${userId}#IMPORT`,
    gsi1sk: fileId,
  };
}
