/**
 * @glucolog/diabetes - Storage
 *
 * DynamoDB storage layer for diabetes data
 */

// Client
export { createDocClient, type DocClient, type DocClientOptions } from "./client.js";

// Key generation
export {
  DATA_TIMEZONE,
  formatDateInTimezone,
  padTimestamp,
  generateRecordHash,
  generateRecordKeys,
  generateImportLogKeys,
  type RecordKeys,
} from "./keys.js";

// Batch store
export { DynamoRecordWriter, toPutRequests, type RecordItem } from "./record-writer.js";

// Queries
export { queryRecordsByTypeAndTimeRange } from "./queries.js";

// Import log
export { IMPORT_SUCCESS, storeImportLog, getImportLog, type FileImportLog } from "./import-log.js";
