/**
 * @glucolog/diabetes
 *
 * Diabetes record models, time-windowed write buffers, and DynamoDB storage
 *
 * @example
 * ```typescript
 * import {
 *   StreamBuffer,
 *   DynamoRecordWriter,
 *   createDocClient,
 *   ONE_HOUR_MS,
 * } from "@glucolog/diabetes";
 *
 * const store = new DynamoRecordWriter(createDocClient(), tableName, userId);
 * const readings = new StreamBuffer(store, { durationMs: ONE_HOUR_MS, name: "cgm" });
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Streaming - Time-windowed write buffers
export * from "./streaming/index.js";

// Storage - DynamoDB operations
export * from "./storage/index.js";
