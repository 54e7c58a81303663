/**
 * Union types and helpers for all diabetes records
 */

import type { CgmReading, CalibrationReading, GlucoseReading } from "./glucose.js";
import type { InjectionRecord } from "./insulin.js";
import type { CarbsRecord, MealRecord, NutritionRecord } from "./nutrition.js";
import type { ExerciseRecord } from "./activity.js";

/**
 * All possible diabetes record types
 */
export type DiabetesRecord =
  | CgmReading
  | CalibrationReading
  | InjectionRecord
  | CarbsRecord
  | MealRecord
  | ExerciseRecord;

/**
 * Record type discriminator
 */
export type DiabetesRecordType = DiabetesRecord["type"];

/**
 * All record types as a const array for iteration
 */
export const RECORD_TYPES = [
  "cgm",
  "calibration",
  "injection",
  "carbs",
  "meal",
  "exercise",
] as const satisfies readonly DiabetesRecordType[];

/**
 * Check that a string names a known record type
 */
export function isRecordType(value: unknown): value is DiabetesRecordType {
  return RECORD_TYPES.some((type) => type === value);
}

/**
 * Shallow shape check for records arriving as JSON.
 * Only the fields the import pipeline relies on are checked.
 */
export function isDiabetesRecord(value: unknown): value is DiabetesRecord {
  if (!value || typeof value !== "object") return false;
  if (!("type" in value) || !isRecordType(value.type)) return false;
  if (!("timestamp" in value) || typeof value.timestamp !== "number") return false;
  return Number.isFinite(value.timestamp);
}

// Re-export grouped types for convenience
export type { GlucoseReading, NutritionRecord };
