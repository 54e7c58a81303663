/**
 * @glucolog/diabetes - Models
 *
 * Type definitions for all diabetes data records
 */

// Base types
export type { BaseRecord } from "./base.js";

// Glucose types
export type { CgmReading, CalibrationReading, GlucoseReading } from "./glucose.js";

// Insulin types
export type { InjectionRecord } from "./insulin.js";

// Nutrition types
export type { CarbsRecord, MealRecord, NutritionRecord } from "./nutrition.js";

// Activity types
export type { ExerciseIntensity, ExerciseRecord } from "./activity.js";

// Union types
export type { DiabetesRecord, DiabetesRecordType } from "./records.js";
export { RECORD_TYPES, isRecordType, isDiabetesRecord } from "./records.js";
