/**
 * Activity record types
 */

import type { BaseRecord } from "./base.js";

/**
 * Exercise intensity levels
 */
export type ExerciseIntensity = "Light" | "Medium" | "Heavy";

/**
 * Exercise/activity log entry
 */
export interface ExerciseRecord extends BaseRecord {
  type: "exercise";
  /** Duration in minutes */
  durationMinutes: number;
  /** Intensity level */
  intensity?: ExerciseIntensity;
  /** Free-form description */
  description?: string;
}
