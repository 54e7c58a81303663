/**
 * Nutrition record types - carbs and meals
 */

import type { BaseRecord } from "./base.js";

/**
 * Standalone carb entry
 */
export interface CarbsRecord extends BaseRecord {
  type: "carbs";
  /** Carbohydrates in grams */
  carbsGrams: number;
}

/**
 * Meal with its macronutrient breakdown
 */
export interface MealRecord extends BaseRecord {
  type: "meal";
  /** Carbohydrates in grams */
  carbsGrams: number;
  /** Protein in grams */
  proteinGrams: number;
  /** Fat in grams */
  fatGrams: number;
  /** Saturated fat in grams */
  saturatedFatGrams: number;
}

/**
 * Union of all nutrition record types
 */
export type NutritionRecord = CarbsRecord | MealRecord;
