/**
 * Glucose record types - CGM reads and calibration finger sticks
 */

import type { BaseRecord } from "./base.js";

/**
 * CGM glucose reading - typically every 5 minutes
 */
export interface CgmReading extends BaseRecord {
  type: "cgm";
  /** Glucose value in mg/dL */
  glucoseMgDl: number;
}

/**
 * Finger stick reading entered on the receiver to calibrate the sensor
 */
export interface CalibrationReading extends BaseRecord {
  type: "calibration";
  /** Glucose value in mg/dL */
  glucoseMgDl: number;
}

/**
 * Union of all glucose reading types
 */
export type GlucoseReading = CgmReading | CalibrationReading;
