/**
 * Insulin record types
 */

import type { BaseRecord } from "./base.js";

/**
 * Insulin injection, from a pen or logged on the receiver
 */
export interface InjectionRecord extends BaseRecord {
  type: "injection";
  /** Units injected */
  units: number;
  /** Insulin name/brand */
  insulinName?: string;
  /** Insulin type (rapid, long-acting, etc.) */
  insulinType?: string;
}
