/**
 * Window policy: decides where a batch window starts and when a record
 * falls outside of it.
 */

import { ContractViolationError } from "./errors.js";
import type { TimestampedRecord } from "./types.js";

/**
 * How a new window picks its anchor
 *
 * - `grid`: the first record's timestamp truncated down to a multiple of the
 *   duration, so windows line up on fixed boundaries (top of the hour for 1h)
 * - `first-arrival`: the first record's own timestamp, so window boundaries
 *   depend on when records happened to arrive
 */
export type WindowAnchoring = "grid" | "first-arrival";

export interface WindowPolicyOptions {
  /** Maximum span covered by one window, in milliseconds */
  durationMs: number;
  /** Anchoring strategy (default: "grid") */
  anchoring?: WindowAnchoring;
}

export interface WindowPolicy {
  readonly durationMs: number;
  readonly anchoring: WindowAnchoring;
  /** Anchor of a window opened by a record at this timestamp */
  anchorFor(timestamp: number): number;
  /** True when a record at this timestamp does not fit the window anchored at `anchor` */
  crosses(anchor: number, timestamp: number): boolean;
}

export const ONE_MINUTE_MS = 60 * 1000;
export const ONE_HOUR_MS = 60 * ONE_MINUTE_MS;
export const ONE_DAY_MS = 24 * ONE_HOUR_MS;

/**
 * Truncate a timestamp down to a multiple of `durationMs`, counted from the
 * Unix epoch. Timestamps before the epoch still round towards -Infinity.
 */
export function truncateToGrid(timestamp: number, durationMs: number): number {
  const offset = ((timestamp % durationMs) + durationMs) % durationMs;
  return timestamp - offset;
}

/**
 * Create a window policy for a fixed duration
 */
export function createWindowPolicy(options: WindowPolicyOptions): WindowPolicy {
  const { durationMs, anchoring = "grid" } = options;

  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    throw new ContractViolationError(
      `Window duration must be a positive number of milliseconds, got ${durationMs}`
    );
  }

  return {
    durationMs,
    anchoring,
    anchorFor: (timestamp) =>
      anchoring === "grid" ? truncateToGrid(timestamp, durationMs) : timestamp,
    crosses: (anchor, timestamp) => timestamp - anchor >= durationMs,
  };
}

/**
 * Check the ordering contract for a batch of records before any of it is
 * accepted. `after` is the timestamp of the last record already accepted.
 *
 * Returns the violation, or null when the batch is usable.
 */
export function checkRecordOrder(
  records: readonly TimestampedRecord[],
  after?: number
): ContractViolationError | null {
  if (records.length === 0) {
    return new ContractViolationError("Cannot write an empty batch of records");
  }

  let previous = after;
  for (let i = 0; i < records.length; i++) {
    const { timestamp } = records[i];
    if (!Number.isFinite(timestamp)) {
      return new ContractViolationError(`Record ${i} has an invalid timestamp: ${timestamp}`);
    }
    if (previous !== undefined && timestamp < previous) {
      return new ContractViolationError(
        `Record ${i} is out of order: ${new Date(timestamp).toISOString()} comes after ${new Date(previous).toISOString()}`
      );
    }
    previous = timestamp;
  }

  return null;
}
