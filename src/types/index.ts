/**
 * Core type definitions shared by the client, store, and sync steps
 */

export type { Result } from "./result.js";

// =============================================================================
// Datapoints
// =============================================================================

/**
 * One logged measurement on a goal.
 *
 * Reconciliation identifies datapoints by `(timestamp, value)` only, so two
 * datapoints that differ just in comment or id are the same datapoint.
 */
export interface Datapoint {
  value: number;
  /** Unix seconds */
  timestamp: number;
  comment: string;
  id?: string;
}

/**
 * A datapoint as the remote API returns it. The remote id is always present.
 */
export interface RemoteDatapoint extends Datapoint {
  id: string;
  /** Server-rendered summary, e.g. "2025-Sep-26 entered at 07:21 by me via BeemiOS" */
  fulltext?: string;
}

/**
 * Shape of the local record file
 */
export interface StoreFile {
  datapoints: Datapoint[];
  /** ISO-8601, UTC */
  last_updated: string;
}

// =============================================================================
// Wall-clock time
// =============================================================================

/**
 * A civil date and time in the configured timezone, without an offset.
 * `month` is 1-based.
 */
export interface WallClockTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Where an occurrence time came from
 */
export type OccurrenceSource = "fulltext" | "timestamp";

export interface Occurrence {
  time: WallClockTime;
  source: OccurrenceSource;
}
