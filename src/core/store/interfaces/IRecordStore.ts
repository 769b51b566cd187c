/**
 * Record Store Interface
 *
 * The local, authoritative list of target-goal datapoints.
 */

import type { Datapoint } from "../../../types/index.js";

export interface StoreSummary {
  path: string;
  count: number;
  lastUpdated: string;
}

export interface IRecordStore {
  /**
   * All datapoints, in insertion order
   */
  getDatapoints(): readonly Datapoint[];

  /**
   * Whether a datapoint with exactly this timestamp and value is present
   */
  exists(timestamp: number, value: number): boolean;

  /**
   * Append a datapoint with a locally derived id. Does not deduplicate.
   */
  append(value: number, timestamp: number, comment: string): Datapoint;

  /**
   * Rewrite the backing file with every datapoint and a fresh `last_updated`
   */
  save(): Promise<void>;

  summary(): StoreSummary;
}

/**
 * Id given to datapoints created locally
 */
export function localDatapointId(timestamp: number, value: number): string {
  return `local_${timestamp}_${value}`;
}
