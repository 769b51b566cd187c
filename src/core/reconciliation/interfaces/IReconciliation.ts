/**
 * Reconciliation Interface
 *
 * Makes a remote goal match the local record store, the store being
 * ground truth. Datapoints are compared by `(timestamp, value)`.
 */

import type { Datapoint, RemoteDatapoint } from "../../../types/index.js";
import type { FetchFailure } from "../../remote/index.js";

// =============================================================================
// Plan
// =============================================================================

/**
 * The minimal set of remote operations that makes the goal match the store
 */
export interface ReconciliationPlan {
  /** First remote datapoint for each key missing locally, in fetch order */
  toDelete: RemoteDatapoint[];
  /** First local datapoint for each key missing remotely, in store order */
  toCreate: Datapoint[];
}

// =============================================================================
// Outcome
// =============================================================================

export type ReconciliationAction = "create" | "delete";

export interface ReconciliationFailure {
  action: ReconciliationAction;
  timestamp: number;
  value: number;
  /** Remote id, for deletes */
  id?: string;
}

export interface ReconciliationOutcome {
  goal: string;
  remoteCount: number;
  localCount: number;
  /** Deletes that succeeded (or were planned, in dry-run) */
  deleted: number;
  /** Creates that succeeded (or were planned, in dry-run) */
  created: number;
  failures: ReconciliationFailure[];
  /** Set when the remote list is incomplete; the plan was built from what was fetched */
  fetchFailure?: FetchFailure;
  dryRun: boolean;
}

export interface ReconcileOptions {
  /** Report the plan without calling create or delete */
  dryRun?: boolean;
}
