/**
 * Reconciler Implementation
 *
 * Deletes remote-only datapoints and creates local-only ones. The store is
 * never written. Two datapoints sharing timestamp and value are one
 * datapoint here, even if their comments or ids differ.
 */

import type { Datapoint, RemoteDatapoint } from "../../../types/index.js";
import type { IGoalClient } from "../../remote/index.js";
import type { IRecordStore } from "../../store/index.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  ReconcileOptions,
  ReconciliationFailure,
  ReconciliationOutcome,
  ReconciliationPlan,
} from "../interfaces/IReconciliation.js";

const logger = createLogger("reconciler");

/**
 * Set key for a datapoint
 */
export function datapointKey(timestamp: number, value: number): string {
  return `${timestamp}|${value}`;
}

/**
 * First datapoint per key whose key is absent from `exclude`, in input order
 */
function firstPerMissingKey<T extends Datapoint>(datapoints: readonly T[], exclude: ReadonlySet<string>): T[] {
  const seen = new Set<string>();
  const result: T[] = [];

  for (const dp of datapoints) {
    const key = datapointKey(dp.timestamp, dp.value);
    if (exclude.has(key) || seen.has(key)) continue;
    seen.add(key);
    result.push(dp);
  }

  return result;
}

/**
 * Symmetric difference of remote and local by `(timestamp, value)`
 */
export function planReconciliation(
  remote: readonly RemoteDatapoint[],
  local: readonly Datapoint[]
): ReconciliationPlan {
  const remoteKeys = new Set(remote.map((dp) => datapointKey(dp.timestamp, dp.value)));
  const localKeys = new Set(local.map((dp) => datapointKey(dp.timestamp, dp.value)));

  return {
    toDelete: firstPerMissingKey(remote, localKeys),
    toCreate: firstPerMissingKey(local, remoteKeys),
  };
}

/**
 * Apply the local store onto `goal`.
 *
 * Each create or delete stands alone: a failure is recorded in the outcome
 * and the next operation proceeds. A partially failed fetch still
 * reconciles against what was fetched and is reported as `fetchFailure`.
 */
export async function reconcile(
  client: IGoalClient,
  store: IRecordStore,
  goal: string,
  options: ReconcileOptions = {}
): Promise<ReconciliationOutcome> {
  const dryRun = options.dryRun ?? false;
  logger.info({ goal, dryRun }, "Reconciling goal with local record file");

  const { datapoints: remote, failure: fetchFailure } = await client.fetchPages(goal);
  const local = store.getDatapoints();
  const plan = planReconciliation(remote, local);

  const outcome: ReconciliationOutcome = {
    goal,
    remoteCount: remote.length,
    localCount: local.length,
    deleted: 0,
    created: 0,
    failures: [],
    dryRun,
  };
  if (fetchFailure) {
    outcome.fetchFailure = fetchFailure;
    logger.warn({ goal, page: fetchFailure.page, kept: remote.length }, "Reconciling against an incomplete remote list");
  }

  if (dryRun) {
    outcome.deleted = plan.toDelete.length;
    outcome.created = plan.toCreate.length;
    logger.info({ goal, toDelete: outcome.deleted, toCreate: outcome.created }, "Dry run: no changes sent");
    return outcome;
  }

  for (const dp of plan.toDelete) {
    if (await client.delete(goal, dp.id)) {
      outcome.deleted++;
    } else {
      outcome.failures.push(failure("delete", dp, dp.id));
    }
  }

  for (const dp of plan.toCreate) {
    if (await client.create(goal, dp.value, dp.timestamp, dp.comment)) {
      outcome.created++;
    } else {
      outcome.failures.push(failure("create", dp));
    }
  }

  logger.info(
    { goal, deleted: outcome.deleted, created: outcome.created, failed: outcome.failures.length },
    "Reconciliation complete"
  );
  return outcome;
}

function failure(action: ReconciliationFailure["action"], dp: Datapoint, id?: string): ReconciliationFailure {
  return id === undefined
    ? { action, timestamp: dp.timestamp, value: dp.value }
    : { action, timestamp: dp.timestamp, value: dp.value, id };
}
