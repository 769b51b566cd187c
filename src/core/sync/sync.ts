/**
 * Sync Orchestration
 *
 * One run: reconcile the target goal against the record file, derive new
 * early-meditation datapoints from the source goal, then save.
 */

import type { SyncConfig } from "../config/index.js";
import { BeeminderClient, type IGoalClient } from "../remote/index.js";
import { JsonRecordStore, type IRecordStore, type StoreSummary } from "../store/index.js";
import { reconcile, type ReconciliationOutcome } from "../reconciliation/index.js";
import { findQualifying, type QualificationOutcome } from "../qualification/index.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("sync");

export interface SyncDependencies {
  client?: IGoalClient;
  openStore?: (filePath: string) => Promise<IRecordStore>;
  now?: () => Date;
}

export interface SyncReport {
  startedAt: string;
  finishedAt: string;
  reconciliation: ReconciliationOutcome;
  qualification: QualificationOutcome;
  store: StoreSummary;
}

/**
 * Whether any remote read or write in the report failed
 */
export function hasFailures(report: SyncReport): boolean {
  const { reconciliation, qualification } = report;
  return (
    reconciliation.failures.length > 0 ||
    qualification.failures.length > 0 ||
    reconciliation.fetchFailure !== undefined ||
    qualification.fetchFailure !== undefined
  );
}

export async function runSync(config: SyncConfig, deps: SyncDependencies = {}): Promise<SyncReport> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();

  const client = deps.client ?? BeeminderClient.fromConfig(config);
  const store = await (deps.openStore ?? ((filePath) => JsonRecordStore.load(filePath, { now })))(
    config.storePath
  );

  logger.info(
    { targetGoal: config.targetGoal, sourceGoal: config.sourceGoal, storePath: config.storePath, dryRun: config.dryRun },
    "Starting sync"
  );

  const reconciliation = await reconcile(client, store, config.targetGoal, { dryRun: config.dryRun });

  const qualification = await findQualifying(client, store, config.sourceGoal, {
    targetGoal: config.targetGoal,
    timezone: config.timezone,
    rules: config.rules,
    dryRun: config.dryRun,
  });

  if (!config.dryRun) {
    await store.save();
  }

  const report: SyncReport = {
    startedAt,
    finishedAt: now().toISOString(),
    reconciliation,
    qualification,
    store: store.summary(),
  };

  logger.info({ failed: hasFailures(report) }, "Sync finished");
  return report;
}
