/**
 * run command - Reconcile the target goal and record early meditations
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import { runSync, hasFailures, type SyncReport } from "../../core/sync/index.js";
import { clockTime } from "../../core/qualification/index.js";
import type { FetchFailure } from "../../core/remote/index.js";
import { resolveConfig } from "../config-loader.js";

const logger = createLogger("run");

export interface RunOptions {
  db?: string;
  goal?: string;
  sourceGoal?: string;
  timezone?: string;
  dryRun?: boolean;
}

/**
 * Run one full sync
 */
export async function runCommand(options: RunOptions): Promise<void> {
  logger.info({ options }, "Run command");

  // Fails before any network call when the token is missing
  const config = resolveConfig({
    storePath: options.db,
    targetGoal: options.goal,
    sourceGoal: options.sourceGoal,
    timezone: options.timezone,
    dryRun: options.dryRun,
  });

  console.log();
  console.log(chalk.cyan.bold("Beeminder Meditation Sync"));
  console.log(chalk.dim("─".repeat(50)));
  console.log(`  Target goal:  ${chalk.cyan(config.targetGoal)}`);
  console.log(`  Source goal:  ${chalk.cyan(config.sourceGoal)}`);
  console.log(`  Record file:  ${chalk.dim(config.storePath)}`);
  console.log(`  Timezone:     ${config.timezone}`);
  if (config.dryRun) {
    console.log(`  Mode:         ${chalk.yellow("dry run (nothing is written)")}`);
  }

  const spinner = ora(`Syncing ${config.targetGoal}...`).start();

  let report: SyncReport;
  try {
    report = await runSync(config);
  } catch (error) {
    spinner.fail(chalk.red("Sync failed"));
    throw error;
  }

  if (hasFailures(report)) {
    spinner.warn(chalk.yellow("Sync completed with failures"));
  } else {
    spinner.succeed(chalk.green("Sync completed successfully"));
  }

  printReport(report);
}

function printReport(report: SyncReport): void {
  const { reconciliation: rec, qualification: qual } = report;
  const verb = rec.dryRun ? "would be" : "";

  console.log();
  console.log(chalk.white.bold(`Reconciliation (${rec.goal})`));
  console.log(`  Remote:   ${rec.remoteCount} datapoints`);
  console.log(`  Local:    ${rec.localCount} datapoints`);
  console.log(`  Deleted:  ${rec.deleted} ${chalk.dim(verb)}`.trimEnd());
  console.log(`  Created:  ${rec.created} ${chalk.dim(verb)}`.trimEnd());
  printFetchFailure(rec.fetchFailure);
  for (const f of rec.failures) {
    const target = f.id ? ` id=${f.id}` : "";
    console.log(chalk.red(`  ✗ ${f.action} failed: timestamp=${f.timestamp} value=${f.value}${target}`));
  }

  console.log();
  console.log(chalk.white.bold(`Early meditations (${qual.sourceGoal} → ${qual.targetGoal})`));
  console.log(`  Scanned:           ${qual.scanned}`);
  printFetchFailure(qual.fetchFailure);
  console.log(`  Already recorded:  ${qual.alreadyRecorded}`);
  console.log(chalk.dim(`  Outside window: ${qual.outsideWindow}, too short: ${qual.tooShort}, unreadable: ${qual.unresolvable}`));

  if (qual.recorded.length === 0) {
    console.log(chalk.dim("  No new qualifying meditations"));
  }
  for (const d of qual.recorded) {
    const mark = qual.dryRun ? chalk.yellow("•") : d.remoteCreated ? chalk.green("✓") : chalk.red("✗");
    console.log(`  ${mark} ${d.date} ${clockTime(d.occurrence)}  ${d.sourceValue} min`);
  }
  if (qual.failures.length > 0) {
    console.log(chalk.red(`  ${qual.failures.length} recorded locally but not posted to ${qual.targetGoal}`));
    console.log(chalk.dim("  The next run's reconciliation will post them."));
  }

  console.log();
}

function printFetchFailure(failure: FetchFailure | undefined): void {
  if (!failure) return;
  console.log(chalk.red(`  ✗ fetch of ${failure.goal} stopped at page ${failure.page}: ${failure.message}`));
  console.log(chalk.dim("  Results above cover only the datapoints fetched before it."));
}
