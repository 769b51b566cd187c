/**
 * status command - Show the local record file
 */

import chalk from "chalk";
import { createLogger, fileExists } from "../../utils/index.js";
import { JsonRecordStore } from "../../core/store/index.js";
import { resolveRecordPath } from "../config-loader.js";

const logger = createLogger("status");

export interface StatusOptions {
  db?: string;
  limit?: number;
}

const DEFAULT_LIMIT = 5;

/**
 * Show the record count, last update, and most recent datapoints.
 * Needs no credentials.
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  logger.info({ options }, "Checking status");

  const storePath = resolveRecordPath(options.db);

  if (!(await fileExists(storePath))) {
    console.log(chalk.red(`No record file at ${storePath}.`));
    console.log(chalk.dim("Run"), chalk.white("meditation-sync run"), chalk.dim("to create it."));
    return;
  }

  const store = await JsonRecordStore.load(storePath);
  const summary = store.summary();

  console.log();
  console.log(chalk.cyan.bold("Record File"));
  console.log(chalk.dim("─".repeat(40)));
  console.log(`  Path:          ${chalk.dim(summary.path)}`);
  console.log(`  Datapoints:    ${summary.count}`);
  console.log(`  Last updated:  ${summary.lastUpdated}`);

  const limit = options.limit ?? DEFAULT_LIMIT;
  const recent = [...store.getDatapoints()]
    .sort((a, b) => b.timestamp - a.timestamp)
    .slice(0, limit);

  if (recent.length > 0) {
    console.log();
    console.log(chalk.white.bold("Most recent"));
    for (const dp of recent) {
      const when = new Date(dp.timestamp * 1000).toISOString();
      console.log(`  ${chalk.dim(when)}  ${dp.value}  ${dp.comment}`);
    }
  }

  console.log();
}
