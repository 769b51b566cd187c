#!/usr/bin/env node

/**
 * meditation-sync CLI
 * Reconciles a Beeminder goal with the local record file and records
 * early meditations
 */

import { Command } from "commander";
import chalk from "chalk";
import { runCommand, statusCommand } from "./commands/index.js";
import { parsePositiveInt } from "./options.js";
import { createLogger } from "../utils/logger.js";
import { isSyncError } from "../core/errors.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("meditation-sync")
  .description("Sync early-meditation datapoints between Beeminder and a local record file")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("run", { isDefault: true })
  .description("Reconcile the target goal, then record new early meditations")
  .option("--db <path>", "Path to the local record file")
  .option("-g, --goal <slug>", "Target goal to reconcile and post to")
  .option("-s, --source-goal <slug>", "Goal to scan for meditations")
  .option("-t, --timezone <tz>", "IANA timezone for calendar days")
  .option("-n, --dry-run", "Report what would change without writing anything")
  .action(runCommand);

program
  .command("status")
  .description("Show the local record file")
  .option("--db <path>", "Path to the local record file")
  .option("-l, --limit <count>", "Number of recent datapoints to show", parsePositiveInt)
  .action(statusCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Report a fatal error and exit non-zero
 */
function handleError(error: unknown): void {
  if (isSyncError(error)) {
    logger.error({ err: error, code: error.code }, "Sync aborted");
    console.error(chalk.red(`\nError: ${error.toString()}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG) {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
