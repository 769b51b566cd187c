/**
 * CLI commands
 */

export { runCommand, type RunOptions } from "./run.js";
export { statusCommand, type StatusOptions } from "./status.js";
