/**
 * Builds the run configuration from the process environment, the .env file
 * in the working directory, and command-line flags
 */

import {
  loadConfig,
  readEnvFile,
  resolveStorePath,
  type ConfigOverrides,
  type SyncConfig,
} from "../core/config/index.js";
import { getEnvFilePath, getProjectRoot } from "../utils/index.js";

export function resolveConfig(overrides: ConfigOverrides): SyncConfig {
  const root = getProjectRoot();
  return loadConfig(process.env, overrides, readEnvFile(getEnvFilePath(root)), root);
}

/**
 * Record file location as `run` would use it, without requiring a token
 */
export function resolveRecordPath(db?: string): string {
  const root = getProjectRoot();
  return resolveStorePath(process.env, readEnvFile(getEnvFilePath(root)), db, root);
}
