/**
 * Shared utilities
 */

import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// =============================================================================
// Paths
// =============================================================================

export const DATA_DIR = "data";
export const STORE_FILE = "meditation_sot.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getDefaultStorePath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, DATA_DIR, STORE_FILE);
}

export function getEnvFilePath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, ".env");
}
