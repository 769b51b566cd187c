/**
 * File System Utilities
 * Whole-file JSON reads and writes for the local record file
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    // Directory already exists
    if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
      throw error;
    }
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON file. Parsing is left unvalidated; callers run
 * the result through a schema.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fsPromises.readFile(filePath, { encoding: "utf-8" });
  return JSON.parse(content);
}

/**
 * Serialize `data` with 2-space indentation and overwrite `filePath`,
 * creating the parent directory first
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, JSON.stringify(data, null, 2), { encoding: "utf-8" });
}
