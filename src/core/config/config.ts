/**
 * Sync Configuration
 *
 * Built once at process start and handed to every component. Nothing below
 * the CLI reads process.env.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { formatValidationIssues } from "../../utils/validation.js";
import { getDefaultStorePath } from "../../utils/index.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Morning window and duration threshold for an "early meditation"
 */
export interface QualificationRules {
  /** Inclusive window start, seconds after local midnight */
  windowStartSeconds: number;
  /** Inclusive window end, seconds after local midnight */
  windowEndSeconds: number;
  /** Minimum source value (minutes), inclusive */
  minimumMinutes: number;
  /** Comment text that marks an auto-imported datapoint with an unreliable timestamp */
  autoImportMarker: string;
}

export interface SyncConfig {
  username: string;
  authToken: string;
  /** Goal that receives derived datapoints and is reconciled against the store */
  targetGoal: string;
  /** Goal scanned for qualifying meditations */
  sourceGoal: string;
  storePath: string;
  /** IANA timezone used for calendar days and the morning window */
  timezone: string;
  baseUrl: string;
  requestTimeoutMs: number;
  dryRun: boolean;
  rules: QualificationRules;
}

/**
 * Values a caller (the CLI) may force over the environment
 */
export interface ConfigOverrides {
  targetGoal?: string;
  sourceGoal?: string;
  storePath?: string;
  timezone?: string;
  dryRun?: boolean;
}

export type Environment = Record<string, string | undefined>;

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_QUALIFICATION_RULES: QualificationRules = {
  windowStartSeconds: 5 * 3600,
  windowEndSeconds: 8 * 3600 + 30 * 60,
  minimumMinutes: 35,
  autoImportMarker: "Auto-entered via Apple Health",
};

export const DEFAULT_BASE_URL = "https://www.beeminder.com/api/v1";
export const DEFAULT_TIMEZONE = "America/New_York";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// =============================================================================
// Schema
// =============================================================================

function isKnownTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

const slug = z.string().trim().min(1);

const EnvironmentSchema = z.object({
  BEEMINDER_USERNAME: slug.default("me"),
  BEEMINDER_AUTH_TOKEN: z.string().trim().optional(),
  BEEMINDER_GOAL_SLUG: slug.default("meditate-early"),
  BEEMINDER_SOURCE_GOAL_SLUG: slug.default("meditatev4"),
  MEDITATION_TIMEZONE: z
    .string()
    .trim()
    .default(DEFAULT_TIMEZONE)
    .refine(isKnownTimezone, { message: "Unknown IANA timezone" }),
  BEEMINDER_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  BEEMINDER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

// =============================================================================
// Loading
// =============================================================================

/**
 * Read KEY=VALUE pairs from a .env file. A missing file yields no values.
 */
export function readEnvFile(filePath: string): Environment {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  return parseDotenv(fs.readFileSync(filePath));
}

/**
 * Location of the record file: `override`, else `MEDITATION_DB_PATH` from the
 * .env file or the environment, else `data/meditation_sot.json`, resolved
 * against `cwd`. Needs no credentials.
 */
export function resolveStorePath(
  env: Environment,
  envFile: Environment = {},
  override?: string,
  cwd: string = process.cwd()
): string {
  const configured = [override, envFile.MEDITATION_DB_PATH, env.MEDITATION_DB_PATH]
    .map((value) => value?.trim())
    .find((value) => value !== undefined && value.length > 0);
  return path.resolve(cwd, configured ?? getDefaultStorePath(cwd));
}

/**
 * Build the run configuration.
 *
 * Precedence, lowest first: defaults, `env`, `envFile` values, `overrides`.
 *
 * @throws ConfigurationError when the auth token is absent or a value is invalid
 */
export function loadConfig(
  env: Environment,
  overrides: ConfigOverrides = {},
  envFile: Environment = {},
  cwd: string = process.cwd()
): SyncConfig {
  const merged: Environment = { ...env, ...envFile };
  if (overrides.timezone !== undefined) {
    merged.MEDITATION_TIMEZONE = overrides.timezone;
  }

  const parsed = EnvironmentSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatValidationIssues(parsed.error)}`,
      ErrorCode.CONFIGURATION_ERROR
    );
  }

  const values = parsed.data;
  if (!values.BEEMINDER_AUTH_TOKEN) {
    throw new ConfigurationError(
      "BEEMINDER_AUTH_TOKEN not set in environment variables",
      ErrorCode.CONFIG_MISSING_TOKEN
    );
  }

  return {
    username: values.BEEMINDER_USERNAME,
    authToken: values.BEEMINDER_AUTH_TOKEN,
    targetGoal: overrides.targetGoal ?? values.BEEMINDER_GOAL_SLUG,
    sourceGoal: overrides.sourceGoal ?? values.BEEMINDER_SOURCE_GOAL_SLUG,
    storePath: resolveStorePath(env, envFile, overrides.storePath, cwd),
    timezone: values.MEDITATION_TIMEZONE,
    baseUrl: values.BEEMINDER_BASE_URL.replace(/\/$/, ""),
    requestTimeoutMs: values.BEEMINDER_TIMEOUT_MS,
    dryRun: overrides.dryRun ?? false,
    rules: { ...DEFAULT_QUALIFICATION_RULES },
  };
}
