/**
 * Logger Module
 * Structured logging using pino, pretty-printed in development
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "beeminder-client", "reconciler")
 *
 * @example
 * ```typescript
 * const logger = createLogger("reconciler");
 * logger.info({ goal: "meditate-early" }, "Reconciling goal");
 * logger.error({ err }, "Failed to delete datapoint");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // Nothing is written at "silent", so skip the transport worker
  if (level === "silent" || !isDevelopment()) {
    return pino(baseOptions);
  }

  try {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  } catch {
    // Fall back to standard pino if pino-pretty not available
    return pino(baseOptions);
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
