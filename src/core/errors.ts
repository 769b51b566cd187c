/**
 * Error Classes for meditation-sync
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIGURATION_ERROR = "E1000",
  CONFIG_MISSING_TOKEN = "E1001",

  // Remote API errors (2xxx)
  REMOTE_REQUEST_FAILED = "E2000",
  REMOTE_HTTP_STATUS = "E2001",
  REMOTE_INVALID_RESPONSE = "E2002",
  REMOTE_TIMEOUT = "E2003",

  // Local store errors (3xxx)
  STORE_READ_FAILED = "E3000",
  STORE_CORRUPT = "E3001",
  STORE_WRITE_FAILED = "E3002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all meditation-sync errors
 */
export class SyncError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SyncError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid or incomplete process configuration. Always fatal.
 */
export class ConfigurationError extends SyncError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * A request to the remote goal API that did not succeed
 */
export class RemoteApiError extends SyncError {
  public readonly status?: number;
  public readonly goal?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REMOTE_REQUEST_FAILED,
    context?: Record<string, unknown> & { status?: number; goal?: string }
  ) {
    super(message, code, context);
    this.name = "RemoteApiError";
    this.status = context?.status;
    this.goal = context?.goal;
  }
}

/**
 * Local record file errors
 */
export class StoreError extends SyncError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORE_READ_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "StoreError";
    this.filePath = context?.filePath;
  }

  override toString(): string {
    const location = this.filePath ? ` (${this.filePath})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Check if an error is a SyncError
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}
