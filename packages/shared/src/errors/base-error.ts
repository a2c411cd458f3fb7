/**
 * Base error class with error codes
 * @module @replica-drill/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Configuration errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  INVALID_FORMAT = 2003,
  CONSTRAINT_VIOLATION = 2005,

  // Health errors (3xxx)
  NODE_UNHEALTHY = 3000,
  METRICS_MALFORMED = 3001,

  // Container runtime errors (4xxx)
  RUNTIME_FAILURE = 4000,
  CONTAINER_NOT_FOUND = 4001,
  CONTAINER_AMBIGUOUS = 4002,
  CONTAINER_HANDLE_STALE = 4003,

  // Subprocess errors (5xxx)
  SUBPROCESS_FAILED = 5000,
  OUTPUT_UNPARSABLE = 5001,

  // Verification failures (6xxx)
  WORKLOAD_ERRORS = 6000,
  WORKLOAD_PANICKED = 6001,
  EXIST_MISMATCH = 6002,
  DOUBLED_EXIST_MISMATCH = 6003,
  SUMMARY_MISMATCH = 6004,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Node index involved */
  nodeIndex?: number;
  /** Port involved */
  port?: number;
  /** Container involved */
  containerId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Process exit code of the harness for a given error code.
 * Verification failures exit 1, everything else 2.
 */
export function exitCodeFor(code: ErrorCode): number {
  return Math.floor(code / 1000) === 6 ? 1 : 2;
}

/**
 * Base error class for all drill errors
 */
export class DrillError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Run the error belongs to */
  public runId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DrillError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Exit code the harness uses when this error ends a run
   */
  get exitCode(): number {
    return exitCodeFor(this.code);
  }

  /**
   * Attach the run ID
   */
  withRunId(runId: string): this {
    this.runId = runId;
    return this;
  }

  /**
   * Convert to JSON for `--output json`
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        runId: this.runId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      runId: this.runId,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Check if an error is a DrillError
 */
export function isDrillError(error: unknown): error is DrillError {
  return error instanceof DrillError;
}

/**
 * Wrap an unknown error as a DrillError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): DrillError {
  if (isDrillError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new DrillError(error.message, code, {}, error);
  }

  return new DrillError(String(error), code);
}
