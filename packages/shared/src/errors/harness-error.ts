/**
 * Harness and verification errors
 * @module @replica-drill/shared/errors/harness-error
 */

import { DrillError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Structural failure of the harness or its collaborators. Aborts the run.
 */
export class HarnessError extends DrillError {
  readonly kind = 'fatal';

  constructor(message: string, code: ErrorCode, meta: ErrorMeta = {}, cause?: Error) {
    super(message, code, meta, cause);
    this.name = 'HarnessError';
  }

  static nodeUnhealthy(nodeIndex: number, attempts: number, reason: string, code = ErrorCode.NODE_UNHEALTHY): HarnessError {
    return new HarnessError(
      `Node ${nodeIndex} did not become healthy after ${attempts} attempts: ${reason}`,
      code,
      { nodeIndex, attempts, reason },
    );
  }

  static metricsMalformed(nodeIndex: number, detail: string): HarnessError {
    return new HarnessError(
      `Node ${nodeIndex} returned a malformed metrics payload: ${detail}`,
      ErrorCode.METRICS_MALFORMED,
      { nodeIndex },
    );
  }

  static containerNotFound(port: number): HarnessError {
    return new HarnessError(
      `No container publishes port ${port}`,
      ErrorCode.CONTAINER_NOT_FOUND,
      { port },
    );
  }

  static containerAmbiguous(port: number, containerIds: string[]): HarnessError {
    return new HarnessError(
      `${containerIds.length} containers publish port ${port}: ${containerIds.join(', ')}`,
      ErrorCode.CONTAINER_AMBIGUOUS,
      { port, containerIds },
    );
  }

  static runtimeFailure(action: string, cause: unknown, meta: ErrorMeta = {}): HarnessError {
    const error = cause instanceof Error ? cause : undefined;
    const detail = error ? error.message : String(cause);
    return new HarnessError(
      `Container runtime failed to ${action}: ${detail}`,
      ErrorCode.RUNTIME_FAILURE,
      meta,
      error,
    );
  }

  /**
   * The message names the last non-empty output line; the full output is
   * kept in `meta.output`.
   */
  static subprocessFailed(command: string, exitCode: number | null, output: string, cause?: Error): HarnessError {
    const status = exitCode === null ? 'was terminated' : `exited with code ${exitCode}`;
    const lastLine = lastOutputLine(output);
    return new HarnessError(
      `${command} ${status}${lastLine ? `: ${lastLine}` : ''}`,
      ErrorCode.SUBPROCESS_FAILED,
      { command, exitCode, output },
      cause,
    );
  }

  static spawnFailed(command: string, cause: unknown): HarnessError {
    const error = cause instanceof Error ? cause : undefined;
    return new HarnessError(
      `Failed to start ${command}: ${error ? error.message : String(cause)}`,
      ErrorCode.SUBPROCESS_FAILED,
      { command },
      error,
    );
  }

  static outputUnparsable(what: string, output: string): HarnessError {
    return new HarnessError(
      `No ${what} output captured, check output`,
      ErrorCode.OUTPUT_UNPARSABLE,
      { output },
    );
  }
}

/**
 * Last non-empty line of captured process output
 */
export function lastOutputLine(output: string): string | undefined {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .at(-1);
}

/**
 * The cluster misbehaved: driver output shows errors or counts disagree.
 * Reported with observed and expected values.
 */
export class VerificationFailure extends DrillError {
  readonly kind = 'test_failure';
  readonly observed: unknown;
  readonly expected: unknown;

  constructor(message: string, code: ErrorCode, observed: unknown, expected: unknown, meta: ErrorMeta = {}) {
    super(message, code, { ...meta, observed, expected });
    this.name = 'VerificationFailure';
    this.observed = observed;
    this.expected = expected;
  }
}

/**
 * Check if an error is a HarnessError
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Check if an error is a VerificationFailure
 */
export function isVerificationFailure(error: unknown): error is VerificationFailure {
  return error instanceof VerificationFailure;
}
