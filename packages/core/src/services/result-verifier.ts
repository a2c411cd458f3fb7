/**
 * Result verifier
 * Parses driver and tester output and decides pass/fail
 * @module @replica-drill/core/services/result-verifier
 */

import type { ExistResult, OperationSummary, TransferResult, Workload } from '@replica-drill/shared';
import { ErrorCode, HarnessError, VerificationFailure } from '@replica-drill/shared';

/** Printed by the driver when a put/get finished without errors */
export const ERROR_FREE_MARKER = 'total err: 0';
/** Printed when a driver thread panicked */
export const PANIC_MARKER = 'panicked';

const EXIST_TALLY = /\b(\d+)\s+of\s+(\d+)\b/;
const FINAL_SUMMARY = /\bFinal\s+summary:\s*(\d+)\s*\/\s*(\d+)\b/;

// ============================================================================
// Parsing
// ============================================================================

export function parseTransferOutput(workload: Workload, output: string): TransferResult {
  const errorFree = output.includes(ERROR_FREE_MARKER);
  const panicked = output.includes(PANIC_MARKER);
  return {
    kind: 'transfer',
    workload,
    output,
    errorFree,
    panicked,
    passed: errorFree && !panicked,
  };
}

/**
 * First `<n> of <m>` tally in the output
 */
export function parseExistTally(output: string): { matched: number; total: number } | undefined {
  const match = EXIST_TALLY.exec(output);
  if (!match?.[1] || !match[2]) {
    return undefined;
  }
  return { matched: Number(match[1]), total: Number(match[2]) };
}

export function parseExistOutput(workload: Workload, output: string): ExistResult {
  const tally = parseExistTally(output);
  if (!tally) {
    throw HarnessError.outputUnparsable('exist', output);
  }
  return {
    kind: 'exist',
    workload,
    output,
    matched: tally.matched,
    total: tally.total,
    passed: tally.matched === tally.total,
  };
}

export function parseOperationSummary(output: string): OperationSummary {
  const match = FINAL_SUMMARY.exec(output);
  if (!match?.[1] || !match[2]) {
    throw HarnessError.outputUnparsable('operation test', output);
  }
  const passed = Number(match[1]);
  const total = Number(match[2]);
  return { output, passed, total, complete: passed === total };
}

// ============================================================================
// Verification
// ============================================================================

/**
 * Put/Get pass when the driver reports zero errors and nothing panicked
 */
export function verifyTransfer(result: TransferResult): void {
  const { operation, port } = result.workload;

  if (result.panicked) {
    throw new VerificationFailure(
      `${operation} test failed, driver panicked, see output`,
      ErrorCode.WORKLOAD_PANICKED,
      PANIC_MARKER,
      `no "${PANIC_MARKER}"`,
      { port, operation },
    );
  }
  if (!result.errorFree) {
    throw new VerificationFailure(
      `${operation} test failed, see output`,
      ErrorCode.WORKLOAD_ERRORS,
      'errors reported',
      ERROR_FREE_MARKER,
      { port, operation },
    );
  }
}

/**
 * Exist passes when every requested key was found. `expected` defaults to
 * the total the driver reported.
 */
export function verifyExist(result: ExistResult, expected: number = result.total): void {
  if (result.matched !== result.total || result.total !== expected) {
    throw new VerificationFailure(
      `${result.matched} of ${result.total} keys, exist test failed, see output`,
      ErrorCode.EXIST_MISMATCH,
      result.matched,
      expected,
      { port: result.workload.port },
    );
  }
}

/**
 * Requested count for the doubled-range exist check
 */
export function doubledExistCount(written: number): number {
  return 2 * written + 1;
}

/**
 * Over a range twice as large as what was written, exactly the written keys
 * must be found
 */
export function verifyDoubledExist(result: ExistResult, written: number): void {
  if (result.matched !== written) {
    throw new VerificationFailure(
      `${result.matched} of ${result.total} keys in doubled range, expected ${written}`,
      ErrorCode.DOUBLED_EXIST_MISMATCH,
      result.matched,
      written,
      { port: result.workload.port },
    );
  }
}

export function verifySummary(summary: OperationSummary): void {
  if (!summary.complete) {
    throw new VerificationFailure(
      `Test failed, captured summary has incomplete score: ${summary.passed} of ${summary.total}`,
      ErrorCode.SUMMARY_MISMATCH,
      summary.passed,
      summary.total,
    );
  }
}
