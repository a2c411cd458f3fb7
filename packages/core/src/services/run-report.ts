/**
 * Run reports
 * Builds the outcome of a scenario and maps it to an exit code
 * @module @replica-drill/core/services/run-report
 */

import type { DrillConfig, FailureKind, RunPhase, RunReport, Credentials } from '@replica-drill/shared';
import {
  ErrorCode,
  exitCodeFor,
  isHarnessError,
  isValidationError,
  isVerificationFailure,
  wrapError,
} from '@replica-drill/shared';

export interface ReportContext {
  scenario: string;
  startedAt: number;
  events: readonly string[];
  written: number;
  /** Phase active when the run ended */
  failedIn?: RunPhase;
}

export function successReport(
  context: ReportContext,
  data?: Record<string, unknown>,
  now: number = Date.now(),
): RunReport {
  return {
    success: true,
    scenario: context.scenario,
    phase: 'done',
    duration: now - context.startedAt,
    events: [...context.events],
    written: context.written,
    data,
  };
}

export function failureReport(
  context: ReportContext,
  error: unknown,
  now: number = Date.now(),
): RunReport {
  const report: RunReport = {
    success: false,
    scenario: context.scenario,
    phase: 'failed',
    failedIn: context.failedIn,
    duration: now - context.startedAt,
    events: [...context.events],
    written: context.written,
  };

  if (isVerificationFailure(error)) {
    return {
      ...report,
      error: error.message,
      errorKind: 'test_failure',
      errorCode: error.code,
      observed: error.observed,
      expected: error.expected,
    };
  }

  if (isValidationError(error)) {
    return { ...report, error: error.message, errorKind: 'invalid_config', errorCode: error.code };
  }

  const wrapped = wrapError(error, ErrorCode.INTERNAL);
  const output = isHarnessError(error) ? error.meta.output : undefined;
  return {
    ...report,
    error: wrapped.message,
    errorKind: 'fatal',
    errorCode: wrapped.code,
    ...(typeof output === 'string' ? { output } : {}),
  };
}

/**
 * 0 on success, 1 on a test failure, 2 on anything else
 */
export function reportExitCode(report: RunReport): number {
  if (report.success) {
    return 0;
  }
  const byKind: Record<FailureKind, number> = { test_failure: 1, fatal: 2, invalid_config: 2 };
  if (report.errorKind) {
    return byKind[report.errorKind];
  }
  return report.errorCode === undefined ? 2 : exitCodeFor(report.errorCode);
}

/**
 * One-line diagnostic naming the failing phase and observed values
 */
export function formatDiagnostic(report: RunReport): string {
  if (report.success) {
    return `${report.scenario}: done, ${report.written} records verified`;
  }

  const where = report.failedIn ? `failed in ${report.failedIn}` : 'failed';
  const message = (report.error ?? 'unknown error').replace(/\s*\r?\n\s*/g, ' ').trim();
  let line = `${report.scenario}: ${where}: ${message}`;
  if (report.observed !== undefined || report.expected !== undefined) {
    line += ` (observed ${String(report.observed)}, expected ${String(report.expected)})`;
  }
  return line;
}

/**
 * Credentials from the config, when both parts are set
 */
export function credentialsOf(config: DrillConfig): Credentials | undefined {
  return config.user !== undefined && config.password !== undefined
    ? { user: config.user, password: config.password }
    : undefined;
}
