/**
 * Run state and report types
 * @module @replica-drill/shared/types/run
 */

import type { ErrorCode } from '../errors/base-error';

/**
 * Phases of a drill run. `done` and `failed` are terminal.
 */
export type RunPhase =
  | 'init'
  | 'baseline-write'
  | 'stop-node'
  | 'verify-running'
  | 'restart-all'
  | 'await-healthy'
  | 'settle'
  | 'final-verify'
  | 'done'
  | 'failed';

/**
 * Mutable context of the orchestrator
 */
export interface RunState {
  /** Records written so far; only ever grows */
  written: number;
  /** Indices of nodes whose containers are currently stopped */
  down: Set<number>;
  phase: RunPhase;
  /** Phase that was active when the run failed */
  failedIn?: RunPhase;
}

/**
 * How a run ended when it did not succeed
 */
export type FailureKind = 'fatal' | 'test_failure' | 'invalid_config';

/**
 * Outcome of a scenario
 */
export interface RunReport {
  success: boolean;
  scenario: string;
  /** Terminal phase */
  phase: RunPhase;
  /** Phase that failed, if any */
  failedIn?: RunPhase;
  duration: number;
  events: string[];
  written: number;
  error?: string;
  errorKind?: FailureKind;
  errorCode?: ErrorCode;
  observed?: unknown;
  expected?: unknown;
  /** Full output of the failed subprocess, if one failed */
  output?: string;
  data?: Record<string, unknown>;
}
