/**
 * Probe outcomes and exponential backoff
 * @module @replica-drill/core/services/retry-policy
 */

import type { ErrorCode, HarnessError, HealthPolicyConfig } from '@replica-drill/shared';
import type { Sleeper } from '../utils/sleep';

// ============================================================================
// Probe outcomes
// ============================================================================

/**
 * Result of a single readiness probe
 */
export type ProbeOutcome =
  | { kind: 'ready' }
  | { kind: 'retry'; reason: string; code?: ErrorCode }
  | { kind: 'fatal'; error: HarnessError };

export function probeReady(): ProbeOutcome {
  return { kind: 'ready' };
}

export function probeRetry(reason: string, code?: ErrorCode): ProbeOutcome {
  return { kind: 'retry', reason, code };
}

export function probeFatal(error: HarnessError): ProbeOutcome {
  return { kind: 'fatal', error };
}

// ============================================================================
// Retry policy
// ============================================================================

export type RetryPolicyConfig = Pick<HealthPolicyConfig, 'retries' | 'initialDelayMs' | 'multiplier' | 'maxDelayMs'>;

/**
 * Exponential backoff: the sleep before retry k is min(initial * multiplier^k, max)
 */
export class RetryPolicy {
  readonly retries: number;
  readonly initialDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;

  constructor(config: RetryPolicyConfig) {
    this.retries = config.retries;
    this.initialDelayMs = config.initialDelayMs;
    this.multiplier = config.multiplier;
    this.maxDelayMs = config.maxDelayMs;
  }

  /**
   * Probes made before giving up
   */
  get maxAttempts(): number {
    return this.retries + 1;
  }

  /**
   * Delay before retry `retry` (0-based)
   */
  delayFor(retry: number): number {
    const backoff = this.initialDelayMs * Math.pow(this.multiplier, Math.max(0, retry));
    return Math.min(backoff, this.maxDelayMs);
  }

  /**
   * Upper bound of time spent sleeping when every retry is used
   */
  totalDelayMs(): number {
    let total = 0;
    for (let retry = 0; retry < this.retries; retry++) {
      total += this.delayFor(retry);
    }
    return total;
  }
}

// ============================================================================
// Polling loop
// ============================================================================

export type PollResult =
  | { status: 'ready'; attempts: number }
  | { status: 'exhausted'; attempts: number; reason: string; code?: ErrorCode };

export interface PollOptions {
  sleep: Sleeper;
  /** Called before each backoff sleep */
  onRetry?: (attempt: number, reason: string, delayMs: number) => void;
}

/**
 * Probe until ready, sleeping between attempts per the policy.
 * A fatal outcome is thrown straight away; running out of retries is
 * returned as `exhausted` with the last reason.
 */
export async function pollUntilReady(
  probe: (attempt: number) => Promise<ProbeOutcome>,
  policy: RetryPolicy,
  options: PollOptions,
): Promise<PollResult> {
  for (let attempt = 0; ; attempt++) {
    const outcome = await probe(attempt);

    if (outcome.kind === 'ready') {
      return { status: 'ready', attempts: attempt + 1 };
    }
    if (outcome.kind === 'fatal') {
      throw outcome.error;
    }

    if (attempt >= policy.retries) {
      return { status: 'exhausted', attempts: attempt + 1, reason: outcome.reason, code: outcome.code };
    }

    const delayMs = policy.delayFor(attempt);
    options.onRetry?.(attempt + 1, outcome.reason, delayMs);
    await options.sleep(delayMs);
  }
}
