/**
 * Drill configuration types and defaults
 * @module @replica-drill/shared/types/config
 */

import type { KeyGenerationMode, KeySize } from './workload';

/**
 * Backoff policy for health polling
 */
export interface HealthPolicyConfig {
  /** Retries after the first probe of each node */
  retries: number;
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Factor applied to the delay after each retry */
  multiplier: number;
  /** Ceiling for a single delay */
  maxDelayMs: number;
  /** Timeout of a single metrics request */
  timeoutMs: number;
}

/**
 * Operation tester range
 */
export interface OperationTestConfig {
  /** Number of operations to run */
  count: number;
  /** Lowest key index */
  start: number;
  /** Highest key index */
  end: number;
}

/**
 * Configuration of one drill run. Built once, frozen, passed by reference.
 */
export interface DrillConfig {
  /** Host of every node */
  readonly host: string;
  readonly nodesAmount: number;
  /** Transport port of node 0; node i listens on transportMinPort + i */
  readonly transportMinPort: number;
  /** REST port of node 0; node i serves metrics on restMinPort + i */
  readonly restMinPort: number;
  /** Records requested for the whole run */
  readonly count: number;
  /** Payload size in bytes */
  readonly payload: number;
  /** First key index */
  readonly first: number;
  readonly threads: number;
  readonly mode: KeyGenerationMode;
  readonly keySize: KeySize;
  readonly user?: string;
  readonly password?: string;
  /** Path of the workload driver executable */
  readonly driverPath: string;
  /** Path of the operation tester executable */
  readonly operationTesterPath: string;
  /** Container runtime CLI */
  readonly dockerPath: string;
  /** Pause after each baseline write before stopping the node */
  readonly settleDelayMs: number;
  /** Cluster start-up time; final verification waits this long plus one second */
  readonly clusterStartWaitMs: number;
  /** Also run the doubled-range exist check */
  readonly doubledExist: boolean;
  readonly replicas?: number;
  readonly quorum?: number;
  readonly health: Readonly<HealthPolicyConfig>;
  readonly operationTest: Readonly<OperationTestConfig>;
}

/**
 * Defaults applied before any config source
 */
export const DEFAULT_HEALTH_POLICY: HealthPolicyConfig = {
  retries: 9,
  initialDelayMs: 1_000,
  multiplier: 1.75,
  maxDelayMs: 15_000,
  timeoutMs: 5_000,
};

export const DEFAULT_OPERATION_TEST: OperationTestConfig = {
  count: 100_000,
  start: 0,
  end: 10_000,
};

export const DEFAULT_DRILL_CONFIG = {
  host: '127.0.0.1',
  nodesAmount: 4,
  transportMinPort: 20_000,
  restMinPort: 8_000,
  count: 100_000,
  payload: 4_096,
  first: 0,
  threads: 1,
  mode: 'normal',
  keySize: 8,
  driverPath: './bobp',
  operationTesterPath: './bobt',
  dockerPath: 'docker',
  settleDelayMs: 10_000,
  clusterStartWaitMs: 5_000,
  doubledExist: false,
  health: DEFAULT_HEALTH_POLICY,
  operationTest: DEFAULT_OPERATION_TEST,
} as const satisfies DrillConfig;
