/**
 * Drill context
 * Wires the collaborators of one run from a frozen config
 * @module @replica-drill/core/context
 */

import type { DrillConfig, Logger } from '@replica-drill/shared';
import { createServiceLogger, generateRunId } from '@replica-drill/shared';
import type { ContainerRuntime } from './adapters/docker-runtime';
import { DockerCliRuntime } from './adapters/docker-runtime';
import type { MetricsClient } from './adapters/metrics-client';
import { AxiosMetricsClient } from './adapters/metrics-client';
import type { ProcessRunner } from './adapters/process-runner';
import { ChildProcessRunner } from './adapters/process-runner';
import { ClusterController } from './services/cluster-controller';
import { HealthMonitor } from './services/health-monitor';
import { OperationTester } from './services/operation-tester';
import { RetryPolicy } from './services/retry-policy';
import { WorkloadDriver } from './services/workload-driver';
import { realSleep, type Sleeper } from './utils/sleep';

/**
 * Everything a scenario needs for one run
 */
export interface DrillContext {
  readonly config: DrillConfig;
  readonly runId: string;
  readonly controller: ClusterController;
  readonly driver: WorkloadDriver;
  readonly monitor: HealthMonitor;
  readonly tester: OperationTester;
  readonly sleep: Sleeper;
  readonly logger: Logger;
}

/**
 * External boundaries, replaceable in tests
 */
export interface DrillAdapters {
  runtime: ContainerRuntime;
  metricsClient: MetricsClient;
  processRunner: ProcessRunner;
  sleep: Sleeper;
  logger: Logger;
  runId: string;
}

export function createDrillContext(config: DrillConfig, adapters: Partial<DrillAdapters> = {}): DrillContext {
  const runId = adapters.runId ?? generateRunId();
  const logger = (adapters.logger ?? createServiceLogger()).withRunId(runId);
  const sleep = adapters.sleep ?? realSleep;
  const runner = adapters.processRunner ?? new ChildProcessRunner();

  return {
    config,
    runId,
    sleep,
    logger,
    controller: new ClusterController({
      runtime: adapters.runtime ?? new DockerCliRuntime({ dockerPath: config.dockerPath }),
      logger: logger.child({ component: 'cluster-controller' }),
    }),
    driver: new WorkloadDriver({
      driverPath: config.driverPath,
      runner,
      logger: logger.child({ component: 'workload-driver' }),
    }),
    monitor: new HealthMonitor({
      client: adapters.metricsClient ?? new AxiosMetricsClient({ timeoutMs: config.health.timeoutMs }),
      policy: new RetryPolicy(config.health),
      host: config.host,
      sleep,
      logger: logger.child({ component: 'health-monitor' }),
    }),
    tester: new OperationTester({
      testerPath: config.operationTesterPath,
      runner,
      logger: logger.child({ component: 'operation-tester' }),
    }),
  };
}
