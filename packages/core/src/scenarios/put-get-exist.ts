/**
 * Drill Scenario: Put/Get/Exist
 *
 * One put, one get and one exist over the same key range, each sent to a
 * different node. No failures are injected.
 */

import type { DrillConfig, RunPhase } from '@replica-drill/shared';
import type { DrillContext } from '../context';
import { verifyExist, verifyTransfer } from '../services/result-verifier';
import { credentialsOf, failureReport, successReport } from '../services/run-report';
import type { WorkloadSpec } from '../services/workload-driver';
import type { DrillScenario, OptionHelp } from './types';

const NAME = 'put-get-exist';

/**
 * Transport port for the k-th operation: put, get and exist go to nodes
 * 0, 1 and 2, wrapping around smaller clusters
 */
export function operationPort(config: DrillConfig, k: number): number {
  return config.transportMinPort + (k % config.nodesAmount);
}

export const putGetExistScenario: DrillScenario = {
  name: NAME,
  description: 'Put, get and exist once each against different nodes',

  async validate(config: DrillConfig): Promise<{ valid: boolean; error?: string }> {
    if (config.count < 1) {
      return { valid: false, error: 'count must be at least 1' };
    }
    return { valid: true };
  },

  async execute(context: DrillContext) {
    const { config, driver } = context;
    const startedAt = Date.now();
    const events: string[] = [];
    let written = 0;
    let phase: RunPhase = 'baseline-write';

    const spec = (k: number): WorkloadSpec => ({
      first: config.first,
      count: config.count,
      indexFlag: 'start',
      port: operationPort(config, k),
      host: config.host,
      payload: config.payload,
      keySize: config.keySize,
      threads: config.threads,
      mode: config.mode,
      credentials: credentialsOf(config),
    });

    try {
      const put = await driver.put(spec(0));
      verifyTransfer(put);
      written = config.count;
      events.push(`Put ${config.count} records to port ${put.workload.port}`);

      phase = 'final-verify';
      const get = await driver.get(spec(1));
      verifyTransfer(get);
      events.push(`Get of ${config.count} records from port ${get.workload.port} passed`);

      const exist = await driver.exist(spec(2));
      verifyExist(exist, config.count);
      events.push(`${exist.matched} of ${exist.total} keys found on port ${exist.workload.port}`);

      return successReport(
        { scenario: NAME, startedAt, events, written },
        { exist: { matched: exist.matched, total: exist.total } },
      );
    } catch (error) {
      return failureReport({ scenario: NAME, startedAt, events, written, failedIn: phase }, error);
    }
  },

  getExpectedBehavior(config: DrillConfig): string[] {
    return [
      `Put of ${config.count} records to port ${operationPort(config, 0)} reports no errors`,
      `Get from port ${operationPort(config, 1)} reports no errors`,
      `Exist on port ${operationPort(config, 2)} reports ${config.count} of ${config.count} keys`,
    ];
  },

  getOptionsHelp(): OptionHelp[] {
    return [
      { name: 'count', type: 'number', description: 'Records to put', example: '1000' },
      { name: 'first', type: 'number', description: 'First key index', example: '0' },
      { name: 'transportMinPort', type: 'number', description: 'Transport port of node 0', example: '20000' },
    ];
  },
};

export default putGetExistScenario;
