/**
 * Drill Scenario: Await Healthy
 *
 * Polls every node's metrics endpoint until its backend is up.
 */

import type { DrillConfig } from '@replica-drill/shared';
import { buildTopology } from '@replica-drill/shared';
import type { DrillContext } from '../context';
import { RetryPolicy } from '../services/retry-policy';
import { failureReport, successReport } from '../services/run-report';
import type { DrillScenario, OptionHelp } from './types';

const NAME = 'await-healthy';

export const awaitHealthyScenario: DrillScenario = {
  name: NAME,
  description: 'Wait until every node reports backend state 1',

  async validate(): Promise<{ valid: boolean; error?: string }> {
    return { valid: true };
  },

  async execute(context: DrillContext) {
    const startedAt = Date.now();
    const events: string[] = [];
    const { nodes } = buildTopology(context.config);

    try {
      await context.monitor.awaitHealthy(nodes);
      events.push(`All ${nodes.length} nodes are ready`);
      return successReport(
        { scenario: NAME, startedAt, events, written: 0 },
        { statuses: nodes.map((node) => node.status) },
      );
    } catch (error) {
      return failureReport({ scenario: NAME, startedAt, events, written: 0, failedIn: 'await-healthy' }, error);
    }
  },

  getExpectedBehavior(config: DrillConfig): string[] {
    const policy = new RetryPolicy(config.health);
    return [
      `Nodes 0..${config.nodesAmount - 1} are polled in order on ports ${config.restMinPort}..${config.restMinPort + config.nodesAmount - 1}`,
      `Each node gets at most ${policy.maxAttempts} probes, sleeping at most ${policy.totalDelayMs()} ms in total`,
    ];
  },

  getOptionsHelp(): OptionHelp[] {
    return [
      { name: 'health.retries', type: 'number', description: 'Retries after the first probe', example: '9' },
      { name: 'health.initialDelayMs', type: 'number', description: 'Delay before the first retry', example: '1000' },
      { name: 'health.multiplier', type: 'number', description: 'Backoff factor', example: '1.75' },
      { name: 'health.maxDelayMs', type: 'number', description: 'Ceiling of a single delay', example: '15000' },
    ];
  },
};

export default awaitHealthyScenario;
