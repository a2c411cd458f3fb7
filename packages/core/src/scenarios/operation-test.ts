/**
 * Drill Scenario: Operation Test
 *
 * Runs the operation tester against the REST API of node 0 and requires
 * a complete final summary.
 */

import type { DrillConfig } from '@replica-drill/shared';
import type { DrillContext } from '../context';
import { verifySummary } from '../services/result-verifier';
import { credentialsOf, failureReport, successReport } from '../services/run-report';
import type { DrillScenario, OptionHelp } from './types';

const NAME = 'operation-test';

export const operationTestScenario: DrillScenario = {
  name: NAME,
  description: 'Run the operation tester and check its final summary',

  async validate(config: DrillConfig): Promise<{ valid: boolean; error?: string }> {
    if (config.operationTest.end < config.operationTest.start) {
      return { valid: false, error: 'operationTest.end must not be below operationTest.start' };
    }
    return { valid: true };
  },

  async execute(context: DrillContext) {
    const { config, tester } = context;
    const startedAt = Date.now();
    const events: string[] = [];

    try {
      const summary = await tester.run({
        ...config.operationTest,
        host: config.host,
        restPort: config.restMinPort,
        credentials: credentialsOf(config),
      });
      verifySummary(summary);
      events.push(`Test succeeded: ${summary.passed}/${summary.total}`);

      return successReport(
        { scenario: NAME, startedAt, events, written: 0 },
        { passed: summary.passed, total: summary.total },
      );
    } catch (error) {
      return failureReport({ scenario: NAME, startedAt, events, written: 0 }, error);
    }
  },

  getExpectedBehavior(config: DrillConfig): string[] {
    const { count, start, end } = config.operationTest;
    return [
      `${count} operations over keys ${start}..${end} against http://${config.host}:${config.restMinPort}`,
      'Final summary reports every operation as passed',
    ];
  },

  getOptionsHelp(): OptionHelp[] {
    return [
      { name: 'operationTest.count', type: 'number', description: 'Operations to run', example: '100000' },
      { name: 'operationTest.start', type: 'number', description: 'Lowest key index', example: '0' },
      { name: 'operationTest.end', type: 'number', description: 'Highest key index', example: '10000' },
      { name: 'restMinPort', type: 'number', description: 'REST port of node 0', example: '8000' },
    ];
  },
};

export default operationTestScenario;
