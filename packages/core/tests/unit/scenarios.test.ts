/**
 * Unit tests for the scenario registry and the simpler scenarios
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, resolveDrillConfig } from '@replica-drill/shared';
import {
  alienRecoveryScenario,
  awaitHealthyScenario,
  describeScenarios,
  getScenario,
  listScenarios,
  operationPort,
  operationTestScenario,
  putGetExistScenario,
} from '../../src/scenarios/index.js';
import { createDrillContext } from '../../src/context.js';
import {
  FakeMetricsClient,
  FakeProcessRunner,
  FakeRuntime,
  exited,
  flagValue,
  recordingSleeper,
  silentLogger,
  simulatedCluster,
  type ProcessHandler,
} from '../helpers/fake-cluster.js';

describe('scenario registry', () => {
  it('lists every scenario', () => {
    expect(listScenarios()).toEqual(['alien-recovery', 'put-get-exist', 'operation-test', 'await-healthy']);
    expect(describeScenarios()[0]).toEqual({
      name: 'alien-recovery',
      description: alienRecoveryScenario.description,
    });
  });

  it('looks scenarios up by name only', () => {
    expect(getScenario('await-healthy')).toBe(awaitHealthyScenario);
    expect(getScenario('missing')).toBeUndefined();
    expect(getScenario('toString')).toBeUndefined();
  });
});

describe('alien-recovery', () => {
  it('rejects a count below the node count', async () => {
    const config = resolveDrillConfig({ nodesAmount: 4, count: 3 });

    expect(await alienRecoveryScenario.validate(config)).toEqual({
      valid: false,
      error: 'count cannot be less than node count',
    });
  });

  it('describes the doubled exist check when enabled', () => {
    const behaviour = alienRecoveryScenario.getExpectedBehavior(
      resolveDrillConfig({ nodesAmount: 3, count: 10, doubledExist: true }),
    );

    expect(behaviour[0]).toBe('Each of the 3 nodes receives 3 records');
    expect(behaviour.at(-1)).toBe('Exist over 19 keys finds exactly 9');
  });

  it('runs the orchestrator', async () => {
    const cluster = simulatedCluster({ nodesAmount: 2, count: 4 });

    const report = await alienRecoveryScenario.execute(cluster.context);

    expect(report).toMatchObject({ success: true, scenario: 'alien-recovery', written: 4 });
  });
});

describe('put-get-exist', () => {
  it('sends put, get and exist to nodes 0, 1 and 2', async () => {
    const cluster = simulatedCluster({ nodesAmount: 3, count: 50 });

    const report = await putGetExistScenario.execute(cluster.context);

    expect(report.success).toBe(true);
    expect(cluster.runner.calls.map(({ args }) =>
      `${flagValue(args, '-b')} ${flagValue(args, '-p')} ${args.includes('-s') ? '-s' : '-f'}`)).toEqual([
      'put 20000 -s',
      'get 20001 -s',
      'exist 20002 -f',
    ]);
    expect(report.data).toEqual({ exist: { matched: 50, total: 50 } });
  });

  it('wraps ports around smaller clusters', () => {
    const config = resolveDrillConfig({ nodesAmount: 2 });

    expect([0, 1, 2].map((k) => operationPort(config, k))).toEqual([20000, 20001, 20000]);
  });

  it('reports a failed get as a test failure', async () => {
    const cluster = simulatedCluster({ nodesAmount: 3, count: 5 });
    cluster.driver.failing.add('get:20001');

    const report = await putGetExistScenario.execute(cluster.context);

    expect(report).toMatchObject({
      success: false,
      failedIn: 'final-verify',
      errorKind: 'test_failure',
      errorCode: ErrorCode.WORKLOAD_ERRORS,
      written: 5,
    });
  });
});

describe('operation-test', () => {
  function contextWith(handler: ProcessHandler, overrides: Record<string, unknown> = {}) {
    const runner = new FakeProcessRunner(handler);
    const context = createDrillContext(resolveDrillConfig(overrides), {
      runtime: new FakeRuntime(),
      metricsClient: new FakeMetricsClient(),
      processRunner: runner,
      sleep: recordingSleeper().sleep,
      logger: silentLogger(),
    });
    return { runner, context };
  }

  it('passes on a complete summary', async () => {
    const { runner, context } = contextWith(() => exited('Final summary: 100/100\n'), {
      user: 'admin',
      password: 'test-secret',
    });

    const report = await operationTestScenario.execute(context);

    expect(report).toMatchObject({ success: true, data: { passed: 100, total: 100 } });
    expect(runner.calls[0]?.args).toEqual([
      '-c', '100000', '-s', '0', '-e', '10000', '-a', 'http://127.0.0.1:8000',
      '--user', 'admin', '--password', 'test-secret',
    ]);
  });

  it('fails on an incomplete summary', async () => {
    const { context } = contextWith(() => exited('Final summary: 7/10\n'));

    const report = await operationTestScenario.execute(context);

    expect(report).toMatchObject({
      success: false,
      errorKind: 'test_failure',
      errorCode: ErrorCode.SUMMARY_MISMATCH,
      observed: 7,
      expected: 10,
    });
  });
});

describe('await-healthy', () => {
  it('polls every node', async () => {
    const cluster = simulatedCluster({ nodesAmount: 2 });

    const report = await awaitHealthyScenario.execute(cluster.context);

    expect(report).toMatchObject({ success: true, data: { statuses: ['healthy', 'healthy'] } });
    expect(cluster.metrics.calls).toEqual([8000, 8001]);
  });

  it('states the polling budget', () => {
    const behaviour = awaitHealthyScenario.getExpectedBehavior(
      resolveDrillConfig({ health: { retries: 2, initialDelayMs: 100, multiplier: 2, maxDelayMs: 1000 } }),
    );

    expect(behaviour[1]).toBe('Each node gets at most 3 probes, sleeping at most 300 ms in total');
  });
});
