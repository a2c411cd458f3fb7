/**
 * Unit tests for the operation tester adapter
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@replica-drill/shared';
import { OperationTester, buildTesterArgs } from '../../src/services/operation-tester.js';
import { FakeProcessRunner, exited, silentLogger } from '../helpers/fake-cluster.js';

const request = { count: 1000, start: 0, end: 100, host: '127.0.0.1', restPort: 8000 };

describe('buildTesterArgs', () => {
  it('points the tester at the REST API', () => {
    expect(buildTesterArgs(request)).toEqual([
      '-c', '1000', '-s', '0', '-e', '100', '-a', 'http://127.0.0.1:8000',
    ]);
  });

  it('adds credentials when given', () => {
    expect(buildTesterArgs({ ...request, credentials: { user: 'admin', password: 'test-secret' } }).slice(-4))
      .toEqual(['--user', 'admin', '--password', 'test-secret']);
  });
});

describe('OperationTester', () => {
  it('returns the parsed summary', async () => {
    const runner = new FakeProcessRunner(() => exited('round 1: 500/500\nFinal summary: 1000/1000\n'));
    const tester = new OperationTester({ testerPath: './bobt', runner, logger: silentLogger() });

    const summary = await tester.run(request);

    expect(summary).toMatchObject({ passed: 1000, total: 1000, complete: true });
    expect(runner.calls[0]?.command).toBe('./bobt');
  });

  it('fails on a non-zero exit', async () => {
    const runner = new FakeProcessRunner(() => exited('fatal', 2));
    const tester = new OperationTester({ testerPath: './bobt', runner, logger: silentLogger() });

    await expect(tester.run(request)).rejects.toMatchObject({ code: ErrorCode.SUBPROCESS_FAILED });
  });
});
