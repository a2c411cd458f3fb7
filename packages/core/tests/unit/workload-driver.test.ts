/**
 * Unit tests for the workload driver adapter
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, HarnessError, type Workload } from '@replica-drill/shared';
import {
  WorkloadDriver,
  buildDriverArgs,
  redactArgs,
  type WorkloadSpec,
} from '../../src/services/workload-driver.js';
import { FakeProcessRunner, exited, silentLogger } from '../helpers/fake-cluster.js';

const base: WorkloadSpec = {
  first: 0,
  count: 100,
  payload: 4096,
  keySize: 8,
  threads: 1,
  mode: 'normal',
  host: '127.0.0.1',
  port: 20000,
};

describe('buildDriverArgs', () => {
  it('orders every flag as the driver expects', () => {
    const workload: Workload = {
      ...base,
      operation: 'put',
      credentials: { user: 'admin', password: 'test-secret' },
    };

    expect(buildDriverArgs(workload)).toEqual([
      '-b', 'put', '-c', '100', '-l', '4096', '-h', '127.0.0.1', '-f', '0',
      '-t', '1', '--mode', 'normal', '-k', '8', '-p', '20000',
      '--user', 'admin', '--password', 'test-secret',
    ]);
  });

  it('omits absent optional values together with their flag', () => {
    const workload: Workload = {
      operation: 'get',
      first: 5,
      count: 10,
      payload: 16,
      keySize: 16,
      host: 'node-a',
      port: 20001,
    };

    expect(buildDriverArgs(workload)).toEqual([
      '-b', 'get', '-c', '10', '-l', '16', '-h', 'node-a', '-f', '5', '-k', '16', '-p', '20001',
    ]);
  });

  it('uses -s for the start index', () => {
    const args = buildDriverArgs({ ...base, operation: 'put', indexFlag: 'start' });

    expect(args.slice(8, 10)).toEqual(['-s', '0']);
  });

  it('always uses -f for exist', () => {
    const args = buildDriverArgs({ ...base, operation: 'exist', indexFlag: 'start' });

    expect(args.slice(8, 10)).toEqual(['-f', '0']);
  });
});

describe('redactArgs', () => {
  it('hides the password value', () => {
    expect(redactArgs(['--user', 'admin', '--password', 'test-secret'])).toEqual(['--user', 'admin', '--password', '***']);
  });
});

describe('WorkloadDriver', () => {
  function driverWith(runner: FakeProcessRunner): WorkloadDriver {
    return new WorkloadDriver({ driverPath: './bobp', runner, logger: silentLogger() });
  }

  it('passes a put of 100 with zero errors and no panic', async () => {
    const runner = new FakeProcessRunner(() => exited('put: 100 records\ntotal err: 0\n'));

    const result = await driverWith(runner).put(base);

    expect(result.passed).toBe(true);
    expect(result.workload.operation).toBe('put');
    expect(runner.calls[0]?.command).toBe('./bobp');
    expect(runner.calls[0]?.args.slice(0, 2)).toEqual(['-b', 'put']);
  });

  it('parses exist tallies', async () => {
    const runner = new FakeProcessRunner(() => exited('\n  97 of 100 \n'));

    const result = await driverWith(runner).exist(base);

    expect(result).toMatchObject({ kind: 'exist', matched: 97, total: 100, passed: false });
  });

  it('dispatches on the operation in run', async () => {
    const runner = new FakeProcessRunner(() => exited('total err: 0\n3 of 3'));
    const driver = driverWith(runner);

    expect((await driver.run({ ...base, operation: 'get' })).kind).toBe('transfer');
    expect((await driver.run({ ...base, operation: 'exist' })).kind).toBe('exist');
  });

  it('fails on a non-zero exit and keeps the output', async () => {
    const runner = new FakeProcessRunner(() => exited('thread panicked at index out of bounds', 101));

    const error = await driverWith(runner).get(base).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HarnessError);
    if (!(error instanceof HarnessError)) return;
    expect(error.code).toBe(ErrorCode.SUBPROCESS_FAILED);
    expect(error.message).toBe('./bobp exited with code 101: thread panicked at index out of bounds');
    expect(error.meta.output).toBe('thread panicked at index out of bounds');
  });

  it('fails when the driver cannot be started', async () => {
    const runner = new FakeProcessRunner(() => new Error('spawn ./bobp ENOENT'));

    await expect(driverWith(runner).put(base)).rejects.toMatchObject({
      code: ErrorCode.SUBPROCESS_FAILED,
      message: 'Failed to start ./bobp: spawn ./bobp ENOENT',
    });
  });

  it('fails when exist output has no tally', async () => {
    const runner = new FakeProcessRunner(() => exited('connection reset'));

    await expect(driverWith(runner).exist(base)).rejects.toMatchObject({
      code: ErrorCode.OUTPUT_UNPARSABLE,
      message: 'No exist output captured, check output',
    });
  });
});
