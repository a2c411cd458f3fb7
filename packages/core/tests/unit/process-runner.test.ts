/**
 * Unit tests for ChildProcessRunner with a mocked spawn
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('node:child_process', () => ({
  spawn: spawnMock,
}));

import { ChildProcessRunner } from '../../src/adapters/process-runner.js';

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

describe('ChildProcessRunner', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(child);
  });

  it('captures stdout and stderr and resolves on close', async () => {
    const pending = new ChildProcessRunner().run('./bobp', ['-b', 'put']);

    child.stdout.write('put: 3 records\n');
    child.stderr.write('warning\n');
    child.stdout.end('total err: 0\n');
    child.stderr.end();
    await new Promise((resolve) => setImmediate(resolve));
    child.emit('close', 0, null);

    const result = await pending;
    expect(spawnMock).toHaveBeenCalledWith('./bobp', ['-b', 'put'], { stdio: ['ignore', 'pipe', 'pipe'] });
    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeNull();
    expect(result.output).toContain('put: 3 records\n');
    expect(result.output).toContain('warning\n');
    expect(result.output).toContain('total err: 0\n');
  });

  it('resolves with a non-zero exit code', async () => {
    const pending = new ChildProcessRunner().run('./bobp', []);

    child.emit('close', 3, null);

    await expect(pending).resolves.toEqual({ exitCode: 3, signal: null, output: '' });
  });

  it('rejects when the process cannot be spawned', async () => {
    const pending = new ChildProcessRunner().run('./missing', []);
    const error = Object.assign(new Error('spawn ./missing ENOENT'), { code: 'ENOENT' });

    child.emit('error', error);

    await expect(pending).rejects.toBe(error);
  });
});
