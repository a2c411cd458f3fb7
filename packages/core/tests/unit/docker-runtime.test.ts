/**
 * Unit tests for the docker CLI runtime
 */

import { describe, it, expect, vi } from 'vitest';
import { ErrorCode, HarnessError } from '@replica-drill/shared';
import {
  DockerCliRuntime,
  parseIdList,
  type CommandExecutor,
} from '../../src/adapters/docker-runtime.js';

function executorReturning(stdout: string, stderr = '') {
  return vi.fn<CommandExecutor>(async () => ({ stdout, stderr }));
}

describe('parseIdList', () => {
  it('keeps one ID per non-empty line', () => {
    expect(parseIdList('abc123\n  def456 \n\n')).toEqual(['abc123', 'def456']);
    expect(parseIdList('')).toEqual([]);
  });
});

describe('DockerCliRuntime', () => {
  it('lists running containers by published port', async () => {
    const executor = executorReturning('abc123\n');
    const runtime = new DockerCliRuntime({ executor });

    expect(await runtime.listByPublishedPort(20001)).toEqual(['abc123']);
    expect(executor).toHaveBeenCalledWith('docker', ['ps', '--filter', 'publish=20001', '--format', '{{.ID}}']);
    expect(executor.mock.calls[0]?.[1]).not.toContain('-a');
  });

  it('lists containers by status', async () => {
    const executor = executorReturning('a1\nb2\n');
    const runtime = new DockerCliRuntime({ executor, dockerPath: '/usr/local/bin/docker' });

    expect(await runtime.listByStatus('exited')).toEqual(['a1', 'b2']);
    expect(executor).toHaveBeenCalledWith(
      '/usr/local/bin/docker',
      ['ps', '-a', '--filter', 'status=exited', '--format', '{{.ID}}'],
    );
  });

  it('stops and starts containers by ID', async () => {
    const executor = executorReturning('');
    const runtime = new DockerCliRuntime({ executor });

    await runtime.stop('abc123');
    await runtime.start('abc123');

    expect(executor.mock.calls).toEqual([
      ['docker', ['stop', 'abc123']],
      ['docker', ['start', 'abc123']],
    ]);
  });

  it('returns both streams of the container logs', async () => {
    const runtime = new DockerCliRuntime({ executor: executorReturning('out\n', 'err\n') });

    expect(await runtime.logs('abc123')).toBe('out\nerr\n');
  });

  it('turns command failures into runtime failures', async () => {
    const executor = vi.fn<CommandExecutor>(async () => {
      throw new Error('Cannot connect to the Docker daemon');
    });
    const runtime = new DockerCliRuntime({ executor });

    const error = await runtime.stop('abc123').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HarnessError);
    if (!(error instanceof HarnessError)) return;
    expect(error.code).toBe(ErrorCode.RUNTIME_FAILURE);
    expect(error.message).toBe('Container runtime failed to stop abc123: Cannot connect to the Docker daemon');
    expect(error.meta.containerId).toBe('abc123');
  });
});
