/**
 * Container runtime adapter
 *
 * Drives the `docker` CLI through child processes. Every command is awaited;
 * a failing command is fatal and never retried.
 *
 * @module @replica-drill/core/adapters/docker-runtime
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { HarnessError, type ErrorMeta } from '@replica-drill/shared';

const execFileAsync = promisify(execFile);

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type ContainerStatus = 'created' | 'restarting' | 'running' | 'removing' | 'paused' | 'exited' | 'dead';

/**
 * Operations the Cluster Controller needs from a container runtime
 */
export interface ContainerRuntime {
  /** IDs of running containers publishing the port */
  listByPublishedPort(port: number): Promise<string[]>;
  listByStatus(status: ContainerStatus): Promise<string[]>;
  stop(containerId: string): Promise<void>;
  start(containerId: string): Promise<void>;
  logs(containerId: string): Promise<string>;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable with arguments, rejecting on non-zero exit
 */
export type CommandExecutor = (file: string, args: readonly string[]) => Promise<CommandOutput>;

const MAX_BUFFER = 64 * 1024 * 1024;

export const execFileExecutor: CommandExecutor = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    encoding: 'utf8',
    maxBuffer: MAX_BUFFER,
  });
  return { stdout, stderr };
};

// ─────────────────────────────────────────────────────────────────────────────
// Docker CLI runtime
// ─────────────────────────────────────────────────────────────────────────────

export interface DockerCliRuntimeConfig {
  dockerPath?: string;
  executor?: CommandExecutor;
}

export class DockerCliRuntime implements ContainerRuntime {
  private readonly dockerPath: string;
  private readonly executor: CommandExecutor;

  constructor(config: DockerCliRuntimeConfig = {}) {
    this.dockerPath = config.dockerPath ?? 'docker';
    this.executor = config.executor ?? execFileExecutor;
  }

  async listByPublishedPort(port: number): Promise<string[]> {
    const { stdout } = await this.exec(
      ['ps', '--filter', `publish=${port}`, '--format', '{{.ID}}'],
      `list containers publishing port ${port}`,
      { port },
    );
    return parseIdList(stdout);
  }

  async listByStatus(status: ContainerStatus): Promise<string[]> {
    const { stdout } = await this.exec(
      ['ps', '-a', '--filter', `status=${status}`, '--format', '{{.ID}}'],
      `list ${status} containers`,
    );
    return parseIdList(stdout);
  }

  async stop(containerId: string): Promise<void> {
    await this.exec(['stop', containerId], `stop ${containerId}`, { containerId });
  }

  async start(containerId: string): Promise<void> {
    await this.exec(['start', containerId], `start ${containerId}`, { containerId });
  }

  async logs(containerId: string): Promise<string> {
    const { stdout, stderr } = await this.exec(['logs', containerId], `read logs of ${containerId}`, { containerId });
    return stdout + stderr;
  }

  private async exec(args: string[], action: string, meta: ErrorMeta = {}): Promise<CommandOutput> {
    try {
      return await this.executor(this.dockerPath, args);
    } catch (error) {
      throw HarnessError.runtimeFailure(action, error, meta);
    }
  }
}

/**
 * One container ID per non-empty line
 */
export function parseIdList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
