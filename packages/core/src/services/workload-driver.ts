/**
 * Workload driver adapter
 * Builds argument lists for the load generator and runs it
 * @module @replica-drill/core/services/workload-driver
 */

import type { ExistResult, Logger, TransferResult, Workload, WorkloadResult } from '@replica-drill/shared';
import { createServiceLogger, HarnessError } from '@replica-drill/shared';
import type { ProcessResult, ProcessRunner } from '../adapters/process-runner';
import { ChildProcessRunner } from '../adapters/process-runner';
import { parseExistOutput, parseTransferOutput } from './result-verifier';

const defaultLogger = createServiceLogger({
  level: 'debug',
}, { component: 'workload-driver' });

/**
 * Driver arguments, in the order the driver expects them. Optional values
 * are left out together with their flag.
 */
export function buildDriverArgs(workload: Workload): string[] {
  const indexFlag = workload.operation === 'exist' || (workload.indexFlag ?? 'first') === 'first'
    ? '-f'
    : '-s';

  const args = [
    '-b', workload.operation,
    '-c', String(workload.count),
    '-l', String(workload.payload),
    '-h', workload.host,
    indexFlag, String(workload.first),
  ];

  if (workload.threads !== undefined) {
    args.push('-t', String(workload.threads));
  }
  if (workload.mode !== undefined) {
    args.push('--mode', workload.mode);
  }

  args.push('-k', String(workload.keySize), '-p', String(workload.port));

  if (workload.credentials) {
    args.push('--user', workload.credentials.user, '--password', workload.credentials.password);
  }

  return args;
}

/**
 * Run an executable to completion and return its output. A spawn failure or
 * a non-zero exit is fatal.
 */
export async function runToCompletion(
  runner: ProcessRunner,
  command: string,
  args: readonly string[],
): Promise<string> {
  let result: ProcessResult;
  try {
    result = await runner.run(command, args);
  } catch (error) {
    throw HarnessError.spawnFailed(command, error);
  }

  if (result.exitCode !== 0) {
    throw HarnessError.subprocessFailed(command, result.exitCode, result.output);
  }
  return result.output;
}

/**
 * Copy of the arguments safe to log
 */
export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg, i) => (args[i - 1] === '--password' ? '***' : arg));
}

/**
 * Workload without its operation, as the typed helpers take it
 */
export type WorkloadSpec = Omit<Workload, 'operation'>;

export interface WorkloadDriverOptions {
  driverPath: string;
  runner?: ProcessRunner;
  logger?: Logger;
}

export class WorkloadDriver {
  private readonly driverPath: string;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: WorkloadDriverOptions) {
    this.driverPath = options.driverPath;
    this.runner = options.runner ?? new ChildProcessRunner();
    this.logger = options.logger ?? defaultLogger;
  }

  async put(spec: WorkloadSpec): Promise<TransferResult> {
    const workload: Workload = { ...spec, operation: 'put' };
    return parseTransferOutput(workload, await this.execute(workload));
  }

  async get(spec: WorkloadSpec): Promise<TransferResult> {
    const workload: Workload = { ...spec, operation: 'get' };
    return parseTransferOutput(workload, await this.execute(workload));
  }

  async exist(spec: WorkloadSpec): Promise<ExistResult> {
    const workload: Workload = { ...spec, operation: 'exist' };
    return parseExistOutput(workload, await this.execute(workload));
  }

  /**
   * Run the driver once and parse its output
   */
  async run(workload: Workload): Promise<WorkloadResult> {
    const output = await this.execute(workload);
    return workload.operation === 'exist'
      ? parseExistOutput(workload, output)
      : parseTransferOutput(workload, output);
  }

  private async execute(workload: Workload): Promise<string> {
    const args = buildDriverArgs(workload);
    this.logger.info(`Running ${this.driverPath} ${redactArgs(args).join(' ')}`, { port: workload.port });

    const output = await runToCompletion(this.runner, this.driverPath, args);
    this.logger.debug('Driver output', { operation: workload.operation, output });
    return output;
  }
}
