/**
 * Operation tester adapter
 * Runs the operation-test binary against a node's REST API
 * @module @replica-drill/core/services/operation-tester
 */

import type { Credentials, Logger, OperationSummary } from '@replica-drill/shared';
import { createServiceLogger } from '@replica-drill/shared';
import type { ProcessRunner } from '../adapters/process-runner';
import { ChildProcessRunner } from '../adapters/process-runner';
import { parseOperationSummary } from './result-verifier';
import { redactArgs, runToCompletion } from './workload-driver';

const defaultLogger = createServiceLogger({
  level: 'debug',
}, { component: 'operation-tester' });

export interface OperationTestRequest {
  count: number;
  start: number;
  end: number;
  host: string;
  restPort: number;
  credentials?: Credentials;
}

export function buildTesterArgs(request: OperationTestRequest): string[] {
  const args = [
    '-c', String(request.count),
    '-s', String(request.start),
    '-e', String(request.end),
    '-a', `http://${request.host}:${request.restPort}`,
  ];
  if (request.credentials) {
    args.push('--user', request.credentials.user, '--password', request.credentials.password);
  }
  return args;
}

export interface OperationTesterOptions {
  testerPath: string;
  runner?: ProcessRunner;
  logger?: Logger;
}

export class OperationTester {
  private readonly testerPath: string;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: OperationTesterOptions) {
    this.testerPath = options.testerPath;
    this.runner = options.runner ?? new ChildProcessRunner();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Run the tester and parse its final summary
   */
  async run(request: OperationTestRequest): Promise<OperationSummary> {
    const args = buildTesterArgs(request);
    this.logger.info(`Running ${this.testerPath} ${redactArgs(args).join(' ')}`);

    const output = await runToCompletion(this.runner, this.testerPath, args);
    this.logger.debug('Tester output', { output });
    return parseOperationSummary(output);
  }
}
