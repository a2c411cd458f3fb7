/**
 * Subprocess runner
 * Spawns an executable and captures stdout and stderr as one text stream
 * @module @replica-drill/core/adapters/process-runner
 */

import { spawn } from 'node:child_process';

export interface ProcessResult {
  /** Null when the process was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** stdout and stderr interleaved in arrival order */
  output: string;
}

export interface ProcessRunner {
  /**
   * Resolves when the process exits, whatever its exit code.
   * Rejects when it cannot be started.
   */
  run(command: string, args: readonly string[]): Promise<ProcessResult>;
}

export class ChildProcessRunner implements ProcessRunner {
  run(command: string, args: readonly string[]): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const chunks: string[] = [];
      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => chunks.push(chunk));
      child.stderr.on('data', (chunk: string) => chunks.push(chunk));

      child.once('error', reject);
      child.once('close', (exitCode, signal) => {
        resolve({ exitCode, signal, output: chunks.join('') });
      });
    });
  }
}
