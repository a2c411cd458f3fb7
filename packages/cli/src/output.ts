/**
 * CLI Output Utilities
 *
 * Structured output for JSON and human-readable formats.
 * @module @replica-drill/cli/output
 */

import chalk from 'chalk';
import type { RunReport } from '@replica-drill/shared';
import { formatDiagnostic } from '@replica-drill/core';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table'];

/**
 * Global output format setting
 */
let globalOutputFormat: OutputFormat = 'table';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message on stderr
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

/**
 * Outputs a warning message
 */
export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

/**
 * Outputs an info message
 */
export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

export interface Column<T> {
  key: keyof T & string;
  header: string;
  width?: number;
}

/**
 * Formats a table from an array of objects
 */
export function table<T extends Record<string, unknown>>(data: T[], columns: Column<T>[]): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (data.length === 0) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  const widths = columns.map((col) => col.width ?? Math.max(
    col.header.length,
    ...data.map((row) => String(row[col.key] ?? '').length),
    4,
  ));
  const pad = (text: string, i: number) => text.padEnd(widths[i] ?? 0);

  console.log(chalk.bold(columns.map((col, i) => pad(col.header, i)).join('  ')));
  console.log(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of data) {
    console.log(columns.map((col, i) => pad(String(row[col.key] ?? ''), i)).join('  '));
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
  }
}

/**
 * Formats a single value for display
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return chalk.yellow(value.toISOString());
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a run phase or node status badge
 */
export function statusBadge(status: string): string {
  if (['done', 'healthy', 'ready'].includes(status)) {
    return chalk.green('●') + ' ' + chalk.green(status);
  }
  if (['polling', 'settle', 'await-healthy', 'restart-all'].includes(status)) {
    return chalk.yellow('◐') + ' ' + chalk.yellow(status);
  }
  if (['failed', 'down'].includes(status)) {
    return chalk.red('●') + ' ' + chalk.red(status);
  }
  return chalk.blue('●') + ' ' + status;
}

/**
 * Prints a finished run. Failures also get the one-line diagnostic on
 * stderr, whatever the output format, after the subprocess output in
 * table mode.
 */
export function printRunReport(report: RunReport & { runId?: string }): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(report, null, 2));
  } else {
    keyValue({
      Scenario: report.scenario,
      Run: report.runId,
      Phase: statusBadge(report.phase),
      'Failed In': report.failedIn,
      Written: report.written,
      Duration: `${report.duration} ms`,
    });
    for (const event of report.events) {
      console.log(chalk.gray(`  ${event}`));
    }
  }

  if (report.success) {
    if (globalOutputFormat !== 'json') {
      success(formatDiagnostic(report));
    }
  } else {
    if (report.output && globalOutputFormat !== 'json') {
      console.error(chalk.gray(report.output.trimEnd()));
    }
    console.error(formatDiagnostic(report));
  }
}
