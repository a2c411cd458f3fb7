/**
 * Unit tests for CLI output helpers
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import type { RunReport } from '@replica-drill/shared';
import {
  formatValue,
  isOutputFormat,
  keyValue,
  printRunReport,
  setOutputFormat,
  statusBadge,
  success,
  table,
} from '../../src/output.js';

describe('output', () => {
  let log: MockInstance<typeof console.log>;
  let errorLog: MockInstance<typeof console.error>;

  const lines = (spy: MockInstance<typeof console.log>) => spy.mock.calls.map((call) => call[0]);

  beforeEach(() => {
    chalk.level = 0;
    setOutputFormat('table');
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setOutputFormat('table');
  });

  it('recognises output formats', () => {
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('plain')).toBe(false);
  });

  it('prints success in both formats', () => {
    success('done');
    setOutputFormat('json');
    success('done');

    expect(lines(log)).toEqual(['✓ done', '{"success":true,"message":"done"}']);
  });

  it('pads table columns', () => {
    table([{ name: 'a', description: 'first' }, { name: 'bb', description: 'x' }], [
      { key: 'name', header: 'Name' },
      { key: 'description', header: 'Description' },
    ]);

    expect(lines(log)).toEqual([
      'Name  Description',
      '────' + '──' + '─'.repeat(11),
      'a     first      ',
      'bb    x          ',
    ]);
  });

  it('prints key-value pairs with aligned keys', () => {
    keyValue({ Host: '127.0.0.1', Nodes: 4, Password: undefined });

    expect(lines(log)).toEqual(['Host      127.0.0.1', 'Nodes     4', 'Password  (none)']);
  });

  it('formats values and badges', () => {
    expect(formatValue(true)).toBe('true');
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
    expect(statusBadge('done')).toBe('● done');
    expect(statusBadge('polling')).toBe('◐ polling');
  });

  describe('printRunReport', () => {
    const failed: RunReport = {
      success: false,
      scenario: 'alien-recovery',
      phase: 'failed',
      failedIn: 'final-verify',
      duration: 12,
      events: ['Put 3 records to node 0'],
      written: 9,
      error: '8 of 9 keys, exist test failed, see output',
      errorKind: 'test_failure',
      observed: 8,
      expected: 9,
    };

    it('writes the diagnostic to stderr on failure', () => {
      printRunReport(failed);

      expect(errorLog).toHaveBeenCalledTimes(1);
      expect(errorLog).toHaveBeenCalledWith(
        'alien-recovery: failed in final-verify: 8 of 9 keys, exist test failed, see output (observed 8, expected 9)',
      );
      expect(lines(log)).toContain('  Put 3 records to node 0');
    });

    it('prints the subprocess output before a one-line diagnostic', () => {
      printRunReport({
        ...failed,
        error: './bobp exited with code 101: line three',
        errorKind: 'fatal',
        observed: undefined,
        expected: undefined,
        output: 'line one\nthread panicked\nline three\n',
      });

      expect(errorLog.mock.calls.map((call) => call[0])).toEqual([
        'line one\nthread panicked\nline three',
        'alien-recovery: failed in final-verify: ./bobp exited with code 101: line three',
      ]);
    });

    it('prints the report as JSON and keeps the diagnostic', () => {
      setOutputFormat('json');
      printRunReport(failed);

      expect(lines(log)).toEqual([JSON.stringify(failed, null, 2)]);
      expect(errorLog).toHaveBeenCalledTimes(1);
    });

    it('prints a success line', () => {
      printRunReport({ ...failed, success: true, phase: 'done', failedIn: undefined, error: undefined });

      expect(lines(log).at(-1)).toBe('✓ alien-recovery: done, 9 records verified');
      expect(errorLog).not.toHaveBeenCalled();
    });
  });
});
