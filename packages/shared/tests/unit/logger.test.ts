/**
 * Tests for the structured logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Logger,
  createServiceLogger,
  formatPretty,
  generateRunId,
  isLogLevel,
  type LogEntry,
} from '../../src/logging/logger.js';

function capture(level: LogEntry['level'] = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('drops entries below the configured level', () => {
    const { logger, entries } = capture('warn');

    logger.info('quiet');
    logger.warn('loud');

    expect(entries.map((e) => e.message)).toEqual(['loud']);
  });

  it('merges child metadata and drops undefined values', () => {
    const { logger, entries } = capture();

    logger.child({ component: 'health-monitor' }).withRunId('run-1').forNode(2).info('probe', { phase: 'await-healthy', extra: undefined });

    expect(entries[0]?.meta).toEqual({
      component: 'health-monitor',
      runId: 'run-1',
      nodeIndex: 2,
      phase: 'await-healthy',
    });
  });

  it('records error details including the code', () => {
    const { logger, entries } = capture();
    const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });

    logger.error('probe failed', error, { nodeIndex: 0 });

    expect(entries[0]?.error).toMatchObject({ name: 'Error', message: 'refused', code: 'ECONNREFUSED' });
    expect(entries[0]?.meta).toEqual({ nodeIndex: 0 });
  });

  it('accepts metadata in place of an error', () => {
    const { logger, entries } = capture();

    logger.fatal('gave up', { nodeIndex: 1 });

    expect(entries[0]?.level).toBe('fatal');
    expect(entries[0]?.error).toBeUndefined();
    expect(entries[0]?.meta).toEqual({ nodeIndex: 1 });
  });

  it('is silent in tests unless LOG_LEVEL is set', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.stubEnv('LOG_LEVEL', '');

    createServiceLogger({}, { component: 'test' }).error('hidden');

    expect(write).not.toHaveBeenCalled();
    write.mockRestore();
  });

  it('honours an explicit output even when LOG_LEVEL is set', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const entries: LogEntry[] = [];

    createServiceLogger({ output: (entry) => entries.push(entry) }).debug('shown');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.meta?.service).toBe('replica-drill');
  });
});

describe('formatPretty', () => {
  it('includes component, phase and node', () => {
    const line = formatPretty({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'info',
      message: 'stopping node',
      meta: { component: 'chaos-orchestrator', phase: 'stop-node', nodeIndex: 0 },
    });

    expect(line).toBe(
      '2024-01-01T00:00:00.000Z \x1b[36mINFO \x1b[0m stopping node' +
      ' \x1b[36m(chaos-orchestrator)\x1b[0m \x1b[36m[stop-node]\x1b[0m \x1b[36mnode=0\x1b[0m',
    );
  });
});

describe('helpers', () => {
  it('recognises log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('generates distinct run ids', () => {
    expect(generateRunId()).not.toBe(generateRunId());
  });
});
