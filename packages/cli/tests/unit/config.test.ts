/**
 * Unit tests for CLI config loading
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { resolveDrillConfig } from '@replica-drill/shared';
import {
  configFromAssignments,
  configFromEnv,
  configFromFlags,
  envName,
  loadDrillConfig,
  readConfigFile,
  redactConfig,
} from '../../src/config.js';

describe('envName', () => {
  it('derives DRILL_ variables from field paths', () => {
    expect(envName('nodesAmount')).toBe('DRILL_NODES_AMOUNT');
    expect(envName('health.initialDelayMs')).toBe('DRILL_HEALTH_INITIAL_DELAY_MS');
    expect(envName('host')).toBe('DRILL_HOST');
  });
});

describe('configFromEnv', () => {
  it('reads typed values and ignores other variables', () => {
    const source = configFromEnv({
      DRILL_NODES_AMOUNT: '3',
      DRILL_HEALTH_RETRIES: '2',
      DRILL_DOUBLED_EXIST: 'true',
      DRILL_USER: '1234',
      DRILL_HOST: '',
      PATH: '/usr/bin',
    });

    expect(source).toEqual({
      nodesAmount: 3,
      doubledExist: true,
      user: '1234',
      health: { retries: 2 },
    });
  });
});

describe('configFromFlags', () => {
  it('parses string flags and keeps booleans', () => {
    expect(configFromFlags({ count: '30', doubledExist: true, config: 'drill.json', mode: 'random' })).toEqual({
      count: 30,
      doubledExist: true,
      mode: 'random',
    });
  });
});

describe('configFromAssignments', () => {
  it('sets nested fields', () => {
    expect(configFromAssignments(['health.retries=3', 'operationTest.end=50', 'password=a=b'])).toEqual({
      health: { retries: 3 },
      operationTest: { end: 50 },
      password: 'a=b',
    });
  });

  it('rejects unknown keys and missing values', () => {
    expect(() => configFromAssignments(['nope=1'])).toThrow('Unknown config key: nope');
    expect(() => configFromAssignments(['retries'])).toThrow('Invalid format for field: set');
  });
});

describe('config files', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'drill-config-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('reads a JSON object', () => {
    const file = write('ok.json', '{"count": 10, "health": {"retries": 1}}');

    expect(readConfigFile(file)).toEqual({ count: 10, health: { retries: 1 } });
  });

  it('rejects unreadable, invalid and non-object files', () => {
    expect(() => readConfigFile(path.join(dir, 'missing.json'))).toThrow('Cannot read config file');
    expect(() => readConfigFile(write('bad.json', '{count'))).toThrow('is not valid JSON');
    expect(() => readConfigFile(write('list.json', '[1, 2]'))).toThrow('Invalid format for field: config');
  });

  it('layers file, environment, flags and assignments', () => {
    const configPath = write('layers.json', '{"count": 10, "nodesAmount": 2, "threads": 4}');

    const config = loadDrillConfig({
      configPath,
      env: { DRILL_COUNT: '20', DRILL_THREADS: '2' },
      flags: { count: '30' },
      assignments: ['payload=512'],
    });

    expect(config).toMatchObject({ count: 30, nodesAmount: 2, threads: 2, payload: 512 });
  });
});

describe('loadDrillConfig', () => {
  it('uses defaults without inputs from the environment', () => {
    expect(loadDrillConfig({ env: {} })).toEqual(resolveDrillConfig());
  });

  it('reports values that do not parse', () => {
    expect(() => loadDrillConfig({ env: { DRILL_COUNT: 'many' } })).toThrow('count: Expected an integer');
  });
});

describe('redactConfig', () => {
  it('masks the password', () => {
    const config = resolveDrillConfig({ user: 'admin', password: 'test-secret' });

    expect(redactConfig(config)).toMatchObject({ user: 'admin', password: '***' });
    expect(redactConfig(resolveDrillConfig()).password).toBeUndefined();
  });
});
