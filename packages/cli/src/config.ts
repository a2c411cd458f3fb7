/**
 * CLI Configuration
 *
 * Collects drill settings from a JSON file, DRILL_* environment variables
 * and command-line flags, and resolves them into one frozen DrillConfig.
 * @module @replica-drill/cli/config
 */

import * as fs from 'node:fs';
import {
  ErrorCode,
  ValidationError,
  isRecord,
  resolveDrillConfig,
  type DrillConfig,
  type DrillConfigSource,
} from '@replica-drill/shared';

/**
 * Prefix of environment variables read as config
 */
export const ENV_PREFIX = 'DRILL_';

/**
 * Value type of a config field, used to parse text from env and flags
 */
export type ConfigFieldType = 'string' | 'integer' | 'number' | 'boolean';

export interface ConfigField {
  /** Dotted path into DrillConfig */
  key: string;
  type: ConfigFieldType;
  description: string;
}

/**
 * Every field that can be set from text
 */
export const CONFIG_FIELDS: readonly ConfigField[] = [
  { key: 'host', type: 'string', description: 'Host of every node' },
  { key: 'nodesAmount', type: 'integer', description: 'Nodes in the cluster' },
  { key: 'transportMinPort', type: 'integer', description: 'Transport port of node 0' },
  { key: 'restMinPort', type: 'integer', description: 'REST port of node 0' },
  { key: 'count', type: 'integer', description: 'Records to write' },
  { key: 'payload', type: 'integer', description: 'Payload size in bytes' },
  { key: 'first', type: 'integer', description: 'First key index' },
  { key: 'threads', type: 'integer', description: 'Driver threads' },
  { key: 'mode', type: 'string', description: 'Key generation mode (random, normal)' },
  { key: 'keySize', type: 'integer', description: 'Key size in bytes (8, 16)' },
  { key: 'user', type: 'string', description: 'Cluster user' },
  { key: 'password', type: 'string', description: 'Cluster password' },
  { key: 'driverPath', type: 'string', description: 'Workload driver executable' },
  { key: 'operationTesterPath', type: 'string', description: 'Operation tester executable' },
  { key: 'dockerPath', type: 'string', description: 'Container runtime CLI' },
  { key: 'settleDelayMs', type: 'integer', description: 'Pause after each write before stopping the node' },
  { key: 'clusterStartWaitMs', type: 'integer', description: 'Cluster start-up time' },
  { key: 'doubledExist', type: 'boolean', description: 'Also check exist over twice the written range' },
  { key: 'replicas', type: 'integer', description: 'Replicas per record' },
  { key: 'quorum', type: 'integer', description: 'Write quorum' },
  { key: 'health.retries', type: 'integer', description: 'Health probe retries per node' },
  { key: 'health.initialDelayMs', type: 'integer', description: 'Delay before the first retry' },
  { key: 'health.multiplier', type: 'number', description: 'Backoff factor' },
  { key: 'health.maxDelayMs', type: 'integer', description: 'Ceiling of a single delay' },
  { key: 'health.timeoutMs', type: 'integer', description: 'Timeout of a metrics request' },
  { key: 'operationTest.count', type: 'integer', description: 'Operations the tester runs' },
  { key: 'operationTest.start', type: 'integer', description: 'Lowest tester key' },
  { key: 'operationTest.end', type: 'integer', description: 'Highest tester key' },
];

/**
 * Where config comes from, lowest priority first after the defaults
 */
export interface ConfigInputs {
  /** JSON config file */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Parsed command-line options, keyed by field name */
  flags?: Record<string, unknown>;
  /** key=value assignments */
  assignments?: readonly string[];
}

/**
 * Environment variable name of a field: health.initialDelayMs becomes
 * DRILL_HEALTH_INITIAL_DELAY_MS
 */
export function envName(key: string): string {
  return ENV_PREFIX + key
    .replace(/\./g, '_')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toUpperCase();
}

export function findField(key: string): ConfigField | undefined {
  return CONFIG_FIELDS.find((field) => field.key === key);
}

/**
 * Parse text for a field. Text that does not fit the type is passed
 * through so validation reports it.
 */
export function parseFieldValue(field: ConfigField, raw: string): unknown {
  switch (field.type) {
    case 'integer':
    case 'number': {
      const value = Number(raw);
      return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
    }
    case 'boolean':
      if (raw === 'true' || raw === '1') return true;
      if (raw === 'false' || raw === '0') return false;
      return raw;
    default:
      return raw;
  }
}

/**
 * Set a dotted path, creating nested sections on the way
 */
function setPath(source: DrillConfigSource, key: string, value: unknown): void {
  const [head, ...rest] = key.split('.');
  if (head === undefined) return;

  if (rest.length === 0) {
    source[head] = value;
    return;
  }

  const current = source[head];
  const section: DrillConfigSource = isRecord(current) ? current : {};
  source[head] = section;
  setPath(section, rest.join('.'), value);
}

/**
 * Read a JSON config file
 */
export function readConfigFile(filePath: string): DrillConfigSource {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(
      `Cannot read config file ${filePath}: ${message}`,
      [{ field: 'config', message: 'Unreadable file', rule: 'file', received: filePath }],
      { field: 'config' },
      ErrorCode.INVALID_INPUT,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(
      `Config file ${filePath} is not valid JSON: ${message}`,
      [{ field: 'config', message: 'Expected JSON', rule: 'format', expected: 'JSON' }],
      { field: 'config' },
      ErrorCode.INVALID_FORMAT,
    );
  }

  if (!isRecord(parsed)) {
    throw ValidationError.invalidFormat('config', 'a JSON object', parsed);
  }
  return parsed;
}

/**
 * Config from DRILL_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DrillConfigSource {
  const source: DrillConfigSource = {};
  for (const field of CONFIG_FIELDS) {
    const raw = env[envName(field.key)];
    if (raw !== undefined && raw !== '') {
      setPath(source, field.key, parseFieldValue(field, raw));
    }
  }
  return source;
}

/**
 * Config from parsed command-line options. Only top-level fields have
 * their own flag; nested ones go through assignments.
 */
export function configFromFlags(flags: Record<string, unknown>): DrillConfigSource {
  const source: DrillConfigSource = {};
  for (const field of CONFIG_FIELDS) {
    const value = flags[field.key];
    if (typeof value === 'string') {
      source[field.key] = parseFieldValue(field, value);
    } else if (typeof value === 'boolean') {
      source[field.key] = value;
    }
  }
  return source;
}

/**
 * Config from key=value assignments, such as `--set health.retries=3`
 */
export function configFromAssignments(assignments: readonly string[]): DrillConfigSource {
  const source: DrillConfigSource = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw ValidationError.invalidFormat('set', 'key=value', assignment);
    }

    const key = assignment.slice(0, separator);
    const field = findField(key);
    if (!field) {
      throw new ValidationError(
        `Unknown config key: ${key}`,
        [{ field: key, message: 'Unknown config key', rule: 'choice' }],
        { field: key },
        ErrorCode.INVALID_INPUT,
      );
    }
    setPath(source, field.key, parseFieldValue(field, assignment.slice(separator + 1)));
  }
  return source;
}

/**
 * Resolve the run configuration from every source
 */
export function loadDrillConfig(inputs: ConfigInputs = {}): DrillConfig {
  return resolveDrillConfig(
    inputs.configPath ? readConfigFile(inputs.configPath) : {},
    configFromEnv(inputs.env ?? process.env),
    configFromFlags(inputs.flags ?? {}),
    configFromAssignments(inputs.assignments ?? []),
  );
}

/**
 * Config for display, with the password masked
 */
export function redactConfig(config: DrillConfig): Record<string, unknown> {
  return config.password === undefined ? { ...config } : { ...config, password: '***' };
}
