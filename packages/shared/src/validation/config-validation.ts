/**
 * Drill configuration validation
 * @module @replica-drill/shared/validation/config-validation
 */

import type { DrillConfig, HealthPolicyConfig, OperationTestConfig } from '../types/config';
import { DEFAULT_DRILL_CONFIG } from '../types/config';
import { KEY_GENERATION_MODES, KEY_SIZES, type KeyGenerationMode, type KeySize } from '../types/workload';
import {
  ValidationError,
  rangeDetail,
  validResult,
  invalidResult,
  type ValidationErrorDetail,
  type ValidationResult,
} from '../errors/validation-error';

const MAX_PORT = 65_535;

/**
 * Raw, unvalidated configuration as read from a file, the environment or flags
 */
export type DrillConfigSource = Record<string, unknown>;

/**
 * Narrow a value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads typed fields out of a raw source, falling back to defaults and
 * collecting a detail for every invalid field.
 */
class FieldReader {
  constructor(
    private readonly source: DrillConfigSource,
    readonly details: ValidationErrorDetail[] = [],
    private readonly prefix = '',
  ) {}

  private path(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }

  integer(key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const value = this.source[key] ?? fallback;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      this.details.push({ field: this.path(key), message: 'Expected an integer', rule: 'format', expected: 'integer', received: value });
      return fallback;
    }
    if (value < min || value > max) {
      this.details.push(rangeDetail(this.path(key), min, max === Number.MAX_SAFE_INTEGER ? undefined : max, value));
      return fallback;
    }
    return value;
  }

  number(key: string, fallback: number, min: number): number {
    const value = this.source[key] ?? fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.details.push({ field: this.path(key), message: 'Expected a number', rule: 'format', expected: 'number', received: value });
      return fallback;
    }
    if (value < min) {
      this.details.push(rangeDetail(this.path(key), min, undefined, value));
      return fallback;
    }
    return value;
  }

  string(key: string, fallback: string): string {
    const value = this.source[key] ?? fallback;
    if (typeof value !== 'string' || value.length === 0) {
      this.details.push({ field: this.path(key), message: 'Expected a non-empty string', rule: 'format', expected: 'string', received: value });
      return fallback;
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    const value = this.source[key];
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string') {
      this.details.push({ field: this.path(key), message: 'Expected a string', rule: 'format', expected: 'string', received: value });
      return undefined;
    }
    return value;
  }

  optionalInteger(key: string, min: number): number | undefined {
    if (this.source[key] === undefined || this.source[key] === null) {
      return undefined;
    }
    return this.integer(key, min, min);
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.source[key] ?? fallback;
    if (typeof value !== 'boolean') {
      this.details.push({ field: this.path(key), message: 'Expected a boolean', rule: 'format', expected: 'boolean', received: value });
      return fallback;
    }
    return value;
  }

  choice<T extends string | number>(key: string, fallback: T, choices: readonly T[]): T {
    const value = this.source[key] ?? fallback;
    const match = choices.find((candidate) => candidate === value);
    if (match === undefined) {
      this.details.push({
        field: this.path(key),
        message: `Expected one of: ${choices.join(', ')}`,
        rule: 'choice',
        expected: choices.join('|'),
        received: value,
      });
      return fallback;
    }
    return match;
  }

  nested(key: string): FieldReader {
    const value = this.source[key];
    if (value !== undefined && !isRecord(value)) {
      this.details.push({ field: this.path(key), message: 'Expected an object', rule: 'format', expected: 'object', received: value });
    }
    return new FieldReader(isRecord(value) ? value : {}, this.details, this.path(key));
  }
}

/**
 * Merge config sources, later sources winning. Nested sections merge by key;
 * undefined values never override.
 */
export function mergeConfigSources(...sources: DrillConfigSource[]): DrillConfigSource {
  const merged: DrillConfigSource = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) {
        continue;
      }
      const current = merged[key];
      merged[key] = isRecord(current) && isRecord(value)
        ? mergeConfigSources(current, value)
        : value;
    }
  }
  return merged;
}

/**
 * Validate the health policy section
 */
function readHealthPolicy(reader: FieldReader): HealthPolicyConfig {
  const defaults = DEFAULT_DRILL_CONFIG.health;
  return {
    retries: reader.integer('retries', defaults.retries, 0),
    initialDelayMs: reader.integer('initialDelayMs', defaults.initialDelayMs, 0),
    multiplier: reader.number('multiplier', defaults.multiplier, 1),
    maxDelayMs: reader.integer('maxDelayMs', defaults.maxDelayMs, 0),
    timeoutMs: reader.integer('timeoutMs', defaults.timeoutMs, 1),
  };
}

/**
 * Validate the operation tester section
 */
function readOperationTest(reader: FieldReader): OperationTestConfig {
  const defaults = DEFAULT_DRILL_CONFIG.operationTest;
  return {
    count: reader.integer('count', defaults.count, 1),
    start: reader.integer('start', defaults.start, 0),
    end: reader.integer('end', defaults.end, 0),
  };
}

/**
 * Cross-field rules that single-field readers cannot express
 */
function checkConstraints(config: DrillConfig, details: ValidationErrorDetail[]): void {
  const lastTransport = config.transportMinPort + config.nodesAmount - 1;
  const lastRest = config.restMinPort + config.nodesAmount - 1;

  if (lastTransport > MAX_PORT) {
    details.push({
      field: 'transportMinPort',
      message: `Transport ports run up to ${lastTransport}, above ${MAX_PORT}`,
      rule: 'constraint',
    });
  }
  if (lastRest > MAX_PORT) {
    details.push({
      field: 'restMinPort',
      message: `REST ports run up to ${lastRest}, above ${MAX_PORT}`,
      rule: 'constraint',
    });
  }
  if (config.transportMinPort <= lastRest && config.restMinPort <= lastTransport) {
    details.push({
      field: 'restMinPort',
      message: 'Transport and REST port ranges overlap',
      rule: 'constraint',
    });
  }
  if ((config.user === undefined) !== (config.password === undefined)) {
    details.push({
      field: config.user === undefined ? 'user' : 'password',
      message: 'user and password must be given together',
      rule: 'constraint',
    });
  }
  if (config.health.maxDelayMs < config.health.initialDelayMs) {
    details.push({
      field: 'health.maxDelayMs',
      message: 'Backoff ceiling is below the initial delay',
      rule: 'constraint',
    });
  }
  if (config.operationTest.end < config.operationTest.start) {
    details.push({
      field: 'operationTest.end',
      message: 'Operation test range ends before it starts',
      rule: 'constraint',
    });
  }
}

/**
 * Validate a raw config source and build the run configuration
 */
export function validateDrillConfig(source: DrillConfigSource): ValidationResult<DrillConfig> {
  const reader = new FieldReader(source);
  const defaults = DEFAULT_DRILL_CONFIG;

  const config: DrillConfig = {
    host: reader.string('host', defaults.host),
    nodesAmount: reader.integer('nodesAmount', defaults.nodesAmount, 1),
    transportMinPort: reader.integer('transportMinPort', defaults.transportMinPort, 1, MAX_PORT),
    restMinPort: reader.integer('restMinPort', defaults.restMinPort, 1, MAX_PORT),
    count: reader.integer('count', defaults.count, 1),
    payload: reader.integer('payload', defaults.payload, 1),
    first: reader.integer('first', defaults.first, 0),
    threads: reader.integer('threads', defaults.threads, 1),
    mode: reader.choice<KeyGenerationMode>('mode', defaults.mode, KEY_GENERATION_MODES),
    keySize: reader.choice<KeySize>('keySize', defaults.keySize, KEY_SIZES),
    user: reader.optionalString('user'),
    password: reader.optionalString('password'),
    driverPath: reader.string('driverPath', defaults.driverPath),
    operationTesterPath: reader.string('operationTesterPath', defaults.operationTesterPath),
    dockerPath: reader.string('dockerPath', defaults.dockerPath),
    settleDelayMs: reader.integer('settleDelayMs', defaults.settleDelayMs, 0),
    clusterStartWaitMs: reader.integer('clusterStartWaitMs', defaults.clusterStartWaitMs, 0),
    doubledExist: reader.boolean('doubledExist', defaults.doubledExist),
    replicas: reader.optionalInteger('replicas', 1),
    quorum: reader.optionalInteger('quorum', 1),
    health: readHealthPolicy(reader.nested('health')),
    operationTest: readOperationTest(reader.nested('operationTest')),
  };

  if (reader.details.length === 0) {
    checkConstraints(config, reader.details);
  }

  if (reader.details.length > 0) {
    return invalidResult(ValidationError.multiple(reader.details));
  }

  return validResult(freezeConfig(config));
}

/**
 * Validate and return the frozen configuration, throwing on invalid input
 */
export function resolveDrillConfig(...sources: DrillConfigSource[]): DrillConfig {
  const result = validateDrillConfig(mergeConfigSources(...sources));
  if (!result.valid) {
    throw result.error;
  }
  return result.value;
}

function freezeConfig(config: DrillConfig): DrillConfig {
  return Object.freeze({
    ...config,
    health: Object.freeze({ ...config.health }),
    operationTest: Object.freeze({ ...config.operationTest }),
  });
}
