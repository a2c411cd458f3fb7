/**
 * Structured JSON logger with run IDs
 * @module @replica-drill/shared/logging/logger
 */

import type { RunPhase } from '../types/run';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Log entry metadata
 */
export interface LogMeta {
  /** Drill run the entry belongs to */
  runId?: string;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Orchestrator phase */
  phase?: RunPhase;
  /** Node the entry is about */
  nodeIndex?: number;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;
  service?: string;
  component?: string;
  /** Pretty print output (development) */
  pretty?: boolean;
  /** Custom output function */
  output?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
};

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Structured JSON logger
 */
export class Logger {
  private config: LoggerConfig;
  private meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.meta = {
      ...meta,
      service: config.service || meta.service,
      component: config.component || meta.component,
    };
  }

  private isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedMeta = dropUndefined({ ...this.meta, ...meta });
    if (Object.keys(mergedMeta).length > 0) {
      entry.meta = mergedMeta;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      const code = 'code' in error ? error.code : undefined;
      if (typeof code === 'string' || typeof code === 'number') {
        entry.error.code = code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
    } else {
      this.defaultOutput(entry);
    }
  }

  /**
   * Default output to stderr, so stdout stays free for command output
   */
  private defaultOutput(entry: LogEntry): void {
    const output = this.config.pretty ? formatPretty(entry) : JSON.stringify(entry);
    process.stderr.write(`${output}\n`);
  }

  /**
   * Create a child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  /**
   * Create a child logger bound to a run
   */
  withRunId(runId: string): Logger {
    return this.child({ runId });
  }

  /**
   * Create a child logger bound to a node
   */
  forNode(nodeIndex: number): Logger {
    return this.child({ nodeIndex });
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('fatal', message, meta, error);
    } else {
      this.log('fatal', message, error);
    }
  }
}

function dropUndefined(meta: LogMeta): LogMeta {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Format log entry for pretty printing
 */
export function formatPretty(entry: LogEntry): string {
  const levelColors: Record<LogLevel, string> = {
    debug: '\x1b[90m', // Gray
    info: '\x1b[36m',  // Cyan
    warn: '\x1b[33m',  // Yellow
    error: '\x1b[31m', // Red
    fatal: '\x1b[35m', // Magenta
  };
  const reset = '\x1b[0m';
  const color = levelColors[entry.level];
  const levelStr = entry.level.toUpperCase().padEnd(5);

  let output = `${entry.timestamp} ${color}${levelStr}${reset} ${entry.message}`;

  if (entry.meta?.component) {
    output += ` ${color}(${entry.meta.component})${reset}`;
  }

  if (entry.meta?.phase) {
    output += ` ${color}[${entry.meta.phase}]${reset}`;
  }

  if (entry.meta?.nodeIndex !== undefined) {
    output += ` ${color}node=${entry.meta.nodeIndex}${reset}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
  }

  return output;
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'test' ||
    process.env.VITEST === 'true'
  );
}

/**
 * Get the default log level based on environment
 */
function getDefaultLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function silentOutput(): void {
  // Tests run quiet unless LOG_LEVEL is set
}

/**
 * Create a logger instance with test environment detection
 * Suppresses output during tests unless LOG_LEVEL is explicitly set
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const testConfig: Partial<LoggerConfig> = {};

  if (isTestEnvironment() && !process.env.LOG_LEVEL) {
    testConfig.level = 'fatal';
    testConfig.output = silentOutput;
  }

  return new Logger({
    level: getDefaultLogLevel(),
    pretty: process.env.NODE_ENV !== 'production',
    service: 'replica-drill',
    ...config,
    ...testConfig,
  }, meta);
}

/**
 * Default logger instance
 */
export const logger = createServiceLogger();

/**
 * Generate a run ID
 */
export function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${random}`;
}
