/**
 * replica-drill - Shared Package
 * Types, validation, errors and logging
 * @module @replica-drill/shared
 */

// Types (includes helpers like buildTopology)
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Logging
export {
  Logger,
  createServiceLogger,
  formatPretty,
  generateRunId,
  isLogLevel,
  isTestEnvironment,
  logger,
  LOG_LEVELS,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';
