/**
 * Error classes for replica-drill
 * @module @replica-drill/shared/errors
 */

// Base error
export {
  DrillError,
  ErrorCode,
  exitCodeFor,
  isDrillError,
  wrapError,
} from './base-error';

export type { ErrorMeta } from './base-error';

// Harness and verification errors
export {
  HarnessError,
  VerificationFailure,
  isHarnessError,
  isVerificationFailure,
  lastOutputLine,
} from './harness-error';

// Validation errors
export {
  ValidationError,
  isValidationError,
  rangeDetail,
  validResult,
  invalidResult,
} from './validation-error';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error';
