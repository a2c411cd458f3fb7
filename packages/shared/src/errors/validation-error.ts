/**
 * Validation error class
 * @module @replica-drill/shared/errors/validation-error
 */

import { DrillError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for configuration problems
 */
export class ValidationError extends DrillError {
  readonly kind = 'invalid_config';
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create for an invalid format
   */
  static invalidFormat(
    field: string,
    expected: string,
    received?: unknown,
  ): ValidationError {
    return new ValidationError(`Invalid format for field: ${field}`, [
      { field, message: `Expected ${expected}`, rule: 'format', expected, received },
    ], { field }, ErrorCode.INVALID_FORMAT);
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[]): ValidationError {
    const only = errors[0];
    if (errors.length === 1 && only) {
      return new ValidationError(`${only.field}: ${only.message}`, errors, { field: only.field });
    }
    const fieldNames = errors.map(e => e.field).join(', ');
    return new ValidationError(
      `Validation failed for fields: ${fieldNames}`,
      errors,
    );
  }

  /**
   * Create for a constraint violation
   */
  static constraint(
    message: string,
    field?: string,
  ): ValidationError {
    const details: ValidationErrorDetail[] = field
      ? [{ field, message, rule: 'constraint' }]
      : [];
    return new ValidationError(message, details, { field }, ErrorCode.CONSTRAINT_VIOLATION);
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        runId: this.runId,
      },
    };
  }
}

/**
 * Build the detail for an out of range value
 */
export function rangeDetail(field: string, min?: number, max?: number, received?: unknown): ValidationErrorDetail {
  let expected = '';

  if (min !== undefined && max !== undefined) {
    expected = `between ${min} and ${max}`;
  } else if (min !== undefined) {
    expected = `at least ${min}`;
  } else if (max !== undefined) {
    expected = `at most ${max}`;
  }

  return { field, message: `Expected value ${expected}`, rule: 'range', expected, received };
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(error: ValidationError): ValidationResult<T> {
  return { valid: false, error };
}
