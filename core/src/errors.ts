/**
 * Typed exception classes for valtype
 *
 * Error hierarchy:
 * - ValtypeError: Base error class for all valtype errors
 *   - UsageError: The call itself is malformed (unknown or invalid options)
 *   - ValidationError: The value under test does not match the category
 *   - ConfigurationError: A configuration object was rejected
 *
 * A usage error is a programming mistake and is raised by every calling
 * convention. A validation error is only raised by the assertion functions;
 * boolean tests return false and filters return undefined instead.
 *
 * @example
 * ```typescript
 * import { assertString, UsageError, ValidationError } from '@valtype/core';
 *
 * try {
 *   assertString(input, { allowEmpty: false });
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     logger.warn(error.message, { category: error.category });
 *   } else if (error instanceof UsageError) {
 *     throw error;
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';
import type { Category } from './types.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',

  // Usage errors
  USAGE_ERROR = 'USAGE_ERROR',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
  UNRECOGNIZED_OPTIONS = 'UNRECOGNIZED_OPTIONS',
  INVALID_OPTION_VALUE = 'INVALID_OPTION_VALUE',
  MISSING_REQUIRED_OPTION = 'MISSING_REQUIRED_OPTION',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 *
 * @param code - The string to check
 * @returns true if the code is a valid ErrorCode value
 */
export function isErrorCode(code: string): code is ErrorCode {
  const codes: readonly string[] = Object.values(ErrorCode);
  return codes.includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all valtype errors
 *
 * Catch every error raised by this library with a single `instanceof` check,
 * and branch on `code` for finer handling.
 */
export class ValtypeError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging. Never holds the value under test.
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  /**
   * Create a new ValtypeError
   *
   * @param message - Human-readable error message
   * @param code - Error code for programmatic identification (use ErrorCode enum)
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion for resolving the error
   */
  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'ValtypeError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, ValtypeError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Usage Errors
// =============================================================================

/**
 * Error thrown when a check is called with a malformed options bag
 *
 * Raised before the value is looked at, so the same call shape fails the
 * same way whatever value is passed.
 *
 * @example
 * ```typescript
 * throw UsageError.unrecognizedOptions('string', ['allow_empty']);
 * throw UsageError.missingOption('instance', 'class');
 * ```
 */
export class UsageError extends ValtypeError {
  /**
   * Category whose options were rejected
   */
  public readonly category: Category;

  /**
   * Option keys the category does not recognize (empty for other usage errors)
   */
  public readonly unrecognized: readonly string[];

  /**
   * Create a new UsageError
   *
   * @param message - Human-readable error message
   * @param category - Category whose options were rejected
   * @param code - Error code (default: ErrorCode.USAGE_ERROR)
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion
   * @param unrecognized - Unrecognized option keys
   */
  constructor(
    message: string,
    category: Category,
    code: string = ErrorCode.USAGE_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string,
    unrecognized: readonly string[] = []
  ) {
    super(message, code, { category, ...details }, suggestion);
    this.name = 'UsageError';
    this.category = category;
    this.unrecognized = unrecognized;
    captureStackTrace(this, UsageError);
  }

  /**
   * Create an error for an options argument that is not a plain object
   */
  static notAnObject(category: Category, actualType: string): UsageError {
    return new UsageError(
      `Options must be an object, got ${actualType}`,
      category,
      ErrorCode.INVALID_OPTIONS,
      { actualType },
      'Pass options as an object literal, or omit them'
    );
  }

  /**
   * Create an error listing every option key the category does not recognize
   */
  static unrecognizedOptions(
    category: Category,
    keys: readonly string[],
    recognized: readonly string[]
  ): UsageError {
    const sorted = [...keys].sort();
    return new UsageError(
      `Options not recognized: ${sorted.join(', ')}`,
      category,
      ErrorCode.UNRECOGNIZED_OPTIONS,
      { unrecognized: sorted, recognized: [...recognized] },
      recognized.length > 0
        ? `The ${category} check recognizes: ${recognized.join(', ')}`
        : `The ${category} check takes no options`,
      sorted
    );
  }

  /**
   * Create an error for an option whose value has the wrong type
   */
  static invalidOptionValue(
    category: Category,
    key: string,
    expected: string,
    actualType: string
  ): UsageError {
    return new UsageError(
      `Option "${key}" must be ${expected}, got ${actualType}`,
      category,
      ErrorCode.INVALID_OPTION_VALUE,
      { option: key, expected, actualType }
    );
  }

  /**
   * Create an error for a required option that was not supplied
   */
  static missingOption(category: Category, key: string): UsageError {
    return new UsageError(
      `Option "${key}" is required`,
      category,
      ErrorCode.MISSING_REQUIRED_OPTION,
      { option: key },
      `Provide "${key}" when calling the ${category} check`
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

const MISMATCH_MESSAGES: Readonly<Record<Category, string>> = {
  string: 'Not a string',
  array: 'Not an array',
  record: 'Not a record',
  callable: 'Not a callable',
  number: 'Not a number',
  instance: 'Not an instance',
};

/**
 * Error thrown by the assertion functions when the value does not match
 *
 * The message is fixed per category. Neither the message nor the details
 * carry the rejected value.
 *
 * @example
 * ```typescript
 * throw ValidationError.typeMismatch('number', typeof value);
 * ```
 */
export class ValidationError extends ValtypeError {
  /**
   * Category the value failed
   */
  public readonly category: Category;

  /**
   * Create a new ValidationError
   *
   * @param message - Human-readable error message
   * @param category - Category the value failed
   * @param code - Error code (default: ErrorCode.VALIDATION_ERROR)
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion
   */
  constructor(
    message: string,
    category: Category,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, { category, ...details }, suggestion);
    this.name = 'ValidationError';
    this.category = category;
    captureStackTrace(this, ValidationError);
  }

  /**
   * Create the fixed mismatch error for a category
   */
  static typeMismatch(category: Category, actualType: string): ValidationError {
    return new ValidationError(
      MISMATCH_MESSAGES[category],
      category,
      ErrorCode.TYPE_MISMATCH,
      { actualType }
    );
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when a configuration object fails validation
 */
export class ConfigurationError extends ValtypeError {
  /**
   * Create a new ConfigurationError
   *
   * @param message - Human-readable error message
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion
   */
  constructor(
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, ErrorCode.INVALID_CONFIG, details, suggestion);
    this.name = 'ConfigurationError';
    captureStackTrace(this, ConfigurationError);
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Check if an error is a UsageError
 */
export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Describe a value's runtime type without exposing the value itself.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
