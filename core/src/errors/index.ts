/**
 * @valtype/core/errors - Error classes
 *
 * All valtype errors extend ValtypeError:
 * - UsageError: the options bag passed to a check is malformed
 * - ValidationError: an assertion rejected its value
 * - ConfigurationError: a configuration object failed validation
 *
 * Use error codes for programmatic error handling:
 * @example
 * ```typescript
 * import { ErrorCode, isUsageError } from '@valtype/core/errors';
 *
 * try {
 *   assertNumber(input, options);
 * } catch (error) {
 *   if (isUsageError(error) && error.code === ErrorCode.UNRECOGNIZED_OPTIONS) {
 *     console.error(error.toDetailedString());
 *   }
 *   throw error;
 * }
 * ```
 *
 * @module errors
 */

export {
  // Error codes
  ErrorCode,
  isErrorCode,

  // Base error
  ValtypeError,

  // Error types
  UsageError,
  ValidationError,
  ConfigurationError,

  // Utility functions
  isUsageError,
  isValidationError,
  describeType,
} from '../errors.js';

// Stack trace utilities
export { captureStackTrace } from '../stack-trace.js';
