/**
 * @valtype/core/assertions - Assertion functions
 *
 * Failures throw ValidationError; malformed options throw UsageError.
 *
 * @module assertions
 */

export {
  assertString,
  assertArray,
  assertRecord,
  assertCallable,
  assertNumber,
  assertInstance,
} from '../assertions.js';
export { assertions, type Assertions } from '../groups.js';
export { ValidationError, UsageError } from '../errors.js';
