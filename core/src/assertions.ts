/**
 * Assertion functions for valtype
 *
 * Each assertion runs the matching boolean check and throws a
 * ValidationError with a fixed message when it fails. Usage errors from the
 * check propagate unchanged. On success nothing is returned, and TypeScript
 * narrows the asserted value.
 *
 * @example
 * ```typescript
 * import { assertArray, assertCallable } from '@valtype/core/assertions';
 *
 * function schedule(jobs: unknown, onDone: unknown): void {
 *   assertArray(jobs, { allowEmpty: false });
 *   assertCallable(onDone);
 *   // jobs: unknown[], onDone: AnyFunction
 * }
 * ```
 */

import { ValidationError, describeType } from './errors.js';
import { isArray, isCallable, isInstance, isNumber, isRecord, isString } from './predicates.js';
import type {
  AnyFunction,
  ArrayOptions,
  CallableOptions,
  InstanceOptions,
  NumberLike,
  NumberOptions,
  RecordOptions,
  StringLike,
  StringOptions,
} from './types.js';

/**
 * Assert value is string-like (a string, number or bigint).
 *
 * @throws ValidationError `Not a string`
 * @throws UsageError if options are malformed
 */
export function assertString(value: unknown, options?: StringOptions): asserts value is StringLike {
  if (!isString(value, options)) {
    throw ValidationError.typeMismatch('string', describeType(value));
  }
}

/**
 * Assert value is an array.
 *
 * @throws ValidationError `Not an array`
 * @throws UsageError if options are malformed
 */
export function assertArray(value: unknown, options?: ArrayOptions): asserts value is unknown[] {
  if (!isArray(value, options)) {
    throw ValidationError.typeMismatch('array', describeType(value));
  }
}

/**
 * Assert value is a key-value record.
 *
 * @throws ValidationError `Not a record`
 * @throws UsageError if options are malformed
 */
export function assertRecord(value: unknown, options?: RecordOptions): asserts value is Record<string, unknown> {
  if (!isRecord(value, options)) {
    throw ValidationError.typeMismatch('record', describeType(value));
  }
}

/**
 * Assert value can be called as a function.
 *
 * @throws ValidationError `Not a callable`
 * @throws UsageError if any option is passed
 */
export function assertCallable(value: unknown, options?: CallableOptions): asserts value is AnyFunction {
  if (!isCallable(value, options)) {
    throw ValidationError.typeMismatch('callable', describeType(value));
  }
}

/**
 * Assert value is numeric.
 *
 * @throws ValidationError `Not a number`
 * @throws UsageError if options are malformed
 */
export function assertNumber(value: unknown, options?: NumberOptions): asserts value is NumberLike {
  if (!isNumber(value, options)) {
    throw ValidationError.typeMismatch('number', describeType(value));
  }
}

/**
 * Assert value is an instance of a class or one of its subclasses.
 *
 * @throws ValidationError `Not an instance`
 * @throws UsageError if `class` is missing or options are malformed
 */
export function assertInstance(value: unknown, options: InstanceOptions): asserts value is object {
  if (!isInstance(value, options)) {
    throw ValidationError.typeMismatch('instance', describeType(value));
  }
}
