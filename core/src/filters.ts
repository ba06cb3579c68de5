/**
 * Filtering functions for valtype
 *
 * Each filter returns the value it was given when the matching boolean check
 * accepts it, and `undefined` otherwise. A rejected value never throws; only
 * malformed options do.
 *
 * @example
 * ```typescript
 * import { filterNumber, filterString } from '@valtype/core/filters';
 *
 * const port = filterNumber(env.PORT, { strictlyPositive: true }) ?? 8080;
 * const name = filterString(input.name, { allowEmpty: false });
 * ```
 */

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
 * Return value if it is string-like, otherwise undefined.
 */
export function filterString(value: unknown, options?: StringOptions): StringLike | undefined {
  return isString(value, options) ? value : undefined;
}

/**
 * Return value if it is an array, otherwise undefined.
 */
export function filterArray(value: unknown, options?: ArrayOptions): unknown[] | undefined {
  return isArray(value, options) ? value : undefined;
}

/**
 * Return value if it is a key-value record, otherwise undefined.
 */
export function filterRecord(value: unknown, options?: RecordOptions): Record<string, unknown> | undefined {
  return isRecord(value, options) ? value : undefined;
}

/**
 * Return value if it can be called as a function, otherwise undefined.
 */
export function filterCallable(value: unknown, options?: CallableOptions): AnyFunction | undefined {
  return isCallable(value, options) ? value : undefined;
}

/**
 * Return value if it is numeric, otherwise undefined.
 */
export function filterNumber(value: unknown, options?: NumberOptions): NumberLike | undefined {
  return isNumber(value, options) ? value : undefined;
}

/**
 * Return value if it is an instance of the given class or a subclass,
 * otherwise undefined.
 */
export function filterInstance(value: unknown, options: InstanceOptions): object | undefined {
  return isInstance(value, options) ? value : undefined;
}
