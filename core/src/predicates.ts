/**
 * Boolean type checks for valtype
 *
 * One predicate per category. Each validates its options first, so a
 * malformed options bag throws a UsageError whatever the value; then it
 * returns true or false for the value.
 *
 * @example
 * ```typescript
 * import { isString, isArray, isNumber } from '@valtype/core/predicates';
 *
 * isString(0);                              // true, 0 has a text form
 * isString('', { allowEmpty: false });      // false
 * isArray(new TagList(), { noSubclass: true }); // false
 * isNumber('42', { strictlyPositive: true });   // true
 * ```
 */

import { isNumericText, numericSign, toNumericText } from './numeric.js';
import { validateOptions } from './options.js';
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
 * Check if value is string-like: a string, a number or a bigint.
 *
 * `0` and `''` are valid strings; a value is never rejected for being falsy.
 * Objects, including boxed strings, are not string-like.
 *
 * @param value - Value to check
 * @param options - `allowEmpty` (default true)
 * @throws UsageError if options are malformed
 */
export function isString(value: unknown, options?: StringOptions): value is StringLike {
  validateOptions('string', options);
  const allowEmpty = options?.allowEmpty ?? true;

  if (typeof value === 'string') {
    return allowEmpty || value !== '';
  }
  return typeof value === 'number' || typeof value === 'bigint';
}

/**
 * Check if value is an array.
 *
 * @param value - Value to check
 * @param options - `allowEmpty` (default true), `noSubclass` (default false)
 * @throws UsageError if options are malformed
 */
export function isArray(value: unknown, options?: ArrayOptions): value is unknown[] {
  validateOptions('array', options);
  const allowEmpty = options?.allowEmpty ?? true;
  const noSubclass = options?.noSubclass ?? false;

  if (!Array.isArray(value)) return false;
  if (!allowEmpty && value.length === 0) return false;
  if (noSubclass && Object.getPrototypeOf(value) !== Array.prototype) return false;

  return true;
}

/**
 * Check if value is a key-value record: any non-null object that is neither
 * an array nor a function. Class instances count, as subclasses of the
 * plain object. A Map's entries are counted by its `size`; any other
 * object's by its own enumerable keys.
 *
 * @param value - Value to check
 * @param options - `allowEmpty` (default true), `noSubclass` (default false)
 * @throws UsageError if options are malformed
 */
export function isRecord(value: unknown, options?: RecordOptions): value is Record<string, unknown> {
  validateOptions('record', options);
  const allowEmpty = options?.allowEmpty ?? true;
  const noSubclass = options?.noSubclass ?? false;

  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (!allowEmpty && entryCount(value) === 0) return false;
  if (noSubclass) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return false;
  }

  return true;
}

function entryCount(value: object): number {
  return value instanceof Map ? value.size : Object.keys(value).length;
}

const CLASS_SOURCE = /^class[\s{]/;

/**
 * Check if value can be called as a function. Constructors written with
 * `class` syntax, which throw unless invoked with `new`, are rejected.
 * Native constructors (`Map`, `Promise`) and bound classes show no `class`
 * source and are accepted.
 *
 * @param value - Value to check
 * @param options - None are recognized
 * @throws UsageError if any option is passed
 */
export function isCallable(value: unknown, options?: CallableOptions): value is AnyFunction {
  validateOptions('callable', options);

  if (typeof value !== 'function') return false;
  return !CLASS_SOURCE.test(Function.prototype.toString.call(value));
}

/**
 * Check if value is numeric: a number other than NaN, a bigint, or a string
 * whose content is a number (`'42'`, `' -3.5 '`, `'1e3'`, `'Infinity'`).
 *
 * @param value - Value to check
 * @param options - `positive` (default false), `strictlyPositive` (default false)
 * @throws UsageError if options are malformed
 */
export function isNumber(value: unknown, options?: NumberOptions): value is NumberLike {
  validateOptions('number', options);
  const positive = options?.positive ?? false;
  const strictlyPositive = options?.strictlyPositive ?? false;

  const text = toNumericText(value);
  if (text === undefined || !isNumericText(text)) return false;

  const sign = numericSign(text);
  if (positive && sign < 0) return false;
  if (strictlyPositive && sign <= 0) return false;

  return true;
}

/**
 * Check if value is an instance of a class or of any subclass of it.
 *
 * With a constructor this is `instanceof`. With a class name, the prototype
 * chain is walked and any prototype whose own `constructor` has that name
 * matches.
 *
 * @param value - Value to check
 * @param options - `class` (required)
 * @throws UsageError if `class` is missing or options are malformed
 */
export function isInstance(value: unknown, options: InstanceOptions): value is object {
  validateOptions('instance', options);

  if ((typeof value !== 'object' || value === null) && typeof value !== 'function') {
    return false;
  }

  const target = options.class;
  if (typeof target === 'function') {
    return value instanceof target;
  }

  for (let proto: unknown = Object.getPrototypeOf(value); isObjectLike(proto); proto = Object.getPrototypeOf(proto)) {
    if (ownConstructorName(proto) === target) return true;
  }
  return false;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function ownConstructorName(proto: object): string | undefined {
  const ctor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
  return typeof ctor === 'function' ? ctor.name : undefined;
}
