/**
 * Export groups
 *
 * The checks bundled by calling convention, for callers that prefer a
 * namespace-style import:
 *
 * ```typescript
 * import { booleanTests, assertions, filters, all } from '@valtype/core';
 *
 * booleanTests.isString(name);
 * assertions.assertNumber(count, { positive: true });
 * filters.filterArray(tags) ?? [];
 * ```
 *
 * Each group has an explicit interface type so the assertion members keep
 * their `asserts` signatures when called through the group.
 */

import {
  assertArray,
  assertCallable,
  assertInstance,
  assertNumber,
  assertRecord,
  assertString,
} from './assertions.js';
import {
  filterArray,
  filterCallable,
  filterInstance,
  filterNumber,
  filterRecord,
  filterString,
} from './filters.js';
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
 * Boolean form of every check
 */
export interface BooleanTests {
  isString(value: unknown, options?: StringOptions): value is StringLike;
  isArray(value: unknown, options?: ArrayOptions): value is unknown[];
  isRecord(value: unknown, options?: RecordOptions): value is Record<string, unknown>;
  isCallable(value: unknown, options?: CallableOptions): value is AnyFunction;
  isNumber(value: unknown, options?: NumberOptions): value is NumberLike;
  isInstance(value: unknown, options: InstanceOptions): value is object;
}

/**
 * Assertion form of every check
 */
export interface Assertions {
  assertString(value: unknown, options?: StringOptions): asserts value is StringLike;
  assertArray(value: unknown, options?: ArrayOptions): asserts value is unknown[];
  assertRecord(value: unknown, options?: RecordOptions): asserts value is Record<string, unknown>;
  assertCallable(value: unknown, options?: CallableOptions): asserts value is AnyFunction;
  assertNumber(value: unknown, options?: NumberOptions): asserts value is NumberLike;
  assertInstance(value: unknown, options: InstanceOptions): asserts value is object;
}

/**
 * Filter form of every check
 */
export interface Filters {
  filterString(value: unknown, options?: StringOptions): StringLike | undefined;
  filterArray(value: unknown, options?: ArrayOptions): unknown[] | undefined;
  filterRecord(value: unknown, options?: RecordOptions): Record<string, unknown> | undefined;
  filterCallable(value: unknown, options?: CallableOptions): AnyFunction | undefined;
  filterNumber(value: unknown, options?: NumberOptions): NumberLike | undefined;
  filterInstance(value: unknown, options: InstanceOptions): object | undefined;
}

/**
 * Every check in every calling convention
 */
export interface AllTypeChecks extends BooleanTests, Assertions, Filters {}

export const booleanTests: BooleanTests = Object.freeze({
  isString,
  isArray,
  isRecord,
  isCallable,
  isNumber,
  isInstance,
});

export const assertions: Assertions = Object.freeze({
  assertString,
  assertArray,
  assertRecord,
  assertCallable,
  assertNumber,
  assertInstance,
});

export const filters: Filters = Object.freeze({
  filterString,
  filterArray,
  filterRecord,
  filterCallable,
  filterNumber,
  filterInstance,
});

export const all: AllTypeChecks = Object.freeze({
  ...booleanTests,
  ...assertions,
  ...filters,
});
