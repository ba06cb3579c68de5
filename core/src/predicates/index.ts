/**
 * @valtype/core/predicates - Boolean type checks
 *
 * @example
 * ```typescript
 * import { isRecord } from '@valtype/core/predicates';
 *
 * if (isRecord(body, { noSubclass: true })) {
 *   // body: Record<string, unknown>
 * }
 * ```
 *
 * @module predicates
 */

export { isString, isArray, isRecord, isCallable, isNumber, isInstance } from '../predicates.js';
export { booleanTests, type BooleanTests } from '../groups.js';
export type {
  StringLike,
  NumberLike,
  AnyFunction,
  Constructor,
  StringOptions,
  ArrayOptions,
  RecordOptions,
  CallableOptions,
  NumberOptions,
  InstanceOptions,
} from '../types.js';
