/**
 * Shared types for valtype
 *
 * Categories, the options each category recognizes, and the value types the
 * predicates narrow to.
 */

// =============================================================================
// Categories
// =============================================================================

/**
 * Every category a value can be checked against. Closed set.
 */
export const CATEGORIES = ['string', 'array', 'record', 'callable', 'number', 'instance'] as const;

/**
 * A single category id.
 */
export type Category = (typeof CATEGORIES)[number];

/**
 * The three ways each category check can be called.
 */
export type Convention = 'boolean' | 'assertion' | 'filter';

/**
 * Type guard: check if a string names a known category
 */
export function isCategory(value: string): value is Category {
  return CATEGORIES.some(category => category === value);
}

// =============================================================================
// Narrowed Value Types
// =============================================================================

/**
 * Primitive values accepted as text. Numbers and bigints qualify because
 * their text form is always defined.
 */
export type StringLike = string | number | bigint;

/**
 * Values accepted by the number check. Accepted strings may carry
 * surrounding whitespace or an `inf` spelling, so they narrow to `string`.
 */
export type NumberLike = number | bigint | string;

/**
 * Any function callable without `new`.
 */
export type AnyFunction = (...args: unknown[]) => unknown;

/**
 * Any constructor, abstract or not.
 */
export type Constructor = abstract new (...args: never[]) => unknown;

// =============================================================================
// Options
// =============================================================================

/**
 * Options for the string check
 */
export interface StringOptions {
  /** Accept the empty string (default: true) */
  allowEmpty?: boolean;
}

/**
 * Options for the array and record checks
 */
export interface AggregateOptions {
  /** Accept aggregates with no elements or keys (default: true) */
  allowEmpty?: boolean;
  /** Accept only the plain base type, never a subclass of it (default: false) */
  noSubclass?: boolean;
}

export type ArrayOptions = AggregateOptions;
export type RecordOptions = AggregateOptions;

/**
 * The callable check recognizes no options.
 */
export type CallableOptions = Record<string, never>;

/**
 * Options for the number check
 */
export interface NumberOptions {
  /** Reject negative numbers; zero is accepted (default: false) */
  positive?: boolean;
  /** Reject zero and negative numbers (default: false) */
  strictlyPositive?: boolean;
}

/**
 * Options for the is-a check
 */
export interface InstanceOptions {
  /** Class name, or the constructor itself, the value must be an instance of */
  class: string | Constructor;
}

/**
 * Options type for each category.
 */
export interface CategoryOptions {
  string: StringOptions;
  array: ArrayOptions;
  record: RecordOptions;
  callable: CallableOptions;
  number: NumberOptions;
  instance: InstanceOptions;
}
