/**
 * @valtype/core - Option schema validation
 *
 * Every check validates its options bag against the schema of its category
 * before looking at the value. Unknown keys, values of the wrong type and
 * missing required options are usage errors, raised the same way by the
 * boolean, assertion and filter forms.
 *
 * @module options
 */

import { UsageError, describeType } from './errors.js';
import type { Category } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Value kinds an option can hold.
 * - `boolean`: true or false
 * - `class`: a non-empty class name, or a function with an object `prototype`
 */
export type OptionKind = 'boolean' | 'class';

/**
 * Rule for a single recognized option
 */
export interface OptionRule {
  readonly kind: OptionKind;
  readonly required: boolean;
}

/**
 * Recognized options of one category, keyed by option name
 */
export type OptionSchema = Readonly<Record<string, OptionRule>>;

/**
 * A single problem found in an options bag
 */
export type OptionIssue =
  | { kind: 'not-an-object'; actualType: string }
  | { kind: 'unrecognized'; option: string }
  | { kind: 'invalid-value'; option: string; expected: string; actualType: string }
  | { kind: 'missing'; option: string };

/**
 * Result of checking an options bag without throwing
 */
export interface OptionCheckResult {
  /** Whether the options bag is acceptable */
  valid: boolean;
  /** Unrecognized keys, sorted */
  unrecognized: string[];
  /** Every problem found, in reporting order */
  issues: OptionIssue[];
}

// =============================================================================
// Schemas
// =============================================================================

const BOOLEAN: OptionRule = Object.freeze({ kind: 'boolean', required: false });
const REQUIRED_CLASS: OptionRule = Object.freeze({ kind: 'class', required: true });

/**
 * Recognized options per category.
 */
export const OPTION_SCHEMAS: Readonly<Record<Category, OptionSchema>> = Object.freeze({
  string: Object.freeze({ allowEmpty: BOOLEAN }),
  array: Object.freeze({ allowEmpty: BOOLEAN, noSubclass: BOOLEAN }),
  record: Object.freeze({ allowEmpty: BOOLEAN, noSubclass: BOOLEAN }),
  callable: Object.freeze({}),
  number: Object.freeze({ positive: BOOLEAN, strictlyPositive: BOOLEAN }),
  instance: Object.freeze({ class: REQUIRED_CLASS }),
});

const EXPECTED: Readonly<Record<OptionKind, string>> = {
  boolean: 'a boolean',
  class: 'a class name or constructor',
};

/**
 * Names of the options a category recognizes, in declaration order.
 */
export function recognizedOptions(category: Category): string[] {
  return Object.keys(OPTION_SCHEMAS[category]);
}

// =============================================================================
// Checking
// =============================================================================

function isOptionsBag(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function matchesKind(value: unknown, kind: OptionKind): boolean {
  switch (kind) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'class':
      return (typeof value === 'string' && value.length > 0) || isConstructorLike(value);
  }
}

// Arrow functions, methods and bound functions have no object prototype for instanceof
function isConstructorLike(value: unknown): boolean {
  if (typeof value !== 'function') return false;
  const proto: unknown = value.prototype;
  return (typeof proto === 'object' && proto !== null) || typeof proto === 'function';
}

/**
 * Check an options bag against a category's schema without throwing.
 *
 * `undefined` stands for "no options". A recognized key holding `undefined`
 * counts as absent, so its default applies.
 *
 * @example
 * ```typescript
 * const result = checkOptions('string', { allowEmpty: false, trim: true });
 * // result.valid === false, result.unrecognized === ['trim']
 * ```
 */
export function checkOptions(category: Category, options: unknown): OptionCheckResult {
  const schema = OPTION_SCHEMAS[category];
  const issues: OptionIssue[] = [];

  let bag: Record<string, unknown> = {};
  if (options !== undefined) {
    if (!isOptionsBag(options)) {
      issues.push({ kind: 'not-an-object', actualType: describeType(options) });
      return { valid: false, unrecognized: [], issues };
    }
    bag = options;
  }

  const unrecognized = Object.keys(bag)
    .filter(key => !Object.hasOwn(schema, key))
    .sort();
  for (const option of unrecognized) {
    issues.push({ kind: 'unrecognized', option });
  }

  for (const [option, rule] of Object.entries(schema)) {
    const value = bag[option];
    if (value === undefined) {
      if (rule.required) {
        issues.push({ kind: 'missing', option });
      }
    } else if (!matchesKind(value, rule.kind)) {
      issues.push({
        kind: 'invalid-value',
        option,
        expected: EXPECTED[rule.kind],
        actualType: describeType(value),
      });
    }
  }

  // Invalid values are reported before missing options
  issues.sort((a, b) => issueRank(a) - issueRank(b));

  return { valid: issues.length === 0, unrecognized, issues };
}

function issueRank(issue: OptionIssue): number {
  switch (issue.kind) {
    case 'not-an-object':
      return 0;
    case 'unrecognized':
      return 1;
    case 'invalid-value':
      return 2;
    case 'missing':
      return 3;
  }
}

/**
 * Validate an options bag, throwing a UsageError for the first problem class.
 *
 * @throws UsageError when the bag is not an object, holds unrecognized keys
 *         (all of them are listed), holds a value of the wrong type, or lacks
 *         a required option
 */
export function validateOptions(category: Category, options: unknown): void {
  const result = checkOptions(category, options);
  if (result.valid) return;

  const first = result.issues[0];
  switch (first.kind) {
    case 'not-an-object':
      throw UsageError.notAnObject(category, first.actualType);
    case 'unrecognized':
      throw UsageError.unrecognizedOptions(category, result.unrecognized, recognizedOptions(category));
    case 'invalid-value':
      throw UsageError.invalidOptionValue(category, first.option, first.expected, first.actualType);
    case 'missing':
      throw UsageError.missingOption(category, first.option);
  }
}
