/**
 * Observed validator
 *
 * createTypeValidator() returns the full set of checks bound to a Logger.
 * Results are exactly those of the free functions; the validator only adds
 * log records around them. The value under test is never logged.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, createTypeValidator } from '@valtype/core';
 *
 * const validate = createTypeValidator({
 *   logger: createConsoleLogger({ minLevel: 'warn' }),
 * });
 *
 * validate.filterNumber(request.query.limit, { strictlyPositive: true }) ?? 20;
 * ```
 */

import {
  assertArray,
  assertCallable,
  assertInstance,
  assertNumber,
  assertRecord,
  assertString,
} from './assertions.js';
import { isUsageError, isValidationError } from './errors.js';
import {
  filterArray,
  filterCallable,
  filterInstance,
  filterNumber,
  filterRecord,
  filterString,
} from './filters.js';
import type { AllTypeChecks } from './groups.js';
import { createNoopLogger, type LogContext, type Logger } from './logging.js';
import { isArray, isCallable, isInstance, isNumber, isRecord, isString } from './predicates.js';
import type {
  AnyFunction,
  ArrayOptions,
  CallableOptions,
  Category,
  Convention,
  InstanceOptions,
  NumberLike,
  NumberOptions,
  RecordOptions,
  StringLike,
  StringOptions,
} from './types.js';

export interface TypeValidatorOptions {
  /** Logger receiving usage errors (warn) and rejections (debug). Default: no-op */
  logger?: Logger;
}

/**
 * Every check in every calling convention, reporting to a logger
 */
export interface TypeValidator extends AllTypeChecks {
  readonly logger: Logger;
}

/**
 * Create a validator whose checks log usage errors and rejections.
 */
export function createTypeValidator(options: TypeValidatorOptions = {}): TypeValidator {
  const logger = options.logger ?? createNoopLogger();

  const observe = <T>(category: Category, convention: Convention, run: () => T): T => {
    try {
      return run();
    } catch (error) {
      if (isUsageError(error)) {
        const context: LogContext = { category, convention, errorCode: error.code };
        if (error.unrecognized.length > 0) {
          context.unrecognized = [...error.unrecognized];
        }
        logger.warn('Invalid options', context);
      } else if (isValidationError(error)) {
        logger.debug('Assertion failed', { category, errorCode: error.code });
      }
      throw error;
    }
  };

  const test = (category: Category, run: () => boolean): boolean => {
    const accepted = observe(category, 'boolean', run);
    if (!accepted) {
      logger.debug('Value rejected', { category, convention: 'boolean' });
    }
    return accepted;
  };

  const filter = <T>(category: Category, run: () => T | undefined): T | undefined => {
    const result = observe(category, 'filter', run);
    if (result === undefined) {
      logger.debug('Value rejected', { category, convention: 'filter' });
    }
    return result;
  };

  return {
    logger,

    isString(value: unknown, opts?: StringOptions): value is StringLike {
      return test('string', () => isString(value, opts));
    },
    isArray(value: unknown, opts?: ArrayOptions): value is unknown[] {
      return test('array', () => isArray(value, opts));
    },
    isRecord(value: unknown, opts?: RecordOptions): value is Record<string, unknown> {
      return test('record', () => isRecord(value, opts));
    },
    isCallable(value: unknown, opts?: CallableOptions): value is AnyFunction {
      return test('callable', () => isCallable(value, opts));
    },
    isNumber(value: unknown, opts?: NumberOptions): value is NumberLike {
      return test('number', () => isNumber(value, opts));
    },
    isInstance(value: unknown, opts: InstanceOptions): value is object {
      return test('instance', () => isInstance(value, opts));
    },

    assertString(value: unknown, opts?: StringOptions): asserts value is StringLike {
      observe('string', 'assertion', () => assertString(value, opts));
    },
    assertArray(value: unknown, opts?: ArrayOptions): asserts value is unknown[] {
      observe('array', 'assertion', () => assertArray(value, opts));
    },
    assertRecord(value: unknown, opts?: RecordOptions): asserts value is Record<string, unknown> {
      observe('record', 'assertion', () => assertRecord(value, opts));
    },
    assertCallable(value: unknown, opts?: CallableOptions): asserts value is AnyFunction {
      observe('callable', 'assertion', () => assertCallable(value, opts));
    },
    assertNumber(value: unknown, opts?: NumberOptions): asserts value is NumberLike {
      observe('number', 'assertion', () => assertNumber(value, opts));
    },
    assertInstance(value: unknown, opts: InstanceOptions): asserts value is object {
      observe('instance', 'assertion', () => assertInstance(value, opts));
    },

    filterString(value: unknown, opts?: StringOptions): StringLike | undefined {
      return filter('string', () => filterString(value, opts));
    },
    filterArray(value: unknown, opts?: ArrayOptions): unknown[] | undefined {
      return filter('array', () => filterArray(value, opts));
    },
    filterRecord(value: unknown, opts?: RecordOptions): Record<string, unknown> | undefined {
      return filter('record', () => filterRecord(value, opts));
    },
    filterCallable(value: unknown, opts?: CallableOptions): AnyFunction | undefined {
      return filter('callable', () => filterCallable(value, opts));
    },
    filterNumber(value: unknown, opts?: NumberOptions): NumberLike | undefined {
      return filter('number', () => filterNumber(value, opts));
    },
    filterInstance(value: unknown, opts: InstanceOptions): object | undefined {
      return filter('instance', () => filterInstance(value, opts));
    },
  };
}
