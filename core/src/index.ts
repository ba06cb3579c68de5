/**
 * @valtype/core
 *
 * Runtime type checks for untyped input, in three calling conventions:
 * boolean tests (`isX`), assertions (`assertX`) and filters (`filterX`).
 *
 * For smaller imports, use the focused entry points:
 * - `@valtype/core/predicates`
 * - `@valtype/core/assertions`
 * - `@valtype/core/filters`
 * - `@valtype/core/errors`
 * - `@valtype/core/logging`
 */

export const VERSION = '0.1.0';

export * from './types.js';
export * from './options.js';
export * from './predicates.js';
export * from './assertions.js';
export * from './filters.js';
export * from './groups.js';
export * from './errors.js';
export * from './logging.js';
export * from './validator.js';
export { captureStackTrace } from './stack-trace.js';
