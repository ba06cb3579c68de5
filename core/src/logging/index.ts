/**
 * @valtype/core/logging - Structured logging
 *
 * @example
 * ```typescript
 * import { createTestLogger } from '@valtype/core/logging';
 *
 * const logger = createTestLogger();
 * // ...
 * expect(logger.getLogsByLevel('warn')).toHaveLength(1);
 * ```
 *
 * @module logging
 */

export {
  LOG_LEVELS,
  LogLevels,
  isLogLevel,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
} from '../logging.js';

export type {
  Logger,
  LogLevel,
  LogEntry,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
  LogContext,
  LogContextValue,
} from '../logging.js';
