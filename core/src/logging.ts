/**
 * Structured Logging for valtype
 *
 * A small logger abstraction. The checks themselves never log; the observed
 * validator created by createTypeValidator() reports usage errors and
 * rejections through whichever Logger it is given.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, createTypeValidator, withContext } from '@valtype/core';
 *
 * const logger = withContext(createConsoleLogger({ format: 'json', minLevel: 'warn' }), {
 *   service: 'signup-form',
 * });
 * const validate = createTypeValidator({ logger });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log level types
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * All log levels, lowest priority first
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Allowed value types in log context (JSON-serializable)
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries
 */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Category being checked */
  category?: string;
  /** Calling convention: boolean, assertion or filter */
  convention?: string;
  /** Error code for error and warning logs */
  errorCode?: string;
  /** Additional custom fields */
  [key: string]: LogContextValue | undefined;
}

/**
 * A single log entry with all metadata
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger interface - the core abstraction for logging
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

/**
 * Configuration options for creating a logger
 */
export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Custom output function for log entries */
  output?: (entry: LogEntry) => void;
}

/**
 * Configuration options for console logger
 */
export interface ConsoleLoggerConfig extends LoggerConfig {
  /** Output format: 'json' for structured logs, 'pretty' for human-readable */
  format?: 'json' | 'pretty';
}

/**
 * Test logger with additional methods for assertions
 */
export interface TestLogger extends Logger {
  /** Get all captured log entries */
  getLogs(): LogEntry[];
  /** Get log entries filtered by level */
  getLogsByLevel(level: LogLevel): LogEntry[];
  /** Clear all captured logs */
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Log level constants and utilities
 */
export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  /**
   * Get the numeric order of a log level
   */
  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  /**
   * Check if a level is at least as high as a minimum level
   */
  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
};

/**
 * Type guard: check if a string is a log level
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger with custom configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: 'info',
 *   output: (entry) => sendToLoggingService(entry)
 * });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Format a log entry as a single line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }

  return output;
}

/**
 * Create a logger that writes one line per entry to the console
 *
 * @example
 * ```typescript
 * // JSON format for production (structured logs)
 * const prodLogger = createConsoleLogger({ format: 'json' });
 *
 * // Pretty format for development
 * const devLogger = createConsoleLogger({ format: 'pretty' });
 * ```
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      console.log(formatLogEntry(entry, format));
    },
  });
}

/**
 * Create a no-op logger that discards all log messages
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a test logger that captures log entries for assertions
 *
 * @example
 * ```typescript
 * const testLogger = createTestLogger();
 * createTypeValidator({ logger: testLogger }).filterString(42n);
 * expect(testLogger.getLogs()).toHaveLength(0);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger with additional context
 *
 * The child logger includes the parent's context in all log entries,
 * merged with any local context provided at log time.
 *
 * @example
 * ```typescript
 * const formLogger = withContext(rootLogger, { service: 'signup-form' });
 * formLogger.warn('Invalid options'); // context includes service
 * ```
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext => {
    if (localContext === undefined) {
      return context;
    }
    return { ...context, ...localContext };
  };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}
