/**
 * @valtype/config - Type Definitions
 *
 * Configuration schema for code that builds observed validators from
 * settings rather than wiring a logger by hand.
 *
 * @packageDocumentation
 * @module @valtype/config
 */

import type { LogLevel } from '@valtype/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Logging Configuration
// =============================================================================

/**
 * Log format options.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Logging configuration for the observed validator.
 *
 * @example
 * ```typescript
 * const loggingConfig: LoggingConfig = {
 *   enabled: true,
 *   level: 'warn',
 *   format: 'json',
 * };
 * ```
 */
export interface LoggingConfig {
  /** Write log records to the console; when false the no-op logger is used */
  enabled: boolean;

  /** Minimum log level */
  level: LogLevel;

  /** Log output format */
  format: LogFormat;
}

// =============================================================================
// Unified Configuration
// =============================================================================

export interface ValtypeConfig {
  /** Logging configuration */
  logging: LoggingConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Configuration error details.
 */
export interface ConfigError {
  /** Path to the invalid field (e.g., 'logging.level') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Configuration warning details.
 */
export interface ConfigWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ConfigValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;

  /** List of validation errors */
  errors: ConfigError[];

  /** List of validation warnings */
  warnings: ConfigWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'VALTYPE') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
