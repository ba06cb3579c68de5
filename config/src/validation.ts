/**
 * @valtype/config - Configuration Validation
 *
 * Configurations built in TypeScript are well typed already; this catches
 * values that arrive from JSON files or untyped callers.
 *
 * @packageDocumentation
 */

import { LOG_LEVELS, isLogLevel } from '@valtype/core';
import type {
  ValtypeConfig,
  ConfigValidationResult,
  ConfigError,
  ConfigWarning,
} from './types.js';

const LOG_FORMATS: readonly string[] = ['json', 'pretty'];

/**
 * Validate a complete ValtypeConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: ValtypeConfig): ConfigValidationResult {
  const errors: ConfigError[] = [];
  const warnings: ConfigWarning[] = [];

  validateLoggingConfig(config.logging, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate logging configuration.
 */
function validateLoggingConfig(
  logging: ValtypeConfig['logging'],
  errors: ConfigError[],
  warnings: ConfigWarning[]
): void {
  const { enabled, level, format } = logging;

  if (typeof enabled !== 'boolean') {
    errors.push({
      path: 'logging.enabled',
      message: 'Logging enabled flag must be a boolean',
      value: enabled,
    });
  }

  if (!isLogLevel(level)) {
    errors.push({
      path: 'logging.level',
      message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
      value: level,
      suggestion: "Use 'warn' to report only usage errors",
    });
  } else if (level === 'debug') {
    warnings.push({
      path: 'logging.level',
      message: 'Debug level logs every rejected value and assertion failure',
      value: level,
      recommendation: "Use 'warn' outside development",
    });
  }

  if (!LOG_FORMATS.includes(format)) {
    errors.push({
      path: 'logging.format',
      message: `Log format must be one of: ${LOG_FORMATS.join(', ')}`,
      value: format,
    });
  }
}
