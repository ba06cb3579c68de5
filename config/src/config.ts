/**
 * @valtype/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations, and to turn
 * a configuration into a logger or an observed validator.
 *
 * @packageDocumentation
 */

import {
  ConfigurationError,
  createConsoleLogger,
  createNoopLogger,
  createTypeValidator,
  isLogLevel,
  type Logger,
  type TypeValidator,
} from '@valtype/core';
import type {
  DeepPartial,
  EnvConfigOptions,
  LogFormat,
  LoggingConfig,
  ValtypeConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './validation.js';

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Merge partial logging settings; undefined values do not override.
 */
function mergeLogging(
  target: DeepPartial<LoggingConfig> | undefined,
  source: DeepPartial<LoggingConfig> | undefined
): DeepPartial<LoggingConfig> | undefined {
  if (!source) {
    return target;
  }

  return {
    ...target,
    ...(source.enabled !== undefined && { enabled: source.enabled }),
    ...(source.level !== undefined && { level: source.level }),
    ...(source.format !== undefined && { format: source.format }),
  };
}

/**
 * Create a complete ValtypeConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen ValtypeConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({ logging: { enabled: true } });
 *
 * // Build on another config
 * const config3 = createConfig({ logging: { format: 'pretty' } }, config2);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<ValtypeConfig>,
  base: ValtypeConfig = DEFAULT_CONFIG
): ValtypeConfig {
  const logging = overrides?.logging;

  return Object.freeze({
    logging: Object.freeze({
      enabled: logging?.enabled ?? base.logging.enabled,
      level: logging?.level ?? base.logging.level,
      format: logging?.format ?? base.logging.format,
    }),
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { logging: { enabled: true, level: 'info' } },
 *   { logging: { level: 'debug' } },
 * );
 * // merged.logging => { enabled: true, level: 'debug' }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<ValtypeConfig> | null | undefined>
): DeepPartial<ValtypeConfig> {
  let logging: DeepPartial<LoggingConfig> | undefined;

  for (const config of configs) {
    if (config) {
      logging = mergeLogging(logging, config.logging);
    }
  }

  return logging === undefined ? {} : { logging };
}

/**
 * Parse a boolean environment value: `true` (any case) or `1`.
 */
function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: VALTYPE_<SECTION>_<FIELD>
 * - VALTYPE_LOGGING_ENABLED=true
 * - VALTYPE_LOGGING_LEVEL=debug
 * - VALTYPE_LOGGING_FORMAT=pretty
 *
 * Unrecognized level and format values are ignored.
 *
 * @example
 * ```typescript
 * // Basic usage
 * const config = getConfigFromEnv();
 *
 * // Custom prefix and environment object
 * const config = getConfigFromEnv({ prefix: 'MYAPP', env: myEnvObject });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): ValtypeConfig {
  const prefix = options.prefix ?? 'VALTYPE';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});

  const enabled = parseEnvBoolean(getEnvVar(env, prefix, 'LOGGING', 'ENABLED'));
  const level = getEnvVar(env, prefix, 'LOGGING', 'LEVEL')?.toLowerCase();
  const format = getEnvVar(env, prefix, 'LOGGING', 'FORMAT')?.toLowerCase();

  const logging: DeepPartial<LoggingConfig> = {
    ...(enabled !== undefined && { enabled }),
    ...(level !== undefined && isLogLevel(level) && { level }),
    ...(format !== undefined && isLogFormat(format) && { format }),
  };

  return createConfig({ logging });
}

/**
 * Create the logger a configuration describes: a console logger at the
 * configured level and format, or the no-op logger when logging is disabled.
 */
export function createLoggerFromConfig(config: ValtypeConfig): Logger {
  const { enabled, level, format } = config.logging;
  if (!enabled) {
    return createNoopLogger();
  }
  return createConsoleLogger({ minLevel: level, format });
}

/**
 * Create an observed validator from a configuration.
 *
 * @throws ConfigurationError if the configuration does not validate
 *
 * @example
 * ```typescript
 * const validate = createValidatorFromConfig(getConfigFromEnv());
 * validate.assertRecord(payload);
 * ```
 */
export function createValidatorFromConfig(config: ValtypeConfig = createConfig()): TypeValidator {
  const result = validateConfig(config);
  const [first] = result.errors;
  if (first !== undefined) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
      { paths: result.errors.map(e => e.path) },
      first.suggestion
    );
  }

  return createTypeValidator({ logger: createLoggerFromConfig(config) });
}
