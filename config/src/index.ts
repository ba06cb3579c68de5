/**
 * @valtype/config - Configuration for valtype
 *
 * Builds observed validators from settings held in code or in environment
 * variables.
 *
 * @example
 * ```typescript
 * import { createValidatorFromConfig, getConfigFromEnv } from '@valtype/config';
 *
 * // VALTYPE_LOGGING_ENABLED=1 VALTYPE_LOGGING_LEVEL=warn
 * const validate = createValidatorFromConfig(getConfigFromEnv());
 * ```
 *
 * @packageDocumentation
 * @module @valtype/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  DeepPartial,
  LogFormat,
  LoggingConfig,
  ValtypeConfig,
  ConfigError,
  ConfigWarning,
  ConfigValidationResult,
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export {
  createConfig,
  mergeConfigs,
  getConfigFromEnv,
  createLoggerFromConfig,
  createValidatorFromConfig,
} from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';
