/**
 * @valtype/config - Unit Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigurationError, ErrorCode, type TypeValidator } from '@valtype/core';
import {
  createConfig,
  createLoggerFromConfig,
  createValidatorFromConfig,
  validateConfig,
  getConfigFromEnv,
  mergeConfigs,
  DEFAULT_CONFIG,
  type ValtypeConfig,
} from '../index.js';

afterEach(() => {
  vi.restoreAllMocks();
});

function catchConfigurationError(run: () => void): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('@valtype/config', () => {
  // =============================================================================
  // DEFAULT_CONFIG Tests
  // =============================================================================

  describe('DEFAULT_CONFIG', () => {
    it('has logging off, at warn, in JSON', () => {
      expect(DEFAULT_CONFIG).toEqual({ logging: { enabled: false, level: 'warn', format: 'json' } });
    });

    it('is frozen', () => {
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
      expect(Object.isFrozen(DEFAULT_CONFIG.logging)).toBe(true);
    });
  });

  // =============================================================================
  // createConfig Tests
  // =============================================================================

  describe('createConfig', () => {
    it('returns the defaults without overrides', () => {
      expect(createConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('overrides individual fields', () => {
      const config = createConfig({ logging: { enabled: true, format: 'pretty' } });

      expect(config.logging).toEqual({ enabled: true, level: 'warn', format: 'pretty' });
    });

    it('does not let undefined override', () => {
      const config = createConfig({ logging: { level: undefined, enabled: true } });

      expect(config.logging.level).toBe('warn');
      expect(config.logging.enabled).toBe(true);
    });

    it('builds on a base configuration', () => {
      const base = createConfig({ logging: { enabled: true, level: 'info' } });
      const config = createConfig({ logging: { format: 'pretty' } }, base);

      expect(config.logging).toEqual({ enabled: true, level: 'info', format: 'pretty' });
    });

    it('returns a frozen configuration', () => {
      const config = createConfig({ logging: { enabled: true } });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.logging)).toBe(true);
    });
  });

  // =============================================================================
  // mergeConfigs Tests
  // =============================================================================

  describe('mergeConfigs', () => {
    it('lets later configurations win', () => {
      const merged = mergeConfigs(
        { logging: { enabled: true, level: 'info' } },
        null,
        { logging: { level: 'debug', format: undefined } },
        undefined
      );

      expect(merged).toEqual({ logging: { enabled: true, level: 'debug' } });
    });

    it('returns an empty partial when nothing is set', () => {
      expect(mergeConfigs()).toEqual({});
      expect(mergeConfigs({}, null)).toEqual({});
    });
  });

  // =============================================================================
  // getConfigFromEnv Tests
  // =============================================================================

  describe('getConfigFromEnv', () => {
    it('returns the defaults for an empty environment', () => {
      expect(getConfigFromEnv({ env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('reads VALTYPE_LOGGING_* variables', () => {
      const config = getConfigFromEnv({
        env: {
          VALTYPE_LOGGING_ENABLED: '1',
          VALTYPE_LOGGING_LEVEL: 'DEBUG',
          VALTYPE_LOGGING_FORMAT: 'pretty',
        },
      });

      expect(config.logging).toEqual({ enabled: true, level: 'debug', format: 'pretty' });
    });

    it('parses the enabled flag', () => {
      expect(getConfigFromEnv({ env: { VALTYPE_LOGGING_ENABLED: 'TRUE' } }).logging.enabled).toBe(true);
      expect(getConfigFromEnv({ env: { VALTYPE_LOGGING_ENABLED: 'yes' } }).logging.enabled).toBe(false);
      expect(getConfigFromEnv({ env: { VALTYPE_LOGGING_ENABLED: '0' } }).logging.enabled).toBe(false);
    });

    it('ignores unrecognized level and format values', () => {
      const config = getConfigFromEnv({
        env: { VALTYPE_LOGGING_LEVEL: 'verbose', VALTYPE_LOGGING_FORMAT: 'xml' },
      });

      expect(config.logging).toEqual({ enabled: false, level: 'warn', format: 'json' });
    });

    it('supports a custom prefix', () => {
      const config = getConfigFromEnv({
        prefix: 'myapp',
        env: { MYAPP_LOGGING_ENABLED: 'true', VALTYPE_LOGGING_ENABLED: 'false' },
      });

      expect(config.logging.enabled).toBe(true);
    });
  });

  // =============================================================================
  // validateConfig Tests
  // =============================================================================

  describe('validateConfig', () => {
    it('accepts the defaults without warnings', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('warns about debug level', () => {
      const result = validateConfig(createConfig({ logging: { level: 'debug' } }));

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        {
          path: 'logging.level',
          message: 'Debug level logs every rejected value and assertion failure',
          value: 'debug',
          recommendation: "Use 'warn' outside development",
        },
      ]);
    });

    it('reports every invalid field of an untyped configuration', () => {
      const config: ValtypeConfig = JSON.parse(
        '{"logging":{"enabled":"yes","level":"loud","format":"xml"}}'
      );
      const result = validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors.map(error => error.path)).toEqual([
        'logging.enabled',
        'logging.level',
        'logging.format',
      ]);
      expect(result.errors[1]).toEqual({
        path: 'logging.level',
        message: 'Log level must be one of: debug, info, warn, error',
        value: 'loud',
        suggestion: "Use 'warn' to report only usage errors",
      });
      expect(result.errors[2].message).toBe('Log format must be one of: json, pretty');
    });
  });

  // =============================================================================
  // createLoggerFromConfig Tests
  // =============================================================================

  describe('createLoggerFromConfig', () => {
    it('returns a silent logger when logging is disabled', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      createLoggerFromConfig(DEFAULT_CONFIG).error('ignored', new Error('x'));

      expect(spy).not.toHaveBeenCalled();
    });

    it('writes to the console at the configured level and format', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(Date, 'now').mockReturnValue(0);
      const logger = createLoggerFromConfig(createConfig({ logging: { enabled: true } }));

      logger.info('dropped');
      logger.warn('kept');

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith('{"level":"warn","message":"kept","timestamp":0}');
    });
  });

  // =============================================================================
  // createValidatorFromConfig Tests
  // =============================================================================

  describe('createValidatorFromConfig', () => {
    it('builds a validator from the defaults', () => {
      const validate: TypeValidator = createValidatorFromConfig();

      expect(validate.isNumber('42')).toBe(true);
      expect(() => validate.assertRecord([])).toThrow('Not a record');
    });

    it('logs usage errors through the configured console logger', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(Date, 'now').mockReturnValue(0);
      const validate = createValidatorFromConfig(createConfig({ logging: { enabled: true } }));
      const options = { allowEmpty: false, strict: true };

      expect(() => validate.filterString('x', options)).toThrow('Options not recognized: strict');
      expect(spy).toHaveBeenCalledWith(
        '{"level":"warn","message":"Invalid options","timestamp":0,' +
          '"context":{"category":"string","convention":"filter","errorCode":"UNRECOGNIZED_OPTIONS","unrecognized":["strict"]}}'
      );
    });

    it('rejects an invalid configuration', () => {
      const config: ValtypeConfig = JSON.parse('{"logging":{"enabled":true,"level":"loud","format":"json"}}');
      const error = catchConfigurationError(() => createValidatorFromConfig(config));

      expect(error.message).toBe(
        'Invalid configuration: logging.level: Log level must be one of: debug, info, warn, error'
      );
      expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
      expect(error.details).toEqual({ paths: ['logging.level'] });
      expect(error.suggestion).toBe("Use 'warn' to report only usage errors");
    });
  });
});
