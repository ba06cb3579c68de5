import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  LogLevels,
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogLevel,
  withContext,
  type LogEntry,
} from '../logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LogLevels', () => {
  it('orders levels from debug to error', () => {
    expect(LogLevels.order('debug')).toBe(0);
    expect(LogLevels.order('error')).toBe(3);
    expect(LogLevels.isAtLeast('warn', 'info')).toBe(true);
    expect(LogLevels.isAtLeast('debug', 'warn')).toBe(false);
    expect(LogLevels.isAtLeast('warn', 'warn')).toBe(true);
  });

  it('recognizes level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('INFO')).toBe(false);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(2)).toBe(false);
  });
});

describe('createLogger', () => {
  it('passes entries at or above the minimum level to the output', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ minLevel: 'warn', output: entry => entries.push(entry) });

    logger.debug('dropped');
    logger.info('dropped');
    logger.warn('kept', { category: 'string' });
    logger.error('failed', new Error('cause'));

    expect(entries.map(entry => [entry.level, entry.message])).toEqual([
      ['warn', 'kept'],
      ['error', 'failed'],
    ]);
    expect(entries[0].context).toEqual({ category: 'string' });
    expect(entries[1].error?.message).toBe('cause');
  });

  it('omits context and error when none are given', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: entry => entries.push(entry) });

    logger.info('plain');

    expect(Object.keys(entries[0]).sort()).toEqual(['level', 'message', 'timestamp']);
  });
});

describe('formatLogEntry', () => {
  const entry: LogEntry = {
    level: 'warn',
    message: 'Invalid options',
    timestamp: 0,
    context: { category: 'string' },
  };

  it('writes JSON lines', () => {
    expect(formatLogEntry(entry, 'json')).toBe(
      '{"level":"warn","message":"Invalid options","timestamp":0,"context":{"category":"string"}}'
    );
  });

  it('writes pretty lines', () => {
    expect(formatLogEntry(entry, 'pretty')).toBe(
      '[1970-01-01T00:00:00.000Z] WARN  Invalid options {"category":"string"}'
    );
  });
});

describe('createConsoleLogger', () => {
  it('writes one JSON line per entry by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(Date, 'now').mockReturnValue(0);

    createConsoleLogger().info('ready', { service: 'signup-form' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(
      '{"level":"info","message":"ready","timestamp":0,"context":{"service":"signup-form"}}'
    );
  });

  it('respects the minimum level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = createConsoleLogger({ minLevel: 'error', format: 'pretty' });
    logger.warn('quiet');

    expect(spy).not.toHaveBeenCalled();
  });
});

describe('createNoopLogger', () => {
  it('discards everything', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createNoopLogger();

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d', new Error('e'));

    expect(spy).not.toHaveBeenCalled();
  });
});

describe('createTestLogger', () => {
  it('captures entries and filters them by level', () => {
    const logger = createTestLogger();

    logger.debug('one');
    logger.warn('two');
    logger.warn('three');

    expect(logger.getLogs()).toHaveLength(3);
    expect(logger.getLogsByLevel('warn').map(entry => entry.message)).toEqual(['two', 'three']);

    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });

  it('honors a minimum level', () => {
    const logger = createTestLogger({ minLevel: 'info' });

    logger.debug('dropped');
    logger.info('kept');

    expect(logger.getLogs().map(entry => entry.message)).toEqual(['kept']);
  });
});

describe('withContext', () => {
  it('merges bound context under local context', () => {
    const logger = createTestLogger();
    const child = withContext(logger, { service: 'signup-form', category: 'string' });

    child.warn('first');
    child.warn('second', { category: 'number' });
    child.error('third', new Error('x'), { convention: 'filter' });

    expect(logger.getLogs().map(entry => entry.context)).toEqual([
      { service: 'signup-form', category: 'string' },
      { service: 'signup-form', category: 'number' },
      { service: 'signup-form', category: 'string', convention: 'filter' },
    ]);
  });
});
