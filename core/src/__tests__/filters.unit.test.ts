import { describe, it, expect } from 'vitest';
import {
  filterArray,
  filterCallable,
  filterInstance,
  filterNumber,
  filterRecord,
  filterString,
} from '../filters.js';
import { UsageError } from '../errors.js';

describe('filters', () => {
  it('return the same value when it matches', () => {
    const list = [1, 2];
    const record = { id: 1 };
    const fn = (): void => {};
    const date = new Date(0);

    expect(filterString('abc')).toBe('abc');
    expect(filterString(0)).toBe(0);
    expect(filterArray(list)).toBe(list);
    expect(filterRecord(record)).toBe(record);
    expect(filterCallable(fn)).toBe(fn);
    expect(filterNumber(' 5 ')).toBe(' 5 ');
    expect(filterInstance(date, { class: 'Date' })).toBe(date);
  });

  it('return undefined when it does not', () => {
    expect(filterString(undefined)).toBeUndefined();
    expect(filterString('', { allowEmpty: false })).toBeUndefined();
    expect(filterArray('list')).toBeUndefined();
    expect(filterRecord(null)).toBeUndefined();
    expect(filterCallable(class {})).toBeUndefined();
    expect(filterNumber(-1, { positive: true })).toBeUndefined();
    expect(filterInstance({}, { class: Date })).toBeUndefined();
  });

  it('supply defaults through nullish coalescing', () => {
    expect(filterNumber('abc', { strictlyPositive: true }) ?? 20).toBe(20);
    expect(filterNumber('8', { strictlyPositive: true }) ?? 20).toBe('8');
  });

  it('throw for malformed options rather than rejecting', () => {
    const options = { positive: true, max: 10 };
    expect(() => filterNumber(5, options)).toThrow(UsageError);
    expect(() => filterInstance({}, JSON.parse('{}'))).toThrow('Option "class" is required');
  });
});
