import {
  describe,
  expect,
  it
} from 'vitest';

import {
  assertNonNullable,
  ensureNonNullable,
  isDigit,
  isRecord
} from '../src/typeGuards.ts';

describe('assertNonNullable', () => {
  it('passes for non-null values', () => {
    expect(() => {
      assertNonNullable(0);
    }).not.toThrow();
    expect(() => {
      assertNonNullable('');
    }).not.toThrow();
  });

  it('throws for null', () => {
    expect(() => {
      assertNonNullable(null);
    }).toThrow('Value is null');
  });

  it('throws with custom Error', () => {
    const error = new TypeError('type error');
    expect(() => {
      assertNonNullable(undefined, error);
    }).toThrow(error);
  });
});

describe('ensureNonNullable', () => {
  it('returns the value for non-null inputs', () => {
    expect(ensureNonNullable(42)).toBe(42);
    expect(ensureNonNullable(false)).toBe(false);
  });

  it('throws for undefined', () => {
    expect(() => ensureNonNullable(undefined)).toThrow('Value is undefined');
  });

  it('throws with custom string message', () => {
    expect(() => ensureNonNullable(null, 'custom')).toThrow('custom');
  });
});

describe('isDigit', () => {
  it('accepts integers 1-9 only', () => {
    expect(isDigit(1)).toBe(true);
    expect(isDigit(9)).toBe(true);
    expect(isDigit(0)).toBe(false);
    expect(isDigit(10)).toBe(false);
    expect(isDigit(2.5)).toBe(false);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({ grid: '' })).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord(['row'])).toBe(false);
    expect(isRecord('grid')).toBe(false);
  });
});
