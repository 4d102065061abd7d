/**
 * Tests for typed value construction and kind inference
 */

import { Decimal } from 'decimal.js';
import { describe, expect, test } from 'vitest';
import {
  dateValue,
  integerValue,
  nominalValue,
  numericValue,
  stringValue,
  valueOfKind,
  ValueTypeError,
  wrapValue,
} from '../../src';

describe('integerValue', () => {
  test('parses integer text', () => {
    expect(integerValue('42')).toEqual({ kind: 'integer', value: 42, isClass: false });
  });

  test('keeps the missing marker', () => {
    expect(integerValue('?').value).toBe('?');
  });

  test('accepts integral decimals', () => {
    expect(integerValue(new Decimal('3')).value).toBe(3);
  });

  test('rejects fractional input instead of truncating', () => {
    expect(() => integerValue('4.5')).toThrow(ValueTypeError);
    expect(() => integerValue(2.5)).toThrow(ValueTypeError);
    expect(() => integerValue(new Decimal('3.5'))).toThrow(ValueTypeError);
  });

  test('rejects integers beyond the safe range', () => {
    expect(integerValue('9007199254740991').value).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => integerValue('9007199254740993')).toThrow(ValueTypeError);
  });

  test('describes the incompatible input', () => {
    expect(() => integerValue('abc')).toThrow('Cannot convert "abc" to integer: not an integer literal');
  });
});

describe('numericValue', () => {
  test('parses float text', () => {
    expect(numericValue('1.5').value).toBe(1.5);
    expect(numericValue('-2e3').value).toBe(-2000);
  });

  test('understands infinity and nan words', () => {
    expect(numericValue('inf').value).toBe(Number.POSITIVE_INFINITY);
    expect(numericValue('NaN').value).toBeNaN();
  });

  test('rejects text that is not a number', () => {
    expect(() => numericValue('abc')).toThrow(ValueTypeError);
  });

  test('rejects calendar values', () => {
    expect(() => numericValue(new Date(0))).toThrow(ValueTypeError);
  });
});

describe('stringValue and nominalValue', () => {
  test('coerces anything to text', () => {
    expect(stringValue(3).value).toBe('3');
    expect(stringValue(new Decimal('1.25')).value).toBe('1.25');
  });

  test('carries the class flag', () => {
    expect(nominalValue('yes', true)).toEqual({ kind: 'nominal', value: 'yes', isClass: true });
  });
});

describe('dateValue', () => {
  test('keeps free text for the writer to normalize', () => {
    expect(dateValue('2020-01-02').value).toBe('2020-01-02');
  });

  test('rejects numbers', () => {
    expect(() => dateValue(5)).toThrow(ValueTypeError);
  });
});

describe('valueOfKind', () => {
  test('dispatches on the declared kind', () => {
    expect(valueOfKind('integer', '7')).toEqual({ kind: 'integer', value: 7, isClass: false });
    expect(valueOfKind('nominal', 'x', true)).toEqual({ kind: 'nominal', value: 'x', isClass: true });
  });
});

describe('wrapValue', () => {
  test('passes typed values through', () => {
    const value = integerValue(1);
    expect(wrapValue(value)).toBe(value);
  });

  test('turns the missing marker and text into strings', () => {
    expect(wrapValue('?').kind).toBe('string');
    expect(wrapValue('12')).toEqual({ kind: 'string', value: '12', isClass: false });
  });

  test('prefers numeric over integer for numbers', () => {
    expect(wrapValue(12).kind).toBe('numeric');
    expect(wrapValue(new Decimal('2')).kind).toBe('numeric');
  });

  test('falls back to integer when numeric is bypassed', () => {
    expect(wrapValue(12, { numeric: false })).toEqual({ kind: 'integer', value: 12, isClass: false });
  });

  test('infers dates for calendar values', () => {
    const date = new Date(2020, 0, 2);
    expect(wrapValue(date, { isClass: true })).toEqual({ kind: 'date', value: date, isClass: true });
  });
});
