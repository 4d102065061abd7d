/**
 * Tests for dense and sparse row decoding
 */

import { Decimal } from 'decimal.js';
import { describe, expect, test, vi } from 'vitest';
import { ArffSchema, ParseError, ValidationError } from '../../../src';
import { parseDenseRow, parseSparseRow } from '../../../src/formats/arff';

function makeSchema(): ArffSchema {
  return new ArffSchema('t', [
    ['n', 'integer'],
    ['x', 'numeric'],
    ['s', 'string'],
    ['c', ['a', 'b']],
    ['d', 'date'],
  ]);
}

describe('parseDenseRow', () => {
  test('decodes each field by its attribute kind', () => {
    const row = parseDenseRow(makeSchema(), '1, 2.50, hello, a, 2020-01-02', 3, vi.fn());

    expect(row).toHaveLength(5);
    expect(row?.[0]).toBe(1);
    expect(Decimal.isDecimal(row?.[1])).toBe(true);
    expect(String(row?.[1])).toBe('2.5');
    expect(row?.slice(2)).toEqual(['hello', 'a', '2020-01-02']);
  });

  test('passes missing markers through', () => {
    expect(parseDenseRow(makeSchema(), '?,?,?,?,?', 1, vi.fn())).toEqual(['?', '?', '?', '?', '?']);
  });

  test('warns and drops rows with the wrong field count', () => {
    const onWarning = vi.fn();
    expect(parseDenseRow(makeSchema(), '1,2', 3, onWarning)).toBeUndefined();
    expect(onWarning).toHaveBeenCalledWith('line 3 contains 2 values but it should contain 5 values', 3);
  });

  test('rejects nominal values outside the declared set', () => {
    expect(() => parseDenseRow(makeSchema(), '1,2,s,z,2020', 1, vi.fn())).toThrow(
      'Incorrect value z for nominal attribute c; allowed values: a, b'
    );
  });

  test('rejects text in numeric columns', () => {
    expect(() => parseDenseRow(makeSchema(), '1,abc,s,a,d', 1, vi.fn())).toThrow(
      'Invalid numeric value "abc" for attribute x'
    );
    expect(() => parseDenseRow(makeSchema(), '1,0x10,s,a,d', 1, vi.fn())).toThrow(
      'Invalid numeric value "0x10" for attribute x'
    );
    expect(() => parseDenseRow(makeSchema(), '1.5,2,s,a,d', 1, vi.fn())).toThrow(
      'Invalid integer value "1.5" for attribute n'
    );
  });
});

describe('parseSparseRow', () => {
  test('wraps values by declared kind and keys them by name', () => {
    expect(parseSparseRow(makeSchema(), "{0 7, 2 'hi there', 3 b, 4 2020-01-02}")).toEqual({
      n: { kind: 'integer', value: 7, isClass: false },
      s: { kind: 'string', value: 'hi there', isClass: false },
      c: { kind: 'nominal', value: 'b', isClass: false },
      d: { kind: 'date', value: '2020-01-02', isClass: false },
    });
  });

  test('wraps the missing marker as a string value', () => {
    expect(parseSparseRow(makeSchema(), '{1 ?}')).toEqual({
      x: { kind: 'string', value: '?', isClass: false },
    });
  });

  test('accepts empty rows', () => {
    expect(parseSparseRow(makeSchema(), '{}')).toEqual({});
  });

  test('rejects a missing closing brace', () => {
    expect(() => parseSparseRow(makeSchema(), '{0 1', 9)).toThrow(ParseError);
  });

  test('rejects indices outside the schema', () => {
    expect(() => parseSparseRow(makeSchema(), '{9 1}')).toThrow(
      'Sparse index 9 is out of range for 5 attributes'
    );
  });

  test('rejects values that do not fit the kind', () => {
    expect(() => parseSparseRow(makeSchema(), '{1 abc}')).toThrow(ValidationError);
  });
});
