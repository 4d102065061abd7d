/**
 * Tests for header directive parsing
 */

import { describe, expect, test } from 'vitest';
import { ParseError } from '../../../src';
import {
  parseAttributeDeclaration,
  parseRelation,
  tokenizeDeclaration,
} from '../../../src/formats/arff';

describe('tokenizeDeclaration', () => {
  test('extracts identifiers, quoted names and value lists', () => {
    expect(tokenizeDeclaration("@attribute 'sky color' {blue, grey}")).toEqual([
      'attribute',
      "'sky color'",
      '{blue, grey}',
    ]);
  });
});

describe('parseRelation', () => {
  test('takes the second token', () => {
    expect(parseRelation('@relation weather')).toBe('weather');
  });

  test('rejects a missing name', () => {
    expect(() => parseRelation('@relation', 3)).toThrow(ParseError);
  });
});

describe('parseAttributeDeclaration', () => {
  test('reads simple kinds case-insensitively', () => {
    expect(parseAttributeDeclaration('@attribute count integer')).toEqual({ name: 'count', kind: 'integer' });
    expect(parseAttributeDeclaration('@ATTRIBUTE temp REAL')).toEqual({ name: 'temp', kind: 'numeric' });
    expect(parseAttributeDeclaration('@attribute temp numeric')).toEqual({ name: 'temp', kind: 'numeric' });
    expect(parseAttributeDeclaration('@attribute note string')).toEqual({ name: 'note', kind: 'string' });
  });

  test('splits nominal value lists', () => {
    expect(parseAttributeDeclaration('@attribute outlook {sunny, rainy}')).toEqual({
      name: 'outlook',
      kind: 'nominal',
      data: ['sunny', 'rainy'],
    });
  });

  test('strips quotes from names and date patterns', () => {
    expect(parseAttributeDeclaration('@attribute \'when\' date "yyyy-MM-dd"')).toEqual({
      name: 'when',
      kind: 'date',
      data: 'yyyy-MM-dd',
    });
    expect(parseAttributeDeclaration('@attribute when date')).toEqual({ name: 'when', kind: 'date' });
  });

  test('rejects unsupported kinds', () => {
    expect(() => parseAttributeDeclaration('@attribute x relational', 4)).toThrow(
      'Unsupported type relational for attribute x.'
    );
  });

  test('rejects truncated declarations', () => {
    expect(() => parseAttributeDeclaration('@attribute x')).toThrow(ParseError);
  });
});
