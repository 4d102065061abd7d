/**
 * Tests for the attribute registry
 */

import { describe, expect, test } from 'vitest';
import { ArffSchema, SchemaError } from '../../src';
import { stripQuotes } from '../../src/schema';

describe('ArffSchema', () => {
  test('builds from declarations', () => {
    const schema = new ArffSchema('weather', [
      ["'temperature'", 'real'],
      ['outlook', ['sunny', 'rainy']],
    ]);

    expect(schema.relation).toBe('weather');
    expect(schema.names).toEqual(['temperature', 'outlook']);
    expect(schema.kindOf('temperature')).toBe('numeric');
    expect([...schema.nominalValues('outlook')]).toEqual(['sunny', 'rainy']);
  });

  test('strips one pair of surrounding quotes', () => {
    expect(stripQuotes("'sky color'")).toBe('sky color');
    expect(stripQuotes('"x"')).toBe('x');
  });

  test('rejects duplicate attributes', () => {
    const schema = new ArffSchema('r', [['a', 'numeric']]);
    expect(() => schema.defineAttribute('a', 'string')).toThrow(SchemaError);
  });

  test('keeps date patterns', () => {
    const schema = new ArffSchema();
    schema.defineAttribute('when', 'date', 'yyyy-MM-dd');
    expect(schema.attribute('when')).toEqual({ name: 'when', kind: 'date', pattern: 'yyyy-MM-dd' });
  });

  describe('class attribute', () => {
    test('moves the class attribute last and keeps it there', () => {
      const schema = new ArffSchema('r', [
        ['a', 'numeric'],
        ['b', 'numeric'],
        ['c', 'numeric'],
      ]);

      schema.setClass('a');
      expect(schema.names).toEqual(['b', 'c', 'a']);

      schema.defineAttribute('d', 'string');
      expect(schema.names).toEqual(['b', 'c', 'd', 'a']);
      expect(schema.classAttribute).toBe('a');
    });

    test('rejects a second class attribute', () => {
      const schema = new ArffSchema('r', [
        ['a', 'numeric'],
        ['b', 'numeric'],
      ]);
      schema.designateClass('a');
      schema.designateClass('a');

      expect(() => schema.designateClass('b')).toThrow(
        'Attempting to set class to "b" when it has already been set to "a"'
      );
    });

    test('rejects unknown attributes', () => {
      expect(() => new ArffSchema().setClass('missing')).toThrow(SchemaError);
    });
  });

  test('alphabetizes with the class attribute last', () => {
    const schema = new ArffSchema('r', [
      ['zeta', 'numeric'],
      ['cls', ['y', 'n']],
      ['alpha', 'string'],
    ]);
    schema.setClass('cls');
    expect(schema.names).toEqual(['zeta', 'alpha', 'cls']);

    schema.alphabetize();
    expect(schema.names).toEqual(['alpha', 'zeta', 'cls']);
  });

  test('sorts nominal values for the header without the missing marker', () => {
    const schema = new ArffSchema('r', [['c', ['b', '?', 'a']]]);
    expect(schema.sortedNominalValues('c')).toEqual(['a', 'b']);
  });

  test('unions nominal values', () => {
    const schema = new ArffSchema('r', [['c', ['a']]]);
    schema.setNominalValues('c', ['b', 'a']);
    expect([...schema.nominalValues('c')]).toEqual(['a', 'b']);
    expect(() => schema.setNominalValues('missing', ['x'])).toThrow(SchemaError);
  });

  describe('frozen', () => {
    test('rejects changes to the header', () => {
      const schema = new ArffSchema('r', [
        ['a', 'numeric'],
        ['c', ['x']],
      ]);
      schema.freeze();

      expect(() => schema.defineAttribute('b', 'string')).toThrow(
        'Cannot define attribute "b": the schema has already been flushed to an open stream'
      );
      expect(schema.addNominalValue('c', 'x')).toBe(false);
      expect(() => schema.addNominalValue('c', 'y')).toThrow(SchemaError);
      expect(() => schema.designateClass('a')).toThrow(SchemaError);
    });

    test('allows designating the last attribute', () => {
      const schema = new ArffSchema('r', [
        ['a', 'numeric'],
        ['c', ['x']],
      ]);
      schema.freeze();
      schema.designateClass('c');
      expect(schema.classAttribute).toBe('c');
    });
  });

  test('copies deeply and unfrozen', () => {
    const schema = new ArffSchema('r', [['c', ['x']]]);
    schema.freeze();

    const copy = schema.copy();
    copy.addNominalValue('c', 'y');
    copy.defineAttribute('d', 'integer');

    expect(copy.isFrozen).toBe(false);
    expect([...schema.nominalValues('c')]).toEqual(['x']);
    expect(schema.names).toEqual(['c']);
  });
});
