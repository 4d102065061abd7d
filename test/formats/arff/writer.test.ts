/**
 * Tests for header, dense and sparse writing
 */

import { Decimal } from 'decimal.js';
import { describe, expect, test } from 'vitest';
import {
  ArffSchema,
  ArffWriter,
  dateValue,
  nominalValue,
  ValidationError,
} from '../../../src';
import type { ArffWriterOptions } from '../../../src';
import { quoteName, quoteToken } from '../../../src/formats/arff';

function weatherSchema(): ArffSchema {
  return new ArffSchema('weather', [
    ['temperature', 'numeric'],
    ['outlook', ['sunny', 'rainy', '?']],
    ['note', 'string'],
    ['when', 'date'],
  ]);
}

describe('quoting', () => {
  test('wraps names in single quotes', () => {
    expect(quoteName('temperature')).toBe("'temperature'");
    expect(quoteName('sky color')).toBe("'sky color'");
  });

  test('quotes tokens with whitespace once', () => {
    expect(quoteToken('light rain')).toBe('"light rain"');
    expect(quoteToken('"light rain"')).toBe('"light rain"');
    expect(quoteToken('sunny')).toBe('sunny');
  });
});

describe('header', () => {
  test('writes comment, relation and attributes', () => {
    const writer = new ArffWriter(weatherSchema());

    expect(writer.headerLines('generated\nby tests')).toEqual([
      '% generated',
      '% by tests',
      '@relation weather',
      "@attribute 'temperature' numeric",
      "@attribute 'outlook' {rainy,sunny}",
      "@attribute 'note' string",
      "@attribute 'when' date \"yyyy-MM-dd HH:mm:ss\"",
    ]);
  });

  test('skips an empty comment', () => {
    const writer = new ArffWriter(new ArffSchema('r', [['n', 'integer']]));
    expect(writer.headerLines('')).toEqual(['@relation r', "@attribute 'n' integer"]);
  });
});

describe('sparse rows', () => {
  const writer = new ArffWriter(weatherSchema());

  test('writes present columns by index', () => {
    expect(writer.formatRow({ temperature: 1.5, outlook: 'sunny' })).toBe('{0 1.5, 1 sunny}');
  });

  test('drops nominal values outside the declared set', () => {
    expect(writer.formatRow({ temperature: 2.5, outlook: 'cloudy' })).toBe('{0 2.5}');
    expect(writer.formatRow({ outlook: nominalValue('cloudy') })).toBeUndefined();
  });

  test('drops rows holding only a missing value', () => {
    expect(writer.formatRow({ outlook: '?' })).toBeUndefined();
    expect(writer.formatRow({})).toBeUndefined();
    expect(writer.formatRow({ temperature: '?', outlook: '?' })).toBe('{0 ?, 1 ?}');
  });

  test('double-quotes string values', () => {
    expect(writer.formatRow({ note: 'hello world' })).toBe('{2 "hello world"}');
    expect(writer.formatRow({ note: 'calm' })).toBe('{2 "calm"}');
  });

  test('formats dates with the declared pattern', () => {
    expect(writer.formatRow({ when: '2020-01-02 03:04:05' })).toBe('{3 "2020-01-02 03:04:05"}');

    const schema = new ArffSchema('r');
    schema.defineAttribute('day', 'date', 'yyyy/MM/dd');
    const dated = new ArffWriter(schema);
    expect(dated.formatRow({ day: dateValue(new Date(2021, 5, 7, 8, 9, 10)) })).toBe('{0 2021/06/07}');
    expect(dated.formatAttribute({ name: 'day', kind: 'date', pattern: 'yyyy/MM/dd' })).toBe(
      "@attribute 'day' date \"yyyy/MM/dd\""
    );
  });

  test('converts positional rows using schema order', () => {
    expect(writer.formatRow([new Decimal('1.50'), 'rainy', '?', '?'])).toBe('{0 1.5, 1 rainy, 2 ?, 3 ?}');
  });
});

describe('dense rows', () => {
  const schema = new ArffSchema('d', [
    ['count', 'integer'],
    ['temperature', 'numeric'],
    ['note', 'string'],
    ['outlook', ['sunny', 'rainy']],
  ]);
  const writer = new ArffWriter(schema, { format: 'dense' });

  test('writes values in schema order', () => {
    expect(writer.formatRow([3, new Decimal('21.50'), "it's", 'sunny'])).toBe("3,21.5,'it's',sunny");
  });

  test('writes missing markers bare', () => {
    expect(writer.formatRow(['?', '?', '?', '?'])).toBe('?,?,?,?');
  });

  test('rejects name-keyed rows and short rows', () => {
    expect(() => writer.formatRow({ count: 1 })).toThrow('Dense writing requires positional rows');
    expect(() => writer.formatRow([1])).toThrow(ValidationError);
  });

  test('rejects date attributes', () => {
    const dated = new ArffWriter(new ArffSchema('r', [['when', 'date']]), { format: 'dense' });
    expect(() => dated.formatRow(['2020-01-02'])).toThrow(
      'Type date of attribute when not supported for dense writing'
    );
  });
});

describe('formatDocument', () => {
  test('joins header, data marker and rows with the line ending', () => {
    const writer = new ArffWriter(new ArffSchema('r', [['n', 'integer']]), { lineEnding: '\r\n' });

    expect(writer.formatDocument('', [[1], { n: '?' }, { n: 2 }])).toBe(
      "@relation r\r\n@attribute 'n' integer\r\n@data\r\n{0 1}\r\n{0 2}\r\n"
    );
  });

  test('rejects invalid options', () => {
    const options: ArffWriterOptions = JSON.parse('{"format":"csv"}');
    expect(() => new ArffWriter(new ArffSchema(), options)).toThrow(ValidationError);
  });
});
