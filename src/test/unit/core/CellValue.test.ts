/**
 * CellValue Tests
 * Tests for turning raw reader values into fragment strings
 */

import { describe, expect, it } from 'vitest';
import {
  CellValue,
  fromCsvField,
  fromUnknown,
  safeStringConversion,
  toFragmentText,
} from '../../../lib/CellValue/CellValue.js';

describe('safeStringConversion', () => {
  it.each([
    ['hello', 'hello'],
    [123, '123'],
    [123.0, '123'],
    [123.45, '123.45'],
    [null, ''],
    [undefined, ''],
    ['', ''],
    ['  spaced  ', 'spaced'],
    [Number.NaN, ''],
    [Number.POSITIVE_INFINITY, ''],
    [-7, '-7'],
    [true, 'true'],
  ])('should convert %j to %j', (input, expected) => {
    expect(safeStringConversion(input)).toBe(expected);
  });

  it('should print large whole numbers without exponent notation', () => {
    expect(safeStringConversion(1e21)).toBe('1000000000000000000000');
  });
});

describe('fromUnknown', () => {
  it('should tag each kind of value', () => {
    expect(fromUnknown(null)._tag).toBe('Missing');
    expect(fromUnknown(4)._tag).toBe('Numeric');
    expect(fromUnknown('x')._tag).toBe('Text');
    expect(fromUnknown({})).toEqual(CellValue.Text({ value: '[object Object]' }));
  });
});

describe('fromCsvField', () => {
  it('should treat blank and absent fields as missing', () => {
    expect(fromCsvField(undefined)._tag).toBe('Missing');
    expect(fromCsvField('   ')._tag).toBe('Missing');
  });

  it('should read decimal numbers as numeric', () => {
    expect(toFragmentText(fromCsvField('123.0'))).toBe('123');
    expect(toFragmentText(fromCsvField(' 2.50 '))).toBe('2.5');
    expect(toFragmentText(fromCsvField('1e3'))).toBe('1000');
    expect(toFragmentText(fromCsvField('-.5'))).toBe('-0.5');
  });

  it('should keep everything else as text', () => {
    expect(fromCsvField('http://example.com')).toEqual(
      CellValue.Text({ value: 'http://example.com' })
    );
    expect(fromCsvField('1.2.3')._tag).toBe('Text');
    expect(fromCsvField('0x10')._tag).toBe('Text');
  });
});
