import { describe, expect, it } from '@jest/globals';
import {
  convertTextCell,
  inferTextColumnType,
  inferValueColumnType,
  isSortableType,
  normalizeDeclaredType,
} from '@utils/column-types';

describe('normalizeDeclaredType', () => {
  it.each([
    ['VARCHAR(20)', 'text'],
    ['BIGINT', 'numeric'],
    ['DOUBLE PRECISION', 'numeric'],
    ['DECIMAL(10,2)', 'numeric'],
    ['BLOB', 'blob'],
    ['DATETIME', 'temporal'],
    ['boolean', 'boolean'],
    ['JSON', 'text'],
    ['', 'text'],
  ])('maps %s to %s', (declared, expected) => {
    expect(normalizeDeclaredType(declared)).toBe(expected);
  });
});

describe('inferTextColumnType', () => {
  it('infers numbers, booleans and ISO dates', () => {
    expect(inferTextColumnType(['1', '-2.5', '', '3e2'])).toBe('numeric');
    expect(inferTextColumnType(['TRUE', 'false'])).toBe('boolean');
    expect(inferTextColumnType(['2020-01-01', '2020-01-02T10:00:00Z'])).toBe('temporal');
  });

  it('falls back to text', () => {
    expect(inferTextColumnType(['1', 'a'])).toBe('text');
    expect(inferTextColumnType(['', '  '])).toBe('text');
  });
});

describe('convertTextCell', () => {
  it('converts by column type', () => {
    expect(convertTextCell('  ', 'numeric')).toBeNull();
    expect(convertTextCell('42', 'numeric')).toBe(42);
    expect(convertTextCell('True', 'boolean')).toBe(true);
    expect(convertTextCell('2020-01-01', 'temporal')).toBe('2020-01-01');
    expect(convertTextCell(' padded ', 'text')).toBe(' padded ');
  });
});

describe('inferValueColumnType', () => {
  it('infers from typed cells', () => {
    expect(inferValueColumnType([1, null, 2])).toBe('numeric');
    expect(inferValueColumnType([true, false])).toBe('boolean');
    expect(inferValueColumnType([new Date(0)])).toBe('temporal');
    expect(inferValueColumnType([new Uint8Array([1])])).toBe('blob');
    expect(inferValueColumnType([1, 'a'])).toBe('text');
    expect(inferValueColumnType([])).toBe('text');
  });

  it('treats only blobs as unsortable', () => {
    expect(isSortableType('blob')).toBe(false);
    expect(isSortableType('temporal')).toBe(true);
  });
});
