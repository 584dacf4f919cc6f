/**
 * Tests for the CSV codec
 */

import { describe, it, expect } from '@jest/globals';
import { InvalidSchemaError } from '../errors/index.js';
import { parseCsv, serializeCsv } from './csv.js';
import { RecordTable, col } from './record-table.js';

describe('parseCsv', () => {
  it('infers column types and reads blank cells as null', () => {
    const table = parseCsv('a,b\n1,x\n2,\n');

    expect(table.columns).toEqual([col('a', 'integer'), col('b', 'string')]);
    expect(table.toObjects()).toEqual([
      { a: 1, b: 'x' },
      { a: 2, b: null },
    ]);
  });

  it('pads short rows with nulls', () => {
    const table = parseCsv('a,b,c\n1,2\n');

    expect(table.toObjects()).toEqual([{ a: 1, b: 2, c: null }]);
    expect(table.column('c')?.type).toBe('string');
  });

  it('rejects rows with more fields than the header', () => {
    expect(() => parseCsv('a,b\n1,2,3\n')).toThrow('CSV row 1 has 3 fields, header has 2');
  });

  it('coerces to declared columns in declared order', () => {
    const table = parseCsv('b,a\n1.5,2\n', [col('a', 'integer'), col('b', 'float')]);

    expect(table.columnNames).toEqual(['a', 'b']);
    expect(table.toObjects()).toEqual([{ a: 2, b: 1.5 }]);
  });

  it('rejects a header that differs from the declared columns', () => {
    expect(() => parseCsv('a,c\n1,2\n', [col('a', 'integer'), col('b', 'float')])).toThrow(
      'CSV header does not match the declared columns; missing: b; unexpected: c'
    );
  });

  it('rejects cells that do not fit the declared type', () => {
    expect(() => parseCsv('a\nx\n', [col('a', 'integer')])).toThrow('CSV row 1: "x" in column "a" is not a integer');
  });

  it('keeps a blank line inside a single-column table as a null row', () => {
    const table = parseCsv('a\n1\n\n2\n');

    expect(table.numericValues('a')).toEqual([1, 2]);
    expect(table.values('a')).toEqual([1, null, 2]);
  });

  it('strips a byte-order mark', () => {
    expect(parseCsv('\uFEFFa\n1\n').columnNames).toEqual(['a']);
  });

  it('returns an empty table for empty text', () => {
    expect(parseCsv('').rowCount).toBe(0);
    expect(parseCsv('', [col('a', 'float')]).columnNames).toEqual(['a']);
  });

  it('rejects unterminated quotes', () => {
    expect(() => parseCsv('a,b\n"1,2\n')).toThrow(InvalidSchemaError);
  });
});

describe('serializeCsv', () => {
  it('writes a header, quotes delimiters and leaves nulls blank', () => {
    const table = RecordTable.fromRows(
      [col('a', 'integer'), col('b', 'string')],
      [
        { a: 1, b: 'x, y' },
        { a: 2, b: null },
      ]
    );

    expect(serializeCsv(table)).toBe('a,b\n1,"x, y"\n2,\n');
  });

  it('reads back what it writes', () => {
    const table = RecordTable.fromRows(
      [col('price', 'float'), col('label', 'string'), col('day', 'date')],
      [
        { price: 1.25, label: 'say "hi"', day: '2024-01-31' },
        { price: null, label: 'plain', day: null },
      ]
    );

    expect(parseCsv(serializeCsv(table), table.columns).toObjects()).toEqual(table.toObjects());
  });
});
