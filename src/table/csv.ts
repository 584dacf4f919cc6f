/**
 * CSV Codec
 *
 * Reads and writes Record Tables as comma-separated text using papaparse.
 * Blank cells are null. With known column definitions each cell is coerced to
 * its declared type; without them the types are inferred from the text.
 *
 * @module table/csv
 */

import Papa from 'papaparse';
import { InvalidSchemaError } from '../errors/index.js';
import type { ColumnDef } from '../schemas/table.js';
import { coerceCell, inferTextColumnType, type CellValue } from './coerce.js';
import { RecordTable } from './record-table.js';

/**
 * Parse CSV text into a Record Table.
 *
 * Short rows are padded with nulls (missing values reach the cleaner as
 * nulls); rows with more fields than the header are rejected.
 *
 * @param text - CSV text with a header row
 * @param columns - Column definitions to coerce against; inferred when omitted
 * @throws InvalidSchemaError on malformed CSV, a header that does not match
 *   `columns`, or a cell that cannot be coerced to its declared type
 */
export function parseCsv(text: string, columns?: readonly ColumnDef[]): RecordTable {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    delimiter: ',',
    skipEmptyLines: false,
  });

  const fatal = parsed.errors.find((error) => error.type === 'Quotes');
  if (fatal) {
    throw new InvalidSchemaError(`Malformed CSV at row ${fatal.row ?? '?'}: ${fatal.message}`);
  }

  const [headerRow, ...records] = parsed.data;
  if (!headerRow || isBlankLine(headerRow)) {
    return RecordTable.empty(columns ?? []);
  }

  const header = headerRow.map((name) => name.trim());
  // A blank line is a row of one null only in a single-column table
  const body = records.filter(
    (fields, i) => !(isBlankLine(fields) && (header.length > 1 || i === records.length - 1))
  );

  const cells = body.map((fields, rowIndex) => {
    if (fields.length > header.length) {
      throw new InvalidSchemaError(
        `CSV row ${rowIndex + 1} has ${fields.length} fields, header has ${header.length}`
      );
    }
    return header.map((_, i): string | null => (i < fields.length ? fields[i] : null));
  });

  const resolved = columns ? matchHeader(header, columns) : inferColumns(header, cells);

  const rows = cells.map((fields, rowIndex) => {
    const row: Record<string, CellValue> = {};
    header.forEach((name, i) => {
      const type = resolved.byName.get(name) ?? 'string';
      const result = coerceCell(fields[i], type);
      if (!result.ok) {
        throw new InvalidSchemaError(
          `CSV row ${rowIndex + 1}: "${fields[i] ?? ''}" in column "${name}" is not a ${type}`,
          [name]
        );
      }
      row[name] = result.value;
    });
    return row;
  });

  return RecordTable.fromRows(resolved.columns, rows);
}

/**
 * Serialize a Record Table to CSV text (header row first, trailing newline).
 * Nulls are written as blank cells.
 */
export function serializeCsv(table: RecordTable): string {
  const fields = table.columnNames;
  const data = table.rows.map((row) => fields.map((name) => row[name] ?? ''));
  return `${Papa.unparse({ fields, data }, { newline: '\n' })}\n`;
}

// ============================================================================
// Helpers
// ============================================================================

function isBlankLine(fields: readonly string[]): boolean {
  return fields.length === 1 && fields[0] === '';
}

interface ResolvedColumns {
  columns: readonly ColumnDef[];
  byName: ReadonlyMap<string, ColumnDef['type']>;
}

function matchHeader(header: readonly string[], columns: readonly ColumnDef[]): ResolvedColumns {
  const expected = columns.map((column) => column.name);
  const missing = expected.filter((name) => !header.includes(name));
  const extra = header.filter((name) => !expected.includes(name));
  if (missing.length > 0 || extra.length > 0) {
    throw new InvalidSchemaError(
      `CSV header does not match the declared columns` +
        (missing.length > 0 ? `; missing: ${missing.join(', ')}` : '') +
        (extra.length > 0 ? `; unexpected: ${extra.join(', ')}` : ''),
      [...missing, ...extra]
    );
  }
  return {
    columns,
    byName: new Map(columns.map((column) => [column.name, column.type])),
  };
}

function inferColumns(header: readonly string[], cells: readonly (string | null)[][]): ResolvedColumns {
  const columns = header.map(
    (name, i): ColumnDef => ({ name, type: inferTextColumnType(cells.map((fields) => fields[i])) })
  );
  return {
    columns,
    byName: new Map(columns.map((column) => [column.name, column.type])),
  };
}
