/**
 * Record Table
 *
 * The in-memory tabular structure passed between stages: an ordered list of
 * rows over a declared column list. The shape and value types of every row are
 * checked once, when the table is constructed, so a missing or mistyped column
 * surfaces as an InvalidSchemaError instead of a late runtime fault.
 *
 * Tables are immutable. Every transformation returns a new table.
 *
 * @module table/record-table
 */

import { InvalidSchemaError, UnknownColumnError } from '../errors/index.js';
import { isNumericType, type ColumnDef, type ColumnType } from '../schemas/table.js';
import { conformsTo, inferValueColumnType, type CellValue } from './coerce.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One row: column name to cell value.
 */
export type Row = Readonly<Record<string, CellValue>>;

// ============================================================================
// Record Table
// ============================================================================

/**
 * Immutable, schema-checked table.
 *
 * @example
 * ```typescript
 * const table = RecordTable.fromRows(
 *   [{ name: 'MedInc', type: 'float' }, { name: 'year', type: 'integer' }],
 *   [{ MedInc: 3.2, year: 2024 }]
 * );
 * table.numericValues('MedInc'); // [3.2]
 * ```
 */
export class RecordTable {
  private readonly index: ReadonlyMap<string, ColumnDef>;

  private constructor(
    readonly columns: readonly ColumnDef[],
    readonly rows: readonly Row[]
  ) {
    this.index = new Map(columns.map((column) => [column.name, column]));
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Build a table, validating every row against the column list.
   *
   * @throws InvalidSchemaError on duplicate column names, rows whose keys differ
   *   from the columns, or values that do not conform to their column type
   */
  static fromRows(
    columns: readonly ColumnDef[],
    rows: readonly Readonly<Record<string, CellValue>>[]
  ): RecordTable {
    const frozenColumns = validateColumns(columns);
    const names = frozenColumns.map((column) => column.name);

    const checked = rows.map((row, rowIndex) => {
      const keys = Object.keys(row);
      if (keys.length !== names.length || !names.every((name) => Object.hasOwn(row, name))) {
        const missing = names.filter((name) => !Object.hasOwn(row, name));
        const extra = keys.filter((key) => !names.includes(key));
        throw new InvalidSchemaError(
          `Row ${rowIndex} does not match the table columns` +
            (missing.length > 0 ? `; missing: ${missing.join(', ')}` : '') +
            (extra.length > 0 ? `; unexpected: ${extra.join(', ')}` : ''),
          [...missing, ...extra]
        );
      }

      const copy: Record<string, CellValue> = {};
      for (const column of frozenColumns) {
        const value = row[column.name];
        if (!conformsTo(value, column.type)) {
          throw new InvalidSchemaError(
            `Row ${rowIndex}: value ${JSON.stringify(value)} in column "${column.name}" is not a ${column.type}`,
            [column.name]
          );
        }
        copy[column.name] = value;
      }
      return Object.freeze(copy);
    });

    return new RecordTable(frozenColumns, Object.freeze(checked));
  }

  /**
   * Build a table from plain objects, inferring each column's type from its values.
   * Column order follows the first row.
   *
   * @throws InvalidSchemaError when a column mixes numbers and strings
   */
  static infer(rows: readonly Readonly<Record<string, CellValue>>[]): RecordTable {
    const names = rows.length > 0 ? Object.keys(rows[0]) : [];
    const columns = names.map((name): ColumnDef => {
      const type = inferValueColumnType(rows.map((row) => row[name] ?? null));
      if (type === null) {
        throw new InvalidSchemaError(`Column "${name}" mixes numbers and strings`, [name]);
      }
      return { name, type };
    });
    return RecordTable.fromRows(columns, rows);
  }

  /**
   * An empty table over the given columns.
   */
  static empty(columns: readonly ColumnDef[]): RecordTable {
    return RecordTable.fromRows(columns, []);
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get rowCount(): number {
    return this.rows.length;
  }

  get columnNames(): string[] {
    return this.columns.map((column) => column.name);
  }

  hasColumn(name: string): boolean {
    return this.index.has(name);
  }

  column(name: string): ColumnDef | undefined {
    return this.index.get(name);
  }

  /**
   * Look up a column that must exist.
   *
   * @param context - What referenced the column, for the error message
   * @throws UnknownColumnError
   */
  requireColumn(name: string, context: string): ColumnDef {
    const column = this.index.get(name);
    if (!column) {
      throw new UnknownColumnError(name, context);
    }
    return column;
  }

  /**
   * Names of the integer and float columns, in column order.
   */
  numericColumnNames(): string[] {
    return this.columns.filter((column) => isNumericType(column.type)).map((column) => column.name);
  }

  /**
   * All values of a column, in row order.
   */
  values(name: string): CellValue[] {
    this.requireColumn(name, 'values()');
    return this.rows.map((row) => row[name] ?? null);
  }

  /**
   * Non-null numeric values of a column, in row order.
   */
  numericValues(name: string): number[] {
    return this.values(name).filter((value): value is number => typeof value === 'number');
  }

  // ==========================================================================
  // Transformations
  // ==========================================================================

  /**
   * Keep the rows matching a predicate. Column definitions are unchanged.
   */
  filter(predicate: (row: Row, index: number) => boolean): RecordTable {
    return new RecordTable(this.columns, Object.freeze(this.rows.filter(predicate)));
  }

  /**
   * Append a column (or replace one of the same name) with one value per row.
   *
   * @throws InvalidSchemaError when the value count or types do not match
   */
  withColumn(column: ColumnDef, values: readonly CellValue[]): RecordTable {
    if (values.length !== this.rows.length) {
      throw new InvalidSchemaError(
        `Column "${column.name}" has ${values.length} values for ${this.rows.length} rows`,
        [column.name]
      );
    }

    const replacing = this.index.has(column.name);
    const columns = replacing
      ? this.columns.map((existing) => (existing.name === column.name ? column : existing))
      : [...this.columns, column];
    const rows = this.rows.map((row, index) => ({ ...row, [column.name]: values[index] }));

    return RecordTable.fromRows(columns, rows);
  }

  /**
   * Remove columns by name. Unknown names are ignored.
   */
  withoutColumns(names: readonly string[]): RecordTable {
    if (names.length === 0) {
      return this;
    }
    const drop = new Set(names);
    const columns = this.columns.filter((column) => !drop.has(column.name));
    const rows = this.rows.map((row) => {
      const copy: Record<string, CellValue> = {};
      for (const column of columns) {
        copy[column.name] = row[column.name] ?? null;
      }
      return Object.freeze(copy);
    });
    return new RecordTable(columns, Object.freeze(rows));
  }

  /**
   * Plain-object copy of the rows.
   */
  toObjects(): Record<string, CellValue>[] {
    return this.rows.map((row) => ({ ...row }));
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Stable key of a row over the given columns; rows identical across all
 * columns share a key. Numbers and their string forms stay distinct.
 */
export function rowKey(row: Row, columnNames: readonly string[]): string {
  return JSON.stringify(columnNames.map((name) => row[name] ?? null));
}

/**
 * Whether a column type is numeric.
 */
export function isNumericColumn(column: ColumnDef): boolean {
  return isNumericType(column.type);
}

/**
 * Shorthand for a column definition.
 */
export function col(name: string, type: ColumnType): ColumnDef {
  return { name, type };
}

function validateColumns(columns: readonly ColumnDef[]): readonly ColumnDef[] {
  const seen = new Set<string>();
  for (const column of columns) {
    if (column.name.length === 0) {
      throw new InvalidSchemaError('Column names must not be empty');
    }
    if (seen.has(column.name)) {
      throw new InvalidSchemaError(`Duplicate column name: ${column.name}`, [column.name]);
    }
    seen.add(column.name);
  }
  return Object.freeze(columns.map((column) => Object.freeze({ name: column.name, type: column.type })));
}
