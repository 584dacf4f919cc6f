/**
 * Schema Validation
 *
 * Checks a raw table against the dataset's declared columns and coerces every
 * cell to its declared type. Missing required columns are fatal; bad rows are
 * excluded and counted.
 *
 * @module stages/clean/validate
 */

import { InvalidSchemaError } from '../../errors/index.js';
import type { Dataset, DeepReadonly } from '../../schemas/pipeline-config.js';
import type { ColumnDef } from '../../schemas/table.js';
import { coerceCell, type CellValue } from '../../table/coerce.js';
import { RecordTable } from '../../table/record-table.js';

/**
 * Result of schema validation.
 */
export interface ValidateResult {
  table: RecordTable;
  /** Rows with a required value that could not be coerced */
  invalidValue: number;
  /** Rows with a null required value */
  missingRequired: number;
}

/**
 * Drop columns whose values are all null, unless the dataset marks them required.
 * A table without rows keeps every column.
 */
export function dropEmptyColumns(
  table: RecordTable,
  dataset: DeepReadonly<Dataset>
): { table: RecordTable; dropped: string[] } {
  if (table.rowCount === 0) {
    return { table, dropped: [] };
  }

  const required = new Set(dataset.columns.filter((c) => c.required).map((c) => c.name));
  const dropped = table.columnNames.filter(
    (name) => !required.has(name) && table.values(name).every((value) => value === null)
  );

  return { table: table.withoutColumns(dropped), dropped };
}

/**
 * Validate a table against the dataset columns.
 *
 * Undeclared columns pass through unchanged. Declared optional columns that are
 * absent stay absent. A cell that cannot be coerced drops its row when the
 * column is required and becomes null otherwise.
 *
 * @throws InvalidSchemaError when required columns are absent
 */
export function validateSchema(table: RecordTable, dataset: DeepReadonly<Dataset>): ValidateResult {
  const missing = dataset.columns
    .filter((column) => column.required && !table.hasColumn(column.name))
    .map((column) => column.name);
  if (missing.length > 0) {
    throw new InvalidSchemaError(`Missing required columns: ${missing.join(', ')}`, missing);
  }

  const declared = new Map(dataset.columns.map((column) => [column.name, column]));
  const columns = table.columns.map((column): ColumnDef => {
    const spec = declared.get(column.name);
    return spec ? { name: column.name, type: spec.type } : column;
  });

  let invalidValue = 0;
  let missingRequired = 0;
  const rows: Record<string, CellValue>[] = [];

  for (const row of table.rows) {
    const out: Record<string, CellValue> = {};
    let invalid = false;
    let incomplete = false;

    for (const column of columns) {
      const raw = row[column.name] ?? null;
      const required = declared.get(column.name)?.required ?? false;
      const result = coerceCell(raw, column.type);

      if (!result.ok) {
        if (required) invalid = true;
        out[column.name] = null;
        continue;
      }
      if (required && result.value === null) {
        incomplete = true;
      }
      out[column.name] = result.value;
    }

    if (invalid) {
      invalidValue++;
    } else if (incomplete) {
      missingRequired++;
    } else {
      rows.push(out);
    }
  }

  return { table: RecordTable.fromRows(columns, rows), invalidValue, missingRequired };
}
