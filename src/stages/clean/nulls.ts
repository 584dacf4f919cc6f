/**
 * Null Filling
 *
 * Replaces nulls in optional columns by their configured fill. Required
 * columns are never defaulted; rows missing a required value were dropped
 * during validation.
 *
 * @module stages/clean/nulls
 */

import { InvalidConfigError } from '../../errors/index.js';
import type { DatasetColumn, DeepReadonly, Dataset } from '../../schemas/pipeline-config.js';
import { isNumericType, type ColumnDef } from '../../schemas/table.js';
import { conformsTo, type CellValue } from '../../table/coerce.js';
import type { RecordTable } from '../../table/record-table.js';
import { mean } from '../../table/stats.js';

/**
 * Value a null in `column` is replaced with.
 *
 * `mean` is taken over the column's current non-null values (0 when there are
 * none) and rounded for integer columns.
 *
 * @throws InvalidConfigError when the fill does not suit the column type
 */
export function resolveFillValue(
  spec: DeepReadonly<DatasetColumn>,
  column: ColumnDef,
  table: RecordTable
): CellValue {
  const fill = spec.fill;
  if (fill === undefined) {
    return null;
  }

  const numeric = isNumericType(column.type);
  const mismatch = (what: string) =>
    new InvalidConfigError(`Fill "${what}" does not suit ${column.type} column "${column.name}"`);

  if (fill === 'zero') {
    if (!numeric) throw mismatch(fill);
    return 0;
  }
  if (fill === 'mean') {
    if (!numeric) throw mismatch(fill);
    const avg = mean(table.numericValues(column.name)) ?? 0;
    return column.type === 'integer' ? Math.round(avg) : avg;
  }
  if (fill === 'unknown') {
    if (column.type !== 'string') throw mismatch(fill);
    return 'unknown';
  }
  if (!conformsTo(fill.constant, column.type)) {
    throw mismatch(String(fill.constant));
  }
  return fill.constant;
}

/**
 * Fill nulls in every optional column that has a fill policy.
 *
 * @returns the filled table and the number of cells filled
 */
export function fillNulls(
  table: RecordTable,
  dataset: DeepReadonly<Dataset>
): { table: RecordTable; filled: number } {
  let current = table;
  let filled = 0;

  for (const spec of dataset.columns) {
    const column = current.column(spec.name);
    if (spec.required || spec.fill === undefined || !column) {
      continue;
    }

    const values = current.values(column.name);
    const nulls = values.filter((value) => value === null).length;
    if (nulls === 0) {
      continue;
    }

    const replacement = resolveFillValue(spec, column, current);
    current = current.withColumn(
      column,
      values.map((value) => (value === null ? replacement : value))
    );
    filled += nulls;
  }

  return { table: current, filled };
}
