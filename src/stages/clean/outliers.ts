/**
 * IQR Outlier Removal
 *
 * For each monitored column, Q1 and Q3 are taken over its non-null values and
 * rows outside [Q1 - k*IQR, Q3 + k*IQR] are dropped. Fences for all monitored
 * columns are computed on the same table, so the result does not depend on
 * column order. Removing rows moves the quartiles, so the pass repeats on the
 * survivors until nothing is flagged; cleaning a clean table then drops nothing.
 * A later pass can drop rows that sat inside the first fence. Those rows are
 * counted as outliers like any other.
 *
 * @module stages/clean/outliers
 */

import { InvalidSchemaError } from '../../errors/index.js';
import type { DeepReadonly, OutlierPolicy } from '../../schemas/pipeline-config.js';
import { isNumericType } from '../../schemas/table.js';
import type { RecordTable, Row } from '../../table/record-table.js';
import { quartiles } from '../../table/stats.js';
import type { OutlierFence } from './types.js';

/**
 * Result of outlier removal.
 */
export interface OutlierResult {
  table: RecordTable;
  removed: number;
  /** Fences of the final pass, by column */
  fences: Record<string, OutlierFence>;
  passes: number;
}

/**
 * Compute the IQR fence of one column, or null when it has no values.
 */
export function computeFence(values: readonly number[], threshold: number): OutlierFence | null {
  if (values.length === 0) {
    return null;
  }
  const { q1, q3, iqr } = quartiles(values);
  return { q1, q3, iqr, lower: q1 - threshold * iqr, upper: q3 + threshold * iqr };
}

/**
 * Fences for every monitored column over the same table.
 *
 * @throws UnknownColumnError for a monitored column the table lacks
 * @throws InvalidSchemaError for a monitored column that is not numeric
 */
export function computeFences(
  table: RecordTable,
  policy: DeepReadonly<OutlierPolicy>
): Record<string, OutlierFence> {
  const fences: Record<string, OutlierFence> = {};
  for (const name of policy.columns) {
    const column = table.requireColumn(name, 'outlier policy');
    if (!isNumericType(column.type)) {
      throw new InvalidSchemaError(`Outlier column "${name}" is ${column.type}, not numeric`, [name]);
    }
    const fence = computeFence(table.numericValues(name), policy.threshold);
    if (fence) {
      fences[name] = fence;
    }
  }
  return fences;
}

/**
 * Whether a row lies outside any fence. Nulls are never outliers.
 */
export function isOutlier(row: Row, fences: Readonly<Record<string, OutlierFence>>): boolean {
  return Object.entries(fences).some(([name, fence]) => {
    const value = row[name];
    return typeof value === 'number' && (value < fence.lower || value > fence.upper);
  });
}

/**
 * Remove outliers until a pass flags no row.
 */
export function removeOutliers(table: RecordTable, policy: DeepReadonly<OutlierPolicy>): OutlierResult {
  let current = table;
  let passes = 0;

  for (;;) {
    const fences = computeFences(current, policy);
    passes++;

    const survivors = current.filter((row) => !isOutlier(row, fences));
    if (survivors.rowCount === current.rowCount) {
      return { table: current, removed: table.rowCount - current.rowCount, fences, passes };
    }
    current = survivors;
  }
}
