/**
 * Report Aggregate
 *
 * Computes the one summary both report formats render: metadata, data
 * quality, per-column statistics, category breakdowns and correlations
 * against the target column.
 *
 * @module stages/report/aggregate
 */

import type { DeepReadonly, ReportOptions } from '../../schemas/pipeline-config.js';
import type { RecordTable } from '../../table/record-table.js';
import { mean, pearson, quantileSorted, sampleStd, sortAscending } from '../../table/stats.js';
import type { NumericStats, ReportAggregate } from './types.js';

/**
 * Inputs to {@link buildAggregate} besides the table itself.
 */
export interface AggregateContext {
  year: number;
  /** Artifact name or other description of the input */
  source: string;
  /** ISO8601 timestamp stamped into the metadata */
  generatedAt: string;
  options: Pick<DeepReadonly<ReportOptions>, 'targetColumn' | 'categoryColumns' | 'maxNumericColumns'>;
}

// ============================================================================
// Aggregate
// ============================================================================

export function buildAggregate(table: RecordTable, context: AggregateContext): ReportAggregate {
  return {
    metadata: {
      year: context.year,
      generatedAt: context.generatedAt,
      source: context.source,
      rowCount: table.rowCount,
      columnCount: table.columns.length,
    },
    quality: dataQuality(table),
    numericStats: Object.fromEntries(
      table
        .numericColumnNames()
        .slice(0, context.options.maxNumericColumns)
        .map((name) => [name, numericStats(table.numericValues(name))])
    ),
    categoryCounts: Object.fromEntries(
      context.options.categoryColumns
        .filter((name) => table.hasColumn(name))
        .map((name) => [name, categoryCounts(table, name)])
    ),
    correlations: correlations(table, context.options.targetColumn),
  };
}

// ============================================================================
// Sections
// ============================================================================

function dataQuality(table: RecordTable): ReportAggregate['quality'] {
  const names = table.columnNames;
  const completeRows = table.rows.filter((row) => names.every((name) => (row[name] ?? null) !== null)).length;

  return {
    totalRows: table.rowCount,
    totalColumns: names.length,
    completeRows,
    completePercent: table.rowCount === 0 ? 0 : (completeRows / table.rowCount) * 100,
    nullsByColumn: Object.fromEntries(
      names.map((name) => [name, table.values(name).filter((value) => value === null).length])
    ),
  };
}

/**
 * Summary statistics of a list of values (quartiles by linear interpolation).
 */
export function numericStats(values: readonly number[]): NumericStats {
  if (values.length === 0) {
    return { count: 0, mean: null, median: null, std: null, min: null, max: null, q25: null, q75: null };
  }

  const sorted = sortAscending(values);
  return {
    count: sorted.length,
    mean: finiteOrNull(mean(sorted)),
    median: finiteOrNull(quantileSorted(sorted, 0.5)),
    std: finiteOrNull(sampleStd(sorted)),
    min: finiteOrNull(sorted[0]),
    max: finiteOrNull(sorted[sorted.length - 1]),
    q25: finiteOrNull(quantileSorted(sorted, 0.25)),
    q75: finiteOrNull(quantileSorted(sorted, 0.75)),
  };
}

/**
 * Non-null values of a column counted by label, most frequent first
 * (ties in label order).
 */
function categoryCounts(table: RecordTable, name: string): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of table.values(name)) {
    if (value !== null) {
      const label = String(value);
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
  }

  return Object.fromEntries(
    [...counts.entries()].sort(([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0))
  );
}

/**
 * Pearson r of every other numeric column against the target, over rows
 * where both values are present.
 */
function correlations(table: RecordTable, targetColumn: string | undefined): ReportAggregate['correlations'] {
  if (!targetColumn || !table.numericColumnNames().includes(targetColumn)) {
    return { target: null, coefficients: {} };
  }

  const coefficients: [string, number | null][] = [];
  for (const name of table.numericColumnNames()) {
    if (name === targetColumn) {
      continue;
    }
    const xs: number[] = [];
    const ys: number[] = [];
    for (const row of table.rows) {
      const x = row[name];
      const y = row[targetColumn];
      if (typeof x === 'number' && typeof y === 'number') {
        xs.push(x);
        ys.push(y);
      }
    }
    coefficients.push([name, finiteOrNull(pearson(xs, ys))]);
  }

  return { target: targetColumn, coefficients: Object.fromEntries(coefficients) };
}

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}
