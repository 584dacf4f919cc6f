/**
 * Bucketing
 *
 * Maps a numeric value to a label by half-open bins [edge[i], edge[i+1]).
 * The final edge is inclusive so the maximum lands in the last bin. Values
 * outside the edges get the out-of-range label; null stays null.
 *
 * @module stages/features/bucket
 */

import { InvalidConfigError } from '../../errors/index.js';
import { featureSpecProblems, type BucketFeature, type DeepReadonly } from '../../schemas/pipeline-config.js';
import { isNumericType } from '../../schemas/table.js';
import type { CellValue } from '../../table/coerce.js';
import type { RecordTable } from '../../table/record-table.js';

/**
 * Label of one value.
 *
 * @example
 * bucketValue(3, [0, 2, 4, Infinity], ['low', 'mid', 'high'], 'out_of_range') // 'mid'
 */
export function bucketValue(
  value: number | null,
  edges: readonly number[],
  labels: readonly string[],
  outOfRangeLabel: string
): string | null {
  if (value === null) {
    return null;
  }

  const last = edges.length - 1;
  if (value < edges[0] || value > edges[last]) {
    return outOfRangeLabel;
  }
  if (value === edges[last]) {
    return labels[last - 1];
  }

  for (let i = 0; i < last; i++) {
    if (value >= edges[i] && value < edges[i + 1]) {
      return labels[i];
    }
  }
  return outOfRangeLabel;
}

/**
 * Compute a bucket feature column.
 *
 * @throws InvalidConfigError for invalid edges/labels or a non-numeric source column
 * @throws UnknownColumnError when the source column is absent
 */
export function computeBucket(table: RecordTable, spec: DeepReadonly<BucketFeature>): (string | null)[] {
  const problems = featureSpecProblems(spec);
  if (problems.length > 0) {
    throw new InvalidConfigError(problems.join('; '));
  }

  const column = table.requireColumn(spec.column, `feature "${spec.name}"`);
  if (!isNumericType(column.type)) {
    throw new InvalidConfigError(
      `Feature "${spec.name}" buckets ${column.type} column "${spec.column}"; a numeric column is required`
    );
  }

  return table
    .values(spec.column)
    .map((value: CellValue) =>
      bucketValue(typeof value === 'number' ? value : null, spec.edges, spec.labels, spec.outOfRangeLabel)
    );
}
