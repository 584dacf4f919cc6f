/**
 * Feature Builder
 *
 * Derives new columns from a clean table. Specs are evaluated in order, so a
 * spec may use a column produced by an earlier one. Every original column and
 * row is kept; new columns are appended in spec order.
 *
 * @module stages/features
 */

import { InvalidConfigError } from '../../errors/index.js';
import type { DeepReadonly, FeatureSpec } from '../../schemas/pipeline-config.js';
import type { RecordTable } from '../../table/record-table.js';
import { computeBucket } from './bucket.js';
import { combineOutputType, computeCombine } from './combine.js';

/**
 * Apply one feature spec.
 *
 * @throws InvalidConfigError when the feature name is already a column
 */
export function applyFeature(table: RecordTable, spec: DeepReadonly<FeatureSpec>): RecordTable {
  if (table.hasColumn(spec.name)) {
    throw new InvalidConfigError(`Feature "${spec.name}" would overwrite an existing column`);
  }

  if (spec.kind === 'bucket') {
    return table.withColumn({ name: spec.name, type: 'string' }, computeBucket(table, spec));
  }
  return table.withColumn({ name: spec.name, type: combineOutputType(spec.op) }, computeCombine(table, spec));
}

/**
 * Apply every spec in order.
 *
 * @throws UnknownColumnError when a spec references a column absent at that point
 * @throws InvalidConfigError for invalid bucket definitions or operand types
 *
 * @example
 * ```typescript
 * const featured = buildFeatures(cleanTable, [
 *   { kind: 'bucket', name: 'band', column: 'v', edges: [0, 2, 4, Infinity],
 *     labels: ['low', 'mid', 'high'], outOfRangeLabel: 'out_of_range' },
 * ]);
 * ```
 */
export function buildFeatures(table: RecordTable, specs: readonly DeepReadonly<FeatureSpec>[]): RecordTable {
  return specs.reduce((current, spec) => applyFeature(current, spec), table);
}

export { bucketValue, computeBucket } from './bucket.js';
export { applyNumericOp, combineOutputType, computeCombine } from './combine.js';
