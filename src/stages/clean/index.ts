/**
 * Cleaner
 *
 * Turns a raw table into a clean one. Steps run in a fixed order, each behind
 * its toggle in the clean options:
 *
 * 0. drop optional columns that are entirely null
 * 1. schema validation and coercion
 * 2. exact-duplicate removal
 * 3. iterative IQR outlier removal
 * 4. logical range rules
 * 5. null filling
 *
 * Row-level defects are counted per reason in the report, never thrown.
 *
 * @module stages/clean
 */

import type { PipelineConfig } from '../../schemas/pipeline-config.js';
import type { RecordTable } from '../../table/record-table.js';
import { dedupeRows } from './dedupe.js';
import { fillNulls } from './nulls.js';
import { removeOutliers } from './outliers.js';
import { applyRangeRules } from './ranges.js';
import { emptyDroppedCounts, type CleanReport, type CleanResult, type OutlierFence } from './types.js';
import { dropEmptyColumns, validateSchema } from './validate.js';

/**
 * The parts of the pipeline configuration the cleaner reads.
 */
export type CleanConfig = Pick<PipelineConfig, 'dataset' | 'clean'>;

/**
 * Clean a raw table.
 *
 * @throws InvalidSchemaError when required columns are missing or a monitored
 *   column is not numeric
 * @throws UnknownColumnError when an outlier column or range rule names an absent column
 *
 * @example
 * ```typescript
 * const { table, report } = clean(raw, DEFAULT_PIPELINE_CONFIG);
 * console.log(`${report.rowsIn} → ${report.rowsOut} rows`);
 * ```
 */
export function clean(raw: RecordTable, config: CleanConfig): CleanResult {
  const options = config.clean;
  const dropped = emptyDroppedCounts();
  let table = raw;
  let columnsDropped: string[] = [];
  let fences: Record<string, OutlierFence> = {};
  let outlierPasses = 0;
  let nullsFilled = 0;

  if (options.dropEmptyColumns) {
    const result = dropEmptyColumns(table, config.dataset);
    table = result.table;
    columnsDropped = result.dropped;
  }

  if (options.validateSchema) {
    const result = validateSchema(table, config.dataset);
    table = result.table;
    dropped.invalidValue = result.invalidValue;
    dropped.missingRequired = result.missingRequired;
  }

  if (options.dedupe) {
    const result = dedupeRows(table);
    table = result.table;
    dropped.duplicates = result.removed;
  }

  if (options.removeOutliers && table.rowCount > 0) {
    const result = removeOutliers(table, options.outlier);
    table = result.table;
    dropped.outliers = result.removed;
    fences = result.fences;
    outlierPasses = result.passes;
  }

  if (options.validateRanges && options.rangeRules.length > 0) {
    const result = applyRangeRules(table, options.rangeRules);
    table = result.table;
    dropped.outOfRange = result.removed;
  }

  if (options.fillNulls) {
    const result = fillNulls(table, config.dataset);
    table = result.table;
    nullsFilled = result.filled;
  }

  const report: CleanReport = {
    rowsIn: raw.rowCount,
    rowsOut: table.rowCount,
    dropped,
    nullsFilled,
    columnsDropped,
    fences,
    outlierPasses,
  };

  return { table, report };
}

export { dropEmptyColumns, validateSchema, type ValidateResult } from './validate.js';
export { dedupeRows } from './dedupe.js';
export { computeFence, computeFences, isOutlier, removeOutliers, type OutlierResult } from './outliers.js';
export { applyRangeRules, withinRange } from './ranges.js';
export { fillNulls, resolveFillValue } from './nulls.js';
export * from './types.js';
