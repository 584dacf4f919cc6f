/**
 * Record Table
 *
 * Typed tabular structure passed between stages, its CSV codec and the
 * descriptive statistics the cleaner and reporter share.
 *
 * @module table
 */

export { RecordTable, rowKey, isNumericColumn, col, type Row } from './record-table.js';

export {
  coerceCell,
  conformsTo,
  inferTextColumnType,
  inferValueColumnType,
  type CellValue,
  type CoerceResult,
} from './coerce.js';

export { parseCsv, serializeCsv } from './csv.js';

export {
  quantile,
  quantileSorted,
  quartiles,
  sortAscending,
  mean,
  sampleStd,
  pearson,
  type Quartiles,
} from './stats.js';
