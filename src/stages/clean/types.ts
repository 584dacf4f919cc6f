/**
 * Clean Stage Types
 *
 * Type definitions for the cleaning stage: the per-run clean report and the
 * results of the individual cleaning steps.
 *
 * @module stages/clean/types
 */

import { z } from 'zod';
import type { RecordTable } from '../../table/record-table.js';

// ============================================================================
// Outlier Fence Schema
// ============================================================================

/**
 * IQR fence of one monitored column: rows with a value outside
 * [lower, upper] are outliers.
 */
export const OutlierFenceSchema = z.object({
  q1: z.number(),
  q3: z.number(),
  iqr: z.number().nonnegative(),
  lower: z.number(),
  upper: z.number(),
});

export type OutlierFence = z.infer<typeof OutlierFenceSchema>;

// ============================================================================
// Clean Report Schema
// ============================================================================

/**
 * Rows excluded per reason.
 */
export const DroppedCountsSchema = z.object({
  missingRequired: z.number().int().nonnegative(),
  invalidValue: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  outliers: z.number().int().nonnegative(),
  outOfRange: z.number().int().nonnegative(),
});

export type DroppedCounts = z.infer<typeof DroppedCountsSchema>;

/**
 * CleanReport: what the cleaner did to one raw table.
 * Invariant: the dropped counts sum to rowsIn - rowsOut.
 */
export const CleanReportSchema = z.object({
  rowsIn: z.number().int().nonnegative(),
  rowsOut: z.number().int().nonnegative(),
  dropped: DroppedCountsSchema,

  /** Null cells replaced by their column's fill policy */
  nullsFilled: z.number().int().nonnegative(),

  /** Optional columns removed because every value was null */
  columnsDropped: z.array(z.string()),

  /** Fences of the final outlier pass, by column */
  fences: z.record(z.string(), OutlierFenceSchema),

  /** Fence computations performed (the last one flags nothing) */
  outlierPasses: z.number().int().nonnegative(),
});

export type CleanReport = z.infer<typeof CleanReportSchema>;

// ============================================================================
// Step Results
// ============================================================================

/**
 * Output of the cleaner: the clean table and its report.
 */
export interface CleanResult {
  table: RecordTable;
  report: CleanReport;
}

/**
 * A cleaning step that removes rows.
 */
export interface RowFilterResult {
  table: RecordTable;
  removed: number;
}

/**
 * Empty dropped-count record.
 */
export function emptyDroppedCounts(): DroppedCounts {
  return { missingRequired: 0, invalidValue: 0, duplicates: 0, outliers: 0, outOfRange: 0 };
}
