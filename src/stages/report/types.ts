/**
 * Report Types
 *
 * The aggregate both report renderers are pure functions of. Its schema is
 * also what a parsed report (text or JSON) is validated against.
 *
 * @module stages/report/types
 */

import { z } from 'zod';
import { ISO8601TimestampSchema, YearSchema } from '../../schemas/common.js';

// ============================================================================
// Sections
// ============================================================================

export const ReportMetadataSchema = z.object({
  year: YearSchema,
  generatedAt: ISO8601TimestampSchema,
  /** Artifact the report was computed from */
  source: z.string(),
  rowCount: z.number().int().nonnegative(),
  columnCount: z.number().int().nonnegative(),
});

export const DataQualitySchema = z.object({
  totalRows: z.number().int().nonnegative(),
  totalColumns: z.number().int().nonnegative(),
  /** Rows without any null */
  completeRows: z.number().int().nonnegative(),
  completePercent: z.number().min(0).max(100),
  nullsByColumn: z.record(z.string(), z.number().int().nonnegative()),
});

/**
 * Summary statistics of one numeric column; null when undefined (no values,
 * or fewer than two for the standard deviation).
 */
export const NumericStatsSchema = z.object({
  count: z.number().int().nonnegative(),
  mean: z.number().nullable(),
  median: z.number().nullable(),
  std: z.number().nullable(),
  min: z.number().nullable(),
  max: z.number().nullable(),
  q25: z.number().nullable(),
  q75: z.number().nullable(),
});

export type NumericStats = z.infer<typeof NumericStatsSchema>;

export const CorrelationsSchema = z.object({
  /** Column correlated against, or null when none is configured or present */
  target: z.string().nullable(),
  /** Pearson r per numeric column; null when undefined */
  coefficients: z.record(z.string(), z.number().nullable()),
});

// ============================================================================
// Aggregate
// ============================================================================

export const ReportAggregateSchema = z.object({
  metadata: ReportMetadataSchema,
  quality: DataQualitySchema,
  numericStats: z.record(z.string(), NumericStatsSchema),
  categoryCounts: z.record(z.string(), z.record(z.string(), z.number().int().nonnegative())),
  correlations: CorrelationsSchema,
});

export type ReportAggregate = z.infer<typeof ReportAggregateSchema>;
