/**
 * Pipeline Configuration Schema
 *
 * The immutable configuration passed into every stage call: dataset columns,
 * cleaning toggles and outlier policy, feature specs, and report options.
 * Defaults live in src/config/defaults.ts; a JSON file may override them.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ColumnDefSchema } from './table.js';

// ============================================================================
// Deep Readonly
// ============================================================================

/**
 * Recursively readonly view of a configuration value.
 */
export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

// ============================================================================
// Dataset Schema
// ============================================================================

/**
 * How nulls in an optional column are filled.
 * - zero: numeric 0
 * - mean: mean of the column's non-null values (0 when there are none)
 * - unknown: the string "unknown"
 * - { constant }: a fixed value of the column's type
 */
export const NullFillSchema = z.union([
  z.enum(['zero', 'mean', 'unknown']),
  z.object({ constant: z.union([z.number(), z.string().min(1)]) }),
]);

export type NullFill = z.infer<typeof NullFillSchema>;

export const DatasetColumnSchema = ColumnDefSchema.extend({
  /** Rows with a null in a required column are dropped */
  required: z.boolean().default(true),

  /** Fill policy for nulls in an optional column */
  fill: NullFillSchema.optional(),
});

export type DatasetColumn = z.infer<typeof DatasetColumnSchema>;

export const DatasetSchema = z.object({
  columns: z.array(DatasetColumnSchema).min(1),

  /** Column carrying the year a row belongs to */
  yearColumn: z.string().min(1).default('year'),

  /** Column stamped with the extraction date */
  extractionDateColumn: z.string().min(1).default('extraction_date'),
});

export type Dataset = z.infer<typeof DatasetSchema>;

// ============================================================================
// Cleaning Schema
// ============================================================================

/**
 * Interquartile-range outlier policy.
 */
export const OutlierPolicySchema = z.object({
  /** Numeric columns monitored for outliers */
  columns: z.array(z.string().min(1)),

  /** Fence multiplier k in [Q1 - k*IQR, Q3 + k*IQR] */
  threshold: z.number().positive().default(1.5),

  method: z.literal('iqr').default('iqr'),
});

export type OutlierPolicy = z.infer<typeof OutlierPolicySchema>;

/**
 * Logical range rule; rows outside the bounds are dropped.
 */
export const RangeRuleSchema = z
  .object({
    column: z.string().min(1),
    min: z.number().optional(),
    max: z.number().optional(),
    /** When true the bounds themselves are out of range */
    exclusive: z.boolean().default(false),
  })
  .refine((rule) => rule.min !== undefined || rule.max !== undefined, {
    message: 'Range rule needs a min or a max',
  });

export type RangeRule = z.infer<typeof RangeRuleSchema>;

export const CleanOptionsSchema = z.object({
  validateSchema: z.boolean().default(true),
  dedupe: z.boolean().default(true),
  removeOutliers: z.boolean().default(true),
  validateRanges: z.boolean().default(true),
  fillNulls: z.boolean().default(true),
  dropEmptyColumns: z.boolean().default(true),
  outlier: OutlierPolicySchema,
  rangeRules: z.array(RangeRuleSchema).default([]),
});

export type CleanOptions = z.infer<typeof CleanOptionsSchema>;

// ============================================================================
// Feature Spec Schema
// ============================================================================

/**
 * Bin edge. JSON has no infinity, so "-inf" and "+inf" stand in for the sentinels.
 */
export const BinEdgeSchema = z.union([
  z.number(),
  z.literal('-inf').transform(() => -Infinity),
  z.literal('+inf').transform(() => Infinity),
]);

export const BucketFeatureSchema = z.object({
  kind: z.literal('bucket'),
  name: z.string().min(1),
  column: z.string().min(1),
  edges: z.array(BinEdgeSchema).min(2),
  labels: z.array(z.string().min(1)).min(1),
  outOfRangeLabel: z.string().min(1).default('out_of_range'),
});

export type BucketFeature = z.infer<typeof BucketFeatureSchema>;

export const CombineOpSchema = z.enum(['ratio', 'difference', 'sum', 'product', 'log1p', 'concat']);

export type CombineOp = z.infer<typeof CombineOpSchema>;

export const CombineFeatureSchema = z.object({
  kind: z.literal('combine'),
  name: z.string().min(1),
  op: CombineOpSchema,
  columns: z.array(z.string().min(1)).min(1),
  /** Added to the denominator of a ratio */
  offset: z.number().default(0),
  /** Joins the parts of a concat */
  separator: z.string().default('_'),
});

export type CombineFeature = z.infer<typeof CombineFeatureSchema>;

export const FeatureSpecSchema = z.discriminatedUnion('kind', [
  BucketFeatureSchema,
  CombineFeatureSchema,
]);

export type FeatureSpec = z.infer<typeof FeatureSpecSchema>;

/** Operand count each combine op accepts: [min, max] */
const OP_ARITY: Record<CombineOp, [number, number]> = {
  ratio: [2, 2],
  difference: [2, 2],
  sum: [2, Infinity],
  product: [2, Infinity],
  log1p: [1, 1],
  concat: [2, Infinity],
};

/**
 * List the semantic problems of a feature spec (empty when valid).
 *
 * Bucket edges must increase strictly and there must be exactly one label per
 * bin (edges - 1). Combine specs must pass the operand count their op takes.
 */
export function featureSpecProblems(spec: DeepReadonly<FeatureSpec>): string[] {
  const problems: string[] = [];

  if (spec.kind === 'bucket') {
    for (let i = 1; i < spec.edges.length; i++) {
      if (!(spec.edges[i] > spec.edges[i - 1])) {
        problems.push(`${spec.name}: bin edges must be strictly increasing`);
        break;
      }
    }
    if (spec.labels.length !== spec.edges.length - 1) {
      problems.push(
        `${spec.name}: expected ${spec.edges.length - 1} labels for ${spec.edges.length} edges, got ${spec.labels.length}`
      );
    }
  } else {
    const [min, max] = OP_ARITY[spec.op];
    const count = spec.columns.length;
    if (count < min || count > max) {
      const expected = min === max ? `${min}` : `at least ${min}`;
      problems.push(`${spec.name}: ${spec.op} takes ${expected} column(s), got ${count}`);
    }
  }

  return problems;
}

export const FeatureSpecsSchema = z.array(FeatureSpecSchema).superRefine((specs, ctx) => {
  const names = new Set<string>();
  for (const [index, spec] of specs.entries()) {
    for (const message of featureSpecProblems(spec)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message, path: [index] });
    }
    if (names.has(spec.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate feature name: ${spec.name}`,
        path: [index, 'name'],
      });
    }
    names.add(spec.name);
  }
});

// ============================================================================
// Report Schema
// ============================================================================

export const ReportFormatSchema = z.enum(['txt', 'json']);

export type ReportFormat = z.infer<typeof ReportFormatSchema>;

export const SUPPORTED_REPORT_FORMATS: readonly ReportFormat[] = ReportFormatSchema.options;

export const ReportOptionsSchema = z.object({
  format: ReportFormatSchema.default('txt'),

  /** Numeric column other columns are correlated against */
  targetColumn: z.string().min(1).optional(),

  /** String columns broken down by label */
  categoryColumns: z.array(z.string().min(1)).default([]),

  /** Summary statistics are computed for at most this many numeric columns */
  maxNumericColumns: z.number().int().positive().default(10),
});

export type ReportOptions = z.infer<typeof ReportOptionsSchema>;

// ============================================================================
// Pipeline Config Schema
// ============================================================================

export const PipelineConfigSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.pipelineConfig),
  dataset: DatasetSchema,
  clean: CleanOptionsSchema,
  features: FeatureSpecsSchema.default([]),
  report: ReportOptionsSchema,
});

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Frozen pipeline configuration as seen by the stages.
 */
export type PipelineConfig = DeepReadonly<z.infer<typeof PipelineConfigSchema>>;
