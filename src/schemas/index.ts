/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used in the pipeline.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  DATE_PATTERN,
  YearSchema,
  YearInputSchema,
  isCalendarDate,
  type ISO8601Timestamp,
} from './common.js';

// ============================================================================
// Table Columns
// ============================================================================

export {
  ColumnTypeSchema,
  ColumnDefSchema,
  ColumnsSchema,
  isNumericType,
  type ColumnType,
  type ColumnDef,
} from './table.js';

// ============================================================================
// Run Parameters
// ============================================================================

export {
  RunDirsSchema,
  RunParamsSchema,
  createRunParams,
  type RunDirs,
  type RunParams,
  type RunParamsInput,
} from './run-params.js';

// ============================================================================
// Pipeline Configuration
// ============================================================================

export {
  NullFillSchema,
  DatasetColumnSchema,
  DatasetSchema,
  OutlierPolicySchema,
  RangeRuleSchema,
  CleanOptionsSchema,
  BinEdgeSchema,
  BucketFeatureSchema,
  CombineOpSchema,
  CombineFeatureSchema,
  FeatureSpecSchema,
  FeatureSpecsSchema,
  ReportFormatSchema,
  ReportOptionsSchema,
  PipelineConfigSchema,
  SUPPORTED_REPORT_FORMATS,
  featureSpecProblems,
  type DeepReadonly,
  type NullFill,
  type DatasetColumn,
  type Dataset,
  type OutlierPolicy,
  type RangeRule,
  type CleanOptions,
  type BucketFeature,
  type CombineOp,
  type CombineFeature,
  type FeatureSpec,
  type ReportFormat,
  type ReportOptions,
  type PipelineConfig,
  type PipelineConfigInput,
} from './pipeline-config.js';

// ============================================================================
// Stages and Artifact Metadata
// ============================================================================

export {
  StageNameSchema,
  TableStageNameSchema,
  STAGE_ORDER,
  ArtifactMetaSchema,
  ArtifactSidecarSchema,
  createArtifactMeta,
  createArtifactSidecar,
  type StageName,
  type TableStageName,
  type ArtifactMeta,
  type ArtifactSidecar,
} from './stage.js';

// ============================================================================
// Run Manifest
// ============================================================================

export {
  ManifestArtifactEntrySchema,
  RunStateSchema,
  RunManifestSchema,
  createEmptyManifest,
  addArtifactToManifest,
  markStagesSkipped,
  finalizeManifest,
  type ManifestArtifactEntry,
  type RunManifest,
} from './manifest.js';
