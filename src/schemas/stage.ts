/**
 * Stage and Artifact Metadata Schema
 *
 * Each table-producing stage persists its Record Table together with a sidecar
 * holding standard metadata and the column definitions, so column types survive
 * the CSV round trip and any stage can be re-run from its upstream artifact.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, YearSchema } from './common.js';
import { ColumnsSchema, type ColumnDef } from './table.js';

// ============================================================================
// Stage Names
// ============================================================================

/**
 * Pipeline stages in execution order.
 */
export const StageNameSchema = z.enum(['extract', 'clean', 'features', 'report']);

export type StageName = z.infer<typeof StageNameSchema>;

export const STAGE_ORDER: readonly StageName[] = StageNameSchema.options;

/**
 * Stages whose output is a Record Table artifact.
 */
export const TableStageNameSchema = z.enum(['extract', 'clean', 'features']);

export type TableStageName = z.infer<typeof TableStageNameSchema>;

// ============================================================================
// Artifact Metadata Schema
// ============================================================================

/**
 * ArtifactMeta: standard metadata stored beside every table artifact.
 */
export const ArtifactMetaSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.artifact),

  /** Stage that produced the artifact */
  stageName: TableStageNameSchema,

  /** Year the artifact is keyed by */
  year: YearSchema,

  /** ISO8601 timestamp when the artifact was written */
  createdAt: ISO8601TimestampSchema,

  /** Name of the artifact this one was derived from */
  upstream: z.string().optional(),

  /** Number of data rows */
  rowCount: z.number().int().nonnegative(),
});

export type ArtifactMeta = z.infer<typeof ArtifactMetaSchema>;

/**
 * Sidecar document: `{ _meta, columns }`.
 */
export const ArtifactSidecarSchema = z.object({
  _meta: ArtifactMetaSchema,
  columns: ColumnsSchema,
});

export type ArtifactSidecar = z.infer<typeof ArtifactSidecarSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create artifact metadata for a freshly written table.
 */
export function createArtifactMeta(params: {
  stageName: TableStageName;
  year: number;
  rowCount: number;
  upstream?: string;
}): ArtifactMeta {
  return {
    schemaVersion: SCHEMA_VERSIONS.artifact,
    stageName: params.stageName,
    year: params.year,
    createdAt: new Date().toISOString(),
    upstream: params.upstream,
    rowCount: params.rowCount,
  };
}

/**
 * Build the sidecar document for an artifact.
 */
export function createArtifactSidecar(meta: ArtifactMeta, columns: readonly ColumnDef[]): ArtifactSidecar {
  return {
    _meta: meta,
    columns: columns.map((column) => ({ name: column.name, type: column.type })),
  };
}
