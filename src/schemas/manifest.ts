/**
 * Run Manifest Schema
 *
 * Each run for a year produces run_<year>.json recording the artifacts it wrote,
 * their checksums, the final driver state and per-stage timing.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, YearSchema } from './common.js';
import { StageNameSchema, type StageName } from './stage.js';

// ============================================================================
// Artifact Entry Schema
// ============================================================================

/**
 * Individual artifact entry in the manifest.
 */
export const ManifestArtifactEntrySchema = z.object({
  /** Stage that produced the artifact */
  stage: StageNameSchema,

  /** Artifact file name (e.g., "clean_data_2024.csv") */
  name: z.string().min(1),

  /** Where the artifact lives (absolute path or memory:// location) */
  location: z.string().min(1),

  /** SHA-256 hash of the serialized artifact */
  sha256: z.string().regex(/^[a-f0-9]{64}$/, 'Must be a valid SHA-256 hash'),

  /** Serialized size in bytes */
  sizeBytes: z.number().int().nonnegative(),

  /** Data rows, for table artifacts */
  rowCount: z.number().int().nonnegative().optional(),
});

export type ManifestArtifactEntry = z.infer<typeof ManifestArtifactEntrySchema>;

// ============================================================================
// Main Manifest Schema
// ============================================================================

export const RunStateSchema = z.enum(['done', 'failed']);

export const RunManifestSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.manifest),

  year: YearSchema,

  /** ISO8601 timestamp when the manifest was finalized */
  createdAt: ISO8601TimestampSchema,

  /** Description of the artifact store the run wrote to */
  store: z.string().min(1),

  artifacts: z.array(ManifestArtifactEntrySchema),

  stagesExecuted: z.array(StageNameSchema),

  /** Stages not run because of fromStage / stopAfterStage */
  stagesSkipped: z.array(StageNameSchema),

  state: RunStateSchema,

  failedStage: StageNameSchema.optional(),

  error: z.string().optional(),

  /** Duration per executed stage in milliseconds */
  perStageMs: z.record(z.string(), z.number().nonnegative()),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create an empty manifest for a new run
 */
export function createEmptyManifest(year: number, store: string, createdAt = new Date().toISOString()): RunManifest {
  return {
    schemaVersion: SCHEMA_VERSIONS.manifest,
    year,
    createdAt,
    store,
    artifacts: [],
    stagesExecuted: [],
    stagesSkipped: [],
    state: 'failed',
    perStageMs: {},
  };
}

/**
 * Add an artifact entry to a manifest
 */
export function addArtifactToManifest(
  manifest: RunManifest,
  entry: ManifestArtifactEntry
): RunManifest {
  return {
    ...manifest,
    artifacts: [...manifest.artifacts, entry],
  };
}

/**
 * Mark stages as skipped in the manifest
 */
export function markStagesSkipped(manifest: RunManifest, stages: readonly StageName[]): RunManifest {
  return {
    ...manifest,
    stagesSkipped: [...manifest.stagesSkipped, ...stages],
  };
}

/**
 * Finalize the manifest when the run ends
 */
export function finalizeManifest(
  manifest: RunManifest,
  outcome: {
    stagesExecuted: readonly StageName[];
    perStageMs: Record<string, number>;
    failedStage?: StageName;
    error?: string;
    completedAt?: string;
  }
): RunManifest {
  return {
    ...manifest,
    stagesExecuted: [...outcome.stagesExecuted],
    perStageMs: { ...outcome.perStageMs },
    state: outcome.failedStage ? 'failed' : 'done',
    failedStage: outcome.failedStage,
    error: outcome.error,
    createdAt: outcome.completedAt ?? new Date().toISOString(), // Update to final timestamp
  };
}
