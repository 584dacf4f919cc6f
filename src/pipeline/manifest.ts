/**
 * Manifest Generation Module
 *
 * Builds the run manifest from the artifact references a run produced. Each
 * run for a year writes run_<year>.json listing every artifact with its
 * SHA-256 and size, the final state and per-stage timing.
 *
 * @module pipeline/manifest
 */

import {
  addArtifactToManifest,
  createEmptyManifest,
  finalizeManifest,
  markStagesSkipped,
  RunManifestSchema,
  type ManifestArtifactEntry,
  type RunManifest,
} from '../schemas/manifest.js';
import type { StageName } from '../schemas/stage.js';
import { readJson, type ArtifactRef } from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Everything a finished run knows about itself.
 */
export interface RunOutcome {
  year: number;
  /** Description of the artifact store */
  store: string;
  startedAt: string;
  completedAt: string;
  artifacts: readonly ArtifactRef[];
  stagesExecuted: readonly StageName[];
  stagesSkipped: readonly StageName[];
  perStageMs: Record<string, number>;
  failedStage?: StageName;
  /** `<Code>: <message>` of the failure */
  error?: string;
}

// ============================================================================
// Manifest Generation
// ============================================================================

/**
 * Create a manifest entry from an artifact reference.
 */
export function createArtifactEntry(ref: ArtifactRef): ManifestArtifactEntry {
  const entry: ManifestArtifactEntry = {
    stage: ref.stage,
    name: ref.name,
    location: ref.location,
    sha256: ref.sha256,
    sizeBytes: ref.sizeBytes,
  };
  if (ref.rowCount !== undefined) {
    entry.rowCount = ref.rowCount;
  }
  return entry;
}

/**
 * Generate the manifest for a finished run.
 *
 * @example
 * ```typescript
 * const manifest = generateManifest({
 *   year: 2024,
 *   store: store.describe(),
 *   startedAt,
 *   completedAt,
 *   artifacts: [rawRef, cleanRef],
 *   stagesExecuted: ['extract', 'clean'],
 *   stagesSkipped: ['features', 'report'],
 *   perStageMs: { extract: 12, clean: 30 },
 * });
 * ```
 */
export function generateManifest(outcome: RunOutcome): RunManifest {
  let manifest = createEmptyManifest(outcome.year, outcome.store, outcome.startedAt);

  for (const ref of outcome.artifacts) {
    manifest = addArtifactToManifest(manifest, createArtifactEntry(ref));
  }

  if (outcome.stagesSkipped.length > 0) {
    manifest = markStagesSkipped(manifest, outcome.stagesSkipped);
  }

  return finalizeManifest(manifest, {
    stagesExecuted: outcome.stagesExecuted,
    perStageMs: outcome.perStageMs,
    failedStage: outcome.failedStage,
    error: outcome.error,
    completedAt: outcome.completedAt,
  });
}

/**
 * Load and validate a manifest written by a file store.
 *
 * @throws Error if the file is missing, not JSON, or not a manifest
 */
export async function loadManifest(filePath: string): Promise<RunManifest> {
  const result = RunManifestSchema.safeParse(await readJson(filePath));
  if (!result.success) {
    throw new Error(`Invalid run manifest ${filePath}: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}
