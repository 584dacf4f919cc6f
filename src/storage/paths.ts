/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the file artifact store. Every
 * artifact name is qualified by its year, so runs for different years never
 * touch the same files.
 *
 * Directory Structure:
 * ```
 * ./data/                              # Default data directory
 * ├── raw/
 * │   ├── raw_data_2024.csv            # Extract output
 * │   └── raw_data_2024.csv.meta.json  # Column types + metadata
 * ├── processed/
 * │   ├── clean_data_2024.csv          # Clean output
 * │   └── features_2024.csv            # Features output
 * └── results/
 *     ├── report_2024.txt              # Report (or report_2024.json)
 *     └── run_2024.json                # Run manifest
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';
import type { RunDirs } from '../schemas/run-params.js';
import type { ReportFormat } from '../schemas/pipeline-config.js';
import type { StageName, TableStageName } from '../schemas/stage.js';

// ============================================================================
// Directories
// ============================================================================

/**
 * Logical artifact directories.
 */
export type ArtifactDirKind = 'raw' | 'processed' | 'results';

/**
 * Resolved absolute directories for one store.
 */
export type ArtifactDirs = Readonly<Record<ArtifactDirKind, string>>;

/**
 * Gets the root data directory.
 *
 * Uses the `PIPELINE_DATA_DIR` environment variable if set, otherwise
 * `./data` under the working directory.
 *
 * @example
 * ```typescript
 * process.env.PIPELINE_DATA_DIR = '/srv/housing';
 * getDataDir(); // '/srv/housing'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.PIPELINE_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.resolve('data');
}

/**
 * Resolve the three artifact directories. Explicit overrides win; the rest sit
 * under the data directory.
 *
 * @param overrides - Per-directory overrides from the run parameters
 * @param dataDir - Root used for directories without an override
 */
export function resolveArtifactDirs(overrides: RunDirs = {}, dataDir: string = getDataDir()): ArtifactDirs {
  const root = path.resolve(dataDir);
  return {
    raw: path.resolve(overrides.raw ?? path.join(root, 'raw')),
    processed: path.resolve(overrides.processed ?? path.join(root, 'processed')),
    results: path.resolve(overrides.results ?? path.join(root, 'results')),
  };
}

/**
 * Directory a stage writes its artifact to.
 */
export function artifactDirKind(stage: StageName): ArtifactDirKind {
  switch (stage) {
    case 'extract':
      return 'raw';
    case 'clean':
    case 'features':
      return 'processed';
    case 'report':
      return 'results';
  }
}

// ============================================================================
// Artifact Names
// ============================================================================

const TABLE_PREFIX: Record<TableStageName, string> = {
  extract: 'raw_data',
  clean: 'clean_data',
  features: 'features',
};

function assertYear(year: number): void {
  if (!Number.isInteger(year) || year <= 0) {
    throw new Error(`year must be a positive integer, got ${year}`);
  }
}

/**
 * File name of a stage's table artifact.
 *
 * @example tableArtifactName('clean', 2024) // 'clean_data_2024.csv'
 */
export function tableArtifactName(stage: TableStageName, year: number): string {
  assertYear(year);
  return `${TABLE_PREFIX[stage]}_${year}.csv`;
}

/**
 * File name of the sidecar kept next to a table artifact.
 *
 * @example sidecarName('raw_data_2024.csv') // 'raw_data_2024.csv.meta.json'
 */
export function sidecarName(artifactName: string): string {
  return `${artifactName}.meta.json`;
}

/**
 * File name of the report for a year.
 *
 * @example reportArtifactName(2024, 'json') // 'report_2024.json'
 */
export function reportArtifactName(year: number, format: ReportFormat): string {
  assertYear(year);
  return `report_${year}.${format}`;
}

/**
 * File name of the run manifest for a year.
 */
export function manifestName(year: number): string {
  assertYear(year);
  return `run_${year}.json`;
}
