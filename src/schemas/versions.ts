/**
 * Schema Version Registry
 *
 * Persisted documents (artifact metadata, run manifests, configuration files)
 * carry a schemaVersion. Each document type has an independent integer version.
 */

/**
 * Current schema versions for all persisted document types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Artifact sidecar metadata (<artifact>.meta.json) */
  artifact: 1,
  /** Run manifest (run_<year>.json) */
  manifest: 1,
  /** Pipeline configuration file */
  pipelineConfig: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

/**
 * Get the current version for a schema type
 */
export function getCurrentVersion(schemaType: SchemaType): number {
  return SCHEMA_VERSIONS[schemaType];
}

/**
 * Check if a schema version is current
 */
export function isCurrentVersion(
  schemaType: SchemaType,
  version: number
): boolean {
  return version === SCHEMA_VERSIONS[schemaType];
}
