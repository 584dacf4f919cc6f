/**
 * Storage Layer
 *
 * Year-keyed persistence for stage artifacts, reports and run manifests.
 * All file writes use the atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  getDataDir,
  resolveArtifactDirs,
  artifactDirKind,
  tableArtifactName,
  sidecarName,
  reportArtifactName,
  manifestName,
  type ArtifactDirKind,
  type ArtifactDirs,
} from './paths.js';

// Atomic operations
export { atomicWriteFile, atomicWriteFiles, atomicWriteJson, readJson, fileExists, sha256, isErrnoError } from './atomic.js';

// Artifact stores
export {
  FileArtifactStore,
  MemoryArtifactStore,
  type ArtifactStore,
  type ArtifactRef,
} from './artifact-store.js';
