/**
 * Pipeline Infrastructure
 *
 * Stage execution framework for the four-stage yearly pipeline: stage
 * interfaces, the execution context, the driver and the run manifest.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  // Stage number, name and state types
  type StageNumber,
  type StageName,
  type DriverState,
  STAGE_NUMBERS,
  STAGE_STATES,

  // Core interfaces
  type Logger,
  type StageContext,
  type StageResult,
  type TypedStage,
  type Stage,
  type ExecuteOptions,

  // Helper functions
  isValidStageName,
  currentTime,
} from './types.js';

// Manifest generation
export { type RunOutcome, createArtifactEntry, generateManifest, loadManifest } from './manifest.js';

// Pipeline driver
export {
  type DriverTiming,
  type StageFailure,
  type DriverResult,
  type DriverCallbacks,
  PipelineDriver,
  createPipelineDriver,
  planStages,
} from './driver.js';
