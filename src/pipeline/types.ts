/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the four-stage yearly pipeline. These types define the
 * contracts between stages, the execution context, and the results structure.
 *
 * @module pipeline/types
 */

import type { PipelineConfig } from '../schemas/pipeline-config.js';
import type { RunParams } from '../schemas/run-params.js';
import type { StageName } from '../schemas/stage.js';
import type { ArtifactRef, ArtifactStore } from '../storage/artifact-store.js';

export type { StageName } from '../schemas/stage.js';

// ============================================================================
// Stage Numbers and Driver States
// ============================================================================

/**
 * Stage numbers in execution order.
 */
export type StageNumber = 1 | 2 | 3 | 4;

export const STAGE_NUMBERS: Record<StageName, StageNumber> = {
  extract: 1,
  clean: 2,
  features: 3,
  report: 4,
} as const;

/**
 * Driver state machine: extract → clean → feature → report → done, with any
 * failure leading to failed. Both terminal states are final.
 */
export type DriverState = 'extract' | 'clean' | 'feature' | 'report' | 'done' | 'failed';

/**
 * Driver state while a stage is running.
 */
export const STAGE_STATES: Record<StageName, DriverState> = {
  extract: 'extract',
  clean: 'clean',
  features: 'feature',
  report: 'report',
} as const;

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Runtime context passed to each pipeline stage during execution.
 * Contains all information a stage needs to read its input and persist its output.
 */
export interface StageContext {
  /** Year, verbosity and directory overrides for this run */
  params: RunParams;

  /** Frozen pipeline configuration */
  config: PipelineConfig;

  /** Where artifacts are read from and written to */
  store: ArtifactStore;

  /** Optional logger for stage output */
  logger?: Logger;

  /** Clock used for timestamps and the extraction date; defaults to the system clock */
  now?: () => Date;
}

// ============================================================================
// Stage Result
// ============================================================================

/**
 * Result returned by a stage after execution.
 *
 * @typeParam T - Stage-specific summary (e.g. the clean report)
 */
export interface StageResult<T> {
  /** Stage summary */
  data: T;

  /** Artifact the stage persisted */
  artifact: ArtifactRef;

  /** Execution timing information */
  timing: {
    /** ISO8601 timestamp when stage started */
    startedAt: string;

    /** ISO8601 timestamp when stage completed */
    completedAt: string;

    /** Duration in milliseconds */
    durationMs: number;
  };
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * Interface that all pipeline stages implement. A stage reads its upstream
 * artifact from the store, transforms it, and writes its own artifact only
 * after fully succeeding.
 *
 * @typeParam T - Stage-specific summary type
 *
 * @example
 * ```typescript
 * const stage: TypedStage<{ rows: number }> = {
 *   name: 'clean',
 *   number: 2,
 *   async execute(context) {
 *     const raw = await context.store.readTable('extract', context.params.year);
 *     ...
 *   },
 * };
 * ```
 */
export interface TypedStage<T = unknown> {
  /** Stage name */
  name: StageName;

  /** Position in the pipeline */
  number: StageNumber;

  /**
   * Execute the stage.
   *
   * @throws PipelineError on table-level failures; nothing is persisted then
   */
  execute(context: StageContext): Promise<StageResult<T>>;
}

/**
 * Stage with an opaque summary, as stored by the driver.
 */
export type Stage = TypedStage<unknown>;

// ============================================================================
// Execution Options
// ============================================================================

/**
 * Options for a driver run.
 */
export interface ExecuteOptions {
  /**
   * Start at this stage; earlier stages are skipped and their artifacts read
   * from the store.
   */
  fromStage?: StageName;

  /**
   * Stop execution after this stage.
   */
  stopAfterStage?: StageName;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if a value is a valid stage name.
 */
export function isValidStageName(value: unknown): value is StageName {
  return typeof value === 'string' && Object.hasOwn(STAGE_NUMBERS, value);
}

/**
 * Current time from the context clock.
 */
export function currentTime(context: StageContext): Date {
  return context.now ? context.now() : new Date();
}
