/**
 * Pipeline Driver
 *
 * Runs the four stages for one year as a state machine:
 * extract → clean → feature → report → done, with any failure leading to
 * failed. There are no retries: a failing stage stops the run and later
 * stages never start.
 *
 * Key features:
 * - Stage registration and validation
 * - Partial runs with fromStage / stopAfterStage
 * - Lifecycle callbacks for progress display
 * - Per-stage timing and a run manifest, written for failed runs too
 *
 * @module pipeline/driver
 */

import { describeError, InvalidConfigError, isPipelineError, type PipelineErrorCode } from '../errors/index.js';
import { STAGE_ORDER } from '../schemas/stage.js';
import type { ArtifactRef } from '../storage/index.js';
import { generateManifest } from './manifest.js';
import {
  STAGE_STATES,
  currentTime,
  type DriverState,
  type ExecuteOptions,
  type Stage,
  type StageContext,
  type StageName,
  type StageNumber,
  type StageResult,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing information for a driver run
 */
export interface DriverTiming {
  /** ISO8601 timestamp when the run started */
  startedAt: string;
  /** ISO8601 timestamp when the run ended */
  completedAt: string;
  /** Total duration in milliseconds */
  durationMs: number;
  /** Duration per executed stage in milliseconds, failed stage included */
  perStage: Record<string, number>;
}

/**
 * Why a run ended in `failed`.
 */
export interface StageFailure {
  stage: StageName;
  /** Pipeline error code; absent for unexpected errors */
  code?: PipelineErrorCode;
  message: string;
  error: Error;
}

/**
 * Result of a driver run
 */
export interface DriverResult {
  /** Terminal state */
  state: Extract<DriverState, 'done' | 'failed'>;
  year: number;
  /** Stages that ran, in order (the failed one included) */
  stagesExecuted: StageName[];
  /** Stages left out by fromStage / stopAfterStage */
  stagesSkipped: StageName[];
  /** Artifacts written by this run, in stage order */
  artifacts: ArtifactRef[];
  /** Result of every stage that succeeded */
  results: Partial<Record<StageName, StageResult<unknown>>>;
  /** Set when state is failed */
  failure?: StageFailure;
  /** Where the run manifest was written, when any stage ran */
  manifestLocation?: string;
  timing: DriverTiming;
}

/**
 * Callbacks for stage lifecycle events
 */
export interface DriverCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stage: StageName, stageNumber: StageNumber) => void;
  /** Called when a stage completes successfully */
  onStageComplete?: (stage: StageName, result: StageResult<unknown>) => void;
  /** Called when a stage fails */
  onStageError?: (stage: StageName, error: Error) => void;
  /** Called when a stage is left out of the run */
  onStageSkip?: (stage: StageName) => void;
}

// ============================================================================
// Pipeline Driver Class
// ============================================================================

/**
 * Pipeline driver that manages stage execution.
 *
 * @example
 * ```typescript
 * const driver = new PipelineDriver();
 * driver.registerStages(createStages(new CsvFileSource('housing.csv')));
 *
 * const result = await driver.execute(context);
 * if (result.state === 'failed') {
 *   console.error(result.failure?.message);
 * }
 *
 * // Re-run only the report from the stored features artifact
 * await driver.execute(context, { fromStage: 'report' });
 * ```
 */
export class PipelineDriver {
  private stages: Map<StageName, Stage> = new Map();
  private callbacks: DriverCallbacks = {};
  private currentState: DriverState = 'extract';

  // ==========================================================================
  // Stage Registration
  // ==========================================================================

  /**
   * Register a stage with the driver.
   *
   * @throws Error if a stage of that name is already registered
   */
  registerStage(stage: Stage): void {
    if (this.stages.has(stage.name)) {
      throw new Error(`Stage "${stage.name}" is already registered`);
    }
    this.stages.set(stage.name, stage);
  }

  registerStages(stages: readonly Stage[]): void {
    for (const stage of stages) {
      this.registerStage(stage);
    }
  }

  /**
   * Registered stages in execution order.
   */
  getAllStages(): Stage[] {
    return STAGE_ORDER.flatMap((name) => this.stages.get(name) ?? []);
  }

  getMissingStages(): StageName[] {
    return STAGE_ORDER.filter((name) => !this.stages.has(name));
  }

  isComplete(): boolean {
    return this.getMissingStages().length === 0;
  }

  setCallbacks(callbacks: DriverCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * State of the current or most recent run.
   */
  get state(): DriverState {
    return this.currentState;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run the selected stages for the year in `context.params`.
   *
   * Stage failures do not throw: they end the run in `failed` and are
   * reported on the result.
   *
   * @throws InvalidConfigError if fromStage comes after stopAfterStage
   * @throws Error if a selected stage is not registered
   */
  async execute(context: StageContext, options: ExecuteOptions = {}): Promise<DriverResult> {
    const plan = planStages(options);
    for (const name of plan.toExecute) {
      if (!this.stages.has(name)) {
        throw new Error(`Stage "${name}" not registered. Call registerStage() first.`);
      }
    }

    const { year } = context.params;
    const startedAt = currentTime(context).toISOString();
    const startTime = Date.now();
    const perStage: Record<string, number> = {};
    const executed: StageName[] = [];
    const artifacts: ArtifactRef[] = [];
    const results: Partial<Record<StageName, StageResult<unknown>>> = {};
    let failure: StageFailure | undefined;

    for (const name of plan.toSkip) {
      this.callbacks.onStageSkip?.(name);
    }

    for (const stage of this.getAllStages()) {
      if (!plan.toExecute.includes(stage.name)) {
        continue;
      }

      this.currentState = STAGE_STATES[stage.name];
      context.logger?.debug(`[driver] ${year}: entering ${this.currentState}`);
      const stageStart = Date.now();
      executed.push(stage.name);
      this.callbacks.onStageStart?.(stage.name, stage.number);

      try {
        const result = await stage.execute(context);
        perStage[stage.name] = Date.now() - stageStart;
        artifacts.push(result.artifact);
        results[stage.name] = result;
        this.callbacks.onStageComplete?.(stage.name, result);
      } catch (error) {
        perStage[stage.name] = Date.now() - stageStart;
        failure = toFailure(stage.name, error);
        this.callbacks.onStageError?.(stage.name, failure.error);
        break;
      }
    }

    this.currentState = failure ? 'failed' : 'done';
    const completedAt = currentTime(context).toISOString();

    let manifestLocation: string | undefined;
    if (executed.length > 0) {
      const manifest = generateManifest({
        year,
        store: context.store.describe(),
        startedAt,
        completedAt,
        artifacts,
        stagesExecuted: executed,
        stagesSkipped: plan.toSkip,
        perStageMs: perStage,
        failedStage: failure?.stage,
        error: failure ? describeError(failure.error) : undefined,
      });
      manifestLocation = await context.store.writeManifest(year, manifest);
    }

    if (failure) {
      context.logger?.debug(`[driver] ${year}: stage ${failure.stage} failed: ${describeError(failure.error)}`);
      return {
        state: 'failed',
        year,
        stagesExecuted: executed,
        stagesSkipped: plan.toSkip,
        artifacts,
        results,
        failure,
        manifestLocation,
        timing: { startedAt, completedAt, durationMs: Date.now() - startTime, perStage },
      };
    }

    return {
      state: 'done',
      year,
      stagesExecuted: executed,
      stagesSkipped: plan.toSkip,
      artifacts,
      results,
      manifestLocation,
      timing: { startedAt, completedAt, durationMs: Date.now() - startTime, perStage },
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split the stage order into the stages a run executes and those it skips.
 *
 * @throws InvalidConfigError if fromStage comes after stopAfterStage
 */
export function planStages(options: ExecuteOptions = {}): { toExecute: StageName[]; toSkip: StageName[] } {
  const from = STAGE_ORDER.indexOf(options.fromStage ?? 'extract');
  const to = STAGE_ORDER.indexOf(options.stopAfterStage ?? 'report');
  if (from > to) {
    throw new InvalidConfigError(
      `Cannot start at "${STAGE_ORDER[from]}" and stop after the earlier "${STAGE_ORDER[to]}"`
    );
  }

  return {
    toExecute: STAGE_ORDER.slice(from, to + 1),
    toSkip: STAGE_ORDER.filter((_, index) => index < from || index > to),
  };
}

function toFailure(stage: StageName, error: unknown): StageFailure {
  const normalized = error instanceof Error ? error : new Error(String(error));
  return {
    stage,
    code: isPipelineError(normalized) ? normalized.code : undefined,
    message: normalized.message,
    error: normalized,
  };
}

/**
 * Create a driver with the given stages registered.
 */
export function createPipelineDriver(stages: readonly Stage[], callbacks?: DriverCallbacks): PipelineDriver {
  const driver = new PipelineDriver();
  driver.registerStages(stages);
  if (callbacks) {
    driver.setCallbacks(callbacks);
  }
  return driver;
}
