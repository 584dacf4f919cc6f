/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks, fed by driver callbacks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { DriverCallbacks } from '../../pipeline/driver.js';
import { STAGE_NUMBERS, type StageName } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Stage Labels
// ============================================================================

/**
 * Human-readable labels for each stage.
 */
export const STAGE_LABELS: Record<StageName, string> = {
  extract: 'Extract',
  clean: 'Clean',
  features: 'Features',
  report: 'Report',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Cleaning...');
 * spinner.start();
 * spinner.succeed('Clean complete');
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * driver.setCallbacks(progress.callbacks());
 * await driver.execute(context);
 * ```
 */
export class StageProgressDisplay {
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(isTTY: boolean = process.stdout.isTTY === true) {
    this.isTTY = isTTY;
  }

  startStage(name: StageName): void {
    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${STAGE_LABELS[name]}...`).start();
    } else {
      console.log(`[*] Stage ${STAGE_NUMBERS[name]}: ${STAGE_LABELS[name]}...`);
    }
  }

  completeStage(name: StageName, durationMs: number): void {
    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${STAGE_LABELS[name]} complete`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] Stage ${STAGE_NUMBERS[name]}: ${STAGE_LABELS[name]} (${formatDuration(durationMs)})`);
    }
  }

  failStage(name: StageName, error: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.fail(`${STAGE_LABELS[name]} failed`);
      this.currentSpinner = null;
    } else {
      console.log(`[X] Stage ${STAGE_NUMBERS[name]}: ${STAGE_LABELS[name]} - ${error}`);
    }
  }

  skipStage(name: StageName): void {
    if (!this.isTTY) {
      console.log(`[-] Stage ${STAGE_NUMBERS[name]}: ${STAGE_LABELS[name]} (skipped)`);
    }
  }

  /**
   * Driver callbacks that drive this display.
   */
  callbacks(): DriverCallbacks {
    return {
      onStageStart: (name) => this.startStage(name),
      onStageComplete: (name, result) => this.completeStage(name, result.timing.durationMs),
      onStageError: (name, error) => this.failStage(name, error.message),
      onStageSkip: (name) => this.skipStage(name),
    };
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example formatDuration(1500) // '1.5s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createStageProgress(isTTY?: boolean): StageProgressDisplay {
  return new StageProgressDisplay(isTTY);
}
