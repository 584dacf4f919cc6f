/**
 * Run Summary Formatters
 *
 * CLI output formatters for driver results:
 * - Standard run summary display
 * - The one-line failure message
 * - Per-stage timing breakdown
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import { describeError } from '../../errors/index.js';
import type { DriverResult, StageFailure } from '../../pipeline/driver.js';
import { STAGE_ORDER } from '../../schemas/stage.js';
import { formatDuration, STAGE_LABELS } from './progress.js';

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Year:     2024
 *
 * Pipeline: SUCCESS
 * Duration: 1.2s
 * Stages:   4/4 completed
 *
 * Artifacts:
 *   raw_data_2024.csv     9,841 bytes  120 rows
 *   report_2024.txt       2,310 bytes
 * ```
 */
export function formatRunSummary(result: DriverResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold(result.state === 'done' ? '=== Run Complete ===' : '=== Run Failed ==='));
  lines.push(`Year:     ${chalk.cyan(String(result.year))}`);
  lines.push('');

  lines.push(`Pipeline: ${result.state === 'done' ? chalk.green('SUCCESS') : chalk.red('FAILED')}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);

  const completed = result.stagesExecuted.length - (result.failure ? 1 : 0);
  lines.push(`Stages:   ${completed}/${result.stagesExecuted.length} completed`);
  if (result.stagesSkipped.length > 0) {
    lines.push(`Skipped:  ${result.stagesSkipped.join(', ')}`);
  }

  if (result.artifacts.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Artifacts:'));
    const width = Math.max(...result.artifacts.map((ref) => ref.name.length));
    for (const ref of result.artifacts) {
      const rows = ref.rowCount === undefined ? '' : `  ${ref.rowCount} rows`;
      lines.push(`  ${ref.name.padEnd(width)}  ${ref.sizeBytes.toLocaleString('en-US')} bytes${rows}`);
    }
  }

  if (result.manifestLocation) {
    lines.push('');
    lines.push(`Manifest: ${chalk.dim(result.manifestLocation)}`);
  }

  return lines.join('\n');
}

/**
 * One-line description of a failed stage, without the `Error: ` prefix.
 *
 * @example formatFailureLine(failure) // 'stage extract failed: EmptyResult: No rows for year 1999 in housing.csv'
 */
export function formatFailureLine(failure: StageFailure): string {
  return `stage ${failure.stage} failed: ${describeError(failure.error)}`;
}

/**
 * Format per-stage durations, in stage order.
 */
export function formatTimingBreakdown(result: DriverResult): string {
  const lines = [chalk.bold('Timing:')];
  for (const name of STAGE_ORDER) {
    const ms = result.timing.perStage[name];
    if (ms !== undefined) {
      lines.push(`  ${STAGE_LABELS[name].padEnd(10)}${formatDuration(ms)}`);
    }
  }
  lines.push(`  ${'Total'.padEnd(10)}${formatDuration(result.timing.durationMs)}`);
  return lines.join('\n');
}
