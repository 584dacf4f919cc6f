/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  STAGE_LABELS,
  createStageProgress,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatFailureLine,
  formatTimingBreakdown,
} from './run-summary.js';
