/**
 * Pipeline Stages Exports
 *
 * Central export point for the four stage implementations and the pure
 * functions behind them.
 *
 * @module stages
 */

import type { DataSource } from './extract/index.js';
import { cleanStage } from './clean.js';
import { createExtractStage } from './extract.js';
import { featuresStage } from './features.js';
import { reportStage } from './report.js';
import type { Stage } from '../pipeline/types.js';

// Stage 1: Extract
export { createExtractStage, type ExtractSummary } from './extract.js';

// Stage 2: Clean
export { cleanStage } from './clean.js';

// Stage 3: Features
export { featuresStage, type FeaturesSummary } from './features.js';

// Stage 4: Report
export { reportStage, type ReportSummary } from './report.js';

export * from './extract/index.js';
export * from './clean/index.js';
export * from './features/index.js';
export * from './report/index.js';

/**
 * The four stages in execution order, extracting from the given source.
 */
export function createStages(source: DataSource): Stage[] {
  return [createExtractStage(source), cleanStage, featuresStage, reportStage];
}
