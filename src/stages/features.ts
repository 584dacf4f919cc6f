/**
 * Features Stage (Stage 3)
 *
 * Reads the clean artifact for the run's year, derives the configured feature
 * columns and persists the features artifact.
 *
 * @module stages/features
 */

import { currentTime, type TypedStage, type StageContext, type StageResult } from '../pipeline/types.js';
import { tableArtifactName } from '../storage/paths.js';
import { buildFeatures } from './features/index.js';

const STAGE_NAME = 'features' as const;
const STAGE_NUMBER = 3 as const;

/**
 * Summary of a features run.
 */
export interface FeaturesSummary {
  rowCount: number;
  columnsIn: number;
  columnsOut: number;
  /** New columns, in spec order */
  added: string[];
}

/**
 * Features Stage (Stage 3)
 *
 * Input: clean_data_<year>.csv
 * Output: features_<year>.csv
 */
export const featuresStage: TypedStage<FeaturesSummary> = {
  name: STAGE_NAME,
  number: STAGE_NUMBER,

  async execute(context: StageContext): Promise<StageResult<FeaturesSummary>> {
    const startedAt = currentTime(context).toISOString();
    const startTime = Date.now();
    const { year } = context.params;

    const cleanTable = await context.store.readTable('clean', year);
    context.logger?.debug(
      `[features] Building ${context.config.features.length} features over ${cleanTable.rowCount} rows`
    );

    const featured = buildFeatures(cleanTable, context.config.features);
    const added = featured.columnNames.slice(cleanTable.columns.length);
    context.logger?.debug(`[features] New columns: ${added.join(', ')}`);

    const artifact = await context.store.writeTable(
      STAGE_NAME,
      year,
      featured,
      tableArtifactName('clean', year)
    );

    return {
      data: {
        rowCount: featured.rowCount,
        columnsIn: cleanTable.columns.length,
        columnsOut: featured.columns.length,
        added,
      },
      artifact,
      timing: {
        startedAt,
        completedAt: currentTime(context).toISOString(),
        durationMs: Date.now() - startTime,
      },
    };
  },
};
