/**
 * Extract Stage (Stage 1)
 *
 * Reads the rows for the run's year from the data source and persists them
 * as the raw artifact, replacing any earlier one for that year.
 *
 * @module stages/extract
 */

import { currentTime, type TypedStage, type StageContext, type StageResult } from '../pipeline/types.js';
import { extract } from './extract/index.js';
import type { DataSource } from './extract/source.js';

const STAGE_NAME = 'extract' as const;
const STAGE_NUMBER = 1 as const;

/**
 * Summary of an extract run.
 */
export interface ExtractSummary {
  source: string;
  rowCount: number;
  columnCount: number;
}

/**
 * Create the Extract Stage (Stage 1) for a data source.
 *
 * Input: the data source
 * Output: raw_data_<year>.csv
 */
export function createExtractStage(source: DataSource): TypedStage<ExtractSummary> {
  return {
    name: STAGE_NAME,
    number: STAGE_NUMBER,

    async execute(context: StageContext): Promise<StageResult<ExtractSummary>> {
      const started = currentTime(context);
      const startTime = Date.now();
      const { year } = context.params;

      context.logger?.debug(`[extract] Reading ${source.describe()} for ${year}`);

      const raw = await extract(year, source, {
        yearColumn: context.config.dataset.yearColumn,
        extractionDateColumn: context.config.dataset.extractionDateColumn,
        now: started,
      });

      context.logger?.debug(`[extract] ${raw.rowCount} rows, ${raw.columns.length} columns`);

      const artifact = await context.store.writeTable(STAGE_NAME, year, raw);

      return {
        data: { source: source.describe(), rowCount: raw.rowCount, columnCount: raw.columns.length },
        artifact,
        timing: {
          startedAt: started.toISOString(),
          completedAt: currentTime(context).toISOString(),
          durationMs: Date.now() - startTime,
        },
      };
    },
  };
}
