/**
 * Clean Stage (Stage 2)
 *
 * Reads the raw artifact for the run's year, cleans it and persists the clean
 * artifact. Nothing is written when cleaning fails.
 *
 * @module stages/clean
 */

import { currentTime, type TypedStage, type StageContext, type StageResult } from '../pipeline/types.js';
import { tableArtifactName } from '../storage/paths.js';
import { clean } from './clean/index.js';
import type { CleanReport } from './clean/types.js';

const STAGE_NAME = 'clean' as const;
const STAGE_NUMBER = 2 as const;

/**
 * Clean Stage (Stage 2)
 *
 * Input: raw_data_<year>.csv
 * Output: clean_data_<year>.csv, plus the clean report as the stage summary
 */
export const cleanStage: TypedStage<CleanReport> = {
  name: STAGE_NAME,
  number: STAGE_NUMBER,

  async execute(context: StageContext): Promise<StageResult<CleanReport>> {
    const startedAt = currentTime(context).toISOString();
    const startTime = Date.now();
    const { year } = context.params;

    const raw = await context.store.readTable('extract', year);
    context.logger?.debug(`[clean] Loaded ${raw.rowCount} raw rows for ${year}`);

    const { table, report } = clean(raw, context.config);

    if (report.columnsDropped.length > 0) {
      context.logger?.warn(`[clean] Dropped empty columns: ${report.columnsDropped.join(', ')}`);
    }
    for (const [column, fence] of Object.entries(report.fences)) {
      context.logger?.debug(
        `[clean] ${column} fence [${fence.lower.toFixed(4)}, ${fence.upper.toFixed(4)}] ` +
          `(Q1=${fence.q1.toFixed(4)}, Q3=${fence.q3.toFixed(4)})`
      );
    }
    const { dropped } = report;
    context.logger?.debug(
      `[clean] ${report.rowsIn} → ${report.rowsOut} rows ` +
        `(duplicates ${dropped.duplicates}, outliers ${dropped.outliers}, ` +
        `out of range ${dropped.outOfRange}, invalid ${dropped.invalidValue}, ` +
        `missing ${dropped.missingRequired}; ${report.nullsFilled} nulls filled)`
    );

    const artifact = await context.store.writeTable(
      STAGE_NAME,
      year,
      table,
      tableArtifactName('extract', year)
    );

    return {
      data: report,
      artifact,
      timing: {
        startedAt,
        completedAt: currentTime(context).toISOString(),
        durationMs: Date.now() - startTime,
      },
    };
  },
};
