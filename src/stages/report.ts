/**
 * Report Stage (Stage 4)
 *
 * Reads the features artifact for the run's year and writes the report in
 * the configured format to the results directory.
 *
 * @module stages/report
 */

import { currentTime, type TypedStage, type StageContext, type StageResult } from '../pipeline/types.js';
import type { ReportFormat } from '../schemas/pipeline-config.js';
import { tableArtifactName } from '../storage/paths.js';
import { buildAggregate, renderReport, resolveReportFormat } from './report/index.js';

const STAGE_NAME = 'report' as const;
const STAGE_NUMBER = 4 as const;

/**
 * Summary of a report run.
 */
export interface ReportSummary {
  format: ReportFormat;
  rowCount: number;
  numericColumns: number;
  categoryColumns: number;
  target: string | null;
}

/**
 * Report Stage (Stage 4)
 *
 * Input: features_<year>.csv
 * Output: report_<year>.txt or report_<year>.json
 */
export const reportStage: TypedStage<ReportSummary> = {
  name: STAGE_NAME,
  number: STAGE_NUMBER,

  async execute(context: StageContext): Promise<StageResult<ReportSummary>> {
    const started = currentTime(context);
    const startTime = Date.now();
    const { year } = context.params;
    const format = resolveReportFormat(context.config.report.format);

    const featured = await context.store.readTable('features', year);
    context.logger?.debug(`[report] Summarising ${featured.rowCount} rows as ${format}`);

    const aggregate = buildAggregate(featured, {
      year,
      source: tableArtifactName('features', year),
      generatedAt: started.toISOString(),
      options: context.config.report,
    });
    const artifact = await context.store.writeReport(
      year,
      format,
      Buffer.from(renderReport(aggregate, format), 'utf-8')
    );
    context.logger?.debug(`[report] Wrote ${artifact.location}`);

    return {
      data: {
        format,
        rowCount: featured.rowCount,
        numericColumns: Object.keys(aggregate.numericStats).length,
        categoryColumns: Object.keys(aggregate.categoryCounts).length,
        target: aggregate.correlations.target,
      },
      artifact,
      timing: {
        startedAt: started.toISOString(),
        completedAt: currentTime(context).toISOString(),
        durationMs: Date.now() - startTime,
      },
    };
  },
};
