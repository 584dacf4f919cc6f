/**
 * Reporter
 *
 * Summarises a featured table into one aggregate and renders it as text or
 * JSON. Both formats carry the same information.
 *
 * @module stages/report
 */

import { UnsupportedFormatError } from '../../errors/index.js';
import {
  ReportFormatSchema,
  SUPPORTED_REPORT_FORMATS,
  type ReportFormat,
} from '../../schemas/pipeline-config.js';
import type { RecordTable } from '../../table/record-table.js';
import { buildAggregate, type AggregateContext } from './aggregate.js';
import { renderJson, renderText } from './render.js';
import type { ReportAggregate } from './types.js';

/**
 * Check a requested format before any work is done.
 *
 * @throws UnsupportedFormatError
 */
export function resolveReportFormat(format: string): ReportFormat {
  const parsed = ReportFormatSchema.safeParse(format);
  if (!parsed.success) {
    throw new UnsupportedFormatError(format, SUPPORTED_REPORT_FORMATS);
  }
  return parsed.data;
}

export function renderReport(aggregate: ReportAggregate, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return renderJson(aggregate);
    case 'txt':
      return renderText(aggregate);
  }
}

/**
 * Build the report bytes for a featured table.
 *
 * @throws UnsupportedFormatError for any format other than txt or json; the
 *   table is not summarised then
 *
 * @example
 * ```typescript
 * const bytes = generateReport(featured, 'json', {
 *   year: 2024,
 *   source: 'features_2024.csv',
 *   generatedAt: new Date().toISOString(),
 *   options: config.report,
 * });
 * ```
 */
export function generateReport(table: RecordTable, format: string, context: AggregateContext): Buffer {
  const resolved = resolveReportFormat(format);
  return Buffer.from(renderReport(buildAggregate(table, context), resolved), 'utf-8');
}

export { buildAggregate, numericStats, type AggregateContext } from './aggregate.js';
export { renderJson, renderText, formatPath } from './render.js';
export { parseJsonReport, parseTextReport } from './parse.js';
export * from './types.js';
