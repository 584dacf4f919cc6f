/**
 * Extractor
 *
 * Pulls the rows for one year out of a data source. If the source carries a
 * year column the rows are filtered by it; otherwise every row is stamped with
 * the requested year. Each row also gets the extraction date. No cleaning
 * happens here: bad values pass through to the cleaner.
 *
 * @module stages/extract
 */

import { EmptyResultError } from '../../errors/index.js';
import type { CellValue } from '../../table/coerce.js';
import type { RecordTable } from '../../table/record-table.js';
import type { DataSource } from './source.js';

/**
 * Options for {@link extract}.
 */
export interface ExtractOptions {
  /** Column holding the year (default "year") */
  yearColumn?: string;

  /** Column stamped with the extraction date (default "extraction_date") */
  extractionDateColumn?: string;

  /** Time of the run; the extraction date is its UTC calendar date */
  now?: Date;
}

/**
 * Extract the rows of a year.
 *
 * @throws SourceUnavailableError when the source cannot be read
 * @throws EmptyResultError when no row matches the year
 *
 * @example
 * ```typescript
 * const raw = await extract(2024, new CsvFileSource('data/source/housing.csv'));
 * ```
 */
export async function extract(year: number, source: DataSource, options: ExtractOptions = {}): Promise<RecordTable> {
  const yearColumn = options.yearColumn ?? 'year';
  const dateColumn = options.extractionDateColumn ?? 'extraction_date';
  const now = options.now ?? new Date();

  const table = await source.read();
  const matching = table.hasColumn(yearColumn)
    ? table.filter((row) => matchesYear(row[yearColumn] ?? null, year))
    : table;

  if (matching.rowCount === 0) {
    throw new EmptyResultError(year, source.describe());
  }

  const extractionDate = formatCalendarDate(now);
  return matching
    .withColumn({ name: yearColumn, type: 'integer' }, matching.rows.map(() => year))
    .withColumn({ name: dateColumn, type: 'date' }, matching.rows.map(() => extractionDate));
}

/**
 * Whether a year cell holds the given year (as a number or numeric text).
 */
export function matchesYear(value: CellValue, year: number): boolean {
  if (typeof value === 'number') {
    return value === year;
  }
  return typeof value === 'string' && value.trim() === String(year);
}

/**
 * YYYY-MM-DD of a timestamp, in UTC.
 */
export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export { CsvFileSource, TableSource, type DataSource } from './source.js';
