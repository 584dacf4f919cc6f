/**
 * Data Sources
 *
 * Where the extractor reads rows from. The file source parses a CSV with
 * papaparse; the table source serves an in-memory table.
 *
 * @module stages/extract/source
 */

import * as fs from 'node:fs/promises';
import { SourceUnavailableError } from '../../errors/index.js';
import { parseCsv } from '../../table/csv.js';
import type { RecordTable } from '../../table/record-table.js';

/**
 * Upstream data source for the extractor.
 */
export interface DataSource {
  /** Label used in messages and the stage summary */
  describe(): string;

  /**
   * Read every row the source holds.
   *
   * @throws SourceUnavailableError when the source cannot be read
   */
  read(): Promise<RecordTable>;
}

/**
 * CSV file on disk. Column types are inferred from the text.
 */
export class CsvFileSource implements DataSource {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<RecordTable> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(this.filePath, reason, { cause: error });
    }
    return parseCsv(text);
  }
}

/**
 * Fixed in-memory table.
 */
export class TableSource implements DataSource {
  constructor(
    private readonly table: RecordTable,
    private readonly label = 'memory'
  ) {}

  describe(): string {
    return this.label;
  }

  async read(): Promise<RecordTable> {
    return this.table;
  }
}
