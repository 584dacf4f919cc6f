/**
 * Exact-duplicate removal: rows identical across every column collapse to
 * their first occurrence, order preserved.
 *
 * @module stages/clean/dedupe
 */

import { rowKey, type RecordTable } from '../../table/record-table.js';
import type { RowFilterResult } from './types.js';

export function dedupeRows(table: RecordTable): RowFilterResult {
  const names = table.columnNames;
  const seen = new Set<string>();

  const deduped = table.filter((row) => {
    const key = rowKey(row, names);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });

  return { table: deduped, removed: table.rowCount - deduped.rowCount };
}
