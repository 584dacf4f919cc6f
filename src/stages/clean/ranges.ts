/**
 * Logical range rules, e.g. AveRooms > 0. Rows with a value outside a rule's
 * bounds are dropped; nulls pass.
 *
 * @module stages/clean/ranges
 */

import { InvalidSchemaError } from '../../errors/index.js';
import type { DeepReadonly, RangeRule } from '../../schemas/pipeline-config.js';
import { isNumericType } from '../../schemas/table.js';
import type { CellValue } from '../../table/coerce.js';
import type { RecordTable } from '../../table/record-table.js';
import type { RowFilterResult } from './types.js';

/**
 * Whether a value satisfies a rule.
 */
export function withinRange(value: CellValue, rule: DeepReadonly<RangeRule>): boolean {
  if (typeof value !== 'number') {
    return true;
  }
  if (rule.min !== undefined && (rule.exclusive ? value <= rule.min : value < rule.min)) {
    return false;
  }
  if (rule.max !== undefined && (rule.exclusive ? value >= rule.max : value > rule.max)) {
    return false;
  }
  return true;
}

/**
 * Drop rows violating any rule.
 *
 * @throws UnknownColumnError for a rule on a column the table lacks
 * @throws InvalidSchemaError for a rule on a non-numeric column
 */
export function applyRangeRules(
  table: RecordTable,
  rules: readonly DeepReadonly<RangeRule>[]
): RowFilterResult {
  for (const rule of rules) {
    const column = table.requireColumn(rule.column, 'range rule');
    if (!isNumericType(column.type)) {
      throw new InvalidSchemaError(`Range rule column "${rule.column}" is ${column.type}, not numeric`, [
        rule.column,
      ]);
    }
  }

  const kept = table.filter((row) => rules.every((rule) => withinRange(row[rule.column] ?? null, rule)));
  return { table: kept, removed: table.rowCount - kept.rowCount };
}
