/**
 * Combination Features
 *
 * Pure per-row functions of one or more columns. Any null operand gives null,
 * and so does a non-finite result (division by zero, log1p of a value ≤ -1).
 *
 * @module stages/features/combine
 */

import { InvalidConfigError } from '../../errors/index.js';
import {
  featureSpecProblems,
  type CombineFeature,
  type CombineOp,
  type DeepReadonly,
} from '../../schemas/pipeline-config.js';
import { isNumericType, type ColumnType } from '../../schemas/table.js';
import type { CellValue } from '../../table/coerce.js';
import type { RecordTable } from '../../table/record-table.js';

type NumericOp = Exclude<CombineOp, 'concat'>;

/**
 * Apply a numeric op to non-null operands.
 */
export function applyNumericOp(op: NumericOp, operands: readonly number[], offset = 0): number | null {
  const result = evaluate(op, operands, offset);
  return Number.isFinite(result) ? result : null;
}

function evaluate(op: NumericOp, operands: readonly number[], offset: number): number {
  switch (op) {
    case 'ratio':
      return operands[0] / (operands[1] + offset);
    case 'difference':
      return operands[0] - operands[1];
    case 'sum':
      return operands.reduce((acc, value) => acc + value, 0);
    case 'product':
      return operands.reduce((acc, value) => acc * value, 1);
    case 'log1p':
      return Math.log1p(operands[0]);
  }
}

/**
 * Column type a combine op produces.
 */
export function combineOutputType(op: CombineOp): ColumnType {
  return op === 'concat' ? 'string' : 'float';
}

/**
 * Compute a combination feature column.
 *
 * @throws InvalidConfigError for a wrong operand count or a non-numeric operand of a numeric op
 * @throws UnknownColumnError when an operand column is absent
 */
export function computeCombine(table: RecordTable, spec: DeepReadonly<CombineFeature>): CellValue[] {
  const problems = featureSpecProblems(spec);
  if (problems.length > 0) {
    throw new InvalidConfigError(problems.join('; '));
  }

  const columns = spec.columns.map((name) => table.requireColumn(name, `feature "${spec.name}"`));
  const op = spec.op;

  if (op === 'concat') {
    return table.rows.map((row) => {
      const parts = spec.columns.map((name) => row[name] ?? null);
      return parts.some((part) => part === null) ? null : parts.map(String).join(spec.separator);
    });
  }

  const nonNumeric = columns.find((column) => !isNumericType(column.type));
  if (nonNumeric) {
    throw new InvalidConfigError(
      `Feature "${spec.name}" applies ${op} to ${nonNumeric.type} column "${nonNumeric.name}"`
    );
  }

  return table.rows.map((row) => {
    const operands: number[] = [];
    for (const name of spec.columns) {
      const value = row[name];
      if (typeof value !== 'number') {
        return null;
      }
      operands.push(value);
    }
    return applyNumericOp(op, operands, spec.offset);
  });
}
