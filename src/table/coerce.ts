/**
 * Cell Coercion
 *
 * Converts loosely typed cells (CSV text, hand-built rows) into values of a
 * declared column type, and infers a column type from raw text.
 *
 * @module table/coerce
 */

import { isCalendarDate } from '../schemas/common.js';
import type { ColumnType } from '../schemas/table.js';

/**
 * A single cell value. Dates are YYYY-MM-DD strings.
 */
export type CellValue = number | string | null;

/**
 * Result of coercing one cell.
 */
export type CoerceResult = { ok: true; value: CellValue } | { ok: false };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Check whether a value conforms to a column type. Null conforms to every type.
 */
export function conformsTo(value: CellValue, type: ColumnType): boolean {
  if (value === null) {
    return true;
  }
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'string':
      return typeof value === 'string';
    case 'date':
      return typeof value === 'string' && isCalendarDate(value);
  }
}

/**
 * Coerce a cell to a column type.
 *
 * Blank strings become null. Numeric text parses to numbers; numbers print to
 * strings for string columns. Anything else fails.
 *
 * @example coerceCell('3.5', 'float') // { ok: true, value: 3.5 }
 * @example coerceCell('abc', 'float') // { ok: false }
 */
export function coerceCell(value: CellValue, type: ColumnType): CoerceResult {
  if (value === null) {
    return { ok: true, value: null };
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return { ok: true, value: null };
    }
    switch (type) {
      case 'integer': {
        if (!FLOAT_PATTERN.test(trimmed)) return { ok: false };
        const parsed = Number(trimmed);
        return Number.isInteger(parsed) ? { ok: true, value: parsed } : { ok: false };
      }
      case 'float': {
        if (!FLOAT_PATTERN.test(trimmed)) return { ok: false };
        const parsed = Number(trimmed);
        return Number.isFinite(parsed) ? { ok: true, value: parsed } : { ok: false };
      }
      case 'string':
        return { ok: true, value };
      case 'date':
        return isCalendarDate(trimmed) ? { ok: true, value: trimmed } : { ok: false };
    }
  }

  switch (type) {
    case 'integer':
      return Number.isInteger(value) ? { ok: true, value } : { ok: false };
    case 'float':
      return Number.isFinite(value) ? { ok: true, value } : { ok: false };
    case 'string':
      return { ok: true, value: String(value) };
    case 'date':
      return { ok: false };
  }
}

/**
 * Infer the narrowest column type that every non-blank text cell satisfies.
 * integer is narrower than float, which is narrower than string; date applies
 * when every cell is a calendar date. A column with no values is a string column.
 */
export function inferTextColumnType(values: readonly (string | null)[]): ColumnType {
  let sawValue = false;
  let allInteger = true;
  let allFloat = true;
  let allDate = true;

  for (const raw of values) {
    if (raw === null) continue;
    const value = raw.trim();
    if (value === '') continue;

    sawValue = true;
    if (!INTEGER_PATTERN.test(value)) allInteger = false;
    if (!FLOAT_PATTERN.test(value) || !Number.isFinite(Number(value))) allFloat = false;
    if (!isCalendarDate(value)) allDate = false;

    if (!allInteger && !allFloat && !allDate) {
      return 'string';
    }
  }

  if (!sawValue) return 'string';
  if (allInteger) return 'integer';
  if (allFloat) return 'float';
  if (allDate) return 'date';
  return 'string';
}

/**
 * Infer a column type from in-memory values (numbers and strings).
 *
 * @returns the type, or null when numbers and strings are mixed
 */
export function inferValueColumnType(values: readonly CellValue[]): ColumnType | null {
  const present = values.filter((value): value is number | string => value !== null);
  if (present.length === 0) {
    return 'string';
  }

  if (present.every((value) => typeof value === 'number')) {
    return present.every((value) => Number.isInteger(value)) ? 'integer' : 'float';
  }

  if (present.every((value) => typeof value === 'string')) {
    return present.every((value) => typeof value === 'string' && isCalendarDate(value))
      ? 'date'
      : 'string';
  }

  return null;
}
