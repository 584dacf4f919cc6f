/**
 * Report Renderers
 *
 * Pure functions of the aggregate. JSON is the aggregate pretty-printed; text
 * is one `[section]` per top-level key followed by `path: value` lines, where
 * path segments are joined with dots (quoted as JSON strings when they contain
 * anything but letters, digits, `_` or `-`) and values are JSON literals.
 *
 * @module stages/report/render
 */

import type { ReportAggregate } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** JSON indentation for pretty printing */
const JSON_INDENT = 2;

/** Path segments written without quotes */
export const BARE_SEGMENT = /^[A-Za-z0-9_-]+$/;

// ============================================================================
// JSON
// ============================================================================

export function renderJson(aggregate: ReportAggregate): string {
  return `${JSON.stringify(aggregate, null, JSON_INDENT)}\n`;
}

// ============================================================================
// Text
// ============================================================================

/**
 * @example
 * ```text
 * # Yearly data report 2024
 *
 * [metadata]
 * year: 2024
 * source: "features_2024.csv"
 *
 * [categoryCounts]
 * price_category.low: 12
 * ```
 */
export function renderText(aggregate: ReportAggregate): string {
  const lines = [`# Yearly data report ${aggregate.metadata.year}`];

  for (const [section, value] of Object.entries(aggregate)) {
    lines.push('', `[${section}]`);
    if (isPlainObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        flatten(child, [key], lines);
      }
    }
  }

  return `${lines.join('\n')}\n`;
}

function flatten(value: unknown, path: string[], lines: string[]): void {
  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0) {
      lines.push(`${formatPath(path)}: {}`);
    }
    for (const [key, child] of entries) {
      flatten(child, [...path, key], lines);
    }
    return;
  }
  lines.push(`${formatPath(path)}: ${JSON.stringify(value)}`);
}

export function formatPath(path: readonly string[]): string {
  return path.map((segment) => (BARE_SEGMENT.test(segment) ? segment : JSON.stringify(segment))).join('.');
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
