/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Calendar Date Schema
// ============================================

/**
 * Calendar date pattern used by `date` columns (YYYY-MM-DD).
 */
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Check whether a string is a YYYY-MM-DD date naming a real day.
 *
 * @example isCalendarDate('2024-02-29') // true
 * @example isCalendarDate('2023-02-29') // false
 */
export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

// ============================================
// Year Schema
// ============================================

/**
 * Calendar year a run is keyed by. Positive integer.
 */
export const YearSchema = z.number().int().positive({ message: 'Year must be a positive integer' });

/**
 * Year as it arrives from the command line or environment ("2024").
 */
export const YearInputSchema = z.coerce.number().pipe(YearSchema);
