/**
 * Table Schema
 *
 * Statically declared column definitions for Record Tables. A table's columns
 * are checked once, at construction, against these definitions.
 */

import { z } from 'zod';

// ============================================================================
// Column Type Schema
// ============================================================================

/**
 * Column value types.
 * - integer: integral numbers
 * - float: finite numbers
 * - string: free text
 * - date: calendar dates stored as YYYY-MM-DD strings
 */
export const ColumnTypeSchema = z.enum(['integer', 'float', 'string', 'date']);

export type ColumnType = z.infer<typeof ColumnTypeSchema>;

// ============================================================================
// Column Definition Schema
// ============================================================================

export const ColumnDefSchema = z.object({
  /** Column name as it appears in the CSV header */
  name: z.string().min(1),

  /** Declared value type */
  type: ColumnTypeSchema,
});

export type ColumnDef = z.infer<typeof ColumnDefSchema>;

/**
 * Ordered column list with unique names.
 */
export const ColumnsSchema = z.array(ColumnDefSchema).superRefine((columns, ctx) => {
  const seen = new Set<string>();
  for (const [index, column] of columns.entries()) {
    if (seen.has(column.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate column name: ${column.name}`,
        path: [index, 'name'],
      });
    }
    seen.add(column.name);
  }
});

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Whether a column type holds numbers.
 */
export function isNumericType(type: ColumnType): boolean {
  return type === 'integer' || type === 'float';
}
