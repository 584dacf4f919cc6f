/**
 * Run Parameters Schema
 *
 * Per-invocation parameters threaded through every stage: the year being
 * processed, verbosity and optional directory overrides. Immutable once built.
 */

import { z } from 'zod';
import { YearSchema } from './common.js';
import { InvalidConfigError } from '../errors/index.js';

// ============================================================================
// Directory Overrides
// ============================================================================

/**
 * Overrides for the three logical artifact directories.
 * Unset entries fall back to `<dataDir>/raw`, `<dataDir>/processed`, `<dataDir>/results`.
 */
export const RunDirsSchema = z.object({
  raw: z.string().min(1).optional(),
  processed: z.string().min(1).optional(),
  results: z.string().min(1).optional(),
});

export type RunDirs = z.infer<typeof RunDirsSchema>;

// ============================================================================
// Run Parameters
// ============================================================================

export const RunParamsSchema = z.object({
  /** Calendar year this run processes */
  year: YearSchema,

  /** Emit a human-readable progress trace */
  verbose: z.boolean().default(false),

  /** Directory overrides */
  dirs: RunDirsSchema.default({}),
});

export type RunParamsInput = z.input<typeof RunParamsSchema>;

export type RunParams = Readonly<{
  year: number;
  verbose: boolean;
  dirs: Readonly<RunDirs>;
}>;

/**
 * Validate and freeze run parameters.
 *
 * @throws InvalidConfigError if the year is missing or not a positive integer
 *
 * @example
 * const params = createRunParams({ year: 2024, verbose: true });
 * Object.isFrozen(params); // true
 */
export function createRunParams(input: RunParamsInput): RunParams {
  const result = RunParamsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid run parameters: ${issues}`);
  }

  return Object.freeze({
    year: result.data.year,
    verbose: result.data.verbose,
    dirs: Object.freeze({ ...result.data.dirs }),
  });
}
