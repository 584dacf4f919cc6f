/**
 * Pipeline Defaults
 *
 * The default pipeline configuration for the housing dataset, and the loader
 * that layers a JSON override file and CLI overrides on top of it. The result
 * is validated with zod and deep-frozen before any stage sees it.
 *
 * @module config/defaults
 */

import * as fs from 'node:fs/promises';
import { InvalidConfigError } from '../errors/index.js';
import {
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from '../schemas/pipeline-config.js';

// ============================================================================
// Defaults
// ============================================================================

const float = (name: string) => ({ name, type: 'float' as const, required: true });

/**
 * Default configuration, in input form ("+inf" for infinite bin edges).
 */
export const DEFAULT_PIPELINE_CONFIG_INPUT: PipelineConfigInput = deepFreeze({
  dataset: {
    columns: [
      float('MedInc'),
      float('HouseAge'),
      float('AveRooms'),
      { name: 'AveBedrms', type: 'float', required: false, fill: 'mean' },
      float('Population'),
      float('AveOccup'),
      float('Latitude'),
      float('Longitude'),
      float('MedHouseVal'),
      { name: 'year', type: 'integer', required: true },
      { name: 'extraction_date', type: 'date', required: false },
    ],
    yearColumn: 'year',
    extractionDateColumn: 'extraction_date',
  },
  clean: {
    outlier: { columns: ['MedHouseVal'], threshold: 1.5, method: 'iqr' },
    rangeRules: [
      { column: 'AveRooms', min: 0, exclusive: true },
      { column: 'Population', min: 0, exclusive: true },
    ],
  },
  features: [
    { kind: 'combine', name: 'rooms_per_household', op: 'ratio', columns: ['AveRooms', 'AveBedrms'] },
    {
      kind: 'combine',
      name: 'population_density',
      op: 'ratio',
      columns: ['Population', 'AveOccup'],
      offset: 1,
    },
    { kind: 'combine', name: 'income_per_capita', op: 'ratio', columns: ['MedInc', 'AveOccup'] },
    {
      kind: 'combine',
      name: 'bedroom_ratio',
      op: 'ratio',
      columns: ['AveBedrms', 'AveRooms'],
      offset: 0.01,
    },
    {
      kind: 'bucket',
      name: 'price_category',
      column: 'MedHouseVal',
      edges: [0, 1.2, 1.8, 2.6, '+inf'],
      labels: ['low', 'medium', 'high', 'very_high'],
    },
    {
      kind: 'bucket',
      name: 'income_category',
      column: 'MedInc',
      edges: [0, 3, 5, 7, '+inf'],
      labels: ['low', 'medium', 'high', 'very_high'],
    },
    {
      kind: 'bucket',
      name: 'house_age_category',
      column: 'HouseAge',
      edges: [0, 10, 25, 40, '+inf'],
      labels: ['new', 'modern', 'old', 'very_old'],
    },
    { kind: 'combine', name: 'MedInc_log', op: 'log1p', columns: ['MedInc'] },
    { kind: 'combine', name: 'HouseAge_log', op: 'log1p', columns: ['HouseAge'] },
    { kind: 'combine', name: 'AveRooms_log', op: 'log1p', columns: ['AveRooms'] },
    { kind: 'combine', name: 'Population_log', op: 'log1p', columns: ['Population'] },
    {
      kind: 'combine',
      name: 'income_age_interaction',
      op: 'product',
      columns: ['MedInc', 'HouseAge'],
    },
    {
      kind: 'combine',
      name: 'market_segment',
      op: 'concat',
      columns: ['income_category', 'price_category'],
      separator: '_',
    },
  ],
  report: {
    format: 'txt',
    targetColumn: 'MedHouseVal',
    categoryColumns: ['price_category', 'income_category'],
    maxNumericColumns: 10,
  },
});

/**
 * Validated, frozen default configuration.
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = parsePipelineConfig(DEFAULT_PIPELINE_CONFIG_INPUT);

// ============================================================================
// Loading
// ============================================================================

/**
 * Options for {@link loadPipelineConfig}.
 */
export interface LoadPipelineConfigOptions {
  /** JSON file merged over the defaults */
  path?: string;

  /** Partial configurations merged last, in order (CLI flags) */
  overrides?: readonly unknown[];
}

/**
 * Build the pipeline configuration: defaults, then the JSON file, then the
 * overrides. Objects merge key by key; arrays and scalars replace.
 *
 * @throws InvalidConfigError if the file cannot be read or the result is invalid
 *
 * @example
 * ```typescript
 * const config = await loadPipelineConfig({
 *   path: 'pipeline.json',
 *   overrides: [{ clean: { removeOutliers: false } }],
 * });
 * ```
 */
export async function loadPipelineConfig(options: LoadPipelineConfigOptions = {}): Promise<PipelineConfig> {
  let merged: unknown = DEFAULT_PIPELINE_CONFIG_INPUT;

  if (options.path) {
    merged = deepMerge(merged, await readConfigFile(options.path));
  }
  for (const override of options.overrides ?? []) {
    merged = deepMerge(merged, override);
  }

  return parsePipelineConfig(merged);
}

/**
 * Validate a configuration value and deep-freeze the result.
 *
 * @throws InvalidConfigError listing every schema issue
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid pipeline configuration: ${issues}`);
  }
  return deepFreeze(result.data);
}

async function readConfigFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError(`Cannot read pipeline config ${filePath}: ${message}`);
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    throw new InvalidConfigError(`Pipeline config ${filePath} is not valid JSON`);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base` without mutating either.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

/**
 * Recursively freeze a value in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
