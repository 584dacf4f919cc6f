/**
 * Configuration Module
 *
 * Loads and validates environment variables for the pipeline.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolve } from 'node:path';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Root of the raw/processed/results directories
  PIPELINE_DATA_DIR: z.string().optional(),

  // CSV file the extractor reads
  PIPELINE_SOURCE_PATH: z.string().optional(),

  // JSON file overriding the pipeline defaults
  PIPELINE_CONFIG_PATH: z.string().optional(),
});

type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Extraction source
  sourcePath: resolve(env.PIPELINE_SOURCE_PATH || 'data/source/housing.csv'),

  // Pipeline config override file, if any
  pipelineConfigPath: env.PIPELINE_CONFIG_PATH ? resolve(env.PIPELINE_CONFIG_PATH) : undefined,
} as const;

// Re-export types
export type Config = typeof config;

// Re-export pipeline defaults
export * from './defaults.js';
