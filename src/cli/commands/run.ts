/**
 * Run Command
 *
 * Runs the pipeline for one year: all four stages by default, or a slice of
 * them with --from-stage / --stop-after. The single-stage commands go through
 * {@link runPipeline} as well.
 *
 * @module cli/commands/run
 */

import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { config as appConfig, loadPipelineConfig } from '../../config/index.js';
import { describeError } from '../../errors/index.js';
import { createPipelineDriver } from '../../pipeline/driver.js';
import { isValidStageName, type StageName } from '../../pipeline/types.js';
import { YearInputSchema } from '../../schemas/common.js';
import type { PipelineConfig } from '../../schemas/pipeline-config.js';
import { createRunParams, type RunParams } from '../../schemas/run-params.js';
import { STAGE_ORDER } from '../../schemas/stage.js';
import { CsvFileSource, createStages, resolveReportFormat } from '../../stages/index.js';
import { FileArtifactStore, resolveArtifactDirs, type ArtifactStore } from '../../storage/index.js';
import { EXIT_CODES, exitCodeFor, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { createStageProgress } from '../formatters/progress.js';
import { formatFailureLine, formatRunSummary, formatTimingBreakdown } from '../formatters/run-summary.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What to run, as gathered from the command line.
 */
export interface PipelineRequest {
  year: number;
  /** CSV the extractor reads; defaults to PIPELINE_SOURCE_PATH */
  source?: string;
  /** Report format; checked before anything runs */
  format?: string;
  /** false to skip outlier removal */
  removeOutliers?: boolean;
  /** IQR multiplier for the outlier fences */
  threshold?: number;
  fromStage?: StageName;
  stopAfterStage?: StageName;
}

/**
 * Replaceable collaborators, for tests.
 */
export interface RunDependencies {
  store?: ArtifactStore;
  now?: () => Date;
}

/**
 * Options for the run command.
 */
export interface RunCommandOptions {
  year: number;
  source?: string;
  format?: string;
  removeOutliers: boolean;
  threshold?: number;
  fromStage?: StageName;
  stopAfter?: StageName;
}

// ============================================================================
// Option Parsers
// ============================================================================

export function parseYear(value: string): number {
  const result = YearInputSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError('Year must be a positive integer.');
  }
  return result.data;
}

export function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Threshold must be a positive number.');
  }
  return parsed;
}

export function parseStageName(value: string): StageName {
  if (!isValidStageName(value)) {
    throw new InvalidArgumentError(`Stage must be one of: ${STAGE_ORDER.join(', ')}.`);
  }
  return value;
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Partial pipeline configurations for the command-line flags.
 */
export function configOverrides(request: PipelineRequest): unknown[] {
  const overrides: unknown[] = [];
  if (request.format !== undefined) {
    overrides.push({ report: { format: request.format } });
  }
  if (request.removeOutliers === false) {
    overrides.push({ clean: { removeOutliers: false } });
  }
  if (request.threshold !== undefined) {
    overrides.push({ clean: { outlier: { threshold: request.threshold } } });
  }
  return overrides;
}

interface PreparedRun {
  params: RunParams;
  pipelineConfig: PipelineConfig;
  store: ArtifactStore;
  source: CsvFileSource;
}

/**
 * Resolve configuration, store and source before any stage runs.
 *
 * @throws UnsupportedFormatError or InvalidConfigError
 */
async function prepareRun(request: PipelineRequest, base: BaseCommand, deps: RunDependencies): Promise<PreparedRun> {
  if (request.format !== undefined) {
    resolveReportFormat(request.format);
  }
  const pipelineConfig = await loadPipelineConfig({
    path: base.options.config ?? appConfig.pipelineConfigPath,
    overrides: configOverrides(request),
  });
  const params = createRunParams({ year: request.year, verbose: base.isVerbose(), dirs: base.runDirs() });

  return {
    params,
    pipelineConfig,
    store: deps.store ?? new FileArtifactStore(resolveArtifactDirs(params.dirs, base.dataDir)),
    source: new CsvFileSource(path.resolve(request.source ?? appConfig.sourcePath)),
  };
}

/**
 * Run the requested stages and print the outcome.
 *
 * @returns Exit code: 0 when the run reaches done
 */
export async function runPipeline(
  request: PipelineRequest,
  base: BaseCommand,
  deps: RunDependencies = {}
): Promise<ExitCode> {
  let prepared: PreparedRun;
  try {
    prepared = await prepareRun(request, base, deps);
  } catch (error) {
    base.error(describeError(error));
    return exitCodeFor(error);
  }

  const { params, pipelineConfig, store, source } = prepared;
  base.debug(`Store: ${store.describe()}`);
  base.debug(`Source: ${source.describe()}`);

  const driver = createPipelineDriver(createStages(source));
  if (!base.isQuiet()) {
    driver.setCallbacks(createStageProgress().callbacks());
  }

  const result = await driver.execute(
    { params, config: pipelineConfig, store, logger: base, now: deps.now },
    { fromStage: request.fromStage, stopAfterStage: request.stopAfterStage }
  );

  if (result.failure) {
    base.error(formatFailureLine(result.failure));
    return exitCodeFor(result.failure.error);
  }

  base.blank();
  base.info(formatRunSummary(result));
  if (base.isVerbose()) {
    base.blank();
    base.info(formatTimingBreakdown(result));
  }
  return EXIT_CODES.SUCCESS;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the pipeline for a year')
    .requiredOption('-y, --year <year>', 'Year to process', parseYear)
    .option('-s, --source <csv>', 'Source CSV file')
    .option('-f, --format <format>', 'Report format: txt, json')
    .option('--no-remove-outliers', 'Keep IQR outliers')
    .option('-t, --threshold <k>', 'IQR multiplier for outlier fences', parseThreshold)
    .option('--from-stage <stage>', 'Start at this stage, reading its input from the store', parseStageName)
    .option('--stop-after <stage>', 'Stop after this stage', parseStageName)
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent);
      process.exitCode = await runPipeline(
        {
          year: options.year,
          source: options.source,
          format: options.format,
          removeOutliers: options.removeOutliers,
          threshold: options.threshold,
          fromStage: options.fromStage,
          stopAfterStage: options.stopAfter,
        },
        base
      );
    });
}
