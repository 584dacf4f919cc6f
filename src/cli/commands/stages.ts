/**
 * Single-Stage Commands
 *
 * `extract`, `clean`, `features` and `report` each run one stage for a year,
 * reading its upstream artifact from the store.
 *
 * @module cli/commands/stages
 */

import type { Command } from 'commander';
import type { StageName } from '../../pipeline/types.js';
import { getBaseCommand } from '../base-command.js';
import { parseThreshold, parseYear, runPipeline, type PipelineRequest } from './run.js';

/**
 * Options shared by the single-stage commands; each command declares the
 * subset it accepts.
 */
export interface StageCommandOptions {
  year: number;
  source?: string;
  format?: string;
  removeOutliers?: boolean;
  threshold?: number;
}

function stageAction(stage: StageName) {
  return async (options: StageCommandOptions, cmd: Command): Promise<void> => {
    const request: PipelineRequest = {
      year: options.year,
      source: options.source,
      format: options.format,
      removeOutliers: options.removeOutliers,
      threshold: options.threshold,
      fromStage: stage,
      stopAfterStage: stage,
    };
    process.exitCode = await runPipeline(request, getBaseCommand(cmd.parent));
  };
}

/**
 * Register the four single-stage commands.
 */
export function registerStageCommands(program: Command): void {
  program
    .command('extract')
    .description('Extract the raw rows for a year from the source CSV')
    .requiredOption('-y, --year <year>', 'Year to process', parseYear)
    .option('-s, --source <csv>', 'Source CSV file')
    .action(stageAction('extract'));

  program
    .command('clean')
    .description('Clean the raw artifact for a year')
    .requiredOption('-y, --year <year>', 'Year to process', parseYear)
    .option('--no-remove-outliers', 'Keep IQR outliers')
    .option('-t, --threshold <k>', 'IQR multiplier for outlier fences', parseThreshold)
    .action(stageAction('clean'));

  program
    .command('features')
    .description('Derive feature columns from the clean artifact for a year')
    .requiredOption('-y, --year <year>', 'Year to process', parseYear)
    .action(stageAction('features'));

  program
    .command('report')
    .description('Write the report for a year from its features artifact')
    .requiredOption('-y, --year <year>', 'Year to process', parseYear)
    .option('-f, --format <format>', 'Report format: txt, json')
    .action(stageAction('report'));
}
