#!/usr/bin/env node
/**
 * Yearly Data Pipeline CLI
 *
 * Main entry point for the pipeline tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   pipeline --help
 *   pipeline run --year 2024
 *   pipeline run --year 2024 --format json --from-stage report
 *   pipeline clean --year 2024 --threshold 3
 *
 * @module cli
 */

import { Command } from 'commander';
import { z } from 'zod';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES } from './base-command.js';
import { registerCommands } from './commands/index.js';

/**
 * Global options as commander reports them.
 */
const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  color: z.boolean().optional(),
  dataDir: z.string().optional(),
  rawDir: z.string().optional(),
  processedDir: z.string().optional(),
  resultsDir: z.string().optional(),
  config: z.string().optional(),
});

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('pipeline')
    .description('Yearly batch pipeline: extract, clean, derive features, report')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (./data)')
    .option('--raw-dir <path>', 'Directory for raw artifacts')
    .option('--processed-dir <path>', 'Directory for clean and features artifacts')
    .option('--results-dir <path>', 'Directory for reports and run manifests')
    .option('--config <file>', 'JSON file merged over the pipeline defaults');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = GlobalOptionsSchema.parse(thisCommand.opts());
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.fatal('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exitCode = EXIT_CODES.ERROR;
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
