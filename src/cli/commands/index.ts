/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 *
 * Available commands:
 * - run: Run the pipeline (or a slice of it) for a year
 * - extract, clean, features, report: Run a single stage for a year
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerStageCommands } from './stages.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerStageCommands(program);
}
