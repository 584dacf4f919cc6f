/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, directories)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * The class doubles as the pipeline {@link Logger}, so stage output follows
 * the same verbosity rules as the CLI's own.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { isPipelineError, type PipelineErrorCode } from '../errors/index.js';
import type { Logger } from '../pipeline/types.js';
import type { RunDirs } from '../schemas/run-params.js';
import { getDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
  /** Override the raw artifact directory */
  rawDir?: string;
  /** Override the processed artifact directory */
  processedDir?: string;
  /** Override the results directory */
  resultsDir?: string;
  /** JSON file merged over the pipeline defaults */
  config?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** A stage failed on the data */
  ERROR: 1,
  /** Invalid usage, arguments or configuration */
  USAGE_ERROR: 2,
  /** Source or upstream artifact not found */
  NOT_FOUND: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const EXIT_CODE_BY_ERROR: Record<PipelineErrorCode, ExitCode> = {
  SourceUnavailable: EXIT_CODES.NOT_FOUND,
  ArtifactMissing: EXIT_CODES.NOT_FOUND,
  InvalidConfig: EXIT_CODES.USAGE_ERROR,
  UnsupportedFormat: EXIT_CODES.USAGE_ERROR,
  EmptyResult: EXIT_CODES.ERROR,
  InvalidSchema: EXIT_CODES.ERROR,
  UnknownColumn: EXIT_CODES.ERROR,
};

/**
 * Exit code for a thrown value.
 */
export function exitCodeFor(error: unknown): ExitCode {
  return isPipelineError(error) ? EXIT_CODE_BY_ERROR[error.code] : EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access consistent
 * logging, error handling, and options.
 *
 * @example
 * ```typescript
 * async function reportHandler(options: ReportOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd.parent);
 *
 *   base.info(`Reporting ${options.year}`);
 *   process.exitCode = await runPipeline(request, base);
 * }
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Resolved data directory path */
  readonly dataDir: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.dataDir = options.dataDir ?? getDataDir();

    // Configure chalk based on color preference
    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible).
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * Log an error and exit. Used for usage errors found before any work starts.
   *
   * @param message - Error message
   * @param code - Exit code
   */
  fatal(message: string, code: ExitCode = EXIT_CODES.ERROR): never {
    this.error(message);
    process.exit(code);
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Directory overrides given on the command line.
   */
  runDirs(): RunDirs {
    const dirs: RunDirs = {};
    if (this.options.rawDir) dirs.raw = this.options.rawDir;
    if (this.options.processedDir) dirs.processed = this.options.processedDir;
    if (this.options.resultsDir) dirs.results = this.options.resultsDir;
    return dirs;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance (the program)
 * @returns The stored BaseCommand, or a default one (for testing)
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> } | null): BaseCommand {
  const base = cmd?.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
