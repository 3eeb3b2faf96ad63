/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, cwd)
 * - The `Logger` the stage core writes to
 * - Mapping of error types to exit codes
 *
 * @module cli/base-command
 */

import * as path from 'node:path';
import chalk from 'chalk';
import {
  BackendCommandError,
  CacheMissError,
  ConfigurationError,
  EntryNotFoundError,
  MissingDataSourceError,
  StageCancelledError,
  StageCmdFailedError,
  StageFileFormatError,
} from '../pipeline/errors.js';
import type { Logger } from '../pipeline/types.js';

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
  /** Project root (default: current directory) */
  cwd?: string;
}

/**
 * Log levels for output control.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage, configuration or stage file */
  USAGE_ERROR: 2,
  /** Stage file, data source or cache entry not found */
  NOT_FOUND: 3,
  /** A storage backend command failed */
  BACKEND_ERROR: 4,
  /** A stage command exited non-zero */
  COMMAND_FAILED: 5,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error raised while running a command.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof StageCmdFailedError) {
    return EXIT_CODES.COMMAND_FAILED;
  }
  if (error instanceof StageCancelledError) {
    return EXIT_CODES.CANCELLED;
  }
  if (error instanceof ConfigurationError || error instanceof StageFileFormatError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (
    error instanceof EntryNotFoundError ||
    error instanceof MissingDataSourceError ||
    error instanceof CacheMissError ||
    (error instanceof Error && (error as NodeJS.ErrnoException).code === 'ENOENT')
  ) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (error instanceof BackendCommandError) {
    return EXIT_CODES.BACKEND_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * Doubles as the stage core's logger: debug lines appear only with
 * `--verbose`, info lines are hidden by `--quiet`.
 *
 * @example
 * ```typescript
 * async function reproHandler(targets: string[], options: ReproOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   const context = await openWorkspace({ root: base.root, logger: base });
 *   base.success('Pipeline is up to date');
 * }
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved project root */
  readonly root: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.root = path.resolve(options.cwd ?? process.cwd());

    // Configure chalk based on color preference
    if (!this.useColor) {
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
   * Log an error message (always visible). Never exits.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * Report an error and exit with the code its type maps to.
   */
  exitWithError(error: unknown): never {
    const message = error instanceof Error ? error.message : String(error);
    this.error(message);
    if (error instanceof Error && this.options.verbose) {
      console.error(chalk.dim(error.stack ?? error.message));
    }
    process.exit(exitCodeFor(error));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
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

  hasColor(): boolean {
    return this.useColor;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Narrow commander's option bag to the global options.
 */
export function toGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
  return {
    verbose: opts['verbose'] === true,
    quiet: opts['quiet'] === true,
    color: opts['color'] !== false,
    cwd: typeof opts['cwd'] === 'string' ? opts['cwd'] : undefined,
  };
}

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @returns The stored BaseCommand, or one built from the command's own options
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const opts = cmd.opts();
  const base = opts['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand(toGlobalOptions(opts));
  }
  return base;
}
