/**
 * reprokit CLI
 *
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   repro --help
 *   repro run -d input.csv -o output.csv -- ./generate.sh
 *   repro status
 *   repro repro output.csv.repro
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, toGlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

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
    .name('repro')
    .description('Reproducible pipeline stages with content-addressed output caching')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-C, --cwd <path>', 'Project root (default: current directory)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = toGlobalOptions(thisCommand.opts());
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags');
      baseCommand.exitWith(EXIT_CODES.USAGE_ERROR);
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
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
