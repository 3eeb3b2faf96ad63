/**
 * Run Command
 *
 * Defines a stage from a command and its dependencies/outputs, runs it and
 * writes the stage file.
 *
 * ```
 * repro run -d input.csv -o output.csv -- ./generate.sh
 * repro run -o data/raw.csv            # data source: no command
 * ```
 *
 * @module cli/commands/run
 */

import type { Command } from 'commander';
import { loads } from '../../pipeline/loader.js';
import type { Stage } from '../../pipeline/stage.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { openContext, withInterrupt, type CommandDeps } from './shared.js';

/**
 * Options for the run command.
 */
export interface RunCommandOptions {
  /** Dependency paths */
  deps?: string[];
  /** Cached output paths */
  outs?: string[];
  /** Output paths that are never cached */
  outsNoCache?: string[];
  /** Stage file name */
  file?: string;
  /** Working directory, relative to the project root */
  wdir?: string;
}

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run [command...]')
    .description('Define a stage, run it and write its stage file')
    .option('-d, --deps <paths...>', 'Dependency paths')
    .option('-o, --outs <paths...>', 'Output paths (cached)')
    .option('-O, --outs-no-cache <paths...>', 'Output paths (not cached)')
    .option('-f, --file <name>', 'Stage file name (default: <first output>.repro)')
    .option('-w, --wdir <dir>', 'Working directory for the command')
    .action(async (command: string[], options: RunCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleRun(command, options, base);
      } catch (error) {
        base.exitWithError(error);
      }
    });
}

/**
 * Handle the run command.
 *
 * @param command - Command words; empty for a data-source stage
 */
export async function handleRun(
  command: string[],
  options: RunCommandOptions,
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<Stage> {
  const context = await openContext(base, deps);
  const stage = loads(context, {
    cmd: command.length > 0 ? command.join(' ') : null,
    deps: options.deps,
    outs: options.outs,
    outsNoCache: options.outsNoCache,
    fname: options.file,
    cwd: options.wdir,
  });

  await withInterrupt((signal) => stage.reproduce({ force: true, signal }));
  base.success(`Saved stage file '${stage.relpath}'`);
  return stage;
}
