/**
 * Remove Command
 *
 * Deletes stage outputs and, unless `--outs-only` is given, the stage files.
 * Failures to delete an output are reported as warnings.
 *
 * @module cli/commands/remove
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { loadStages, openContext, type CommandDeps } from './shared.js';

/**
 * Options for the remove command.
 */
export interface RemoveCommandOptions {
  /** Keep the stage files */
  outsOnly?: boolean;
}

/**
 * Register the remove command.
 */
export function registerRemoveCommand(program: Command): void {
  program
    .command('remove <targets...>')
    .description('Remove stage outputs and stage files')
    .option('--outs-only', 'Remove outputs but keep the stage files')
    .action(async (targets: string[], options: RemoveCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleRemove(targets, options, base);
      } catch (error) {
        base.exitWithError(error);
      }
    });
}

/**
 * Handle the remove command.
 */
export async function handleRemove(
  targets: string[],
  options: RemoveCommandOptions,
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<void> {
  const context = await openContext(base, deps);
  const stages = await loadStages(context, targets);

  for (const stage of stages) {
    if (options.outsOnly) {
      await stage.removeOuts(true);
      base.success(`Removed outputs of '${stage.relpath}'`);
    } else {
      await stage.remove();
      base.success(`Removed '${stage.relpath}'`);
    }
  }
}
