/**
 * Checkout Command
 *
 * Restores cached outputs to the state recorded in their stage files.
 *
 * @module cli/commands/checkout
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { loadStages, openContext, type CommandDeps } from './shared.js';

/**
 * Register the checkout command.
 */
export function registerCheckoutCommand(program: Command): void {
  program
    .command('checkout [targets...]')
    .description('Restore outputs from the cache')
    .action(async (targets: string[], _options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleCheckout(targets, base);
      } catch (error) {
        base.exitWithError(error);
      }
    });
}

/**
 * Handle the checkout command.
 *
 * @returns Number of stages checked out
 */
export async function handleCheckout(
  targets: string[],
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<number> {
  const context = await openContext(base, deps);
  const stages = await loadStages(context, targets);

  for (const stage of stages) {
    await stage.checkout();
  }

  base.success(`Checked out ${stages.length} stage${stages.length === 1 ? '' : 's'}`);
  return stages.length;
}
