/**
 * Repro Command
 *
 * Reproduces the given stages (or every stage file in the project) in the
 * order given. Unchanged stages are skipped unless `--force` is passed.
 *
 * @module cli/commands/repro
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatReproSummary, type StageOutcome } from '../formatters/summary.js';
import { loadStages, openContext, withInterrupt, type CommandDeps } from './shared.js';

/**
 * Options for the repro command.
 */
export interface ReproCommandOptions {
  /** Reproduce even when nothing changed */
  force?: boolean;
}

/**
 * Register the repro command.
 */
export function registerReproCommand(program: Command): void {
  program
    .command('repro [targets...]')
    .description('Reproduce changed stages (all stage files when none are given)')
    .option('-f, --force', 'Reproduce even if nothing changed')
    .action(async (targets: string[], options: ReproCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleRepro(targets, options, base);
      } catch (error) {
        base.exitWithError(error);
      }
    });
}

/**
 * Handle the repro command.
 */
export async function handleRepro(
  targets: string[],
  options: ReproCommandOptions,
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<StageOutcome[]> {
  const context = await openContext(base, deps);
  const stages = await loadStages(context, targets);

  if (stages.length === 0) {
    base.info('No stage files found.');
    return [];
  }

  const outcomes = await withInterrupt(async (signal) => {
    const results: StageOutcome[] = [];
    for (const stage of stages) {
      const started = Date.now();
      const reproduced = await stage.reproduce({ force: options.force, signal });
      results.push({
        relpath: stage.relpath,
        reproduced: reproduced !== null,
        durationMs: Date.now() - started,
      });
    }
    return results;
  });

  for (const line of formatReproSummary(outcomes)) {
    base.info(line);
  }
  return outcomes;
}
