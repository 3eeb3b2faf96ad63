/**
 * Status Command
 *
 * Reports which dependencies, outputs and stage files drifted from their
 * recorded state. Drift is not an error: the command exits 0 either way.
 *
 * @module cli/commands/status
 */

import type { Command } from 'commander';
import type { StageStatus } from '../../pipeline/types.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatStatusReport } from '../formatters/status.js';
import { loadStages, openContext, type CommandDeps } from './shared.js';

/**
 * Options for the status command.
 */
export interface StatusCommandOptions {
  /** Print the report as JSON */
  json?: boolean;
}

/**
 * Register the status command.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status [targets...]')
    .description('Show changed dependencies, outputs and stage files')
    .option('--json', 'Output the report as JSON')
    .action(async (targets: string[], options: StatusCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleStatus(targets, options, base);
      } catch (error) {
        base.exitWithError(error);
      }
    });
}

/**
 * Handle the status command.
 *
 * @returns The merged report, keyed by stage file path
 */
export async function handleStatus(
  targets: string[],
  options: StatusCommandOptions,
  base: BaseCommand,
  deps: CommandDeps = {}
): Promise<Record<string, StageStatus>> {
  const context = await openContext(base, deps);
  const stages = await loadStages(context, targets);

  const report: Record<string, StageStatus> = {};
  for (const stage of stages) {
    Object.assign(report, await stage.status());
  }

  if (options.json) {
    base.json(report);
  } else if (Object.keys(report).length === 0) {
    base.info('Pipeline is up to date.');
  } else {
    for (const line of formatStatusReport(report)) {
      base.info(line);
    }
  }
  return report;
}
