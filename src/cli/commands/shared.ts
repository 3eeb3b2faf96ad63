/**
 * Shared Command Helpers
 *
 * Opening the workspace, resolving stage-file targets and wiring Ctrl-C to
 * an AbortSignal.
 *
 * @module cli/commands/shared
 */

import * as path from 'node:path';
import type { ObjectScheme, ObjectStoreClient } from '../../backends/object-store.js';
import { ConfigurationError } from '../../pipeline/errors.js';
import { load } from '../../pipeline/loader.js';
import type { Stage } from '../../pipeline/stage.js';
import type { StageContext } from '../../pipeline/types.js';
import type { ProcessExecutor } from '../../process/executor.js';
import { findStageFiles, isStageFileName } from '../../storage/paths.js';
import { openWorkspace } from '../../workspace/index.js';
import type { BaseCommand } from '../base-command.js';

/**
 * Collaborators a command handler may be given instead of the defaults.
 */
export interface CommandDeps {
  executor?: ProcessExecutor;
  env?: NodeJS.ProcessEnv;
  objectStores?: Partial<Record<ObjectScheme, ObjectStoreClient>>;
}

/**
 * Open the workspace rooted at `--cwd`, logging through the base command.
 */
export function openContext(base: BaseCommand, deps: CommandDeps = {}): Promise<StageContext> {
  return openWorkspace({
    root: base.root,
    logger: base,
    executor: deps.executor,
    env: deps.env,
    objectStores: deps.objectStores,
  });
}

/**
 * Resolve target stage files; no targets means every stage file in the project.
 *
 * @throws ConfigurationError when a target is not named like a stage file
 */
export async function resolveTargets(root: string, targets: string[]): Promise<string[]> {
  if (targets.length === 0) {
    return findStageFiles(root);
  }
  return targets.map((target) => {
    if (!isStageFileName(target)) {
      throw new ConfigurationError(
        `'${target}' is not a stage file (expected 'Reprofile' or a '.repro' file)`
      );
    }
    return path.resolve(root, target);
  });
}

/**
 * Load the target stages in the given order.
 */
export async function loadStages(context: StageContext, targets: string[]): Promise<Stage[]> {
  const files = await resolveTargets(context.root, targets);
  const stages: Stage[] = [];
  for (const file of files) {
    stages.push(await load(context, file));
  }
  return stages;
}

/**
 * Run `fn` with a signal that aborts on SIGINT.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
