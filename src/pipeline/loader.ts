/**
 * Stage Loader
 *
 * Builds stages from three sources:
 * - `loadd`: an already-parsed stage record
 * - `loads`: a command plus declared dependency and output paths
 * - `load`: a stage file on disk
 *
 * Records are validated before any entry is built, so a malformed file
 * never reaches a backend.
 *
 * @module pipeline/loader
 */

import * as path from 'node:path';
import { createEntries, loadDependencies, loadOutputs } from '../entries/factory.js';
import { formatIssues } from '../schemas/common.js';
import { STAGE_KEYS, StageRecordSchema, type StageRecord } from '../schemas/stage.js';
import { defaultStageFileName } from '../storage/paths.js';
import { readStageFile } from '../storage/stages.js';
import { StageFileFormatError } from './errors.js';
import { Stage } from './stage.js';
import type { Logger, StageContext } from './types.js';

/**
 * Options for building a stage from declared paths.
 */
export interface LoadsOptions {
  /** Command text; omit for a data-source stage */
  cmd?: string | null;
  /** Dependency paths */
  deps?: string[];
  /** Cached output paths */
  outs?: string[];
  /** Output paths that are never cached */
  outsNoCache?: string[];
  /** Stage file name; defaults to one derived from the first output */
  fname?: string;
  /** Working directory relative to the workspace root; defaults to the root */
  cwd?: string;
}

/**
 * Validate a parsed stage document.
 *
 * @throws StageFileFormatError listing every schema issue
 */
export function validateStageRecord(
  record: unknown,
  logger: Logger,
  filePath: string | null = null
): StageRecord {
  const result = StageRecordSchema.safeParse(record);
  if (!result.success) {
    const issues = formatIssues(result.error);
    logger.debug(`Stage file '${filePath ?? '<memory>'}' failed validation: ${issues.join('; ')}`);
    throw new StageFileFormatError(filePath, issues, { cause: result.error });
  }
  return result.data;
}

/**
 * Build a stage from a parsed stage record.
 *
 * @param filePath - Stage file path, resolved against the workspace root
 * @throws StageFileFormatError when the record does not match the schema
 * @throws ConfigurationError when an entry's backend or cache is missing
 */
export function loadd(context: StageContext, record: unknown, filePath: string): Stage {
  const stagePath = path.resolve(context.root, filePath);
  const valid = validateStageRecord(record, context.logger, stagePath);
  const cwd = path.dirname(stagePath);
  const entryContext = { cwd, registry: context.registry, logger: context.logger };

  return new Stage(context, {
    path: stagePath,
    cwd,
    cmd: valid[STAGE_KEYS.CMD] ?? null,
    deps: loadDependencies(valid[STAGE_KEYS.DEPS] ?? [], entryContext),
    outs: loadOutputs(valid[STAGE_KEYS.OUTS] ?? [], entryContext),
    md5: valid[STAGE_KEYS.MD5] ?? null,
  });
}

/**
 * Build a new stage from a command and declared paths. Nothing is written.
 *
 * @example
 * ```typescript
 * const stage = loads(context, {
 *   cmd: './generate.sh',
 *   deps: ['input.csv'],
 *   outs: ['output.csv'],
 * });
 * stage.path; // <root>/output.csv.repro
 * ```
 */
export function loads(context: StageContext, options: LoadsOptions = {}): Stage {
  const outs = options.outs ?? [];
  const outsNoCache = options.outsNoCache ?? [];
  const cwd = path.resolve(context.root, options.cwd ?? '.');
  const fname = options.fname ?? defaultStageFileName([...outs, ...outsNoCache]);
  const entryContext = { cwd, registry: context.registry, logger: context.logger };

  return new Stage(context, {
    path: path.resolve(cwd, fname),
    cwd,
    cmd: options.cmd ?? null,
    deps: createEntries('dependency', options.deps ?? [], entryContext),
    outs: [
      ...createEntries('output', outs, entryContext, { useCache: true }),
      ...createEntries('output', outsNoCache, entryContext, { useCache: false }),
    ],
  });
}

/**
 * Read and build a stage from a stage file.
 *
 * @throws StageFileFormatError when the file is not a valid stage record
 */
export async function load(context: StageContext, filePath: string): Promise<Stage> {
  const stagePath = path.resolve(context.root, filePath);
  context.logger.debug(`Loading stage file '${stagePath}'`);
  const record = await readStageFile(stagePath);
  return loadd(context, record, stagePath);
}
