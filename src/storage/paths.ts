/**
 * Path Resolution Utilities
 *
 * Stage-file naming and the project's private directory layout.
 *
 * Directory Structure:
 * ```
 * <root>/
 * ├── Reprofile                 # Stage without outputs
 * ├── model.bin.repro           # Stage named after its first output
 * └── .repro/
 *     ├── config.json           # Project config (cache locations, mounts, shell)
 *     └── cache/                # Default local cache
 *         └── 3f/2a9c...
 * ```
 *
 * @module storage/paths
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileExists } from './atomic.js';

/** Name of a stage file that is not named after an output */
export const STAGE_FILE = 'Reprofile';

/** Suffix of stage files named after their first output */
export const STAGE_FILE_SUFFIX = '.repro';

/** Project-private directory */
export const REPRO_DIR = '.repro';

/** Directories never searched for stage files */
const IGNORED_DIRS = new Set([REPRO_DIR, '.git', 'node_modules']);

/**
 * Gets the project-private directory.
 */
export function getReproDir(root: string): string {
  return path.join(root, REPRO_DIR);
}

/**
 * Gets the default local cache directory.
 */
export function getDefaultCacheDir(root: string): string {
  return path.join(getReproDir(root), 'cache');
}

/**
 * Gets the project config path.
 */
export function getProjectConfigPath(root: string): string {
  return path.join(getReproDir(root), 'config.json');
}

/**
 * Whether a file name follows the stage-file naming convention.
 */
export function isStageFileName(fileName: string): boolean {
  const base = path.basename(fileName);
  return base === STAGE_FILE || (base.endsWith(STAGE_FILE_SUFFIX) && base !== STAGE_FILE_SUFFIX);
}

/**
 * Whether a path is an existing regular file named like a stage file.
 */
export async function isStageFile(filePath: string): Promise<boolean> {
  return isStageFileName(filePath) && (await fileExists(filePath));
}

/**
 * Default stage-file name for a set of outputs.
 *
 * @example
 * ```typescript
 * defaultStageFileName(['data/model.bin']); // 'model.bin.repro'
 * defaultStageFileName([]);                 // 'Reprofile'
 * ```
 */
export function defaultStageFileName(outputs: string[]): string {
  if (outputs.length === 0) {
    return STAGE_FILE;
  }
  const base = outputs[0].replace(/\/+$/, '').split(/[\\/]/).pop() ?? '';
  return base ? `${base}${STAGE_FILE_SUFFIX}` : STAGE_FILE;
}

/**
 * Find stage files below a directory, sorted by path.
 */
export async function findStageFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const children = await fs.readdir(dir, { withFileTypes: true });
    for (const child of children) {
      const childPath = path.join(dir, child.name);
      if (child.isDirectory()) {
        if (!IGNORED_DIRS.has(child.name)) {
          await walk(childPath);
        }
      } else if (child.isFile() && isStageFileName(child.name)) {
        found.push(childPath);
      }
    }
  }

  await walk(path.resolve(root));
  return found.sort();
}
