/**
 * Stage File Storage Operations
 *
 * Stage files are YAML renderings of stage records. This module only moves
 * text in and out of them; validation lives in `pipeline/loader.ts`.
 *
 * @module storage/stages
 */

import * as fs from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { StageFileFormatError } from '../pipeline/errors.js';
import { atomicWriteFile } from './atomic.js';

/**
 * Read and parse a stage file.
 *
 * @returns The parsed document (not yet validated); an empty file yields `{}`
 * @throws StageFileFormatError if the YAML cannot be parsed
 */
export async function readStageFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  try {
    const document: unknown = yaml.load(content, { filename: filePath });
    return document === undefined ? {} : document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StageFileFormatError(filePath, [reason], { cause: error });
  }
}

/**
 * Render a record as YAML.
 */
export function renderStageRecord(record: Record<string, unknown>): string {
  return yaml.dump(record, { lineWidth: -1, noRefs: true });
}

/**
 * Atomically write a stage record as YAML.
 */
export async function writeStageFile(
  filePath: string,
  record: Record<string, unknown>
): Promise<void> {
  await atomicWriteFile(filePath, renderStageRecord(record));
}
