/**
 * Fingerprint Hashing
 *
 * md5 helpers used by the local backends and by the stage's aggregate
 * fingerprint. Files hash by content; directories hash by a sorted listing of
 * their files' relative paths and md5s, with a `.dir` suffix so a directory
 * fingerprint never collides with a file fingerprint.
 *
 * @module utils/hash
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/** Suffix appended to directory fingerprints */
export const DIR_SUFFIX = '.dir';

/**
 * One file inside a hashed directory.
 */
export interface DirectoryEntry {
  /** Path relative to the directory, always `/`-separated */
  relpath: string;
  /** md5 of the file's content */
  md5: string;
}

/**
 * Serialize a value with object keys sorted at every level.
 *
 * Arrays keep their order: dependency and output lists are ordered, and
 * reordering them must change the aggregate fingerprint.
 *
 * @example
 * ```typescript
 * stableStringify({ b: 1, a: [2, 1] });
 * // Returns: '{"a":[2,1],"b":1}'
 * ```
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }
  const pairs = Object.entries(value)
    .filter(([, field]) => field !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, field]) => JSON.stringify(key) + ':' + stableStringify(field));
  return '{' + pairs.join(',') + '}';
}

/**
 * md5 of a string, as lowercase hex.
 */
export function md5Hex(content: string | Buffer): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * md5 of a record's stable serialization.
 */
export function dictMd5(record: Record<string, unknown>): string {
  return md5Hex(stableStringify(record));
}

/**
 * md5 of a file's contents.
 *
 * @throws If the file doesn't exist or can't be read
 */
export async function fileMd5(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return md5Hex(content);
}

/**
 * List every file below a directory with its md5, sorted by relative path.
 */
export async function listDirectoryEntries(dirPath: string): Promise<DirectoryEntry[]> {
  const entries: DirectoryEntry[] = [];

  async function walk(current: string): Promise<void> {
    const children = await fs.readdir(current, { withFileTypes: true });
    for (const child of children) {
      const childPath = path.join(current, child.name);
      if (child.isDirectory()) {
        await walk(childPath);
      } else if (child.isFile()) {
        entries.push({
          relpath: path.relative(dirPath, childPath).split(path.sep).join('/'),
          md5: await fileMd5(childPath),
        });
      }
    }
  }

  await walk(dirPath);
  return entries.sort((a, b) => (a.relpath < b.relpath ? -1 : a.relpath > b.relpath ? 1 : 0));
}

/**
 * md5 of a directory listing, suffixed with `.dir`.
 */
export function directoryListingMd5(entries: DirectoryEntry[]): string {
  return md5Hex(stableStringify(entries)) + DIR_SUFFIX;
}

/**
 * md5 of a path: content md5 for files, listing md5 for directories.
 *
 * @returns The md5, or null when the path does not exist
 */
export async function pathMd5(targetPath: string): Promise<string | null> {
  let stats;
  try {
    stats = await fs.stat(targetPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  if (stats.isDirectory()) {
    return directoryListingMd5(await listDirectoryEntries(targetPath));
  }
  return fileMd5(targetPath);
}

/**
 * Whether an md5 denotes a directory listing.
 */
export function isDirectoryMd5(md5: string): boolean {
  return md5.endsWith(DIR_SUFFIX);
}
