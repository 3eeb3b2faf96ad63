/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Atomically write text to a file
 *
 * Uses temp file + rename pattern for atomic writes.
 *
 * Note: If the process crashes between temp file creation and rename,
 * orphaned .tmp.* files may remain in the target directory.
 *
 * @param filePath - Target file path
 * @param content - Text to write
 *
 * @example
 * await atomicWriteFile('/path/to/train.csv.repro', 'command: ./train.sh\n');
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;

  try {
    // Ensure parent directory exists
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    await fs.writeFile(tempPath, content, 'utf-8');

    // Atomic rename
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to write ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Atomically write JSON data to a file
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd)
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2));
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
