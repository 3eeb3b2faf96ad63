/**
 * Local Filesystem Remote
 *
 * Fingerprints plain filesystem paths by md5 (content for files, listing for
 * directories).
 *
 * @module backends/local
 */

import * as fs from 'node:fs/promises';
import { pathMd5 } from '../utils/hash.js';
import type { BackendScheme, Fingerprint, FingerprintField, Remote } from './types.js';

/**
 * Whether a filesystem path exists (file or directory).
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.stat(targetPath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Remote for paths on the local filesystem.
 */
export class LocalRemote implements Remote {
  readonly scheme: BackendScheme = 'local';
  readonly fingerprintFields: readonly FingerprintField[] = ['md5'];

  async fingerprintOf(targetPath: string): Promise<Fingerprint | null> {
    const md5 = await pathMd5(targetPath);
    return md5 === null ? null : { md5 };
  }

  exists(targetPath: string): Promise<boolean> {
    return pathExists(targetPath);
  }

  async remove(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { recursive: true, force: true });
  }
}
