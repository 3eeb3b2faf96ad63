/**
 * Networked Filesystem Backend
 *
 * Serves `nfs://server/export/...` paths. The export must be mounted on this
 * machine; the mount table maps URL prefixes to local mount points and all I/O
 * goes through the mount. Fingerprints are content md5s only: modification
 * times are not comparable across hosts.
 *
 * @module backends/network-fs
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigurationError } from '../pipeline/errors.js';
import { pathMd5 } from '../utils/hash.js';
import { LocalCache } from './local-cache.js';
import { pathExists } from './local.js';
import type { Fingerprint, FingerprintField, Remote } from './types.js';

/**
 * Resolves `nfs://` URLs through a mount table.
 *
 * @example
 * ```typescript
 * const mounts = new MountTable({ 'nfs://filer/exports': '/mnt/filer' });
 * mounts.resolve('nfs://filer/exports/raw/a.csv');
 * // Returns: '/mnt/filer/raw/a.csv'
 * ```
 */
export class MountTable {
  private readonly entries: Array<{ prefix: string; mountPoint: string }>;

  constructor(mounts: Record<string, string>) {
    this.entries = Object.entries(mounts)
      .map(([prefix, mountPoint]) => ({
        prefix: prefix.replace(/\/+$/, ''),
        mountPoint: path.resolve(mountPoint),
      }))
      // Longest prefix first so nested exports win
      .sort((a, b) => b.prefix.length - a.prefix.length);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Local path of an `nfs://` URL.
   *
   * @throws ConfigurationError when no mount covers the URL
   */
  resolve(url: string): string {
    for (const { prefix, mountPoint } of this.entries) {
      if (url === prefix) {
        return mountPoint;
      }
      if (url.startsWith(`${prefix}/`)) {
        const rest = url.slice(prefix.length + 1).split('/');
        if (rest.includes('..')) {
          throw new ConfigurationError(`Path '${url}' must not contain ".." segments`);
        }
        return path.join(mountPoint, ...rest);
      }
    }
    throw new ConfigurationError(`No mount configured for '${url}'`);
  }
}

/**
 * Remote for `nfs://` paths.
 */
export class NetworkFsRemote implements Remote {
  readonly scheme = 'nfs' as const;
  readonly fingerprintFields: readonly FingerprintField[] = ['md5'];

  constructor(readonly mounts: MountTable) {}

  async fingerprintOf(url: string): Promise<Fingerprint | null> {
    const md5 = await pathMd5(this.mounts.resolve(url));
    return md5 === null ? null : { md5 };
  }

  async exists(url: string): Promise<boolean> {
    return pathExists(this.mounts.resolve(url));
  }

  async remove(url: string): Promise<void> {
    await fs.rm(this.mounts.resolve(url), { recursive: true, force: true });
  }
}

/**
 * Create the cache for `nfs://` outputs.
 *
 * @param mounts - Mount table shared with the remote
 * @param cacheLocation - An `nfs://` URL or a local directory
 */
export function createNetworkFsCache(mounts: MountTable, cacheLocation: string): LocalCache {
  const dir = cacheLocation.startsWith('nfs://') ? mounts.resolve(cacheLocation) : cacheLocation;
  return new LocalCache({ dir, resolvePath: (url) => mounts.resolve(url) });
}
