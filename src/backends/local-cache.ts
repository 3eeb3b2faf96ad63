/**
 * Local Content-Addressable Cache
 *
 * Stores content under its md5, sharded by the first two hex characters:
 *
 * ```
 * <cache dir>/
 * ├── 3f/
 * │   └── 2a9c...            # file content
 * └── 9b/
 *     └── 1c04....dir        # JSON listing of a cached directory
 * ```
 *
 * A directory is cached as its files plus a listing entry keyed by the
 * directory's `.dir` md5. Writes go to a temporary name and are renamed into
 * place, so concurrent saves of the same content converge on one entry.
 *
 * @module backends/local-cache
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { CacheMissError } from '../pipeline/errors.js';
import {
  directoryListingMd5,
  fileMd5,
  isDirectoryMd5,
  listDirectoryEntries,
  pathMd5,
  type DirectoryEntry,
} from '../utils/hash.js';
import { pathExists } from './local.js';
import type { Cache, Fingerprint } from './types.js';

const DirectoryListingSchema = z.array(z.object({ relpath: z.string(), md5: z.string() }));

/**
 * Options for a local cache.
 */
export interface LocalCacheOptions {
  /** Root directory of the cache */
  dir: string;
  /**
   * Map an entry path to the filesystem path holding its content.
   * Defaults to the identity; the networked-filesystem backend resolves
   * `nfs://` URLs through its mount table here.
   */
  resolvePath?: (entryPath: string) => string;
}

/**
 * Split an md5 into its shard directory and file name.
 *
 * @example
 * ```typescript
 * shardMd5('3f2a9c');
 * // Returns: ['3f', '2a9c']
 * ```
 */
export function shardMd5(md5: string): [string, string] {
  return [md5.slice(0, 2), md5.slice(2)];
}

/**
 * Cache for content reachable through the local filesystem.
 */
export class LocalCache implements Cache {
  readonly dir: string;
  private readonly resolvePath: (entryPath: string) => string;

  constructor(options: LocalCacheOptions) {
    this.dir = path.resolve(options.dir);
    this.resolvePath = options.resolvePath ?? ((entryPath) => entryPath);
  }

  /**
   * Location of a cache entry.
   */
  entryPath(md5: string): string {
    const [shard, rest] = shardMd5(md5);
    return path.join(this.dir, shard, rest);
  }

  async contains(fingerprint: Fingerprint): Promise<boolean> {
    const md5 = fingerprint['md5'];
    return md5 !== undefined && (await this.hasEntry(md5));
  }

  /**
   * Whether content with this md5 is fully present in the cache.
   */
  async hasEntry(md5: string): Promise<boolean> {
    if (!(await pathExists(this.entryPath(md5)))) {
      return false;
    }
    if (!isDirectoryMd5(md5)) {
      return true;
    }
    const listing = await this.readListing(md5);
    for (const entry of listing) {
      if (!(await pathExists(this.entryPath(entry.md5)))) {
        return false;
      }
    }
    return true;
  }

  async fingerprintOf(entryPath: string): Promise<Fingerprint | null> {
    const md5 = await pathMd5(this.resolvePath(entryPath));
    return md5 === null ? null : { md5 };
  }

  async save(entryPath: string): Promise<Fingerprint> {
    const source = this.resolvePath(entryPath);
    const stats = await fs.stat(source);

    if (stats.isDirectory()) {
      const listing = await listDirectoryEntries(source);
      for (const entry of listing) {
        await this.storeFile(path.join(source, ...entry.relpath.split('/')), entry.md5);
      }
      const md5 = directoryListingMd5(listing);
      await this.storeContent(md5, JSON.stringify(listing));
      return { md5 };
    }

    const md5 = await fileMd5(source);
    await this.storeFile(source, md5);
    return { md5 };
  }

  async checkout(entryPath: string, fingerprint: Fingerprint): Promise<void> {
    const md5 = fingerprint['md5'];
    if (md5 === undefined || !(await this.hasEntry(md5))) {
      throw new CacheMissError(entryPath, fingerprint);
    }

    const target = this.resolvePath(entryPath);
    await fs.rm(target, { recursive: true, force: true });

    if (isDirectoryMd5(md5)) {
      const listing = await this.readListing(md5);
      await fs.mkdir(target, { recursive: true });
      for (const entry of listing) {
        const destination = path.join(target, ...entry.relpath.split('/'));
        await fs.mkdir(path.dirname(destination), { recursive: true });
        await fs.copyFile(this.entryPath(entry.md5), destination);
      }
      return;
    }

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(this.entryPath(md5), target);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async readListing(md5: string): Promise<DirectoryEntry[]> {
    const content = await fs.readFile(this.entryPath(md5), 'utf-8');
    return DirectoryListingSchema.parse(JSON.parse(content));
  }

  private async storeFile(source: string, md5: string): Promise<void> {
    const destination = this.entryPath(md5);
    if (await pathExists(destination)) {
      return;
    }
    await this.atomicPlace(destination, (tempPath) => fs.copyFile(source, tempPath));
  }

  private async storeContent(md5: string, content: string): Promise<void> {
    const destination = this.entryPath(md5);
    if (await pathExists(destination)) {
      return;
    }
    await this.atomicPlace(destination, (tempPath) => fs.writeFile(tempPath, content, 'utf-8'));
  }

  /**
   * Write through a temporary file and rename it into place.
   */
  private async atomicPlace(
    destination: string,
    write: (tempPath: string) => Promise<void>
  ): Promise<void> {
    const random = Math.random().toString(36).slice(2, 10);
    const tempPath = `${destination}.tmp.${Date.now()}.${random}`;

    await fs.mkdir(path.dirname(destination), { recursive: true });
    try {
      await write(tempPath);
      await fs.rename(tempPath, destination);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
