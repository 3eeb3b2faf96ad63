/**
 * Tests for the local filesystem remote and cache
 *
 * @module backends/local.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CacheMissError } from '../pipeline/errors.js';
import { directoryListingMd5 } from '../utils/hash.js';
import { LocalRemote, pathExists } from './local.js';
import { LocalCache, shardMd5 } from './local-cache.js';

const MD5_A = '0cc175b9c0f1b6a831c399e269772661';
const MD5_ABC = '900150983cd24fb0d6963f7d28e17f72';

describe('local backend', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'local-backend-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('LocalRemote', () => {
    const remote = new LocalRemote();

    it('declares md5 fingerprints', () => {
      expect(remote.scheme).toBe('local');
      expect(remote.fingerprintFields).toEqual(['md5']);
    });

    it('fingerprints files by content', async () => {
      const filePath = path.join(tempDir, 'a.txt');
      await fs.writeFile(filePath, 'a');

      expect(await remote.fingerprintOf(filePath)).toEqual({ md5: MD5_A });
    });

    it('returns null for a missing path', async () => {
      expect(await remote.fingerprintOf(path.join(tempDir, 'missing'))).toBeNull();
      expect(await remote.exists(path.join(tempDir, 'missing'))).toBe(false);
    });

    it('removes files and directories, and absent paths succeed', async () => {
      const dir = path.join(tempDir, 'dir');
      await fs.mkdir(path.join(dir, 'nested'), { recursive: true });
      await fs.writeFile(path.join(dir, 'nested', 'x'), 'x');

      await remote.remove(dir);
      await remote.remove(path.join(tempDir, 'never-existed'));

      expect(await pathExists(dir)).toBe(false);
    });
  });

  describe('LocalCache', () => {
    let cacheDir: string;
    let cache: LocalCache;

    beforeEach(() => {
      cacheDir = path.join(tempDir, 'cache');
      cache = new LocalCache({ dir: cacheDir });
    });

    it('shards entries by the first two characters', () => {
      expect(shardMd5(MD5_A)).toEqual(['0c', 'c175b9c0f1b6a831c399e269772661']);
      expect(cache.entryPath(MD5_A)).toBe(path.join(cacheDir, '0c', 'c175b9c0f1b6a831c399e269772661'));
    });

    it('saves a file under its md5', async () => {
      const filePath = path.join(tempDir, 'a.txt');
      await fs.writeFile(filePath, 'a');

      expect(await cache.save(filePath)).toEqual({ md5: MD5_A });
      expect(await fs.readFile(cache.entryPath(MD5_A), 'utf-8')).toBe('a');
      expect(await cache.contains({ md5: MD5_A })).toBe(true);
    });

    it('saving the same content twice keeps one entry', async () => {
      await fs.writeFile(path.join(tempDir, 'one.txt'), 'a');
      await fs.writeFile(path.join(tempDir, 'two.txt'), 'a');

      await cache.save(path.join(tempDir, 'one.txt'));
      await cache.save(path.join(tempDir, 'two.txt'));

      expect(await fs.readdir(path.join(cacheDir, '0c'))).toEqual([
        'c175b9c0f1b6a831c399e269772661',
      ]);
    });

    it('checks out a file after it was modified', async () => {
      const filePath = path.join(tempDir, 'a.txt');
      await fs.writeFile(filePath, 'a');
      const fingerprint = await cache.save(filePath);
      await fs.writeFile(filePath, 'changed');

      await cache.checkout(filePath, fingerprint);

      expect(await fs.readFile(filePath, 'utf-8')).toBe('a');
    });

    it('saves and checks out a directory', async () => {
      const dir = path.join(tempDir, 'features');
      await fs.mkdir(path.join(dir, 'nested'), { recursive: true });
      await fs.writeFile(path.join(dir, 'z.txt'), 'a');
      await fs.writeFile(path.join(dir, 'nested', 'b.txt'), 'abc');

      const fingerprint = await cache.save(dir);
      expect(fingerprint).toEqual({
        md5: directoryListingMd5([
          { relpath: 'nested/b.txt', md5: MD5_ABC },
          { relpath: 'z.txt', md5: MD5_A },
        ]),
      });

      await fs.rm(dir, { recursive: true });
      await cache.checkout(dir, fingerprint);

      expect(await fs.readFile(path.join(dir, 'z.txt'), 'utf-8')).toBe('a');
      expect(await fs.readFile(path.join(dir, 'nested', 'b.txt'), 'utf-8')).toBe('abc');
      expect(await cache.fingerprintOf(dir)).toEqual(fingerprint);
    });

    it('treats a directory with a missing member as not cached', async () => {
      const dir = path.join(tempDir, 'features');
      await fs.mkdir(dir);
      await fs.writeFile(path.join(dir, 'z.txt'), 'a');
      const fingerprint = await cache.save(dir);

      await fs.rm(cache.entryPath(MD5_A));

      expect(await cache.contains(fingerprint)).toBe(false);
      await expect(cache.checkout(dir, fingerprint)).rejects.toThrow(CacheMissError);
    });

    it('throws CacheMissError for unknown content', async () => {
      const target = path.join(tempDir, 'a.txt');

      await expect(cache.checkout(target, { md5: MD5_A })).rejects.toThrow(
        `Cache entry '${MD5_A}' for '${target}' not found`
      );
    });

    it('resolves entry paths through resolvePath', async () => {
      const mounted = path.join(tempDir, 'mnt', 'a.txt');
      await fs.mkdir(path.dirname(mounted), { recursive: true });
      await fs.writeFile(mounted, 'a');
      const mappedCache = new LocalCache({
        dir: cacheDir,
        resolvePath: (entryPath) => entryPath.replace('nfs://filer', path.join(tempDir, 'mnt')),
      });

      expect(await mappedCache.save('nfs://filer/a.txt')).toEqual({ md5: MD5_A });
      expect(await mappedCache.fingerprintOf('nfs://filer/a.txt')).toEqual({ md5: MD5_A });
    });
  });
});
