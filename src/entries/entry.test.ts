/**
 * Tests for dependency and output entries
 *
 * @module entries/entry.test
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { LocalRemote } from '../backends/local.js';
import { LocalCache } from '../backends/local-cache.js';
import { ObjectStoreCache, ObjectStoreRemote } from '../backends/object-store.js';
import { BackendRegistry } from '../backends/registry.js';
import type { Fingerprint, Remote } from '../backends/types.js';
import { ConfigurationError, EntryNotFoundError, EntryRemoveError } from '../pipeline/errors.js';
import { InMemoryObjectStore, RecordingLogger } from '../testing/fakes.js';
import { md5Hex } from '../utils/hash.js';
import { Entry } from './entry.js';
import {
  createEntry,
  fingerprintFromRecord,
  loadDependencies,
  loadOutputs,
  resolveEntryPath,
} from './factory.js';

const MD5_A = '0cc175b9c0f1b6a831c399e269772661';
const MD5_B = '92eb5ffee6ae2fec3ad71c777531578f';

describe('Entry', () => {
  let tempDir: string;
  let logger: RecordingLogger;
  let registry: BackendRegistry;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'entry-test-'));
    logger = new RecordingLogger();
    registry = new BackendRegistry([
      { remote: new LocalRemote(), cache: new LocalCache({ dir: path.join(tempDir, '.cache') }) },
    ]);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const context = () => ({ cwd: tempDir, registry, logger });

  describe('construction', () => {
    it('refuses a cached output without a cache, before touching the backend', () => {
      const remote: Remote = {
        scheme: 's3',
        fingerprintFields: ['etag'],
        fingerprintOf: jest.fn(async (): Promise<Fingerprint | null> => null),
        exists: jest.fn(async () => false),
        remove: jest.fn(async () => undefined),
      };

      expect(
        () =>
          new Entry({
            role: 'output',
            declaredPath: 's3://bucket/out.csv',
            path: 's3://bucket/out.csv',
            remote,
            logger,
          })
      ).toThrow("No cache location setup for 's3' outputs.");
      expect(remote.fingerprintOf).not.toHaveBeenCalled();
      expect(remote.exists).not.toHaveBeenCalled();
      expect(remote.remove).not.toHaveBeenCalled();
    });

    it('allows an uncached output without a cache', () => {
      const store = new InMemoryObjectStore();
      const remote = new ObjectStoreRemote('s3', store);

      const entry = new Entry({
        role: 'output',
        declaredPath: 's3://bucket/out.csv',
        path: 's3://bucket/out.csv',
        remote,
        useCache: false,
        logger,
      });

      expect(entry.useCache).toBe(false);
      expect(store.operations).toEqual([]);
    });

    it('never caches dependencies', () => {
      const entry = createEntry('dependency', 'in.csv', context(), { useCache: true });

      expect(entry.useCache).toBe(false);
    });

    it('resolves local paths against the stage directory', () => {
      expect(resolveEntryPath('data/in.csv', '/work/project')).toEqual({
        scheme: 'local',
        path: '/work/project/data/in.csv',
      });
      expect(resolveEntryPath('s3://b/k', '/work/project')).toEqual({
        scheme: 's3',
        path: 's3://b/k',
      });
    });

    it('throws ConfigurationError for a scheme with no backend', () => {
      expect(() => createEntry('dependency', 'gs://bucket/in.csv', context())).toThrow(
        ConfigurationError
      );
    });
  });

  describe('changed', () => {
    it('is changed when the path does not exist', async () => {
      const entry = createEntry('dependency', 'in.csv', context(), { info: { md5: MD5_A } });

      expect(await entry.changed()).toBe(true);
      expect(logger.messages('debug')).toContain("'in.csv' doesn't exist");
    });

    it('is changed when never recorded', async () => {
      await fs.writeFile(path.join(tempDir, 'in.csv'), 'a');
      const entry = createEntry('dependency', 'in.csv', context());

      expect(await entry.changed()).toBe(true);
    });

    it('is unchanged when the content matches the record', async () => {
      await fs.writeFile(path.join(tempDir, 'in.csv'), 'a');
      const entry = createEntry('dependency', 'in.csv', context(), { info: { md5: MD5_A } });

      expect(await entry.changed()).toBe(false);
    });

    it('is changed when the content differs from the record', async () => {
      await fs.writeFile(path.join(tempDir, 'in.csv'), 'b');
      const entry = createEntry('dependency', 'in.csv', context(), { info: { md5: MD5_A } });

      expect(await entry.changed()).toBe(true);
      expect(logger.messages('debug')).toContain(
        `'in.csv' changed (recorded md5=${MD5_A}, actual md5=${MD5_B})`
      );
    });
  });

  describe('cache presence', () => {
    it('is changed when a saved output is missing from the cache', async () => {
      await fs.writeFile(path.join(tempDir, 'out.csv'), 'a');
      const entry = createEntry('output', 'out.csv', context());
      await entry.save();
      expect(await entry.changed()).toBe(false);

      await fs.rm(path.join(tempDir, '.cache'), { recursive: true });

      expect(await entry.changed()).toBe(true);
      expect(await entry.status()).toEqual({ 'out.csv': 'not in cache' });
      expect(logger.messages('debug')).toContain(`'out.csv' is not in the cache (md5=${MD5_A})`);
    });

    it('does not consult the cache for uncached outputs', async () => {
      await fs.writeFile(path.join(tempDir, 'out.csv'), 'a');
      const entry = createEntry('output', 'out.csv', context(), { useCache: false });
      await entry.save();

      expect(await entry.changed()).toBe(false);
      expect(await entry.status()).toEqual({});
    });
  });

  describe('save', () => {
    it('records the fingerprint and stores cached outputs', async () => {
      await fs.writeFile(path.join(tempDir, 'out.csv'), 'a');
      const entry = createEntry('output', 'out.csv', context());

      await entry.save();

      expect(entry.info).toEqual({ md5: MD5_A });
      expect(await fs.readFile(path.join(tempDir, '.cache', '0c', MD5_A.slice(2)), 'utf-8')).toBe(
        'a'
      );
    });

    it('does not store uncached outputs', async () => {
      await fs.writeFile(path.join(tempDir, 'out.csv'), 'a');
      const entry = createEntry('output', 'out.csv', context(), { useCache: false });

      await entry.save();

      expect(entry.info).toEqual({ md5: MD5_A });
      await expect(fs.stat(path.join(tempDir, '.cache'))).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('throws EntryNotFoundError for a missing path', async () => {
      const entry = createEntry('output', 'missing.csv', context());

      await expect(entry.save()).rejects.toThrow(EntryNotFoundError);
      await expect(entry.save()).rejects.toThrow("Output 'missing.csv' does not exist");
    });
  });

  describe('checkout', () => {
    it('restores a cached output without changing its record', async () => {
      const filePath = path.join(tempDir, 'out.csv');
      await fs.writeFile(filePath, 'a');
      const entry = createEntry('output', 'out.csv', context());
      await entry.save();
      await fs.rm(filePath);

      await entry.checkout();

      expect(await fs.readFile(filePath, 'utf-8')).toBe('a');
      expect(entry.info).toEqual({ md5: MD5_A });
    });

    it('logs and returns for an output never recorded', async () => {
      const entry = createEntry('output', 'out.csv', context());

      await entry.checkout();

      expect(logger.messages('info')).toEqual(["'out.csv' has no recorded state to check out"]);
    });

    it('is a no-op for dependencies', async () => {
      const entry = createEntry('dependency', 'in.csv', context(), { info: { md5: MD5_A } });

      await entry.checkout();

      await expect(fs.stat(path.join(tempDir, 'in.csv'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('remove', () => {
    const failingRemote = (): Remote => ({
      scheme: 'local',
      fingerprintFields: ['md5'],
      fingerprintOf: async () => null,
      exists: async () => true,
      remove: async () => {
        throw new Error('permission denied');
      },
    });

    it('succeeds for an absent path', async () => {
      const entry = createEntry('output', 'never.csv', context());

      await expect(entry.remove()).resolves.toBeUndefined();
    });

    it('throws EntryRemoveError when deletion fails', async () => {
      const entry = new Entry({
        role: 'dependency',
        declaredPath: 'locked.csv',
        path: '/locked.csv',
        remote: failingRemote(),
        logger,
      });

      await expect(entry.remove()).rejects.toThrow(EntryRemoveError);
      await expect(entry.remove()).rejects.toThrow(
        "Failed to remove 'locked.csv': permission denied"
      );
    });

    it('logs a warning instead when ignoreRemove is set', async () => {
      const entry = new Entry({
        role: 'dependency',
        declaredPath: 'locked.csv',
        path: '/locked.csv',
        remote: failingRemote(),
        logger,
      });

      await entry.remove(true);

      expect(logger.messages('warn')).toEqual(["Could not remove 'locked.csv': permission denied"]);
    });
  });

  describe('dumpd and status', () => {
    it('dumps the path, fingerprint fields and cache flag', async () => {
      await fs.writeFile(path.join(tempDir, 'out.csv'), 'a');
      const output = createEntry('output', 'out.csv', context(), { useCache: false });
      const dependency = createEntry('dependency', 'in.csv', context());
      await output.save();

      expect(output.dumpd()).toEqual({ path: 'out.csv', md5: MD5_A, cache: false });
      expect(dependency.dumpd()).toEqual({ path: 'in.csv' });
    });

    it('dumps the etag for s3 entries', () => {
      const store = new InMemoryObjectStore();
      const remote = new ObjectStoreRemote('s3', store);
      registry.register({ remote, cache: new ObjectStoreCache(remote, 's3://cache') });

      const entry = createEntry('output', 's3://bucket/out.csv', context(), {
        info: { etag: md5Hex('x') },
      });

      expect(entry.dumpd()).toEqual({ path: 's3://bucket/out.csv', etag: md5Hex('x'), cache: true });
    });

    it('reports deleted, new and modified entries', async () => {
      await fs.writeFile(path.join(tempDir, 'new.csv'), 'a');
      await fs.writeFile(path.join(tempDir, 'modified.csv'), 'b');
      await fs.writeFile(path.join(tempDir, 'same.csv'), 'a');

      const deleted = createEntry('dependency', 'deleted.csv', context(), { info: { md5: MD5_A } });
      const fresh = createEntry('dependency', 'new.csv', context());
      const modified = createEntry('dependency', 'modified.csv', context(), { info: { md5: MD5_A } });
      const same = createEntry('dependency', 'same.csv', context(), { info: { md5: MD5_A } });

      expect(await deleted.status()).toEqual({ 'deleted.csv': 'deleted' });
      expect(await fresh.status()).toEqual({ 'new.csv': 'new' });
      expect(await modified.status()).toEqual({ 'modified.csv': 'modified' });
      expect(await same.status()).toEqual({});
    });
  });

  describe('backend calls', () => {
    it('reports drift from a single lookup of the path', async () => {
      const store = new InMemoryObjectStore();
      const remote = new ObjectStoreRemote('s3', store);
      registry.register({ remote, cache: new ObjectStoreCache(remote, 's3://cache') });
      store.put({ bucket: 'bucket', key: 'out.csv' }, 'b');
      const entry = createEntry('output', 's3://bucket/out.csv', context(), {
        info: { etag: MD5_A },
      });

      expect(await entry.status()).toEqual({ 's3://bucket/out.csv': 'modified' });
      expect(store.operations).toEqual(['head bucket/out.csv']);
    });

    it('checks the cache entry of an unchanged s3 output', async () => {
      const store = new InMemoryObjectStore();
      const remote = new ObjectStoreRemote('s3', store);
      registry.register({ remote, cache: new ObjectStoreCache(remote, 's3://cache') });
      store.put({ bucket: 'bucket', key: 'out.csv' }, 'a');
      const entry = createEntry('output', 's3://bucket/out.csv', context(), {
        info: { etag: MD5_A },
      });

      expect(await entry.status()).toEqual({ 's3://bucket/out.csv': 'not in cache' });
      expect(store.operations).toEqual([
        'head bucket/out.csv',
        'head bucket/out.csv',
        `head cache/0c/${MD5_A.slice(2)}`,
      ]);
    });
  });

  describe('loading records', () => {
    it('keeps only the fields the backend produces', () => {
      expect(fingerprintFromRecord({ path: 'a', md5: MD5_A, etag: 'x' }, ['md5'])).toEqual({
        md5: MD5_A,
      });
      expect(fingerprintFromRecord({ path: 'a', md5: null }, ['md5'])).toBeNull();
    });

    it('builds entries from records, caching outputs by default', () => {
      const deps = loadDependencies([{ path: 'in.csv', md5: MD5_A }], context());
      const outs = loadOutputs(
        [{ path: 'out.csv', md5: MD5_B }, { path: 'plot.png', cache: false }],
        context()
      );

      expect(deps.map((dep) => dep.info)).toEqual([{ md5: MD5_A }]);
      expect(outs.map((out) => out.useCache)).toEqual([true, false]);
      expect(outs.map((out) => out.info)).toEqual([{ md5: MD5_B }, null]);
    });
  });
});
