/**
 * Tests for the hdfs backend against an in-memory `hadoop fs`
 *
 * @module backends/hdfs.test
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  BackendCommandError,
  CacheMissError,
  ConfigurationError,
  ReproError,
} from '../pipeline/errors.js';
import { FakeExecutor, FakeHadoop } from '../testing/fakes.js';
import { HadoopCli, HdfsCache, HdfsRemote } from './hdfs.js';

const context = { cwd: '/work', env: {}, shell: '/bin/sh' };

describe('HadoopCli', () => {
  it('runs hadoop fs with captured output', async () => {
    const executor = new FakeExecutor(() => 0);
    const cli = new HadoopCli(executor, context);

    await cli.exists('hdfs://nn/data/in.csv');

    expect(executor.calls).toEqual([
      {
        command: 'hadoop fs -test -e hdfs://nn/data/in.csv',
        context,
        options: { capture: true },
      },
    ]);
  });

  it('uses the last column of -checksum output', async () => {
    const executor = new FakeExecutor((command) =>
      command.includes('-checksum')
        ? { exitCode: 0, stdout: 'hdfs://nn/a\tMD5-of-0MD5-of-512CRC32C\t0000beef\n', stderr: '' }
        : 0
    );
    const cli = new HadoopCli(executor, context);

    expect(await cli.checksum('hdfs://nn/a')).toBe('0000beef');
  });

  it('rejects unexpected -checksum output', async () => {
    const executor = new FakeExecutor((command) =>
      command.includes('-checksum') ? { exitCode: 0, stdout: 'garbage\n', stderr: '' } : 0
    );
    const cli = new HadoopCli(executor, context);

    await expect(cli.checksum('hdfs://nn/a')).rejects.toThrow(BackendCommandError);
  });

  it('throws BackendCommandError with stderr when a command fails', async () => {
    const executor = new FakeExecutor(() => ({
      exitCode: 1,
      stdout: '',
      stderr: 'Permission denied\n',
    }));
    const cli = new HadoopCli(executor, context);

    await expect(cli.remove('hdfs://nn/a')).rejects.toThrow(
      "Backend command 'hadoop fs -rm -r -f hdfs://nn/a' failed with exit code 1: Permission denied"
    );
  });
});

describe('hdfs remote and cache', () => {
  let hadoop: FakeHadoop;
  let remote: HdfsRemote;

  beforeEach(() => {
    hadoop = new FakeHadoop();
    remote = new HdfsRemote(new HadoopCli(hadoop.executor, context));
    hadoop.files.set('hdfs://nn/data/out.csv', 'rows');
  });

  it('fingerprints by checksum', async () => {
    expect(remote.fingerprintFields).toEqual(['checksum']);
    expect(await remote.fingerprintOf('hdfs://nn/data/out.csv')).toEqual({
      checksum: hadoop.checksumOf('rows'),
    });
    expect(await remote.fingerprintOf('hdfs://nn/data/missing.csv')).toBeNull();
  });

  it('rejects malformed hdfs URLs', async () => {
    await expect(remote.exists('hdfs://nn')).rejects.toThrow(ConfigurationError);
  });

  it('removes paths recursively', async () => {
    hadoop.files.set('hdfs://nn/data/dir/part-0', 'x');

    await remote.remove('hdfs://nn/data/dir');

    expect(hadoop.files.has('hdfs://nn/data/dir/part-0')).toBe(false);
    expect(hadoop.files.has('hdfs://nn/data/out.csv')).toBe(true);
  });

  it('saves into and checks out from the cache directory', async () => {
    const cache = new HdfsCache(remote, 'hdfs://nn/repro/cache/');
    const checksum = hadoop.checksumOf('rows');

    const fingerprint = await cache.save('hdfs://nn/data/out.csv');
    expect(fingerprint).toEqual({ checksum });
    expect(hadoop.files.get(cache.entryPath(checksum))).toBe('rows');
    expect(cache.entryPath(checksum)).toBe(
      `hdfs://nn/repro/cache/${checksum.slice(0, 2)}/${checksum.slice(2)}`
    );

    hadoop.files.set('hdfs://nn/data/out.csv', 'overwritten');
    await cache.checkout('hdfs://nn/data/out.csv', fingerprint);

    expect(hadoop.files.get('hdfs://nn/data/out.csv')).toBe('rows');
  });

  it('reports whether a checksum is cached', async () => {
    const cache = new HdfsCache(remote, 'hdfs://nn/repro/cache');
    const checksum = hadoop.checksumOf('rows');

    expect(await cache.contains({ checksum })).toBe(false);
    await cache.save('hdfs://nn/data/out.csv');
    expect(await cache.contains({ checksum })).toBe(true);
    expect(await cache.contains({ md5: checksum })).toBe(false);
  });

  it('refuses to cache a missing path', async () => {
    const cache = new HdfsCache(remote, 'hdfs://nn/repro/cache');

    await expect(cache.save('hdfs://nn/data/missing.csv')).rejects.toThrow(ReproError);
  });

  it('throws CacheMissError when the checksum is not cached', async () => {
    const cache = new HdfsCache(remote, 'hdfs://nn/repro/cache');

    await expect(
      cache.checkout('hdfs://nn/data/out.csv', { checksum: '00001234' })
    ).rejects.toThrow(CacheMissError);
  });
});
