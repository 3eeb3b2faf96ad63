/**
 * Distributed Filesystem (HDFS) Backend
 *
 * Serves `hdfs://` paths by driving the `hadoop fs` command line client
 * through a `ProcessExecutor`. Files fingerprint by the checksum
 * `hadoop fs -checksum` reports.
 *
 * @module backends/hdfs
 */

import {
  BackendCommandError,
  CacheMissError,
  ConfigurationError,
  ReproError,
} from '../pipeline/errors.js';
import { buildCommand, type ExecutionContext, type ProcessExecutor } from '../process/executor.js';
import type { Cache, Fingerprint, FingerprintField, Remote } from './types.js';

// ============================================================================
// hadoop CLI
// ============================================================================

/**
 * Thin wrapper over `hadoop fs` subcommands.
 */
export class HadoopCli {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly context: ExecutionContext,
    private readonly program = 'hadoop'
  ) {}

  /**
   * Run `hadoop fs <args>` and return its result without judging the exit code.
   */
  async fs(args: string[]): Promise<{ exitCode: number; stdout: string; stderr: string }> {
    const command = buildCommand(this.program, ['fs', ...args]);
    return this.executor.run(command, this.context, { capture: true });
  }

  /**
   * Run `hadoop fs <args>` and throw when it fails.
   */
  async fsOrThrow(args: string[]): Promise<string> {
    const result = await this.fs(args);
    if (result.exitCode !== 0) {
      throw new BackendCommandError(
        buildCommand(this.program, ['fs', ...args]),
        result.exitCode,
        result.stderr
      );
    }
    return result.stdout;
  }

  async exists(path: string): Promise<boolean> {
    const result = await this.fs(['-test', '-e', path]);
    return result.exitCode === 0;
  }

  /**
   * @returns The checksum column of `hadoop fs -checksum`, or null if the path is absent
   */
  async checksum(path: string): Promise<string | null> {
    if (!(await this.exists(path))) {
      return null;
    }
    const stdout = await this.fsOrThrow(['-checksum', path]);
    const columns = stdout.trim().split(/\s+/);
    if (columns.length < 3) {
      throw new BackendCommandError(`hadoop fs -checksum ${path}`, 0, `unexpected output: ${stdout.trim()}`);
    }
    return columns[columns.length - 1];
  }

  async remove(path: string): Promise<void> {
    await this.fsOrThrow(['-rm', '-r', '-f', path]);
  }

  async copy(source: string, destination: string): Promise<void> {
    const parent = destination.slice(0, destination.lastIndexOf('/'));
    await this.fsOrThrow(['-mkdir', '-p', parent]);
    await this.fsOrThrow(['-cp', '-f', source, destination]);
  }
}

// ============================================================================
// Remote
// ============================================================================

const HDFS_URL_PATTERN = /^hdfs:\/\/[^/]*\/.+$/;

function assertHdfsUrl(url: string): string {
  if (!HDFS_URL_PATTERN.test(url)) {
    throw new ConfigurationError(`Invalid hdfs path '${url}'`);
  }
  return url;
}

/**
 * Remote for `hdfs://` paths.
 */
export class HdfsRemote implements Remote {
  readonly scheme = 'hdfs' as const;
  readonly fingerprintFields: readonly FingerprintField[] = ['checksum'];

  constructor(readonly cli: HadoopCli) {}

  async fingerprintOf(url: string): Promise<Fingerprint | null> {
    const checksum = await this.cli.checksum(assertHdfsUrl(url));
    return checksum === null ? null : { checksum };
  }

  async exists(url: string): Promise<boolean> {
    return this.cli.exists(assertHdfsUrl(url));
  }

  async remove(url: string): Promise<void> {
    await this.cli.remove(assertHdfsUrl(url));
  }
}

// ============================================================================
// Cache
// ============================================================================

/**
 * Cache kept under an hdfs directory, one file per checksum.
 */
export class HdfsCache implements Cache {
  private readonly root: string;

  /**
   * @param remote - The hdfs remote
   * @param cacheUrl - Cache directory, e.g. `hdfs://namenode/repro/cache`
   */
  constructor(
    private readonly remote: HdfsRemote,
    cacheUrl: string
  ) {
    this.root = assertHdfsUrl(cacheUrl).replace(/\/+$/, '');
  }

  entryPath(checksum: string): string {
    return `${this.root}/${checksum.slice(0, 2)}/${checksum.slice(2)}`;
  }

  fingerprintOf(url: string): Promise<Fingerprint | null> {
    return this.remote.fingerprintOf(url);
  }

  async save(url: string): Promise<Fingerprint> {
    const fingerprint = await this.remote.fingerprintOf(url);
    if (fingerprint === null) {
      throw new ReproError(`Cannot cache '${url}': path does not exist`);
    }
    const destination = this.entryPath(fingerprint['checksum']);
    if (!(await this.remote.cli.exists(destination))) {
      await this.remote.cli.copy(url, destination);
    }
    return fingerprint;
  }

  async contains(fingerprint: Fingerprint): Promise<boolean> {
    const checksum = fingerprint['checksum'];
    return checksum !== undefined && (await this.remote.cli.exists(this.entryPath(checksum)));
  }

  async checkout(url: string, fingerprint: Fingerprint): Promise<void> {
    const checksum = fingerprint['checksum'];
    if (checksum === undefined) {
      throw new CacheMissError(url, fingerprint);
    }
    const cached = this.entryPath(checksum);
    if (!(await this.remote.cli.exists(cached))) {
      throw new CacheMissError(url, fingerprint);
    }
    await this.remote.cli.remove(url);
    await this.remote.cli.copy(cached, url);
  }
}
