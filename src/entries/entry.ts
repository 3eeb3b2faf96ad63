/**
 * Entry
 *
 * A tracked path plus its recorded fingerprint. One class serves both roles:
 * a dependency is an entry without a cache, an output is an entry that may
 * carry one. Everything backend specific sits behind the `Remote` and `Cache`
 * it is given, so the same `changed/save/checkout/remove/status` logic runs
 * for every storage scheme.
 *
 * @module entries/entry
 */

import {
  fingerprintsEqual,
  formatFingerprint,
  type BackendScheme,
  type Cache,
  type Fingerprint,
  type Remote,
} from '../backends/types.js';
import { ConfigurationError, EntryNotFoundError, EntryRemoveError } from '../pipeline/errors.js';
import type { EntryStatus, Logger } from '../pipeline/types.js';
import type { DependencyRecord, OutputRecord } from '../schemas/entry.js';

// ============================================================================
// Types
// ============================================================================

export type EntryRole = 'dependency' | 'output';

/**
 * Constructor arguments for an entry.
 */
export interface EntryInit {
  role: EntryRole;
  /** Path as written in the stage file */
  declaredPath: string;
  /** Absolute path or URL the remote operates on */
  path: string;
  remote: Remote;
  /** Cache for the remote's scheme, if one is configured */
  cache?: Cache;
  /** Outputs only; defaults to true for outputs */
  useCache?: boolean;
  /** Last recorded fingerprint */
  info?: Fingerprint | null;
  logger: Logger;
}

// ============================================================================
// Entry
// ============================================================================

export class Entry {
  readonly role: EntryRole;
  readonly declaredPath: string;
  readonly path: string;
  readonly remote: Remote;
  readonly useCache: boolean;
  /** Last recorded fingerprint; null until the entry is first saved */
  info: Fingerprint | null;

  private readonly cache: Cache | null;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when an output asks for caching and no cache
   *   is configured for its scheme
   */
  constructor(init: EntryInit) {
    this.role = init.role;
    this.declaredPath = init.declaredPath;
    this.path = init.path;
    this.remote = init.remote;
    this.info = init.info ?? null;
    this.logger = init.logger;
    this.useCache = init.role === 'output' ? (init.useCache ?? true) : false;

    if (this.useCache && !init.cache) {
      throw new ConfigurationError(
        `No cache location setup for '${init.remote.scheme}' outputs.`
      );
    }
    this.cache = this.useCache && init.cache ? init.cache : null;
  }

  get scheme(): BackendScheme {
    return this.remote.scheme;
  }

  get isOutput(): boolean {
    return this.role === 'output';
  }

  exists(): Promise<boolean> {
    return this.remote.exists(this.path);
  }

  /**
   * Whether the content at the path differs from the recorded fingerprint,
   * or a cached output's recorded content is missing from its cache.
   */
  async changed(): Promise<boolean> {
    return (await this.drift()) !== null;
  }

  /**
   * How the entry drifted; null when it matches its record.
   */
  private async drift(): Promise<EntryStatus | null> {
    const current = await this.remote.fingerprintOf(this.path);
    if (current === null) {
      this.logger.debug(`'${this.declaredPath}' doesn't exist`);
      return 'deleted';
    }

    if (!fingerprintsEqual(current, this.info)) {
      this.logger.debug(
        `'${this.declaredPath}' changed (recorded ${formatFingerprint(this.info)}, ` +
          `actual ${formatFingerprint(current)})`
      );
      return this.info === null ? 'new' : 'modified';
    }

    if (this.cache && this.info !== null) {
      const cached = await this.cache.fingerprintOf(this.path);
      if (!fingerprintsEqual(cached, this.info)) {
        this.logger.debug(
          `'${this.declaredPath}' differs from its cache fingerprint ` +
            `(recorded ${formatFingerprint(this.info)}, cache ${formatFingerprint(cached)})`
        );
        return 'modified';
      }
      if (!(await this.cache.contains(this.info))) {
        this.logger.debug(
          `'${this.declaredPath}' is not in the cache (${formatFingerprint(this.info)})`
        );
        return 'not in cache';
      }
    }

    return null;
  }

  /**
   * Record the current fingerprint and, for cached outputs, store the content.
   *
   * @throws EntryNotFoundError if the path does not exist
   */
  async save(): Promise<void> {
    if (!(await this.remote.exists(this.path))) {
      throw new EntryNotFoundError(this.declaredPath, this.role);
    }

    this.info = await this.remote.fingerprintOf(this.path);

    if (this.cache) {
      this.info = await this.cache.save(this.path);
      this.logger.debug(`Saved '${this.declaredPath}' to cache (${formatFingerprint(this.info)})`);
    }
  }

  /**
   * Restore a cached output from the recorded fingerprint.
   */
  async checkout(): Promise<void> {
    if (!this.cache) {
      return;
    }
    if (this.info === null) {
      this.logger.info(`'${this.declaredPath}' has no recorded state to check out`);
      return;
    }

    this.logger.debug(`Checking out '${this.declaredPath}' (${formatFingerprint(this.info)})`);
    await this.cache.checkout(this.path, this.info);
  }

  /**
   * Delete the content at the path.
   *
   * @param ignoreRemove - Log a failed deletion instead of throwing
   * @throws EntryRemoveError when deletion fails and `ignoreRemove` is false
   */
  async remove(ignoreRemove = false): Promise<void> {
    try {
      await this.remote.remove(this.path);
      this.logger.debug(`Removed '${this.declaredPath}'`);
    } catch (error) {
      if (!ignoreRemove) {
        throw new EntryRemoveError(this.declaredPath, { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not remove '${this.declaredPath}': ${reason}`);
    }
  }

  /**
   * Serialize to a stage-file record: path, fingerprint fields, cache flag.
   */
  dumpd(): DependencyRecord | OutputRecord {
    const record: OutputRecord = { path: this.declaredPath };

    if (this.info !== null) {
      for (const field of this.remote.fingerprintFields) {
        const value = this.info[field];
        if (value !== undefined) {
          record[field] = value;
        }
      }
    }

    if (this.isOutput) {
      record.cache = this.useCache;
    }
    return record;
  }

  /**
   * @returns `{}` when unchanged, else `{ [declaredPath]: status }`
   */
  async status(): Promise<Record<string, EntryStatus>> {
    const drift = await this.drift();
    return drift === null ? {} : { [this.declaredPath]: drift };
  }
}
