/**
 * Object Storage Backend
 *
 * Serves `s3://bucket/key` and `gs://bucket/key` paths. The wire protocol
 * lives behind `ObjectStoreClient`, which callers inject (an SDK wrapper in
 * production, an in-memory store in tests). Objects fingerprint by the
 * checksum the store reports: `etag` for s3, `md5` for gs.
 *
 * @module backends/object-store
 */

import { ConfigurationError, ReproError, CacheMissError } from '../pipeline/errors.js';
import type { Cache, Fingerprint, FingerprintField, Remote } from './types.js';

// ============================================================================
// Client Contract
// ============================================================================

export type ObjectScheme = 's3' | 'gs';

/**
 * Address of one object.
 */
export interface ObjectLocation {
  bucket: string;
  key: string;
}

/**
 * Metadata returned by a HEAD request.
 */
export interface ObjectHead {
  /** Content checksum reported by the store (ETag, MD5 hash) */
  checksum: string;
}

/**
 * Minimal object-store operations the backend needs.
 */
export interface ObjectStoreClient {
  /** @returns Object metadata, or null when the object does not exist */
  headObject(location: ObjectLocation): Promise<ObjectHead | null>;
  /** Server-side copy; overwrites the destination */
  copyObject(source: ObjectLocation, destination: ObjectLocation): Promise<void>;
  /** Delete an object; deleting an absent object succeeds */
  deleteObject(location: ObjectLocation): Promise<void>;
}

// ============================================================================
// URL Handling
// ============================================================================

const OBJECT_URL_PATTERN = /^(s3|gs):\/\/([^/]+)\/(.+)$/;

/**
 * Split an object URL into bucket and key.
 *
 * @throws ConfigurationError if the URL is not `s3://bucket/key` or `gs://bucket/key`
 *
 * @example
 * ```typescript
 * parseObjectUrl('s3://datasets/raw/train.csv');
 * // Returns: { scheme: 's3', bucket: 'datasets', key: 'raw/train.csv' }
 * ```
 */
export function parseObjectUrl(url: string): ObjectLocation & { scheme: ObjectScheme } {
  const match = OBJECT_URL_PATTERN.exec(url);
  if (!match) {
    throw new ConfigurationError(`Invalid object storage path '${url}'`);
  }
  const scheme: ObjectScheme = match[1] === 'gs' ? 'gs' : 's3';
  return { scheme, bucket: match[2], key: match[3] };
}

/**
 * Inverse of `parseObjectUrl`.
 */
export function formatObjectUrl(scheme: ObjectScheme, location: ObjectLocation): string {
  return `${scheme}://${location.bucket}/${location.key}`;
}

// ============================================================================
// Remote
// ============================================================================

/**
 * Remote for one object-storage scheme.
 */
export class ObjectStoreRemote implements Remote {
  readonly fingerprintFields: readonly FingerprintField[];

  constructor(
    readonly scheme: ObjectScheme,
    readonly client: ObjectStoreClient
  ) {
    this.fingerprintFields = [scheme === 's3' ? 'etag' : 'md5'];
  }

  /** Wrap a store checksum in this scheme's fingerprint field */
  toFingerprint(checksum: string): Fingerprint {
    return { [this.fingerprintFields[0]]: checksum };
  }

  /** Extract the store checksum from a fingerprint of this scheme */
  checksumOf(fingerprint: Fingerprint): string | undefined {
    return fingerprint[this.fingerprintFields[0]];
  }

  async fingerprintOf(url: string): Promise<Fingerprint | null> {
    const head = await this.client.headObject(this.locate(url));
    return head === null ? null : this.toFingerprint(head.checksum);
  }

  async exists(url: string): Promise<boolean> {
    return (await this.client.headObject(this.locate(url))) !== null;
  }

  async remove(url: string): Promise<void> {
    await this.client.deleteObject(this.locate(url));
  }

  locate(url: string): ObjectLocation {
    const parsed = parseObjectUrl(url);
    if (parsed.scheme !== this.scheme) {
      throw new ConfigurationError(`Path '${url}' is not a ${this.scheme} path`);
    }
    return { bucket: parsed.bucket, key: parsed.key };
  }
}

// ============================================================================
// Cache
// ============================================================================

/**
 * Cache kept in a bucket prefix of the same object store.
 *
 * Entries live at `<prefix>/<checksum[0..2]>/<checksum[2..]>`.
 */
export class ObjectStoreCache implements Cache {
  private readonly root: ObjectLocation;

  /**
   * @param remote - Remote for the scheme being cached
   * @param cacheUrl - Cache location, e.g. `s3://team-cache/repro`
   */
  constructor(
    private readonly remote: ObjectStoreRemote,
    cacheUrl: string
  ) {
    const trimmed = cacheUrl.replace(/\/+$/, '');
    const parsed = /^(s3|gs):\/\/([^/]+)(?:\/(.*))?$/.exec(trimmed);
    if (!parsed || parsed[1] !== remote.scheme) {
      throw new ConfigurationError(
        `Cache location '${cacheUrl}' is not a ${remote.scheme} location`
      );
    }
    this.root = { bucket: parsed[2], key: parsed[3] ?? '' };
  }

  /**
   * Object holding the content with this checksum.
   */
  entryLocation(checksum: string): ObjectLocation {
    const shard = `${checksum.slice(0, 2)}/${checksum.slice(2)}`;
    return {
      bucket: this.root.bucket,
      key: this.root.key ? `${this.root.key}/${shard}` : shard,
    };
  }

  fingerprintOf(url: string): Promise<Fingerprint | null> {
    return this.remote.fingerprintOf(url);
  }

  async save(url: string): Promise<Fingerprint> {
    const source = this.remote.locate(url);
    const head = await this.remote.client.headObject(source);
    if (head === null) {
      throw new ReproError(`Cannot cache '${url}': object does not exist`);
    }

    const destination = this.entryLocation(head.checksum);
    if ((await this.remote.client.headObject(destination)) === null) {
      await this.remote.client.copyObject(source, destination);
    }
    return this.remote.toFingerprint(head.checksum);
  }

  async contains(fingerprint: Fingerprint): Promise<boolean> {
    const checksum = this.remote.checksumOf(fingerprint);
    if (checksum === undefined) {
      return false;
    }
    return (await this.remote.client.headObject(this.entryLocation(checksum))) !== null;
  }

  async checkout(url: string, fingerprint: Fingerprint): Promise<void> {
    const checksum = this.remote.checksumOf(fingerprint);
    if (checksum === undefined) {
      throw new CacheMissError(url, fingerprint);
    }

    const cached = this.entryLocation(checksum);
    if ((await this.remote.client.headObject(cached)) === null) {
      throw new CacheMissError(url, fingerprint);
    }
    await this.remote.client.copyObject(cached, this.remote.locate(url));
  }
}
