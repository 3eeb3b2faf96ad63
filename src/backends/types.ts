/**
 * Backend Capability Interfaces
 *
 * A backend contributes two capabilities: a `Remote` that can fingerprint,
 * test and remove a path, and a `Cache` that stores content by fingerprint.
 * Entries and stages depend only on these interfaces; new storage kinds are
 * added by implementing them and registering them with a `BackendRegistry`.
 *
 * @module backends/types
 */

// ============================================================================
// Fingerprints
// ============================================================================

/**
 * Opaque, content-derived identity of a tracked path.
 *
 * The keys are backend specific: `md5` for local, gs and nfs paths, `etag`
 * for s3 objects, `checksum` for hdfs files.
 */
export type Fingerprint = Readonly<Record<string, string>>;

/**
 * Names of the fingerprint fields any backend may write into a stage file.
 */
export const FINGERPRINT_FIELDS = ['md5', 'etag', 'checksum'] as const;

export type FingerprintField = (typeof FINGERPRINT_FIELDS)[number];

/**
 * Compare two fingerprints key by key. `null` only equals `null`.
 */
export function fingerprintsEqual(a: Fingerprint | null, b: Fingerprint | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  const keysA = Object.keys(a).sort();
  const keysB = Object.keys(b).sort();
  if (keysA.length !== keysB.length) {
    return false;
  }
  return keysA.every((key, index) => key === keysB[index] && a[key] === b[key]);
}

/**
 * Render a fingerprint for log messages.
 */
export function formatFingerprint(fingerprint: Fingerprint | null): string {
  if (fingerprint === null) {
    return 'none';
  }
  return Object.entries(fingerprint)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

// ============================================================================
// Schemes
// ============================================================================

/**
 * Storage kinds a path can live on.
 *
 * - `local`: the local filesystem (plain paths)
 * - `s3`, `gs`: object storage (`s3://bucket/key`, `gs://bucket/key`)
 * - `hdfs`: distributed filesystem (`hdfs://namenode/path`)
 * - `nfs`: networked filesystem reached through a mount (`nfs://server/export/path`)
 */
export type BackendScheme = 'local' | 's3' | 'gs' | 'hdfs' | 'nfs';

export const BACKEND_SCHEMES: readonly BackendScheme[] = ['local', 's3', 'gs', 'hdfs', 'nfs'];

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Handle onto a storage backend.
 */
export interface Remote {
  /** Scheme this remote serves */
  readonly scheme: BackendScheme;

  /** Fingerprint keys this remote produces, in the order they are written */
  readonly fingerprintFields: readonly FingerprintField[];

  /**
   * Compute the current fingerprint of a path.
   * @returns The fingerprint, or null when the path does not exist
   */
  fingerprintOf(path: string): Promise<Fingerprint | null>;

  /** Whether the path currently exists */
  exists(path: string): Promise<boolean>;

  /** Delete the content at a path; removing an absent path succeeds */
  remove(path: string): Promise<void>;
}

/**
 * Content-addressable store for one backend scheme.
 */
export interface Cache {
  /**
   * Fingerprint the content currently at `path`, the way `save` would key it.
   * @returns The fingerprint, or null when the path does not exist
   */
  fingerprintOf(path: string): Promise<Fingerprint | null>;

  /**
   * Store the content at `path` and return its fingerprint.
   * Saving content that is already cached is a no-op.
   */
  save(path: string): Promise<Fingerprint>;

  /** Whether content recorded under `fingerprint` is present in the store */
  contains(fingerprint: Fingerprint): Promise<boolean>;

  /**
   * Restore the content recorded under `fingerprint` at `path`.
   * @throws CacheMissError if the fingerprint is not in the store
   */
  checkout(path: string, fingerprint: Fingerprint): Promise<void>;
}

/**
 * A remote and, optionally, the cache configured for it.
 */
export interface BackendBinding {
  remote: Remote;
  cache?: Cache;
}
