/**
 * Backend Registry
 *
 * Maps each storage scheme to its remote and (optional) cache. Entries look
 * their backend up here by the scheme of their path.
 *
 * @module backends/registry
 */

import { ConfigurationError } from '../pipeline/errors.js';
import type { BackendBinding, BackendScheme, Cache, Remote } from './types.js';

const URL_SCHEMES: Record<string, BackendScheme> = {
  's3://': 's3',
  'gs://': 'gs',
  'hdfs://': 'hdfs',
  'nfs://': 'nfs',
};

/**
 * Determine the storage scheme of a declared path.
 *
 * Anything that is not an `s3://`, `gs://`, `hdfs://` or `nfs://` URL is a
 * local path.
 *
 * @example
 * ```typescript
 * detectScheme('s3://bucket/data.csv'); // 's3'
 * detectScheme('data/train.csv');       // 'local'
 * ```
 */
export function detectScheme(declaredPath: string): BackendScheme {
  for (const [prefix, scheme] of Object.entries(URL_SCHEMES)) {
    if (declaredPath.startsWith(prefix)) {
      return scheme;
    }
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(declaredPath)) {
    throw new ConfigurationError(`Unsupported storage scheme in '${declaredPath}'`);
  }
  return 'local';
}

/**
 * Scheme-indexed lookup of remotes and caches.
 */
export class BackendRegistry {
  private readonly bindings = new Map<BackendScheme, BackendBinding>();

  constructor(bindings: BackendBinding[] = []) {
    for (const binding of bindings) {
      this.register(binding);
    }
  }

  /**
   * Register (or replace) the backend for the remote's scheme.
   */
  register(binding: BackendBinding): this {
    this.bindings.set(binding.remote.scheme, binding);
    return this;
  }

  has(scheme: BackendScheme): boolean {
    return this.bindings.has(scheme);
  }

  /**
   * Schemes with a registered remote, in registration order.
   */
  schemes(): BackendScheme[] {
    return Array.from(this.bindings.keys());
  }

  /**
   * @throws ConfigurationError if no backend is registered for the scheme
   */
  remoteFor(scheme: BackendScheme): Remote {
    const binding = this.bindings.get(scheme);
    if (!binding) {
      throw new ConfigurationError(`No backend configured for '${scheme}' paths.`);
    }
    return binding.remote;
  }

  /**
   * @returns The cache for a scheme, or undefined when none is configured
   */
  cacheFor(scheme: BackendScheme): Cache | undefined {
    return this.bindings.get(scheme)?.cache;
  }
}
