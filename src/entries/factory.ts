/**
 * Entry Construction
 *
 * Builds entries from declared paths or stage-file records. The storage
 * scheme is read from the path, the remote and cache come from the registry,
 * and the cache-required check runs before any backend call.
 *
 * @module entries/factory
 */

import * as path from 'node:path';
import { detectScheme, type BackendRegistry } from '../backends/registry.js';
import type { BackendScheme, Fingerprint } from '../backends/types.js';
import type { Logger } from '../pipeline/types.js';
import type { DependencyRecord, OutputRecord } from '../schemas/entry.js';
import { Entry, type EntryRole } from './entry.js';

/**
 * Where entries are being built.
 */
export interface EntryFactoryContext {
  /** Stage working directory; local paths resolve against it */
  cwd: string;
  registry: BackendRegistry;
  logger: Logger;
}

/**
 * Options for a single entry.
 */
export interface CreateEntryOptions {
  /** Outputs only; defaults to true */
  useCache?: boolean;
  /** Previously recorded fingerprint */
  info?: Fingerprint | null;
}

/**
 * Resolve a declared path to the scheme and location its remote operates on.
 *
 * @example
 * ```typescript
 * resolveEntryPath('data/in.csv', '/work/project');
 * // Returns: { scheme: 'local', path: '/work/project/data/in.csv' }
 * resolveEntryPath('s3://bucket/in.csv', '/work/project');
 * // Returns: { scheme: 's3', path: 's3://bucket/in.csv' }
 * ```
 */
export function resolveEntryPath(
  declaredPath: string,
  cwd: string
): { scheme: BackendScheme; path: string } {
  const scheme = detectScheme(declaredPath);
  if (scheme === 'local') {
    return { scheme, path: path.resolve(cwd, declaredPath) };
  }
  return { scheme, path: declaredPath };
}

/**
 * Create one entry.
 *
 * @throws ConfigurationError when the scheme has no backend, or when a cached
 *   output's scheme has no cache
 */
export function createEntry(
  role: EntryRole,
  declaredPath: string,
  context: EntryFactoryContext,
  options: CreateEntryOptions = {}
): Entry {
  const resolved = resolveEntryPath(declaredPath, context.cwd);
  return new Entry({
    role,
    declaredPath,
    path: resolved.path,
    remote: context.registry.remoteFor(resolved.scheme),
    cache: context.registry.cacheFor(resolved.scheme),
    useCache: role === 'output' ? (options.useCache ?? true) : false,
    info: options.info ?? null,
    logger: context.logger,
  });
}

/**
 * Create entries for a list of declared paths.
 */
export function createEntries(
  role: EntryRole,
  declaredPaths: string[],
  context: EntryFactoryContext,
  options: { useCache?: boolean } = {}
): Entry[] {
  return declaredPaths.map((declaredPath) =>
    createEntry(role, declaredPath, context, { useCache: options.useCache })
  );
}

/**
 * Extract the recorded fingerprint from a record, keeping only the fields the
 * remote produces.
 *
 * @returns The fingerprint, or null when none of the fields are set
 */
export function fingerprintFromRecord(
  record: DependencyRecord,
  fields: readonly (keyof DependencyRecord)[]
): Fingerprint | null {
  const info: Record<string, string> = {};
  for (const field of fields) {
    const value = record[field];
    if (typeof value === 'string') {
      info[field] = value;
    }
  }
  return Object.keys(info).length > 0 ? info : null;
}

/**
 * Build dependency entries from stage-file records.
 */
export function loadDependencies(
  records: DependencyRecord[],
  context: EntryFactoryContext
): Entry[] {
  return records.map((record) => loadEntry('dependency', record, context));
}

/**
 * Build output entries from stage-file records (`cache` defaults to true).
 */
export function loadOutputs(records: OutputRecord[], context: EntryFactoryContext): Entry[] {
  return records.map((record) =>
    loadEntry('output', record, context, record.cache ?? true)
  );
}

function loadEntry(
  role: EntryRole,
  record: DependencyRecord,
  context: EntryFactoryContext,
  useCache?: boolean
): Entry {
  const { scheme } = resolveEntryPath(record.path, context.cwd);
  const fields = context.registry.remoteFor(scheme).fingerprintFields;
  return createEntry(role, record.path, context, {
    useCache,
    info: fingerprintFromRecord(record, fields),
  });
}
