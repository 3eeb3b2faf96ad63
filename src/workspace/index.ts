/**
 * Workspace
 *
 * Opens a project directory: merges the project config file with environment
 * overrides and builds the `StageContext` every stage is loaded with.
 *
 * Backends registered:
 * - `local` always, cached under `.repro/cache` unless configured otherwise
 * - `hdfs` always (through the `hadoop` CLI), cached when a location is set
 * - `nfs` when at least one mount is configured
 * - `s3` / `gs` only when a client for that store is injected
 *
 * @module workspace
 */

import * as path from 'node:path';
import { HadoopCli, HdfsCache, HdfsRemote } from '../backends/hdfs.js';
import { LocalRemote } from '../backends/local.js';
import { LocalCache } from '../backends/local-cache.js';
import { MountTable, NetworkFsRemote, createNetworkFsCache } from '../backends/network-fs.js';
import {
  ObjectStoreCache,
  ObjectStoreRemote,
  type ObjectScheme,
  type ObjectStoreClient,
} from '../backends/object-store.js';
import { BackendRegistry } from '../backends/registry.js';
import { BACKEND_SCHEMES } from '../backends/types.js';
import { loadConfig, type Config } from '../config/index.js';
import { ShellExecutor, type ProcessExecutor } from '../process/executor.js';
import type { Logger, StageContext } from '../pipeline/types.js';
import type { CacheLocations, ProjectConfig } from '../schemas/project-config.js';
import { loadProjectConfig } from '../storage/config.js';
import { getDefaultCacheDir } from '../storage/paths.js';

/** Shell used when neither the environment nor the project config names one */
export const DEFAULT_SHELL = '/bin/sh';

/**
 * Options for opening a workspace.
 */
export interface OpenWorkspaceOptions {
  /** Project root directory */
  root: string;
  logger: Logger;
  /** Defaults to a `ShellExecutor` */
  executor?: ProcessExecutor;
  /** Object-store clients; a scheme without a client has no backend */
  objectStores?: Partial<Record<ObjectScheme, ObjectStoreClient>>;
  /** Environment for stage commands and config overrides; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Pre-loaded configuration; defaults to `loadConfig(env)` */
  config?: Config;
}

/**
 * Settings after merging the project config with environment overrides.
 */
export interface WorkspaceSettings {
  cache: CacheLocations;
  mounts: Record<string, string>;
  shell: string;
}

/**
 * Merge project config and environment config; the environment wins.
 */
export function resolveSettings(
  root: string,
  project: ProjectConfig,
  config: Config
): WorkspaceSettings {
  const cache: CacheLocations = { ...project.cache };
  for (const scheme of BACKEND_SCHEMES) {
    const location = config.cache[scheme];
    if (location !== undefined) {
      cache[scheme] = location;
    }
  }

  if (cache.local) {
    cache.local = path.resolve(root, cache.local);
  }
  if (cache.nfs && !cache.nfs.startsWith('nfs://')) {
    cache.nfs = path.resolve(root, cache.nfs);
  }

  return {
    cache,
    mounts: { ...project.mounts, ...config.mounts },
    shell: config.shell ?? project.shell ?? DEFAULT_SHELL,
  };
}

/**
 * Build the backend registry for a workspace.
 */
export function createRegistry(
  root: string,
  settings: WorkspaceSettings,
  executor: ProcessExecutor,
  env: NodeJS.ProcessEnv,
  objectStores: Partial<Record<ObjectScheme, ObjectStoreClient>> = {},
  logger?: Logger
): BackendRegistry {
  const { cache } = settings;
  const registry = new BackendRegistry();

  registry.register({
    remote: new LocalRemote(),
    cache: new LocalCache({ dir: cache.local ?? getDefaultCacheDir(root) }),
  });

  const hdfs = new HdfsRemote(new HadoopCli(executor, { cwd: root, env, shell: settings.shell }));
  registry.register({
    remote: hdfs,
    cache: cache.hdfs ? new HdfsCache(hdfs, cache.hdfs) : undefined,
  });

  if (Object.keys(settings.mounts).length > 0) {
    const mounts = new MountTable(settings.mounts);
    registry.register({
      remote: new NetworkFsRemote(mounts),
      cache: cache.nfs ? createNetworkFsCache(mounts, cache.nfs) : undefined,
    });
  } else if (cache.nfs) {
    logger?.warn('An nfs cache location is set but no nfs mounts are configured');
  }

  const objectSchemes: ObjectScheme[] = ['s3', 'gs'];
  for (const scheme of objectSchemes) {
    const client = objectStores[scheme];
    const location = cache[scheme];
    if (!client) {
      if (location) {
        logger?.debug(`No ${scheme} client available; ignoring cache location '${location}'`);
      }
      continue;
    }
    const remote = new ObjectStoreRemote(scheme, client);
    registry.register({
      remote,
      cache: location ? new ObjectStoreCache(remote, location) : undefined,
    });
  }

  return registry;
}

/**
 * Open a project and build its stage context.
 *
 * @example
 * ```typescript
 * const context = await openWorkspace({ root: process.cwd(), logger });
 * const stage = await load(context, 'model.bin.repro');
 * ```
 * @throws ConfigurationError on invalid environment or project config
 */
export async function openWorkspace(options: OpenWorkspaceOptions): Promise<StageContext> {
  const root = path.resolve(options.root);
  const env = options.env ?? process.env;
  const config = options.config ?? loadConfig(env);
  const project = await loadProjectConfig(root);
  const settings = resolveSettings(root, project, config);
  const executor = options.executor ?? new ShellExecutor();

  const registry = createRegistry(
    root,
    settings,
    executor,
    env,
    options.objectStores,
    options.logger
  );
  options.logger.debug(`Opened workspace '${root}' (backends: ${registry.schemes().join(', ')})`);

  return {
    root,
    logger: options.logger,
    registry,
    executor,
    shell: settings.shell,
    env,
  };
}
