/**
 * Storage Backends
 *
 * Remotes and caches for the local filesystem, object storage, hdfs and
 * networked filesystems, plus the scheme registry.
 *
 * @module backends
 */

export {
  FINGERPRINT_FIELDS,
  BACKEND_SCHEMES,
  fingerprintsEqual,
  formatFingerprint,
  type Fingerprint,
  type FingerprintField,
  type BackendScheme,
  type Remote,
  type Cache,
  type BackendBinding,
} from './types.js';

export { LocalRemote, pathExists } from './local.js';
export { LocalCache, shardMd5, type LocalCacheOptions } from './local-cache.js';
export {
  ObjectStoreRemote,
  ObjectStoreCache,
  parseObjectUrl,
  formatObjectUrl,
  type ObjectScheme,
  type ObjectLocation,
  type ObjectHead,
  type ObjectStoreClient,
} from './object-store.js';
export { HadoopCli, HdfsRemote, HdfsCache } from './hdfs.js';
export { MountTable, NetworkFsRemote, createNetworkFsCache } from './network-fs.js';
export { BackendRegistry, detectScheme } from './registry.js';
