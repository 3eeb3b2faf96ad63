/**
 * Project Configuration Schema
 *
 * Per-project settings stored at `<root>/.repro/config.json`. Every field is
 * optional; environment variables override the file (see `config/index.ts`).
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';

/**
 * Cache location per storage scheme.
 */
export const CacheLocationsSchema = z
  .object({
    /** Local cache directory (default: <root>/.repro/cache) */
    local: z.string().min(1).optional(),
    /** s3 cache prefix, e.g. s3://bucket/cache */
    s3: z.string().regex(/^s3:\/\/[^/]+/, 'Must be an s3:// URL').optional(),
    /** gs cache prefix, e.g. gs://bucket/cache */
    gs: z.string().regex(/^gs:\/\/[^/]+/, 'Must be a gs:// URL').optional(),
    /** hdfs cache directory, e.g. hdfs://namenode/cache */
    hdfs: z.string().regex(/^hdfs:\/\/[^/]*\/.+/, 'Must be an hdfs:// URL').optional(),
    /** nfs cache directory: an nfs:// URL or a local directory */
    nfs: z.string().min(1).optional(),
  })
  .strict();

export type CacheLocations = z.infer<typeof CacheLocationsSchema>;

export const ProjectConfigSchema = z.object({
  /** Schema version for forward compatibility */
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.projectConfig),

  /** Cache location per scheme */
  cache: CacheLocationsSchema.default({}),

  /** nfs:// URL prefix -> local mount point */
  mounts: z.record(z.string().regex(/^nfs:\/\//, 'Mount keys must be nfs:// URLs'), z.string().min(1)).default({}),

  /** Shell used to run stage commands */
  shell: z.string().min(1).optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_PROJECT_CONFIG: ProjectConfig = {
  schemaVersion: SCHEMA_VERSIONS.projectConfig,
  cache: {},
  mounts: {},
};
