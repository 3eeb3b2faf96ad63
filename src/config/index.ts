/**
 * Configuration Module
 *
 * Loads and validates environment variables for reprokit.
 * Uses Zod for runtime validation; `.env` files are picked up through dotenv.
 *
 * Environment settings override the project config file
 * (`.repro/config.json`) when a workspace is opened.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../pipeline/errors.js';
import { formatIssues } from '../schemas/common.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Cache locations per storage scheme
  REPRO_CACHE_DIR: z.string().min(1).optional(),
  REPRO_S3_CACHE: z.string().regex(/^s3:\/\/[^/]+/, 'Must be an s3:// URL').optional(),
  REPRO_GS_CACHE: z.string().regex(/^gs:\/\/[^/]+/, 'Must be a gs:// URL').optional(),
  REPRO_HDFS_CACHE: z.string().regex(/^hdfs:\/\/[^/]*\/.+/, 'Must be an hdfs:// URL').optional(),
  REPRO_NFS_CACHE: z.string().min(1).optional(),

  // nfs://host/export=/mnt/export pairs, comma separated
  REPRO_NFS_MOUNTS: z.string().optional(),

  // Shell for stage commands
  REPRO_SHELL: z.string().min(1).optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Validated runtime configuration.
 */
export interface Config {
  nodeEnv: Env['NODE_ENV'];
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  /** Cache location overrides; unset keys fall back to the project config */
  cache: {
    local?: string;
    s3?: string;
    gs?: string;
    hdfs?: string;
    nfs?: string;
  };

  /** nfs:// prefix -> local mount point */
  mounts: Record<string, string>;

  /** Shell override for stage commands */
  shell?: string;
}

/**
 * Parse `REPRO_NFS_MOUNTS`.
 *
 * @example
 * ```typescript
 * parseMounts('nfs://filer/data=/mnt/data,nfs://filer/home=/mnt/home');
 * // Returns: { 'nfs://filer/data': '/mnt/data', 'nfs://filer/home': '/mnt/home' }
 * ```
 * @throws ConfigurationError on a malformed pair
 */
export function parseMounts(value: string | undefined): Record<string, string> {
  const mounts: Record<string, string> = {};
  if (!value) {
    return mounts;
  }

  for (const pair of value.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.lastIndexOf('=');
    const url = separator > 0 ? trimmed.slice(0, separator).trim() : '';
    const dir = separator > 0 ? trimmed.slice(separator + 1).trim() : '';
    if (!url.startsWith('nfs://') || !dir) {
      throw new ConfigurationError(
        `Invalid REPRO_NFS_MOUNTS entry '${trimmed}': expected nfs://<host>/<export>=<dir>`
      );
    }
    mounts[url] = dir;
  }
  return mounts;
}

/**
 * Build the configuration from an environment.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);
  if (!parseResult.success) {
    throw new ConfigurationError(
      `Invalid environment variables: ${formatIssues(parseResult.error).join('; ')}`
    );
  }

  const env: Env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    cache: {
      local: env.REPRO_CACHE_DIR,
      s3: env.REPRO_S3_CACHE,
      gs: env.REPRO_GS_CACHE,
      hdfs: env.REPRO_HDFS_CACHE,
      nfs: env.REPRO_NFS_CACHE,
    },

    mounts: parseMounts(env.REPRO_NFS_MOUNTS),
    shell: env.REPRO_SHELL,
  };
}
