/**
 * Entry Record Schemas
 *
 * Shape of one dependency or output inside a stage file. Records are strict:
 * an unknown key is a format error rather than silently dropped data.
 *
 * @example
 * ```yaml
 * path: data/train.csv
 * md5: 3f2a9c0e1b7d4a5f8e6c2b1a0d9e8f7c
 * cache: true
 * ```
 */

import { z } from 'zod';
import { EntryPathSchema, FingerprintValueSchema } from './common.js';

// ============================================================================
// Dependency Record
// ============================================================================

/**
 * Dependency record: a path plus whichever fingerprint field its backend
 * writes (`md5`, `etag` or `checksum`).
 */
export const DependencyRecordSchema = z
  .object({
    path: EntryPathSchema,
    md5: FingerprintValueSchema,
    etag: FingerprintValueSchema,
    checksum: FingerprintValueSchema,
  })
  .strict();

export type DependencyRecord = z.infer<typeof DependencyRecordSchema>;

// ============================================================================
// Output Record
// ============================================================================

/**
 * Output record: a dependency record plus the `cache` flag (default true).
 */
export const OutputRecordSchema = DependencyRecordSchema.extend({
  cache: z.boolean().optional(),
}).strict();

export type OutputRecord = z.infer<typeof OutputRecordSchema>;

/**
 * Either kind of entry record.
 */
export type EntryRecord = DependencyRecord | OutputRecord;
