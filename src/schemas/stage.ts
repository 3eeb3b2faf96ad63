/**
 * Stage Record Schema
 *
 * The structured form of a stage file, before YAML rendering:
 *
 * ```yaml
 * command: ./generate.sh
 * dependencies:
 *   - path: input.csv
 *     md5: 3f2a9c0e1b7d4a5f8e6c2b1a0d9e8f7c
 * outputs:
 *   - path: output.csv
 *     md5: 9b1c04aa7e55d3e2f1c0b9a8d7e6f5a4
 *     cache: true
 * aggregate-fingerprint: 51d0e6f1a2b3c4d5e6f7a8b9c0d1e2f3
 * ```
 */

import { z } from 'zod';
import { DependencyRecordSchema, OutputRecordSchema } from './entry.js';

// ============================================================================
// Keys
// ============================================================================

/**
 * Top-level keys of a stage record, in the order they are written.
 */
export const STAGE_KEYS = {
  CMD: 'command',
  DEPS: 'dependencies',
  OUTS: 'outputs',
  MD5: 'aggregate-fingerprint',
} as const;

// ============================================================================
// Stage Record Schema
// ============================================================================

export const StageRecordSchema = z
  .object({
    [STAGE_KEYS.CMD]: z.string().nullable().optional(),
    [STAGE_KEYS.DEPS]: z.array(DependencyRecordSchema).nullable().optional(),
    [STAGE_KEYS.OUTS]: z.array(OutputRecordSchema).nullable().optional(),
    [STAGE_KEYS.MD5]: z.string().nullable().optional(),
  })
  .strict();

export type StageRecord = z.infer<typeof StageRecordSchema>;

