/**
 * Common Zod Schemas - Shared field types for stage files and config
 */

import { z } from 'zod';

// ============================================
// Fingerprint Field Schema
// ============================================

/**
 * A recorded fingerprint value. `null` (or an absent key) means the entry
 * has never been saved.
 */
export const FingerprintValueSchema = z.string().min(1).nullable().optional();

// ============================================
// Entry Path Schema
// ============================================

/**
 * Declared path of a dependency or output: a path relative to the stage's
 * directory, an absolute path, or a storage URL.
 */
export const EntryPathSchema = z
  .string()
  .min(1, 'Path must not be empty')
  .refine((value) => !value.includes('\0'), { message: 'Path must not contain null bytes' });

export type EntryPath = z.infer<typeof EntryPathSchema>;

// ============================================
// Issue Formatting
// ============================================

/**
 * Format zod issues as `path: message` strings for error reports.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${where}: ${issue.message}`;
  });
}
