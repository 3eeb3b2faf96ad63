/**
 * Schema Version Registry
 *
 * Persisted JSON documents carry a schemaVersion field. Stage files do not:
 * their format is fixed by the keys in `schemas/stage.ts`.
 */

/**
 * Current schema versions for versioned documents.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Project configuration (.repro/config.json) */
  projectConfig: 1,
} as const;
