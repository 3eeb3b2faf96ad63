/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the stage file and project config schemas.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  FingerprintValueSchema,
  EntryPathSchema,
  formatIssues,
  type EntryPath,
} from './common.js';

// ============================================================================
// Stage Files
// ============================================================================

export {
  DependencyRecordSchema,
  OutputRecordSchema,
  type DependencyRecord,
  type OutputRecord,
  type EntryRecord,
} from './entry.js';

export { STAGE_KEYS, StageRecordSchema, type StageRecord } from './stage.js';

// ============================================================================
// Project Config
// ============================================================================

export {
  CacheLocationsSchema,
  ProjectConfigSchema,
  DEFAULT_PROJECT_CONFIG,
  type CacheLocations,
  type ProjectConfig,
} from './project-config.js';
