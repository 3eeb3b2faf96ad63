/**
 * Storage Layer
 *
 * File-based persistence for stage files and project config.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  STAGE_FILE,
  STAGE_FILE_SUFFIX,
  REPRO_DIR,
  getReproDir,
  getDefaultCacheDir,
  getProjectConfigPath,
  isStageFileName,
  isStageFile,
  defaultStageFileName,
  findStageFiles,
} from './paths.js';

// Atomic operations
export { atomicWriteFile, atomicWriteJson, fileExists } from './atomic.js';

// Stage files
export { readStageFile, writeStageFile, renderStageRecord } from './stages.js';

// Project config
export { loadProjectConfig, saveProjectConfig } from './config.js';
