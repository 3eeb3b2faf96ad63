/**
 * Pipeline Core
 *
 * Stages, their loader, the shared context contract and error types.
 *
 * @module pipeline
 */

// Type definitions
export type {
  Logger,
  StageContext,
  StageState,
  ReproduceOptions,
  EntryStatus,
  StageSignal,
  StageStatus,
} from './types.js';

// Errors
export {
  ReproError,
  ConfigurationError,
  StageFileFormatError,
  StageCmdFailedError,
  StageCancelledError,
  MissingDataSourceError,
  EntryNotFoundError,
  EntryRemoveError,
  CacheMissError,
  BackendCommandError,
} from './errors.js';

// Stage
export { Stage, type StageInit } from './stage.js';

// Loading
export { load, loadd, loads, validateStageRecord, type LoadsOptions } from './loader.js';
