/**
 * Pipeline Type Definitions
 *
 * Contracts between a stage, its entries and the collaborators it is given:
 * logger, backend registry, process executor and execution settings.
 *
 * @module pipeline/types
 */

import type { BackendRegistry } from '../backends/registry.js';
import type { ProcessExecutor } from '../process/executor.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for the stage core.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Everything a stage needs from its surroundings.
 *
 * Built by `openWorkspace()` for real projects, or by hand in tests.
 */
export interface StageContext {
  /** Workspace root; stage paths are reported relative to it */
  root: string;

  /** Logger for state transitions and decisions */
  logger: Logger;

  /** Remotes and caches by storage scheme */
  registry: BackendRegistry;

  /** Runs stage commands */
  executor: ProcessExecutor;

  /** Shell binary used to interpret stage commands */
  shell: string;

  /** Environment passed to stage commands */
  env: Record<string, string | undefined>;
}

// ============================================================================
// Reproduction State
// ============================================================================

/**
 * States of the reproduction state machine.
 *
 * ```
 * unchanged                                     (terminal, no-op)
 * changed -> outputs-cleared -> executing -> succeeded | failed
 * changed -> verifying -> succeeded | failed    (data-source stages)
 * ```
 */
export type StageState =
  | 'unchanged'
  | 'changed'
  | 'outputs-cleared'
  | 'executing'
  | 'verifying'
  | 'succeeded'
  | 'failed';

/**
 * Options for `Stage.reproduce()`.
 */
export interface ReproduceOptions {
  /** Reproduce even when nothing changed */
  force?: boolean;
  /** Aborting kills the running command; the stage is not saved */
  signal?: AbortSignal;
}

// ============================================================================
// Status Reports
// ============================================================================

/**
 * How a single entry drifted from its recorded fingerprint.
 */
export type EntryStatus = 'deleted' | 'new' | 'modified' | 'not in cache';

/**
 * Stage-level drift signal.
 */
export type StageSignal = 'callback' | 'changed checksum';

/**
 * Drift report for one stage.
 */
export interface StageStatus {
  /** Changed dependencies by declared path */
  deps?: Record<string, EntryStatus>;
  /** Changed outputs by declared path */
  outs?: Record<string, EntryStatus>;
  /** Stage-level signal, when the stage itself is considered changed */
  stage?: StageSignal;
}
