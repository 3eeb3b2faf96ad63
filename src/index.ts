/**
 * reprokit
 *
 * Reproducible pipeline stages: change detection over dependencies and
 * outputs, command re-execution, and content-addressed output caching on
 * local, object-store, hdfs and networked-filesystem backends.
 *
 * @module reprokit
 */

export * from './pipeline/index.js';
export * from './entries/index.js';
export * from './backends/index.js';
export * from './schemas/index.js';
export * from './storage/index.js';
export {
  ShellExecutor,
  buildCommand,
  quoteArg,
  type ExecResult,
  type ExecutionContext,
  type ProcessExecutor,
  type RunOptions,
} from './process/executor.js';
export { loadConfig, parseMounts, type Config } from './config/index.js';
export {
  openWorkspace,
  createRegistry,
  resolveSettings,
  DEFAULT_SHELL,
  type OpenWorkspaceOptions,
  type WorkspaceSettings,
} from './workspace/index.js';
