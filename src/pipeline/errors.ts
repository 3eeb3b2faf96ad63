/**
 * Pipeline Error Types
 *
 * Every fatal condition raised by the stage core is a distinct subclass of
 * `ReproError`, so callers can tell a malformed stage file from a failed
 * command or a missing cache location. Drift ("this stage changed") is never
 * reported through these types.
 *
 * @module pipeline/errors
 */

/**
 * Base class for all reprokit errors.
 */
export class ReproError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReproError';
  }
}

/**
 * Invalid or incomplete configuration.
 *
 * Raised at construction time, e.g. when an output asks for caching but no
 * cache is configured for its backend scheme.
 */
export class ConfigurationError extends ReproError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A stage descriptor failed structural validation.
 */
export class StageFileFormatError extends ReproError {
  constructor(
    public readonly filePath: string | null,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    const where = filePath ? ` in '${filePath}'` : '';
    const detail = issues.length > 0 ? `: ${issues.join('; ')}` : '';
    super(`Stage file format error${where}${detail}`, options);
    this.name = 'StageFileFormatError';
  }
}

/**
 * A stage's command exited with a non-zero status.
 */
export class StageCmdFailedError extends ReproError {
  constructor(
    public readonly stagePath: string,
    public readonly cmd: string,
    public readonly exitCode: number
  ) {
    super(`Stage '${stagePath}' cmd ${cmd} failed (exit code ${exitCode})`);
    this.name = 'StageCmdFailedError';
  }
}

/**
 * Reproduction was aborted while the stage's command was running.
 */
export class StageCancelledError extends ReproError {
  constructor(
    public readonly stagePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Stage '${stagePath}' was cancelled`, options);
    this.name = 'StageCancelledError';
  }
}

/**
 * A data-source stage declares outputs that are not present.
 */
export class MissingDataSourceError extends ReproError {
  constructor(public readonly missingPaths: string[]) {
    const source = missingPaths.length > 1 ? 'sources' : 'source';
    super(`missing data ${source}: ${missingPaths.join(', ')}`);
    this.name = 'MissingDataSourceError';
  }
}

/**
 * An entry was saved while its path does not exist.
 */
export class EntryNotFoundError extends ReproError {
  constructor(
    public readonly entryPath: string,
    public readonly role: 'dependency' | 'output'
  ) {
    super(`${role === 'output' ? 'Output' : 'Dependency'} '${entryPath}' does not exist`);
    this.name = 'EntryNotFoundError';
  }
}

/**
 * Removing an entry's content failed.
 */
export class EntryRemoveError extends ReproError {
  constructor(
    public readonly entryPath: string,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to remove '${entryPath}'${reason}`, options);
    this.name = 'EntryRemoveError';
  }
}

/**
 * The requested fingerprint is not present in the cache.
 */
export class CacheMissError extends ReproError {
  constructor(
    public readonly entryPath: string,
    public readonly fingerprint: Readonly<Record<string, string>>
  ) {
    const key = Object.values(fingerprint).join(',') || '<empty>';
    super(`Cache entry '${key}' for '${entryPath}' not found`);
    this.name = 'CacheMissError';
  }
}

/**
 * A backend's command line tool exited unsuccessfully.
 */
export class BackendCommandError extends ReproError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
    super(`Backend command '${command}' failed with exit code ${exitCode}${detail}`);
    this.name = 'BackendCommandError';
  }
}
