/**
 * Stage
 *
 * A reproducible unit of work: an optional shell command, the dependencies it
 * reads and the outputs it produces, plus an aggregate fingerprint of the
 * stage record as last saved.
 *
 * Key behaviors:
 * - `changed()` checks callback status, every entry, and the aggregate
 *   fingerprint, logging each reason it finds
 * - `reproduce()` clears outputs, runs the command, saves entries and writes
 *   the stage file, strictly in that order
 * - data-source stages (no command) only verify their outputs exist
 * - `checkout()` restores cached outputs without running anything
 *
 * @module pipeline/stage
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Entry } from '../entries/entry.js';
import type { EntryFactoryContext } from '../entries/factory.js';
import type { ExecResult } from '../process/executor.js';
import { STAGE_KEYS, type StageRecord } from '../schemas/stage.js';
import { writeStageFile } from '../storage/stages.js';
import { dictMd5 } from '../utils/hash.js';
import {
  MissingDataSourceError,
  StageCancelledError,
  StageCmdFailedError,
} from './errors.js';
import type {
  EntryStatus,
  ReproduceOptions,
  StageContext,
  StageState,
  StageStatus,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Constructor arguments for a stage.
 */
export interface StageInit {
  /** Absolute path of the stage file */
  path: string;
  /** Working directory for the command (the stage file's directory) */
  cwd: string;
  /** Command text; null for data-source stages */
  cmd?: string | null;
  deps?: Entry[];
  outs?: Entry[];
  /** Aggregate fingerprint as last saved */
  md5?: string | null;
}

// ============================================================================
// Stage
// ============================================================================

/**
 * @example
 * ```typescript
 * const stage = await load(context, 'model.bin.repro');
 * if (await stage.changed()) {
 *   await stage.reproduce();
 * }
 * ```
 */
export class Stage {
  readonly context: StageContext;
  readonly path: string;
  readonly cwd: string;
  readonly cmd: string | null;
  deps: Entry[];
  outs: Entry[];
  md5: string | null;

  /** Last state entered by `reproduce()`; null before the first call */
  state: StageState | null = null;

  constructor(context: StageContext, init: StageInit) {
    this.context = context;
    this.path = init.path;
    this.cwd = init.cwd;
    this.cmd = init.cmd ?? null;
    this.deps = init.deps ?? [];
    this.outs = init.outs ?? [];
    this.md5 = init.md5 ?? null;
  }

  /** Stage file path relative to the workspace root */
  get relpath(): string {
    return path.relative(this.context.root, this.path) || path.basename(this.path);
  }

  /** A stage without a command only tracks pre-existing data */
  get isDataSource(): boolean {
    return this.cmd === null;
  }

  /** A command without dependencies: nothing can prove it is up to date */
  get isCallback(): boolean {
    return !this.isDataSource && this.deps.length === 0;
  }

  /** Context for building entries that belong to this stage */
  get entryContext(): EntryFactoryContext {
    return {
      cwd: this.cwd,
      registry: this.context.registry,
      logger: this.context.logger,
    };
  }

  // ==========================================================================
  // Change Detection
  // ==========================================================================

  /**
   * Whether the recomputed aggregate fingerprint differs from the stored one.
   *
   * A stage without a stored fingerprint is not considered changed by this
   * check (stage files written before aggregate fingerprints existed).
   */
  changedMd5(): boolean {
    if (this.md5 === null) {
      return false;
    }

    const actual = this.computeMd5();
    if (this.md5 === actual) {
      return false;
    }

    this.context.logger.debug(
      `Stage file '${this.relpath}' checksum changed (expected '${this.md5}', actual '${actual}')`
    );
    return true;
  }

  /**
   * Whether the stage needs to be reproduced.
   *
   * Every category is evaluated so the debug log lists all reasons.
   */
  async changed(): Promise<boolean> {
    const reasons: string[] = [];

    if (this.isCallback) {
      this.context.logger.debug(`Stage '${this.relpath}' has a command but no dependencies`);
      reasons.push('callback');
    }

    let entriesChanged = false;
    for (const entry of [...this.deps, ...this.outs]) {
      if (await entry.changed()) {
        entriesChanged = true;
      }
    }
    if (entriesChanged) {
      reasons.push('entries');
    }

    if (this.changedMd5()) {
      reasons.push('checksum');
    }

    if (reasons.length > 0) {
      this.context.logger.debug(`Stage '${this.relpath}' changed (${reasons.join(', ')})`);
      return true;
    }

    this.context.logger.debug(`Stage '${this.relpath}' didn't change`);
    return false;
  }

  // ==========================================================================
  // Reproduction
  // ==========================================================================

  /**
   * Re-run the stage when it changed (or when forced).
   *
   * @returns The stage when it was reproduced, null when nothing changed
   * @throws StageCmdFailedError when the command exits non-zero
   * @throws StageCancelledError when `signal` aborts the command
   * @throws MissingDataSourceError when a data-source stage lacks outputs
   */
  async reproduce(options: ReproduceOptions = {}): Promise<Stage | null> {
    if (!(await this.changed()) && !options.force) {
      this.transition('unchanged');
      return null;
    }

    this.transition('changed');

    try {
      if (!this.isDataSource) {
        // Outputs are only cleared when there is a command to recreate them
        await this.removeOuts(false);
        this.transition('outputs-cleared');
      }
      await this.run(options.signal);
    } catch (error) {
      this.transition('failed');
      throw error;
    }

    return this;
  }

  private async run(signal?: AbortSignal): Promise<void> {
    const { logger } = this.context;

    if (this.cmd !== null) {
      logger.info(`Reproducing '${this.relpath}':\n\t${this.cmd}`);
      this.transition('executing');

      const result = await this.execute(this.cmd, signal);
      if (result.exitCode !== 0) {
        throw new StageCmdFailedError(this.relpath, this.cmd, result.exitCode);
      }
    } else {
      logger.info(`Verifying data sources in '${this.relpath}'`);
      this.transition('verifying');
      await this.checkMissingOutputs();
    }

    await this.save();
    await this.dump();
    this.transition('succeeded');
    logger.debug(`'${this.relpath}' was reproduced`);
  }

  private async execute(cmd: string, signal?: AbortSignal): Promise<ExecResult> {
    if (signal?.aborted) {
      throw new StageCancelledError(this.relpath, { cause: signal.reason });
    }
    try {
      return await this.context.executor.run(cmd, {
        cwd: this.cwd,
        env: this.context.env,
        shell: this.context.shell,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new StageCancelledError(this.relpath, { cause: error });
      }
      throw error;
    }
  }

  /**
   * @throws MissingDataSourceError listing every output that does not exist
   */
  async checkMissingOutputs(): Promise<void> {
    const missing: string[] = [];
    for (const out of this.outs) {
      if (!(await out.exists())) {
        missing.push(out.declaredPath);
      }
    }
    if (missing.length > 0) {
      throw new MissingDataSourceError(missing);
    }
  }

  /**
   * Refresh every entry's fingerprint (caching outputs) and the aggregate
   * fingerprint.
   */
  async save(): Promise<void> {
    for (const dep of this.deps) {
      await dep.save();
    }
    for (const out of this.outs) {
      await out.save();
    }
    this.md5 = this.computeMd5();
  }

  /**
   * Restore cached outputs from their recorded fingerprints.
   */
  async checkout(): Promise<void> {
    this.context.logger.debug(`Checking out outputs of '${this.relpath}'`);
    for (const out of this.outs) {
      await out.checkout();
    }
  }

  // ==========================================================================
  // Removal
  // ==========================================================================

  async removeOuts(ignoreRemove = false): Promise<void> {
    for (const out of this.outs) {
      await out.remove(ignoreRemove);
    }
  }

  /**
   * Remove the outputs (best effort) and delete the stage file.
   */
  async remove(): Promise<void> {
    await this.removeOuts(true);
    await fs.unlink(this.path);
    this.context.logger.debug(`Removed stage file '${this.relpath}'`);
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  /**
   * Drift report keyed by the stage's relative path; `{}` when nothing changed.
   */
  async status(): Promise<Record<string, StageStatus>> {
    const status: StageStatus = {};

    const deps = await collectStatus(this.deps);
    if (Object.keys(deps).length > 0) {
      status.deps = deps;
    }
    const outs = await collectStatus(this.outs);
    if (Object.keys(outs).length > 0) {
      status.outs = outs;
    }

    if (this.isCallback) {
      status.stage = 'callback';
    } else if (this.changedMd5()) {
      status.stage = 'changed checksum';
    }

    return Object.keys(status).length > 0 ? { [this.relpath]: status } : {};
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  /**
   * The stage record without its aggregate fingerprint.
   */
  private dumpBody(): StageRecord {
    const record: StageRecord = {};
    if (this.cmd !== null) {
      record[STAGE_KEYS.CMD] = this.cmd;
    }
    if (this.deps.length > 0) {
      record[STAGE_KEYS.DEPS] = this.deps.map((dep) => dep.dumpd());
    }
    if (this.outs.length > 0) {
      record[STAGE_KEYS.OUTS] = this.outs.map((out) => out.dumpd());
    }
    return record;
  }

  /**
   * Aggregate fingerprint of the current command, dependencies and outputs.
   */
  computeMd5(): string {
    return dictMd5(this.dumpBody());
  }

  /**
   * Stage record including a freshly computed aggregate fingerprint.
   */
  dumpd(): StageRecord {
    const record = this.dumpBody();
    record[STAGE_KEYS.MD5] = dictMd5(record);
    return record;
  }

  /**
   * Write the stage file (defaults to the stage's own path).
   */
  async dump(fname?: string): Promise<void> {
    const target = fname ? path.resolve(this.cwd, fname) : this.path;
    await writeStageFile(target, this.dumpd());
  }

  private transition(state: StageState): void {
    this.state = state;
    this.context.logger.debug(`Stage '${this.relpath}' -> ${state}`);
  }
}

async function collectStatus(entries: Entry[]): Promise<Record<string, EntryStatus>> {
  const merged: Record<string, EntryStatus> = {};
  for (const entry of entries) {
    Object.assign(merged, await entry.status());
  }
  return merged;
}
