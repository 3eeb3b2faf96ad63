/**
 * Process Executor
 *
 * Runs a stage command through a shell. Everything the child sees (working
 * directory, environment, shell binary, cancellation signal) is passed in
 * explicitly, so reproduction can be driven by a fake executor in tests.
 *
 * @module process/executor
 */

import { spawn } from 'node:child_process';

// ============================================================================
// Types
// ============================================================================

/**
 * Where and how a command runs.
 */
export interface ExecutionContext {
  /** Working directory for the command */
  cwd: string;
  /** Environment passed to the child process */
  env: Record<string, string | undefined>;
  /** Shell binary used to interpret the command */
  shell: string;
  /** Aborting this signal kills the child process */
  signal?: AbortSignal;
}

/**
 * Options for a single run.
 */
export interface RunOptions {
  /** Pipe and collect stdout/stderr instead of inheriting the parent's streams */
  capture?: boolean;
}

/**
 * Outcome of a finished process.
 */
export interface ExecResult {
  /** Exit code (a signal-terminated child reports 128 + signal number, or 1) */
  exitCode: number;
  /** Captured standard output (empty unless capturing) */
  stdout: string;
  /** Captured standard error (empty unless capturing) */
  stderr: string;
}

/**
 * Runs commands to completion.
 */
export interface ProcessExecutor {
  run(command: string, context: ExecutionContext, options?: RunOptions): Promise<ExecResult>;
}

// ============================================================================
// Signals
// ============================================================================

const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGTERM: 15,
};

function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null && signal in SIGNAL_NUMBERS) {
    return 128 + SIGNAL_NUMBERS[signal];
  }
  return 1;
}

// ============================================================================
// Shell Executor
// ============================================================================

/**
 * Executor backed by `child_process.spawn` with a shell.
 *
 * @example
 * ```typescript
 * const executor = new ShellExecutor();
 * const result = await executor.run('./generate.sh', {
 *   cwd: '/work/project',
 *   env: process.env,
 *   shell: '/bin/bash',
 * });
 * // result.exitCode === 0 on success
 * ```
 */
export class ShellExecutor implements ProcessExecutor {
  run(command: string, context: ExecutionContext, options: RunOptions = {}): Promise<ExecResult> {
    const capture = options.capture === true;

    return new Promise<ExecResult>((resolve, reject) => {
      const child = spawn(command, {
        cwd: context.cwd,
        env: context.env,
        shell: context.shell,
        stdio: capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
        signal: context.signal,
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.once('error', reject);
      child.once('close', (code, signal) => {
        resolve({ exitCode: exitCodeFor(code, signal), stdout, stderr });
      });
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Quote one argument for a POSIX shell.
 *
 * @example
 * ```typescript
 * quoteArg("it's");
 * // Returns: "'it'\\''s'"
 * ```
 */
export function quoteArg(arg: string): string {
  if (/^[A-Za-z0-9_\-./:=@%+,]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Build a shell command line from a program and its arguments.
 */
export function buildCommand(program: string, args: string[]): string {
  return [program, ...args].map(quoteArg).join(' ');
}
