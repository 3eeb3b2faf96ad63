/**
 * Reproduction Summary Formatter
 *
 * One line per stage processed by `repro`/`run`, plus a totals line.
 *
 * @module cli/formatters/summary
 */

import chalk from 'chalk';

/**
 * What happened to one stage.
 */
export interface StageOutcome {
  /** Stage file path relative to the project root */
  relpath: string;
  reproduced: boolean;
  durationMs: number;
}

/**
 * Format milliseconds as a human-readable duration.
 *
 * @example
 * ```typescript
 * formatDuration(450);   // '450ms'
 * formatDuration(1500);  // '1.5s'
 * formatDuration(65000); // '1m 5s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format the outcome of a reproduction run.
 */
export function formatReproSummary(outcomes: StageOutcome[]): string[] {
  const lines = outcomes.map((outcome) => {
    if (!outcome.reproduced) {
      return `${chalk.dim('-')} ${outcome.relpath} ${chalk.dim("didn't change")}`;
    }
    return `${chalk.green('+')} ${outcome.relpath} ${chalk.dim(`(${formatDuration(outcome.durationMs)})`)}`;
  });

  const reproduced = outcomes.filter((outcome) => outcome.reproduced).length;
  const total = outcomes.length;
  lines.push(`${reproduced} of ${total} stage${total === 1 ? '' : 's'} reproduced`);
  return lines;
}
