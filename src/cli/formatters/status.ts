/**
 * Status Formatter
 *
 * Renders the drift report returned by `Stage.status()`:
 *
 * ```
 * model.bin.repro:
 *     changed deps:
 *         modified:     data/train.csv
 *     changed outs:
 *         deleted:      model.bin
 *         not in cache: metrics.json
 *     changed checksum
 * ```
 *
 * @module cli/formatters/status
 */

import chalk from 'chalk';
import type { EntryStatus, StageStatus } from '../../pipeline/types.js';

const INDENT = '    ';

/** Wide enough for the longest label, `not in cache:`, plus a space */
const LABEL_WIDTH = 14;

const STAGE_SIGNAL_LABELS: Record<NonNullable<StageStatus['stage']>, string> = {
  callback: 'always changed (command without dependencies)',
  'changed checksum': 'changed checksum',
};

function colorFor(status: EntryStatus): (text: string) => string {
  switch (status) {
    case 'deleted':
      return chalk.red;
    case 'new':
      return chalk.green;
    case 'modified':
      return chalk.yellow;
    case 'not in cache':
      return chalk.magenta;
  }
}

function formatEntries(title: string, entries: Record<string, EntryStatus>): string[] {
  const lines = [`${INDENT}${title}:`];
  for (const [entryPath, status] of Object.entries(entries)) {
    const label = `${status}:`.padEnd(LABEL_WIDTH);
    lines.push(`${INDENT}${INDENT}${colorFor(status)(label)}${entryPath}`);
  }
  return lines;
}

/**
 * Format a merged status report, one block per stage.
 *
 * @returns Output lines; empty when every stage is up to date
 */
export function formatStatusReport(report: Record<string, StageStatus>): string[] {
  const lines: string[] = [];

  for (const [stagePath, status] of Object.entries(report)) {
    lines.push(chalk.bold(`${stagePath}:`));
    if (status.deps) {
      lines.push(...formatEntries('changed deps', status.deps));
    }
    if (status.outs) {
      lines.push(...formatEntries('changed outs', status.outs));
    }
    if (status.stage) {
      lines.push(`${INDENT}${chalk.dim(STAGE_SIGNAL_LABELS[status.stage])}`);
    }
  }

  return lines;
}
