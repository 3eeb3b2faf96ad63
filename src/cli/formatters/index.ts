/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

export { formatStatusReport } from './status.js';
export { formatDuration, formatReproSummary, type StageOutcome } from './summary.js';
