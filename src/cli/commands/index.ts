/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - run: Define and run a stage
 * - repro: Reproduce changed stages
 * - status: Show drift
 * - checkout: Restore outputs from the cache
 * - remove: Remove outputs and stage files
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCheckoutCommand } from './checkout.js';
import { registerRemoveCommand } from './remove.js';
import { registerReproCommand } from './repro.js';
import { registerRunCommand } from './run.js';
import { registerStatusCommand } from './status.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerReproCommand(program);
  registerStatusCommand(program);
  registerCheckoutCommand(program);
  registerRemoveCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'run [command...]', description: 'Define a stage, run it and write its stage file' },
    { name: 'repro [targets...]', description: 'Reproduce changed stages' },
    { name: 'status [targets...]', description: 'Show changed dependencies, outputs and stage files' },
    { name: 'checkout [targets...]', description: 'Restore outputs from the cache' },
    { name: 'remove <targets...>', description: 'Remove stage outputs and stage files' },
  ];
}

export { handleRun, type RunCommandOptions } from './run.js';
export { handleRepro, type ReproCommandOptions } from './repro.js';
export { handleStatus, type StatusCommandOptions } from './status.js';
export { handleCheckout } from './checkout.js';
export { handleRemove, type RemoveCommandOptions } from './remove.js';
