#!/usr/bin/env node
/**
 * Executable entry point for the `repro` command.
 *
 * @module cli/bin
 */

import { EXIT_CODES } from './base-command.js';
import { main } from './index.js';

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERROR);
});
