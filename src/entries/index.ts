/**
 * Dependency and Output Entries
 *
 * @module entries
 */

export { Entry, type EntryRole, type EntryInit } from './entry.js';
export {
  createEntry,
  createEntries,
  loadDependencies,
  loadOutputs,
  resolveEntryPath,
  fingerprintFromRecord,
  type EntryFactoryContext,
  type CreateEntryOptions,
} from './factory.js';
