export { detectConflicts, matchesPattern } from './detector.js';
export { hasBlocking, blockingEntries } from './types.js';
export type { ConflictEntry, ConflictReport, ConflictSeverity } from './types.js';
export { ConflictError } from './conflict-error.js';
