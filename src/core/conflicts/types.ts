import type { Attribution } from '../analyzer/types.js';
import type { ConflictPatternKind } from '../store/types.js';

export type ConflictSeverity = 'blocking' | 'warning';

export interface ConflictEntry {
  /** Pattern that matched (or the target path for occupied-target entries) */
  pattern: string;
  patternKind: ConflictPatternKind;
  matchedPath: string;
  matchedSymbol?: string;
  severity: ConflictSeverity;
  attribution: Attribution;
  reason: string;
}

export interface ConflictReport {
  generatorId: string;
  entries: readonly ConflictEntry[];
}

export function hasBlocking(report: ConflictReport): boolean {
  return report.entries.some((entry) => entry.severity === 'blocking');
}

export function blockingEntries(report: ConflictReport): ConflictEntry[] {
  return report.entries.filter((entry) => entry.severity === 'blocking');
}
