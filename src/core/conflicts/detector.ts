/**
 * Conflict Detector - cross-references a generator's conflict patterns with
 * the profile's symbol index.
 *
 * Matches against files this engine generated are warnings (safe to
 * regenerate); matches against anything else are blocking.
 */
import { minimatch } from 'minimatch';
import type { ConflictEntry, ConflictReport, ConflictSeverity } from './types.js';
import type { IndexEntry, ProjectProfile } from '../analyzer/types.js';
import type { ConflictPattern, GeneratorDefinition } from '../store/types.js';
import { getDefaultConfig, type ConflictSettings } from '../config/index.js';

export function detectConflicts(
  definition: GeneratorDefinition,
  profile: ProjectProfile,
  settings: ConflictSettings = getDefaultConfig().conflicts
): ConflictReport {
  const entries = new Map<string, ConflictEntry>();

  for (const pattern of definition.conflicts) {
    for (const indexed of profile.symbols) {
      if (!matchesPattern(pattern, indexed)) continue;

      const entry: ConflictEntry = {
        pattern: pattern.pattern,
        patternKind: pattern.kind,
        matchedPath: indexed.path,
        matchedSymbol: indexed.kind === 'symbol' ? indexed.name : undefined,
        severity: severityFor(indexed, settings),
        attribution: indexed.attribution,
        reason: reasonFor(indexed, settings),
      };
      const key = `${entry.matchedPath}\u0000${entry.matchedSymbol ?? ''}`;
      const existing = entries.get(key);
      // Keep the most severe match per path/symbol
      if (!existing || (existing.severity === 'warning' && entry.severity === 'blocking')) {
        entries.set(key, entry);
      }
    }
  }

  return {
    generatorId: definition.id,
    entries: [...entries.values()].sort(compareEntries),
  };
}

export function matchesPattern(pattern: ConflictPattern, indexed: IndexEntry): boolean {
  if (pattern.kind === 'symbol') {
    return indexed.kind === 'symbol' && minimatch(indexed.name, pattern.pattern);
  }
  return indexed.kind === 'file' && minimatch(indexed.path, pattern.pattern, { matchBase: true, dot: true });
}

function severityFor(indexed: IndexEntry, settings: ConflictSettings): ConflictSeverity {
  if (indexed.attribution.kind === 'generated') return 'warning';
  return indexed.confidence < settings.min_symbol_confidence ? 'warning' : 'blocking';
}

function reasonFor(indexed: IndexEntry, settings: ConflictSettings): string {
  if (indexed.attribution.kind === 'generated') {
    return `previously generated by '${indexed.attribution.generatorId}'`;
  }
  if (indexed.confidence < settings.min_symbol_confidence) {
    return `low-confidence match (${indexed.symbolKind ?? indexed.kind})`;
  }
  return indexed.kind === 'symbol'
    ? `hand-written ${indexed.symbolKind ?? 'symbol'} occupies this name`
    : 'hand-written file occupies this path';
}

function compareEntries(a: ConflictEntry, b: ConflictEntry): number {
  return (
    a.matchedPath.localeCompare(b.matchedPath) ||
    (a.matchedSymbol ?? '').localeCompare(b.matchedSymbol ?? '') ||
    a.pattern.localeCompare(b.pattern)
  );
}
