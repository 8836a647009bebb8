/**
 * Tests for the Conflict Detector.
 */
import { describe, it, expect } from 'vitest';
import { detectConflicts, matchesPattern } from '../../../../src/core/conflicts/detector.js';
import { ConflictError } from '../../../../src/core/conflicts/conflict-error.js';
import { hasBlocking, blockingEntries } from '../../../../src/core/conflicts/types.js';
import { fileEntry, makeDefinition, makeProfile, symbolEntry } from '../../../helpers/project.js';

const GENERATED = { kind: 'generated', generatorId: 'analytics-setup' } as const;

const definition = makeDefinition({
  id: 'analytics-setup',
  conflicts: [
    { kind: 'symbol', pattern: 'AnalyticsService' },
    { kind: 'symbol', pattern: '*Analytics' },
    { kind: 'file', pattern: '*Analytics*.swift' },
  ],
});

describe('matchesPattern', () => {
  it('should match symbol globs against symbol entries only', () => {
    expect(matchesPattern({ kind: 'symbol', pattern: '*Analytics' }, symbolEntry('MixpanelAnalytics', 'A.swift'))).toBe(true);
    expect(matchesPattern({ kind: 'symbol', pattern: '*Analytics' }, symbolEntry('AnalyticsEvent', 'A.swift'))).toBe(false);
    expect(matchesPattern({ kind: 'symbol', pattern: '*Analytics*' }, fileEntry('App/Analytics.swift'))).toBe(false);
  });

  it('should match file globs against any directory depth', () => {
    expect(matchesPattern({ kind: 'file', pattern: '*Analytics*.swift' }, fileEntry('App/Core/MyAnalytics.swift'))).toBe(true);
    expect(matchesPattern({ kind: 'file', pattern: 'App/*.swift' }, fileEntry('App/Main.swift'))).toBe(true);
    expect(matchesPattern({ kind: 'file', pattern: 'App/*.swift' }, fileEntry('Other/App/Main.swift'))).toBe(false);
  });
});

describe('detectConflicts', () => {
  it('should report nothing for an empty index', () => {
    expect(detectConflicts(definition, makeProfile())).toEqual({ generatorId: 'analytics-setup', entries: [] });
  });

  it('should report nothing for unrelated symbols', () => {
    const profile = makeProfile({
      symbols: [fileEntry('App/ContentView.swift'), symbolEntry('ContentView', 'App/ContentView.swift'), symbolEntry('AnalyticsEvent', 'App/Events.swift')],
    });

    expect(detectConflicts(definition, profile).entries).toEqual([]);
  });

  it('should block on hand-written matches', () => {
    const profile = makeProfile({
      symbols: [
        fileEntry('App/AnalyticsService.swift'),
        symbolEntry('AnalyticsService', 'App/AnalyticsService.swift', { symbolKind: 'protocol' }),
      ],
    });

    const report = detectConflicts(definition, profile);

    expect(report.entries).toEqual([
      {
        pattern: '*Analytics*.swift',
        patternKind: 'file',
        matchedPath: 'App/AnalyticsService.swift',
        matchedSymbol: undefined,
        severity: 'blocking',
        attribution: { kind: 'foreign' },
        reason: 'hand-written file occupies this path',
      },
      {
        pattern: 'AnalyticsService',
        patternKind: 'symbol',
        matchedPath: 'App/AnalyticsService.swift',
        matchedSymbol: 'AnalyticsService',
        severity: 'blocking',
        attribution: { kind: 'foreign' },
        reason: 'hand-written protocol occupies this name',
      },
    ]);
    expect(hasBlocking(report)).toBe(true);
  });

  it('should only warn about files this engine generated', () => {
    const profile = makeProfile({
      symbols: [
        fileEntry('Generated/NoOpAnalytics.swift', { attribution: GENERATED }),
        symbolEntry('NoOpAnalytics', 'Generated/NoOpAnalytics.swift', { attribution: GENERATED }),
      ],
    });

    const report = detectConflicts(definition, profile);

    expect(report.entries.map((entry) => [entry.severity, entry.reason])).toEqual([
      ['warning', "previously generated by 'analytics-setup'"],
      ['warning', "previously generated by 'analytics-setup'"],
    ]);
    expect(hasBlocking(report)).toBe(false);
  });

  it('should only warn about low-confidence matches', () => {
    const profile = makeProfile({
      symbols: [symbolEntry('AnalyticsService', 'App/Extensions.swift', { symbolKind: 'extension', confidence: 0.4 })],
    });

    expect(detectConflicts(definition, profile).entries[0]).toMatchObject({
      severity: 'warning',
      reason: 'low-confidence match (extension)',
    });
  });

  it('should honour a custom confidence threshold', () => {
    const profile = makeProfile({
      symbols: [symbolEntry('AnalyticsService', 'App/Extensions.swift', { symbolKind: 'extension', confidence: 0.4 })],
    });

    expect(detectConflicts(definition, profile, { min_symbol_confidence: 0.3 }).entries[0].severity).toBe('blocking');
  });

  it('should report each path and symbol once', () => {
    const profile = makeProfile({ symbols: [symbolEntry('AnalyticsService', 'App/A.swift')] });
    const twoPatterns = makeDefinition({
      conflicts: [
        { kind: 'symbol', pattern: 'AnalyticsService' },
        { kind: 'symbol', pattern: 'Analytics*' },
      ],
    });

    const report = detectConflicts(twoPatterns, profile);

    expect(report.entries).toHaveLength(1);
    expect(report.entries[0].pattern).toBe('AnalyticsService');
  });

  it('should sort entries by path, symbol and pattern', () => {
    const profile = makeProfile({
      symbols: [symbolEntry('ZetaAnalytics', 'B.swift'), symbolEntry('AlphaAnalytics', 'B.swift'), symbolEntry('MyAnalytics', 'A.swift')],
    });

    const report = detectConflicts(definition, profile);

    expect(report.entries.map((entry) => `${entry.matchedPath}:${entry.matchedSymbol ?? ''}`)).toEqual([
      'A.swift:MyAnalytics',
      'B.swift:AlphaAnalytics',
      'B.swift:ZetaAnalytics',
    ]);
  });
});

describe('ConflictError', () => {
  it('should list the blocking items', () => {
    const profile = makeProfile({
      symbols: [
        fileEntry('App/AnalyticsService.swift'),
        symbolEntry('AnalyticsService', 'App/AnalyticsService.swift', { symbolKind: 'protocol' }),
        symbolEntry('NoOpAnalytics', 'Generated/NoOpAnalytics.swift', { attribution: GENERATED }),
      ],
    });
    const report = detectConflicts(definition, profile);

    const error = new ConflictError(report);

    expect(blockingEntries(report)).toHaveLength(2);
    expect(error.code).toBe('CON001');
    expect(error.name).toBe('ConflictError');
    expect(error.message).toBe(
      "Generator 'analytics-setup' conflicts with 2 existing items: App/AnalyticsService.swift, AnalyticsService (App/AnalyticsService.swift)"
    );
    expect(error.report).toBe(report);
  });
});
