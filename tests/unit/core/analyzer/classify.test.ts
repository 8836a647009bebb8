/**
 * Tests for turning evidence into detected fields.
 */
import { describe, it, expect } from 'vitest';
import { classify, collectEvidence, compareVersions, ambiguousChoices } from '../../../../src/core/analyzer/analyzer.js';
import { ARCHITECTURE_RULES } from '../../../../src/core/analyzer/rules.js';
import type { ArchitectureConvention, Evidence } from '../../../../src/core/analyzer/types.js';

const settings = { min_confidence: 0.3, ambiguity_margin: 0.15 };
const order: ArchitectureConvention[] = ['mvvm', 'tca', 'mvc', 'viper', 'clean'];

function evidence(entries: Array<[ArchitectureConvention, number]>): Map<ArchitectureConvention, Evidence[]> {
  return new Map(entries.map(([value, weight]) => [value, [{ rule: `${value}-rule`, path: 'A.swift', weight }]]));
}

describe('classify', () => {
  it('should pick a clear winner', () => {
    const field = classify(evidence([['mvvm', 0.6], ['tca', 0.3]]), order, 'unstructured', settings);

    expect(field.value).toBe('mvvm');
    expect(field.confidence).toBe(0.6);
    expect(field.candidates.map((candidate) => candidate.value)).toEqual(['mvvm', 'tca']);
  });

  it('should report close candidates as ambiguous', () => {
    const field = classify(evidence([['mvvm', 0.3], ['tca', 0.35]]), order, 'unstructured', settings);

    expect(field.value).toBe('ambiguous');
    expect(field.confidence).toBe(0.35);
    expect(ambiguousChoices(field, settings)).toEqual(['tca', 'mvvm']);
  });

  it('should fall back when nothing reaches the minimum confidence', () => {
    const field = classify(evidence([['mvvm', 0.2]]), order, 'unstructured', settings);

    expect(field).toEqual({
      value: 'unstructured',
      confidence: 0,
      candidates: [{ value: 'mvvm', confidence: 0.2, evidence: [{ rule: 'mvvm-rule', path: 'A.swift', weight: 0.2 }] }],
    });
  });

  it('should ignore a close runner-up below the minimum confidence', () => {
    expect(classify(evidence([['mvvm', 0.35], ['tca', 0.25]]), order, 'unstructured', settings).value).toBe('mvvm');
  });

  it('should break confidence ties by declaration order', () => {
    const field = classify(evidence([['viper', 0.2], ['mvc', 0.2]]), order, 'unstructured', settings);

    expect(field.candidates.map((candidate) => candidate.value)).toEqual(['mvc', 'viper']);
  });

  it('should fall back with no evidence at all', () => {
    expect(classify(new Map(), order, 'unstructured', settings)).toEqual({
      value: 'unstructured',
      confidence: 0,
      candidates: [],
    });
  });
});

describe('collectEvidence', () => {
  it('should cap hits per rule', () => {
    const files = ['A', 'B', 'C', 'D', 'E'].map((name) => ({ path: `App/${name}ViewModel.swift`, content: '' }));

    const found = collectEvidence(ARCHITECTURE_RULES, files);

    expect(found.get('mvvm')?.map((item) => item.path)).toEqual([
      'App/AViewModel.swift',
      'App/BViewModel.swift',
      'App/CViewModel.swift',
      'App/DViewModel.swift',
    ]);
  });

  it('should require content signatures to match', () => {
    const files = [
      { path: 'App/Store.swift', content: 'import SwiftUI\n' },
      { path: 'App/Feature.swift', content: 'import ComposableArchitecture\n\n@Reducer\nstruct Feature {}\n' },
    ];

    const found = collectEvidence(ARCHITECTURE_RULES, files);

    expect(found.get('tca')).toEqual([
      { rule: 'composable-architecture-import', path: 'App/Feature.swift', weight: 0.3 },
      { rule: 'reducer-macro', path: 'App/Feature.swift', weight: 0.2 },
    ]);
    expect(found.has('mvvm')).toBe(false);
  });
});

describe('compareVersions', () => {
  it('should compare numerically by component', () => {
    expect(compareVersions('17.0', '17')).toBe(0);
    expect(compareVersions('16.4', '17')).toBeLessThan(0);
    expect(compareVersions('10.0', '9.3')).toBeGreaterThan(0);
  });
});
