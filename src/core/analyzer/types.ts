/**
 * Project Profile types produced by the Project Analyzer.
 */

export const ARCHITECTURE_CONVENTIONS = ['mvvm', 'tca', 'mvc', 'viper', 'clean', 'unstructured'] as const;
export type ArchitectureConvention = (typeof ARCHITECTURE_CONVENTIONS)[number];

export const DEPENDENCY_MANAGERS = ['spm', 'cocoapods', 'carthage', 'none'] as const;
export type DependencyManager = (typeof DEPENDENCY_MANAGERS)[number];

export type Platform = 'iOS' | 'macOS' | 'watchOS' | 'tvOS' | 'visionOS';

export const AMBIGUOUS = 'ambiguous';
export type Ambiguous = typeof AMBIGUOUS;

/** One piece of evidence a rule found. */
export interface Evidence {
  rule: string;
  path: string;
  weight: number;
}

export interface Candidate<T extends string> {
  value: T;
  confidence: number;
  evidence: Evidence[];
}

/**
 * A classified signal. `value` is 'ambiguous' when the two strongest
 * candidates are too close to call.
 */
export interface DetectedField<T extends string> {
  value: T | Ambiguous;
  confidence: number;
  /** Sorted by confidence, strongest first */
  candidates: Candidate<T>[];
}

export interface PlatformMarker {
  platform: Platform;
  version: string;
  /** File the marker was read from */
  source: string;
  confidence: number;
}

export type Attribution =
  | { kind: 'generated'; generatorId: string }
  | { kind: 'foreign' };

export type SymbolKind =
  | 'class'
  | 'struct'
  | 'enum'
  | 'protocol'
  | 'actor'
  | 'extension'
  | 'typealias'
  | 'func'
  | 'interface';

export interface IndexEntry {
  kind: 'file' | 'symbol';
  /** File base name or symbol name */
  name: string;
  /** Path relative to the project root, forward slashes */
  path: string;
  line?: number;
  symbolKind?: SymbolKind;
  confidence: number;
  attribution: Attribution;
}

export interface DirectoryEntry {
  /** Path relative to the project root */
  path: string;
  /** Number of files per category directly inside the directory */
  categories: Record<string, number>;
  fileCount: number;
}

export interface ProjectProfile {
  root: string;
  platforms: PlatformMarker[];
  swiftToolsVersion?: string;
  dependencyManager: DetectedField<DependencyManager>;
  architecture: DetectedField<ArchitectureConvention>;
  /** Directory new sources belong in, relative to root ('.' for the root) */
  sourceRoot: string;
  /** Whether sourceRoot was detected rather than defaulted */
  sourceRootDetected: boolean;
  directories: DirectoryEntry[];
  symbols: IndexEntry[];
  fileCount: number;
  /** More files matched than scan.max_files allowed */
  truncated: boolean;
  /** Files listed but not readable; indexed by name only */
  unreadableFiles: string[];
}

export function isAmbiguous<T extends string>(field: DetectedField<T>): field is DetectedField<T> & { value: Ambiguous } {
  return field.value === AMBIGUOUS;
}
