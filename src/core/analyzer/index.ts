export { analyzeProject, classify, collectEvidence, compareVersions, ambiguousChoices } from './analyzer.js';
export type { AnalyzerOptions, ScannedFile } from './analyzer.js';
export { extractSymbols, detectAttribution, GENERATED_MARKER } from './symbols.js';
export type { ExtractedSymbol } from './symbols.js';
export { CATEGORY_CONVENTIONS, classifyFile, categoryDirectories, knownCategories } from './categories.js';
export type { CategoryConvention } from './categories.js';
export {
  ARCHITECTURE_RULES,
  DEPENDENCY_MANAGER_RULES,
  parsePackagePlatforms,
  parsePbxprojPlatforms,
  parseToolsVersion,
} from './rules.js';
export type { SignalRule } from './rules.js';
export { ARCHITECTURE_CONVENTIONS, DEPENDENCY_MANAGERS, AMBIGUOUS, isAmbiguous } from './types.js';
export type {
  ArchitectureConvention,
  DependencyManager,
  Platform,
  Ambiguous,
  Evidence,
  Candidate,
  DetectedField,
  PlatformMarker,
  Attribution,
  SymbolKind,
  IndexEntry,
  DirectoryEntry,
  ProjectProfile,
} from './types.js';
export {
  ARCHITECTURE_OPTION,
  DEPENDENCY_MANAGER_OPTION,
  ambiguityOptions,
  resolvedArchitecture,
  resolvedDependencyManager,
} from './ambiguity.js';
