/**
 * Generation Plan types.
 */
import type { ConflictEntry } from '../conflicts/types.js';
import type { ConflictResolution } from '../resolver/prompt.js';
import type { PlacementRule } from '../placement/resolver.js';
import type { GenerationConfig } from '../store/types.js';

export type ArtifactKind = 'create' | 'modify';

/**
 * One rendered file and where it goes.
 */
export interface Artifact {
  templateName: string;
  /** Relative to the project root, forward slashes */
  path: string;
  absolutePath: string;
  content: string;
  checksum: string;
  kind: ArtifactKind;
  category: string;
  placement: PlacementRule;
}

/** A template dropped by an `extend` resolution. */
export interface SkippedTemplate {
  templateName: string;
  path: string;
  reason: string;
}

export interface CapabilityNote {
  capability: string;
  note: string;
}

export interface IntegrationInstructions {
  capabilities: readonly CapabilityNote[];
  /** Package manager steps for the generator's third-party dependencies */
  dependencies: readonly string[];
  /** Follow-up manual steps */
  steps: readonly string[];
}

/**
 * Every file operation of a run, computed before anything is written.
 */
export interface GenerationPlan {
  generatorId: string;
  generatorVersion: string;
  root: string;
  config: GenerationConfig;
  artifacts: readonly Artifact[];
  /** Targets whose existing content already matches; not written */
  unchanged: readonly string[];
  skipped: readonly SkippedTemplate[];
  instructions: IntegrationInstructions;
  /** Entries that did not block, plus the blocking ones a resolution settled */
  conflicts: readonly ConflictEntry[];
  resolution?: ConflictResolution;
}
