export { planGeneration } from './planner.js';
export type { PlanRequest } from './planner.js';
export { authorizeCapabilities, capabilityNotes, isKnownCapability, KNOWN_CAPABILITIES } from './capabilities.js';
export { buildInstructions, dependencyStep } from './instructions.js';
export type {
  Artifact,
  ArtifactKind,
  CapabilityNote,
  GenerationPlan,
  IntegrationInstructions,
  SkippedTemplate,
} from './types.js';
