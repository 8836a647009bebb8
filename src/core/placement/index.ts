export { placeArtifact, existingConventionDirectory } from './resolver.js';
export type { Placement, PlacementRule } from './resolver.js';
export { defaultDirectory } from './defaults.js';
