export { resolveConfig, validateOptionValue } from './resolver.js';
export { NonInteractivePrompt, CONFLICT_RESOLUTIONS, isConflictResolution } from './prompt.js';
export type { PromptCollaborator, PromptAnswer, ConflictResolution } from './prompt.js';
