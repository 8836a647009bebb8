export { runGeneration } from './session.js';
export type { GenerationRequest, GenerationOutcome } from './session.js';
export { ExitCodes, exitCodeFor } from './exit-codes.js';
export type { ExitCode } from './exit-codes.js';
