export { WriteExecutor } from './executor.js';
export type { ApplyResult } from './executor.js';
export { nodeFileSystem } from './fs-adapter.js';
export type { FileSystemAdapter } from './fs-adapter.js';
