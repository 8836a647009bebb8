/**
 * Utility exports barrel file.
 */
export * from './errors.js';
export * from './logger.js';
export * from './file-system.js';
export * from './yaml.js';
export * from './checksum.js';
export * from './ignore-file.js';
export * from './freeze.js';
