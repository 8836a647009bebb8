/**
 * .appforgeignore support - gitignore-style patterns excluding files from the
 * project scan.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile } from './file-system.js';

export const IGNORE_FILENAME = '.appforgeignore';

/**
 * Filter for paths relative to the project root.
 */
export interface IgnoreFilter {
  ignores(filePath: string): boolean;
  filter(filePaths: string[]): string[];
  patterns(): string[];
}

/**
 * Load .appforgeignore from the project root. A missing file yields an empty
 * filter.
 */
export async function loadIgnoreFile(projectRoot: string): Promise<IgnoreFilter> {
  const ignorePath = join(projectRoot, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createIgnoreFilter([]);
  }
  return createIgnoreFilter(parseIgnoreFile(await readFile(ignorePath)));
}

/**
 * Create a filter from gitignore-style patterns.
 */
export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      return ig.ignores(filePath.replace(/\\/g, '/'));
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter((fp) => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse ignore file content: blank lines and `#` comments are dropped,
 * `!` negations are kept.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
