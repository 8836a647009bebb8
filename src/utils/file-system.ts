/**
 * Read-side filesystem helpers for scanning projects and loading stores.
 * Writes go through the executor's FileSystemAdapter instead.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * The first `maxBytes` of a file, for large sources where only the
 * declarations near the top matter.
 */
export async function readFileHead(filePath: string, maxBytes: number): Promise<string> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(maxBytes), 0, maxBytes, 0);
    return buffer.toString('utf-8', 0, bytesRead);
  } finally {
    await handle.close();
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fs.promises.access(filePath).then(
    () => true,
    () => false
  );
}

export async function isDirectory(filePath: string): Promise<boolean> {
  return fs.promises.stat(filePath).then(
    (stat) => stat.isDirectory(),
    () => false
  );
}

export interface ListFilesOptions {
  /** Glob patterns to skip, relative to the root */
  exclude?: readonly string[];
  /** Directory levels to descend; unlimited when omitted */
  maxDepth?: number;
}

/**
 * Every file under root, hidden ones included, as sorted forward-slash paths
 * relative to root. Symlinks are not followed; unreadable directories are
 * skipped.
 */
export async function listFiles(root: string, options: ListFilesOptions = {}): Promise<string[]> {
  const files = await fg('**/*', {
    cwd: root,
    ignore: [...(options.exclude ?? [])],
    deep: options.maxDepth ?? Infinity,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });
  return files.sort();
}

/** OS path to the forward-slash form used in indexes and plans. */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Whether `target` resolves strictly below `root`.
 */
export function isInside(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}
