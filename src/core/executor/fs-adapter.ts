/**
 * Filesystem seam for the Write Executor.
 */
import * as fs from 'node:fs';

export interface FileSystemAdapter {
  exists(filePath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  /** Create a single directory; the parent must exist */
  mkdir(dirPath: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
  /** Remove an empty directory */
  rmdir(dirPath: string): Promise<void>;
}

export const nodeFileSystem: FileSystemAdapter = {
  async exists(filePath) {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  },
  readFile: (filePath) => fs.promises.readFile(filePath, 'utf-8'),
  writeFile: (filePath, content) => fs.promises.writeFile(filePath, content, 'utf-8'),
  async mkdir(dirPath) {
    await fs.promises.mkdir(dirPath);
  },
  unlink: (filePath) => fs.promises.unlink(filePath),
  rmdir: (dirPath) => fs.promises.rmdir(dirPath),
};
