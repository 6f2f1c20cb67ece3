/**
 * File System Storage Provider
 *
 * Node.js fs-based implementation rooted at a directory.
 * Uses fs/promises for async operations.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageProvider } from './interface';

/**
 * File-system based storage provider
 *
 * All paths are resolved relative to the configured root directory.
 */
export class FileStorage implements StorageProvider {
  private readonly rootPath: string;

  /**
   * @param rootPath - Path to the storage root directory
   */
  constructor(rootPath: string) {
    this.rootPath = path.resolve(rootPath);
  }

  /**
   * Resolve a relative path to an absolute path within the root
   */
  private resolvePath(relativePath: string): string {
    const resolved = path.resolve(this.rootPath, relativePath);

    if (resolved !== this.rootPath && !resolved.startsWith(this.rootPath + path.sep)) {
      throw new Error(`Invalid path: ${relativePath} escapes storage root`);
    }

    return resolved;
  }

  async read(filePath: string): Promise<string> {
    return fs.readFile(this.resolvePath(filePath), 'utf-8');
  }

  async write(filePath: string, content: string): Promise<void> {
    const absolutePath = this.resolvePath(filePath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, content, 'utf-8');
  }

  async list(directory: string): Promise<string[]> {
    try {
      return await fs.readdir(this.resolvePath(directory));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolvePath(filePath));
      return true;
    } catch {
      return false;
    }
  }

  describe(filePath: string): string {
    return this.resolvePath(filePath);
  }

  /**
   * Get the root path
   */
  getRootPath(): string {
    return this.rootPath;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
