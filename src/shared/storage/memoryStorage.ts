/**
 * In-Memory Storage Provider
 *
 * Memory-based implementation for testing.
 * Data is stored in a Map and persists only for the lifetime of the instance.
 */

import * as path from 'path';
import { StorageProvider } from './interface';

/**
 * In-memory storage provider for testing
 *
 * Files are keyed by normalized relative path; directories are implied.
 */
export class MemoryStorage implements StorageProvider {
  private files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initial)) {
      this.files.set(this.normalize(filePath), content);
    }
  }

  /**
   * Normalize a path into a slash-separated key without leading or trailing slashes
   */
  private normalize(filePath: string): string {
    const normalized = path.posix.normalize(filePath.replace(/\\/g, '/')).replace(/^\/+|\/+$/g, '');
    return normalized === '.' ? '' : normalized;
  }

  async read(filePath: string): Promise<string> {
    const content = this.files.get(this.normalize(filePath));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory: ${filePath}`);
    }
    return content;
  }

  async write(filePath: string, content: string): Promise<void> {
    const key = this.normalize(filePath);
    if (key === '') {
      throw new Error('Cannot write to root directory');
    }
    this.files.set(key, content);
  }

  async list(directory: string): Promise<string[]> {
    const prefix = this.normalize(directory);
    const names = new Set<string>();

    for (const key of this.files.keys()) {
      const rest = prefix === '' ? key : key.startsWith(prefix + '/') ? key.slice(prefix.length + 1) : null;
      if (rest) {
        names.add(rest.split('/')[0]);
      }
    }

    return Array.from(names);
  }

  async exists(filePath: string): Promise<boolean> {
    const key = this.normalize(filePath);
    if (this.files.has(key)) {
      return true;
    }
    return (await this.list(key)).length > 0;
  }

  describe(filePath: string): string {
    return `memory:${this.normalize(filePath)}`;
  }

  /**
   * Dump every stored file (for assertions)
   */
  dump(): Record<string, string> {
    return Object.fromEntries(this.files);
  }
}
