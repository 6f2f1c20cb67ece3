/**
 * Storage Provider Interface
 *
 * Abstraction for file storage operations:
 * - FileStorage: Node.js fs-based, rooted at a directory
 * - MemoryStorage: In-memory (testing)
 */

/**
 * Storage provider interface
 *
 * All paths are relative to the storage root (implementation-specific).
 * Implementations should handle path normalization internally.
 */
export interface StorageProvider {
  /**
   * Read file contents as string
   * @throws If file does not exist or cannot be read
   */
  read(path: string): Promise<string>;

  /**
   * Write content to a file, creating parent directories as needed
   */
  write(path: string, content: string): Promise<void>;

  /**
   * List entry names in a directory. A missing directory lists as empty.
   */
  list(directory: string): Promise<string[]>;

  /**
   * Check if a path exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Describe a path for messages and logs
   */
  describe(path: string): string;
}
