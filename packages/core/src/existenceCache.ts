/**
 * Memoized file/directory existence and directory enumeration
 */

import { getOrCreate } from './memo.js';
import { normalizePath } from './pathNormalizer.js';
import type { FileSystem } from './types.js';

/**
 * Every probe runs at most once per normalized path for the cache's lifetime.
 * Later changes on disk are not observed; a new context starts cold.
 */
export class ExistenceCache {
  private readonly files = new Map<string, Promise<boolean>>();
  private readonly directories = new Map<string, Promise<boolean>>();
  private readonly anyEntries = new Map<string, Promise<boolean>>();
  private readonly symbolicLinks = new Map<string, Promise<boolean>>();
  private readonly entries = new Map<string, Promise<readonly string[]>>();

  constructor(private readonly fileSystem: FileSystem) {}

  fileExists(filePath: string): Promise<boolean> {
    const key = normalizePath(filePath);
    return getOrCreate(this.files, key, () => this.fileSystem.fileExists(key));
  }

  directoryExists(dirPath: string): Promise<boolean> {
    const key = normalizePath(dirPath);
    return getOrCreate(this.directories, key, () => this.fileSystem.directoryExists(key));
  }

  /**
   * File or directory
   */
  exists(entryPath: string): Promise<boolean> {
    const key = normalizePath(entryPath);
    return getOrCreate(this.anyEntries, key, () => this.fileSystem.exists(key));
  }

  isSymbolicLink(entryPath: string): Promise<boolean> {
    const key = normalizePath(entryPath);
    return getOrCreate(this.symbolicLinks, key, () => this.fileSystem.isSymbolicLink(key));
  }

  directoryEntries(dirPath: string): Promise<readonly string[]> {
    const key = normalizePath(dirPath);
    return getOrCreate(this.entries, key, async () => Object.freeze(await this.fileSystem.directoryEntries(key)));
  }

  /** Number of memoized probes (all kinds) */
  get size(): number {
    return (
      this.files.size + this.directories.size + this.anyEntries.size + this.symbolicLinks.size + this.entries.size
    );
  }
}
