/**
 * In-memory file system with probe counters.
 * Usable as a context file system override and as a test double.
 */

import * as path from 'path';
import { normalizePath } from './pathNormalizer.js';
import type { FileSystem } from './types.js';

export interface ProbeCounts {
  fileExists: number;
  directoryExists: number;
  exists: number;
  isSymbolicLink: number;
  directoryEntries: number;
}

export class MemoryFileSystem implements FileSystem {
  private readonly files = new Set<string>();
  private readonly directories = new Set<string>();
  /** Paths passed to each probe, in call order */
  readonly probedPaths: Record<keyof ProbeCounts, string[]> = {
    fileExists: [],
    directoryExists: [],
    exists: [],
    isSymbolicLink: [],
    directoryEntries: [],
  };

  constructor(files: Iterable<string> = []) {
    for (const file of files) {
      this.addFile(file);
    }
  }

  get probes(): ProbeCounts {
    return {
      fileExists: this.probedPaths.fileExists.length,
      directoryExists: this.probedPaths.directoryExists.length,
      exists: this.probedPaths.exists.length,
      isSymbolicLink: this.probedPaths.isSymbolicLink.length,
      directoryEntries: this.probedPaths.directoryEntries.length,
    };
  }

  get totalProbes(): number {
    return Object.values(this.probes).reduce((total, count) => total + count, 0);
  }

  addFile(filePath: string): void {
    const normalized = normalizePath(filePath);
    this.files.add(normalized);
    this.addDirectory(path.posix.dirname(normalized));
  }

  addDirectory(dirPath: string): void {
    let current = normalizePath(dirPath);
    while (current !== '.' && !this.directories.has(current)) {
      this.directories.add(current);
      const parent = path.posix.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }

  removeFile(filePath: string): void {
    this.files.delete(normalizePath(filePath));
  }

  async fileExists(filePath: string): Promise<boolean> {
    this.probedPaths.fileExists.push(filePath);
    return this.files.has(normalizePath(filePath));
  }

  async directoryExists(dirPath: string): Promise<boolean> {
    this.probedPaths.directoryExists.push(dirPath);
    return this.directories.has(normalizePath(dirPath));
  }

  async exists(entryPath: string): Promise<boolean> {
    this.probedPaths.exists.push(entryPath);
    const normalized = normalizePath(entryPath);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  /** Links are not modelled */
  async isSymbolicLink(entryPath: string): Promise<boolean> {
    this.probedPaths.isSymbolicLink.push(entryPath);
    return false;
  }

  async directoryEntries(dirPath: string): Promise<string[]> {
    this.probedPaths.directoryEntries.push(dirPath);
    const directory = normalizePath(dirPath);
    if (!this.directories.has(directory)) {
      return [];
    }

    const names = new Set<string>();
    for (const entry of [...this.files, ...this.directories]) {
      if (entry !== directory && path.posix.dirname(entry) === directory) {
        names.add(path.posix.basename(entry));
      }
    }
    return [...names].sort();
  }
}
