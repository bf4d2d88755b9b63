/**
 * Default file system backed by the local disk
 */

import * as fs from 'fs/promises';
import type { FileSystem } from './types.js';

function isMissingEntryError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    return code === 'ENOENT' || code === 'ENOTDIR';
  }
  return false;
}

export const nodeFileSystem: FileSystem = {
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  },

  async directoryExists(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch {
      return false;
    }
  },

  async exists(entryPath: string): Promise<boolean> {
    try {
      await fs.stat(entryPath);
      return true;
    } catch {
      return false;
    }
  },

  async isSymbolicLink(entryPath: string): Promise<boolean> {
    try {
      const stat = await fs.lstat(entryPath);
      return stat.isSymbolicLink();
    } catch {
      return false;
    }
  },

  async directoryEntries(dirPath: string): Promise<string[]> {
    try {
      const names = await fs.readdir(dirPath);
      // readdir order is platform dependent
      return names.sort();
    } catch (err: unknown) {
      if (isMissingEntryError(err)) {
        return [];
      }
      throw err;
    }
  },
};
