/**
 * Memoized expansion of wildcard file specs (item includes and imports)
 */

import { minimatch } from 'minimatch';
import type { ExistenceCache } from './existenceCache.js';
import { getOrCreate } from './memo.js';
import {
  createGlobCacheKey,
  globCacheKeyToString,
  isGlobPattern,
  joinPath,
  splitGlobPattern,
} from './pathNormalizer.js';
import type { GlobCacheKey } from './types.js';

const GLOBSTAR = '**';

interface Traversal {
  segments: string[];
  matches: string[];
  seen: Set<string>;
}

function presentMatch(fixedDirectoryPart: string, entry: string): string {
  if (!fixedDirectoryPart) return entry;
  return fixedDirectoryPart.endsWith('/') ? `${fixedDirectoryPart}${entry}` : `${fixedDirectoryPart}/${entry}`;
}

/**
 * Entries are stored relative to the key's fixed root, so a relative pattern and
 * an absolute pattern resolving to the same root share one entry. Stored entries
 * are never refreshed for the lifetime of the owning context.
 */
export class GlobExpansionCache {
  private readonly entries = new Map<string, Promise<readonly string[]>>();

  constructor(private readonly existence: ExistenceCache) {}

  /**
   * Expand pattern from baseDirectory. Matches carry the pattern's own fixed
   * directory part, so relative patterns yield caller-relative paths.
   */
  async expand(pattern: string, baseDirectory: string): Promise<string[]> {
    const key = createGlobCacheKey(pattern, baseDirectory);
    const { fixedDirectoryPart } = splitGlobPattern(pattern);
    const entries = await this.expandKey(key);
    return entries.map((entry) => presentMatch(fixedDirectoryPart, entry));
  }

  /**
   * Root-relative matches for a key, traversing on first request
   */
  expandKey(key: GlobCacheKey): Promise<readonly string[]> {
    return getOrCreate(this.entries, globCacheKeyToString(key), async () =>
      Object.freeze(await this.traverse(key))
    );
  }

  /**
   * Stored entry for a key, undefined before its first expansion
   */
  getEntry(key: GlobCacheKey): Promise<readonly string[]> | undefined {
    return this.entries.get(globCacheKeyToString(key));
  }

  get size(): number {
    return this.entries.size;
  }

  private async traverse(key: GlobCacheKey): Promise<string[]> {
    const traversal: Traversal = {
      segments: key.patternRemainder.split('/').filter((segment) => segment.length > 0),
      matches: [],
      seen: new Set(),
    };
    if (traversal.segments.length === 0) {
      return [];
    }
    if (!(await this.existence.directoryExists(key.fixedDirectoryRoot))) {
      return [];
    }
    await this.walk(traversal, key.fixedDirectoryRoot, 0, '');
    return traversal.matches;
  }

  private push(traversal: Traversal, match: string): void {
    if (!traversal.seen.has(match)) {
      traversal.seen.add(match);
      traversal.matches.push(match);
    }
  }

  private async walk(traversal: Traversal, directory: string, index: number, prefix: string): Promise<void> {
    const segment = traversal.segments[index];
    if (segment === undefined) return;
    const isLast = index === traversal.segments.length - 1;

    if (segment === GLOBSTAR) {
      if (isLast) {
        await this.collectFiles(traversal, directory, prefix);
        return;
      }
      // zero directories first, then each sub-directory
      await this.walk(traversal, directory, index + 1, prefix);
      for (const name of await this.existence.directoryEntries(directory)) {
        const child = joinPath(directory, name);
        if (await this.isRecursableDirectory(child)) {
          await this.walk(traversal, child, index, `${prefix}${name}/`);
        }
      }
      return;
    }

    if (!isGlobPattern(segment)) {
      const child = joinPath(directory, segment);
      if (isLast) {
        if (await this.existence.fileExists(child)) {
          this.push(traversal, `${prefix}${segment}`);
        }
      } else if (await this.existence.directoryExists(child)) {
        await this.walk(traversal, child, index + 1, `${prefix}${segment}/`);
      }
      return;
    }

    for (const name of await this.existence.directoryEntries(directory)) {
      if (!minimatch(name, segment, { dot: true })) continue;
      const child = joinPath(directory, name);
      if (isLast) {
        if (await this.existence.fileExists(child)) {
          this.push(traversal, `${prefix}${name}`);
        }
      } else if (await this.existence.directoryExists(child)) {
        await this.walk(traversal, child, index + 1, `${prefix}${name}/`);
      }
    }
  }

  /**
   * `**` does not descend through symbolic links, so a link back to an
   * ancestor cannot repeat the walk
   */
  private async isRecursableDirectory(directory: string): Promise<boolean> {
    if (!(await this.existence.directoryExists(directory))) return false;
    return !(await this.existence.isSymbolicLink(directory));
  }

  private async collectFiles(traversal: Traversal, directory: string, prefix: string): Promise<void> {
    const names = await this.existence.directoryEntries(directory);
    const subdirectories: string[] = [];

    for (const name of names) {
      const child = joinPath(directory, name);
      if (await this.existence.fileExists(child)) {
        this.push(traversal, `${prefix}${name}`);
      } else if (await this.isRecursableDirectory(child)) {
        subdirectories.push(name);
      }
    }

    for (const name of subdirectories) {
      await this.collectFiles(traversal, joinPath(directory, name), `${prefix}${name}/`);
    }
  }
}
