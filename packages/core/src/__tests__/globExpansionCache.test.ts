/**
 * GlobExpansionCache tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExistenceCache } from '../existenceCache.js';
import { GlobExpansionCache } from '../globExpansionCache.js';
import { MemoryFileSystem } from '../memoryFileSystem.js';

describe('GlobExpansionCache', () => {
  let fileSystem: MemoryFileSystem;
  let existence: ExistenceCache;
  let cache: GlobExpansionCache;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem([
      '/work/a/a.proj',
      '/work/a/src/x.cs',
      '/work/a/src/readme.md',
      '/work/a/src/sub/y.cs',
      '/work/b/src/z.cs',
    ]);
    existence = new ExistenceCache(fileSystem);
    cache = new GlobExpansionCache(existence);
  });

  describe('expansion', () => {
    it('should match the current directory before sub-directories for **', async () => {
      expect(await cache.expand('src/**/*.cs', '/work/a')).toEqual(['src/x.cs', 'src/sub/y.cs']);
    });

    it('should collect every file below a trailing **', async () => {
      expect(await cache.expand('src/**', '/work/a')).toEqual(['src/readme.md', 'src/x.cs', 'src/sub/y.cs']);
    });

    it('should expand brace sets within a segment', async () => {
      expect(await cache.expand('src/{x,readme}.*', '/work/a')).toEqual(['src/readme.md', 'src/x.cs']);
    });

    it('should match literal segments after a wildcard directory', async () => {
      expect(await cache.expand('src/*/y.cs', '/work/a')).toEqual(['src/sub/y.cs']);
    });

    it('should return nothing when the fixed root is missing', async () => {
      expect(await cache.expand('missing/*.cs', '/work/a')).toEqual([]);
    });

    it('should keep absolute patterns absolute', async () => {
      expect(await cache.expand('/work/b/src/*.cs', '/work/a')).toEqual(['/work/b/src/z.cs']);
    });
  });

  describe('keys', () => {
    it('should keep identical relative patterns under different cones apart', async () => {
      expect(await cache.expand('src/*.cs', '/work/a')).toEqual(['src/x.cs']);
      expect(await cache.expand('src/*.cs', '/work/b')).toEqual(['src/z.cs']);
      expect(cache.size).toBe(2);
    });

    it('should share one entry between a relative and an absolute pattern for the same cone', async () => {
      const relative = await cache.expand('src/**/*.cs', '/work/a');
      const probesAfterFirst = fileSystem.totalProbes;
      const absolute = await cache.expand('/work/a/src/**/*.cs', '/elsewhere');

      expect(relative).toEqual(['src/x.cs', 'src/sub/y.cs']);
      expect(absolute).toEqual(['/work/a/src/x.cs', '/work/a/src/sub/y.cs']);
      expect(cache.size).toBe(1);
      expect(fileSystem.totalProbes).toBe(probesAfterFirst);
    });

    it('should store entries relative to the fixed root', async () => {
      const key = { fixedDirectoryRoot: '/work/a/src', patternRemainder: '**/*.cs' };
      expect(cache.getEntry(key)).toBeUndefined();

      await cache.expand('src/**/*.cs', '/work/a');
      const entry = await cache.getEntry(key);

      expect(entry).toEqual(['x.cs', 'sub/y.cs']);
      expect(Object.isFrozen(entry)).toBe(true);
    });
  });

  describe('memoization', () => {
    it('should traverse once for concurrent first requests', async () => {
      const directoryEntries = vi.spyOn(existence, 'directoryEntries');

      const results = await Promise.all([
        cache.expand('src/*.cs', '/work/a'),
        cache.expand('src/*.cs', '/work/a'),
        cache.expand('/work/a/src/*.cs', '/work/b'),
      ]);

      expect(results).toEqual([['src/x.cs'], ['src/x.cs'], ['/work/a/src/x.cs']]);
      expect(directoryEntries).toHaveBeenCalledTimes(1);
    });

    it('should not observe files added after the first expansion', async () => {
      expect(await cache.expand('*.proj', '/work/a')).toEqual(['a.proj']);

      fileSystem.addFile('/work/a/b.proj');

      expect(await cache.expand('*.proj', '/work/a')).toEqual(['a.proj']);
      const fresh = new GlobExpansionCache(new ExistenceCache(fileSystem));
      expect(await fresh.expand('*.proj', '/work/a')).toEqual(['a.proj', 'b.proj']);
    });

    it('should hand out a copy the caller may change', async () => {
      const first = await cache.expand('src/*.cs', '/work/a');
      first.push('src/extra.cs');

      expect(await cache.expand('src/*.cs', '/work/a')).toEqual(['src/x.cs']);
    });
  });
});
