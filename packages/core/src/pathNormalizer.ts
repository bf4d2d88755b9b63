/**
 * Path canonicalization and glob cache key derivation
 */

import * as path from 'path';
import { hasMagic } from 'glob';
import type { GlobCacheKey } from './types.js';

const DRIVE_ROOT = /^[A-Za-z]:\//;

function toForwardSlashes(value: string): string {
  return value.replace(/\\/g, '/');
}

function containsMagic(value: string): boolean {
  return hasMagic(value, { magicalBraces: true });
}

/**
 * Whether path is rooted (posix root or drive letter)
 */
export function isAbsolutePath(value: string): boolean {
  const p = toForwardSlashes(value);
  return path.posix.isAbsolute(p) || DRIVE_ROOT.test(p);
}

/**
 * Canonical form: forward slashes, no `.`/`..` segments, no trailing separator
 */
export function normalizePath(value: string): string {
  const normalized = path.posix.normalize(toForwardSlashes(value));
  if (normalized.length > 1 && normalized.endsWith('/') && !/^[A-Za-z]:\/$/.test(normalized)) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Resolve value against base unless it is already absolute
 */
export function resolvePath(base: string, value: string): string {
  if (isAbsolutePath(value)) {
    return normalizePath(value);
  }
  return normalizePath(path.posix.join(toForwardSlashes(base), toForwardSlashes(value)));
}

/**
 * Join a directory and an entry name
 */
export function joinPath(directory: string, name: string): string {
  return directory.endsWith('/') ? `${directory}${name}` : `${directory}/${name}`;
}

/**
 * Whether a file spec contains wildcard syntax
 */
export function isGlobPattern(spec: string): boolean {
  return containsMagic(toForwardSlashes(spec));
}

export interface GlobPatternParts {
  /** Leading directory segments without wildcards, as written ('' when none) */
  fixedDirectoryPart: string;
  /** Remaining segments, wildcards and file name pattern */
  wildcardPart: string;
}

/**
 * Split a pattern at its first wildcard directory segment.
 * The last segment always belongs to the wildcard part.
 */
export function splitGlobPattern(pattern: string): GlobPatternParts {
  const segments = toForwardSlashes(pattern).replace(/\/{2,}/g, '/').split('/');
  const fixed: string[] = [];

  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    if (segment === undefined || containsMagic(segment)) break;
    fixed.push(segment);
  }

  const fixedDirectoryPart = fixed.length === 1 && fixed[0] === '' ? '/' : fixed.join('/');
  return {
    fixedDirectoryPart,
    wildcardPart: segments.slice(fixed.length).join('/'),
  };
}

/**
 * Derive the cache key of a pattern evaluated from baseDirectory.
 * Identical relative patterns under different directories get different roots;
 * an absolute pattern reaching into another cone gets that cone's root.
 */
export function createGlobCacheKey(pattern: string, baseDirectory: string): GlobCacheKey {
  const { fixedDirectoryPart, wildcardPart } = splitGlobPattern(pattern);
  return {
    fixedDirectoryRoot: resolvePath(baseDirectory, fixedDirectoryPart),
    patternRemainder: wildcardPart,
  };
}

export function globCacheKeyToString(key: GlobCacheKey): string {
  return `${key.fixedDirectoryRoot}\0${key.patternRemainder}`;
}
