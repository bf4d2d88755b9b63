/**
 * nodeFileSystem tests against a temporary directory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { nodeFileSystem } from '../fileSystem.js';
import { EvaluationContext, SharingPolicy } from '../evaluationContext.js';
import { silentLogger } from '../logger.js';
import { Project } from '../project.js';

describe('nodeFileSystem', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'eval-context-test-'));
    await fs.writeFile(path.join(tempDir, 'c.txt'), 'c');
    await fs.writeFile(path.join(tempDir, 'a.txt'), 'a');
    await fs.mkdir(path.join(tempDir, 'b'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should tell files from directories', async () => {
    expect(await nodeFileSystem.fileExists(path.join(tempDir, 'a.txt'))).toBe(true);
    expect(await nodeFileSystem.fileExists(path.join(tempDir, 'b'))).toBe(false);
    expect(await nodeFileSystem.directoryExists(path.join(tempDir, 'b'))).toBe(true);
    expect(await nodeFileSystem.directoryExists(path.join(tempDir, 'a.txt'))).toBe(false);
  });

  it('should report missing entries as absent', async () => {
    expect(await nodeFileSystem.fileExists(path.join(tempDir, 'missing'))).toBe(false);
    expect(await nodeFileSystem.directoryExists(path.join(tempDir, 'missing'))).toBe(false);
  });

  it('should list entries in sorted order', async () => {
    expect(await nodeFileSystem.directoryEntries(tempDir)).toEqual(['a.txt', 'b', 'c.txt']);
  });

  it('should list nothing for a missing directory or a file', async () => {
    expect(await nodeFileSystem.directoryEntries(path.join(tempDir, 'missing'))).toEqual([]);
    expect(await nodeFileSystem.directoryEntries(path.join(tempDir, 'a.txt'))).toEqual([]);
  });

  it('should answer exists for files and directories', async () => {
    expect(await nodeFileSystem.exists(path.join(tempDir, 'a.txt'))).toBe(true);
    expect(await nodeFileSystem.exists(path.join(tempDir, 'b'))).toBe(true);
    expect(await nodeFileSystem.exists(path.join(tempDir, 'missing'))).toBe(false);
  });

  it('should report symbolic links without following them', async () => {
    await fs.symlink('b', path.join(tempDir, 'link'), 'dir');

    expect(await nodeFileSystem.isSymbolicLink(path.join(tempDir, 'link'))).toBe(true);
    expect(await nodeFileSystem.isSymbolicLink(path.join(tempDir, 'b'))).toBe(false);
    expect(await nodeFileSystem.isSymbolicLink(path.join(tempDir, 'missing'))).toBe(false);
  });

  it('should back the glob cache of a context without an override', async () => {
    const context = EvaluationContext.create({ policy: SharingPolicy.Isolated, logger: silentLogger });

    expect(await context.globCache.expand('*.txt', tempDir)).toEqual(['a.txt', 'c.txt']);
  });

  describe('directory links back to an ancestor', () => {
    beforeEach(async () => {
      await fs.writeFile(path.join(tempDir, 'x.cs'), 'x');
      await fs.symlink('.', path.join(tempDir, 'loop'), 'dir');
      await fs.symlink('.', path.join(tempDir, 'loop2'), 'dir');
    });

    it('should not descend through links under **', async () => {
      const context = EvaluationContext.create({ policy: SharingPolicy.Isolated, logger: silentLogger });

      expect(await context.globCache.expand('**/*.cs', tempDir)).toEqual(['x.cs']);
    });

    it('should not descend through links under a trailing **', async () => {
      const context = EvaluationContext.create({ policy: SharingPolicy.Isolated, logger: silentLogger });

      expect(await context.globCache.expand('**', tempDir)).toEqual(['a.txt', 'c.txt', 'x.cs']);
    });

    it('should still follow a link named in the pattern', async () => {
      const context = EvaluationContext.create({ policy: SharingPolicy.Isolated, logger: silentLogger });

      expect(await context.globCache.expand('loop/*.cs', tempDir)).toEqual(['loop/x.cs']);
    });
  });

  describe('isolated projects on disk', () => {
    const compileAll = (projectPath: string) => ({
      fullPath: projectPath,
      items: [{ itemType: 'Compile', include: '**/*.cs' }],
    });

    beforeEach(async () => {
      await fs.mkdir(path.join(tempDir, 'A'));
      await fs.mkdir(path.join(tempDir, 'B'));
      await fs.writeFile(path.join(tempDir, 'A', 'a.cs'), 'a');
      await fs.writeFile(path.join(tempDir, 'B', 'b.cs'), 'b');
    });

    it('should show new files to new projects while re-evaluation stays stale', async () => {
      const context = EvaluationContext.create({ policy: SharingPolicy.Isolated, logger: silentLogger });
      const projectA = path.join(tempDir, 'A', 'a.proj');
      const projectB = path.join(tempDir, 'B', 'b.proj');

      const a = await Project.load(compileAll(projectA), { context });
      const b = await Project.load(compileAll(projectB), { context });
      expect(a.getItems('Compile')).toEqual(['a.cs']);
      expect(b.getItems('Compile')).toEqual(['b.cs']);
      expect(a.evaluationContext).not.toBe(b.evaluationContext);

      await fs.writeFile(path.join(tempDir, 'A', 'new.cs'), 'n');
      await fs.writeFile(path.join(tempDir, 'B', 'new.cs'), 'n');

      await a.reevaluate();
      await b.reevaluate();
      expect(a.getItems('Compile')).toEqual(['a.cs']);
      expect(b.getItems('Compile')).toEqual(['b.cs']);

      const freshA = await Project.load(compileAll(projectA), { context });
      expect(freshA.getItems('Compile')).toEqual(['a.cs', 'new.cs']);
    });
  });
});
