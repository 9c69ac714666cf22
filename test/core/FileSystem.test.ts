import { FileSystem } from '../../src/utils/FileSystem';
import { errorMessage } from '../../src/types/Errors';
import { createTempDir, cleanupTempDir } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as vm from 'vm';

describe('FileSystem', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('walkUp', () => {
    it('should visit the start directory and then each parent with its depth', async () => {
      const start = path.join(tempDir, 'a', 'b');
      await fs.ensureDir(start);
      const visited: Array<[string, number]> = [];

      await FileSystem.walkUp(start, async (dir, depth) => {
        visited.push([dir, depth]);
        return dir === tempDir ? dir : null;
      });

      expect(visited).toEqual([
        [start, 0],
        [path.join(tempDir, 'a'), 1],
        [tempDir, 2],
      ]);
    });

    it('should stop at the filesystem root and return null when nothing matches', async () => {
      const visited: string[] = [];

      const result = await FileSystem.walkUp(tempDir, async dir => {
        visited.push(dir);
        return null;
      });

      expect(result).toBeNull();
      expect(visited[visited.length - 1]).toBe(path.parse(tempDir).root);
    });
  });

  describe('readTextFile', () => {
    it('should return null for a missing file', async () => {
      expect(await FileSystem.readTextFile(path.join(tempDir, 'missing'))).toBeNull();
    });

    it('should throw for a path that cannot be read as a file', async () => {
      await expect(FileSystem.readTextFile(tempDir)).rejects.toThrow(`Failed to read ${tempDir}`);
    });
  });

  describe('isNodeError', () => {
    it('should recognise fs errors raised in another realm', () => {
      const foreign: unknown = vm.runInNewContext("Object.assign(new Error('gone'), { code: 'ENOENT' })");

      expect(foreign instanceof Error).toBe(false);
      expect(FileSystem.isNodeError(foreign)).toBe(true);
      expect(errorMessage(foreign)).toBe('gone');
    });

    it('should reject values without a code', () => {
      expect(FileSystem.isNodeError(new Error('plain'))).toBe(false);
      expect(FileSystem.isNodeError('ENOENT')).toBe(false);
      expect(FileSystem.isNodeError(null)).toBe(false);
    });
  });

  describe('writeTextFileAtomic', () => {
    it('should create missing directories and replace existing content', async () => {
      const file = path.join(tempDir, 'nested', 'dir', 'file.txt');

      await FileSystem.writeTextFileAtomic(file, 'first\n');
      await FileSystem.writeTextFileAtomic(file, 'second\n');

      expect(await fs.readFile(file, 'utf8')).toBe('second\n');
      expect(await fs.readdir(path.dirname(file))).toEqual(['file.txt']);
    });
  });

  describe('isExecutable', () => {
    it('should only accept executable regular files', async () => {
      const script = path.join(tempDir, 'php');
      const plain = path.join(tempDir, 'notes.txt');
      await fs.writeFile(script, '#!/bin/sh\n', { mode: 0o755 });
      await fs.writeFile(plain, 'text', { mode: 0o644 });

      expect(await FileSystem.isExecutable(script)).toBe(true);
      expect(await FileSystem.isExecutable(plain)).toBe(false);
      expect(await FileSystem.isExecutable(tempDir)).toBe(false);
    });
  });

  describe('readLink', () => {
    it('should return the raw link target or null', async () => {
      const link = path.join(tempDir, 'link');
      await fs.symlink('../somewhere/else', link);

      expect(await FileSystem.readLink(link)).toBe('../somewhere/else');
      expect(await FileSystem.readLink(path.join(tempDir, 'missing'))).toBeNull();
    });
  });
});
