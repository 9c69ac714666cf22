import * as fs from 'fs-extra';
import * as path from 'path';
import writeFileAtomic from 'write-file-atomic';
import { errorMessage } from '../types/Errors';

export class FileSystem {
  /**
   * Visits `startPath` and each of its parents up to and including the
   * filesystem root. A directory whose real path was already visited (a
   * symlink loop) is skipped. The visitor returns a value to stop the walk.
   */
  static async walkUp<T>(
    startPath: string,
    visit: (dir: string, depth: number) => Promise<T | null>
  ): Promise<T | null> {
    const visited = new Set<string>();
    let currentPath = path.resolve(startPath);
    let depth = 0;

    for (;;) {
      const realPath = await this.realPath(currentPath);
      if (!visited.has(realPath)) {
        visited.add(realPath);
        const found = await visit(currentPath, depth);
        if (found !== null) {
          return found;
        }
      }

      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
      depth++;
    }
  }

  static async realPath(filePath: string): Promise<string> {
    try {
      return await fs.realpath(filePath);
    } catch {
      return path.resolve(filePath);
    }
  }

  static async readTextFile(filePath: string): Promise<string | null> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }

    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (FileSystem.isNodeError(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new Error(`Failed to read ${filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Writes through a temporary file renamed into place, so readers never see
   * a half-written file.
   */
  static async writeTextFileAtomic(filePath: string, content: string): Promise<void> {
    await fs.ensureDir(path.dirname(filePath));
    await writeFileAtomic(filePath, content, { encoding: 'utf8' });
  }

  static async isFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch {
      return false;
    }
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      if (await fs.pathExists(filePath)) {
        await fs.remove(filePath);
      }
    } catch (error) {
      throw new Error(`Failed to delete file ${filePath}: ${errorMessage(error)}`);
    }
  }

  static async isExecutable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.F_OK | fs.constants.X_OK);
      return (await fs.stat(filePath)).isFile();
    } catch {
      return false;
    }
  }

  static async readLink(filePath: string): Promise<string | null> {
    try {
      return await fs.readlink(filePath);
    } catch {
      return null;
    }
  }

  static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error;
  }
}
