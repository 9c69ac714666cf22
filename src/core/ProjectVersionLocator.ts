import * as path from 'path';
import {
  InstalledVersion,
  VersionIdentifier,
  compareIdentifiers,
  isDefaultVersion,
  parseVersionIdentifier,
  toMajorMinor,
  versionedIdentifier,
} from '../types/Version';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';

export const PIN_FILE = '.php-version';

export interface ProjectPin {
  /** Token as written in the pin file, e.g. "8.1", "php@8.1" or "8" */
  version: string;
  file: string;
  directory: string;
  /** Number of parent hops from the start directory */
  depth: number;
}

export interface PinResolveOptions {
  installIfMissing?: boolean;
}

export class ProjectVersionLocator {
  // first match wins; the last two are read for compatibility only
  private static readonly PIN_FILES = [PIN_FILE, '.phpversion', '.php'];

  static async findProjectVersion(startDir: string): Promise<ProjectPin | null> {
    logger.debug(`Looking for a PHP version pin from ${startDir}`);

    return FileSystem.walkUp(startDir, async (directory, depth) => {
      for (const name of this.PIN_FILES) {
        const file = path.join(directory, name);
        if (!(await FileSystem.isFile(file))) {
          continue;
        }

        const version = this.readPinToken(await FileSystem.readTextFile(file));
        if (version) {
          logger.debug(`Found pin ${version} in ${file}`);
          return { version, file, directory, depth };
        }
      }
      return null;
    });
  }

  static async writeProjectVersion(directory: string, identifier: VersionIdentifier): Promise<string> {
    const file = path.join(directory, PIN_FILE);
    await FileSystem.writeTextFileAtomic(file, `${identifier.version}\n`);
    return file;
  }

  /**
   * Turns a pin token into an identifier. A bare major ("8") picks the
   * highest installed 8.x, and a full version ("8.1.29") its major.minor.
   * A bare major that matches nothing installed gives null, or its `.0`
   * formula when the caller is about to install it.
   */
  static resolvePinnedVersion(
    token: string,
    installed: InstalledVersion[],
    options: PinResolveOptions = {}
  ): VersionIdentifier | null {
    const trimmed = token.trim();

    if (/^\d+$/.test(trimmed)) {
      const candidates = installed
        .filter(record => this.majorOf(record) === trimmed)
        .map(record => record.identifier)
        .sort(compareIdentifiers);
      const versioned = candidates.filter(identifier => !isDefaultVersion(identifier));
      const match = versioned[versioned.length - 1] ?? candidates[0];
      if (match) {
        return match;
      }
      return options.installIfMissing ? versionedIdentifier(`${trimmed}.0`) : null;
    }

    if (/^\d+\.\d+\.\d+/.test(trimmed)) {
      const majorMinor = toMajorMinor(trimmed);
      if (majorMinor) {
        return versionedIdentifier(majorMinor);
      }
    }

    return parseVersionIdentifier(trimmed);
  }

  private static readPinToken(content: string | null): string | null {
    if (content === null) {
      return null;
    }

    const line = content
      .split(/\r?\n/)
      .map(candidate => candidate.trim())
      .find(candidate => candidate !== '' && !candidate.startsWith('#'));
    return line ?? null;
  }

  private static majorOf(record: InstalledVersion): string | null {
    if (!isDefaultVersion(record.identifier)) {
      return record.identifier.version.split('.')[0];
    }
    return record.fullVersion ? record.fullVersion.split('.')[0] : null;
  }
}
