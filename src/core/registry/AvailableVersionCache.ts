import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { AvailableVersion, formulaToIdentifier } from '../../types/Version';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';

export const CACHE_FILE_NAME = 'available_versions.cache';
export const CACHE_MAX_AGE_MS = 60 * 60 * 1000;

export interface AvailableVersionSnapshot {
  fetchedAt: Date;
  versions: AvailableVersion[];
}

interface CacheFileEntry {
  version: string;
  formula: string;
  installed: boolean;
}

interface CacheFile {
  fetchedAt: string;
  versions: CacheFileEntry[];
}

export interface AvailableVersionCacheOptions {
  directory: string;
  maxAgeMs?: number;
  now?: () => Date;
}

const log = logger.child('cache');

/**
 * On-disk snapshot of the last successful registry search.
 */
export class AvailableVersionCache {
  private readonly filePath: string;
  private readonly maxAgeMs: number;
  private readonly now: () => Date;

  constructor(options: AvailableVersionCacheOptions) {
    this.filePath = path.join(options.directory, CACHE_FILE_NAME);
    this.maxAgeMs = options.maxAgeMs ?? CACHE_MAX_AGE_MS;
    this.now = options.now ?? (() => new Date());
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * The stored snapshot whatever its age, or null when there is none or it
   * cannot be read back.
   */
  async read(): Promise<AvailableVersionSnapshot | null> {
    let content: string | null;
    try {
      content = await FileSystem.readTextFile(this.filePath);
    } catch (error) {
      log.debug(`Ignoring unreadable cache ${this.filePath}`, error);
      return null;
    }

    if (content === null) {
      return null;
    }

    try {
      return AvailableVersionCache.decode(yaml.parse(content));
    } catch (error) {
      log.debug(`Ignoring corrupt cache ${this.filePath}`, error);
      return null;
    }
  }

  async write(snapshot: AvailableVersionSnapshot): Promise<void> {
    const file: CacheFile = {
      fetchedAt: snapshot.fetchedAt.toISOString(),
      versions: snapshot.versions.map(entry => ({
        version: entry.identifier.version,
        formula: entry.identifier.formula,
        installed: entry.installed,
      })),
    };

    await FileSystem.writeTextFileAtomic(this.filePath, yaml.stringify(file, { indent: 2 }));
    log.debug(`Cached ${file.versions.length} available versions in ${this.filePath}`);
  }

  /**
   * Returns false when there was no cache to remove.
   */
  async clear(): Promise<boolean> {
    if (!(await fs.pathExists(this.filePath))) {
      return false;
    }
    await FileSystem.deleteFile(this.filePath);
    return true;
  }

  isFresh(snapshot: AvailableVersionSnapshot): boolean {
    const age = this.now().getTime() - snapshot.fetchedAt.getTime();
    return age >= 0 && age < this.maxAgeMs;
  }

  private static decode(value: unknown): AvailableVersionSnapshot | null {
    if (!AvailableVersionCache.isCacheFile(value)) {
      return null;
    }

    const fetchedAt = new Date(value.fetchedAt);
    if (Number.isNaN(fetchedAt.getTime())) {
      return null;
    }

    const versions: AvailableVersion[] = [];
    for (const entry of value.versions) {
      const identifier = formulaToIdentifier(entry.formula);
      if (identifier && identifier.version === entry.version) {
        versions.push({ identifier, installed: entry.installed });
      }
    }

    return { fetchedAt, versions };
  }

  private static isCacheFile(value: unknown): value is CacheFile {
    if (typeof value !== 'object' || value === null) {
      return false;
    }

    const file: { fetchedAt?: unknown; versions?: unknown } = value;
    return (
      typeof file.fetchedAt === 'string' &&
      Array.isArray(file.versions) &&
      file.versions.every(
        (entry: unknown) =>
          typeof entry === 'object' &&
          entry !== null &&
          'version' in entry &&
          typeof entry.version === 'string' &&
          'formula' in entry &&
          typeof entry.formula === 'string' &&
          'installed' in entry &&
          typeof entry.installed === 'boolean'
      )
    );
  }
}
