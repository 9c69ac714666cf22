import { HomebrewClient } from '../brew/HomebrewClient';
import {
  PhpSwitchError,
  RegistryUnavailableError,
  errorMessage,
  isPhpSwitchError,
} from '../../types/Errors';
import {
  AvailableVersion,
  InstalledVersion,
  VersionIdentifier,
  compareIdentifiers,
  formulaToIdentifier,
  isDefaultVersion,
  toMajorMinor,
} from '../../types/Version';
import { logger } from '../../utils/Logger';
import { AvailableVersionCache, AvailableVersionSnapshot } from './AvailableVersionCache';

export interface AvailableListing {
  versions: AvailableVersion[];
  /** True when the registry could not be reached and an old cache was used */
  stale: boolean;
  source: 'cache' | 'registry';
  fetchedAt: Date;
}

export type AvailableLookup =
  | { ok: true; result: AvailableListing }
  | { ok: false; error: PhpSwitchError };

export interface RegistryClientOptions {
  brew: HomebrewClient;
  cache: AvailableVersionCache;
  now?: () => Date;
  /** How long an installed-versions listing is reused within one process */
  installedTtlMs?: number;
}

const INSTALLED_TTL_MS = 5000;

const log = logger.child('registry');

export class RegistryClient {
  private readonly brew: HomebrewClient;
  private readonly cache: AvailableVersionCache;
  private readonly now: () => Date;
  private readonly installedTtlMs: number;
  private installed: { at: number; promise: Promise<InstalledVersion[]> } | null = null;

  constructor(options: RegistryClientOptions) {
    this.brew = options.brew;
    this.cache = options.cache;
    this.now = options.now ?? (() => new Date());
    this.installedTtlMs = options.installedTtlMs ?? INSTALLED_TTL_MS;
  }

  /**
   * Installed php formulae, ascending, the unsuffixed formula last.
   */
  async listInstalled(): Promise<InstalledVersion[]> {
    const at = this.now().getTime();
    if (this.installed && at - this.installed.at < this.installedTtlMs) {
      return this.installed.promise;
    }

    const promise = this.queryInstalled();
    this.installed = { at, promise };

    try {
      return await promise;
    } catch (error) {
      if (this.installed?.promise === promise) {
        this.installed = null;
      }
      throw error;
    }
  }

  /**
   * Forgets the memoised installed listing; called after install, uninstall
   * and link changes.
   */
  invalidateInstalled(): void {
    this.installed = null;
  }

  /**
   * Available versions tagged installed/not installed. A fresh cache answers
   * without touching Homebrew; a failed search falls back to any cache at all.
   */
  async listAvailable(useCache = true): Promise<AvailableListing> {
    const cached = await this.cache.read();

    if (useCache && cached && this.cache.isFresh(cached)) {
      log.debug(`Using cached available versions from ${cached.fetchedAt.toISOString()}`);
      return { ...cached, stale: false, source: 'cache' };
    }

    try {
      const snapshot = await this.fetchFromRegistry();
      return { ...snapshot, stale: false, source: 'registry' };
    } catch (error) {
      if (cached) {
        log.warn(`Registry search failed, showing versions cached at ${cached.fetchedAt.toISOString()}`);
        log.debug('Registry failure', error);
        return { ...cached, stale: true, source: 'cache' };
      }
      throw RegistryClient.asRegistryError(error);
    }
  }

  /**
   * Starts `listAvailable` without waiting for it. The returned promise never
   * rejects, so it can be awaited later without an unhandled rejection.
   */
  startAvailableLookup(useCache = true): Promise<AvailableLookup> {
    return this.listAvailable(useCache).then(
      (result): AvailableLookup => ({ ok: true, result }),
      (error: unknown): AvailableLookup => ({ ok: false, error: RegistryClient.asRegistryError(error) })
    );
  }

  /**
   * Flips the installed flag of `formula` in the stored snapshot without
   * changing its age, so a fresh cache stays accurate after this tool
   * installs or removes a version. Does nothing when there is no cache.
   */
  async recordInstalled(formula: string, installed: boolean): Promise<void> {
    const identifier = formulaToIdentifier(formula);
    const cached = await this.cache.read();
    if (!identifier || !cached) {
      return;
    }

    const known = cached.versions.some(entry => entry.identifier.formula === formula);
    if (!known && !installed) {
      return;
    }

    const versions = known
      ? cached.versions.map(entry => (entry.identifier.formula === formula ? { ...entry, installed } : entry))
      : [...cached.versions, { identifier, installed }].sort((a, b) =>
          compareIdentifiers(a.identifier, b.identifier)
        );

    try {
      await this.cache.write({ fetchedAt: cached.fetchedAt, versions });
    } catch (error) {
      log.warn(`Could not update ${this.cache.getPath()}: ${errorMessage(error)}`);
    }
  }

  async clearCache(): Promise<boolean> {
    return this.cache.clear();
  }

  /**
   * Searches the registry and rewrites the cache; unlike `listAvailable` a
   * failure is never masked by old data.
   */
  async refreshCache(): Promise<AvailableListing> {
    try {
      const snapshot = await this.fetchFromRegistry();
      return { ...snapshot, stale: false, source: 'registry' };
    } catch (error) {
      throw RegistryClient.asRegistryError(error);
    }
  }

  getCachePath(): string {
    return this.cache.getPath();
  }

  /**
   * The installed record for `identifier`. A versioned request whose own
   * formula is missing matches the unsuffixed formula when that one currently
   * provides the same major.minor.
   */
  findInstalled(identifier: VersionIdentifier, installed: InstalledVersion[]): InstalledVersion | null {
    const exact = installed.find(record => record.formula === identifier.formula);
    if (exact) {
      return exact;
    }

    if (isDefaultVersion(identifier)) {
      return null;
    }

    const unsuffixed = installed.find(record => isDefaultVersion(record.identifier));
    if (unsuffixed?.fullVersion && toMajorMinor(unsuffixed.fullVersion) === identifier.version) {
      log.debug(`${identifier.formula} is provided by the unsuffixed ${unsuffixed.formula} formula`);
      return unsuffixed;
    }

    return null;
  }

  private async queryInstalled(): Promise<InstalledVersion[]> {
    const [formulae, linked] = await Promise.all([
      this.brew.listInstalledFormulae(),
      this.brew.getLinkedFormula(),
    ]);

    const records: InstalledVersion[] = [];
    for (const entry of formulae) {
      const identifier = formulaToIdentifier(entry.formula);
      if (!identifier) {
        continue;
      }

      records.push({
        identifier,
        formula: entry.formula,
        installPath: await this.brew.optPath(entry.formula),
        linked: entry.formula === linked,
        ...(entry.version !== undefined && { fullVersion: entry.version }),
      });
    }

    return records.sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
  }

  private async fetchFromRegistry(): Promise<AvailableVersionSnapshot> {
    const [formulae, installed] = await Promise.all([
      this.brew.searchFormulae(),
      this.listInstalled(),
    ]);

    const installedFormulae = new Set(installed.map(record => record.formula));
    const identifiers = new Map<string, VersionIdentifier>();
    for (const formula of [...formulae, ...installedFormulae]) {
      const identifier = formulaToIdentifier(formula);
      if (identifier) {
        identifiers.set(identifier.formula, identifier);
      }
    }

    const snapshot: AvailableVersionSnapshot = {
      fetchedAt: this.now(),
      versions: [...identifiers.values()]
        .sort(compareIdentifiers)
        .map(identifier => ({ identifier, installed: installedFormulae.has(identifier.formula) })),
    };

    try {
      await this.cache.write(snapshot);
    } catch (error) {
      log.warn(`Could not write ${this.cache.getPath()}: ${errorMessage(error)}`);
    }

    return snapshot;
  }

  private static asRegistryError(error: unknown): PhpSwitchError {
    return isPhpSwitchError(error) ? error : new RegistryUnavailableError(errorMessage(error));
  }
}
