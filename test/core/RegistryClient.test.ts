import { HomebrewClient } from '../../src/core/brew/HomebrewClient';
import { AvailableVersionCache } from '../../src/core/registry/AvailableVersionCache';
import { RegistryClient } from '../../src/core/registry/RegistryClient';
import { RegistryTimedOutError, RegistryUnavailableError } from '../../src/types/Errors';
import { parseVersionIdentifier } from '../../src/types/Version';
import { FakeHomebrew } from '../helpers/FakeHomebrew';
import { createClock, createTempDir, cleanupTempDir } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('RegistryClient', () => {
  let tempDir: string;
  let brew: FakeHomebrew;
  let clock: ReturnType<typeof createClock>;
  let cache: AvailableVersionCache;
  let registry: RegistryClient;

  beforeEach(async () => {
    tempDir = await createTempDir();
    brew = new FakeHomebrew(path.join(tempDir, 'homebrew'));
    clock = createClock();
    cache = new AvailableVersionCache({ directory: path.join(tempDir, 'cache'), now: clock.now });
    registry = new RegistryClient({
      brew: new HomebrewClient({ runner: brew, prefix: brew.prefix }),
      cache,
      now: clock.now,
    });

    await brew.addFormula('php@7.4', '7.4.33');
    await brew.addFormula('php@8.1', '8.1.29');
    await brew.linkFormula('php@8.1');
    brew.registry.set('php@8.3', '8.3.4');
    brew.registry.set('php', '8.4.1');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  const formulae = (versions: Array<{ identifier: { formula: string }; installed: boolean }>) =>
    versions.map(entry => `${entry.identifier.formula}:${entry.installed ? 'installed' : 'available'}`);

  describe('listInstalled', () => {
    it('should report install paths, full versions and the linked formula', async () => {
      const installed = await registry.listInstalled();

      expect(installed).toEqual([
        {
          identifier: { version: '7.4', formula: 'php@7.4' },
          formula: 'php@7.4',
          installPath: path.join(brew.prefix, 'opt', 'php@7.4'),
          linked: false,
          fullVersion: '7.4.33',
        },
        {
          identifier: { version: '8.1', formula: 'php@8.1' },
          formula: 'php@8.1',
          installPath: path.join(brew.prefix, 'opt', 'php@8.1'),
          linked: true,
          fullVersion: '8.1.29',
        },
      ]);
    });

    it('should reuse one listing for a few seconds until invalidated', async () => {
      await registry.listInstalled();
      await registry.listInstalled();
      expect(brew.brewCalls().filter(call => call.startsWith('list'))).toHaveLength(1);

      registry.invalidateInstalled();
      await registry.listInstalled();
      clock.advance(10_000);
      await registry.listInstalled();
      expect(brew.brewCalls().filter(call => call.startsWith('list'))).toHaveLength(3);
    });

    it('should distinguish a timeout from a hard failure', async () => {
      brew.failures.list = 'timeout';
      await expect(registry.listInstalled()).rejects.toBeInstanceOf(RegistryTimedOutError);

      brew.failures.list = 'error';
      const error = await registry.listInstalled().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(RegistryUnavailableError);
      expect(error).not.toBeInstanceOf(RegistryTimedOutError);
    });
  });

  describe('listAvailable', () => {
    it('should merge search results with the installed set, sorted with default last', async () => {
      const listing = await registry.listAvailable();

      expect(listing.source).toBe('registry');
      expect(listing.stale).toBe(false);
      expect(formulae(listing.versions)).toEqual([
        'php@7.4:installed',
        'php@8.1:installed',
        'php@8.3:available',
        'php:available',
      ]);
    });

    it('should call the registry once for two lookups within the expiry window', async () => {
      await registry.listAvailable(true);
      clock.advance(59 * 60 * 1000);
      const second = await registry.listAvailable(true);

      expect(brew.searchCount).toBe(1);
      expect(second.source).toBe('cache');
      expect(formulae(second.versions)).toContain('php@8.3:available');
    });

    it('should search again once the cache is an hour old', async () => {
      await registry.listAvailable(true);
      clock.advance(60 * 60 * 1000);
      await registry.listAvailable(true);

      expect(brew.searchCount).toBe(2);
    });

    it('should bypass a fresh cache when useCache is false', async () => {
      await registry.listAvailable(true);
      await registry.listAvailable(false);

      expect(brew.searchCount).toBe(2);
    });

    it('should fall back to a stale cache when the search fails', async () => {
      const first = await registry.listAvailable(true);
      clock.advance(3 * 60 * 60 * 1000);
      brew.failures.search = 'error';

      const fallback = await registry.listAvailable(true);

      expect(fallback.stale).toBe(true);
      expect(fallback.source).toBe('cache');
      expect(fallback.fetchedAt).toEqual(first.fetchedAt);
      expect(formulae(fallback.versions)).toEqual(formulae(first.versions));
    });

    it('should fail with RegistryUnavailable when the search fails and no cache exists', async () => {
      brew.failures.search = 'timeout';

      const error = await registry.listAvailable(true).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RegistryUnavailableError);
      expect(error).toMatchObject({ code: 'RegistryTimedOut' });
    });

    it('should ignore a corrupt cache file', async () => {
      await fs.ensureDir(path.dirname(cache.getPath()));
      await fs.writeFile(cache.getPath(), 'fetchedAt: [not, a, date\n');

      const listing = await registry.listAvailable(true);

      expect(listing.source).toBe('registry');
      expect(brew.searchCount).toBe(1);
    });
  });

  describe('startAvailableLookup', () => {
    it('should settle to a failure value instead of rejecting', async () => {
      brew.failures.search = 'error';

      const lookup = await registry.startAvailableLookup(true);

      expect(lookup.ok).toBe(false);
      if (!lookup.ok) {
        expect(lookup.error.code).toBe('RegistryUnavailable');
        expect(lookup.error.hint).toBe(
          'Check that Homebrew works (`brew doctor`), then run `phpswitch cache refresh`'
        );
      }
    });

    it('should settle to the listing on success', async () => {
      const lookup = await registry.startAvailableLookup(false);

      expect(lookup.ok).toBe(true);
      if (lookup.ok) {
        expect(lookup.result.versions).toHaveLength(4);
      }
    });
  });

  describe('cache maintenance', () => {
    it('clearCache should remove the file and report whether there was one', async () => {
      await registry.listAvailable();

      expect(await registry.clearCache()).toBe(true);
      expect(await fs.pathExists(cache.getPath())).toBe(false);
      expect(await registry.clearCache()).toBe(false);
    });

    it('refreshCache should search even with a fresh cache and never mask failures', async () => {
      await registry.listAvailable();
      brew.registry.set('php@8.4', '8.4.1');

      const refreshed = await registry.refreshCache();
      expect(formulae(refreshed.versions)).toContain('php@8.4:available');
      expect(brew.searchCount).toBe(2);

      brew.failures.search = 'error';
      await expect(registry.refreshCache()).rejects.toBeInstanceOf(RegistryUnavailableError);
    });

    it('recordInstalled should update flags in place without refreshing the cache age', async () => {
      await registry.listAvailable();
      clock.advance(10 * 60 * 1000);

      await registry.recordInstalled('php@8.3', true);
      await registry.recordInstalled('php@7.4', false);
      await registry.recordInstalled('php@8.0', true);

      const listing = await registry.listAvailable(true);
      expect(listing.source).toBe('cache');
      expect(listing.fetchedAt).toEqual(new Date('2026-03-01T09:00:00.000Z'));
      expect(formulae(listing.versions)).toEqual([
        'php@7.4:available',
        'php@8.0:installed',
        'php@8.1:installed',
        'php@8.3:installed',
        'php:available',
      ]);
      expect(brew.searchCount).toBe(1);
    });

    it('recordInstalled should not create a cache that does not exist', async () => {
      await registry.recordInstalled('php@8.3', true);

      expect(await fs.pathExists(cache.getPath())).toBe(false);
    });

    it('should persist identifiers and installed flags as YAML', async () => {
      await registry.listAvailable();

      const content = await fs.readFile(cache.getPath(), 'utf8');
      expect(content).toContain('fetchedAt: 2026-03-01T09:00:00.000Z');
      expect(content).toContain('formula: php@8.3');

      const reread = await cache.read();
      expect(reread && formulae(reread.versions)).toEqual([
        'php@7.4:installed',
        'php@8.1:installed',
        'php@8.3:available',
        'php:available',
      ]);
    });
  });

  describe('findInstalled', () => {
    it('should match by canonical formula', async () => {
      const installed = await registry.listInstalled();

      expect(registry.findInstalled(parseVersionIdentifier('7.4'), installed)?.formula).toBe('php@7.4');
      expect(registry.findInstalled(parseVersionIdentifier('8.2'), installed)).toBeNull();
      expect(registry.findInstalled(parseVersionIdentifier('default'), installed)).toBeNull();
    });

    it('should resolve a versioned request to the unsuffixed formula of the same version', async () => {
      await brew.addFormula('php', '8.4.1');
      registry.invalidateInstalled();
      const installed = await registry.listInstalled();

      const record = registry.findInstalled(parseVersionIdentifier('8.4'), installed);

      expect(record?.formula).toBe('php');
      expect(record?.identifier).toEqual({ version: 'default', formula: 'php' });
    });
  });
});
