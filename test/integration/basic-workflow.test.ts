import { ConfigManager } from '../../src/core/ConfigManager';
import { PhpSwitchContext, createContext } from '../../src/core/createContext';
import { ProjectVersionLocator } from '../../src/core/ProjectVersionLocator';
import { BLOCK_START_MARKER } from '../../src/types/Shell';
import { formatIdentifier } from '../../src/types/Version';
import { FakeHomebrew } from '../helpers/FakeHomebrew';
import { createClock, createTempDir, cleanupTempDir } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('Basic Workflow Integration Tests', () => {
  let tempDir: string;
  let homeDir: string;
  let brew: FakeHomebrew;
  let clock: ReturnType<typeof createClock>;
  let context: PhpSwitchContext;

  const installedFormulae = async () =>
    (await context.registry.listInstalled()).map(record => `${record.formula}${record.linked ? '*' : ''}`);

  beforeEach(async () => {
    tempDir = await createTempDir();
    homeDir = path.join(tempDir, 'home');
    await fs.ensureDir(homeDir);
    await fs.writeFile(path.join(homeDir, '.zshrc'), 'alias ll="ls -la"\n');
    await fs.writeFile(path.join(homeDir, '.phpswitch.conf'), 'MAX_BACKUPS=2\nAUTO_RESTART_PHP_FPM=true\n');

    brew = new FakeHomebrew(path.join(tempDir, 'homebrew'));
    await brew.addFormula('php@7.4', '7.4.33', 'started');
    await brew.addFormula('php@8.1', '8.1.29');
    await brew.linkFormula('php@7.4');
    brew.registry.set('php@8.3', '8.3.4');
    brew.registry.set('php', '8.4.1');

    clock = createClock();
    context = createContext({
      config: await new ConfigManager({ homeDir }).load(),
      runner: brew,
      prefix: brew.prefix,
      homeDir,
      env: { PATH: brew.binPath },
      shell: 'zsh',
      now: clock.now,
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should list, install through a project pin, switch and uninstall', async () => {
    expect(context.config.maxBackups).toBe(2);
    expect(await installedFormulae()).toEqual(['php@7.4*', 'php@8.1']);

    const available = await context.registry.listAvailable();
    expect(available.source).toBe('registry');
    expect(available.versions.map(entry => [formatIdentifier(entry.identifier), entry.installed])).toEqual([
      ['php@7.4', true],
      ['php@8.1', true],
      ['php@8.3', false],
      ['php@default', false],
    ]);
    expect((await context.registry.listAvailable()).source).toBe('cache');
    expect(brew.searchCount).toBe(1);

    const projectDir = path.join(tempDir, 'site');
    await fs.ensureDir(path.join(projectDir, 'public'));
    await ProjectVersionLocator.writeProjectVersion(projectDir, { version: '8.3', formula: 'php@8.3' });

    const pin = await ProjectVersionLocator.findProjectVersion(path.join(projectDir, 'public'));
    expect(pin?.version).toBe('8.3');
    const pinned = ProjectVersionLocator.resolvePinnedVersion(pin?.version ?? '', await context.registry.listInstalled());
    expect(pinned).toEqual({ version: '8.3', formula: 'php@8.3' });

    const first = await context.orchestrator.switchTo(pinned ? formatIdentifier(pinned) : '', {
      installIfMissing: true,
    });
    expect(first.succeeded).toBe(true);
    expect(first.installed).toBe(true);
    expect(first.activeVersion).toEqual({ version: '8.3', formula: 'php@8.3' });
    expect(brew.services.get('php@7.4')).toBe('stopped');
    expect(brew.services.get('php@8.3')).toBe('started');

    clock.advance(60_000);
    expect(await installedFormulae()).toEqual(['php@7.4', 'php@8.1', 'php@8.3*']);

    expect((await context.orchestrator.switchTo('7.4')).succeeded).toBe(true);
    clock.advance(60_000);
    expect((await context.orchestrator.switchTo('php@8.3')).succeeded).toBe(true);

    const zshrc = await fs.readFile(path.join(homeDir, '.zshrc'), 'utf8');
    expect(zshrc.startsWith('alias ll="ls -la"\n\n')).toBe(true);
    expect(zshrc.split(BLOCK_START_MARKER)).toHaveLength(2);
    expect(zshrc).toContain('# php@8.3\n');

    const backups = (await fs.readdir(homeDir)).filter(name => name.startsWith('.zshrc.bak.')).sort();
    expect(backups).toEqual(['.zshrc.bak.20260301090100000', '.zshrc.bak.20260301090200000']);

    const removed = await context.orchestrator.uninstall('7.4');
    expect(removed.succeeded).toBe(true);
    expect(removed.warnings).toEqual([]);

    clock.advance(60_000);
    expect(await installedFormulae()).toEqual(['php@8.1', 'php@8.3*']);
    expect(await brew.linkedFormula()).toBe('php@8.3');
  });

  it('should keep the previous version linked when a switch is rejected', async () => {
    const before = await fs.readFile(path.join(homeDir, '.zshrc'), 'utf8');

    const result = await context.orchestrator.switchTo('8.3');

    expect(result.succeeded).toBe(false);
    expect(result.errors.map(error => error.code)).toEqual(['VersionNotInstalled']);
    expect(await brew.linkedFormula()).toBe('php@7.4');
    expect(await fs.readFile(path.join(homeDir, '.zshrc'), 'utf8')).toBe(before);
  });
});
