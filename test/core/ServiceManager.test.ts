import { HomebrewClient } from '../../src/core/brew/HomebrewClient';
import { ServiceManager } from '../../src/core/service/ServiceManager';
import { ServiceOperationFailedError, ServiceOperationTimedOutError } from '../../src/types/Errors';
import { DEFAULT_VERSION, parseVersionIdentifier } from '../../src/types/Version';
import { FakeHomebrew } from '../helpers/FakeHomebrew';
import { createTempDir, cleanupTempDir } from '../setup';
import * as path from 'path';

describe('ServiceManager', () => {
  let tempDir: string;
  let brew: FakeHomebrew;

  const managerWith = (autoRestartService: boolean) =>
    new ServiceManager({
      brew: new HomebrewClient({ runner: brew, prefix: brew.prefix, timeouts: { service: 2000 } }),
      config: { autoRestartService },
    });

  beforeEach(async () => {
    tempDir = await createTempDir();
    brew = new FakeHomebrew(path.join(tempDir, 'homebrew'));
    await brew.addFormula('php@7.4', '7.4.33', 'started');
    await brew.addFormula('php@8.1', '8.1.29', 'started');
    await brew.addFormula('php@8.2', '8.2.12', 'stopped');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('serviceNameFor should use the formula, or php for the default version', () => {
    const manager = managerWith(true);
    expect(manager.serviceNameFor(parseVersionIdentifier('8.1'))).toBe('php@8.1');
    expect(manager.serviceNameFor(DEFAULT_VERSION)).toBe('php');
  });

  describe('stopOthers', () => {
    it('should stop every running service except the kept one', async () => {
      const report = await managerWith(true).stopOthers(parseVersionIdentifier('8.1'));

      expect(report.succeeded).toBe(true);
      expect(report.operations).toEqual([{ service: 'php@7.4', action: 'stop', succeeded: true }]);
      expect(brew.services.get('php@7.4')).toBe('stopped');
      expect(brew.services.get('php@8.1')).toBe('started');
    });

    it('should report a timeout as a warning', async () => {
      brew.failures.serviceTimeouts.add('php@7.4');

      const report = await managerWith(true).stopOthers(parseVersionIdentifier('8.2'));

      expect(report.succeeded).toBe(false);
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]).toBeInstanceOf(ServiceOperationTimedOutError);
      expect(report.warnings[0].message).toBe('`brew services stop php@7.4` timed out after 2s');
      expect(brew.services.get('php@8.1')).toBe('stopped');
    });
  });

  describe('restart', () => {
    it('should tolerate a service that was not running', async () => {
      const report = await managerWith(true).restart(parseVersionIdentifier('8.2'));

      expect(report.operations).toEqual([
        { service: 'php@8.2', action: 'stop', succeeded: true, skipped: true },
        { service: 'php@8.2', action: 'start', succeeded: true },
      ]);
      expect(report.succeeded).toBe(true);
      expect(brew.services.get('php@8.2')).toBe('started');
    });

    it('should be a successful no-op when auto-restart is disabled', async () => {
      const report = await managerWith(false).restart(parseVersionIdentifier('8.2'));

      expect(report).toEqual({ succeeded: true, skipped: true, operations: [], warnings: [] });
      expect(brew.mutations).toHaveLength(0);
    });

    it('should surface other failures as ServiceOperationFailed', async () => {
      const report = await managerWith(true).restart(parseVersionIdentifier('5.6'));

      expect(report.succeeded).toBe(false);
      expect(report.warnings.map(warning => warning.constructor)).toEqual([
        ServiceOperationFailedError,
        ServiceOperationFailedError,
      ]);
      expect(report.warnings[1].message).toBe(
        '`brew services start php@5.6` failed: Error: Formula `php@5.6` is not installed.'
      );
    });
  });

  describe('reconcile', () => {
    it('should leave only the target service running', async () => {
      const report = await managerWith(true).reconcile(parseVersionIdentifier('8.2'));

      expect(report.succeeded).toBe(true);
      expect([...brew.services.entries()]).toEqual([
        ['php@7.4', 'stopped'],
        ['php@8.1', 'stopped'],
        ['php@8.2', 'started'],
      ]);
    });

    it('should touch nothing when auto-restart is disabled', async () => {
      const report = await managerWith(false).reconcile(parseVersionIdentifier('8.2'));

      expect(report.skipped).toBe(true);
      expect(brew.calls).toHaveLength(0);
    });
  });
});
