import { HomebrewClient } from './brew/HomebrewClient';
import { RegistryClient } from './registry/RegistryClient';
import { ServiceManager } from './service/ServiceManager';
import { ShellConfigSynchronizer } from './shell/ShellConfigSynchronizer';
import { VersionResolver } from './VersionResolver';
import {
  InstallFailedError,
  LinkFailedError,
  PhpSwitchError,
  RegistryUnavailableError,
  UninstallFailedError,
  VersionNotInstalledError,
  errorMessage,
  isPhpSwitchError,
} from '../types/Errors';
import {
  OperationResult,
  SwitchOptions,
  SwitchResult,
  SwitchState,
  UninstallOptions,
  toIssue,
} from '../types/Switch';
import {
  InstalledVersion,
  formatIdentifier,
  parseVersionIdentifier,
  sameVersion,
} from '../types/Version';
import { ProcessResult } from '../utils/ProcessUtils';
import { logger } from '../utils/Logger';

export interface SwitchOrchestratorOptions {
  brew: HomebrewClient;
  registry: RegistryClient;
  resolver: VersionResolver;
  shell: ShellConfigSynchronizer;
  services: ServiceManager;
}

const log = logger.child('switch');

/**
 * Runs a version switch as a fixed sequence of stages. Stages after Linking
 * are not rolled back: a failure there is reported and the switch can simply
 * be run again.
 */
export class SwitchOrchestrator {
  private readonly brew: HomebrewClient;
  private readonly registry: RegistryClient;
  private readonly resolver: VersionResolver;
  private readonly shell: ShellConfigSynchronizer;
  private readonly services: ServiceManager;

  constructor(options: SwitchOrchestratorOptions) {
    this.brew = options.brew;
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.shell = options.shell;
    this.services = options.services;
  }

  async switchTo(requestedVersion: string, options: SwitchOptions = {}): Promise<SwitchResult> {
    const result: SwitchResult = {
      requestedVersion,
      target: null,
      succeeded: false,
      warnings: [],
      errors: [],
      transitions: [],
      alreadyLinked: false,
      installed: false,
      shell: null,
      service: null,
      activeVersion: null,
    };

    const enter = (state: SwitchState): void => {
      result.transitions.push(state);
      log.debug(`-> ${state}`);
      options.onStateChange?.(state);
    };

    const fail = (error: PhpSwitchError): SwitchResult => {
      result.errors.push(toIssue(error));
      enter('Failed');
      return result;
    };

    enter('Idle');
    enter('Validating');

    let record: InstalledVersion;
    let installed: InstalledVersion[];
    try {
      const identifier = parseVersionIdentifier(requestedVersion);
      installed = await this.registry.listInstalled();
      const found = this.registry.findInstalled(identifier, installed);

      if (found) {
        record = found;
      } else if (!options.installIfMissing) {
        return fail(new VersionNotInstalledError(identifier.version));
      } else {
        enter('Installing');
        await this.installFormula(identifier.formula);
        result.installed = true;

        installed = await this.registry.listInstalled();
        const afterInstall = this.registry.findInstalled(identifier, installed);
        if (!afterInstall) {
          return fail(new InstallFailedError(identifier.formula, 'formula not listed after installation'));
        }
        record = afterInstall;
      }
    } catch (error) {
      return fail(SwitchOrchestrator.asError(error));
    }

    const target = record.identifier;
    result.target = target;

    enter('Linking');
    if (record.linked) {
      log.debug(`${record.formula} is already linked`);
      result.alreadyLinked = true;
    } else {
      try {
        await this.link(record, installed);
      } catch (error) {
        return fail(SwitchOrchestrator.asError(error));
      }
    }

    enter('SyncingShell');
    const shell = await this.shell.updateConfig({
      identifier: target,
      binDirectories: await this.brew.binDirectories(record.formula),
    });
    result.shell = shell;
    if (shell.error) {
      result.errors.push(toIssue(shell.error));
    }

    enter('ReconcilingService');
    result.service = await this.services.reconcile(target);
    result.warnings.push(...result.service.warnings.map(toIssue));

    enter('Verifying');
    const active = await this.resolver.getActiveVersion();
    result.activeVersion = active.identifier;
    if (!active.identifier || !sameVersion(active.identifier, target)) {
      const observed = active.fullVersion
        ? `PHP ${active.fullVersion}${active.binary ? ` from ${active.binary.path}` : ''}`
        : 'no working php';
      result.warnings.push({
        code: 'PathInconsistency',
        message: `PATH still resolves to ${observed}, expected ${formatIdentifier(target)}`,
        hint: `Run \`${shell.activationCommand}\` or open a new terminal`,
      });
    }

    result.succeeded = result.errors.length === 0;
    enter(result.succeeded ? 'Done' : 'Failed');
    return result;
  }

  /**
   * Installs a version without switching to it.
   */
  async install(requestedVersion: string): Promise<OperationResult & { alreadyInstalled: boolean }> {
    const result = { ...SwitchOrchestrator.emptyResult(requestedVersion), alreadyInstalled: false };

    try {
      const identifier = parseVersionIdentifier(requestedVersion);
      result.target = identifier;

      const existing = this.registry.findInstalled(identifier, await this.registry.listInstalled());
      if (existing) {
        result.target = existing.identifier;
        result.alreadyInstalled = true;
        result.succeeded = true;
        return result;
      }

      await this.installFormula(identifier.formula);
      result.succeeded = true;
    } catch (error) {
      result.errors.push(toIssue(SwitchOrchestrator.asError(error)));
    }

    return result;
  }

  /**
   * Removes an installed version. The linked version is refused unless
   * `force` is set, in which case it is unlinked first.
   */
  async uninstall(requestedVersion: string, options: UninstallOptions = {}): Promise<OperationResult> {
    const result = SwitchOrchestrator.emptyResult(requestedVersion);

    try {
      const identifier = parseVersionIdentifier(requestedVersion);
      const record = (await this.registry.listInstalled()).find(
        candidate => candidate.formula === identifier.formula
      );
      if (!record) {
        throw new VersionNotInstalledError(identifier.version);
      }
      result.target = record.identifier;

      if (record.linked && !options.force) {
        throw new UninstallFailedError(
          record.formula,
          'currently linked',
          `Switch to another version first, or pass --force to uninstall ${formatIdentifier(record.identifier)} anyway`
        );
      }

      const stopped = await this.services.stop(record.identifier);
      if (stopped.error) {
        result.warnings.push(toIssue(stopped.error));
      }

      if (record.linked) {
        const unlinked = await this.brew.unlink(record.formula);
        if (unlinked.exitCode !== 0) {
          result.warnings.push({
            code: 'LinkFailed',
            message: `Could not unlink ${record.formula}: ${SwitchOrchestrator.detail(unlinked)}`,
          });
        }
      }

      const removed = await this.brew.uninstall(record.formula);
      this.registry.invalidateInstalled();
      if (removed.exitCode !== 0) {
        throw new UninstallFailedError(record.formula, SwitchOrchestrator.detail(removed));
      }
      await this.registry.recordInstalled(record.formula, false);

      result.succeeded = true;
    } catch (error) {
      result.errors.push(toIssue(SwitchOrchestrator.asError(error)));
    }

    return result;
  }

  private async installFormula(formula: string): Promise<void> {
    log.info(`Installing ${formula}, this can take several minutes`);
    const installed = await this.brew.install(formula);
    this.registry.invalidateInstalled();

    if (installed.exitCode !== 0) {
      throw new InstallFailedError(formula, SwitchOrchestrator.detail(installed));
    }
    await this.registry.recordInstalled(formula, true);
  }

  /**
   * Unlinks whatever php formula is linked, then links `record`: `--force`
   * first, `--overwrite` when that leaves conflicts.
   */
  private async link(record: InstalledVersion, installed: InstalledVersion[]): Promise<void> {
    for (const current of installed.filter(candidate => candidate.linked)) {
      const unlinked = await this.brew.unlink(current.formula);
      if (unlinked.exitCode !== 0) {
        log.warn(`Could not unlink ${current.formula}, linking over it`, SwitchOrchestrator.detail(unlinked));
      }
    }

    try {
      const forced = await this.brew.link(record.formula, 'force');
      if (forced.exitCode === 0) {
        return;
      }

      log.debug(`brew link --force ${record.formula} failed, retrying with --overwrite`);
      const overwritten = await this.brew.link(record.formula, 'overwrite');
      if (overwritten.exitCode !== 0) {
        throw new LinkFailedError(record.formula, SwitchOrchestrator.detail(overwritten));
      }
    } finally {
      this.registry.invalidateInstalled();
    }
  }

  private static detail(result: ProcessResult): string {
    if (result.timedOut) {
      return 'timed out';
    }
    return (result.stderr || result.stdout).split('\n').slice(-3).join(' ').trim();
  }

  private static asError(error: unknown): PhpSwitchError {
    return isPhpSwitchError(error) ? error : new RegistryUnavailableError(errorMessage(error));
  }

  private static emptyResult(requestedVersion: string): OperationResult {
    return { requestedVersion, target: null, succeeded: false, warnings: [], errors: [] };
  }
}
