import { ProjectPin, ProjectVersionLocator } from './ProjectVersionLocator';
import { RegistryClient } from './registry/RegistryClient';
import { SwitchOrchestrator } from './SwitchOrchestrator';
import { VersionResolver } from './VersionResolver';
import { ToolConfig } from '../types/Config';
import { VersionNotInstalledError } from '../types/Errors';
import { SwitchOptions, SwitchResult } from '../types/Switch';
import { VersionIdentifier, formatIdentifier } from '../types/Version';
import { logger } from '../utils/Logger';

export interface ProjectSwitcherOptions {
  config: Pick<ToolConfig, 'autoSwitch'>;
  registry: RegistryClient;
  resolver: VersionResolver;
  orchestrator: SwitchOrchestrator;
}

export interface PinnedTarget {
  pin: ProjectPin;
  target: VersionIdentifier;
}

export type ProjectSwitchOutcome =
  | { kind: 'disabled' }
  | { kind: 'no-pin' }
  | ({ kind: 'current' } & PinnedTarget)
  | ({ kind: 'switched'; result: SwitchResult } & PinnedTarget);

export interface ProjectSwitchOptions extends SwitchOptions {
  /**
   * Directory-change mode: does nothing unless AUTO_SWITCH_PHP_VERSION is on,
   * and leaves an already linked pin alone.
   */
  auto?: boolean;
}

const log = logger.child('project');

/**
 * Applies the version pinned for a directory, for `phpswitch project` and
 * the shell's directory-change hook.
 */
export class ProjectSwitcher {
  private readonly config: Pick<ToolConfig, 'autoSwitch'>;
  private readonly registry: RegistryClient;
  private readonly resolver: VersionResolver;
  private readonly orchestrator: SwitchOrchestrator;

  constructor(options: ProjectSwitcherOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.orchestrator = options.orchestrator;
  }

  /**
   * The nearest pin and the identifier it stands for, or null without a pin.
   * Throws when the pin is malformed or names a major with nothing installed.
   */
  async resolve(cwd: string, installIfMissing = false): Promise<PinnedTarget | null> {
    const pin = await ProjectVersionLocator.findProjectVersion(cwd);
    if (!pin) {
      return null;
    }

    const target = ProjectVersionLocator.resolvePinnedVersion(pin.version, await this.registry.listInstalled(), {
      installIfMissing,
    });
    if (!target) {
      throw new VersionNotInstalledError(`${pin.version}.x`);
    }

    return { pin, target };
  }

  async run(cwd: string, options: ProjectSwitchOptions = {}): Promise<ProjectSwitchOutcome> {
    const { auto = false, ...switchOptions } = options;

    if (auto && !this.config.autoSwitch) {
      log.debug('Auto-switching is disabled');
      return { kind: 'disabled' };
    }

    const pinned = await this.resolve(cwd, switchOptions.installIfMissing ?? false);
    if (!pinned) {
      return { kind: 'no-pin' };
    }

    if (auto && (await this.isLinked(pinned.target))) {
      log.debug(`${formatIdentifier(pinned.target)} is already linked`);
      return { kind: 'current', ...pinned };
    }

    const result = await this.orchestrator.switchTo(formatIdentifier(pinned.target), switchOptions);
    return { kind: 'switched', ...pinned, result };
  }

  private async isLinked(target: VersionIdentifier): Promise<boolean> {
    const linked = await this.resolver.getLinkedVersion();
    if (!linked) {
      return false;
    }

    const record = this.registry.findInstalled(target, await this.registry.listInstalled());
    return record !== null && record.formula === linked.formula;
  }
}
