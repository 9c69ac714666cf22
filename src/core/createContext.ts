import { HomebrewClient } from './brew/HomebrewClient';
import { ProjectSwitcher } from './ProjectSwitcher';
import { AvailableVersionCache } from './registry/AvailableVersionCache';
import { RegistryClient } from './registry/RegistryClient';
import { ServiceManager } from './service/ServiceManager';
import { BackupManager } from './shell/BackupManager';
import { ShellConfigSynchronizer } from './shell/ShellConfigSynchronizer';
import { SwitchOrchestrator } from './SwitchOrchestrator';
import { VersionResolver } from './VersionResolver';
import { ToolConfig } from '../types/Config';
import { ShellKind } from '../types/Shell';
import { CommandRunner } from '../utils/ProcessUtils';

export interface ContextOptions {
  config: ToolConfig;
  runner?: CommandRunner;
  prefix?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  shell?: ShellKind;
  now?: () => Date;
}

export interface PhpSwitchContext {
  config: ToolConfig;
  brew: HomebrewClient;
  registry: RegistryClient;
  resolver: VersionResolver;
  shell: ShellConfigSynchronizer;
  services: ServiceManager;
  orchestrator: SwitchOrchestrator;
  projects: ProjectSwitcher;
}

/**
 * Wires every component for one invocation from a loaded configuration.
 */
export function createContext(options: ContextOptions): PhpSwitchContext {
  const { config, env, now } = options;

  const brew = new HomebrewClient({
    ...(options.runner && { runner: options.runner }),
    ...(options.prefix !== undefined && { prefix: options.prefix }),
  });
  const cache = new AvailableVersionCache({
    directory: config.cacheDirectory,
    ...(now && { now }),
  });
  const registry = new RegistryClient({ brew, cache, ...(now && { now }) });
  const resolver = new VersionResolver({ brew, ...(env && { env }) });
  const shell = new ShellConfigSynchronizer({
    config,
    backups: new BackupManager(now ? { now } : {}),
    ...(options.homeDir !== undefined && { homeDir: options.homeDir }),
    ...(env && { env }),
    ...(options.shell && { shell: options.shell }),
  });
  const services = new ServiceManager({ brew, config });
  const orchestrator = new SwitchOrchestrator({ brew, registry, resolver, shell, services });

  const projects = new ProjectSwitcher({ config, registry, resolver, orchestrator });

  return { config, brew, registry, resolver, shell, services, orchestrator, projects };
}
