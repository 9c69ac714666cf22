// src/core/brew/HomebrewClient.ts - every Homebrew invocation the switcher makes
import * as path from 'path';
import { CommandRunner, ProcessResult, ProcessUtils } from '../../utils/ProcessUtils';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';
import { RegistryTimedOutError, RegistryUnavailableError, errorMessage } from '../../types/Errors';
import { BrewService, ServiceStatus } from '../../types/Service';
import { FORMULA_FAMILY, isPhpFormula } from '../../types/Version';

export interface BrewTimeouts {
  query: number;
  search: number;
  link: number;
  install: number;
  service: number;
}

export const DEFAULT_BREW_TIMEOUTS: BrewTimeouts = {
  query: 15_000,
  search: 10_000,
  link: 60_000,
  install: 30 * 60_000,
  service: 30_000,
};

export interface HomebrewClientOptions {
  runner?: CommandRunner;
  /** Homebrew prefix; resolved via HOMEBREW_PREFIX or `brew --prefix` when absent */
  prefix?: string;
  timeouts?: Partial<BrewTimeouts>;
  brewCommand?: string;
}

export interface InstalledFormula {
  formula: string;
  version?: string;
}

interface BrewServiceJson {
  name?: unknown;
  status?: unknown;
  user?: unknown;
  file?: unknown;
}

const SERVICE_STATUSES: readonly ServiceStatus[] = [
  'started',
  'stopped',
  'none',
  'scheduled',
  'error',
  'unknown',
];

const log = logger.child('brew');

/**
 * Thin, typed wrapper over the `brew` CLI. Query methods throw
 * RegistryUnavailableError; mutating methods return the raw process result
 * so that callers can classify failures for their own stage.
 */
export class HomebrewClient {
  readonly timeouts: BrewTimeouts;
  private readonly runner: CommandRunner;
  private readonly brewCommand: string;
  private prefix: string | undefined;

  constructor(options: HomebrewClientOptions = {}) {
    this.runner = options.runner ?? ProcessUtils;
    this.prefix = options.prefix ?? process.env.HOMEBREW_PREFIX;
    this.timeouts = { ...DEFAULT_BREW_TIMEOUTS, ...options.timeouts };
    this.brewCommand = options.brewCommand ?? 'brew';
  }

  getRunner(): CommandRunner {
    return this.runner;
  }

  async getPrefix(): Promise<string> {
    if (this.prefix) {
      return this.prefix;
    }

    const result = await this.query(['--prefix'], this.timeouts.query);
    this.prefix = result.stdout.trim();
    return this.prefix;
  }

  async optPath(formula: string): Promise<string> {
    return path.join(await this.getPrefix(), 'opt', formula);
  }

  async binDirectories(formula: string): Promise<string[]> {
    const opt = await this.optPath(formula);
    return [path.join(opt, 'bin'), path.join(opt, 'sbin')];
  }

  /**
   * Installed formulae of the php family with their newest keg version.
   */
  async listInstalledFormulae(): Promise<InstalledFormula[]> {
    const result = await this.query(['list', '--formula', '--versions'], this.timeouts.query);

    return result.stdout
      .split('\n')
      .map(line => line.trim().split(/\s+/))
      .filter(([name]) => name !== undefined && isPhpFormula(name))
      .map(([formula, ...versions]) => {
        const version = versions[versions.length - 1];
        return version ? { formula, version } : { formula };
      });
  }

  /**
   * Searches the registry for the unsuffixed and the versioned php formulae.
   */
  async searchFormulae(): Promise<string[]> {
    const result = await this.query(
      ['search', `/^${FORMULA_FAMILY}(@[0-9]+\\.[0-9]+)?$/`],
      this.timeouts.search
    );

    const names = new Set<string>();
    for (const token of result.stdout.split(/\s+/)) {
      const name = token.replace(/^homebrew\/core\//, '');
      if (isPhpFormula(name)) {
        names.add(name);
      }
    }

    return [...names];
  }

  /**
   * The formula `<prefix>/bin/php` currently points into, or null when
   * nothing of the php family is linked.
   */
  async getLinkedFormula(): Promise<string | null> {
    const target = await FileSystem.readLink(path.join(await this.getPrefix(), 'bin', 'php'));
    if (!target) {
      return null;
    }

    const versioned = target.match(/php@(\d+\.\d+)/);
    if (versioned) {
      return `php@${versioned[1]}`;
    }

    if (/(^|\/)php\//.test(target)) {
      return FORMULA_FAMILY;
    }

    log.debug(`Link target ${target} does not belong to a php formula`);
    return null;
  }

  async link(formula: string, mode: 'force' | 'overwrite'): Promise<ProcessResult> {
    return this.mutate(['link', `--${mode}`, formula], this.timeouts.link);
  }

  async unlink(formula: string): Promise<ProcessResult> {
    return this.mutate(['unlink', formula], this.timeouts.link);
  }

  async install(formula: string): Promise<ProcessResult> {
    return this.mutate(['install', formula], this.timeouts.install);
  }

  async uninstall(formula: string): Promise<ProcessResult> {
    return this.mutate(['uninstall', formula], this.timeouts.install);
  }

  async listServices(): Promise<BrewService[]> {
    const result = await this.query(['services', 'list', '--json'], this.timeouts.service);
    const text = result.stdout.trim();
    if (!text) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new RegistryUnavailableError(
        `unreadable \`brew services list --json\` output (${errorMessage(error)})`
      );
    }

    if (!Array.isArray(parsed)) {
      return [];
    }

    return parsed
      .map((entry: unknown) => HomebrewClient.toService(entry))
      .filter((service): service is BrewService => service !== null && isPhpFormula(service.name));
  }

  async serviceAction(action: 'start' | 'stop', service: string): Promise<ProcessResult> {
    return this.mutate(['services', action, service], this.timeouts.service);
  }

  private async query(args: string[], timeout: number): Promise<ProcessResult> {
    const operation = ProcessUtils.describe(this.brewCommand, args);
    let result: ProcessResult;

    try {
      result = await this.runner.execute(this.brewCommand, args, { timeout });
    } catch (error) {
      throw new RegistryUnavailableError(errorMessage(error));
    }

    if (result.timedOut) {
      throw new RegistryTimedOutError(operation, timeout);
    }

    if (result.exitCode !== 0) {
      // `brew search` exits 1 when nothing matches
      if (args[0] === 'search' && !result.stderr) {
        return result;
      }
      throw new RegistryUnavailableError(
        `\`${operation}\` exited with ${result.exitCode}${result.stderr ? `: ${result.stderr}` : ''}`
      );
    }

    return result;
  }

  private async mutate(args: string[], timeout: number): Promise<ProcessResult> {
    const operation = ProcessUtils.describe(this.brewCommand, args);
    log.debug(`Running ${operation}`);

    try {
      const result = await this.runner.execute(this.brewCommand, args, { timeout });
      if (result.exitCode !== 0) {
        log.debug(`${operation} exited with ${result.exitCode}`, result.stderr || result.stdout);
      }
      return result;
    } catch (error) {
      return {
        stdout: '',
        stderr: errorMessage(error),
        exitCode: 127,
        timedOut: false,
      };
    }
  }

  private static toService(value: unknown): BrewService | null {
    if (typeof value !== 'object' || value === null) {
      return null;
    }

    const entry: BrewServiceJson = value;
    if (typeof entry.name !== 'string') {
      return null;
    }

    const status = SERVICE_STATUSES.find(known => known === entry.status) ?? 'unknown';
    return {
      name: entry.name,
      status,
      ...(typeof entry.user === 'string' && { user: entry.user }),
      ...(typeof entry.file === 'string' && { file: entry.file }),
    };
  }
}
