import * as fs from 'fs-extra';
import * as path from 'path';
import { CommandRunner, ProcessOptions, ProcessResult, TIMEOUT_EXIT_CODE } from '../../src/utils/ProcessUtils';
import { ServiceStatus } from '../../src/types/Service';

export interface RecordedCall {
  command: string;
  args: string[];
  options: ProcessOptions;
}

type Failure = 'error' | 'timeout';

const MUTATING = new Set(['link', 'unlink', 'install', 'uninstall']);

const ok = (stdout = ''): ProcessResult => ({ stdout, stderr: '', exitCode: 0, timedOut: false });
const failed = (stderr: string, exitCode = 1): ProcessResult => ({ stdout: '', stderr, exitCode, timedOut: false });
const timedOut = (): ProcessResult => ({ stdout: '', stderr: '', exitCode: TIMEOUT_EXIT_CODE, timedOut: true });

/**
 * In-process stand-in for `brew` and the php binaries it installs. Kegs,
 * opt links and the `bin/php` link are real files under `prefix`, so code
 * reading the filesystem sees what Homebrew would leave behind.
 */
export class FakeHomebrew implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly services = new Map<string, ServiceStatus>();
  /** Formulae `brew search` reports, with the version `brew install` would fetch */
  readonly registry = new Map<string, string>();
  readonly failures: {
    search?: Failure;
    list?: Failure;
    linkForce?: boolean;
    linkOverwrite?: boolean;
    install?: boolean;
    uninstall?: boolean;
    serviceTimeouts: Set<string>;
  } = { serviceTimeouts: new Set() };

  constructor(readonly prefix: string) {}

  get binPath(): string {
    return path.join(this.prefix, 'bin');
  }

  get searchCount(): number {
    return this.calls.filter(call => call.command === 'brew' && call.args[0] === 'search').length;
  }

  /** brew calls that change kegs, links or services */
  get mutations(): RecordedCall[] {
    return this.calls.filter(
      call =>
        call.command === 'brew' &&
        (MUTATING.has(call.args[0]) ||
          (call.args[0] === 'services' && (call.args[1] === 'start' || call.args[1] === 'stop')))
    );
  }

  brewCalls(): string[] {
    return this.calls.filter(call => call.command === 'brew').map(call => call.args.join(' '));
  }

  async addFormula(formula: string, version: string, serviceStatus: ServiceStatus = 'none'): Promise<void> {
    const keg = path.join(this.prefix, 'Cellar', formula, version);
    await fs.ensureDir(path.join(keg, 'bin'));
    await fs.ensureDir(path.join(keg, 'sbin'));
    await fs.writeFile(path.join(keg, 'bin', 'php'), '#!/bin/sh\n', { mode: 0o755 });

    const opt = path.join(this.prefix, 'opt', formula);
    await fs.ensureDir(path.dirname(opt));
    await fs.remove(opt);
    await fs.symlink(path.join('..', 'Cellar', formula, version), opt);

    this.services.set(formula, serviceStatus);
    if (!this.registry.has(formula)) {
      this.registry.set(formula, version);
    }
  }

  async linkFormula(formula: string): Promise<void> {
    const version = await this.installedVersion(formula);
    if (!version) {
      throw new Error(`${formula} is not installed`);
    }

    const link = path.join(this.binPath, 'php');
    await fs.ensureDir(this.binPath);
    await fs.remove(link);
    await fs.symlink(path.join('..', 'Cellar', formula, version, 'bin', 'php'), link);
  }

  async linkedFormula(): Promise<string | null> {
    try {
      const target = await fs.readlink(path.join(this.binPath, 'php'));
      const match = target.match(/Cellar\/([^/]+)\//);
      return match ? match[1] : null;
    } catch {
      return null;
    }
  }

  async execute(command: string, args: string[] = [], options: ProcessOptions = {}): Promise<ProcessResult> {
    this.calls.push({ command, args, options });

    if (command === 'brew') {
      return this.brew(args);
    }

    if (path.basename(command) === 'php' && args[0] === '-v') {
      return this.phpVersion(command);
    }

    throw new Error(`Process execution failed: spawn ${command} ENOENT`);
  }

  private async brew(args: string[]): Promise<ProcessResult> {
    const [subcommand, ...rest] = args;

    switch (subcommand) {
      case '--prefix':
        return ok(this.prefix);
      case 'list':
        return this.list();
      case 'search':
        return this.search();
      case 'link':
        return this.link(rest[0] === '--overwrite' ? 'overwrite' : 'force', rest[1]);
      case 'unlink':
        return this.unlink(rest[0]);
      case 'install':
        return this.install(rest[0]);
      case 'uninstall':
        return this.uninstall(rest[0]);
      case 'services':
        return this.serviceCommand(rest[0], rest[1]);
      default:
        return failed(`Error: Unknown command: ${subcommand}`);
    }
  }

  private async list(): Promise<ProcessResult> {
    if (this.failures.list === 'timeout') {
      return timedOut();
    }
    if (this.failures.list === 'error') {
      return failed('Error: simulated list failure');
    }

    const lines: string[] = [];
    for (const formula of await this.installedFormulae()) {
      lines.push(`${formula} ${await this.installedVersion(formula)}`);
    }
    return ok(lines.join('\n'));
  }

  private search(): ProcessResult {
    if (this.failures.search === 'timeout') {
      return timedOut();
    }
    if (this.failures.search === 'error') {
      return failed('Error: simulated network failure');
    }
    return ok(['==> Formulae', ...this.registry.keys()].join('\n'));
  }

  private async link(mode: 'force' | 'overwrite', formula: string): Promise<ProcessResult> {
    if ((mode === 'force' && this.failures.linkForce) || (mode === 'overwrite' && this.failures.linkOverwrite)) {
      return failed(`Error: Could not symlink bin/php\nTarget ${this.binPath}/php already exists.`);
    }
    if (!(await this.installedVersion(formula))) {
      return failed(`Error: No such keg: ${this.prefix}/Cellar/${formula}`);
    }

    await this.linkFormula(formula);
    return ok(`Linking ${formula}... 25 symlinks created.`);
  }

  private async unlink(formula: string): Promise<ProcessResult> {
    if ((await this.linkedFormula()) === formula) {
      await fs.remove(path.join(this.binPath, 'php'));
    }
    return ok(`Unlinking ${formula}... 0 symlinks removed.`);
  }

  private async install(formula: string): Promise<ProcessResult> {
    const version = this.registry.get(formula);
    if (this.failures.install || !version) {
      return failed(`Error: No available formula with the name "${formula}".`);
    }

    await this.addFormula(formula, version);
    return ok(`==> Pouring ${formula}--${version}.bottle.tar.gz`);
  }

  private async uninstall(formula: string): Promise<ProcessResult> {
    if (this.failures.uninstall) {
      return failed(`Error: Permission denied @ dir_s_rmdir - ${this.prefix}/Cellar/${formula}`);
    }

    await fs.remove(path.join(this.prefix, 'Cellar', formula));
    await fs.remove(path.join(this.prefix, 'opt', formula));
    this.services.delete(formula);
    return ok(`Uninstalling ${formula}...`);
  }

  private serviceCommand(action: string, name: string): ProcessResult {
    if (action === 'list') {
      return ok(
        JSON.stringify(
          [...this.services.entries()].map(([service, status]) => ({
            name: service,
            status,
            user: status === 'started' ? 'tester' : null,
            file: `/Users/tester/Library/LaunchAgents/homebrew.mxcl.${service}.plist`,
          }))
        )
      );
    }

    if (this.failures.serviceTimeouts.has(name)) {
      return timedOut();
    }

    const status = this.services.get(name);
    if (status === undefined) {
      return failed(`Error: Formula \`${name}\` is not installed.`);
    }

    if (action === 'stop') {
      if (status !== 'started') {
        return failed(`Error: Service \`${name}\` is not started.`);
      }
      this.services.set(name, 'stopped');
      return ok(`==> Successfully stopped \`${name}\``);
    }

    this.services.set(name, 'started');
    return ok(`==> Successfully started \`${name}\``);
  }

  private async phpVersion(binary: string): Promise<ProcessResult> {
    let real: string;
    try {
      real = await fs.realpath(binary);
    } catch {
      throw new Error(`Process execution failed: spawn ${binary} ENOENT`);
    }

    const match = real.match(/Cellar\/[^/]+\/([^/]+)\/bin\/php$/);
    if (!match) {
      return failed('Could not open input file');
    }
    return ok(`PHP ${match[1]} (cli) (built: Jan  1 2026 00:00:00) (NTS)\nCopyright (c) The PHP Group`);
  }

  private async installedFormulae(): Promise<string[]> {
    const cellar = path.join(this.prefix, 'Cellar');
    if (!(await fs.pathExists(cellar))) {
      return [];
    }
    return (await fs.readdir(cellar)).sort();
  }

  private async installedVersion(formula: string): Promise<string | null> {
    const dir = path.join(this.prefix, 'Cellar', formula);
    if (!(await fs.pathExists(dir))) {
      return null;
    }
    const versions = (await fs.readdir(dir)).sort();
    return versions[versions.length - 1] ?? null;
  }
}
