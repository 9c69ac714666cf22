import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { AvailableListing } from '../core/registry/RegistryClient';
import { InstalledVersion, formatIdentifier } from '../types/Version';

export default class List extends PhpSwitchCommand {
  static override description = 'List installed PHP versions and those available from Homebrew';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --no-cache',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override flags = {
    ...commonFlags,
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
    cache: Flags.boolean({
      description: 'Use the cached list of available versions when it is fresh',
      default: true,
      allowNo: true,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(List);
    const context = await this.bootstrap(flags);

    // the registry search is slow; let it run while installed versions print
    const lookup = context.registry.startAvailableLookup(flags.cache);

    let installed: InstalledVersion[];
    try {
      installed = await context.registry.listInstalled();
    } catch (error) {
      await lookup;
      this.fail(error);
    }

    if (!flags.json) {
      this.outputInstalled(installed);
    }

    const available = await lookup;

    if (flags.json) {
      this.printJson({
        installed: installed.map(record => ({
          version: record.identifier.version,
          formula: record.formula,
          fullVersion: record.fullVersion ?? null,
          linked: record.linked,
          installPath: record.installPath,
        })),
        available: available.ok
          ? {
              stale: available.result.stale,
              source: available.result.source,
              fetchedAt: available.result.fetchedAt.toISOString(),
              versions: available.result.versions.map(entry => ({
                version: entry.identifier.version,
                formula: entry.identifier.formula,
                installed: entry.installed,
              })),
            }
          : { error: { code: available.error.code, message: available.error.message } },
      });
      return;
    }

    if (available.ok) {
      this.outputAvailable(available.result);
    } else {
      this.log('');
      this.printIssue(
        { code: available.error.code, message: available.error.message, hint: available.error.hint },
        'warning'
      );
    }
  }

  private outputInstalled(installed: InstalledVersion[]): void {
    this.log(chalk.bold('Installed versions:'));

    if (installed.length === 0) {
      this.log(chalk.gray('  none'));
      this.log(chalk.gray(`  Install one with ${chalk.white('phpswitch install <version>')}`));
      return;
    }

    for (const record of installed) {
      const marker = record.linked ? chalk.green('*') : ' ';
      const name = formatIdentifier(record.identifier);
      const label = record.linked ? chalk.green(name) : name;
      const full = record.fullVersion ? chalk.gray(` (${record.fullVersion})`) : '';
      this.log(`${marker} ${label}${full}`);
    }
  }

  private outputAvailable(listing: AvailableListing): void {
    const notInstalled = listing.versions.filter(entry => !entry.installed);

    this.log('');
    this.log(chalk.bold('Available to install:'));

    if (notInstalled.length === 0) {
      this.log(chalk.gray('  every available version is installed'));
    }
    for (const entry of notInstalled) {
      this.log(`  ${formatIdentifier(entry.identifier)}`);
    }

    if (listing.stale) {
      this.log(
        chalk.yellow(
          `\nHomebrew could not be searched; showing results cached at ${listing.fetchedAt.toLocaleString()}`
        )
      );
    } else if (listing.source === 'cache') {
      this.log(chalk.gray(`\nCached at ${listing.fetchedAt.toLocaleString()} (use --no-cache to refresh)`));
    }
  }
}
