import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { formatIdentifier } from '../types/Version';

export default class Config extends PhpSwitchCommand {
  static override description = 'Show the effective configuration, or create ~/.phpswitch.conf';

  static override examples = ['<%= config.bin %> <%= command.id %>', '<%= config.bin %> <%= command.id %> --init'];

  static override flags = {
    ...commonFlags,
    init: Flags.boolean({
      description: 'Write a commented default configuration file if none exists',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Config);
    const context = await this.bootstrap(flags);
    const configPath = this.configManager.getConfigPath();

    if (flags.init) {
      try {
        const created = await this.configManager.writeDefaultFile();
        this.log(created ? chalk.green(`Created ${configPath}`) : chalk.yellow(`${configPath} already exists`));
      } catch (error) {
        this.fail(error);
      }
      return;
    }

    const { config } = context;
    this.log(chalk.bold(configPath));
    this.log(`  AUTO_RESTART_PHP_FPM    = ${config.autoRestartService}`);
    this.log(`  BACKUP_CONFIG_FILES     = ${config.backupEnabled}`);
    this.log(`  MAX_BACKUPS             = ${config.maxBackups}`);
    this.log(`  DEFAULT_PHP_VERSION     = ${config.defaultVersion ? formatIdentifier(config.defaultVersion) : chalk.gray('(none)')}`);
    this.log(`  CACHE_DIRECTORY         = ${config.cacheDirectory}`);
    this.log(`  AUTO_SWITCH_PHP_VERSION = ${config.autoSwitch}`);
  }
}
