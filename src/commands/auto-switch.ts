import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { PIN_FILE } from '../core/ProjectVersionLocator';
import { AUTO_SWITCH_BLOCK, ShellUpdateResult } from '../types/Shell';

export default class AutoSwitch extends PhpSwitchCommand {
  static override description = `Switch to a directory's ${PIN_FILE} version automatically on cd`;

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --enable',
    '<%= config.bin %> <%= command.id %> --disable',
  ];

  static override flags = {
    ...commonFlags,
    enable: Flags.boolean({
      description: 'Install the shell hook and turn AUTO_SWITCH_PHP_VERSION on',
      default: false,
      exclusive: ['disable'],
    }),
    disable: Flags.boolean({
      description: 'Remove the shell hook and turn AUTO_SWITCH_PHP_VERSION off',
      default: false,
      exclusive: ['enable'],
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(AutoSwitch);
    const context = await this.bootstrap(flags);
    const { shell } = context;

    if (!flags.enable && !flags.disable) {
      const hook = await shell.readManagedBlock(AUTO_SWITCH_BLOCK);
      this.log(`Auto-switching is ${context.config.autoSwitch ? chalk.green('on') : chalk.gray('off')}`);
      this.log(
        hook
          ? `  hook installed in ${await shell.getConfigFile()}`
          : chalk.gray(`  no hook in ${await shell.getConfigFile()}`)
      );
      return;
    }

    const enabled = flags.enable;
    // hook before flag when enabling, flag before hook when disabling
    if (enabled) {
      this.check(await shell.setAutoSwitchHook(true));
    }

    try {
      await this.configManager.setValue('AUTO_SWITCH_PHP_VERSION', String(enabled));
    } catch (error) {
      this.fail(error);
    }

    const result = enabled ? null : this.check(await shell.setAutoSwitchHook(false));
    const configFile = result?.configFile ?? (await shell.getConfigFile());

    this.log(chalk.green(enabled ? `Auto-switching enabled in ${configFile}` : 'Auto-switching disabled'));
    this.log(chalk.gray(`  → Run \`${shell.getDialect().activationCommand(configFile)}\` or open a new terminal`));
  }

  private check(result: ShellUpdateResult): ShellUpdateResult {
    if (result.error) {
      this.fail(result.error);
    }
    if (result.backup) {
      this.log(chalk.gray(`  backed up ${result.configFile} to ${result.backup.backupPath}`));
    }
    return result;
  }
}
