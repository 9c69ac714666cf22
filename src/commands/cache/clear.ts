import chalk from 'chalk';
import { PhpSwitchCommand, commonFlags } from '../../cli/PhpSwitchCommand';

export default class CacheClear extends PhpSwitchCommand {
  static override description = 'Delete the cached list of available PHP versions';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  static override flags = {
    ...commonFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(CacheClear);
    const context = await this.bootstrap(flags);

    try {
      const removed = await context.registry.clearCache();
      this.log(
        removed
          ? chalk.green(`Removed ${context.registry.getCachePath()}`)
          : chalk.gray('No cache to remove')
      );
    } catch (error) {
      this.fail(error);
    }
  }
}
