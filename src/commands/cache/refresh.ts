import chalk from 'chalk';
import ora from 'ora';
import { PhpSwitchCommand, commonFlags } from '../../cli/PhpSwitchCommand';

export default class CacheRefresh extends PhpSwitchCommand {
  static override description = 'Search Homebrew again and rewrite the available-versions cache';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  static override flags = {
    ...commonFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(CacheRefresh);
    const context = await this.bootstrap(flags);

    const spinner = ora('Searching Homebrew for PHP formulae').start();
    try {
      const listing = await context.registry.refreshCache();
      spinner.succeed(chalk.green(`Cached ${listing.versions.length} available versions`));
    } catch (error) {
      spinner.fail(chalk.red('Cache refresh failed'));
      this.fail(error);
    }
  }
}
