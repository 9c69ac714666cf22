import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { formatIdentifier } from '../types/Version';

export default class Uninstall extends PhpSwitchCommand {
  static override description = 'Uninstall a PHP version';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 7.4',
    '<%= config.bin %> <%= command.id %> 8.1 --force',
  ];

  static override args = {
    version: Args.string({
      description: "Version to remove: 'X.Y', 'php@X.Y' or 'default'",
      required: true,
    }),
  };

  static override flags = {
    ...commonFlags,
    force: Flags.boolean({
      char: 'f',
      description: 'Uninstall even if the version is currently linked',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Uninstall);
    const context = await this.bootstrap(flags);

    const spinner = ora(`Uninstalling ${args.version}`).start();
    const result = await context.orchestrator.uninstall(args.version, { force: flags.force });
    const target = result.target ? formatIdentifier(result.target) : args.version;

    if (result.succeeded) {
      spinner.succeed(chalk.green(`Uninstalled ${target}`));
    } else {
      spinner.fail(chalk.red(`Could not uninstall ${target}`));
    }
    this.printIssues(result);

    if (!result.succeeded) {
      this.exit(1);
    }
  }
}
