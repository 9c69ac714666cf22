import { Args } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { formatIdentifier } from '../types/Version';

export default class Install extends PhpSwitchCommand {
  static override description = 'Install a PHP version with Homebrew without switching to it';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 8.3',
    '<%= config.bin %> <%= command.id %> default',
  ];

  static override args = {
    version: Args.string({
      description: "Version to install: 'X.Y', 'php@X.Y' or 'default'",
      required: true,
    }),
  };

  static override flags = {
    ...commonFlags,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Install);
    const context = await this.bootstrap(flags);

    const spinner = ora(`Installing ${args.version} (this can take a while)`).start();
    const result = await context.orchestrator.install(args.version);

    if (!result.succeeded) {
      spinner.fail(chalk.red(`Could not install ${args.version}`));
      this.printIssues(result);
      this.exit(1);
    }

    const target = result.target ? formatIdentifier(result.target) : args.version;
    if (result.alreadyInstalled) {
      spinner.info(`${target} is already installed`);
    } else {
      spinner.succeed(chalk.green(`Installed ${target}`));
    }
    this.printIssues(result);
    this.log(`Switch to it with: ${chalk.white(`phpswitch switch ${result.target?.version ?? args.version}`)}`);
  }
}
