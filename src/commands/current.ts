import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { VersionIdentifier, formatIdentifier } from '../types/Version';

export default class Current extends PhpSwitchCommand {
  static override description = 'Show the linked PHP version, or with --active what PATH really runs';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --active',
    '<%= config.bin %> <%= command.id %> --active --json',
  ];

  static override flags = {
    ...commonFlags,
    active: Flags.boolean({
      char: 'a',
      description: 'Run php from PATH and compare it with the linked formula',
      default: false,
    }),
    json: Flags.boolean({
      description: 'Output in JSON format',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Current);
    const context = await this.bootstrap(flags);

    if (!flags.active) {
      let linked: VersionIdentifier | null;
      try {
        linked = await context.resolver.getLinkedVersion();
      } catch (error) {
        this.fail(error);
      }

      if (flags.json) {
        this.printJson({ linked: linked ? { version: linked.version, formula: linked.formula } : null });
      } else {
        this.log(linked ? formatIdentifier(linked) : chalk.yellow('No PHP formula is linked'));
      }
      return;
    }

    const report = await context.resolver.getActiveVersion();

    if (flags.json) {
      this.printJson(report);
      return;
    }

    if (!report.identifier) {
      this.log(chalk.yellow(report.binary ? `Could not read the version of ${report.binary.path}` : 'No php found on PATH'));
    } else {
      this.log(`${formatIdentifier(report.identifier)} ${chalk.gray(`(${report.fullVersion}, ${report.binary?.path})`)}`);
    }

    this.log(chalk.gray(`linked: ${report.linked ? formatIdentifier(report.linked) : 'none'}`));

    if (report.pathInconsistent) {
      const configFile = await context.shell.getConfigFile();
      this.printIssue(
        {
          code: 'PathInconsistency',
          message: 'The php on PATH is not the linked formula',
          hint: `Run \`${context.shell.getDialect().activationCommand(configFile)}\` or open a new terminal`,
        },
        'warning'
      );
    }
  }
}
