import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { PhpSwitchContext } from '../core/createContext';
import { ProjectVersionLocator } from '../core/ProjectVersionLocator';
import { SwitchResult, SwitchState } from '../types/Switch';
import { formatIdentifier } from '../types/Version';

const STAGE_LABELS: Record<SwitchState, string> = {
  Idle: 'Starting',
  Validating: 'Checking installed versions',
  Installing: 'Installing with Homebrew',
  Linking: 'Linking formula',
  SyncingShell: 'Updating shell configuration',
  ReconcilingService: 'Reconciling PHP-FPM services',
  Verifying: 'Verifying active version',
  Done: 'Done',
  Failed: 'Failed',
};

export default class Switch extends PhpSwitchCommand {
  static override description =
    'Switch the active PHP version (defaults to the project pin, then DEFAULT_PHP_VERSION)';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 8.2',
    '<%= config.bin %> <%= command.id %> php@8.1 --install',
    '<%= config.bin %> <%= command.id %> default',
    '<%= config.bin %> <%= command.id %>',
  ];

  static override args = {
    version: Args.string({
      description: "Version to switch to: 'X.Y', 'php@X.Y' or 'default'",
      required: false,
    }),
  };

  static override flags = {
    ...commonFlags,
    install: Flags.boolean({
      char: 'i',
      description: 'Install the version first when it is missing',
      default: false,
    }),
    json: Flags.boolean({
      description: 'Print the switch result as JSON',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Switch);
    const context = await this.bootstrap(flags);

    let requested: string;
    try {
      requested = args.version ?? (await this.fallbackVersion(context, flags.install));
    } catch (error) {
      this.fail(error);
    }

    const spinner = flags.json ? null : ora(`Switching to ${requested}`).start();
    const result = await context.orchestrator.switchTo(requested, {
      installIfMissing: flags.install,
      onStateChange: state => {
        if (spinner) {
          spinner.text = `${STAGE_LABELS[state]}...`;
        }
      },
    });

    if (flags.json) {
      this.printJson(result);
    } else {
      if (result.succeeded && result.target) {
        spinner?.succeed(chalk.green(this.summary(result)));
      } else {
        spinner?.fail(chalk.red(`Could not switch to ${requested}`));
      }
      this.printIssues(result);
      this.printNextSteps(result);
    }

    if (!result.succeeded) {
      this.exit(1);
    }
  }

  private async fallbackVersion(context: PhpSwitchContext, installIfMissing: boolean): Promise<string> {
    const pin = await ProjectVersionLocator.findProjectVersion(process.cwd());
    if (pin) {
      const identifier = ProjectVersionLocator.resolvePinnedVersion(
        pin.version,
        await context.registry.listInstalled(),
        { installIfMissing }
      );
      this.log(chalk.gray(`Using ${pin.version} from ${path.relative(process.cwd(), pin.file) || pin.file}`));
      return identifier ? formatIdentifier(identifier) : pin.version;
    }

    if (context.config.defaultVersion) {
      return formatIdentifier(context.config.defaultVersion);
    }

    this.error(
      `No version given, no .php-version found and DEFAULT_PHP_VERSION is not set.\n${chalk.gray(
        '→ Run `phpswitch list` to see installed versions'
      )}`,
      { exit: 1 }
    );
  }

  private summary(result: SwitchResult): string {
    const target = result.target ? formatIdentifier(result.target) : result.requestedVersion;
    if (result.alreadyLinked && !result.shell?.changed) {
      return `${target} is already active`;
    }
    return `Switched to ${target}`;
  }

  private printNextSteps(result: SwitchResult): void {
    if (!result.shell?.changed) {
      return;
    }

    this.log(chalk.gray(`\nUpdated ${result.shell.configFile}`));
    if (result.shell.backup) {
      this.log(chalk.gray(`Backup saved to ${result.shell.backup.backupPath}`));
    }
    this.log(`Apply it to this terminal with: ${chalk.white(result.shell.activationCommand)}`);
  }
}
