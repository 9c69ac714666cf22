import { Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { PhpSwitchContext } from '../core/createContext';
import { PinnedTarget, ProjectSwitchOutcome } from '../core/ProjectSwitcher';
import { PIN_FILE, ProjectVersionLocator } from '../core/ProjectVersionLocator';
import { formatIdentifier, parseVersionIdentifier } from '../types/Version';

export default class Project extends PhpSwitchCommand {
  static override description = `Switch to the version pinned in the nearest ${PIN_FILE}, or pin one`;

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --print',
    '<%= config.bin %> <%= command.id %> --set 8.2',
    '<%= config.bin %> <%= command.id %> --install',
  ];

  static override flags = {
    ...commonFlags,
    set: Flags.string({
      char: 's',
      description: `Write ${PIN_FILE} in the current directory`,
    }),
    print: Flags.boolean({
      char: 'p',
      description: 'Only show the pinned version',
      default: false,
    }),
    install: Flags.boolean({
      char: 'i',
      description: 'Install the pinned version when it is missing',
      default: false,
    }),
    auto: Flags.boolean({
      description: 'Directory-change mode used by the shell hook: switch quietly and print PATH commands to eval',
      default: false,
      hidden: true,
      exclusive: ['set', 'print'],
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Project);
    const context = await this.bootstrap(flags);
    const cwd = process.cwd();

    if (flags.set !== undefined) {
      try {
        const identifier = parseVersionIdentifier(flags.set);
        const file = await ProjectVersionLocator.writeProjectVersion(cwd, identifier);
        this.log(chalk.green(`Pinned ${formatIdentifier(identifier)} in ${file}`));
      } catch (error) {
        this.fail(error);
      }
      return;
    }

    if (flags.auto) {
      await this.autoSwitch(context, cwd, flags.install);
      return;
    }

    let pinned: PinnedTarget | null;
    try {
      pinned = await context.projects.resolve(cwd, flags.install);
    } catch (error) {
      this.fail(error);
    }

    if (!pinned) {
      this.error(
        `No ${PIN_FILE} found in ${cwd} or its parents\n${chalk.gray(
          `→ Pin a version with \`phpswitch project --set <version>\``
        )}`,
        { exit: 1 }
      );
    }

    const { pin } = pinned;
    const where = path.relative(cwd, pin.file) || pin.file;
    const target = formatIdentifier(pinned.target);

    if (flags.print) {
      this.log(`${target} ${chalk.gray(`(${pin.version} in ${where})`)}`);
      return;
    }

    const spinner = ora(`Switching to ${target} from ${where}`).start();
    const result = await context.orchestrator.switchTo(target, { installIfMissing: flags.install });

    if (result.succeeded) {
      spinner.succeed(chalk.green(`Switched to ${target}`));
    } else {
      spinner.fail(chalk.red(`Could not switch to ${target}`));
    }
    this.printIssues(result);

    if (!result.succeeded) {
      this.exit(1);
    }
  }

  /**
   * Stdout carries only shell commands, which the hook evaluates in the
   * user's shell so the new PATH applies without opening a terminal.
   */
  private async autoSwitch(context: PhpSwitchContext, cwd: string, installIfMissing: boolean): Promise<void> {
    let outcome: ProjectSwitchOutcome;
    try {
      outcome = await context.projects.run(cwd, { auto: true, installIfMissing });
    } catch (error) {
      this.fail(error);
    }

    if (outcome.kind !== 'switched') {
      return;
    }

    const { result } = outcome;
    this.printIssues(result);
    if (!result.succeeded || !result.target) {
      this.exit(1);
    }

    const directories = await context.brew.binDirectories(result.target.formula);
    for (const line of context.shell.getDialect().renderPathDirective(directories)) {
      this.log(line);
    }
  }
}
