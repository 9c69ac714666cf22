import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { ConfigManager } from '../core/ConfigManager';
import { PhpSwitchContext, createContext } from '../core/createContext';
import { errorMessage, isPhpSwitchError } from '../types/Errors';
import { Issue, OperationResult } from '../types/Switch';
import { logger } from '../utils/Logger';

export const commonFlags = {
  debug: Flags.boolean({
    description: 'Print diagnostic logging to stderr',
    default: false,
  }),
};

/**
 * Shared plumbing for every phpswitch command: logging level, configuration
 * loading and consistent rendering of warnings and errors.
 */
export abstract class PhpSwitchCommand extends Command {
  protected configManager = new ConfigManager();

  protected async bootstrap(flags: { debug: boolean }): Promise<PhpSwitchContext> {
    if (flags.debug) {
      logger.setLevel('debug');
    }

    const config = await this.configManager.load();
    return createContext({ config });
  }

  protected printIssues(result: OperationResult): void {
    for (const warning of result.warnings) {
      this.printIssue(warning, 'warning');
    }
    for (const error of result.errors) {
      this.printIssue(error, 'error');
    }
  }

  protected printIssue(issue: Issue, severity: 'warning' | 'error'): void {
    const label = severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
    this.logToStderr(`${label} ${issue.message}`);
    if (issue.hint) {
      this.logToStderr(chalk.gray(`  → ${issue.hint}`));
    }
  }

  protected printJson(value: unknown): void {
    this.log(JSON.stringify(value, null, 2));
  }

  /**
   * Exits with status 1, printing the error's hint under the diagnosis.
   */
  protected fail(error: unknown): never {
    if (isPhpSwitchError(error)) {
      logger.debug(`${error.code}: ${error.message}`);
      this.error(error.hint ? `${error.message}\n${chalk.gray(`→ ${error.hint}`)}` : error.message, {
        exit: 1,
      });
    }

    logger.debug('Unexpected failure', error);
    this.error(errorMessage(error), { exit: 1 });
  }
}
