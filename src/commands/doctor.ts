import chalk from 'chalk';
import { PhpSwitchCommand, commonFlags } from '../cli/PhpSwitchCommand';
import { PhpSwitchContext } from '../core/createContext';
import { errorMessage } from '../types/Errors';
import { formatIdentifier } from '../types/Version';
import { ProcessUtils } from '../utils/ProcessUtils';

type CheckStatus = 'ok' | 'warn' | 'fail';

interface Check {
  name: string;
  status: CheckStatus;
  detail: string;
}

export default class Doctor extends PhpSwitchCommand {
  static override description = 'Diagnose Homebrew, PATH and shell configuration problems';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  static override flags = {
    ...commonFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Doctor);
    const context = await this.bootstrap(flags);

    const checks = await this.runChecks(context);

    for (const check of checks) {
      const icon =
        check.status === 'ok' ? chalk.green('✓') : check.status === 'warn' ? chalk.yellow('⚠') : chalk.red('✗');
      this.log(`${icon} ${chalk.bold(check.name)}: ${check.detail}`);
    }

    if (checks.some(check => check.status === 'fail')) {
      this.exit(1);
    }
  }

  private async runChecks(context: PhpSwitchContext): Promise<Check[]> {
    const checks: Check[] = [];

    if (!(await ProcessUtils.isCommandAvailable('brew'))) {
      checks.push({ name: 'Homebrew', status: 'fail', detail: 'brew not found on PATH' });
      return checks;
    }

    try {
      checks.push({ name: 'Homebrew', status: 'ok', detail: await context.brew.getPrefix() });
    } catch (error) {
      checks.push({ name: 'Homebrew', status: 'fail', detail: errorMessage(error) });
      return checks;
    }

    try {
      const installed = await context.registry.listInstalled();
      checks.push({
        name: 'Installed versions',
        status: installed.length > 0 ? 'ok' : 'warn',
        detail:
          installed.length > 0
            ? installed.map(record => formatIdentifier(record.identifier)).join(', ')
            : 'none; install one with `phpswitch install <version>`',
      });
    } catch (error) {
      checks.push({ name: 'Installed versions', status: 'fail', detail: errorMessage(error) });
    }

    const active = await context.resolver.getActiveVersion();
    checks.push({
      name: 'Linked formula',
      status: active.linked ? 'ok' : 'warn',
      detail: active.linked ? formatIdentifier(active.linked) : 'nothing linked',
    });
    checks.push({
      name: 'Active php',
      status: !active.identifier ? 'warn' : active.pathInconsistent ? 'fail' : 'ok',
      detail: active.identifier
        ? `${active.fullVersion} from ${active.binary?.path}${active.pathInconsistent ? ' (does not match the linked formula)' : ''}`
        : 'no working php on PATH',
    });

    const binaries = await context.resolver.findBinariesOnPath();
    if (binaries.length > 1) {
      checks.push({
        name: 'PATH',
        status: 'warn',
        detail: `${binaries.length} php binaries, first wins: ${binaries
          .map(binary => (binary.realPath === binary.path ? binary.path : `${binary.path} -> ${binary.realPath}`))
          .join(', ')}`,
      });
    }

    const configFile = await context.shell.getConfigFile();
    try {
      const block = await context.shell.readManagedBlock();
      checks.push({
        name: `Shell (${context.shell.detectShell()})`,
        status: block ? 'ok' : 'warn',
        detail: block ? `managed block in ${configFile}` : `no managed block in ${configFile}; run \`phpswitch switch\``,
      });
    } catch (error) {
      checks.push({ name: 'Shell', status: 'fail', detail: errorMessage(error) });
    }

    return checks;
  }
}
