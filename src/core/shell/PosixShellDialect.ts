import { AUTO_SWITCH_COMMAND } from '../../types/Shell';
import { ShellDialect } from './ShellDialect';

const STARTUP_FILES: Record<'zsh' | 'bash', string[]> = {
  zsh: ['.zshrc', '.zprofile'],
  bash: ['.bashrc', '.bash_profile', '.profile'],
};

export class PosixShellDialect extends ShellDialect {
  private readonly shell: 'zsh' | 'bash';

  constructor(shell: 'zsh' | 'bash') {
    super(shell);
    this.shell = shell;
  }

  renderPathDirective(binDirectories: string[]): string[] {
    const prefix = binDirectories.map(dir => `${dir}:`).join('');
    // drop cached command locations so the new php is found immediately
    return [`export PATH="${prefix}$PATH"`, 'hash -r'];
  }

  activationCommand(configFile: string): string {
    return `source ${configFile}`;
  }

  protected startupFileCandidates(): string[] {
    return STARTUP_FILES[this.shell];
  }

  renderAutoSwitchHook(): string[] {
    const run = `eval "$(command ${AUTO_SWITCH_COMMAND} 2>/dev/null)"`;

    if (this.shell === 'zsh') {
      return [
        '_phpswitch_auto_switch() {',
        `  ${run}`,
        '}',
        'autoload -U add-zsh-hook',
        'add-zsh-hook chpwd _phpswitch_auto_switch',
        '_phpswitch_auto_switch',
      ];
    }

    // bash has no chpwd; PROMPT_COMMAND runs before every prompt, so remember the last directory
    return [
      '_phpswitch_auto_switch() {',
      '  if [ "$PWD" != "$_PHPSWITCH_LAST_PWD" ]; then',
      '    _PHPSWITCH_LAST_PWD="$PWD"',
      `    ${run}`,
      '  fi',
      '}',
      'case ";${PROMPT_COMMAND:-};" in',
      '  *";_phpswitch_auto_switch;"*) ;;',
      '  *) PROMPT_COMMAND="_phpswitch_auto_switch${PROMPT_COMMAND:+;$PROMPT_COMMAND}" ;;',
      'esac',
    ];
  }
}
