import * as path from 'path';
import { AUTO_SWITCH_COMMAND } from '../../types/Shell';
import { ShellDialect } from './ShellDialect';

export class FishShellDialect extends ShellDialect {
  constructor() {
    super('fish');
  }

  renderPathDirective(binDirectories: string[]): string[] {
    const dirs = binDirectories.map(dir => `"${dir}"`).join(' ');
    return [`set -gx PATH ${dirs} $PATH`];
  }

  activationCommand(configFile: string): string {
    return `source ${configFile}`;
  }

  protected startupFileCandidates(): string[] {
    return [path.join('.config', 'fish', 'config.fish')];
  }

  renderAutoSwitchHook(): string[] {
    return [
      'function _phpswitch_auto_switch --on-variable PWD',
      `    command ${AUTO_SWITCH_COMMAND} 2>/dev/null | source`,
      'end',
      '_phpswitch_auto_switch',
    ];
  }
}
