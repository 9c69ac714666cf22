import { ShellDialect } from './ShellDialect';

/**
 * Plain Bourne syntax for shells we do not recognise; `.profile` is read by
 * nearly every login shell.
 */
export class ProfileShellDialect extends ShellDialect {
  constructor() {
    super('unknown');
  }

  renderPathDirective(binDirectories: string[]): string[] {
    const prefix = binDirectories.map(dir => `${dir}:`).join('');
    return [`PATH="${prefix}$PATH"; export PATH`];
  }

  activationCommand(configFile: string): string {
    return `. ${configFile}`;
  }

  protected startupFileCandidates(): string[] {
    return ['.profile'];
  }

  renderAutoSwitchHook(): null {
    return null;
  }
}
