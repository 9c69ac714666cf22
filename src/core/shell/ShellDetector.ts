import * as path from 'path';
import { ShellKind } from '../../types/Shell';
import { FishShellDialect } from './FishShellDialect';
import { PosixShellDialect } from './PosixShellDialect';
import { ProfileShellDialect } from './ProfileShellDialect';
import { ShellDialect } from './ShellDialect';

/**
 * Version variables are only set inside the running shell, so they win over
 * $SHELL, which names the login shell.
 */
export function detectShell(env: NodeJS.ProcessEnv = process.env): ShellKind {
  if (env.ZSH_VERSION) {
    return 'zsh';
  }
  if (env.BASH_VERSION) {
    return 'bash';
  }
  if (env.FISH_VERSION) {
    return 'fish';
  }

  switch (env.SHELL ? path.basename(env.SHELL) : '') {
    case 'zsh':
      return 'zsh';
    case 'bash':
      return 'bash';
    case 'fish':
      return 'fish';
    default:
      return 'unknown';
  }
}

export function dialectFor(shell: ShellKind): ShellDialect {
  switch (shell) {
    case 'zsh':
    case 'bash':
      return new PosixShellDialect(shell);
    case 'fish':
      return new FishShellDialect();
    case 'unknown':
      return new ProfileShellDialect();
  }
}
