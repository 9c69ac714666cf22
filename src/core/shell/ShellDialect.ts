import * as fs from 'fs-extra';
import * as path from 'path';
import { AUTO_SWITCH_BLOCK, BLOCK_END_MARKER, BLOCK_START_MARKER, ShellKind, ShellTarget } from '../../types/Shell';
import { formatIdentifier } from '../../types/Version';

/**
 * Shell-specific text generation. Each dialect knows how to put directories
 * in front of PATH and where its startup file lives.
 */
export abstract class ShellDialect {
  readonly kind: ShellKind;

  constructor(kind: ShellKind) {
    this.kind = kind;
  }

  /**
   * Lines placed between the block markers.
   */
  abstract renderPathDirective(binDirectories: string[]): string[];

  /**
   * Command a user runs to apply the edited startup file to an open terminal.
   */
  abstract activationCommand(configFile: string): string;

  /**
   * Startup files in order of preference, relative to the home directory.
   * The first one is created when none exists.
   */
  protected abstract startupFileCandidates(): string[];

  /**
   * Hook that runs the pinned-version check whenever the working directory
   * changes, or null when the shell has no such hook.
   */
  abstract renderAutoSwitchHook(): string[] | null;

  renderBlock(target: ShellTarget): string[] {
    return [
      BLOCK_START_MARKER,
      `# ${formatIdentifier(target.identifier)}`,
      ...this.renderPathDirective(target.binDirectories),
      BLOCK_END_MARKER,
    ];
  }

  renderAutoSwitchBlock(): string[] | null {
    const hook = this.renderAutoSwitchHook();
    return hook === null ? null : [AUTO_SWITCH_BLOCK.start, ...hook, AUTO_SWITCH_BLOCK.end];
  }

  async locateStartupFile(homeDir: string): Promise<string> {
    const candidates = this.startupFileCandidates().map(file => path.join(homeDir, file));

    for (const candidate of candidates) {
      if (await fs.pathExists(candidate)) {
        return candidate;
      }
    }

    return candidates[0];
  }
}
