import * as os from 'os';
import { ToolConfig } from '../../types/Config';
import { ConfigWriteFailedError, UnsupportedShellError, errorMessage } from '../../types/Errors';
import {
  AUTO_SWITCH_BLOCK,
  BlockMarkers,
  ConfigBackup,
  PATH_BLOCK,
  ShellKind,
  ShellTarget,
  ShellUpdateResult,
} from '../../types/Shell';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';
import { BackupManager } from './BackupManager';
import { ShellDialect } from './ShellDialect';
import { detectShell, dialectFor } from './ShellDetector';

export interface ShellConfigSynchronizerOptions {
  config: Pick<ToolConfig, 'backupEnabled' | 'maxBackups'>;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Skips detection, e.g. for `--shell` style overrides and tests */
  shell?: ShellKind;
  backups?: BackupManager;
}

const log = logger.child('shell');

/**
 * Owns the marked blocks in the user's shell startup file: the PATH block and
 * the optional auto-switch hook.
 */
export class ShellConfigSynchronizer {
  private readonly config: Pick<ToolConfig, 'backupEnabled' | 'maxBackups'>;
  private readonly homeDir: string;
  private readonly dialect: ShellDialect;
  private readonly backups: BackupManager;

  constructor(options: ShellConfigSynchronizerOptions) {
    this.config = options.config;
    this.homeDir = options.homeDir ?? os.homedir();
    this.dialect = dialectFor(options.shell ?? detectShell(options.env));
    this.backups = options.backups ?? new BackupManager();
  }

  detectShell(): ShellKind {
    return this.dialect.kind;
  }

  getDialect(): ShellDialect {
    return this.dialect;
  }

  async getConfigFile(): Promise<string> {
    return this.dialect.locateStartupFile(this.homeDir);
  }

  /**
   * Points the marked block at `target`. Never throws: I/O failures come back
   * as a ConfigWriteFailedError in the result and leave the file untouched.
   */
  async updateConfig(target: ShellTarget): Promise<ShellUpdateResult> {
    const block = this.dialect.renderBlock(target);
    return this.rewrite(
      content => ShellConfigSynchronizer.applyBlock(content, block),
      `PATH block for ${target.identifier.formula}`
    );
  }

  /**
   * Installs or removes the directory-change hook in its own marked block.
   * Shells without a hook get an UnsupportedShellError when enabling.
   */
  async setAutoSwitchHook(enabled: boolean): Promise<ShellUpdateResult> {
    const block = enabled ? this.dialect.renderAutoSwitchBlock() : null;
    if (enabled && block === null) {
      const result = await this.emptyResult();
      result.error = new UnsupportedShellError('Auto-switching');
      return result;
    }

    return this.rewrite(
      content => ShellConfigSynchronizer.applyBlock(content, block, AUTO_SWITCH_BLOCK),
      enabled ? 'auto-switch hook' : 'auto-switch hook removal'
    );
  }

  /**
   * Lines of the first complete marked block in the startup file, markers included.
   */
  async readManagedBlock(markers: BlockMarkers = PATH_BLOCK): Promise<string[] | null> {
    const content = await FileSystem.readTextFile(await this.getConfigFile());
    if (content === null) {
      return null;
    }

    const lines = content.split('\n');
    for (let index = 0; index < lines.length; index++) {
      if (lines[index].trim() !== markers.start) {
        continue;
      }
      const end = ShellConfigSynchronizer.findBlockEnd(lines, index, markers);
      if (end !== -1) {
        return lines.slice(index, end + 1);
      }
    }

    return null;
  }

  private async emptyResult(): Promise<ShellUpdateResult> {
    const configFile = await this.getConfigFile();
    return {
      shell: this.dialect.kind,
      configFile,
      changed: false,
      backup: null,
      prunedBackups: [],
      activationCommand: this.dialect.activationCommand(configFile),
      error: null,
    };
  }

  private async rewrite(transform: (content: string) => string, label: string): Promise<ShellUpdateResult> {
    const result = await this.emptyResult();
    const { configFile } = result;

    let current: string;
    try {
      current = (await FileSystem.readTextFile(configFile)) ?? '';
    } catch (error) {
      result.error = new ConfigWriteFailedError(configFile, errorMessage(error));
      return result;
    }

    const updated = transform(current);
    if (updated === current) {
      log.debug(`${configFile} already has the ${label}`);
      return result;
    }

    let backup: ConfigBackup | null = null;
    try {
      if (this.config.backupEnabled) {
        backup = await this.backups.createBackup(configFile);
      }
      await FileSystem.writeTextFileAtomic(configFile, updated);
    } catch (error) {
      result.backup = backup;
      result.error = new ConfigWriteFailedError(configFile, errorMessage(error));
      return result;
    }

    result.changed = true;
    result.backup = backup;
    log.debug(`Wrote ${label} to ${configFile}`);

    if (this.config.backupEnabled) {
      try {
        result.prunedBackups = await this.backups.prune(configFile, this.config.maxBackups);
      } catch (error) {
        log.warn(`Could not prune backups of ${configFile}`, error);
      }
    }

    return result;
  }

  /**
   * Replaces the first marked block with `block` and drops any further ones;
   * appends the block when the file has none. A null `block` removes every
   * marked block along with the blank line that separated it. A start marker
   * with no end before the next start marker is removed on its own so user
   * lines after it survive.
   */
  static applyBlock(content: string, block: string[] | null, markers: BlockMarkers = PATH_BLOCK): string {
    const lines = content === '' ? [] : content.split('\n');
    const output: string[] = [];
    let replaced = false;

    for (let index = 0; index < lines.length; index++) {
      if (lines[index].trim() !== markers.start) {
        output.push(lines[index]);
        continue;
      }

      const end = ShellConfigSynchronizer.findBlockEnd(lines, index, markers);
      if (end === -1) {
        continue;
      }

      if (block === null) {
        if (output.length > 0 && output[output.length - 1].trim() === '') {
          output.pop();
        }
      } else if (!replaced) {
        output.push(...block);
        replaced = true;
      }
      index = end;
    }

    if (replaced || block === null) {
      return output.join('\n');
    }

    if (output.length === 0) {
      return `${block.join('\n')}\n`;
    }

    const text = output.join('\n');
    const separator = text.endsWith('\n') ? '\n' : '\n\n';
    return `${text}${separator}${block.join('\n')}\n`;
  }

  private static findBlockEnd(lines: string[], start: number, markers: BlockMarkers): number {
    for (let index = start + 1; index < lines.length; index++) {
      const line = lines[index].trim();
      if (line === markers.start) {
        return -1;
      }
      if (line === markers.end) {
        return index;
      }
    }
    return -1;
  }
}
