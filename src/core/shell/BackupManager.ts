import * as fs from 'fs-extra';
import * as path from 'path';
import { ConfigBackup } from '../../types/Shell';
import { logger } from '../../utils/Logger';

const BACKUP_INFIX = '.bak.';
const BACKUP_SUFFIX = /^(\d{17})(?:-(\d+))?$/;

const log = logger.child('backup');

export interface BackupManagerOptions {
  now?: () => Date;
}

interface BackupEntry {
  path: string;
  stamp: string;
  sequence: number;
}

/**
 * Timestamped copies of shell startup files: `<file>.bak.<yyyyMMddHHmmssSSS>`,
 * with `-n` appended when two backups land in the same millisecond.
 */
export class BackupManager {
  private readonly now: () => Date;

  constructor(options: BackupManagerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Copies `filePath` next to itself, readable by the owner only.
   * Returns null when there is nothing to back up.
   */
  async createBackup(filePath: string): Promise<ConfigBackup | null> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }

    const base = `${filePath}${BACKUP_INFIX}${BackupManager.formatStamp(this.now())}`;
    let backupPath = base;
    for (let sequence = 1; await fs.pathExists(backupPath); sequence++) {
      backupPath = `${base}-${sequence}`;
    }

    await fs.copy(filePath, backupPath, { overwrite: false, errorOnExist: true });
    await fs.chmod(backupPath, 0o600);
    log.debug(`Backed up ${filePath} to ${backupPath}`);

    return { originalPath: filePath, backupPath };
  }

  /**
   * Existing backups of `filePath`, oldest first.
   */
  async listBackups(filePath: string): Promise<string[]> {
    const dir = path.dirname(filePath);
    const prefix = `${path.basename(filePath)}${BACKUP_INFIX}`;

    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch {
      return [];
    }

    const entries: BackupEntry[] = [];
    for (const name of names) {
      if (!name.startsWith(prefix)) {
        continue;
      }
      const match = name.slice(prefix.length).match(BACKUP_SUFFIX);
      if (match) {
        entries.push({
          path: path.join(dir, name),
          stamp: match[1],
          sequence: match[2] ? parseInt(match[2], 10) : 0,
        });
      }
    }

    return entries
      .sort((a, b) => a.stamp.localeCompare(b.stamp) || a.sequence - b.sequence)
      .map(entry => entry.path);
  }

  /**
   * Deletes the oldest backups until at most `maxBackups` remain.
   * Returns the deleted paths.
   */
  async prune(filePath: string, maxBackups: number): Promise<string[]> {
    const backups = await this.listBackups(filePath);
    const excess = backups.slice(0, Math.max(0, backups.length - maxBackups));

    for (const backup of excess) {
      await fs.remove(backup);
      log.debug(`Removed old backup ${backup}`);
    }

    return excess;
  }

  static formatStamp(date: Date): string {
    const pad = (value: number, width = 2) => String(value).padStart(width, '0');
    return (
      `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
      `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
      pad(date.getUTCMilliseconds(), 3)
    );
  }
}
