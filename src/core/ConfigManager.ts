import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { ConfigFileKey, ConfigLoadOptions, ToolConfig } from '../types/Config';
import { errorMessage } from '../types/Errors';
import { tryParseVersionIdentifier } from '../types/Version';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';

const CONFIG_FILE_NAME = '.phpswitch.conf';

const DEFAULT_CONFIG_TEMPLATE = `# phpswitch configuration
# Restart the PHP-FPM service of the new version after a switch
AUTO_RESTART_PHP_FPM=true
# Back up shell startup files before editing them
BACKUP_CONFIG_FILES=true
# Number of shell startup file backups to keep
MAX_BACKUPS=5
# Version used by \`phpswitch switch\` without an argument
DEFAULT_PHP_VERSION=""
# Where the available-versions cache lives (empty means ~/.cache/phpswitch)
CACHE_DIRECTORY=""
# Switch to a directory's pinned version on cd (managed by \`phpswitch auto-switch\`)
AUTO_SWITCH_PHP_VERSION=false
`;

const KNOWN_KEYS: readonly ConfigFileKey[] = [
  'AUTO_RESTART_PHP_FPM',
  'BACKUP_CONFIG_FILES',
  'MAX_BACKUPS',
  'DEFAULT_PHP_VERSION',
  'CACHE_DIRECTORY',
  'AUTO_SWITCH_PHP_VERSION',
];

export class ConfigManager {
  private readonly homeDir: string;
  private readonly configPath: string;
  private config: ToolConfig | null = null;

  constructor(options: ConfigLoadOptions = {}) {
    this.homeDir = options.homeDir ?? os.homedir();
    this.configPath = options.configPath ?? path.join(this.homeDir, CONFIG_FILE_NAME);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Reads the configuration file once. A missing file, unknown keys and
   * malformed lines all fall back to defaults.
   */
  async load(): Promise<ToolConfig> {
    if (this.config) {
      return this.config;
    }

    const defaults = this.createDefaultConfig();

    if (!(await fs.pathExists(this.configPath))) {
      logger.debug(`No configuration file at ${this.configPath}, using defaults`);
      this.config = Object.freeze(defaults);
      return this.config;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      logger.warn(`Could not read ${this.configPath}, using defaults`, error);
      this.config = Object.freeze(defaults);
      return this.config;
    }

    this.config = Object.freeze(this.applyEntries(defaults, ConfigManager.parse(content)));
    return this.config;
  }

  /**
   * Writes a commented default file unless one already exists.
   * Returns false when the file was left untouched.
   */
  async writeDefaultFile(): Promise<boolean> {
    if (await fs.pathExists(this.configPath)) {
      return false;
    }

    try {
      await fs.ensureDir(path.dirname(this.configPath));
      await fs.writeFile(this.configPath, DEFAULT_CONFIG_TEMPLATE, 'utf8');
      return true;
    } catch (error) {
      throw new Error(
        `Failed to create ${this.configPath}: ${errorMessage(error)}`
      );
    }
  }

  /**
   * Sets one key in the configuration file, rewriting its first assignment or
   * appending one. The next load() reads the file again.
   */
  async setValue(key: ConfigFileKey, value: string): Promise<void> {
    const content = (await FileSystem.readTextFile(this.configPath)) ?? '';
    const assignment = `${key}=${value}`;
    const pattern = new RegExp(`^\\s*(?:export\\s+)?${key}\\s*=`);

    const lines = content === '' ? [] : content.split('\n');
    const index = lines.findIndex(line => pattern.test(line));
    if (index !== -1) {
      lines[index] = assignment;
    } else if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.splice(lines.length - 1, 0, assignment);
    } else {
      lines.push(assignment, '');
    }

    await FileSystem.writeTextFileAtomic(this.configPath, lines.join('\n'));
    this.config = null;
  }

  /**
   * Splits key=value lines. Comments, blank lines and anything without a
   * recognised key are dropped.
   */
  static parse(content: string): Partial<Record<ConfigFileKey, string>> {
    const entries: Partial<Record<ConfigFileKey, string>> = {};

    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) {
        continue;
      }

      const match = line.match(/^(?:export\s+)?([A-Z_][A-Z0-9_]*)\s*=\s*(.*)$/);
      if (!match) {
        logger.debug(`Ignoring malformed configuration line: ${line}`);
        continue;
      }

      const key = KNOWN_KEYS.find(known => known === match[1]);
      if (!key) {
        logger.debug(`Ignoring unknown configuration key: ${match[1]}`);
        continue;
      }

      entries[key] = ConfigManager.unquote(match[2]);
    }

    return entries;
  }

  private createDefaultConfig(): ToolConfig {
    return {
      autoRestartService: true,
      backupEnabled: true,
      maxBackups: 5,
      defaultVersion: undefined,
      cacheDirectory: path.join(this.homeDir, '.cache', 'phpswitch'),
      autoSwitch: false,
    };
  }

  private applyEntries(
    defaults: ToolConfig,
    entries: Partial<Record<ConfigFileKey, string>>
  ): ToolConfig {
    const config: ToolConfig = { ...defaults };

    const autoRestart = ConfigManager.parseBoolean(entries.AUTO_RESTART_PHP_FPM);
    if (autoRestart !== undefined) {
      config.autoRestartService = autoRestart;
    }

    const backups = ConfigManager.parseBoolean(entries.BACKUP_CONFIG_FILES);
    if (backups !== undefined) {
      config.backupEnabled = backups;
    }

    if (entries.MAX_BACKUPS !== undefined) {
      const maxBackups = Number(entries.MAX_BACKUPS);
      if (Number.isInteger(maxBackups) && maxBackups > 0) {
        config.maxBackups = maxBackups;
      } else {
        logger.debug(`Ignoring invalid MAX_BACKUPS value: ${entries.MAX_BACKUPS}`);
      }
    }

    if (entries.DEFAULT_PHP_VERSION) {
      const identifier = tryParseVersionIdentifier(entries.DEFAULT_PHP_VERSION);
      if (identifier) {
        config.defaultVersion = identifier;
      } else {
        logger.debug(`Ignoring invalid DEFAULT_PHP_VERSION value: ${entries.DEFAULT_PHP_VERSION}`);
      }
    }

    const autoSwitch = ConfigManager.parseBoolean(entries.AUTO_SWITCH_PHP_VERSION);
    if (autoSwitch !== undefined) {
      config.autoSwitch = autoSwitch;
    }

    if (entries.CACHE_DIRECTORY) {
      config.cacheDirectory = this.expandHome(entries.CACHE_DIRECTORY);
    }

    return config;
  }

  private expandHome(value: string): string {
    if (value === '~' || value.startsWith('~/')) {
      return path.join(this.homeDir, value.slice(1));
    }
    return value.replace(/^\$HOME(?=\/|$)/, this.homeDir);
  }

  private static parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined) {
      return undefined;
    }

    switch (value.toLowerCase()) {
      case 'true':
      case 'yes':
      case '1':
        return true;
      case 'false':
      case 'no':
      case '0':
        return false;
      default:
        logger.debug(`Ignoring non-boolean configuration value: ${value}`);
        return undefined;
    }
  }

  private static unquote(value: string): string {
    const trimmed = value.trim();
    const quoted = trimmed.match(/^(["'])(.*)\1$/);
    if (quoted) {
      return quoted[2];
    }
    return trimmed.replace(/\s+#.*$/, '');
  }
}
