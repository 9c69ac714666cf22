import { VersionIdentifier } from './Version';

/**
 * Effective settings for one invocation. Loaded once from ~/.phpswitch.conf
 * and handed to the components that need it; never mutated afterwards.
 */
export interface ToolConfig {
  autoRestartService: boolean;
  backupEnabled: boolean;
  maxBackups: number;
  defaultVersion?: VersionIdentifier | undefined;
  cacheDirectory: string;
  /** Switch to a directory's pinned version on `cd`, through the shell hook */
  autoSwitch: boolean;
}

/** Keys understood in the key=value configuration file */
export type ConfigFileKey =
  | 'AUTO_RESTART_PHP_FPM'
  | 'BACKUP_CONFIG_FILES'
  | 'MAX_BACKUPS'
  | 'DEFAULT_PHP_VERSION'
  | 'CACHE_DIRECTORY'
  | 'AUTO_SWITCH_PHP_VERSION';

export interface ConfigLoadOptions {
  configPath?: string;
  homeDir?: string;
}
