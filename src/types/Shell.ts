import { PhpSwitchError } from './Errors';
import { VersionIdentifier } from './Version';

export type ShellKind = 'zsh' | 'bash' | 'fish' | 'unknown';

export const BLOCK_START_MARKER = '# BEGIN PHPSWITCH MANAGED BLOCK - DO NOT EDIT MANUALLY';
export const BLOCK_END_MARKER = '# END PHPSWITCH MANAGED BLOCK';

export interface BlockMarkers {
  start: string;
  end: string;
}

/** The block that puts the selected version's directories on PATH */
export const PATH_BLOCK: BlockMarkers = Object.freeze({ start: BLOCK_START_MARKER, end: BLOCK_END_MARKER });

/** The directory-change hook that runs `phpswitch project --auto` */
export const AUTO_SWITCH_BLOCK: BlockMarkers = Object.freeze({
  start: '# BEGIN PHPSWITCH AUTO-SWITCH HOOK - DO NOT EDIT MANUALLY',
  end: '# END PHPSWITCH AUTO-SWITCH HOOK',
});

/** Prints the PATH directive for the pinned version when it had to switch */
export const AUTO_SWITCH_COMMAND = 'phpswitch project --auto';

/**
 * What the synchronizer writes for one version: the formula it belongs to
 * and the directories that must lead PATH.
 */
export interface ShellTarget {
  identifier: VersionIdentifier;
  binDirectories: string[];
}

export interface ConfigBackup {
  originalPath: string;
  backupPath: string;
}

export interface ShellUpdateResult {
  shell: ShellKind;
  configFile: string;
  changed: boolean;
  backup: ConfigBackup | null;
  prunedBackups: string[];
  /** Command that applies the new PATH to an already-open terminal */
  activationCommand: string;
  error: PhpSwitchError | null;
}
