import { ErrorCode, PhpSwitchError } from './Errors';
import { ServiceReport } from './Service';
import { ShellUpdateResult } from './Shell';
import { VersionIdentifier } from './Version';

export type SwitchState =
  | 'Idle'
  | 'Validating'
  | 'Installing'
  | 'Linking'
  | 'SyncingShell'
  | 'ReconcilingService'
  | 'Verifying'
  | 'Done'
  | 'Failed';

export type IssueCode = ErrorCode | 'PathInconsistency';

export interface Issue {
  code: IssueCode;
  message: string;
  hint?: string;
}

export interface OperationResult {
  requestedVersion: string;
  target: VersionIdentifier | null;
  succeeded: boolean;
  warnings: Issue[];
  errors: Issue[];
}

export interface SwitchResult extends OperationResult {
  transitions: SwitchState[];
  alreadyLinked: boolean;
  installed: boolean;
  shell: ShellUpdateResult | null;
  service: ServiceReport | null;
  /** Version the php on PATH reported during verification */
  activeVersion: VersionIdentifier | null;
}

export interface SwitchOptions {
  installIfMissing?: boolean;
  onStateChange?: (state: SwitchState) => void;
}

export interface UninstallOptions {
  force?: boolean;
}

export function toIssue(error: PhpSwitchError): Issue {
  return error.hint
    ? { code: error.code, message: error.message, hint: error.hint }
    : { code: error.code, message: error.message };
}
