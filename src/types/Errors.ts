export type ErrorCode =
  | 'RegistryUnavailable'
  | 'RegistryTimedOut'
  | 'VersionNotInstalled'
  | 'InvalidVersion'
  | 'InstallFailed'
  | 'UninstallFailed'
  | 'LinkFailed'
  | 'ConfigWriteFailed'
  | 'ServiceOperationTimedOut'
  | 'ServiceOperationFailed'
  | 'UnsupportedShell';

/**
 * Base class for every failure the switcher reports to a user. `hint` is the
 * concrete next action printed under the one-line diagnosis.
 */
export abstract class PhpSwitchError extends Error {
  abstract readonly code: ErrorCode;
  readonly hint: string | undefined;

  protected constructor(message: string, hint?: string) {
    super(message);
    this.name = new.target.name;
    this.hint = hint;
  }
}

export class RegistryUnavailableError extends PhpSwitchError {
  readonly code: ErrorCode = 'RegistryUnavailable';

  constructor(reason: string, hint = 'Check that Homebrew works (`brew doctor`), then run `phpswitch cache refresh`') {
    super(`Homebrew registry unavailable: ${reason}`, hint);
  }
}

export class RegistryTimedOutError extends RegistryUnavailableError {
  override readonly code: ErrorCode = 'RegistryTimedOut';
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(
      `\`${operation}\` did not finish within ${Math.round(timeoutMs / 1000)}s`,
      'Retry later, or run `phpswitch cache refresh` once Homebrew responds'
    );
    this.timeoutMs = timeoutMs;
  }
}

export class VersionNotInstalledError extends PhpSwitchError {
  readonly code: ErrorCode = 'VersionNotInstalled';

  constructor(version: string) {
    super(
      `PHP ${version} is not installed`,
      `Install it with \`phpswitch install ${version}\`, or pass --install to switch`
    );
  }
}

export class InvalidVersionError extends PhpSwitchError {
  readonly code: ErrorCode = 'InvalidVersion';

  constructor(input: string) {
    super(
      `Invalid PHP version: '${input}'`,
      "Use 'X.Y' (e.g. 8.1), 'php@X.Y' (e.g. php@8.1) or 'default'"
    );
  }
}

export class InstallFailedError extends PhpSwitchError {
  readonly code: ErrorCode = 'InstallFailed';
  readonly detail: string;

  constructor(formula: string, detail: string) {
    super(`Failed to install ${formula}`, `Run \`brew doctor\`, then \`brew install -v ${formula}\``);
    this.detail = detail;
  }
}

export class UninstallFailedError extends PhpSwitchError {
  readonly code: ErrorCode = 'UninstallFailed';
  readonly detail: string;

  constructor(formula: string, detail: string, hint = `Try \`brew uninstall --force ${formula}\``) {
    super(`Failed to uninstall ${formula}`, hint);
    this.detail = detail;
  }
}

export class LinkFailedError extends PhpSwitchError {
  readonly code: ErrorCode = 'LinkFailed';
  readonly detail: string;

  constructor(formula: string, detail: string) {
    super(
      `Homebrew could not link ${formula}: ${detail || 'no output'}`,
      `Inspect conflicts with \`brew link --overwrite --dry-run ${formula}\``
    );
    this.detail = detail;
  }
}

export class ConfigWriteFailedError extends PhpSwitchError {
  readonly code: ErrorCode = 'ConfigWriteFailed';
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(
      `Could not update ${filePath}: ${reason}`,
      `Check permissions on ${filePath}; Homebrew is already linked, so re-run the switch once it is writable`
    );
    this.filePath = filePath;
  }
}

export class ServiceOperationTimedOutError extends PhpSwitchError {
  readonly code: ErrorCode = 'ServiceOperationTimedOut';

  constructor(service: string, action: string, timeoutMs: number) {
    super(
      `\`brew services ${action} ${service}\` timed out after ${Math.round(timeoutMs / 1000)}s`,
      `Check it with \`brew services list\`, then \`brew services ${action} ${service}\``
    );
  }
}

export class ServiceOperationFailedError extends PhpSwitchError {
  readonly code: ErrorCode = 'ServiceOperationFailed';

  constructor(service: string, action: string, detail: string) {
    super(
      `\`brew services ${action} ${service}\` failed${detail ? `: ${detail}` : ''}`,
      `PHP-FPM is only needed for web server integration; retry with \`brew services ${action} ${service}\``
    );
  }
}

export class UnsupportedShellError extends PhpSwitchError {
  readonly code: ErrorCode = 'UnsupportedShell';

  constructor(feature: string) {
    super(
      `${feature} needs zsh, bash or fish`,
      'Set SHELL to one of them, or run `phpswitch project` yourself after changing directory'
    );
  }
}

export function isPhpSwitchError(error: unknown): error is PhpSwitchError {
  return error instanceof PhpSwitchError;
}

/**
 * True for anything shaped like an Error. `instanceof Error` misses errors
 * raised in another realm, such as Node's own fs errors under a vm context.
 */
export function isErrorLike(value: unknown): value is { message: string } {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

export function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : 'Unknown error';
}
