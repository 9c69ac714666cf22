import * as path from 'path';
import { HomebrewClient } from './brew/HomebrewClient';
import { CommandRunner } from '../utils/ProcessUtils';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';
import {
  DEFAULT_VERSION,
  FORMULA_FAMILY,
  VersionIdentifier,
  formulaToIdentifier,
  isDefaultVersion,
  sameVersion,
  versionedIdentifier,
} from '../types/Version';

export interface PhpBinary {
  path: string;
  /** Symlinks resolved */
  realPath: string;
}

export interface ActiveVersionReport {
  /** null when no php on PATH ran or its output could not be read */
  identifier: VersionIdentifier | null;
  fullVersion: string | null;
  binary: PhpBinary | null;
  linked: VersionIdentifier | null;
  pathInconsistent: boolean;
}

export interface VersionResolverOptions {
  brew: HomebrewClient;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

const PHP_VERSION_OUTPUT = /^PHP (\d+\.\d+\.\d+\S*)/m;

const log = logger.child('resolver');

export class VersionResolver {
  private readonly brew: HomebrewClient;
  private readonly runner: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly timeoutMs: number;

  constructor(options: VersionResolverOptions) {
    this.brew = options.brew;
    this.runner = options.runner ?? options.brew.getRunner();
    this.env = options.env ?? process.env;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async getLinkedVersion(): Promise<VersionIdentifier | null> {
    const formula = await this.brew.getLinkedFormula();
    return formula ? formulaToIdentifier(formula) : null;
  }

  /**
   * What `php` on PATH really runs, checked against Homebrew's link. Never
   * throws; anything that cannot be determined is reported as null.
   */
  async getActiveVersion(): Promise<ActiveVersionReport> {
    const linked = await this.getLinkedVersion().catch((error: unknown) => {
      log.debug('Could not read the linked formula', error);
      return null;
    });

    const [binary] = await this.findBinariesOnPath();
    if (!binary) {
      return { identifier: null, fullVersion: null, binary: null, linked, pathInconsistent: false };
    }

    const fullVersion = await this.readVersion(binary.path);
    const majorMinor = fullVersion?.match(/^(\d+\.\d+)/)?.[1];
    if (!fullVersion || !majorMinor) {
      return { identifier: null, fullVersion, binary, linked, pathInconsistent: false };
    }

    let identifier = versionedIdentifier(majorMinor);
    if (linked && isDefaultVersion(linked)) {
      // the unsuffixed formula's version is only known by running its own keg
      const kegBinary = path.join(await this.brew.optPath(FORMULA_FAMILY), 'bin', 'php');
      const kegVersion = await this.readVersion(kegBinary);
      if (kegVersion?.startsWith(`${majorMinor}.`)) {
        identifier = { ...DEFAULT_VERSION };
      }
    }

    const pathInconsistent = linked !== null && !sameVersion(identifier, linked);
    if (pathInconsistent) {
      log.debug(`${binary.path} reports ${fullVersion} but ${linked.formula} is linked`);
    }

    return { identifier, fullVersion, binary, linked, pathInconsistent };
  }

  /**
   * Every executable `php` on PATH, in lookup order.
   */
  async findBinariesOnPath(): Promise<PhpBinary[]> {
    const directories = (this.env.PATH ?? '').split(path.delimiter).filter(Boolean);
    const binaries: PhpBinary[] = [];
    const seen = new Set<string>();

    for (const directory of directories) {
      const candidate = path.join(directory, 'php');
      if (seen.has(candidate)) {
        continue;
      }
      seen.add(candidate);

      if (await FileSystem.isExecutable(candidate)) {
        binaries.push({ path: candidate, realPath: await FileSystem.realPath(candidate) });
      }
    }

    return binaries;
  }

  private async readVersion(binaryPath: string): Promise<string | null> {
    try {
      const result = await this.runner.execute(binaryPath, ['-v'], { timeout: this.timeoutMs });
      if (result.timedOut || result.exitCode !== 0) {
        log.debug(`${binaryPath} -v failed with exit code ${result.exitCode}`);
        return null;
      }
      return result.stdout.match(PHP_VERSION_OUTPUT)?.[1] ?? null;
    } catch (error) {
      log.debug(`Could not run ${binaryPath}`, error);
      return null;
    }
  }
}
