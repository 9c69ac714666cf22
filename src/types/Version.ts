// src/types/Version.ts - PHP version identifiers and Homebrew formula names
import { InvalidVersionError } from './Errors';

export const FORMULA_FAMILY = 'php';
export const DEFAULT_VERSION_TOKEN = 'default';

/**
 * A PHP version as the switcher sees it: a short token ("8.1" or "default")
 * and the single Homebrew formula that provides it ("php@8.1" or "php").
 */
export interface VersionIdentifier {
  version: string;
  formula: string;
}

export interface InstalledVersion {
  identifier: VersionIdentifier;
  formula: string;
  installPath: string;
  linked: boolean;
  /** Full keg version reported by Homebrew, e.g. "8.1.29" */
  fullVersion?: string;
}

export interface AvailableVersion {
  identifier: VersionIdentifier;
  installed: boolean;
}

export const DEFAULT_VERSION: Readonly<VersionIdentifier> = Object.freeze({
  version: DEFAULT_VERSION_TOKEN,
  formula: FORMULA_FAMILY,
});

const VERSIONED_FORMULA = /^php@(\d+\.\d+)$/;
const MAJOR_MINOR = /^(\d+)\.(\d+)$/;

export function isDefaultVersion(identifier: VersionIdentifier): boolean {
  return identifier.formula === FORMULA_FAMILY;
}

export function versionedIdentifier(majorMinor: string): VersionIdentifier {
  return { version: majorMinor, formula: `${FORMULA_FAMILY}@${majorMinor}` };
}

/**
 * Parses user input ("8.1", "php@8.1", "default", "php@default", "php").
 */
export function parseVersionIdentifier(input: string): VersionIdentifier {
  const token = input.trim();

  if (token === DEFAULT_VERSION_TOKEN || token === `${FORMULA_FAMILY}@${DEFAULT_VERSION_TOKEN}`) {
    return { ...DEFAULT_VERSION };
  }

  const fromFormula = formulaToIdentifier(token);
  if (fromFormula) {
    return fromFormula;
  }

  if (MAJOR_MINOR.test(token)) {
    return versionedIdentifier(token);
  }

  throw new InvalidVersionError(input);
}

export function tryParseVersionIdentifier(input: string): VersionIdentifier | null {
  try {
    return parseVersionIdentifier(input);
  } catch {
    return null;
  }
}

/**
 * Maps a Homebrew formula name back to its identifier, or null for anything
 * outside the php family.
 */
export function formulaToIdentifier(formula: string): VersionIdentifier | null {
  if (formula === FORMULA_FAMILY) {
    return { ...DEFAULT_VERSION };
  }

  const match = formula.match(VERSIONED_FORMULA);
  return match ? versionedIdentifier(match[1]) : null;
}

export function isPhpFormula(name: string): boolean {
  return formulaToIdentifier(name) !== null;
}

/**
 * Extracts "major.minor" from a full version string such as "8.2.12".
 */
export function toMajorMinor(fullVersion: string): string | null {
  const match = fullVersion.match(/^(\d+)\.(\d+)/);
  return match ? `${match[1]}.${match[2]}` : null;
}

export function sameVersion(a: VersionIdentifier, b: VersionIdentifier): boolean {
  return a.formula === b.formula;
}

/**
 * Versioned formulae ascending by major/minor, the unsuffixed formula last.
 */
export function compareIdentifiers(a: VersionIdentifier, b: VersionIdentifier): number {
  const aDefault = isDefaultVersion(a);
  const bDefault = isDefaultVersion(b);
  if (aDefault || bDefault) {
    return Number(aDefault) - Number(bDefault);
  }

  const [aMajor, aMinor] = a.version.split('.').map(part => parseInt(part, 10));
  const [bMajor, bMinor] = b.version.split('.').map(part => parseInt(part, 10));
  return aMajor - bMajor || aMinor - bMinor;
}

export function formatIdentifier(identifier: VersionIdentifier): string {
  return isDefaultVersion(identifier) ? `${FORMULA_FAMILY}@${DEFAULT_VERSION_TOKEN}` : identifier.formula;
}
