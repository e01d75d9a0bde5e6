/**
 * Version handling
 *
 * Module versions are strict SemVer 2.0.0. Constraints follow Terraform's
 * grammar: comma-separated parts with =, !=, >, >=, <, <=, ~> or a bare
 * version.
 */

import semver from 'semver';
import type { SemVer } from 'semver';
import { InvalidInputError } from '../utils/errors.js';

export interface ParsedVersion {
  version: string;
  /** True iff the pre-release segment is non-empty */
  beta: boolean;
  major: number;
  minor: number;
  patch: number;
}

// semver itself tolerates a leading "v" and surrounding whitespace
function strictParse(version: string): SemVer | null {
  if (version !== version.trim() || /^v/i.test(version)) return null;
  return semver.parse(version, { loose: false });
}

/**
 * Validate a module version
 *
 * @throws InvalidInputError when not SemVer 2.0.0 (a leading "v" is rejected)
 */
export function parseModuleVersion(version: string): ParsedVersion {
  const parsed = strictParse(version);
  if (!parsed) {
    throw new InvalidInputError(`Invalid version: ${version}`);
  }
  return {
    version: parsed.version,
    beta: parsed.prerelease.length > 0,
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
  };
}

export function isValidModuleVersion(version: string): boolean {
  return strictParse(version) !== null;
}

/**
 * Descending SemVer order
 */
export function sortVersionsDescending(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => semver.rcompare(a, b));
}

type Operator = '=' | '!=' | '>' | '>=' | '<' | '<=' | '~>';

interface ConstraintPart {
  operator: Operator;
  version: SemVer;
  /** Number of numeric segments written (1-3) */
  segments: number;
}

export interface VersionConstraint {
  raw: string;
  parts: readonly ConstraintPart[];
  /** Some part names a pre-release version */
  allowsPrerelease: boolean;
}

const PART_PATTERN = /^(=|!=|>=|<=|>|<|~>)?\s*v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

/**
 * Parse a constraint string. An empty string matches every release.
 *
 * @throws InvalidInputError for unparseable parts
 */
export function parseConstraint(raw: string): VersionConstraint {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return { raw, parts: [], allowsPrerelease: false };
  }

  const parts = trimmed.split(',').map(text => {
    const part = text.trim();
    const match = PART_PATTERN.exec(part);
    if (!match) {
      throw new InvalidInputError(`Invalid version constraint: ${part}`);
    }
    const [, operator = '=', major = '0', minor, patch, prerelease] = match;
    if (prerelease !== undefined && (minor === undefined || patch === undefined)) {
      throw new InvalidInputError(`Pre-release constraints need a full version: ${part}`);
    }
    const segments = 1 + (minor !== undefined ? 1 : 0) + (patch !== undefined ? 1 : 0);
    const text3 = `${major}.${minor ?? '0'}.${patch ?? '0'}${prerelease !== undefined ? `-${prerelease}` : ''}`;
    const version = semver.parse(text3);
    if (!version || !isOperator(operator)) {
      throw new InvalidInputError(`Invalid version constraint: ${part}`);
    }
    return { operator, version, segments };
  });

  return {
    raw,
    parts,
    allowsPrerelease: parts.some(part => part.version.prerelease.length > 0),
  };
}

function isOperator(value: string): value is Operator {
  return ['=', '!=', '>', '>=', '<', '<=', '~>'].includes(value);
}

function compareRelease(a: SemVer, major: number, minor: number, patch: number): number {
  if (a.major !== major) return a.major < major ? -1 : 1;
  if (a.minor !== minor) return a.minor < minor ? -1 : 1;
  if (a.patch !== patch) return a.patch < patch ? -1 : 1;
  return 0;
}

function partAllows(part: ConstraintPart, candidate: SemVer): boolean {
  const cmp = semver.compare(candidate, part.version);
  switch (part.operator) {
    case '=':
      return cmp === 0;
    case '!=':
      return cmp !== 0;
    case '>':
      return cmp > 0;
    case '>=':
      return cmp >= 0;
    case '<':
      return cmp < 0;
    case '<=':
      return cmp <= 0;
    case '~>': {
      if (cmp < 0) return false;
      // The rightmost written segment may increase; everything left of it is pinned
      const { major, minor } = part.version;
      const upper = part.segments === 3 ? [major, minor + 1, 0] : [major + 1, 0, 0];
      return compareRelease(candidate, upper[0] ?? 0, upper[1] ?? 0, upper[2] ?? 0) < 0;
    }
  }
}

export function satisfiesConstraint(version: string, constraint: VersionConstraint): boolean {
  const candidate = semver.parse(version);
  if (!candidate) return false;
  if (candidate.prerelease.length > 0 && !constraint.allowsPrerelease) {
    return false;
  }
  return constraint.parts.every(part => partAllows(part, candidate));
}

/**
 * Highest version satisfying the constraint, or null
 */
export function resolveConstraint(versions: readonly string[], constraint: VersionConstraint): string | null {
  for (const version of sortVersionsDescending(versions.filter(v => semver.valid(v) !== null))) {
    if (satisfiesConstraint(version, constraint)) {
      return version;
    }
  }
  return null;
}

/**
 * Highest non-pre-release version, or null
 */
export function latestStableVersion(versions: readonly string[]): string | null {
  return resolveConstraint(versions, parseConstraint(''));
}
