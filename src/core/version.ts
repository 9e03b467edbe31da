/**
 * Version resolution - the next version from a base version and bump kind.
 *
 * Pure functions, no I/O.
 */

import type { BumpKind, SchemeName } from '../domain/types.ts';
import { VersionError, VersionFormatError, VersionSchemeError } from '../lib/error.ts';
import * as pep440 from '../lib/pep440.ts';
import * as semver from '../lib/semver.ts';

export interface VersionScheme {
  name: SchemeName;
  kinds: readonly BumpKind[];
  isValid(version: string): boolean;
  compare(a: string, b: string): number;
  /** Only called with a valid version and a kind from `kinds` */
  bump(version: string, kind: BumpKind, preid: string): string;
}

const SEMVER: VersionScheme = {
  name: 'semver',
  kinds: semver.SEMVER_BUMPS,
  isValid: semver.isValid,
  compare: semver.compare,
  bump(version, kind, preid) {
    const type = semver.SEMVER_BUMPS.find((k) => k === kind);
    if (!type) throw new VersionSchemeError(kind, 'semver');
    return semver.bump(version, type, preid);
  },
};

const PEP440: VersionScheme = {
  name: 'pep440',
  kinds: pep440.PEP440_BUMPS,
  isValid: pep440.isValid,
  compare: pep440.compare,
  bump(version, kind, preid) {
    const type = pep440.PEP440_BUMPS.find((k) => k === kind);
    if (!type) throw new VersionSchemeError(kind, 'pep440');
    if (pep440.isPreLabel(preid)) {
      return pep440.bump(version, type, preid);
    }
    if (type === 'prerelease') {
      throw new VersionSchemeError(`prerelease (${preid})`, 'pep440');
    }
    return pep440.bump(version, type, 'rc');
  },
};

export function getScheme(name: SchemeName): VersionScheme {
  return name === 'semver' ? SEMVER : PEP440;
}

/**
 * Check that a version parses under the scheme.
 */
export function assertValidVersion(version: string, scheme: VersionScheme): void {
  if (!scheme.isValid(version)) {
    throw new VersionFormatError(version, scheme.name);
  }
}

/**
 * Check that the scheme defines the bump kind.
 */
export function assertSupportedKind(kind: BumpKind, scheme: VersionScheme): void {
  if (!scheme.kinds.includes(kind)) {
    throw new VersionSchemeError(kind, scheme.name);
  }
}

/**
 * Compute the next version. The result always compares strictly greater
 * than the base version under the scheme's ordering.
 */
export function resolveVersion(
  baseVersion: string,
  kind: BumpKind,
  scheme: VersionScheme,
  preid = 'rc',
): string {
  assertValidVersion(baseVersion, scheme);
  assertSupportedKind(kind, scheme);

  const next = scheme.bump(baseVersion, kind, preid);
  if (scheme.compare(next, baseVersion) <= 0) {
    throw new VersionError(
      `Bumping ${baseVersion} (${kind}) gives ${next}, which is not greater`,
      'NON_ADVANCING',
      { baseVersion, kind, next, scheme: scheme.name },
    );
  }
  return next;
}
