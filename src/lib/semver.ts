/**
 * Semantic version utilities, on top of the semver package.
 */

import * as semver from 'semver';

export type SemverBump =
  | 'major'
  | 'minor'
  | 'patch'
  | 'premajor'
  | 'preminor'
  | 'prepatch'
  | 'prerelease';

export const SEMVER_BUMPS: readonly SemverBump[] = [
  'major',
  'minor',
  'patch',
  'premajor',
  'preminor',
  'prepatch',
  'prerelease',
];

/**
 * Parse a strict semver string (no `v` or `=` prefix, no surrounding space).
 */
export function parse(version: string): semver.SemVer | null {
  if (!/^\d/.test(version) || version.trim() !== version) return null;
  return semver.parse(version);
}

export function isValid(version: string): boolean {
  return parse(version) !== null;
}

/**
 * Compare two versions. Negative, zero or positive.
 */
export function compare(a: string, b: string): number {
  return semver.compare(a, b);
}

/**
 * Bump version by type. Prerelease bumps use `preid` as identifier.
 * 1.2.3 + minor → 1.3.0
 * 1.2.3 + prerelease (rc) → 1.2.4-rc.0
 * 1.2.4-rc.0 + prerelease (rc) → 1.2.4-rc.1
 */
export function bump(version: string, type: SemverBump, preid: string): string {
  const next = semver.inc(version, type, preid);
  if (!next) {
    throw new Error(`Invalid version: ${version}`);
  }
  return next;
}

/**
 * Get the prerelease stage (alpha, beta, rc, ...) or null for stable.
 */
export function getStage(version: string): string | null {
  const parsed = parse(version);
  const first = parsed?.prerelease[0];
  return typeof first === 'string' ? first : null;
}
