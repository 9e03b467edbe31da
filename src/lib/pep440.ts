/**
 * PEP 440 version utilities.
 *
 * Only canonical public versions are accepted:
 *   [N!]N(.N)*[{a|b|rc}N][.postN][.devN]
 * Local versions (`+local`) are rejected.
 */

export type PreLabel = 'a' | 'b' | 'rc';

export interface Pep440Version {
  epoch: number;
  release: number[];
  pre: { label: PreLabel; number: number } | null;
  post: number | null;
  dev: number | null;
}

export type Pep440Bump = 'major' | 'minor' | 'patch' | 'prerelease' | 'post';

export const PEP440_BUMPS: readonly Pep440Bump[] = ['major', 'minor', 'patch', 'prerelease', 'post'];

const PRE_LABELS: readonly PreLabel[] = ['a', 'b', 'rc'];

const CANONICAL_REGEX =
  /^(?:([1-9]\d*)!)?((?:0|[1-9]\d*)(?:\.(?:0|[1-9]\d*))*)(?:(a|b|rc)(0|[1-9]\d*))?(?:\.post(0|[1-9]\d*))?(?:\.dev(0|[1-9]\d*))?$/;

export function isPreLabel(value: string): value is PreLabel {
  return PRE_LABELS.some((label) => label === value);
}

/**
 * Parse a canonical PEP 440 version string.
 */
export function parse(version: string): Pep440Version | null {
  const match = version.match(CANONICAL_REGEX);
  if (!match) return null;

  const [, epoch, release, label, preNumber, post, dev] = match;
  return {
    epoch: epoch ? parseInt(epoch, 10) : 0,
    release: release.split('.').map((n) => parseInt(n, 10)),
    pre: label && isPreLabel(label) ? { label, number: parseInt(preNumber, 10) } : null,
    post: post !== undefined ? parseInt(post, 10) : null,
    dev: dev !== undefined ? parseInt(dev, 10) : null,
  };
}

export function isValid(version: string): boolean {
  return parse(version) !== null;
}

/**
 * Format parsed version back to its canonical string.
 */
export function format(v: Pep440Version): string {
  let out = v.epoch ? `${v.epoch}!` : '';
  out += v.release.join('.');
  if (v.pre) out += `${v.pre.label}${v.pre.number}`;
  if (v.post !== null) out += `.post${v.post}`;
  if (v.dev !== null) out += `.dev${v.dev}`;
  return out;
}

/**
 * Sort key per PEP 440: developmental releases of a final release sort
 * before its pre-releases, post-releases after it.
 */
function sortKey(v: Pep440Version): number[] {
  let preRank: number;
  let preNumber = 0;
  if (v.pre) {
    preRank = PRE_LABELS.indexOf(v.pre.label);
    preNumber = v.pre.number;
  } else if (v.post === null && v.dev !== null) {
    preRank = -1;
  } else {
    preRank = PRE_LABELS.length;
  }

  return [
    preRank,
    preNumber,
    v.post === null ? -1 : v.post,
    v.dev === null ? Number.POSITIVE_INFINITY : v.dev,
  ];
}

function compareRelease(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Compare two versions. Negative, zero or positive.
 */
export function compare(a: string, b: string): number {
  const pa = parse(a);
  const pb = parse(b);
  if (!pa || !pb) throw new Error(`Invalid versions: ${a}, ${b}`);

  if (pa.epoch !== pb.epoch) return pa.epoch - pb.epoch;

  const release = compareRelease(pa.release, pb.release);
  if (release !== 0) return release;

  const ka = sortKey(pa);
  const kb = sortKey(pb);
  for (let i = 0; i < ka.length; i++) {
    if (ka[i] !== kb[i]) return ka[i] < kb[i] ? -1 : 1;
  }
  return 0;
}

function padRelease(release: number[]): number[] {
  const padded = [...release];
  while (padded.length < 3) padded.push(0);
  return padded;
}

function isUnfinished(v: Pep440Version): boolean {
  return v.pre !== null || (v.dev !== null && v.post === null);
}

/**
 * Bump version by type.
 * 1.4.0 + minor → 1.5.0
 * 1.4.0 + prerelease (rc) → 1.4.1rc0
 * 1.4.1rc0 + prerelease (rc) → 1.4.1rc1
 * 1.4.0 + post → 1.4.0.post0
 *
 * Bumping a pre-release or developmental release to the final release it
 * leads to finalizes it: 2.0.0rc1 + major → 2.0.0.
 */
export function bump(version: string, type: Pep440Bump, preid: PreLabel): string {
  const parsed = parse(version);
  if (!parsed) {
    throw new Error(`Invalid version: ${version}`);
  }

  const final: Pep440Version = { ...parsed, pre: null, post: null, dev: null };
  const [major, minor, patch] = padRelease(parsed.release);
  const trailingZero = (from: number) => padRelease(parsed.release).slice(from).every((n) => n === 0);

  switch (type) {
    case 'major':
      if (isUnfinished(parsed) && trailingZero(1)) return format(final);
      return format({ ...final, release: [major + 1, 0, 0] });
    case 'minor':
      if (isUnfinished(parsed) && trailingZero(2)) return format(final);
      return format({ ...final, release: [major, minor + 1, 0] });
    case 'patch':
      if (isUnfinished(parsed)) return format(final);
      return format({ ...final, release: [major, minor, patch + 1] });
    case 'prerelease': {
      if (parsed.pre) {
        const number = parsed.pre.label === preid ? parsed.pre.number + 1 : 0;
        return format({ ...final, pre: { label: preid, number } });
      }
      if (isUnfinished(parsed)) {
        return format({ ...final, pre: { label: preid, number: 0 } });
      }
      return format({ ...final, release: [major, minor, patch + 1], pre: { label: preid, number: 0 } });
    }
    case 'post': {
      // 1.0.post1.dev2 precedes 1.0.post1, so finishing it is enough
      let post = 0;
      if (parsed.post !== null) {
        post = parsed.dev === null ? parsed.post + 1 : parsed.post;
      }
      return format({ ...parsed, post, dev: null });
    }
  }
}
