/**
 * VCS abstraction for relcut.
 *
 * ReleaseRepo is the capability set the release workflow needs from the
 * local repository. Designed for distributed VCS; the production
 * implementation drives the git CLI, the in-memory one backs the tests.
 *
 * Every method may reject with an AdapterError. A merge conflict is not an
 * error: it is a MergeOutcome.
 */

/** Opaque revision identifier. Never parse or assume format. */
export type RevisionId = string;

export type MergeOutcome =
  | { kind: 'clean'; rev: RevisionId }
  | { kind: 'conflicted'; paths: string[] };

export interface MergeOptions {
  message: string;
  /** Allow a fast-forward instead of always creating a merge commit */
  fastForward: boolean;
}

export interface CommitOptions {
  /** Paths to stage before committing; none commits what is staged */
  paths?: string[];
  signOff?: boolean;
  gpgSign?: boolean;
}

export interface TagOptions {
  /** Annotated tag message; lightweight tag when annotate is false */
  message: string;
  annotate: boolean;
  gpgSign?: boolean;
}

/** Local repository operations the release workflow relies on. */
export interface ReleaseRepo {
  // --- Working tree ---
  isClean(): Promise<boolean>;
  /** Modified, staged, unmerged and untracked paths */
  changedPaths(): Promise<string[]>;
  readFile(path: string): Promise<string | null>;
  /** Committed content of a file at a revision, null when absent there */
  readFileAt(rev: RevisionId, path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;

  // --- Branches ---
  /** Current branch name, null when HEAD is detached */
  currentBranch(): Promise<string | null>;
  checkout(branch: string): Promise<void>;
  branchExists(name: string): Promise<boolean>;
  /** Does `source` have commits that `target` does not contain? */
  hasCommitsNotIn(source: string, target: string): Promise<boolean>;

  // --- Merging ---
  merge(source: string, target: string, options: MergeOptions): Promise<MergeOutcome>;
  isMerging(): Promise<boolean>;
  abortMerge(): Promise<void>;
  /** Paths with unmerged index entries */
  conflictedPaths(): Promise<string[]>;
  /** Unmerged entries, or conflict markers left in any of `paths` */
  hasUnresolvedConflicts(paths: string[]): Promise<boolean>;

  // --- History ---
  head(): Promise<RevisionId>;
  resolveRef(ref: string): Promise<RevisionId | null>;
  parentOf(rev: RevisionId): Promise<RevisionId | null>;
  getCommitMessage(rev: RevisionId): Promise<string>;
  commitExists(rev: RevisionId): Promise<boolean>;
  isAncestor(ancestor: RevisionId, descendant: RevisionId): Promise<boolean>;
  commit(message: string, options?: CommitOptions): Promise<RevisionId>;
  resetHard(rev: RevisionId): Promise<void>;

  // --- Tags ---
  tagExists(name: string): Promise<boolean>;
  /** Commit the tag points to (annotated tags dereferenced) */
  tagTarget(name: string): Promise<RevisionId | null>;
  /** Returns the tag object id (the commit id for lightweight tags) */
  tag(name: string, target: RevisionId, options: TagOptions): Promise<string>;
  deleteTag(name: string): Promise<void>;
}

const CONFLICT_MARKER = /^(<{7}|={7}|>{7})(?: |\r?$)/;

/**
 * Does the content still carry a conflict block: a `<<<<<<<` line, then
 * `=======`, then `>>>>>>>`? A lone `=======` is a heading underline.
 */
export function hasConflictMarkers(content: string): boolean {
  let seen = '';
  for (const line of content.split('\n')) {
    const marker = CONFLICT_MARKER.exec(line)?.[1][0];
    if (marker === '<') {
      seen = '<';
    } else if (marker === '=' && seen === '<') {
      seen = '=';
    } else if (marker === '>' && seen === '=') {
      return true;
    }
  }
  return false;
}

/**
 * Tag name check, a subset of `git check-ref-format` rules.
 */
export function isValidTagName(name: string): boolean {
  if (name === '' || name === '@') return false;
  if (/[\x00-\x20\x7f~^:?*[\\]/.test(name)) return false;
  if (name.includes('..') || name.includes('@{') || name.includes('//')) return false;
  if (name.startsWith('/') || name.endsWith('/') || name.endsWith('.')) return false;
  return name.split('/').every((part) => !part.startsWith('.') && !part.endsWith('.lock'));
}
