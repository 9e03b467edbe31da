/**
 * In-memory repository - a ReleaseRepo for tests.
 *
 * Simulates commits, branches, a staging index, the working tree,
 * three-way file merges with conflict markers and tags. User actions
 * (editing, staging, committing by hand) go through the helpers at the
 * bottom of the class.
 */

import type {
  CommitOptions,
  MergeOptions,
  MergeOutcome,
  ReleaseRepo,
  RevisionId,
  TagOptions,
} from '../../domain/vcs.ts';
import { hasConflictMarkers } from '../../domain/vcs.ts';
import { AdapterError } from '../../lib/error.ts';

type Tree = Map<string, string>;

interface MemoryCommit {
  id: RevisionId;
  parents: RevisionId[];
  message: string;
  tree: Tree;
}

interface MemoryTag {
  id: string;
  target: RevisionId;
  message: string | null;
}

type RepoMethod = keyof ReleaseRepo;

function sameTree(a: Tree, b: Tree): boolean {
  if (a.size !== b.size) return false;
  for (const [path, content] of a) {
    if (b.get(path) !== content) return false;
  }
  return true;
}

function withNewline(content: string): string {
  return content.endsWith('\n') ? content : content + '\n';
}

export class MemoryRepo implements ReleaseRepo {
  private commits = new Map<RevisionId, MemoryCommit>();
  private branches = new Map<string, RevisionId>();
  private tags = new Map<string, MemoryTag>();
  private branch: string | null;
  private detached: RevisionId | null = null;
  private index: Tree = new Map();
  private worktree: Tree = new Map();
  private unmerged = new Set<string>();
  private mergeHead: RevisionId | null = null;
  private failures = new Map<RepoMethod, string>();
  private counter = 0;

  /** Every mutating adapter call, in order */
  readonly log: string[] = [];

  constructor(options: { branch?: string; files?: Record<string, string>; message?: string } = {}) {
    this.branch = options.branch ?? 'main';
    const tree: Tree = new Map(Object.entries(options.files ?? {}));
    const root = this.createCommit([], options.message ?? 'initial commit', tree);
    this.branches.set(this.branch, root);
    this.index = new Map(tree);
    this.worktree = new Map(tree);
  }

  private nextId(prefix: string): string {
    this.counter++;
    return `${prefix}${this.counter.toString(16).padStart(7, '0')}`;
  }

  private createCommit(parents: RevisionId[], message: string, tree: Tree): RevisionId {
    const id = this.nextId('c');
    this.commits.set(id, { id, parents, message, tree: new Map(tree) });
    return id;
  }

  private getCommit(rev: RevisionId): MemoryCommit {
    const commit = this.commits.get(rev);
    if (!commit) {
      throw new AdapterError(`Unknown revision: ${rev}`, { rev });
    }
    return commit;
  }

  private headTree(): Tree {
    return this.getCommit(this.headRev()).tree;
  }

  private headRev(): RevisionId {
    if (this.detached !== null) return this.detached;
    const tip = this.branch === null ? undefined : this.branches.get(this.branch);
    if (tip === undefined) {
      throw new AdapterError('HEAD does not point to a commit');
    }
    return tip;
  }

  private moveHead(rev: RevisionId): void {
    if (this.detached === null && this.branch !== null) {
      this.branches.set(this.branch, rev);
    } else {
      this.detached = rev;
    }
  }

  private syncTo(tree: Tree): void {
    this.index = new Map(tree);
    this.worktree = new Map(tree);
    this.unmerged.clear();
    this.mergeHead = null;
  }

  private ancestors(rev: RevisionId): Set<RevisionId> {
    const seen = new Set<RevisionId>();
    const queue = [rev];
    while (queue.length > 0) {
      const next = queue.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.getCommit(next).parents);
    }
    return seen;
  }

  private mergeBase(a: RevisionId, b: RevisionId): RevisionId | null {
    const ofA = this.ancestors(a);
    const queue = [b];
    const seen = new Set<RevisionId>();
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      if (ofA.has(next)) return next;
      seen.add(next);
      queue.push(...this.getCommit(next).parents);
    }
    return null;
  }

  private resolve(ref: string): RevisionId | null {
    if (ref === 'HEAD') return this.headRev();
    const parent = ref.match(/^(.+)\^$/);
    if (parent) {
      const rev = this.resolve(parent[1]);
      return rev === null ? null : this.getCommit(rev).parents[0] ?? null;
    }
    const name = ref.replace(/^refs\/(heads|tags)\//, '');
    if (!ref.startsWith('refs/tags/') && this.branches.has(name)) {
      return this.branches.get(name) ?? null;
    }
    if (!ref.startsWith('refs/heads/') && this.tags.has(name)) {
      return this.tags.get(name)?.target ?? null;
    }
    return this.commits.has(ref) ? ref : null;
  }

  /**
   * Throw the scheduled failure for a method, if any.
   */
  private check(method: RepoMethod): void {
    const message = this.failures.get(method);
    if (message !== undefined) {
      this.failures.delete(method);
      throw new AdapterError(message, { method });
    }
  }

  // --- Working tree ---

  async isClean(): Promise<boolean> {
    return (await this.changedPaths()).length === 0;
  }

  async changedPaths(): Promise<string[]> {
    this.check('changedPaths');
    const head = this.headTree();
    const paths = new Set<string>(this.unmerged);
    for (const tree of [this.index, this.worktree]) {
      for (const path of new Set([...head.keys(), ...tree.keys()])) {
        if (head.get(path) !== tree.get(path)) paths.add(path);
      }
    }
    return [...paths].sort();
  }

  async readFile(path: string): Promise<string | null> {
    this.check('readFile');
    return this.worktree.get(path) ?? null;
  }

  async readFileAt(rev: RevisionId, path: string): Promise<string | null> {
    this.check('readFileAt');
    return this.getCommit(rev).tree.get(path) ?? null;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.check('writeFile');
    this.log.push(`writeFile ${path}`);
    this.worktree.set(path, content);
  }

  // --- Branches ---

  async currentBranch(): Promise<string | null> {
    this.check('currentBranch');
    return this.detached === null ? this.branch : null;
  }

  async checkout(branch: string): Promise<void> {
    this.check('checkout');
    const tip = this.branches.get(branch);
    if (tip === undefined) {
      throw new AdapterError(`pathspec '${branch}' did not match any branch`, { branch });
    }
    if (!(await this.isClean())) {
      throw new AdapterError('Your local changes would be overwritten by checkout', { branch });
    }
    this.log.push(`checkout ${branch}`);
    this.branch = branch;
    this.detached = null;
    this.syncTo(this.getCommit(tip).tree);
  }

  async branchExists(name: string): Promise<boolean> {
    this.check('branchExists');
    return this.branches.has(name);
  }

  async hasCommitsNotIn(source: string, target: string): Promise<boolean> {
    this.check('hasCommitsNotIn');
    const sourceTip = this.requireBranch(source);
    const targetTip = this.requireBranch(target);
    return !this.ancestors(targetTip).has(sourceTip);
  }

  private requireBranch(name: string): RevisionId {
    const tip = this.branches.get(name);
    if (tip === undefined) {
      throw new AdapterError(`Unknown branch: ${name}`, { branch: name });
    }
    return tip;
  }

  // --- Merging ---

  async merge(source: string, target: string, options: MergeOptions): Promise<MergeOutcome> {
    this.check('merge');
    if (this.branch !== target || this.detached !== null) {
      await this.checkout(target);
    }
    if (!(await this.isClean())) {
      throw new AdapterError('Your local changes would be overwritten by merge', { source });
    }
    this.log.push(`merge ${source}`);

    const ours = this.headRev();
    const theirs = this.requireBranch(source);
    const oursAncestors = this.ancestors(ours);

    if (oursAncestors.has(theirs)) {
      return { kind: 'clean', rev: ours };
    }
    if (options.fastForward && this.ancestors(theirs).has(ours)) {
      this.moveHead(theirs);
      this.syncTo(this.getCommit(theirs).tree);
      return { kind: 'clean', rev: theirs };
    }

    const baseRev = this.mergeBase(ours, theirs);
    const base = baseRev === null ? new Map<string, string>() : this.getCommit(baseRev).tree;
    const oursTree = this.getCommit(ours).tree;
    const theirsTree = this.getCommit(theirs).tree;

    const merged: Tree = new Map();
    const conflicted: string[] = [];
    const paths = new Set([...base.keys(), ...oursTree.keys(), ...theirsTree.keys()]);

    for (const path of [...paths].sort()) {
      const b = base.get(path);
      const o = oursTree.get(path);
      const t = theirsTree.get(path);
      let result: string | undefined;

      if (o === t || t === b) {
        result = o;
      } else if (o === b) {
        result = t;
      } else {
        conflicted.push(path);
        if (o === undefined || t === undefined) {
          result = o ?? t;
        } else {
          result = `<<<<<<< HEAD\n${withNewline(o)}=======\n${withNewline(t)}>>>>>>> ${source}\n`;
        }
      }

      if (result !== undefined) merged.set(path, result);
    }

    if (conflicted.length === 0) {
      const rev = this.createCommit([ours, theirs], options.message, merged);
      this.moveHead(rev);
      this.syncTo(merged);
      return { kind: 'clean', rev };
    }

    this.worktree = new Map(merged);
    this.index = new Map(merged);
    for (const path of conflicted) {
      const o = oursTree.get(path);
      if (o === undefined) this.index.delete(path);
      else this.index.set(path, o);
      this.unmerged.add(path);
    }
    this.mergeHead = theirs;
    return { kind: 'conflicted', paths: conflicted };
  }

  async isMerging(): Promise<boolean> {
    this.check('isMerging');
    return this.mergeHead !== null;
  }

  async abortMerge(): Promise<void> {
    this.check('abortMerge');
    if (this.mergeHead === null) {
      throw new AdapterError('There is no merge to abort (MERGE_HEAD missing)');
    }
    this.log.push('abortMerge');
    this.syncTo(this.headTree());
  }

  async conflictedPaths(): Promise<string[]> {
    this.check('conflictedPaths');
    return [...this.unmerged].sort();
  }

  async hasUnresolvedConflicts(paths: string[]): Promise<boolean> {
    this.check('hasUnresolvedConflicts');
    if (this.unmerged.size > 0) return true;
    return paths.some((path) => hasConflictMarkers(this.worktree.get(path) ?? ''));
  }

  // --- History ---

  async head(): Promise<RevisionId> {
    this.check('head');
    return this.headRev();
  }

  async resolveRef(ref: string): Promise<RevisionId | null> {
    this.check('resolveRef');
    return this.resolve(ref);
  }

  async parentOf(rev: RevisionId): Promise<RevisionId | null> {
    this.check('parentOf');
    return this.getCommit(rev).parents[0] ?? null;
  }

  async getCommitMessage(rev: RevisionId): Promise<string> {
    this.check('getCommitMessage');
    return this.getCommit(rev).message;
  }

  async commitExists(rev: RevisionId): Promise<boolean> {
    this.check('commitExists');
    return this.commits.has(rev);
  }

  async isAncestor(ancestor: RevisionId, descendant: RevisionId): Promise<boolean> {
    this.check('isAncestor');
    this.getCommit(ancestor);
    return this.ancestors(descendant).has(ancestor);
  }

  async commit(message: string, options: CommitOptions = {}): Promise<RevisionId> {
    this.check('commit');
    for (const path of options.paths ?? []) {
      this.stage(path);
    }
    if (this.unmerged.size > 0) {
      throw new AdapterError('Committing is not possible because you have unmerged files');
    }

    const head = this.headRev();
    if (this.mergeHead === null && sameTree(this.index, this.headTree())) {
      throw new AdapterError('nothing to commit, working tree clean');
    }

    this.log.push(`commit ${message.split('\n')[0]}`);
    const parents = this.mergeHead === null ? [head] : [head, this.mergeHead];
    const rev = this.createCommit(parents, message, this.index);
    this.moveHead(rev);
    this.mergeHead = null;
    return rev;
  }

  async resetHard(rev: RevisionId): Promise<void> {
    this.check('resetHard');
    const commit = this.getCommit(rev);
    this.log.push(`resetHard ${rev}`);
    this.moveHead(rev);
    this.syncTo(commit.tree);
  }

  // --- Tags ---

  async tagExists(name: string): Promise<boolean> {
    this.check('tagExists');
    return this.tags.has(name);
  }

  async tagTarget(name: string): Promise<RevisionId | null> {
    this.check('tagTarget');
    return this.tags.get(name)?.target ?? null;
  }

  async tag(name: string, target: RevisionId, options: TagOptions): Promise<string> {
    this.check('tag');
    if (this.tags.has(name)) {
      throw new AdapterError(`tag '${name}' already exists`, { name });
    }
    this.getCommit(target);
    this.log.push(`tag ${name}`);
    const id = options.annotate ? this.nextId('t') : target;
    this.tags.set(name, { id, target, message: options.annotate ? options.message : null });
    return id;
  }

  async deleteTag(name: string): Promise<void> {
    this.check('deleteTag');
    if (!this.tags.delete(name)) {
      throw new AdapterError(`tag '${name}' not found`, { name });
    }
    this.log.push(`deleteTag ${name}`);
  }

  // --- Test helpers ---

  /**
   * Make the next call to `method` fail with an AdapterError.
   */
  failNext(method: RepoMethod, message = `simulated ${method} failure`): void {
    this.failures.set(method, message);
  }

  /** Create a branch at the current HEAD (or `from`) without switching. */
  createBranch(name: string, from?: string): void {
    const rev = from === undefined ? this.headRev() : this.resolve(from);
    if (rev === null) {
      throw new AdapterError(`Unknown revision: ${from}`);
    }
    this.branches.set(name, rev);
  }

  /** Edit a file in the working tree, as a user would. */
  edit(path: string, content: string): void {
    this.worktree.set(path, content);
  }

  /** Remove a file from the working tree. */
  remove(path: string): void {
    this.worktree.delete(path);
  }

  /** Stage a working tree path, marking it resolved. */
  stage(path: string): void {
    const content = this.worktree.get(path);
    if (content === undefined) this.index.delete(path);
    else this.index.set(path, content);
    this.unmerged.delete(path);
  }

  /**
   * Commit files on a branch as a user would, leaving HEAD where it was
   * unless the branch is checked out.
   */
  commitOn(branch: string, message: string, files: Record<string, string | null>): RevisionId {
    const parent = this.requireBranch(branch);
    const tree = new Map(this.getCommit(parent).tree);
    for (const [path, content] of Object.entries(files)) {
      if (content === null) tree.delete(path);
      else tree.set(path, content);
    }
    const rev = this.createCommit([parent], message, tree);
    this.branches.set(branch, rev);
    if (this.branch === branch && this.detached === null) {
      this.syncTo(tree);
    }
    return rev;
  }

  /** Point a tag at a commit directly. */
  setTag(name: string, target: RevisionId): void {
    this.tags.set(name, { id: target, target, message: null });
  }

  /** Detach HEAD at a revision. */
  detach(rev: RevisionId): void {
    this.detached = rev;
    this.syncTo(this.getCommit(rev).tree);
  }

  /** Committed content of a file at a revision. */
  fileAt(rev: RevisionId, path: string): string | null {
    return this.getCommit(rev).tree.get(path) ?? null;
  }

  parentsOf(rev: RevisionId): RevisionId[] {
    return [...this.getCommit(rev).parents];
  }

  tipOf(branch: string): RevisionId {
    return this.requireBranch(branch);
  }

  tagNames(): string[] {
    return [...this.tags.keys()].sort();
  }

  /** Commits reachable from a branch, newest first by creation order. */
  history(branch: string): RevisionId[] {
    return [...this.ancestors(this.requireBranch(branch))].sort().reverse();
  }
}
