/**
 * Release Workflow - merge, bump, commit and tag, resumable across
 * invocations.
 *
 * Every invocation: take the lock, load the record, check it still
 * matches the repository, then let the state machine pick actions until
 * it stops. The record is saved after every transition and before every
 * side effect it guards, so a crash at any point can be resumed or
 * aborted.
 */

import { randomUUID } from 'node:crypto';
import type { RelcutConfig } from '../domain/config.ts';
import { render } from '../domain/template.ts';
import type { TemplateValues } from '../domain/template.ts';
import type { BumpKind, Command, Phase, ReleaseAttempt } from '../domain/types.ts';
import { isValidTagName } from '../domain/vcs.ts';
import type { ReleaseRepo, RevisionId } from '../domain/vcs.ts';
import { readProjectVersion, writeVersion } from '../domain/version-files.ts';
import type { VersionFileSpec } from '../domain/version-files.ts';
import { assertTransition, decide, isActive } from '../core/machine.ts';
import type { StopReason } from '../core/machine.ts';
import { assertSupportedKind, getScheme, resolveVersion } from '../core/version.ts';
import {
  ConfigError,
  ConflictError,
  RepositoryStateError,
  RollbackError,
  VersionError,
} from '../lib/error.ts';
import type { StateStore } from '../storage/interface.ts';
import { pushUndo, rollback } from './rollback.ts';

export const TRAILER = 'Release-Attempt';

export interface ReleaseDeps {
  repo: ReleaseRepo;
  store: StateStore;
  config: RelcutConfig;
  /** Trace output for --verbose */
  debug?: (message: string) => void;
  now?: () => Date;
  newId?: () => string;
}

export interface ReleaseOptions {
  /** Bump kind for a new attempt; defaults to the configured one */
  bumpKind?: BumpKind;
}

export interface ReleaseResult {
  reason: StopReason;
  /** The record as the invocation left it, also when it was deleted */
  attempt: ReleaseAttempt | null;
}

interface Step {
  attempt: ReleaseAttempt;
  stop: StopReason | null;
}

/**
 * Append the trailer identifying the attempt that made a commit.
 */
export function withTrailer(message: string, attemptId: string): string {
  return `${message.trimEnd()}\n\n${TRAILER}: ${attemptId}`;
}

export function hasTrailer(message: string, attemptId: string): boolean {
  return message.split('\n').some((line) => line.trim() === `${TRAILER}: ${attemptId}`);
}

function templateValues(attempt: ReleaseAttempt, version: string | null): TemplateValues {
  return {
    version: version ?? '',
    previous: attempt.baseVersion,
    source: attempt.sourceBranch,
    target: attempt.targetBranch,
  };
}

/**
 * Differences between the record and the repository. Empty when they
 * agree.
 */
export async function checkConsistency(repo: ReleaseRepo, attempt: ReleaseAttempt): Promise<string[]> {
  const problems: string[] = [];

  const branch = await repo.currentBranch();
  if (branch !== attempt.targetBranch) {
    problems.push(`HEAD is on ${branch ?? 'a detached HEAD'}, the release is on ${attempt.targetBranch}`);
    return problems;
  }

  const head = await repo.head();
  const recorded: [string, string | null][] = [
    ['merge commit', attempt.mergeCommitId],
    ['bump commit', attempt.bumpCommitId],
  ];
  for (const [label, rev] of recorded) {
    if (rev === null) continue;
    if (!(await repo.commitExists(rev))) {
      problems.push(`The ${label} ${rev} no longer exists`);
    } else if (!(await repo.isAncestor(rev, head))) {
      problems.push(`The ${label} ${rev} is not in the history of ${attempt.targetBranch}`);
    }
  }

  return problems;
}

class ReleaseWorkflow {
  private repo: ReleaseRepo;
  private store: StateStore;
  private config: RelcutConfig;
  private debug: (message: string) => void;
  private now: () => Date;
  private newId: () => string;

  constructor(deps: ReleaseDeps) {
    this.repo = deps.repo;
    this.store = deps.store;
    this.config = deps.config;
    this.debug = deps.debug ?? (() => {});
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  async execute(command: Command, options: ReleaseOptions): Promise<ReleaseResult> {
    let attempt = await this.store.load();
    this.debug(attempt ? `loaded record: ${attempt.phase}` : 'no release record');

    if (isActive(attempt) && command !== 'abort') {
      const problems = await checkConsistency(this.repo, attempt);
      if (problems.length > 0) {
        throw new RepositoryStateError(
          `The repository no longer matches the release record: ${problems.join('; ')}. ` +
            'Restore it, or run relcut --abort.',
          'RECORD_MISMATCH',
          { problems },
        );
      }
    }

    for (;;) {
      const action = decide(command, attempt);
      this.debug(`action: ${action.kind}`);

      let step: Step;
      switch (action.kind) {
        case 'stop':
          return { reason: action.reason, attempt };
        case 'fail':
          throw action.error;
        case 'start':
          step = await this.start(action.editRequested, options.bumpKind ?? this.config.defaultBump);
          // An edit request only shapes the new attempt; carry on as a run
          command = 'run';
          break;
        case 'merge':
          step = await this.merge(action.attempt);
          break;
        case 'conclude-merge':
          step = await this.concludeMerge(action.attempt);
          break;
        case 'request-edit':
          step = await this.requestEdit(action.attempt);
          break;
        case 'pause-for-edit':
          step = await this.pauseForEdit(action.attempt);
          break;
        case 'resume':
          step = await this.resume(action.attempt);
          break;
        case 'bump':
          step = await this.bump(action.attempt);
          break;
        case 'tag':
          step = await this.tag(action.attempt);
          break;
        case 'abort':
          step = await this.abort(action.attempt);
          break;
      }

      if (step.stop !== null) {
        return { reason: step.stop, attempt: step.attempt };
      }
      attempt = step.attempt;
    }
  }

  // --- Record keeping ---

  private transition(attempt: ReleaseAttempt, to: Phase): ReleaseAttempt {
    assertTransition(attempt.phase, to);
    this.debug(`transition: ${attempt.phase} → ${to}`);
    return { ...attempt, phase: to };
  }

  private async save(attempt: ReleaseAttempt): Promise<ReleaseAttempt> {
    const saved = { ...attempt, updatedAt: this.now().toISOString() };
    await this.store.save(saved);
    this.debug(`saved record: ${saved.phase}`);
    return saved;
  }

  private async finish(attempt: ReleaseAttempt): Promise<ReleaseAttempt> {
    if (this.config.keepRecord) {
      return await this.save(attempt);
    }
    await this.store.clear();
    this.debug('cleared record');
    return attempt;
  }

  // --- Helpers ---

  private async assertClean(): Promise<void> {
    const paths = await this.repo.changedPaths();
    if (paths.length > 0) {
      throw new RepositoryStateError(
        `Working tree has uncommitted changes: ${paths.join(', ')}. Commit or stash them first.`,
        'DIRTY_TREE',
        { paths },
      );
    }
  }

  /**
   * Version files from the working tree, or as committed at `rev`.
   */
  private async readVersionFiles(rev?: RevisionId): Promise<[VersionFileSpec, string][]> {
    const files: [VersionFileSpec, string][] = [];
    for (const spec of this.config.versionFiles) {
      const content =
        rev === undefined ? await this.repo.readFile(spec.path) : await this.repo.readFileAt(rev, spec.path);
      if (content === null) {
        throw new VersionError(`Version file not found: ${spec.path}`, 'VERSION_FILE_MISSING', {
          path: spec.path,
        });
      }
      files.push([spec, content]);
    }
    return files;
  }

  private tagNameFor(attempt: ReleaseAttempt, version: string): string {
    const name = render(this.config.tag.format, templateValues(attempt, version));
    if (!isValidTagName(name)) {
      throw new ConfigError(`Tag format gives an invalid tag name: '${name}'`, 'CONFIG_VALIDATION_ERROR', {
        field: 'tag.format',
        value: name,
      });
    }
    return name;
  }

  private async assertTagFree(name: string): Promise<void> {
    if (await this.repo.tagExists(name)) {
      throw new RepositoryStateError(`Tag ${name} already exists`, 'TAG_EXISTS', { tag: name });
    }
  }

  private async sourceTip(attempt: ReleaseAttempt): Promise<string> {
    const tip = await this.repo.resolveRef(`refs/heads/${attempt.sourceBranch}`);
    if (tip === null) {
      throw new RepositoryStateError(`Source branch ${attempt.sourceBranch} no longer exists`, 'BRANCH_MISSING', {
        branch: attempt.sourceBranch,
      });
    }
    return tip;
  }

  // --- Actions ---

  private async start(editRequested: boolean, bumpKind: BumpKind): Promise<Step> {
    const { sourceBranch, targetBranch } = this.config;
    const scheme = getScheme(this.config.scheme);
    assertSupportedKind(bumpKind, scheme);

    await this.assertClean();
    for (const branch of [sourceBranch, targetBranch]) {
      if (!(await this.repo.branchExists(branch))) {
        throw new RepositoryStateError(`Branch ${branch} does not exist`, 'BRANCH_MISSING', { branch });
      }
    }
    if (!(await this.repo.hasCommitsNotIn(sourceBranch, targetBranch))) {
      throw new RepositoryStateError(
        `Nothing to release: ${targetBranch} already contains every commit of ${sourceBranch}`,
        'NOTHING_TO_RELEASE',
      );
    }

    const originalBranch = await this.repo.currentBranch();
    const switched = originalBranch !== targetBranch;
    if (switched) {
      await this.repo.checkout(targetBranch);
    }

    const createdAt = this.now().toISOString();
    let attempt: ReleaseAttempt = {
      attemptId: this.newId(),
      phase: 'NotStarted',
      sourceBranch,
      targetBranch,
      originalBranch,
      baseVersion: '',
      bumpKind,
      scheme: scheme.name,
      resolvedVersion: null,
      preMergeRevision: null,
      mergeCommitId: null,
      conflictPaths: [],
      editRequested,
      preBumpRevision: null,
      bumpCommitId: null,
      tagName: null,
      undo: switched && originalBranch !== null ? [{ kind: 'checkout', branch: originalBranch }] : [],
      createdAt,
      updatedAt: createdAt,
    };

    try {
      attempt.baseVersion = readProjectVersion(await this.readVersionFiles());
      const preview = resolveVersion(attempt.baseVersion, bumpKind, scheme, this.config.preid);
      await this.assertTagFree(this.tagNameFor(attempt, preview));
      this.debug(`base version ${attempt.baseVersion}, next ${preview}`);
    } catch (error) {
      if (switched && originalBranch !== null) {
        await this.repo.checkout(originalBranch);
      }
      throw error;
    }

    attempt.preMergeRevision = await this.repo.head();
    attempt = this.transition(attempt, 'Merging');
    return { attempt: await this.save(attempt), stop: null };
  }

  private async merge(attempt: ReleaseAttempt): Promise<Step> {
    const preMergeRevision = attempt.preMergeRevision;
    if (preMergeRevision === null) {
      throw new RepositoryStateError('Release record in Merging lacks the pre-merge revision', 'RECORD_MISMATCH');
    }
    // Pushed before anything can move the target branch
    const undo = pushUndo(pushUndo(attempt.undo, { kind: 'reset', rev: preMergeRevision }), {
      kind: 'abort-merge',
    });
    if (undo !== attempt.undo) {
      attempt = await this.save({ ...attempt, undo });
    }

    // A conflicted merge that was never recorded
    if (await this.repo.isMerging()) {
      return await this.recordConflict(attempt, await this.repo.conflictedPaths());
    }

    // A merge that happened but was never recorded
    const head = await this.repo.head();
    const sourceTip = await this.sourceTip(attempt);
    if (head !== preMergeRevision && (await this.repo.isAncestor(sourceTip, head))) {
      this.debug(`adopting merge ${head}`);
      return await this.recordMerge(attempt, head);
    }

    await this.assertClean();
    const message = withTrailer(
      render(this.config.merge.message, templateValues(attempt, null)),
      attempt.attemptId,
    );
    this.debug(`merging ${attempt.sourceBranch} into ${attempt.targetBranch}`);
    const outcome = await this.repo.merge(attempt.sourceBranch, attempt.targetBranch, {
      message,
      fastForward: this.config.merge.fastForward,
    });

    if (outcome.kind === 'conflicted') {
      return await this.recordConflict(attempt, outcome.paths);
    }
    return await this.recordMerge(attempt, outcome.rev);
  }

  private async recordConflict(attempt: ReleaseAttempt, paths: string[]): Promise<Step> {
    attempt = this.transition({ ...attempt, conflictPaths: paths }, 'MergeConflict');
    await this.save(attempt);
    throw new ConflictError(
      `Merge conflicts in: ${paths.join(', ')}. Resolve them, commit, then run relcut --continue.`,
      paths,
    );
  }

  private async recordMerge(attempt: ReleaseAttempt, rev: string): Promise<Step> {
    attempt = this.transition(
      {
        ...attempt,
        mergeCommitId: rev,
        conflictPaths: [],
        undo: attempt.undo.filter((step) => step.kind !== 'abort-merge'),
      },
      'ReadyToBump',
    );
    return { attempt: await this.save(attempt), stop: null };
  }

  private async concludeMerge(attempt: ReleaseAttempt): Promise<Step> {
    if (await this.repo.hasUnresolvedConflicts(attempt.conflictPaths)) {
      const unmerged = await this.repo.conflictedPaths();
      const paths = unmerged.length > 0 ? unmerged : attempt.conflictPaths;
      throw new ConflictError(
        `Merge conflicts remain in: ${paths.join(', ')}. Resolve them, commit, then run relcut --continue.`,
        paths,
      );
    }

    if (await this.repo.isMerging()) {
      const message = withTrailer(
        render(this.config.merge.message, templateValues(attempt, null)),
        attempt.attemptId,
      );
      this.debug('committing the resolved merge');
      await this.repo.commit(message);
    } else {
      await this.assertClean();
    }

    const head = await this.repo.head();
    if (!(await this.repo.isAncestor(await this.sourceTip(attempt), head))) {
      throw new RepositoryStateError(
        `${attempt.targetBranch} does not contain ${attempt.sourceBranch}: the merge was not concluded. ` +
          'Merge again, or run relcut --abort.',
        'MERGE_MISSING',
      );
    }

    const step = await this.recordMerge(attempt, head);
    if (step.attempt.editRequested) {
      return await this.pauseForEdit(step.attempt);
    }
    return { attempt: step.attempt, stop: 'ready' };
  }

  private async requestEdit(attempt: ReleaseAttempt): Promise<Step> {
    attempt = await this.save({ ...attempt, editRequested: true });
    return { attempt, stop: 'edit-requested' };
  }

  private async pauseForEdit(attempt: ReleaseAttempt): Promise<Step> {
    attempt = this.transition(attempt, 'AwaitingCustomCommit');
    return { attempt: await this.save(attempt), stop: 'awaiting-commit' };
  }

  private async resume(attempt: ReleaseAttempt): Promise<Step> {
    await this.assertClean();
    attempt = this.transition({ ...attempt, editRequested: false }, 'ReadyToBump');
    return { attempt: await this.save(attempt), stop: 'ready' };
  }

  private async bump(attempt: ReleaseAttempt): Promise<Step> {
    if (attempt.phase === 'ReadyToBump') {
      await this.assertClean();
      const scheme = getScheme(attempt.scheme);
      const version =
        attempt.resolvedVersion ??
        resolveVersion(attempt.baseVersion, attempt.bumpKind, scheme, this.config.preid);
      await this.assertTagFree(this.tagNameFor(attempt, version));

      const preBumpRevision = await this.repo.head();
      attempt = this.transition(
        {
          ...attempt,
          resolvedVersion: version,
          preBumpRevision,
          undo: pushUndo(attempt.undo, { kind: 'reset', rev: preBumpRevision }),
        },
        'Bumping',
      );
      attempt = await this.save(attempt);
    }

    const version = attempt.resolvedVersion;
    const preBumpRevision = attempt.preBumpRevision;
    if (version === null || preBumpRevision === null) {
      throw new RepositoryStateError('Release record in Bumping lacks the resolved version', 'RECORD_MISMATCH');
    }

    // A bump commit that was made but never recorded
    const head = await this.repo.head();
    if (
      head !== preBumpRevision &&
      (await this.repo.parentOf(head)) === preBumpRevision &&
      hasTrailer(await this.repo.getCommitMessage(head), attempt.attemptId)
    ) {
      this.debug(`adopting bump commit ${head}`);
      return await this.recordBump(attempt, head);
    }

    // As committed: a crash may have left the working tree half written
    const files = await this.readVersionFiles(preBumpRevision);
    const values = templateValues(attempt, version);
    for (const [spec, content] of files) {
      this.debug(`writing ${version} to ${spec.path}`);
      await this.repo.writeFile(spec.path, writeVersion(spec, content, version, values));
    }

    const message = withTrailer(
      render(this.config.commit.message, values),
      attempt.attemptId,
    );
    let rev: string;
    try {
      rev = await this.repo.commit(message, {
        paths: files.map(([spec]) => spec.path),
        signOff: this.config.commit.signOff,
        gpgSign: this.config.commit.gpgSign,
      });
    } catch (error) {
      this.debug('bump commit failed, restoring version files');
      for (const [spec, content] of files) {
        await this.repo.writeFile(spec.path, content);
      }
      attempt = this.transition(
        {
          ...attempt,
          undo: attempt.undo.filter((step) => !(step.kind === 'reset' && step.rev === preBumpRevision)),
        },
        'ReadyToBump',
      );
      await this.save(attempt);
      throw error;
    }

    return await this.recordBump(attempt, rev);
  }

  private async recordBump(attempt: ReleaseAttempt, rev: string): Promise<Step> {
    attempt = this.transition({ ...attempt, bumpCommitId: rev }, 'Bumped');
    return { attempt: await this.save(attempt), stop: null };
  }

  private async tag(attempt: ReleaseAttempt): Promise<Step> {
    const version = attempt.resolvedVersion;
    const bumpCommitId = attempt.bumpCommitId;
    if (version === null || bumpCommitId === null) {
      throw new RepositoryStateError('Release record lacks the bump commit', 'RECORD_MISMATCH');
    }

    if (attempt.phase === 'Bumped') {
      const tagName = this.tagNameFor(attempt, version);
      attempt = this.transition(
        { ...attempt, tagName, undo: pushUndo(attempt.undo, { kind: 'delete-tag', name: tagName }) },
        'Tagging',
      );
      attempt = await this.save(attempt);
    }

    const tagName = attempt.tagName;
    if (tagName === null) {
      throw new RepositoryStateError('Release record in Tagging lacks the tag name', 'RECORD_MISMATCH');
    }

    const target = await this.repo.tagTarget(tagName);
    if (target === bumpCommitId) {
      this.debug(`adopting tag ${tagName}`);
    } else if (target !== null) {
      throw new RepositoryStateError(
        `Tag ${tagName} already exists and points at ${target}, not the bump commit ${bumpCommitId}`,
        'TAG_CONFLICT',
        { tag: tagName, target, bumpCommitId },
      );
    } else {
      this.debug(`tagging ${bumpCommitId} as ${tagName}`);
      await this.repo.tag(tagName, bumpCommitId, {
        message: render(this.config.tag.message, templateValues(attempt, version)),
        annotate: this.config.tag.annotate,
        gpgSign: this.config.tag.gpgSign,
      });
    }

    attempt = this.transition(attempt, 'Completed');
    return { attempt: await this.finish(attempt), stop: 'completed' };
  }

  private async abort(attempt: ReleaseAttempt): Promise<Step> {
    const failures = await rollback(this.repo, attempt, this.debug);
    attempt = await this.finish(this.transition(attempt, 'Aborted'));

    if (failures.length > 0) {
      throw new RollbackError(failures);
    }
    return { attempt, stop: 'aborted' };
  }
}

/**
 * Run a state-mutating command under the release lock.
 */
export async function releaseWorkflow(
  deps: ReleaseDeps,
  command: Command,
  options: ReleaseOptions = {},
): Promise<ReleaseResult> {
  const lock = await deps.store.lock();
  deps.debug?.(`acquired lock ${lock.path}`);

  try {
    return await new ReleaseWorkflow(deps).execute(command, options);
  } finally {
    await lock.release();
    deps.debug?.('released lock');
  }
}
