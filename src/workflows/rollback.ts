/**
 * Rollback - undo the recorded steps of an aborted release.
 *
 * Steps run newest first. Each one checks whether there is anything left
 * to undo, so a stack recorded just before a crash is still correct.
 */

import type { ReleaseAttempt, UndoStep } from '../domain/types.ts';
import type { ReleaseRepo } from '../domain/vcs.ts';
import { RepositoryStateError } from '../lib/error.ts';

export interface RollbackFailure {
  step: string;
  error: string;
}

export function describeStep(step: UndoStep): string {
  switch (step.kind) {
    case 'checkout':
      return `check out ${step.branch}`;
    case 'abort-merge':
      return 'abort the merge';
    case 'reset':
      return `reset to ${step.rev}`;
    case 'delete-tag':
      return `delete tag ${step.name}`;
  }
}

/**
 * Push a step unless an identical one is already recorded.
 */
export function pushUndo(undo: UndoStep[], step: UndoStep): UndoStep[] {
  const key = JSON.stringify(step);
  return undo.some((existing) => JSON.stringify(existing) === key) ? undo : [...undo, step];
}

async function undoStep(repo: ReleaseRepo, attempt: ReleaseAttempt, step: UndoStep): Promise<boolean> {
  switch (step.kind) {
    case 'delete-tag': {
      const target = await repo.tagTarget(step.name);
      // Only our tag: one pointing elsewhere predates this attempt
      if (target === null || target !== attempt.bumpCommitId) return false;
      await repo.deleteTag(step.name);
      return true;
    }
    case 'reset': {
      const branch = await repo.currentBranch();
      if (branch !== attempt.targetBranch) {
        throw new RepositoryStateError(
          `Expected to be on ${attempt.targetBranch}, found ${branch ?? 'a detached HEAD'}`,
          'WRONG_BRANCH',
        );
      }
      const head = await repo.head();
      if (head !== step.rev && !(await repo.isAncestor(step.rev, head))) {
        throw new RepositoryStateError(`${step.rev} is not in the history of HEAD`, 'HISTORY_DIVERGED');
      }
      await repo.resetHard(step.rev);
      return true;
    }
    case 'abort-merge':
      if (!(await repo.isMerging())) return false;
      await repo.abortMerge();
      return true;
    case 'checkout':
      if ((await repo.currentBranch()) === step.branch) return false;
      await repo.checkout(step.branch);
      return true;
  }
}

/**
 * Run the undo stack of an attempt, collecting failures instead of
 * stopping at the first one.
 */
export async function rollback(
  repo: ReleaseRepo,
  attempt: ReleaseAttempt,
  debug: (message: string) => void = () => {},
): Promise<RollbackFailure[]> {
  const failures: RollbackFailure[] = [];

  for (const step of [...attempt.undo].reverse()) {
    const description = describeStep(step);
    try {
      const changed = await undoStep(repo, attempt, step);
      debug(`rollback: ${description}${changed ? '' : ' (nothing to undo)'}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debug(`rollback: ${description} failed: ${message}`);
      failures.push({ step: description, error: message });
    }
  }

  return failures;
}
