/**
 * Release state machine - the transition graph and the decision table.
 *
 * Pure functions, no I/O. The workflow gathers the record, asks `decide`
 * what to do next, performs it and persists the result.
 */

import type { Command, Phase, ReleaseAttempt } from '../domain/types.ts';
import { isTerminal } from '../domain/types.ts';
import { ConflictError, RelcutError, RepositoryStateError } from '../lib/error.ts';

/**
 * Allowed transitions. Aborted is reachable from every non-terminal phase;
 * Bumping → ReadyToBump is taken when the bump commit could not be created.
 */
export const TRANSITIONS: Readonly<Record<Phase, readonly Phase[]>> = {
  NotStarted: ['Merging', 'Aborted'],
  Merging: ['MergeConflict', 'ReadyToBump', 'Aborted'],
  MergeConflict: ['ReadyToBump', 'Aborted'],
  ReadyToBump: ['AwaitingCustomCommit', 'Bumping', 'Aborted'],
  AwaitingCustomCommit: ['ReadyToBump', 'Aborted'],
  Bumping: ['Bumped', 'ReadyToBump', 'Aborted'],
  Bumped: ['Tagging', 'Aborted'],
  Tagging: ['Completed', 'Aborted'],
  Completed: [],
  Aborted: [],
};

export function canTransition(from: Phase, to: Phase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: Phase, to: Phase): void {
  if (!canTransition(from, to)) {
    throw new RelcutError(`Invalid phase transition: ${from} → ${to}`, 'INVALID_TRANSITION', {
      from,
      to,
    });
  }
}

/**
 * Why an invocation stopped without error.
 */
export type StopReason =
  | 'completed'
  | 'aborted'
  | 'ready'
  | 'awaiting-commit'
  | 'edit-requested'
  | 'no-release';

export type Action =
  /** Check preconditions and create a new attempt */
  | { kind: 'start'; editRequested: boolean }
  | { kind: 'merge'; attempt: ReleaseAttempt }
  /** Finish a merge whose conflicts the user resolved */
  | { kind: 'conclude-merge'; attempt: ReleaseAttempt }
  | { kind: 'request-edit'; attempt: ReleaseAttempt }
  | { kind: 'pause-for-edit'; attempt: ReleaseAttempt }
  /** Leave AwaitingCustomCommit after the user's commit */
  | { kind: 'resume'; attempt: ReleaseAttempt }
  | { kind: 'bump'; attempt: ReleaseAttempt }
  | { kind: 'tag'; attempt: ReleaseAttempt }
  | { kind: 'abort'; attempt: ReleaseAttempt }
  | { kind: 'stop'; reason: StopReason }
  | { kind: 'fail'; error: RelcutError };

/**
 * Is there an attempt a command can act on?
 */
export function isActive(attempt: ReleaseAttempt | null): attempt is ReleaseAttempt {
  return attempt !== null && attempt.phase !== 'NotStarted' && !isTerminal(attempt.phase);
}

/**
 * Decide the next action for a command given the current record.
 */
export function decide(command: Command, attempt: ReleaseAttempt | null): Action {
  if (!isActive(attempt)) {
    switch (command) {
      case 'run':
      case 'edit':
        return { kind: 'start', editRequested: command === 'edit' };
      case 'continue':
        return {
          kind: 'fail',
          error: new RepositoryStateError('No release in progress; nothing to continue', 'NO_RELEASE'),
        };
      case 'abort':
        return { kind: 'stop', reason: 'no-release' };
    }
  }

  if (command === 'abort') {
    return { kind: 'abort', attempt };
  }

  if (command === 'edit') {
    return decideEdit(attempt);
  }

  switch (attempt.phase) {
    case 'Merging':
      return { kind: 'merge', attempt };
    case 'MergeConflict':
      if (command === 'continue') return { kind: 'conclude-merge', attempt };
      return {
        kind: 'fail',
        error: new ConflictError(
          `Merge conflicts remain in: ${attempt.conflictPaths.join(', ')}. ` +
            'Resolve them, commit, then run with --continue.',
          attempt.conflictPaths,
        ),
      };
    case 'AwaitingCustomCommit':
      if (command === 'continue') return { kind: 'resume', attempt };
      return {
        kind: 'fail',
        error: new RepositoryStateError(
          'Waiting for your custom commit. Commit it, then run with --continue.',
          'AWAITING_COMMIT',
        ),
      };
    case 'ReadyToBump':
      return attempt.editRequested ? { kind: 'pause-for-edit', attempt } : { kind: 'bump', attempt };
    case 'Bumping':
      return { kind: 'bump', attempt };
    case 'Bumped':
    case 'Tagging':
      return { kind: 'tag', attempt };
    default:
      return { kind: 'stop', reason: 'no-release' };
  }
}

function decideEdit(attempt: ReleaseAttempt): Action {
  switch (attempt.phase) {
    case 'Merging':
    case 'MergeConflict':
      if (attempt.editRequested) return { kind: 'stop', reason: 'edit-requested' };
      return { kind: 'request-edit', attempt };
    case 'ReadyToBump':
      return { kind: 'pause-for-edit', attempt };
    case 'AwaitingCustomCommit':
      return { kind: 'stop', reason: 'awaiting-commit' };
    default:
      return {
        kind: 'fail',
        error: new RepositoryStateError(
          `Too late for a custom commit: the release is already at ${attempt.phase}`,
          'EDIT_TOO_LATE',
          { phase: attempt.phase },
        ),
      };
  }
}

/**
 * What the user should do next in a phase, for status output.
 */
export function nextStep(attempt: ReleaseAttempt): string {
  switch (attempt.phase) {
    case 'NotStarted':
    case 'Merging':
      return 'Run relcut to merge and finish the release, or relcut --abort to roll back.';
    case 'MergeConflict':
      return 'Resolve the conflicts, commit, then run relcut --continue.';
    case 'AwaitingCustomCommit':
      return 'Make your custom commit, then run relcut --continue.';
    case 'ReadyToBump':
      return attempt.editRequested
        ? 'Run relcut to pause for your custom commit.'
        : 'Run relcut to bump and tag, or relcut --edit to add a custom commit first.';
    case 'Bumping':
    case 'Bumped':
    case 'Tagging':
      return 'Run relcut to finish the release.';
    case 'Completed':
    case 'Aborted':
      return 'Nothing to do.';
  }
}
