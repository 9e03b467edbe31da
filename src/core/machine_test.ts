import { describe, expect, it } from 'vitest';
import { assertTransition, canTransition, decide, nextStep, TRANSITIONS } from './machine.ts';
import type { Phase, ReleaseAttempt } from '../domain/types.ts';
import { PHASES } from '../domain/types.ts';
import { ConflictError, RepositoryStateError } from '../lib/error.ts';

function attemptAt(phase: Phase, overrides: Partial<ReleaseAttempt> = {}): ReleaseAttempt {
  return {
    attemptId: 'attempt-1',
    phase,
    sourceBranch: 'develop',
    targetBranch: 'main',
    originalBranch: 'main',
    baseVersion: '1.4.0',
    bumpKind: 'minor',
    scheme: 'semver',
    resolvedVersion: null,
    preMergeRevision: 'c0000001',
    mergeCommitId: null,
    conflictPaths: [],
    editRequested: false,
    preBumpRevision: null,
    bumpCommitId: null,
    tagName: null,
    undo: [],
    createdAt: '2026-03-01T12:00:00.000Z',
    updatedAt: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('TRANSITIONS', () => {
  it('lets every non-terminal phase abort', () => {
    for (const phase of PHASES) {
      const terminal = phase === 'Completed' || phase === 'Aborted';
      expect(canTransition(phase, 'Aborted'), phase).toBe(!terminal);
    }
  });

  it('has no way out of terminal phases', () => {
    expect(TRANSITIONS.Completed).toEqual([]);
    expect(TRANSITIONS.Aborted).toEqual([]);
  });

  it('allows the commit-failed retry edge only from Bumping', () => {
    expect(canTransition('Bumping', 'ReadyToBump')).toBe(true);
    expect(canTransition('Bumped', 'ReadyToBump')).toBe(false);
    expect(canTransition('Tagging', 'Bumping')).toBe(false);
  });

  it('rejects skipped phases', () => {
    expect(() => assertTransition('Merging', 'Bumped')).toThrow('Invalid phase transition: Merging → Bumped');
    expect(() => assertTransition('ReadyToBump', 'Bumping')).not.toThrow();
  });
});

describe('decide', () => {
  it('starts a new attempt without a record', () => {
    expect(decide('run', null)).toEqual({ kind: 'start', editRequested: false });
    expect(decide('edit', null)).toEqual({ kind: 'start', editRequested: true });
    expect(decide('abort', null)).toEqual({ kind: 'stop', reason: 'no-release' });
  });

  it('treats a kept terminal record as no release', () => {
    expect(decide('run', attemptAt('Completed'))).toEqual({ kind: 'start', editRequested: false });
    expect(decide('abort', attemptAt('Aborted'))).toEqual({ kind: 'stop', reason: 'no-release' });
  });

  it('refuses to continue without a release', () => {
    const action = decide('continue', null);
    expect(action.kind).toBe('fail');
    if (action.kind === 'fail') {
      expect(action.error).toBeInstanceOf(RepositoryStateError);
      expect(action.error.code).toBe('NO_RELEASE');
    }
  });

  it('walks the forward path on run', () => {
    expect(decide('run', attemptAt('Merging')).kind).toBe('merge');
    expect(decide('run', attemptAt('ReadyToBump')).kind).toBe('bump');
    expect(decide('run', attemptAt('Bumping')).kind).toBe('bump');
    expect(decide('run', attemptAt('Bumped')).kind).toBe('tag');
    expect(decide('run', attemptAt('Tagging')).kind).toBe('tag');
  });

  it('reports conflicts on run and concludes them on continue', () => {
    const attempt = attemptAt('MergeConflict', { conflictPaths: ['README.md', 'src/app.ts'] });

    const action = decide('run', attempt);
    expect(action.kind).toBe('fail');
    if (action.kind === 'fail') {
      expect(action.error).toBeInstanceOf(ConflictError);
      expect(action.error.details).toEqual({ paths: ['README.md', 'src/app.ts'] });
    }
    expect(decide('continue', attempt).kind).toBe('conclude-merge');
  });

  it('waits for --continue while a custom commit is expected', () => {
    const attempt = attemptAt('AwaitingCustomCommit', { editRequested: true });

    const action = decide('run', attempt);
    expect(action.kind === 'fail' && action.error.code).toBe('AWAITING_COMMIT');
    expect(decide('continue', attempt).kind).toBe('resume');
    expect(decide('edit', attempt)).toEqual({ kind: 'stop', reason: 'awaiting-commit' });
  });

  it('continues like a run where no human step is pending', () => {
    expect(decide('continue', attemptAt('Merging')).kind).toBe('merge');
    expect(decide('continue', attemptAt('Bumped')).kind).toBe('tag');
  });

  it('pauses before the bump when an edit was requested', () => {
    expect(decide('run', attemptAt('ReadyToBump', { editRequested: true })).kind).toBe('pause-for-edit');
    expect(decide('edit', attemptAt('ReadyToBump')).kind).toBe('pause-for-edit');
  });

  it('records an edit request before the bump', () => {
    expect(decide('edit', attemptAt('Merging')).kind).toBe('request-edit');
    expect(decide('edit', attemptAt('MergeConflict')).kind).toBe('request-edit');
    expect(decide('edit', attemptAt('MergeConflict', { editRequested: true }))).toEqual({
      kind: 'stop',
      reason: 'edit-requested',
    });
  });

  it('rejects an edit once the bump started', () => {
    for (const phase of ['Bumping', 'Bumped', 'Tagging'] as const) {
      const action = decide('edit', attemptAt(phase));
      expect(action.kind === 'fail' && action.error.code, phase).toBe('EDIT_TOO_LATE');
    }
  });

  it('aborts from every in-progress phase', () => {
    const inProgress: Phase[] = [
      'Merging',
      'MergeConflict',
      'AwaitingCustomCommit',
      'ReadyToBump',
      'Bumping',
      'Bumped',
      'Tagging',
    ];
    for (const phase of inProgress) {
      expect(decide('abort', attemptAt(phase)).kind, phase).toBe('abort');
    }
  });
});

describe('nextStep', () => {
  it('points at --continue for human steps', () => {
    expect(nextStep(attemptAt('MergeConflict'))).toBe('Resolve the conflicts, commit, then run relcut --continue.');
    expect(nextStep(attemptAt('AwaitingCustomCommit'))).toBe(
      'Make your custom commit, then run relcut --continue.',
    );
  });
});
