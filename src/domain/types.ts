/**
 * Core domain types for relcut.
 */

import type { RevisionId } from './vcs.ts';

export const PHASES = [
  'NotStarted',
  'Merging',
  'MergeConflict',
  'AwaitingCustomCommit',
  'ReadyToBump',
  'Bumping',
  'Bumped',
  'Tagging',
  'Completed',
  'Aborted',
] as const;

/** Step of a release attempt. */
export type Phase = (typeof PHASES)[number];

export const BUMP_KINDS = [
  'major',
  'minor',
  'patch',
  'premajor',
  'preminor',
  'prepatch',
  'prerelease',
  'post',
] as const;

/** Requested increment category. */
export type BumpKind = (typeof BUMP_KINDS)[number];

export const SCHEMES = ['semver', 'pep440'] as const;

export type SchemeName = (typeof SCHEMES)[number];

/** Commands a user can issue against a release attempt. */
export type Command = 'run' | 'edit' | 'continue' | 'abort';

/**
 * Rollback step, pushed before the forward step it guards.
 * Each step is a no-op when there is nothing to undo.
 */
export type UndoStep =
  | { kind: 'checkout'; branch: string }
  | { kind: 'abort-merge' }
  | { kind: 'reset'; rev: RevisionId }
  | { kind: 'delete-tag'; name: string };

/** The persisted release attempt record. */
export interface ReleaseAttempt {
  attemptId: string;
  phase: Phase;
  sourceBranch: string;
  targetBranch: string;
  /** Branch checked out when the attempt started, null when detached */
  originalBranch: string | null;
  baseVersion: string;
  bumpKind: BumpKind;
  scheme: SchemeName;
  /** Set once, when the bump step first runs */
  resolvedVersion: string | null;
  preMergeRevision: RevisionId | null;
  mergeCommitId: RevisionId | null;
  conflictPaths: string[];
  editRequested: boolean;
  preBumpRevision: RevisionId | null;
  bumpCommitId: RevisionId | null;
  tagName: string | null;
  undo: UndoStep[];
  createdAt: string;
  updatedAt: string;
}

export function isTerminal(phase: Phase): boolean {
  return phase === 'Completed' || phase === 'Aborted';
}

export function isBumpKind(value: string): value is BumpKind {
  return BUMP_KINDS.some((kind) => kind === value);
}

export function isPhase(value: string): value is Phase {
  return PHASES.some((phase) => phase === value);
}

export function isSchemeName(value: string): value is SchemeName {
  return SCHEMES.some((scheme) => scheme === value);
}
