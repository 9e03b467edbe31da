/**
 * Shared setup for workflow tests: an in-memory repository with a
 * develop branch one commit ahead of main, and an in-memory record store.
 */

import { MemoryRepo } from '../clients/git/memory.ts';
import { DEFAULT_CONFIG } from '../domain/config.ts';
import type { RelcutConfig } from '../domain/config.ts';
import { MemoryStateStore } from '../storage/memory.ts';
import type { ReleaseDeps } from './release.ts';

export const STARTED_AT = '2026-03-01T12:00:00.000Z';

export interface Fixture {
  repo: MemoryRepo;
  store: MemoryStateStore;
  deps: ReleaseDeps;
  /** Debug lines written by the workflow */
  trace: string[];
}

export function setup(config: Partial<RelcutConfig> = {}): Fixture {
  const repo = new MemoryRepo({ files: { VERSION: '1.4.0\n', 'README.md': 'demo\n' } });
  repo.createBranch('develop');
  repo.commitOn('develop', 'feat: add feature', { 'src/feature.ts': 'export const feature = 1;\n' });

  const store = new MemoryStateStore();
  const trace: string[] = [];
  let ids = 0;

  const deps: ReleaseDeps = {
    repo,
    store,
    config: { ...DEFAULT_CONFIG, versionFiles: [{ kind: 'plain', path: 'VERSION' }], ...config },
    debug: (message) => trace.push(message),
    now: () => new Date(STARTED_AT),
    newId: () => `attempt-${++ids}`,
  };
  return { repo, store, deps, trace };
}

/**
 * Diverge main and develop on README.md and src/app.ts.
 */
export function divergeBranches(repo: MemoryRepo): void {
  repo.commitOn('main', 'fix: hotfix', { 'README.md': 'main readme\n', 'src/app.ts': 'main\n' });
  repo.commitOn('develop', 'feat: rework', { 'README.md': 'develop readme\n', 'src/app.ts': 'develop\n' });
}

/**
 * Resolve the conflicts left by `divergeBranches` and stage the result.
 */
export function resolveConflicts(repo: MemoryRepo): void {
  repo.edit('README.md', 'merged readme\n');
  repo.stage('README.md');
  repo.edit('src/app.ts', 'merged\n');
  repo.stage('src/app.ts');
}

/**
 * The error a promise rejects with, checked against the expected class.
 */
export async function rejection<T>(promise: Promise<unknown>, type: new (...args: never[]) => T): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected a rejection with ${type.name}`);
}

export async function messagesOn(repo: MemoryRepo, branch: string): Promise<string[]> {
  return await Promise.all(repo.history(branch).map((rev) => repo.getCommitMessage(rev)));
}
