import { describe, expect, it } from 'vitest';
import type { Phase } from '../domain/types.ts';
import { releaseWorkflow } from './release.ts';
import { releaseStatus } from './status.ts';
import { divergeBranches, rejection, resolveConflicts, setup } from './test-fixtures.ts';
import type { Fixture } from './test-fixtures.ts';
import { ConflictError, RelcutError } from '../lib/error.ts';

async function crashBefore(fixture: Fixture, phase: Phase): Promise<void> {
  fixture.store.crashBeforeSave((attempt) => attempt.phase === phase);
  await rejection(releaseWorkflow(fixture.deps, 'run'), RelcutError);
}

const PHASES: { phase: Phase; reach: (fixture: Fixture) => Promise<void> }[] = [
  { phase: 'Merging', reach: (fixture) => crashBefore(fixture, 'ReadyToBump') },
  {
    phase: 'MergeConflict',
    reach: async ({ repo, deps }) => {
      divergeBranches(repo);
      await rejection(releaseWorkflow(deps, 'run'), ConflictError);
    },
  },
  {
    phase: 'ReadyToBump',
    reach: async ({ repo, deps }) => {
      divergeBranches(repo);
      await rejection(releaseWorkflow(deps, 'run'), ConflictError);
      resolveConflicts(repo);
      await releaseWorkflow(deps, 'continue');
    },
  },
  {
    phase: 'AwaitingCustomCommit',
    reach: async ({ deps }) => {
      await releaseWorkflow(deps, 'edit');
    },
  },
  { phase: 'Bumping', reach: (fixture) => crashBefore(fixture, 'Bumped') },
  { phase: 'Bumped', reach: (fixture) => crashBefore(fixture, 'Tagging') },
  { phase: 'Tagging', reach: (fixture) => crashBefore(fixture, 'Completed') },
];

describe('releaseStatus', () => {
  it('reports no release', async () => {
    const { deps } = setup();

    const report = await releaseStatus(deps);

    expect(report).toEqual({
      inProgress: false,
      phase: null,
      attempt: null,
      next: 'No release in progress. Run relcut to start one.',
      ageDays: null,
      stale: false,
      problems: [],
    });
  });

  it.each(PHASES)('reports $phase without changing anything', async ({ phase, reach }) => {
    const fixture = setup({ keepRecord: true });
    const { repo, store, deps } = fixture;
    await reach(fixture);
    const content = store.content;
    const saves = store.saves;
    const log = [...repo.log];
    const head = await repo.head();
    const changed = await repo.changedPaths();

    const report = await releaseStatus(deps);
    await releaseStatus(deps);

    expect(report.inProgress).toBe(true);
    expect(report.phase).toBe(phase);
    expect(report.problems).toEqual([]);
    expect(store.content).toBe(content);
    expect(store.saves).toBe(saves);
    expect(store.locked).toBe(false);
    expect(repo.log).toEqual(log);
    expect(await repo.head()).toBe(head);
    expect(await repo.changedPaths()).toEqual(changed);
  });

  it('describes a conflicted release', async () => {
    const { repo, deps } = setup();
    divergeBranches(repo);
    await rejection(releaseWorkflow(deps, 'run'), ConflictError);

    const report = await releaseStatus(deps);

    expect(report.inProgress).toBe(true);
    expect(report.phase).toBe('MergeConflict');
    expect(report.attempt?.conflictPaths).toEqual(['README.md', 'src/app.ts']);
    expect(report.next).toBe('Resolve the conflicts, commit, then run relcut --continue.');
    expect(report.ageDays).toBe(0);
    expect(report.stale).toBe(false);
    expect(report.problems).toEqual([]);
  });

  it('answers while another invocation holds the lock', async () => {
    const { store, deps } = setup();
    await releaseWorkflow(deps, 'edit');
    store.locked = true;

    const report = await releaseStatus(deps);

    expect(report.phase).toBe('AwaitingCustomCommit');
    expect(store.locked).toBe(true);
  });

  it('flags a release left for too long', async () => {
    const { deps } = setup({ staleAfterDays: 14 });
    await releaseWorkflow(deps, 'edit');

    const report = await releaseStatus({ ...deps, now: () => new Date('2026-03-20T12:00:00.000Z') });

    expect(report.ageDays).toBe(19);
    expect(report.stale).toBe(true);
  });

  it('lists where the repository disagrees with the record', async () => {
    const { repo, deps } = setup();
    await releaseWorkflow(deps, 'edit');
    await repo.checkout('develop');

    const report = await releaseStatus(deps);

    expect(report.inProgress).toBe(true);
    expect(report.problems).toEqual(['HEAD is on develop, the release is on main']);
  });

  it('shows a kept record of a finished release as not in progress', async () => {
    const { deps } = setup({ keepRecord: true });
    await releaseWorkflow(deps, 'run');

    const report = await releaseStatus(deps);

    expect(report.inProgress).toBe(false);
    expect(report.phase).toBe('Completed');
    expect(report.attempt?.tagName).toBe('v1.4.1');
  });
});
