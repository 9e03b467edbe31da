import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalStateStore } from './local.ts';
import type { ReleaseAttempt } from '../domain/types.ts';
import { CorruptStateError, LockError } from '../lib/error.ts';

const attempt: ReleaseAttempt = {
  attemptId: '6f1c2f1e-0000-4000-8000-000000000002',
  phase: 'ReadyToBump',
  sourceBranch: 'develop',
  targetBranch: 'main',
  originalBranch: 'main',
  baseVersion: '1.4.0',
  bumpKind: 'minor',
  scheme: 'semver',
  resolvedVersion: null,
  preMergeRevision: 'abc123',
  mergeCommitId: 'def456',
  conflictPaths: [],
  editRequested: false,
  preBumpRevision: null,
  bumpCommitId: null,
  tagName: null,
  undo: [],
  createdAt: '2026-01-02T03:04:05.000Z',
  updatedAt: '2026-01-02T03:04:06.000Z',
};

describe('LocalStateStore', () => {
  let dir: string;
  let stateDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relcut-test-'));
    stateDir = join(dir, '.git', 'relcut');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null without a record', async () => {
    expect(await new LocalStateStore(stateDir).load()).toBeNull();
  });

  it('saves and loads a record', async () => {
    const store = new LocalStateStore(stateDir);
    await store.save(attempt);

    expect(await new LocalStateStore(stateDir).load()).toEqual(attempt);
    expect(await readdir(stateDir)).toEqual(['attempt.json']);
  });

  it('keeps unknown fields across a save', async () => {
    const path = join(stateDir, 'attempt.json');
    const store = new LocalStateStore(stateDir);
    await store.save(attempt);
    const stored = JSON.parse(await readFile(path, 'utf-8'));
    await writeFile(path, JSON.stringify({ ...stored, annotation: { by: 'a newer version' } }));

    const loaded = await store.load();
    expect(loaded).toEqual(attempt);
    if (loaded === null) return;
    await store.save({ ...loaded, phase: 'Bumping' });

    const saved = JSON.parse(await readFile(path, 'utf-8'));
    expect(saved.annotation).toEqual({ by: 'a newer version' });
    expect(saved.phase).toBe('Bumping');
  });

  it('reports a corrupt record instead of treating it as absent', async () => {
    const store = new LocalStateStore(stateDir);
    await store.save(attempt);
    await writeFile(join(stateDir, 'attempt.json'), '{"format": 1, "phase": "Merg');

    await expect(store.load()).rejects.toThrow(CorruptStateError);
  });

  it('clears the record', async () => {
    const store = new LocalStateStore(stateDir);
    await store.save(attempt);
    await store.clear();
    await store.clear();

    expect(await store.load()).toBeNull();
  });

  it('fails fast while the lock is held', async () => {
    const store = new LocalStateStore(stateDir);
    const lock = await store.lock();

    await expect(new LocalStateStore(stateDir).lock()).rejects.toThrow(LockError);

    await lock.release();
    const again = await store.lock();
    expect(again.path).toBe(join(stateDir, 'lock'));
    await again.release();
  });
});
