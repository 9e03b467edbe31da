import { describe, expect, it } from 'vitest';
import { decodeAttempt, encodeAttempt } from './codec.ts';
import type { ReleaseAttempt } from '../domain/types.ts';
import { CorruptStateError } from '../lib/error.ts';

const attempt: ReleaseAttempt = {
  attemptId: '6f1c2f1e-0000-4000-8000-000000000001',
  phase: 'MergeConflict',
  sourceBranch: 'develop',
  targetBranch: 'main',
  originalBranch: 'develop',
  baseVersion: '1.4.0',
  bumpKind: 'minor',
  scheme: 'semver',
  resolvedVersion: null,
  preMergeRevision: 'abc123',
  mergeCommitId: null,
  conflictPaths: ['VERSION', 'src/app.ts'],
  editRequested: false,
  preBumpRevision: null,
  bumpCommitId: null,
  tagName: null,
  undo: [{ kind: 'checkout', branch: 'develop' }, { kind: 'abort-merge' }],
  createdAt: '2026-01-02T03:04:05.000Z',
  updatedAt: '2026-01-02T03:04:06.000Z',
};

function corruptReason(content: string): string {
  try {
    decodeAttempt(content, 'attempt.json');
  } catch (error) {
    if (error instanceof CorruptStateError) return String(error.details?.reason);
    throw error;
  }
  throw new Error('expected a CorruptStateError');
}

describe('encodeAttempt / decodeAttempt', () => {
  it('round-trips an attempt', () => {
    const content = encodeAttempt(attempt);
    expect(JSON.parse(content).format).toBe(1);
    expect(decodeAttempt(content, 'attempt.json')).toEqual({ attempt, extra: {} });
  });

  it('preserves unknown fields', () => {
    const content = JSON.stringify({ ...JSON.parse(encodeAttempt(attempt)), releaseNotes: 'later' });
    const { extra } = decodeAttempt(content, 'attempt.json');

    expect(extra).toEqual({ releaseNotes: 'later' });
    expect(JSON.parse(encodeAttempt(attempt, extra)).releaseNotes).toBe('later');
  });

  it('fills in optional fields that are missing', () => {
    const {
      originalBranch: _o,
      conflictPaths: _c,
      editRequested: _e,
      undo: _u,
      tagName: _t,
      ...required
    } = attempt;
    const { attempt: decoded } = decodeAttempt(JSON.stringify({ format: 1, ...required }), 'attempt.json');

    expect(decoded.originalBranch).toBeNull();
    expect(decoded.conflictPaths).toEqual([]);
    expect(decoded.editRequested).toBe(false);
    expect(decoded.undo).toEqual([]);
    expect(decoded.tagName).toBeNull();
  });
});

describe('decodeAttempt corruption', () => {
  const valid = JSON.parse(encodeAttempt(attempt));

  it('rejects a truncated write', () => {
    const content = encodeAttempt(attempt);
    expect(corruptReason(content.slice(0, content.length / 2))).toBe(
      'not valid JSON (possibly a truncated write)',
    );
    expect(corruptReason('')).toBe('not valid JSON (possibly a truncated write)');
  });

  it('rejects missing and ill-typed fields', () => {
    expect(corruptReason(JSON.stringify({ ...valid, attemptId: undefined }))).toBe(
      "field 'attemptId' must be a non-empty string",
    );
    expect(corruptReason(JSON.stringify({ ...valid, editRequested: 'no' }))).toBe(
      "field 'editRequested' must be a boolean",
    );
    expect(corruptReason(JSON.stringify({ ...valid, format: undefined }))).toBe("field 'format' is missing");
  });

  it('rejects unknown phases, kinds and undo steps', () => {
    expect(corruptReason(JSON.stringify({ ...valid, phase: 'Publishing' }))).toBe("unknown phase 'Publishing'");
    expect(corruptReason(JSON.stringify({ ...valid, bumpKind: 'huge' }))).toBe("unknown bump kind 'huge'");
    expect(corruptReason(JSON.stringify({ ...valid, undo: [{ kind: 'push' }] }))).toBe(
      'unknown undo step {"kind":"push"}',
    );
  });

  it('rejects a record from a newer format', () => {
    expect(corruptReason(JSON.stringify({ ...valid, format: 2 }))).toBe('format 2 was written by a newer relcut');
  });
});
