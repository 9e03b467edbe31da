/**
 * Release record encoding.
 *
 * The record is a JSON object carrying `"format": 1` next to the attempt
 * fields. Optional fields may be missing; unknown fields are handed back
 * to the store so they survive the next save.
 */

import type { ReleaseAttempt, UndoStep } from '../domain/types.ts';
import { isBumpKind, isPhase, isSchemeName } from '../domain/types.ts';
import { CorruptStateError } from '../lib/error.ts';

export const RECORD_FORMAT = 1;

type Json = Record<string, unknown>;

export interface DecodedRecord {
  attempt: ReleaseAttempt;
  /** Fields this version does not know about */
  extra: Json;
}

const KNOWN_FIELDS: readonly (keyof ReleaseAttempt | 'format')[] = [
  'format',
  'attemptId',
  'phase',
  'sourceBranch',
  'targetBranch',
  'originalBranch',
  'baseVersion',
  'bumpKind',
  'scheme',
  'resolvedVersion',
  'preMergeRevision',
  'mergeCommitId',
  'conflictPaths',
  'editRequested',
  'preBumpRevision',
  'bumpCommitId',
  'tagName',
  'undo',
  'createdAt',
  'updatedAt',
];

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encode an attempt, with any preserved unknown fields.
 */
export function encodeAttempt(attempt: ReleaseAttempt, extra: Json = {}): string {
  return JSON.stringify({ ...extra, format: RECORD_FORMAT, ...attempt }, null, 2) + '\n';
}

class Reader {
  constructor(
    private data: Json,
    private path: string,
  ) {}

  fail(reason: string): CorruptStateError {
    return new CorruptStateError(this.path, reason);
  }

  string(key: string): string {
    const value = this.data[key];
    if (typeof value !== 'string' || value === '') {
      throw this.fail(`field '${key}' must be a non-empty string`);
    }
    return value;
  }

  optionalString(key: string): string | null {
    const value = this.data[key];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string') {
      throw this.fail(`field '${key}' must be a string or null`);
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.data[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      throw this.fail(`field '${key}' must be a boolean`);
    }
    return value;
  }

  stringList(key: string): string[] {
    const value = this.data[key];
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
      throw this.fail(`field '${key}' must be a list of strings`);
    }
    return value.map(String);
  }

  undoSteps(key: string): UndoStep[] {
    const value = this.data[key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      throw this.fail(`field '${key}' must be a list`);
    }
    return value.map((item) => this.undoStep(item));
  }

  private undoStep(item: unknown): UndoStep {
    if (isObject(item)) {
      const { kind } = item;
      if (kind === 'abort-merge') return { kind };
      if (kind === 'checkout' && typeof item.branch === 'string') return { kind, branch: item.branch };
      if (kind === 'reset' && typeof item.rev === 'string') return { kind, rev: item.rev };
      if (kind === 'delete-tag' && typeof item.name === 'string') return { kind, name: item.name };
    }
    throw this.fail(`unknown undo step ${JSON.stringify(item)}`);
  }
}

/**
 * Decode and validate a stored record.
 */
export function decodeAttempt(content: string, path: string): DecodedRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new CorruptStateError(path, 'not valid JSON (possibly a truncated write)');
  }
  if (!isObject(parsed)) {
    throw new CorruptStateError(path, 'expected a JSON object');
  }

  const format = parsed.format;
  if (typeof format !== 'number') {
    throw new CorruptStateError(path, "field 'format' is missing");
  }
  if (format > RECORD_FORMAT) {
    throw new CorruptStateError(path, `format ${format} was written by a newer relcut`);
  }

  const read = new Reader(parsed, path);

  const phase = read.string('phase');
  if (!isPhase(phase)) throw read.fail(`unknown phase '${phase}'`);
  const bumpKind = read.string('bumpKind');
  if (!isBumpKind(bumpKind)) throw read.fail(`unknown bump kind '${bumpKind}'`);
  const scheme = read.string('scheme');
  if (!isSchemeName(scheme)) throw read.fail(`unknown version scheme '${scheme}'`);

  const attempt: ReleaseAttempt = {
    attemptId: read.string('attemptId'),
    phase,
    sourceBranch: read.string('sourceBranch'),
    targetBranch: read.string('targetBranch'),
    originalBranch: read.optionalString('originalBranch'),
    baseVersion: read.string('baseVersion'),
    bumpKind,
    scheme,
    resolvedVersion: read.optionalString('resolvedVersion'),
    preMergeRevision: read.optionalString('preMergeRevision'),
    mergeCommitId: read.optionalString('mergeCommitId'),
    conflictPaths: read.stringList('conflictPaths'),
    editRequested: read.boolean('editRequested', false),
    preBumpRevision: read.optionalString('preBumpRevision'),
    bumpCommitId: read.optionalString('bumpCommitId'),
    tagName: read.optionalString('tagName'),
    undo: read.undoSteps('undo'),
    createdAt: read.string('createdAt'),
    updatedAt: read.string('updatedAt'),
  };

  const extra: Json = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!KNOWN_FIELDS.some((field) => field === key)) extra[key] = value;
  }

  return { attempt, extra };
}
