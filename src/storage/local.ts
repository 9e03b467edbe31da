import { mkdir, open, readFile, rename, rm, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { ReleaseAttempt } from '../domain/types.ts';
import { LockError, RelcutError } from '../lib/error.ts';
import { decodeAttempt, encodeAttempt } from './codec.ts';
import type { StateLock, StateStore } from './interface.ts';

const STATE_FILE = 'attempt.json';
const LOCK_FILE = 'lock';

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Write through a temporary file in the same directory, renamed over the
 * destination.
 */
export async function atomicWriteFile(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.tmp.${process.pid}.${Date.now()}`);

  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Release record in a directory on disk, normally `<git-dir>/relcut`.
 */
export class LocalStateStore implements StateStore {
  private statePath: string;
  private lockPath: string;
  private extra: Record<string, unknown> = {};

  constructor(private stateDir: string) {
    this.statePath = join(stateDir, STATE_FILE);
    this.lockPath = join(stateDir, LOCK_FILE);
  }

  get location(): string {
    return this.statePath;
  }

  async load(): Promise<ReleaseAttempt | null> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        this.extra = {};
        return null;
      }
      throw new RelcutError(`Failed to read release record: ${messageOf(error)}`, 'STATE_READ_ERROR', {
        path: this.statePath,
      });
    }

    const { attempt, extra } = decodeAttempt(content, this.statePath);
    this.extra = extra;
    return attempt;
  }

  async save(attempt: ReleaseAttempt): Promise<void> {
    try {
      await mkdir(this.stateDir, { recursive: true });
      await atomicWriteFile(this.statePath, encodeAttempt(attempt, this.extra));
    } catch (error) {
      throw new RelcutError(`Failed to write release record: ${messageOf(error)}`, 'STATE_WRITE_ERROR', {
        path: this.statePath,
      });
    }
  }

  async clear(): Promise<void> {
    await rm(this.statePath, { force: true });
    this.extra = {};
  }

  async lock(): Promise<StateLock> {
    await mkdir(this.stateDir, { recursive: true });

    let handle: FileHandle;
    try {
      handle = await open(this.lockPath, 'wx');
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        throw new LockError(this.lockPath, await this.lockHolder());
      }
      throw new RelcutError(`Failed to create lock: ${messageOf(error)}`, 'LOCK_ERROR', {
        path: this.lockPath,
      });
    }

    try {
      await handle.writeFile(JSON.stringify({ pid: process.pid, since: new Date().toISOString() }) + '\n');
    } finally {
      await handle.close();
    }

    const lockPath = this.lockPath;
    return {
      path: lockPath,
      release: async () => {
        await rm(lockPath, { force: true });
      },
    };
  }

  private async lockHolder(): Promise<string | null> {
    try {
      return (await readFile(this.lockPath, 'utf-8')).trim();
    } catch (error) {
      // Released between the failed create and this read
      if (hasCode(error, 'ENOENT')) return null;
      throw error;
    }
  }
}
