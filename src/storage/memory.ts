import type { ReleaseAttempt } from '../domain/types.ts';
import { LockError, RelcutError } from '../lib/error.ts';
import { decodeAttempt, encodeAttempt } from './codec.ts';
import type { StateLock, StateStore } from './interface.ts';

/**
 * In-memory StateStore for tests. Keeps the encoded record so every save
 * and load goes through the codec.
 */
export class MemoryStateStore implements StateStore {
  readonly location = 'memory://relcut/attempt.json';
  content: string | null = null;
  locked = false;
  /** Number of successful saves */
  saves = 0;
  private extra: Record<string, unknown> = {};
  private failOnSave: ((attempt: ReleaseAttempt) => boolean) | null = null;

  async load(): Promise<ReleaseAttempt | null> {
    if (this.content === null) return null;
    const { attempt, extra } = decodeAttempt(this.content, this.location);
    this.extra = extra;
    return attempt;
  }

  async save(attempt: ReleaseAttempt): Promise<void> {
    if (this.failOnSave?.(attempt)) {
      this.failOnSave = null;
      throw new RelcutError('Simulated crash before saving the release record', 'STATE_WRITE_ERROR');
    }
    this.content = encodeAttempt(attempt, this.extra);
    this.saves++;
  }

  async clear(): Promise<void> {
    this.content = null;
    this.extra = {};
  }

  async lock(): Promise<StateLock> {
    if (this.locked) {
      throw new LockError('memory://relcut/lock', null);
    }
    this.locked = true;
    return {
      path: 'memory://relcut/lock',
      release: async () => {
        this.locked = false;
      },
    };
  }

  /**
   * Fail the first save whose attempt matches, as if the process died
   * right before writing it.
   */
  crashBeforeSave(predicate: (attempt: ReleaseAttempt) => boolean): void {
    this.failOnSave = predicate;
  }

  /** The stored record, decoded without touching preserved fields. */
  peek(): ReleaseAttempt | null {
    return this.content === null ? null : decodeAttempt(this.content, this.location).attempt;
  }
}
