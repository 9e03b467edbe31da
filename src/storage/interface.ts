import type { ReleaseAttempt } from '../domain/types.ts';

/** Held advisory lock; released in a `finally`. */
export interface StateLock {
  readonly path: string;
  release(): Promise<void>;
}

/**
 * Durable storage for the single release attempt record.
 */
export interface StateStore {
  /** Where the record lives, for messages */
  readonly location: string;

  /**
   * Load the record. Null when there is none; a record that cannot be
   * read back raises CorruptStateError.
   */
  load(): Promise<ReleaseAttempt | null>;

  /** Replace the record atomically. Fields unknown to this version survive. */
  save(attempt: ReleaseAttempt): Promise<void>;

  /** Delete the record. No-op without one. */
  clear(): Promise<void>;

  /** Take the advisory lock, failing fast with LockError when held. */
  lock(): Promise<StateLock>;
}
