/**
 * Structured errors with codes for programmatic handling.
 *
 * Every error must answer: What happened? Why? How do I fix it?
 * The exit code lets scripts branch on the failure without parsing text.
 */

export const ExitCode = {
  Success: 0,
  Internal: 1,
  Config: 2,
  RepositoryState: 3,
  Conflict: 4,
  Version: 5,
  CorruptState: 6,
  Locked: 7,
  InProgress: 10,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class RelcutError extends Error {
  readonly exitCode: ExitCode = ExitCode.Internal;

  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RelcutError';
  }
}

/** Malformed or missing configuration, or bad command line usage. */
export class ConfigError extends RelcutError {
  override readonly exitCode: ExitCode = ExitCode.Config;

  constructor(message: string, code = 'CONFIG_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ConfigError';
  }
}

/** The repository is not in a state the current command can work with. */
export class RepositoryStateError extends RelcutError {
  override readonly exitCode: ExitCode = ExitCode.RepositoryState;

  constructor(message: string, code = 'REPOSITORY_STATE', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'RepositoryStateError';
  }
}

/** Another invocation holds the release lock. */
export class LockError extends RepositoryStateError {
  override readonly exitCode: ExitCode = ExitCode.Locked;

  constructor(lockPath: string, holder: string | null) {
    super(
      `Another relcut invocation is running (lock: ${lockPath}).` +
        ' If no other invocation is running, delete the lock file.',
      'LOCKED',
      { lockPath, holder },
    );
    this.name = 'LockError';
  }
}

/** Some rollback steps of an abort failed; the repository needs manual repair. */
export class RollbackError extends RepositoryStateError {
  constructor(public failures: { step: string; error: string }[]) {
    super(
      `Rollback incomplete: ${failures.length} step(s) failed. Repair the repository by hand.`,
      'ROLLBACK_FAILED',
      { failures },
    );
    this.name = 'RollbackError';
  }
}

/** Merge conflicts remain in the working tree. Expected, not a tool failure. */
export class ConflictError extends RelcutError {
  override readonly exitCode: ExitCode = ExitCode.Conflict;

  constructor(message: string, public paths: string[]) {
    super(message, 'CONFLICT', { paths });
    this.name = 'ConflictError';
  }
}

export class VersionError extends RelcutError {
  override readonly exitCode: ExitCode = ExitCode.Version;

  constructor(message: string, code = 'VERSION_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'VersionError';
  }
}

/** A version string does not parse under the configured scheme. */
export class VersionFormatError extends VersionError {
  constructor(version: string, scheme: string) {
    super(`Invalid ${scheme} version string: '${version}'`, 'VERSION_FORMAT', {
      version,
      scheme,
    });
    this.name = 'VersionFormatError';
  }
}

/** A bump kind the configured scheme does not define. */
export class VersionSchemeError extends VersionError {
  constructor(kind: string, scheme: string) {
    super(`Bump kind '${kind}' is not supported by the ${scheme} scheme`, 'VERSION_SCHEME', {
      kind,
      scheme,
    });
    this.name = 'VersionSchemeError';
  }
}

/** A version control command failed. */
export class AdapterError extends RelcutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'GIT_ERROR', details);
    this.name = 'AdapterError';
  }
}

/** The persisted release record cannot be read. Never healed automatically. */
export class CorruptStateError extends RelcutError {
  override readonly exitCode: ExitCode = ExitCode.CorruptState;

  constructor(path: string, reason: string) {
    super(
      `Release record ${path} is corrupt: ${reason}. Inspect it, then repair or delete it by hand.`,
      'CORRUPT_STATE',
      { path, reason },
    );
    this.name = 'CorruptStateError';
  }
}

/**
 * Exit code for any thrown value.
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof RelcutError ? error.exitCode : ExitCode.Internal;
}
