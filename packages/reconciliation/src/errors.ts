export interface PersistenceFailure {
  /** Logical name of the artifact, e.g. "registry" or "events". */
  artifact: string;
  path: string;
  cause: unknown;
}

/**
 * One or more artifacts could not be written. Every failure is listed.
 */
export class PersistenceError extends Error {
  readonly failures: PersistenceFailure[];

  constructor(failures: PersistenceFailure[]) {
    const summary = failures
      .map((failure) => {
        const reason = failure.cause instanceof Error ? failure.cause.message : String(failure.cause);
        return `${failure.artifact} (${failure.path}): ${reason}`;
      })
      .join('; ');
    super(`Failed to write ${failures.length} artifact(s): ${summary}`, { cause: failures[0]?.cause });
    this.name = 'PersistenceError';
    this.failures = failures;
  }
}

export class RegistryLockError extends Error {
  readonly lockPath: string;

  constructor(lockPath: string, cause?: unknown) {
    super(`Registry is locked by another run (${lockPath})`, { cause });
    this.name = 'RegistryLockError';
    this.lockPath = lockPath;
  }
}
