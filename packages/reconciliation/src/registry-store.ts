import { mkdir, open, readFile, rename, rm, stat, writeFile, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  asNumber,
  asString,
  fromPostingRecord,
  isRecord,
  toPostingRecord,
  validatePostingRecords,
  type Posting,
  type SourceLogger,
} from '@boardwatch/source-sdk';
import { PersistenceError, RegistryLockError } from './errors.js';
import { indexByJobId } from './reconcile.js';

export type RegistryLoadState = 'loaded' | 'missing' | 'unreadable' | 'corrupt';

export interface LoadedRegistry {
  postings: Map<string, Posting>;
  state: RegistryLoadState;
  /** Records that failed validation and were left out. */
  dropped: number;
}

export interface RegistryLock {
  path: string;
  release(): Promise<void>;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyRegistry(state: RegistryLoadState): LoadedRegistry {
  return { postings: new Map(), state, dropped: 0 };
}

/**
 * Read the previous registry. A missing or unreadable file is a first run,
 * never an error.
 */
export async function loadRegistry(path: string, logger: SourceLogger): Promise<LoadedRegistry> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      logger.info(`[registry] No registry at ${path}, starting empty`, { event: 'registry_missing', path });
      return emptyRegistry('missing');
    }

    logger.warn(`[registry] Cannot read ${path}, starting empty: ${errorMessage(error)}`, {
      event: 'registry_unreadable',
      path,
    });
    return emptyRegistry('unreadable');
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    logger.warn(`[registry] Corrupt registry at ${path}, starting empty: ${errorMessage(error)}`, {
      event: 'registry_corrupt',
      path,
    });
    return emptyRegistry('corrupt');
  }

  if (!Array.isArray(data)) {
    logger.warn(`[registry] Registry at ${path} is not an array, starting empty`, { event: 'registry_corrupt', path });
    return emptyRegistry('corrupt');
  }

  let dropped = 0;
  const records = validatePostingRecords(data, {
    onInvalid: (issues) => {
      dropped += 1;
      logger.warn('[registry] Dropping invalid registry record', {
        event: 'registry_record_invalid',
        path,
        issues: issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    },
  });

  const { byId } = indexByJobId(records.map(fromPostingRecord));
  logger.info(`[registry] Loaded ${byId.size} postings from ${path}`, {
    event: 'registry_loaded',
    path,
    count: byId.size,
    dropped,
  });

  return { postings: byId, state: 'loaded', dropped };
}

/**
 * Replace the registry file wholesale: write a sibling temp file, then rename
 * it over the target.
 */
export async function saveRegistry(path: string, postings: Iterable<Posting>): Promise<void> {
  const records = Array.from(postings, toPostingRecord);
  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;

  const failure = (cause: unknown) => new PersistenceError([{ artifact: 'registry', path, cause }]);

  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    throw failure(error);
  }

  try {
    await writeFile(tempPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw failure(error);
  }
}

/** A lock older than this is taken over even when its holder looks alive. */
export const DEFAULT_LOCK_STALE_MS = 6 * 60 * 60 * 1000;

export interface AcquireLockOptions {
  staleAfterMs?: number;
  logger?: SourceLogger;
}

interface LockHolder {
  pid?: number;
  acquiredAt: Date;
}

async function openExclusive(lockPath: string): Promise<FileHandle | undefined> {
  try {
    return await open(lockPath, 'wx');
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Holder recorded in an existing lock. The file's mtime stands in for a
 * missing or unparsable `acquiredAt`. Undefined when the lock is gone.
 */
async function readLockHolder(lockPath: string): Promise<LockHolder | undefined> {
  let text: string;
  let modifiedAt: Date;
  try {
    [text, { mtime: modifiedAt }] = await Promise.all([readFile(lockPath, 'utf-8'), stat(lockPath)]);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return { acquiredAt: modifiedAt };
  }

  const pid = isRecord(body) ? asNumber(body.pid) : undefined;
  const recorded = isRecord(body) ? asString(body.acquiredAt) : undefined;
  const acquiredAt = recorded ? new Date(recorded) : modifiedAt;
  return {
    pid: pid !== undefined && Number.isInteger(pid) && pid > 0 ? pid : undefined,
    acquiredAt: Number.isNaN(acquiredAt.getTime()) ? modifiedAt : acquiredAt,
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return errorCode(error) !== 'ESRCH';
  }
}

function staleReason(holder: LockHolder, staleAfterMs: number): string | undefined {
  if (holder.pid !== undefined && !isProcessAlive(holder.pid)) {
    return `holder pid ${holder.pid} is not running`;
  }

  if (Date.now() - holder.acquiredAt.getTime() > staleAfterMs) {
    return `acquired at ${holder.acquiredAt.toISOString()}, older than ${staleAfterMs} ms`;
  }

  return undefined;
}

/**
 * Take the exclusive `<registry>.lock` file. A lock left by a dead process,
 * or older than `staleAfterMs`, is removed and taken over once; any other
 * held lock fails at once.
 */
export async function acquireRegistryLock(
  registryPath: string,
  options: AcquireLockOptions = {},
): Promise<RegistryLock> {
  const lockPath = `${registryPath}.lock`;
  const staleAfterMs = options.staleAfterMs ?? DEFAULT_LOCK_STALE_MS;
  await mkdir(dirname(lockPath), { recursive: true });

  let handle = await openExclusive(lockPath);
  if (!handle) {
    const holder = await readLockHolder(lockPath);
    if (holder) {
      const reason = staleReason(holder, staleAfterMs);
      if (!reason) {
        throw new RegistryLockError(lockPath);
      }

      options.logger?.warn(`[registry] Removing stale lock ${lockPath}: ${reason}`, {
        event: 'registry_lock_stale',
        path: lockPath,
        pid: holder.pid,
        acquiredAt: holder.acquiredAt.toISOString(),
      });
      await rm(lockPath, { force: true });
    }

    handle = await openExclusive(lockPath);
    if (!handle) {
      throw new RegistryLockError(lockPath);
    }
  }

  try {
    await handle.writeFile(`${JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() })}\n`);
  } catch (error) {
    await handle.close();
    await rm(lockPath, { force: true });
    throw error;
  }
  await handle.close();

  return {
    path: lockPath,
    release: () => rm(lockPath, { force: true }),
  };
}
