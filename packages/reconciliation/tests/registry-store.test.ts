import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { toPostingRecord } from '@boardwatch/source-sdk';
import {
  PersistenceError,
  RegistryLockError,
  acquireRegistryLock,
  loadRegistry,
  saveRegistry,
} from '../src/index.js';
import { stored, t0, t1 } from './factories.js';

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('registry store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'boardwatch-registry-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the registry file is missing', async () => {
    const logger = createLogger();

    const loaded = await loadRegistry(join(dir, 'current_jobs.json'), logger);

    expect(loaded.state).toBe('missing');
    expect(loaded.postings.size).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(
      `[registry] No registry at ${join(dir, 'current_jobs.json')}, starting empty`,
      { event: 'registry_missing', path: join(dir, 'current_jobs.json') },
    );
  });

  it('starts empty on a corrupt file', async () => {
    const path = join(dir, 'current_jobs.json');
    await writeFile(path, '[{"jobId": ');
    const logger = createLogger();

    const loaded = await loadRegistry(path, logger);

    expect(loaded.state).toBe('corrupt');
    expect(loaded.postings.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('starts empty when the file is not an array', async () => {
    const path = join(dir, 'current_jobs.json');
    await writeFile(path, '{"jobs": []}');

    const loaded = await loadRegistry(path, createLogger());

    expect(loaded.state).toBe('corrupt');
  });

  it('starts empty when the path cannot be read as a file', async () => {
    const path = join(dir, 'current_jobs.json');
    await mkdir(path);

    const loaded = await loadRegistry(path, createLogger());

    expect(loaded.state).toBe('unreadable');
  });

  it('drops invalid records and keeps the rest', async () => {
    const path = join(dir, 'current_jobs.json');
    const valid = toPostingRecord(stored('A'));
    const backwards = { ...toPostingRecord(stored('B')), firstSeen: t1.toISOString(), lastSeen: t0.toISOString() };
    await writeFile(path, JSON.stringify([valid, { jobId: 'broken' }, backwards]));
    const logger = createLogger();

    const loaded = await loadRegistry(path, logger);

    expect(loaded.state).toBe('loaded');
    expect(loaded.dropped).toBe(2);
    expect([...loaded.postings.keys()]).toEqual(['greenhouse:acme:A']);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      '[registry] Dropping invalid registry record',
      expect.objectContaining({ event: 'registry_record_invalid' }),
    );
  });

  it('writes the registry and reads it back', async () => {
    const path = join(dir, 'registry', 'current_jobs.json');
    const posting = stored('A', {
      status: 'updated',
      lastSeen: t1,
      updatedAt: t1,
      requirements: ['Rust'],
      rawData: { id: 'A' },
    });

    await saveRegistry(path, [posting]);
    const loaded = await loadRegistry(path, createLogger());

    expect(loaded.postings.get('greenhouse:acme:A')).toEqual(posting);
    expect(await readdir(join(dir, 'registry'))).toEqual(['current_jobs.json']);
  });

  it('omits absent optional fields from the file', async () => {
    const path = join(dir, 'current_jobs.json');

    await saveRegistry(path, [stored('A')]);
    const [record] = JSON.parse(await readFile(path, 'utf-8')) as Array<Record<string, unknown>>;

    expect(record).not.toHaveProperty('updatedAt');
    expect(record).not.toHaveProperty('team');
    expect(record!.firstSeen).toBe('2024-05-01T06:00:00.000Z');
  });

  it('raises PersistenceError when the directory cannot be created', async () => {
    await writeFile(join(dir, 'blocker'), 'not a directory');
    const path = join(dir, 'blocker', 'current_jobs.json');

    const error = await saveRegistry(path, [stored('A')]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof PersistenceError ? error.failures.map((failure) => failure.artifact) : []).toEqual([
      'registry',
    ]);
  });
});

describe('registry lock', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'boardwatch-lock-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('refuses a second holder until released', async () => {
    const registryPath = join(dir, 'current_jobs.json');

    const lock = await acquireRegistryLock(registryPath);
    expect(lock.path).toBe(`${registryPath}.lock`);
    await expect(acquireRegistryLock(registryPath)).rejects.toBeInstanceOf(RegistryLockError);

    await lock.release();
    const again = await acquireRegistryLock(registryPath);
    await again.release();
  });

  it('takes over a lock left by a process that is no longer running', async () => {
    const registryPath = join(dir, 'current_jobs.json');
    const lockPath = `${registryPath}.lock`;
    // Above the kernel pid limit, so never a live process.
    await writeFile(lockPath, JSON.stringify({ pid: 4194305, acquiredAt: new Date().toISOString() }));
    const logger = createLogger();

    const lock = await acquireRegistryLock(registryPath, { logger });

    const content = JSON.parse(await readFile(lock.path, 'utf-8')) as { pid: number };
    expect(content.pid).toBe(process.pid);
    expect(logger.warn).toHaveBeenCalledWith(
      `[registry] Removing stale lock ${lockPath}: holder pid 4194305 is not running`,
      expect.objectContaining({ event: 'registry_lock_stale', pid: 4194305 }),
    );

    await lock.release();
  });

  it('takes over a lock older than the staleness bound', async () => {
    const registryPath = join(dir, 'current_jobs.json');
    const lockPath = `${registryPath}.lock`;
    await writeFile(lockPath, JSON.stringify({ pid: process.pid, acquiredAt: '2020-01-01T00:00:00.000Z' }));
    const logger = createLogger();

    const lock = await acquireRegistryLock(registryPath, { logger, staleAfterMs: 60_000 });

    expect(logger.warn).toHaveBeenCalledWith(
      `[registry] Removing stale lock ${lockPath}: acquired at 2020-01-01T00:00:00.000Z, older than 60000 ms`,
      expect.objectContaining({ event: 'registry_lock_stale' }),
    );
    await lock.release();
  });

  it('keeps a fresh lock held by a running process', async () => {
    const registryPath = join(dir, 'current_jobs.json');
    await writeFile(
      `${registryPath}.lock`,
      JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }),
    );

    await expect(acquireRegistryLock(registryPath)).rejects.toBeInstanceOf(RegistryLockError);
    expect(JSON.parse(await readFile(`${registryPath}.lock`, 'utf-8'))).toMatchObject({ pid: process.pid });
  });

  it('records the holder in the lock file', async () => {
    const lock = await acquireRegistryLock(join(dir, 'current_jobs.json'));

    const content = JSON.parse(await readFile(lock.path, 'utf-8')) as { pid: number };
    expect(content.pid).toBe(process.pid);

    await lock.release();
  });
});
