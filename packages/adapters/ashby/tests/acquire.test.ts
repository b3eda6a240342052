import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import { DecodeError, InvalidBoardUrlError, type AcquireContext, type BoardTarget } from '@boardwatch/source-sdk';
import { ashbyAdapter, locateBoard } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture: unknown = JSON.parse(readFileSync(resolve(__dirname, '../fixtures/jobs.json'), 'utf-8'));

const API_URL = 'https://api.ashbyhq.com/posting-api/job-board/acme?includeCompensation=true';
const runAt = new Date('2024-05-10T08:00:00.000Z');

const target: BoardTarget = {
  company: 'acme',
  displayName: 'Acme AI',
  source: 'ashby',
  boardUrl: 'https://jobs.ashbyhq.com/acme',
};

function mockJson(payload: unknown, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(JSON.stringify(payload), { status }));
}

function createContext(fetchImpl: typeof fetch): AcquireContext {
  return {
    runAt,
    fetch: { minDelayMs: 0, maxDelayMs: 0, backoffUnitMs: 0, maxAttempts: 1, fetchImpl },
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
}

describe('locateBoard', () => {
  it('reads the organization slug', () => {
    expect(locateBoard('https://jobs.ashbyhq.com/acme/')).toEqual({
      org: 'acme',
      boardUrl: 'https://jobs.ashbyhq.com/acme',
    });
  });

  it('rejects other hosts', () => {
    expect(() => ashbyAdapter.create({ ...target, boardUrl: 'https://acme.com/careers' })).toThrow(
      InvalidBoardUrlError,
    );
  });
});

describe('Ashby adapter', () => {
  it('maps posting API jobs', async () => {
    const fetchMock = mockJson(fixture);
    const context = createContext(fetchMock);

    const postings = await ashbyAdapter.create(target).acquire(context);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]![0]).toBe(API_URL);
    expect(postings).toHaveLength(2);

    expect(postings[0]).toMatchObject({
      jobId: 'ashby:acme:9f1c2d3e-0000-4000-8000-000000000001',
      title: 'Member of Technical Staff',
      team: 'Pretraining',
      location: 'San Francisco',
      employmentType: 'Full-time',
      description: 'Train large models.\nAbout you\nDeep learning experience\nStrong Python',
      requirements: ['Deep learning experience', 'Strong Python'],
      jobUrl: 'https://jobs.ashbyhq.com/acme/9f1c2d3e-0000-4000-8000-000000000001',
      applyUrl: 'https://jobs.ashbyhq.com/acme/9f1c2d3e-0000-4000-8000-000000000001/application',
      salaryRange: '$200K - $300K',
      remotePolicy: 'Hybrid',
      sourceUrl: 'https://jobs.ashbyhq.com/acme',
    });

    expect(postings[1]).toMatchObject({
      jobId: 'ashby:acme:b2',
      team: 'People',
      location: 'Remote - US',
      employmentType: 'Contract',
      description: 'Coordinate interviews.',
      jobUrl: 'https://jobs.ashbyhq.com/acme/b2',
      remotePolicy: 'Remote',
    });
    expect(postings[1]!.requirements).toBeUndefined();
    expect(postings[1]!.applyUrl).toBeUndefined();
  });

  it('ignores unlisted jobs and skips jobs without an id', async () => {
    const context = createContext(mockJson(fixture));

    await ashbyAdapter.create(target).acquire(context);

    expect(context.logger.debug).toHaveBeenCalledWith('[ashby:acme] Ignoring 1 unlisted jobs');
    expect(context.logger.warn).toHaveBeenCalledWith('[ashby:acme] Skipping item: missing external id', {
      company: 'acme',
      source: 'ashby',
      reason: 'missing external id',
    });
    expect(context.logger.info).toHaveBeenCalledWith('[ashby:acme] Acquired 2 of 3 jobs');
  });

  it('accepts jobs nested under jobBoard', async () => {
    const payload = { jobBoard: { jobs: [{ id: 'x1', title: 'Designer', locations: ['Anywhere'] }] } };

    const postings = await ashbyAdapter.create(target).acquire(createContext(mockJson(payload)));

    expect(postings).toHaveLength(1);
    expect(postings[0]!.location).toBe('Anywhere');
    expect(postings[0]!.remotePolicy).toBe('Remote');
  });

  it('rejects payloads without a job list', async () => {
    await expect(ashbyAdapter.create(target).acquire(createContext(mockJson({ ok: true })))).rejects.toBeInstanceOf(
      DecodeError,
    );
  });
});
