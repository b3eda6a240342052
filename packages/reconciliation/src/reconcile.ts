import { toPostingRecord, type Posting, type PostingRecord, type ScrapedPosting } from '@boardwatch/source-sdk';
import { hasChanged } from './compare.js';
import type { PostingEvent, ReconcileResult } from './types.js';

function snapshot(posting: Posting): Readonly<PostingRecord> {
  return Object.freeze(toPostingRecord(posting));
}

function latest(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * Index postings by jobId. Later entries replace earlier ones; replaced ids
 * are reported once per extra occurrence.
 */
export function indexByJobId<T extends { jobId: string }>(postings: Iterable<T>): { byId: Map<string, T>; duplicates: string[] } {
  const byId = new Map<string, T>();
  const duplicates: string[] = [];

  for (const posting of postings) {
    if (byId.has(posting.jobId)) {
      duplicates.push(posting.jobId);
    }
    byId.set(posting.jobId, posting);
  }

  return { byId, duplicates };
}

/**
 * Diff this run's aggregate against the previous registry.
 *
 * Only live (non-closed) previous records take part: a record closed last run
 * is evicted, and the same jobId showing up again counts as appeared.
 */
export function reconcile(
  previous: ReadonlyMap<string, Posting>,
  aggregate: readonly ScrapedPosting[],
  now: Date,
): ReconcileResult {
  const { byId: current, duplicates } = indexByJobId(aggregate);

  const previousLive = new Map<string, Posting>();
  const evicted: string[] = [];
  for (const [jobId, posting] of previous) {
    if (posting.status === 'closed') {
      evicted.push(jobId);
    } else {
      previousLive.set(jobId, posting);
    }
  }

  const registry = new Map<string, Posting>();
  const appeared: PostingEvent[] = [];
  const updated: PostingEvent[] = [];
  const closed: PostingEvent[] = [];
  let active = 0;

  for (const [jobId, scraped] of current) {
    const prior = previousLive.get(jobId);

    if (!prior) {
      const posting: Posting = { ...scraped, firstSeen: now, lastSeen: now, updatedAt: undefined, status: 'new' };
      registry.set(jobId, posting);
      appeared.push({ eventType: 'appeared', jobId, timestamp: now, newData: snapshot(posting) });
      continue;
    }

    // Clock skew must not break firstSeen <= lastSeen.
    const lastSeen = latest(now, prior.firstSeen);

    if (hasChanged(prior, scraped)) {
      const posting: Posting = {
        ...scraped,
        firstSeen: prior.firstSeen,
        lastSeen,
        updatedAt: now,
        status: 'updated',
      };
      registry.set(jobId, posting);
      updated.push({
        eventType: 'updated',
        jobId,
        timestamp: now,
        previousData: snapshot(prior),
        newData: snapshot(posting),
      });
      continue;
    }

    registry.set(jobId, {
      ...scraped,
      firstSeen: prior.firstSeen,
      lastSeen,
      updatedAt: prior.updatedAt,
      status: 'active',
    });
    active += 1;
  }

  for (const [jobId, prior] of previousLive) {
    if (current.has(jobId)) {
      continue;
    }

    registry.set(jobId, { ...prior, status: 'closed' });
    closed.push({ eventType: 'closed', jobId, timestamp: now, previousData: snapshot(prior) });
  }

  return {
    registry,
    events: [...appeared, ...updated, ...closed],
    summary: {
      appeared: appeared.length,
      updated: updated.length,
      closed: closed.length,
      active,
      total: registry.size,
    },
    duplicates,
    evicted,
  };
}
