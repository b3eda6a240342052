import type { Posting, PostingRecord } from '@boardwatch/source-sdk';

export type EventType = 'appeared' | 'updated' | 'closed';

/**
 * One detected change. Snapshots are serialized records frozen at emit time.
 */
export interface PostingEvent {
  eventType: EventType;
  jobId: string;
  timestamp: Date;
  previousData?: Readonly<PostingRecord>;
  newData?: Readonly<PostingRecord>;
}

export interface ReconcileSummary {
  appeared: number;
  updated: number;
  closed: number;
  active: number;
  /** Registry size after reconciliation, closed postings included. */
  total: number;
}

export interface ReconcileResult {
  registry: Map<string, Posting>;
  events: PostingEvent[];
  summary: ReconcileSummary;
  /** Job ids seen more than once in the aggregate; the last occurrence won. */
  duplicates: string[];
  /** Postings closed in the previous run and dropped from this registry. */
  evicted: string[];
}
