import type { FetchClientOptions } from './fetch-client.js';

export type SourceKind = 'greenhouse' | 'lever' | 'ashby' | 'workday';

export type PostingStatus = 'new' | 'active' | 'updated' | 'closed';

/**
 * A posting as an adapter hands it over. Status and updatedAt are assigned
 * later by reconciliation, never by an adapter.
 */
export interface ScrapedPosting {
  jobId: string;
  source: SourceKind;
  company: string;
  companyName: string;
  externalId: string;
  title: string;
  team?: string;
  location?: string;
  employmentType?: string;
  description?: string;
  requirements?: string[];
  jobUrl: string;
  applyUrl?: string;
  sourceUrl: string;
  salaryRange?: string;
  remotePolicy?: string;
  experienceLevel?: string;
  firstSeen: Date;
  lastSeen: Date;
  rawData?: Record<string, unknown>;
}

export interface Posting extends ScrapedPosting {
  status: PostingStatus;
  updatedAt?: Date;
}

/**
 * Fields an adapter extracts from one raw item before identity and
 * timestamps are attached.
 */
export interface PostingDraft {
  externalId?: string;
  title?: string;
  team?: string;
  location?: string;
  employmentType?: string;
  description?: string;
  requirements?: string[];
  jobUrl?: string;
  applyUrl?: string;
  salaryRange?: string;
  remotePolicy?: string;
  experienceLevel?: string;
  rawData?: Record<string, unknown>;
}

export type PostingResult = { kind: 'posting'; posting: ScrapedPosting } | { kind: 'skip'; reason: string };

/**
 * One configured board: which company, which platform, where.
 */
export interface BoardTarget {
  company: string;
  displayName: string;
  source: SourceKind;
  boardUrl: string;
  options?: Record<string, unknown>;
}

/**
 * Minimal logger interface so packages stay free of a logging backend.
 */
export interface SourceLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Per-run inputs handed to every adapter. Each acquire() builds its own
 * FetchClient from `fetch`.
 */
export interface AcquireContext {
  runAt: Date;
  fetch: FetchClientOptions;
  logger: SourceLogger;
}

export interface SourceAdapter {
  readonly key: string;
  readonly source: SourceKind;
  readonly target: BoardTarget;
  acquire(context: AcquireContext): Promise<ScrapedPosting[]>;
}

export interface AdapterManifest {
  id: SourceKind;
  name: string;
  version: string;
}

export interface AdapterDefinition {
  manifest: AdapterManifest;
  create(target: BoardTarget): SourceAdapter;
}
