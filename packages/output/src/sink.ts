import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { PersistenceError, type PersistenceFailure, type PostingEvent } from '@boardwatch/reconciliation';
import { serializeError, toPostingRecord, type Posting, type SourceLogger } from '@boardwatch/source-sdk';
import { encodeCsv, encodeRecordsCsv } from './csv.js';

/** Fields every posting record carries. */
export const POSTING_COLUMNS = [
  'company',
  'companyName',
  'externalId',
  'firstSeen',
  'jobId',
  'jobUrl',
  'lastSeen',
  'source',
  'sourceUrl',
  'status',
  'title',
] as const;

export const EVENT_COLUMNS = ['event_type', 'job_id', 'timestamp', 'previous_data', 'new_data'] as const;

const RUN_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface OutputSinkOptions {
  outputDir: string;
  logger?: SourceLogger;
}

export interface SinkInput {
  registry: ReadonlyMap<string, Posting>;
  events: readonly PostingEvent[];
  /** YYYY-MM-DD, names the dated snapshot and event log. */
  runDate: string;
}

export interface SinkPaths {
  registry: string;
  snapshot: string;
  events: string;
}

interface Artifact {
  name: keyof SinkPaths;
  path: string;
  content: string;
}

const silentLogger: SourceLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function byJobId(a: Posting, b: Posting): number {
  return a.jobId < b.jobId ? -1 : a.jobId > b.jobId ? 1 : 0;
}

export function renderPostingsCsv(postings: readonly Posting[]): string {
  return encodeRecordsCsv([...postings].sort(byJobId).map(toPostingRecord), POSTING_COLUMNS);
}

export function renderEventsCsv(events: readonly PostingEvent[]): string {
  return encodeCsv(
    EVENT_COLUMNS,
    events.map((event) => [
      event.eventType,
      event.jobId,
      event.timestamp,
      event.previousData ? JSON.stringify(event.previousData) : undefined,
      event.newData ? JSON.stringify(event.newData) : undefined,
    ]),
  );
}

export function sinkPaths(outputDir: string, runDate: string): SinkPaths {
  return {
    registry: join(outputDir, 'registry', 'current_jobs.csv'),
    snapshot: join(outputDir, 'snapshots', `${runDate}.csv`),
    events: join(outputDir, 'events', `${runDate}.csv`),
  };
}

async function writeArtifact(artifact: Artifact): Promise<void> {
  await mkdir(dirname(artifact.path), { recursive: true });
  await writeFile(artifact.path, artifact.content, 'utf-8');
}

/**
 * Writes the active registry CSV, the dated snapshot and the dated event log.
 * Every artifact is attempted; failures are raised together afterwards.
 */
export class OutputSink {
  private readonly outputDir: string;
  private readonly logger: SourceLogger;

  constructor(options: OutputSinkOptions) {
    this.outputDir = options.outputDir;
    this.logger = options.logger ?? silentLogger;
  }

  async write(input: SinkInput): Promise<SinkPaths> {
    if (!RUN_DATE_PATTERN.test(input.runDate)) {
      throw new Error(`Invalid run date "${input.runDate}", expected YYYY-MM-DD`);
    }

    const paths = sinkPaths(this.outputDir, input.runDate);
    const all = [...input.registry.values()];
    const live = all.filter((posting) => posting.status !== 'closed');

    const artifacts: Artifact[] = [
      { name: 'registry', path: paths.registry, content: renderPostingsCsv(live) },
      { name: 'snapshot', path: paths.snapshot, content: renderPostingsCsv(all) },
      { name: 'events', path: paths.events, content: renderEventsCsv(input.events) },
    ];

    const settled = await Promise.allSettled(artifacts.map(writeArtifact));

    const failures: PersistenceFailure[] = [];
    settled.forEach((outcome, index) => {
      const artifact = artifacts[index];
      if (outcome.status === 'rejected' && artifact) {
        failures.push({ artifact: artifact.name, path: artifact.path, cause: outcome.reason });
      }
    });

    if (failures.length > 0) {
      const error = new PersistenceError(failures);
      this.logger.error(`[output] ${error.message}`, { event: 'output_failed', error: serializeError(error) });
      throw error;
    }

    this.logger.info(`[output] Wrote ${live.length} active, ${all.length} total postings and ${input.events.length} events`, {
      event: 'output_written',
      ...paths,
    });
    return paths;
  }
}
