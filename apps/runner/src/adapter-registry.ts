import {
  toError,
  type FetchClientOptions,
  type ScrapedPosting,
  type SourceAdapter,
  type SourceKind,
} from '@boardwatch/source-sdk';
import type { Logger } from 'pino';
import { createSourceLogger } from './observability/source-logger.js';
import { withAdapterLogger } from './observability/with-adapter-logger.js';

export class AdapterFailure extends Error {
  readonly adapterKey: string;

  constructor(adapterKey: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AdapterFailure';
    this.adapterKey = adapterKey;
  }
}

export interface RegistryRunContext {
  runId: string;
  runAt: Date;
  fetch: FetchClientOptions;
}

export interface AdapterRegistryOptions {
  logger: Logger;
  /** Upper bound on adapters acquiring at the same time. */
  maxParallel?: number;
  /**
   * 0 or absent disables the per-adapter timeout. On expiry the adapter's
   * in-flight and pending requests are aborted.
   */
  adapterTimeoutMs?: number;
}

export type AdapterStatus = 'succeeded' | 'failed';

export interface AdapterOutcome {
  key: string;
  source: SourceKind;
  company: string;
  status: AdapterStatus;
  postingCount: number;
  durationMs: number;
  error?: string;
}

export interface RegistryRunResult {
  postings: ScrapedPosting[];
  outcomes: AdapterOutcome[];
}

interface AdapterRun {
  outcome: AdapterOutcome;
  postings: ScrapedPosting[];
}

function withTimeout<T>(
  adapterKey: string,
  promise: Promise<T>,
  timeoutMs: number,
  onExpire: (failure: AdapterFailure) => void,
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const failure = new AdapterFailure(adapterKey, `Adapter ${adapterKey} timed out after ${timeoutMs} ms`);
      onExpire(failure);
      reject(failure);
    }, timeoutMs);
  });

  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}

/**
 * Holds one adapter per (company, source) and runs them through a bounded
 * worker pool. A failing adapter is logged and excluded from the aggregate.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();
  private readonly logger: Logger;
  private readonly maxParallel: number;
  private readonly adapterTimeoutMs: number;

  constructor(options: AdapterRegistryOptions) {
    this.logger = options.logger;
    this.maxParallel = Math.max(1, Math.floor(options.maxParallel ?? 4));
    this.adapterTimeoutMs = Math.max(0, options.adapterTimeoutMs ?? 0);
  }

  get size(): number {
    return this.adapters.size;
  }

  keys(): string[] {
    return [...this.adapters.keys()];
  }

  register(adapter: SourceAdapter): void {
    if (this.adapters.has(adapter.key)) {
      throw new Error(`Duplicate adapter key: ${adapter.key}`);
    }

    this.adapters.set(adapter.key, adapter);
  }

  async runAll(context: RegistryRunContext): Promise<RegistryRunResult> {
    const queue = [...this.adapters.values()];
    const runs: AdapterRun[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < queue.length) {
        const index = next;
        next += 1;
        const adapter = queue[index];
        if (adapter) {
          runs[index] = await this.runOne(adapter, context);
        }
      }
    };

    const workerCount = Math.min(this.maxParallel, queue.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const postings = runs.flatMap((run) => run.postings);
    const outcomes = runs.map((run) => run.outcome);
    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;

    this.logger.info(
      {
        event: 'adapters_completed',
        runId: context.runId,
        succeeded: outcomes.length - failed,
        failed,
        postings: postings.length,
      },
      'Adapters completed',
    );

    return { postings, outcomes };
  }

  private async runOne(adapter: SourceAdapter, context: RegistryRunContext): Promise<AdapterRun> {
    const startedAt = Date.now();
    const base = { key: adapter.key, source: adapter.source, company: adapter.target.company };
    const logger = this.logger.child({ adapter: adapter.key, runId: context.runId });
    const controller = new AbortController();

    try {
      const postings = await withAdapterLogger({
        logger: this.logger,
        adapterKey: adapter.key,
        runId: context.runId,
        context: { source: adapter.source, company: adapter.target.company },
        summary: (result: ScrapedPosting[]) => ({ postings: result.length }),
        run: () =>
          withTimeout(
            adapter.key,
            adapter.acquire({
              runAt: context.runAt,
              fetch: { ...context.fetch, signal: controller.signal },
              logger: createSourceLogger(logger),
            }),
            this.adapterTimeoutMs,
            (failure) => controller.abort(failure),
          ),
      });

      return {
        postings,
        outcome: { ...base, status: 'succeeded', postingCount: postings.length, durationMs: Date.now() - startedAt },
      };
    } catch (error) {
      const failure =
        error instanceof AdapterFailure
          ? error
          : new AdapterFailure(adapter.key, `Adapter ${adapter.key} failed: ${toError(error).message}`, error);

      return {
        postings: [],
        outcome: {
          ...base,
          status: 'failed',
          postingCount: 0,
          durationMs: Date.now() - startedAt,
          error: failure.message,
        },
      };
    }
  }
}
