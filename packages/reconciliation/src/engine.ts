import { serializeError, type ScrapedPosting, type SourceLogger } from '@boardwatch/source-sdk';
import { PersistenceError } from './errors.js';
import { reconcile } from './reconcile.js';
import { acquireRegistryLock, loadRegistry, saveRegistry, type RegistryLoadState } from './registry-store.js';
import type { ReconcileResult } from './types.js';

export interface ReconciliationEngineOptions {
  registryPath: string;
  logger?: SourceLogger;
  /** Age after which a leftover registry lock is taken over. */
  lockStaleAfterMs?: number;
}

export interface EngineResult extends ReconcileResult {
  previousState: RegistryLoadState;
  previousCount: number;
  droppedRecords: number;
  /** Set when the new registry could not be written; the result is still usable. */
  persistenceError?: PersistenceError;
}

const silentLogger: SourceLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Loads the previous registry, reconciles and writes the new one, all under
 * the registry lock. One reconciliation per registry at a time.
 */
export class ReconciliationEngine {
  private readonly registryPath: string;
  private readonly lockStaleAfterMs?: number;
  private readonly logger: SourceLogger;

  constructor(options: ReconciliationEngineOptions) {
    this.registryPath = options.registryPath;
    this.lockStaleAfterMs = options.lockStaleAfterMs;
    this.logger = options.logger ?? silentLogger;
  }

  async run(aggregate: readonly ScrapedPosting[], now: Date = new Date()): Promise<EngineResult> {
    const lock = await acquireRegistryLock(this.registryPath, {
      staleAfterMs: this.lockStaleAfterMs,
      logger: this.logger,
    });

    try {
      const previous = await loadRegistry(this.registryPath, this.logger);
      const result = reconcile(previous.postings, aggregate, now);

      for (const jobId of new Set(result.duplicates)) {
        this.logger.warn(`[reconcile] Duplicate job id ${jobId} in aggregate, keeping the last one`, {
          event: 'duplicate_job_id',
          jobId,
        });
      }

      if (result.evicted.length > 0) {
        this.logger.info(`[reconcile] Evicted ${result.evicted.length} postings closed in the previous run`, {
          event: 'closed_evicted',
          count: result.evicted.length,
        });
      }

      let persistenceError: PersistenceError | undefined;
      try {
        await saveRegistry(this.registryPath, result.registry.values());
      } catch (error) {
        persistenceError =
          error instanceof PersistenceError
            ? error
            : new PersistenceError([{ artifact: 'registry', path: this.registryPath, cause: error }]);
        this.logger.error(`[reconcile] Failed to persist registry: ${persistenceError.message}`, {
          event: 'registry_persist_failed',
          path: this.registryPath,
          error: serializeError(persistenceError),
        });
      }

      this.logger.info(
        `[reconcile] ${result.summary.appeared} appeared, ${result.summary.updated} updated, ${result.summary.closed} closed, ${result.summary.active} unchanged`,
        { event: 'reconcile_completed', ...result.summary },
      );

      return {
        ...result,
        previousState: previous.state,
        previousCount: previous.postings.size,
        droppedRecords: previous.dropped,
        persistenceError,
      };
    } finally {
      await lock.release();
    }
  }
}
