import { OutputSink, type SinkPaths } from '@boardwatch/output';
import { ReconciliationEngine, type EngineResult, type ReconcileSummary } from '@boardwatch/reconciliation';
import { serializeError, toError, type AdapterDefinition, type SourceAdapter } from '@boardwatch/source-sdk';
import type { Logger } from 'pino';
import { AdapterRegistry, type AdapterOutcome } from './adapter-registry.js';
import { loadCompanies, selectCompanies, toBoardTarget, type CompanyEntry, type RunnerConfig } from './config.js';
import { createSourceLogger } from './observability/source-logger.js';
import { ensureRunId } from './observability/trace.js';
import { getAdapterDefinition } from './sources/catalog.js';

export type RunStage = 'config' | 'adapters' | 'scrape' | 'reconcile' | 'output';

export const STAGE_EXIT_CODES: Record<RunStage, number> = {
  config: 1,
  adapters: 2,
  scrape: 3,
  reconcile: 4,
  output: 5,
};

export class RunStageError extends Error {
  readonly stage: RunStage;
  readonly exitCode: number;

  constructor(stage: RunStage, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RunStageError';
    this.stage = stage;
    this.exitCode = STAGE_EXIT_CODES[stage];
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof RunStageError ? error.exitCode : 1;
}

export interface RunDependencies {
  logger: Logger;
  now?: () => Date;
  fetchImpl?: typeof fetch;
  resolveAdapter?: (source: string) => AdapterDefinition;
}

export interface RunReport {
  runId: string;
  runAt: Date;
  runDate: string;
  outcomes: AdapterOutcome[];
  summary: ReconcileSummary;
  paths: SinkPaths;
}

export async function readCompanies(config: RunnerConfig, logger: Logger): Promise<CompanyEntry[]> {
  let companies: CompanyEntry[];
  try {
    companies = await loadCompanies(config.companiesFile);
  } catch (error) {
    throw new RunStageError('config', toError(error).message, error);
  }

  const { selected, unknown } = selectCompanies(companies, config.only);
  if (unknown.length > 0) {
    logger.warn({ event: 'companies_filter_unmatched', companies: unknown }, 'Filter names unknown companies');
  }

  return selected;
}

export function buildRegistry(
  companies: readonly CompanyEntry[],
  config: RunnerConfig,
  logger: Logger,
  resolveAdapter: (source: string) => AdapterDefinition,
): AdapterRegistry {
  const registry = new AdapterRegistry({
    logger,
    maxParallel: config.maxParallel,
    adapterTimeoutMs: config.adapterTimeoutMs,
  });

  for (const entry of companies) {
    let adapter: SourceAdapter;
    try {
      adapter = resolveAdapter(entry.source).create(toBoardTarget(entry));
    } catch (error) {
      logger.error(
        {
          event: 'adapter_construction_failed',
          company: entry.company,
          source: entry.source,
          error: serializeError(error),
        },
        'Adapter construction failed',
      );
      continue;
    }

    try {
      registry.register(adapter);
    } catch (error) {
      throw new RunStageError('config', toError(error).message, error);
    }
  }

  return registry;
}

/**
 * One tracking run: construct adapters, acquire, reconcile against the
 * persisted registry and write the CSV outputs. Each failed stage surfaces as
 * a RunStageError carrying its exit code.
 */
export async function runTracker(config: RunnerConfig, deps: RunDependencies): Promise<RunReport> {
  const { logger } = deps;
  const runAt = deps.now ? deps.now() : new Date();
  const runId = ensureRunId(config.runId);
  const runDate = config.runDate ?? runAt.toISOString().slice(0, 10);
  const runLogger = logger.child({ runId });

  runLogger.info({ event: 'run_started', runAt: runAt.toISOString(), runDate }, 'Run started');

  const companies = await readCompanies(config, runLogger);
  const registry = buildRegistry(companies, config, runLogger, deps.resolveAdapter ?? getAdapterDefinition);
  if (registry.size === 0) {
    throw new RunStageError('adapters', 'No adapters could be constructed');
  }

  const fetchOptions = deps.fetchImpl ? { ...config.fetch, fetchImpl: deps.fetchImpl } : config.fetch;
  const { postings, outcomes } = await registry.runAll({ runId, runAt, fetch: fetchOptions });
  if (postings.length === 0) {
    throw new RunStageError('scrape', `Scraping yielded zero postings from ${registry.size} adapters`);
  }

  const sourceLogger = createSourceLogger(runLogger);
  const engine = new ReconciliationEngine({
    registryPath: config.registryFile,
    logger: sourceLogger,
    lockStaleAfterMs: config.lockStaleAfterMs,
  });
  let result: EngineResult;
  try {
    result = await engine.run(postings, runAt);
  } catch (error) {
    throw new RunStageError('reconcile', `Reconciliation failed: ${toError(error).message}`, error);
  }

  const sink = new OutputSink({ outputDir: config.outputDir, logger: sourceLogger });
  let paths: SinkPaths;
  try {
    paths = await sink.write({ registry: result.registry, events: result.events, runDate });
  } catch (error) {
    if (result.persistenceError) {
      // The registry failure decides the exit code; the sink already logged its own.
      throw new RunStageError('reconcile', result.persistenceError.message, result.persistenceError);
    }
    throw new RunStageError('output', `Output writing failed: ${toError(error).message}`, error);
  }

  if (result.persistenceError) {
    throw new RunStageError('reconcile', result.persistenceError.message, result.persistenceError);
  }

  runLogger.info(
    {
      event: 'run_completed',
      durationMs: Date.now() - runAt.getTime(),
      adapters: outcomes.length,
      failedAdapters: outcomes.filter((outcome) => outcome.status === 'failed').length,
      ...result.summary,
    },
    'Run completed',
  );

  return { runId, runAt, runDate, outcomes, summary: result.summary, paths };
}
