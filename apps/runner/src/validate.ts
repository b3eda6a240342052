import type { AdapterOutcome } from './adapter-registry.js';
import type { RunnerConfig } from './config.js';
import { ensureRunId } from './observability/trace.js';
import { buildRegistry, readCompanies, RunStageError, type RunDependencies } from './run.js';
import { getAdapterDefinition } from './sources/catalog.js';

export type ValidationStatus = 'working' | 'empty' | 'failing';

export interface ValidationReport {
  runId: string;
  outcomes: AdapterOutcome[];
}

export function validationStatus(outcome: AdapterOutcome): ValidationStatus {
  if (outcome.status === 'failed') {
    return 'failing';
  }
  return outcome.postingCount > 0 ? 'working' : 'empty';
}

/**
 * Acquires from every configured board and reports per-adapter outcomes.
 * Nothing is reconciled and no file is written.
 */
export async function validateAdapters(config: RunnerConfig, deps: RunDependencies): Promise<ValidationReport> {
  const runAt = deps.now ? deps.now() : new Date();
  const runId = ensureRunId(config.runId);
  const logger = deps.logger.child({ runId });

  logger.info({ event: 'validation_started', runAt: runAt.toISOString() }, 'Validation started');

  const companies = await readCompanies(config, logger);
  const registry = buildRegistry(companies, config, logger, deps.resolveAdapter ?? getAdapterDefinition);
  if (registry.size === 0) {
    throw new RunStageError('adapters', 'No adapters could be constructed');
  }

  const fetchOptions = deps.fetchImpl ? { ...config.fetch, fetchImpl: deps.fetchImpl } : config.fetch;
  const { outcomes } = await registry.runAll({ runId, runAt, fetch: fetchOptions });

  logger.info(
    {
      event: 'validation_completed',
      durationMs: Date.now() - runAt.getTime(),
      adapters: outcomes.length,
      failedAdapters: outcomes.filter((outcome) => outcome.status === 'failed').length,
    },
    'Validation completed',
  );

  return { runId, outcomes };
}

export function formatValidationReport(outcomes: readonly AdapterOutcome[]): string[] {
  const counts: Record<ValidationStatus, number> = { working: 0, empty: 0, failing: 0 };
  const lines = outcomes.map((outcome) => {
    const status = validationStatus(outcome);
    counts[status] += 1;
    const line = `[${status}] ${outcome.key} postings=${outcome.postingCount} durationMs=${outcome.durationMs}`;
    return outcome.error ? `${line} error=${outcome.error}` : line;
  });

  lines.push(
    `${outcomes.length} adapters: ${counts.working} working, ${counts.empty} empty, ${counts.failing} failing`,
  );
  return lines;
}
