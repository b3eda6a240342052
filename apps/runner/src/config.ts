import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
  companyIdSchema,
  sourceKindSchema,
  toError,
  type BoardTarget,
  type FetchClientOptions,
} from '@boardwatch/source-sdk';
import { DEFAULT_LOCK_STALE_MS } from '@boardwatch/reconciliation';
import { z } from 'zod';
import { readIntEnv, readListEnv, readOptionalEnv, readStringEnv, type Env } from './env.js';

export const DEFAULT_COMPANIES_FILE = fileURLToPath(new URL('../config/companies.json', import.meta.url));
export const DEFAULT_OUTPUT_DIR = 'outputs';
export const DEFAULT_REGISTRY_FILE = 'outputs/registry/current_jobs.json';

const RUN_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface RunnerConfig {
  companiesFile: string;
  outputDir: string;
  registryFile: string;
  /** Age after which a leftover registry lock is taken over. */
  lockStaleAfterMs: number;
  /** Overrides the UTC date of the run timestamp in output file names. */
  runDate?: string;
  runId?: string;
  /** Company ids to keep; empty keeps every enabled company. */
  only: string[];
  maxParallel: number;
  /** 0 disables the per-adapter timeout. */
  adapterTimeoutMs: number;
  fetch: FetchClientOptions;
}

export function readRunnerConfig(env: Env = process.env): RunnerConfig {
  const runDate = readOptionalEnv(env, 'BOARDWATCH_RUN_DATE');
  if (runDate && !RUN_DATE_PATTERN.test(runDate)) {
    throw new Error(`BOARDWATCH_RUN_DATE must be YYYY-MM-DD, got "${runDate}"`);
  }

  const minDelayMs = readIntEnv(env, 'FETCH_MIN_DELAY_MS', 1000, 0);
  const maxDelayMs = readIntEnv(env, 'FETCH_MAX_DELAY_MS', 3000, 0);
  if (maxDelayMs < minDelayMs) {
    throw new Error(`FETCH_MAX_DELAY_MS (${maxDelayMs}) must not be below FETCH_MIN_DELAY_MS (${minDelayMs})`);
  }

  return {
    companiesFile: readStringEnv(env, 'BOARDWATCH_COMPANIES_FILE', DEFAULT_COMPANIES_FILE),
    outputDir: readStringEnv(env, 'BOARDWATCH_OUTPUT_DIR', DEFAULT_OUTPUT_DIR),
    registryFile: readStringEnv(env, 'BOARDWATCH_REGISTRY_FILE', DEFAULT_REGISTRY_FILE),
    lockStaleAfterMs: readIntEnv(env, 'REGISTRY_LOCK_STALE_MS', DEFAULT_LOCK_STALE_MS),
    runDate,
    runId: readOptionalEnv(env, 'BOARDWATCH_RUN_ID'),
    only: readListEnv(env, 'BOARDWATCH_ONLY'),
    maxParallel: readIntEnv(env, 'MAX_PARALLEL_ADAPTERS', 4),
    adapterTimeoutMs: readIntEnv(env, 'ADAPTER_TIMEOUT_MS', 0, 0),
    fetch: {
      userAgent: readOptionalEnv(env, 'FETCH_USER_AGENT'),
      minDelayMs,
      maxDelayMs,
      maxAttempts: readIntEnv(env, 'FETCH_MAX_ATTEMPTS', 3),
      backoffUnitMs: readIntEnv(env, 'FETCH_BACKOFF_UNIT_MS', 1000, 0),
      timeoutMs: readIntEnv(env, 'FETCH_TIMEOUT_MS', 30000),
    },
  };
}

export const companyEntrySchema = z.object({
  company: companyIdSchema,
  displayName: z.string().trim().min(1),
  source: sourceKindSchema,
  boardUrl: z.string().url(),
  options: z.record(z.unknown()).optional(),
  enabled: z.boolean().default(true),
});

const companiesFileSchema = z.object({
  companies: z.array(companyEntrySchema),
});

export type CompanyEntry = z.infer<typeof companyEntrySchema>;

export function parseCompanies(raw: unknown, origin: string): CompanyEntry[] {
  const parsed = companiesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid companies file ${origin}: ${issues}`);
  }

  return parsed.data.companies;
}

export async function loadCompanies(path: string): Promise<CompanyEntry[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`Cannot read companies file ${path}: ${toError(error).message}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Companies file ${path} is not valid JSON: ${toError(error).message}`, { cause: error });
  }

  return parseCompanies(raw, path);
}

export interface CompanySelection {
  selected: CompanyEntry[];
  /** Ids named in the filter that match no configured company. */
  unknown: string[];
}

export function selectCompanies(companies: readonly CompanyEntry[], only: readonly string[]): CompanySelection {
  const enabled = companies.filter((entry) => entry.enabled);
  if (only.length === 0) {
    return { selected: enabled, unknown: [] };
  }

  const wanted = new Set(only);
  const known = new Set(companies.map((entry) => entry.company));
  return {
    selected: enabled.filter((entry) => wanted.has(entry.company)),
    unknown: only.filter((id) => !known.has(id)),
  };
}

export function toBoardTarget(entry: CompanyEntry): BoardTarget {
  return {
    company: entry.company,
    displayName: entry.displayName,
    source: entry.source,
    boardUrl: entry.boardUrl,
    options: entry.options,
  };
}
