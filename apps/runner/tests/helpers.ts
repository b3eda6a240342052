import {
  adapterKey,
  type AdapterDefinition,
  type BoardTarget,
  type ScrapedPosting,
  type SourceAdapter,
  type SourceKind,
} from '@boardwatch/source-sdk';
import type { Logger } from 'pino';
import { vi } from 'vitest';

export function createLoggerMock(): Logger {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export function boardTarget(company: string, source: SourceKind = 'greenhouse'): BoardTarget {
  return {
    company,
    displayName: company.toUpperCase(),
    source,
    boardUrl: `https://boards.greenhouse.io/${company}`,
  };
}

export function posting(company: string, externalId: string, runAt: Date): ScrapedPosting {
  return {
    jobId: `greenhouse:${company}:${externalId}`,
    source: 'greenhouse',
    company,
    companyName: company.toUpperCase(),
    externalId,
    title: `Engineer ${externalId}`,
    jobUrl: `https://boards.greenhouse.io/${company}/jobs/${externalId}`,
    sourceUrl: `https://boards.greenhouse.io/${company}`,
    firstSeen: runAt,
    lastSeen: runAt,
  };
}

export function fakeAdapter(company: string, acquire: SourceAdapter['acquire']): SourceAdapter {
  const target = boardTarget(company);
  return { key: adapterKey(target), source: target.source, target, acquire };
}

export function fakeDefinition(acquire: SourceAdapter['acquire']): AdapterDefinition {
  return {
    manifest: { id: 'greenhouse', name: 'Fake', version: '0.0.0' },
    create: (target) => ({ key: adapterKey(target), source: target.source, target, acquire }),
  };
}
