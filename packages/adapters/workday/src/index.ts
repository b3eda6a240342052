import { z } from 'zod';
import {
  DecodeError,
  FetchClient,
  InvalidBoardUrlError,
  adapterKey,
  asNumber,
  asString,
  collectPostings,
  defineAdapter,
  inferRemotePolicy,
  isRecord,
  type AcquireContext,
  type BoardTarget,
  type PostingDraft,
  type ScrapedPosting,
} from '@boardwatch/source-sdk';

const BOARD_URL_PATTERN = /^https?:\/\/([a-z0-9-]+)\.(wd\d+)\.myworkdayjobs\.com\/(?:([a-z]{2}-[a-z]{2})\/)?([^/?#]+)/i;

export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_MAX_PAGES = 50;

const workdayOptionsSchema = z.object({
  companyId: z.string().min(1).optional(),
  pageSize: z.number().int().positive().max(100).optional(),
  maxPages: z.number().int().positive().optional(),
});

export interface WorkdayBoard {
  tenant: string;
  site: string;
  /** Public board root, locale included when the URL has one. */
  boardUrl: string;
  apiUrl: string;
  pageSize: number;
  maxPages: number;
}

export function locateBoard(boardUrl: string, options?: Record<string, unknown>): WorkdayBoard {
  const match = BOARD_URL_PATTERN.exec(boardUrl.trim());
  const host = match?.[1]?.toLowerCase();
  const instance = match?.[2]?.toLowerCase();
  const locale = match?.[3];
  const site = match?.[4];
  if (!host || !instance || !site) {
    throw new InvalidBoardUrlError(
      'workday',
      boardUrl,
      'https://<tenant>.wd<N>.myworkdayjobs.com/[<locale>/]<site>',
    );
  }

  const parsed = workdayOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid workday options for ${boardUrl}: ${details}`);
  }

  const origin = `https://${host}.${instance}.myworkdayjobs.com`;
  const tenant = parsed.data.companyId ?? host;

  return {
    tenant,
    site,
    boardUrl: locale ? `${origin}/${locale}/${site}` : `${origin}/${site}`,
    apiUrl: `${origin}/wday/cxs/${encodeURIComponent(tenant)}/${encodeURIComponent(site)}/jobs`,
    pageSize: parsed.data.pageSize ?? DEFAULT_PAGE_SIZE,
    maxPages: parsed.data.maxPages ?? DEFAULT_MAX_PAGES,
  };
}

function readBulletField(bulletFields: unknown, label: string): string | undefined {
  if (!Array.isArray(bulletFields)) {
    return undefined;
  }

  for (const field of bulletFields) {
    if (isRecord(field) && field.label === label) {
      return asString(field.text);
    }
  }

  return undefined;
}

function readRequisitionId(bulletFields: unknown): string | undefined {
  if (!Array.isArray(bulletFields)) {
    return undefined;
  }

  return bulletFields.find((field): field is string => typeof field === 'string' && field.trim().length > 0);
}

function readExternalId(posting: Record<string, unknown>): string | undefined {
  const externalPath = asString(posting.externalPath);

  return (
    asString(posting.id) ??
    asString(posting.jobPostingId) ??
    readRequisitionId(posting.bulletFields) ??
    externalPath?.split('/').filter((segment) => segment.length > 0).at(-1)
  );
}

function toDraft(posting: unknown, board: WorkdayBoard): PostingDraft | null {
  if (!isRecord(posting)) {
    return null;
  }

  const externalId = readExternalId(posting);
  const externalPath = asString(posting.externalPath);
  const location = asString(posting.locationsText) ?? readBulletField(posting.bulletFields, 'locations');
  const jobUrl = externalPath
    ? `${board.boardUrl}${externalPath.startsWith('/') ? '' : '/'}${externalPath}`
    : externalId
      ? `${board.boardUrl}/job/${externalId}`
      : undefined;

  return {
    externalId,
    title: asString(posting.title),
    location,
    employmentType: asString(posting.timeType),
    jobUrl,
    remotePolicy: inferRemotePolicy(asString(posting.remoteType), location),
    rawData: posting,
  };
}

interface PageResult {
  postings: unknown[];
  total?: number;
}

async function fetchPage(client: FetchClient, board: WorkdayBoard, offset: number): Promise<PageResult> {
  const payload = await client.postJson(board.apiUrl, {
    limit: board.pageSize,
    offset,
    searchText: '',
    appliedFacets: {},
  });

  if (!isRecord(payload) || !Array.isArray(payload.jobPostings)) {
    throw new DecodeError(board.apiUrl, 'json', `Workday API returned invalid page at offset ${offset}`);
  }

  const total = asNumber(payload.total);
  return { postings: payload.jobPostings, total: total !== undefined && total > 0 ? total : undefined };
}

async function acquire(board: WorkdayBoard, target: BoardTarget, context: AcquireContext): Promise<ScrapedPosting[]> {
  const client = new FetchClient(context.fetch, context.logger);
  const items: unknown[] = [];
  // Workday reports the total on the first page only; later pages say 0.
  let total: number | undefined;
  let exhausted = false;

  for (let page = 0; page < board.maxPages; page++) {
    const offset = page * board.pageSize;
    const result = await fetchPage(client, board, offset);
    total ??= result.total;

    if (result.postings.length === 0) {
      exhausted = true;
      break;
    }

    items.push(...result.postings);
    context.logger.debug(`[workday:${target.company}] Page ${page + 1}: ${result.postings.length} postings`, {
      offset,
      total,
    });

    if (total !== undefined && offset + board.pageSize >= total) {
      exhausted = true;
      break;
    }
  }

  if (!exhausted) {
    context.logger.warn(`[workday:${target.company}] Stopped after ${board.maxPages} pages`, {
      company: target.company,
      collected: items.length,
      total,
    });
  }

  const postings = collectPostings(items, (item) => toDraft(item, board), target, context);
  context.logger.info(`[workday:${target.company}] Acquired ${postings.length} of ${items.length} postings`);
  return postings;
}

export const workdayAdapter = defineAdapter({
  manifest: {
    id: 'workday',
    name: 'Workday',
    version: '0.1.0',
  },
  create(target: BoardTarget) {
    const board = locateBoard(target.boardUrl, target.options);

    return {
      key: adapterKey(target),
      source: 'workday' as const,
      target,
      acquire: (context: AcquireContext) => acquire(board, target, context),
    };
  },
});
