import {
  DecodeError,
  FetchClient,
  InvalidBoardUrlError,
  adapterKey,
  asNumber,
  asString,
  asStringArray,
  collectPostings,
  defineAdapter,
  extractRequirements,
  htmlToText,
  inferRemotePolicy,
  isRecord,
  serializeError,
  toError,
  TransportError,
  type AcquireContext,
  type BoardTarget,
  type PostingDraft,
  type ScrapedPosting,
} from '@boardwatch/source-sdk';

const API_BASE = 'https://boards-api.greenhouse.io/v1/boards';
const BOARD_URL_PATTERN = /^https?:\/\/(?:job-)?boards\.greenhouse\.io\/([^/?#]+)/i;
const EMPLOYMENT_METADATA = /employment|commitment|job type/i;

interface GreenhouseListing {
  id: string;
  raw: Record<string, unknown>;
}

interface GreenhouseJob {
  listing: GreenhouseListing;
  detail: Record<string, unknown>;
}

export function locateBoard(boardUrl: string): string {
  const board = BOARD_URL_PATTERN.exec(boardUrl.trim())?.[1];
  if (!board || board === 'embed') {
    throw new InvalidBoardUrlError('greenhouse', boardUrl, 'https://boards.greenhouse.io/<board>');
  }

  return board.toLowerCase();
}

function readId(value: unknown): string | undefined {
  const numeric = asNumber(value);
  if (numeric !== undefined) {
    return String(numeric);
  }

  return asString(value)?.trim() || undefined;
}

function firstName(value: unknown): string | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }

  const first: unknown = value[0];
  return isRecord(first) ? asString(first.name) : undefined;
}

function readEmploymentType(metadata: unknown): string | undefined {
  if (!Array.isArray(metadata)) {
    return undefined;
  }

  for (const entry of metadata) {
    if (!isRecord(entry) || !EMPLOYMENT_METADATA.test(asString(entry.name) ?? '')) {
      continue;
    }

    if (Array.isArray(entry.value)) {
      return asStringArray(entry.value).join(', ') || undefined;
    }

    return asString(entry.value);
  }

  return undefined;
}

function parseListResponse(payload: unknown, url: string, context: AcquireContext, target: BoardTarget): GreenhouseListing[] {
  if (!isRecord(payload) || !Array.isArray(payload.jobs)) {
    throw new DecodeError(url, 'json', 'Greenhouse API returned invalid job list payload');
  }

  const listings: GreenhouseListing[] = [];
  for (const item of payload.jobs) {
    const id = isRecord(item) ? readId(item.id) : undefined;
    if (!isRecord(item) || !id) {
      context.logger.warn(`[greenhouse:${target.company}] Skipping job list entry without id`);
      continue;
    }

    listings.push({ id, raw: item });
  }

  return listings;
}

function toDraft(job: GreenhouseJob, board: string): PostingDraft {
  const { listing, detail } = job;
  const content = asString(detail.content);
  const location = isRecord(detail.location)
    ? asString(detail.location.name)
    : isRecord(listing.raw.location)
      ? asString(listing.raw.location.name)
      : undefined;
  const jobUrl =
    asString(detail.absolute_url) ??
    asString(listing.raw.absolute_url) ??
    `https://boards.greenhouse.io/${board}/jobs/${listing.id}`;

  return {
    externalId: listing.id,
    title: asString(detail.title) ?? asString(listing.raw.title),
    team: firstName(detail.departments) ?? firstName(listing.raw.departments),
    location,
    employmentType: readEmploymentType(detail.metadata) ?? readEmploymentType(listing.raw.metadata),
    description: content ? htmlToText(content) : undefined,
    requirements: content ? extractRequirements(content) : undefined,
    jobUrl,
    remotePolicy: inferRemotePolicy(location),
    rawData: listing.raw,
  };
}

async function acquire(board: string, target: BoardTarget, context: AcquireContext): Promise<ScrapedPosting[]> {
  const client = new FetchClient(context.fetch, context.logger);
  const boardApi = `${API_BASE}/${encodeURIComponent(board)}`;
  const listUrl = `${boardApi}/jobs`;
  const listings = parseListResponse(await client.getJson(listUrl), listUrl, context, target);

  // One detail call per job; a failed detail drops only that job, unless every one fails.
  const jobs: GreenhouseJob[] = [];
  let lastDetailError: unknown;
  for (const listing of listings) {
    const detailUrl = `${boardApi}/jobs/${encodeURIComponent(listing.id)}`;
    try {
      const detail = await client.getJson(detailUrl);
      if (!isRecord(detail)) {
        throw new DecodeError(detailUrl, 'json', 'Greenhouse API returned invalid job detail payload');
      }

      jobs.push({ listing, detail });
    } catch (error) {
      lastDetailError = error;
      context.logger.warn(`[greenhouse:${target.company}] Skipping job ${listing.id}: detail fetch failed`, {
        company: target.company,
        externalId: listing.id,
        error: serializeError(error),
      });
    }
  }

  if (listings.length > 0 && jobs.length === 0) {
    throw new TransportError(
      listUrl,
      `All ${listings.length} Greenhouse job detail requests failed: ${toError(lastDetailError).message}`,
      { attempts: lastDetailError instanceof TransportError ? lastDetailError.attempts : 1, cause: lastDetailError },
    );
  }

  const postings = collectPostings(jobs, (job) => toDraft(job, board), target, context);
  context.logger.info(`[greenhouse:${target.company}] Acquired ${postings.length} of ${listings.length} jobs`);
  return postings;
}

export const greenhouseAdapter = defineAdapter({
  manifest: {
    id: 'greenhouse',
    name: 'Greenhouse',
    version: '0.1.0',
  },
  create(target: BoardTarget) {
    const board = locateBoard(target.boardUrl);

    return {
      key: adapterKey(target),
      source: 'greenhouse' as const,
      target,
      acquire: (context: AcquireContext) => acquire(board, target, context),
    };
  },
});
