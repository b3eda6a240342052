import {
  DecodeError,
  FetchClient,
  InvalidBoardUrlError,
  adapterKey,
  asNumber,
  asString,
  collectPostings,
  defineAdapter,
  extractRequirements,
  htmlToText,
  inferRemotePolicy,
  isRecord,
  type AcquireContext,
  type BoardTarget,
  type PostingDraft,
  type ScrapedPosting,
} from '@boardwatch/source-sdk';

const API_BASE = 'https://api.ashbyhq.com/posting-api/job-board';
const BOARD_URL_PATTERN = /^https?:\/\/jobs\.ashbyhq\.com\/([^/?#]+)/i;

const EMPLOYMENT_TYPES: Record<string, string> = {
  FullTime: 'Full-time',
  PartTime: 'Part-time',
  Intern: 'Internship',
  Contract: 'Contract',
  Temporary: 'Temporary',
};

const WORKPLACE_TYPES: Record<string, string> = {
  Remote: 'Remote',
  Hybrid: 'Hybrid',
  OnSite: 'On-site',
};

export interface AshbyBoard {
  org: string;
  boardUrl: string;
}

export function locateBoard(boardUrl: string): AshbyBoard {
  const org = BOARD_URL_PATTERN.exec(boardUrl.trim())?.[1];
  if (!org) {
    throw new InvalidBoardUrlError('ashby', boardUrl, 'https://jobs.ashbyhq.com/<org>');
  }

  return { org, boardUrl: `https://jobs.ashbyhq.com/${org}` };
}

function pickJobs(payload: unknown, url: string): unknown[] {
  if (isRecord(payload)) {
    if (Array.isArray(payload.jobs)) {
      return payload.jobs;
    }

    if (isRecord(payload.jobBoard) && Array.isArray(payload.jobBoard.jobs)) {
      return payload.jobBoard.jobs;
    }
  }

  throw new DecodeError(url, 'json', 'Ashby API returned a payload without jobs');
}

function firstEntryName(value: unknown): string | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }

  const first: unknown = value[0];
  return isRecord(first) ? asString(first.name) : asString(first);
}

function readId(job: Record<string, unknown>): string | undefined {
  const numeric = asNumber(job.id);
  return numeric !== undefined ? String(numeric) : (asString(job.id) ?? asString(job.slug));
}

function readSalary(compensation: unknown): string | undefined {
  if (!isRecord(compensation)) {
    return undefined;
  }

  return asString(compensation.compensationTierSummary) ?? asString(compensation.scrapeableCompensationSalarySummary);
}

function readRemotePolicy(job: Record<string, unknown>, location: string | undefined): string | undefined {
  if (job.isRemote === true) {
    return 'Remote';
  }

  const workplaceType = asString(job.workplaceType);
  return (workplaceType && WORKPLACE_TYPES[workplaceType]) || inferRemotePolicy(location);
}

function toDraft(job: unknown, board: AshbyBoard): PostingDraft | null {
  if (!isRecord(job)) {
    return null;
  }

  const id = readId(job);
  const descriptionHtml = asString(job.descriptionHtml);
  const location = asString(job.location) ?? firstEntryName(job.locations);
  const employmentType = asString(job.employmentType);

  return {
    externalId: id,
    title: asString(job.title),
    team: asString(job.team) ?? asString(job.department) ?? firstEntryName(job.departments),
    location,
    employmentType: employmentType ? (EMPLOYMENT_TYPES[employmentType] ?? employmentType) : undefined,
    description: asString(job.descriptionPlain) ?? (descriptionHtml ? htmlToText(descriptionHtml) : undefined),
    requirements: descriptionHtml ? extractRequirements(descriptionHtml) : undefined,
    jobUrl: asString(job.jobUrl) ?? (id ? `${board.boardUrl}/${id}` : undefined),
    applyUrl: asString(job.applyUrl),
    salaryRange: readSalary(job.compensation),
    remotePolicy: readRemotePolicy(job, location),
    rawData: job,
  };
}

async function acquire(board: AshbyBoard, target: BoardTarget, context: AcquireContext): Promise<ScrapedPosting[]> {
  const client = new FetchClient(context.fetch, context.logger);
  const url = `${API_BASE}/${encodeURIComponent(board.org)}?includeCompensation=true`;
  const jobs = pickJobs(await client.getJson(url), url);

  const listed = jobs.filter((job) => !isRecord(job) || job.isListed !== false);
  if (listed.length < jobs.length) {
    context.logger.debug(`[ashby:${target.company}] Ignoring ${jobs.length - listed.length} unlisted jobs`);
  }

  const postings = collectPostings(listed, (job) => toDraft(job, board), target, context);
  context.logger.info(`[ashby:${target.company}] Acquired ${postings.length} of ${listed.length} jobs`);
  return postings;
}

export const ashbyAdapter = defineAdapter({
  manifest: {
    id: 'ashby',
    name: 'Ashby',
    version: '0.1.0',
  },
  create(target: BoardTarget) {
    const board = locateBoard(target.boardUrl);

    return {
      key: adapterKey(target),
      source: 'ashby' as const,
      target,
      acquire: (context: AcquireContext) => acquire(board, target, context),
    };
  },
});
