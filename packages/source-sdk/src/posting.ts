import type { AcquireContext, BoardTarget, PostingDraft, PostingResult, ScrapedPosting, SourceKind } from './types.js';

/**
 * Identity key shared by every adapter. Company identifiers cannot contain
 * ':', so the first two segments never collide.
 */
export function buildJobId(source: SourceKind, company: string, externalId: string): string {
  return `${source}:${company}:${externalId}`;
}

/**
 * Trim whitespace and collapse runs of spaces. Blank input becomes undefined.
 */
export function normalizeText(text: string | null | undefined): string | undefined {
  if (text === null || text === undefined) {
    return undefined;
  }

  const normalized = text.replace(/\s+/g, ' ').trim();
  return normalized.length > 0 ? normalized : undefined;
}

function cleanList(items: string[] | undefined): string[] | undefined {
  if (!items) {
    return undefined;
  }

  const cleaned = items.map((item) => normalizeText(item)).filter((item): item is string => !!item);
  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Best-effort workplace hint from free text such as a location line.
 */
export function inferRemotePolicy(...texts: Array<string | undefined>): string | undefined {
  const text = texts.filter((value): value is string => !!value).join(' ').toLowerCase();
  if (text.includes('hybrid')) {
    return 'Hybrid';
  }

  if (text.includes('remote') || text.includes('anywhere') || text.includes('distributed')) {
    return 'Remote';
  }

  return undefined;
}

/**
 * Attach identity and run timestamps to a draft. A draft without an external
 * id or title is a data-quality skip, not an error.
 */
export function buildPosting(draft: PostingDraft, target: BoardTarget, context: AcquireContext): PostingResult {
  const externalId = normalizeText(draft.externalId);
  if (!externalId) {
    return { kind: 'skip', reason: 'missing external id' };
  }

  const title = normalizeText(draft.title);
  if (!title) {
    return { kind: 'skip', reason: `missing title for ${externalId}` };
  }

  const jobUrl = draft.jobUrl?.trim() || target.boardUrl;

  return {
    kind: 'posting',
    posting: {
      jobId: buildJobId(target.source, target.company, externalId),
      source: target.source,
      company: target.company,
      companyName: target.displayName,
      externalId,
      title,
      team: normalizeText(draft.team),
      location: normalizeText(draft.location),
      employmentType: normalizeText(draft.employmentType),
      description: draft.description?.trim() || undefined,
      requirements: cleanList(draft.requirements),
      jobUrl,
      applyUrl: draft.applyUrl?.trim() || undefined,
      sourceUrl: target.boardUrl,
      salaryRange: normalizeText(draft.salaryRange),
      remotePolicy: normalizeText(draft.remotePolicy),
      experienceLevel: normalizeText(draft.experienceLevel),
      firstSeen: context.runAt,
      lastSeen: context.runAt,
      rawData: draft.rawData,
    },
  };
}

/**
 * Map raw items through `toDraft` and keep the postings, logging each skip.
 */
export function collectPostings<T>(
  items: readonly T[],
  toDraft: (item: T) => PostingDraft | null,
  target: BoardTarget,
  context: AcquireContext,
): ScrapedPosting[] {
  const postings: ScrapedPosting[] = [];

  for (const item of items) {
    const draft = toDraft(item);
    if (!draft) {
      context.logger.warn(`[${target.source}:${target.company}] Skipping malformed item`);
      continue;
    }

    const result = buildPosting(draft, target, context);
    if (result.kind === 'skip') {
      context.logger.warn(`[${target.source}:${target.company}] Skipping item: ${result.reason}`, {
        company: target.company,
        source: target.source,
        reason: result.reason,
      });
      continue;
    }

    postings.push(result.posting);
  }

  return postings;
}
