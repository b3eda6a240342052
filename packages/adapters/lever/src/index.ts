import type { CheerioAPI } from 'cheerio';
import {
  FetchClient,
  InvalidBoardUrlError,
  adapterKey,
  asString,
  collectPostings,
  defineAdapter,
  extractRequirements,
  htmlToText,
  inferRemotePolicy,
  isRecord,
  normalizeText,
  type AcquireContext,
  type BoardTarget,
  type PostingDraft,
  type ScrapedPosting,
} from '@boardwatch/source-sdk';

const BOARD_URL_PATTERN = /^https?:\/\/(jobs(?:\.eu)?\.lever\.co)\/([^/?#]+)/i;

export interface LeverBoard {
  host: string;
  site: string;
  pageUrl: string;
}

/**
 * Either a `.posting` block scraped from the hosted page or an object from an
 * embedded JSON payload.
 */
type LeverItem =
  | { kind: 'html'; fields: Record<string, string | undefined> }
  | { kind: 'json'; data: Record<string, unknown> };

export function locateBoard(boardUrl: string): LeverBoard {
  const match = BOARD_URL_PATTERN.exec(boardUrl.trim());
  const host = match?.[1]?.toLowerCase();
  const site = match?.[2];
  if (!host || !site) {
    throw new InvalidBoardUrlError('lever', boardUrl, 'https://jobs.lever.co/<site>');
  }

  return { host, site, pageUrl: `https://${host}/${site}` };
}

function absoluteUrl(href: string | undefined, base: string): string | undefined {
  if (!href) {
    return undefined;
  }

  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

function lastPathSegment(url: string | undefined): string | undefined {
  if (!url) {
    return undefined;
  }

  const segments = new URL(url).pathname.split('/').filter((segment) => segment.length > 0);
  return segments.at(-1);
}

function readPostingElements($: CheerioAPI, board: LeverBoard): LeverItem[] {
  const items: LeverItem[] = [];

  $('.posting').each((_, element) => {
    const posting = $(element);
    const href = absoluteUrl(posting.find('a.posting-title').attr('href'), board.pageUrl);
    const groupTitle = posting
      .closest('.postings-group')
      .find('.posting-category-title, .large-category-header')
      .first()
      .text();

    items.push({
      kind: 'html',
      fields: {
        id: normalizeText(posting.attr('data-qa-posting-id')) ?? lastPathSegment(href),
        title: normalizeText(posting.find('[data-qa="posting-name"], .posting-title h5').first().text()),
        href,
        applyUrl: absoluteUrl(posting.find('.posting-apply a').attr('href'), board.pageUrl),
        location: normalizeText(posting.find('.sort-by-location, .location').first().text()),
        team: normalizeText(posting.find('.sort-by-team, .department').first().text()) ?? normalizeText(groupTitle),
        commitment: normalizeText(posting.find('.sort-by-commitment, .commitment').first().text()),
        workplaceType: normalizeText(posting.find('.workplaceTypes').first().text()),
      },
    });
  });

  return items;
}

function pickJobArray(data: unknown): unknown[] {
  if (!isRecord(data)) {
    return [];
  }

  for (const key of ['jobs', 'postings', 'data']) {
    const value = data[key];
    if (Array.isArray(value)) {
      return value;
    }
  }

  if (isRecord(data.props) && Array.isArray(data.props.jobs)) {
    return data.props.jobs;
  }

  return [];
}

function readEmbeddedJson($: CheerioAPI, context: AcquireContext, target: BoardTarget): LeverItem[] {
  const items: LeverItem[] = [];

  $('script[type="application/json"]').each((index, element) => {
    let data: unknown;
    try {
      data = JSON.parse($(element).html() ?? '');
    } catch (error) {
      context.logger.debug(`[lever:${target.company}] Ignoring unparsable JSON script #${index}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    for (const job of pickJobArray(data)) {
      if (isRecord(job)) {
        items.push({ kind: 'json', data: job });
      }
    }
  });

  return items;
}

function readListRequirements(lists: unknown): string[] | undefined {
  if (!Array.isArray(lists)) {
    return undefined;
  }

  const html = lists
    .filter(isRecord)
    .map((list) => `<h3>${asString(list.text) ?? ''}</h3><ul>${asString(list.content) ?? ''}</ul>`)
    .join('');
  const requirements = extractRequirements(html);
  return requirements.length > 0 ? requirements : undefined;
}

function readJsonLocation(data: Record<string, unknown>, categories: Record<string, unknown>): string | undefined {
  const location = asString(data.location) ?? asString(categories.location) ?? asString(data.locationText);
  if (location) {
    return location;
  }

  if (isRecord(data.workplaceAddress)) {
    const parts = [asString(data.workplaceAddress.city), asString(data.workplaceAddress.country)];
    return parts.filter((part): part is string => !!part).join(', ') || undefined;
  }

  return undefined;
}

function jsonToDraft(data: Record<string, unknown>, board: LeverBoard): PostingDraft {
  const categories = isRecord(data.categories) ? data.categories : {};
  const id = asString(data.id) ?? (typeof data.id === 'number' ? String(data.id) : undefined);
  const descriptionHtml = asString(data.description);
  const jobUrl = asString(data.hostedUrl) ?? asString(data.applyUrl) ?? (id ? `${board.pageUrl}/${id}` : undefined);
  const location = readJsonLocation(data, categories);
  const workplaceType = asString(data.workplaceType);

  return {
    externalId: id,
    title: asString(data.text) ?? asString(data.title),
    team: asString(categories.team) ?? asString(categories.department),
    location,
    employmentType: asString(categories.commitment) ?? asString(data.type),
    description: asString(data.descriptionPlain) ?? (descriptionHtml ? htmlToText(descriptionHtml) : undefined),
    requirements: readListRequirements(data.lists),
    jobUrl,
    applyUrl: asString(data.applyUrl) ?? jobUrl,
    remotePolicy: inferRemotePolicy(workplaceType, location),
    rawData: data,
  };
}

function htmlToDraft(fields: Record<string, string | undefined>): PostingDraft {
  return {
    externalId: fields.id,
    title: fields.title,
    team: fields.team,
    location: fields.location,
    employmentType: fields.commitment,
    jobUrl: fields.href,
    applyUrl: fields.applyUrl ?? fields.href,
    remotePolicy: inferRemotePolicy(fields.workplaceType, fields.location),
    rawData: { ...fields },
  };
}

async function acquire(board: LeverBoard, target: BoardTarget, context: AcquireContext): Promise<ScrapedPosting[]> {
  const client = new FetchClient(context.fetch, context.logger);
  const $ = await client.getHtml(board.pageUrl);

  let items = readPostingElements($, board);
  if (items.length === 0) {
    items = readEmbeddedJson($, context, target);
    context.logger.debug(`[lever:${target.company}] No .posting elements, read ${items.length} embedded jobs`);
  }

  const postings = collectPostings(
    items,
    (item) => (item.kind === 'html' ? htmlToDraft(item.fields) : jsonToDraft(item.data, board)),
    target,
    context,
  );
  context.logger.info(`[lever:${target.company}] Acquired ${postings.length} of ${items.length} postings`);
  return postings;
}

export const leverAdapter = defineAdapter({
  manifest: {
    id: 'lever',
    name: 'Lever',
    version: '0.1.0',
  },
  create(target: BoardTarget) {
    const board = locateBoard(target.boardUrl);

    return {
      key: adapterKey(target),
      source: 'lever' as const,
      target,
      acquire: (context: AcquireContext) => acquire(board, target, context),
    };
  },
});
