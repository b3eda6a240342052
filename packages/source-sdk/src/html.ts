import { load } from 'cheerio';
import { normalizeText } from './posting.js';

const BLOCK_SELECTOR = 'p, li, div, section, h1, h2, h3, h4, h5, h6, tr';
const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, strong, b';
const REQUIREMENT_HEADING =
  /requirement|qualification|what you(?:'|’)ll (?:need|bring)|you (?:have|bring)|about you|must[- ]haves?/i;
const MAX_HEADING_LENGTH = 80;

/**
 * Some boards (Greenhouse) ship entity-escaped markup: "&lt;p&gt;...".
 * Unescape once so it can be parsed as HTML.
 */
export function decodeEscapedHtml(content: string): string {
  if (!/&lt;\/?[a-z]/i.test(content)) {
    return content;
  }

  return load(content, null, false).root().text();
}

/**
 * Convert an HTML fragment to plain text, keeping block boundaries as
 * newlines.
 */
export function htmlToText(html: string): string {
  const $ = load(decodeEscapedHtml(html), null, false);

  $('script, style').remove();
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).each((_, element) => {
    $(element).append('\n');
  });

  return $.root()
    .text()
    .split('\n')
    .map((line) => line.replace(/[^\S\n]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Collect list items that follow a requirements-like heading, in order.
 */
export function extractRequirements(html: string): string[] {
  const $ = load(decodeEscapedHtml(html), null, false);
  const requirements: string[] = [];

  $(HEADING_SELECTOR).each((_, element) => {
    const heading = $(element);
    const text = heading.text().trim();
    if (text.length === 0 || text.length > MAX_HEADING_LENGTH || !REQUIREMENT_HEADING.test(text)) {
      return;
    }

    // <p><strong>Requirements</strong></p> puts the list after the paragraph.
    const anchor = heading.is('strong, b') && heading.parent().is('p') ? heading.parent() : heading;
    const list = anchor.nextAll('ul, ol').first();

    list.children('li').each((_, item) => {
      const requirement = normalizeText($(item).text());
      if (requirement && !requirements.includes(requirement)) {
        requirements.push(requirement);
      }
    });
  });

  return requirements;
}
