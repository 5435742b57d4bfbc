import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

export type { CheerioAPI };

const BLOCK_TAGS = 'p, div, section, article, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, table, header, footer, blockquote, pre';

export const loadDocument = (html: string): CheerioAPI => cheerio.load(html);

export const cleanInline = (value: string | null | undefined): string =>
  (value ?? '').replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();

export const normalizeMultiline = (value: string): string =>
  value
    .replace(/\r\n?/g, '\n')
    .replace(/\u00a0/g, ' ')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

/**
 * Readable text of an HTML fragment, one line per block element.
 * Entity-escaped markup (`&lt;p&gt;…`, common in JSON-LD) is unescaped first.
 */
export const htmlToText = (fragment: string): string => {
  let source = fragment;
  if (!source.includes('<') && /&lt;\/?[a-z]/i.test(source)) {
    source = cheerio.load(source, null, false).root().text();
  }
  const $ = cheerio.load(source, null, false);
  $('script, style, noscript, svg, template').remove();
  $('br').replaceWith('\n');
  $(BLOCK_TAGS).each((_, el) => {
    $(el).append('\n');
  });
  return normalizeMultiline($.root().text());
};

/** Text of the first selector that yields a non-empty, short enough value. */
export const firstText = (
  $: CheerioAPI,
  selectors: readonly string[],
  options: { maxLength?: number } = {},
): string | null => {
  for (const selector of selectors) {
    const text = cleanInline($(selector).first().text());
    if (!text) continue;
    if (options.maxLength && text.length > options.maxLength) continue;
    return text;
  }
  return null;
};

const looksLikeProse = (text: string): boolean => /[.!?]/.test(text) || text.split(/\s+/).length > 30;

/** Multi-line text of the first selector whose content reads like a description. */
export const firstBlock = (
  $: CheerioAPI,
  selectors: readonly string[],
  options: { minLength?: number } = {},
): string | null => {
  const minLength = options.minLength ?? 1;
  for (const selector of selectors) {
    const element = $(selector).first();
    if (!element.length) continue;
    const text = htmlToText(element.html() ?? '');
    if (text.length >= minLength && looksLikeProse(text)) return text;
  }
  return null;
};

export const metaContent = ($: CheerioAPI, keys: readonly string[]): string | null => {
  for (const key of keys) {
    const value =
      $(`meta[property="${key}"]`).attr('content') ??
      $(`meta[name="${key}"]`).attr('content') ??
      $(`meta[itemprop="${key}"]`).attr('content');
    const cleaned = cleanInline(value);
    if (cleaned) return cleaned;
  }
  return null;
};

const PERSON_NAME = /^([A-Z][a-zA-Z'’-]+(?:\s+[A-Z][a-zA-Z'’.-]+){1,3})/;
const CONTACT_LABEL = /(?:meet the hiring team|hiring manager|recruiter|talent partner|contact person)\s*[:\-–]?\s*/i;

/** A name printed right after a "Hiring manager:" style label, if any. */
export const findLabelledContact = ($: CheerioAPI): string | null => {
  let found: string | null = null;
  $('p, li, span, div, dd, strong').each((_, el) => {
    if (found) return false;
    const node = $(el);
    // Leaf-ish elements only, otherwise the whole page body matches
    if (node.children().length > 4) return undefined;
    const text = cleanInline(node.text());
    if (text.length > 200) return undefined;
    const label = CONTACT_LABEL.exec(text);
    if (!label) return undefined;
    const name = asPersonName(text.slice(label.index + label[0].length));
    if (name) {
      found = name;
      return false;
    }
    return undefined;
  });
  return found;
};

export const asPersonName = (value: string | null | undefined): string | null => {
  const text = cleanInline(value);
  const match = text.match(PERSON_NAME);
  return match ? match[1].trim() : null;
};

/** Text of the siblings following the first heading matching `pattern`. */
export const sectionAfterHeading = ($: CheerioAPI, pattern: RegExp): string | null => {
  const heading = $('h1, h2, h3, h4')
    .filter((_, el) => pattern.test(cleanInline($(el).text())))
    .first();
  if (!heading.length) return null;
  let siblings = heading.nextAll();
  if (!siblings.length) siblings = heading.parent().nextAll();
  const html = siblings
    .map((_, el) => $.html(el))
    .get()
    .join('\n');
  const text = htmlToText(html);
  return text || null;
};

const HIRING_TEAM = /meet the hiring team|hiring team/i;

/** First profile link inside the "Meet the hiring team" block. */
export const findHiringTeamMember = ($: CheerioAPI): string | null => {
  const label = $('h1, h2, h3, h4, span, div, p')
    .filter((_, el) => $(el).children().length === 0 && HIRING_TEAM.test($(el).text()))
    .first();
  if (!label.length) return null;

  let container = label.parent();
  for (let depth = 0; depth < 4 && container.length; depth += 1) {
    const links = container.find('a[href*="/in/"], a[href*="/profile/"]');
    for (const link of links.toArray()) {
      const name = asPersonName($(link).text());
      if (name) return name;
    }
    container = container.parent();
  }
  return null;
};
