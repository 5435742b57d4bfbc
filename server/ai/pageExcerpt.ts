import { cleanInline, htmlToText, loadDocument, metaContent } from '../extractors/dom';

const TRUNCATION_MARK = '\n[... truncated]';

/**
 * Compact text rendering of a page for the model: title, meta description,
 * JSON-LD payloads and visible body text, capped at `maxChars`.
 */
export const buildPageExcerpt = (html: string, maxChars: number): string => {
  const $ = loadDocument(html);

  const title = cleanInline($('title').first().text());
  const description = metaContent($, ['og:description', 'description']);
  const jsonLd = $('script[type="application/ld+json"]')
    .map((_, el) => ($(el).html() ?? '').trim())
    .get()
    .filter(Boolean);

  $('script, style, noscript, svg, template, iframe, link, meta').remove();
  const body = $('body');
  const bodyText = htmlToText(body.length ? body.html() ?? '' : $.root().html() ?? '');

  const sections: string[] = [];
  if (title) sections.push(`Title: ${title}`);
  if (description) sections.push(`Meta description: ${description}`);
  if (jsonLd.length) sections.push(`Structured data (JSON-LD):\n${jsonLd.join('\n')}`);
  if (bodyText) sections.push(`Visible text:\n${bodyText}`);

  const excerpt = sections.join('\n\n');
  if (excerpt.length <= maxChars) return excerpt;
  return `${excerpt.slice(0, Math.max(0, maxChars - TRUNCATION_MARK.length))}${TRUNCATION_MARK}`;
};
