import { createStructuredExtractor } from './createExtractor';
import { cleanInline, findLabelledContact, firstBlock, firstText, metaContent } from './dom';

export const GENERIC_DESCRIPTION_LIMIT = 5_000;

const COMPANY_CLASS_SELECTORS = ['[class*="company" i]', '[class*="employer" i]', '[class*="organization" i]'];

const TITLE_SELECTORS = ['h1', '[class*="job-title" i]', '[class*="jobtitle" i]', '[class*="position" i]'];

const DESCRIPTION_SELECTORS = [
  '[id*="description" i]',
  '[class*="job-description" i]',
  '[class*="description" i]',
  'main',
  'article',
];

const capDescription = (text: string | null): string | null =>
  text ? text.slice(0, GENERIC_DESCRIPTION_LIMIT).trim() : null;

export const genericExtractor = createStructuredExtractor('generic', {
  company: ({ $, jsonLd }) =>
    jsonLd?.company ??
    metaContent($, ['og:company', 'company', 'organization']) ??
    firstText($, COMPANY_CLASS_SELECTORS, { maxLength: 99 }),
  jobTitle: ({ $, jsonLd }) =>
    jsonLd?.jobTitle ??
    metaContent($, ['og:title', 'title']) ??
    firstText($, TITLE_SELECTORS, { maxLength: 199 }) ??
    (cleanInline($('title').first().text()) || null),
  fullDescription: ({ $, jsonLd }) =>
    capDescription(
      jsonLd?.fullDescription ??
        firstBlock($, DESCRIPTION_SELECTORS, { minLength: 101 }) ??
        metaContent($, ['og:description', 'description']),
    ),
  hiringManager: ({ $, jsonLd }) => jsonLd?.hiringManager ?? findLabelledContact($),
});
