import { createStructuredExtractor } from './createExtractor';
import { cleanInline, findLabelledContact, firstBlock, firstText } from './dom';

const COMPANY_SELECTORS = [
  '[data-test="employer-name"]',
  '[data-test="employerName"]',
  '.employerName',
  '.jobInfoItem.employer',
];

const TITLE_SELECTORS = ['h1[data-test="job-title"]', '[data-test="jobTitle"]', 'h1.jobTitle', '.jobTitle'];

const DESCRIPTION_SELECTORS = [
  '[data-test="job-description"]',
  '[data-test="jobDescriptionContent"]',
  '.jobDescriptionContent',
  '#JobDescriptionContainer',
];

// Employer names carry the rating inline: "Acme 4.2 ★", "Acme4.2★" or "Acme 4.2"
const RATING_WITH_STAR = /\s*(?<![\d.])\d(?:\.\d)?\s*★\s*$/;
const BARE_RATING = /\s+\d\.\d\s*$/;

export const stripRating = (value: string | null): string | null =>
  value ? cleanInline(value.replace(RATING_WITH_STAR, '').replace(BARE_RATING, '')) || null : null;

export const glassdoorExtractor = createStructuredExtractor('glassdoor', {
  company: ({ $, jsonLd }) => jsonLd?.company ?? stripRating(firstText($, COMPANY_SELECTORS, { maxLength: 120 })),
  jobTitle: ({ $, jsonLd }) => jsonLd?.jobTitle ?? firstText($, TITLE_SELECTORS, { maxLength: 200 }),
  fullDescription: ({ $, jsonLd }) =>
    jsonLd?.fullDescription ?? firstBlock($, DESCRIPTION_SELECTORS, { minLength: 50 }),
  hiringManager: ({ $, jsonLd }) => jsonLd?.hiringManager ?? findLabelledContact($),
});
