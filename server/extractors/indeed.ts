import { createStructuredExtractor } from './createExtractor';
import { cleanInline, findLabelledContact, firstBlock, firstText, metaContent } from './dom';

const COMPANY_SELECTORS = [
  '[data-testid="inlineHeader-companyName"]',
  '[data-testid="job-poster-name"]',
  '[data-company-name="true"]',
  'a[data-testid="company-name"]',
  '.jobsearch-InlineCompanyRating div',
];

const TITLE_SELECTORS = [
  'h1.jobTitle',
  'h1[data-testid="job-title"]',
  '[data-testid="jobsearch-JobInfoHeader-title"]',
  '.jobsearch-JobInfoHeader-title',
];

const DESCRIPTION_SELECTORS = ['#jobDescriptionText', '[data-testid="job-description"]', '.jobsearch-jobDescriptionText'];

// Indeed appends " - job post" to titles rendered in the header
const stripJobPostSuffix = (value: string | null): string | null =>
  value ? cleanInline(value.replace(/\s*-\s*job post$/i, '')) || null : null;

export const indeedExtractor = createStructuredExtractor('indeed', {
  company: ({ $, jsonLd }) => jsonLd?.company ?? firstText($, COMPANY_SELECTORS, { maxLength: 120 }),
  jobTitle: ({ $, jsonLd }) =>
    jsonLd?.jobTitle ??
    stripJobPostSuffix(firstText($, TITLE_SELECTORS, { maxLength: 200 })) ??
    stripJobPostSuffix(metaContent($, ['og:title'])),
  fullDescription: ({ $, jsonLd }) =>
    jsonLd?.fullDescription ?? firstBlock($, DESCRIPTION_SELECTORS, { minLength: 50 }),
  hiringManager: ({ $, jsonLd }) => jsonLd?.hiringManager ?? findLabelledContact($),
});
