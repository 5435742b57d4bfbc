import { createStructuredExtractor } from './createExtractor';
import {
  findHiringTeamMember,
  findLabelledContact,
  firstBlock,
  firstText,
  metaContent,
  sectionAfterHeading,
} from './dom';

const COMPANY_SELECTORS = [
  '[data-testid="job-poster-name"]',
  'a[data-tracking-control-name="job_poster_name"]',
  '.job-details-jobs-unified-top-card__company-name',
  '.jobs-unified-top-card__company-name',
  '.topcard__org-name-link',
  '.topcard__flavor a',
];

const TITLE_SELECTORS = [
  'h1.job-title',
  'h1[data-testid="job-title"]',
  '.jobs-unified-top-card__job-title',
  '.job-details-jobs-unified-top-card__job-title',
  'h1.top-card-layout__title',
  'h1.topcard__title',
];

const DESCRIPTION_SELECTORS = [
  '[data-testid="job-description"]',
  '.jobs-description-content__text',
  '.jobs-box__html-content',
  '.jobs-description__text',
  '.show-more-less-html__markup',
  '.description__text',
  'section[aria-labelledby*="job-details"]',
  '#job-details',
];

// "Acme hiring Backend Engineer in Berlin | LinkedIn"
const OG_TITLE = /^(.+?)\s+hiring\s+(.+?)(?:\s+in\s+.+?)?(?:\s*\|\s*LinkedIn)?$/i;

export const linkedinExtractor = createStructuredExtractor('linkedin', {
  company: ({ $, jsonLd }) =>
    jsonLd?.company ??
    firstText($, COMPANY_SELECTORS, { maxLength: 120 }) ??
    OG_TITLE.exec(metaContent($, ['og:title']) ?? '')?.[1] ??
    null,
  jobTitle: ({ $, jsonLd }) =>
    jsonLd?.jobTitle ??
    firstText($, TITLE_SELECTORS, { maxLength: 200 }) ??
    OG_TITLE.exec(metaContent($, ['og:title']) ?? '')?.[2] ??
    null,
  fullDescription: ({ $, jsonLd }) =>
    jsonLd?.fullDescription ??
    firstBlock($, DESCRIPTION_SELECTORS, { minLength: 50 }) ??
    sectionAfterHeading($, /^about the job$/i),
  hiringManager: ({ $, jsonLd }) => findHiringTeamMember($) ?? jsonLd?.hiringManager ?? findLabelledContact($),
});
