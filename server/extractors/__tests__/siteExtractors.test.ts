import { describe, expect, it } from 'vitest';
import { glassdoorExtractor, stripRating } from '../glassdoor';
import { indeedExtractor } from '../indeed';
import { linkedinExtractor } from '../linkedin';
import { getStructuredExtractor } from '../registry';

const LINKEDIN_HTML = `<html><head><title>Backend Engineer | Acme | LinkedIn</title></head><body>
<div class="top-card">
  <h1 class="top-card-layout__title">Backend Engineer</h1>
  <a class="topcard__org-name-link" href="https://www.linkedin.com/company/acme">Acme Corp</a>
</div>
<div class="description__text"><p>We are hiring a backend engineer to build APIs.</p><ul><li>Design services</li><li>Write tests</li></ul></div>
<section>
  <h2>Meet the hiring team</h2>
  <div class="hirer-card"><a href="https://www.linkedin.com/in/jane-doe"><span>Jane Doe</span></a><span>Engineering Manager</span></div>
</section>
</body></html>`;

describe('linkedinExtractor', () => {
  it('reads the top card, description and hiring team', () => {
    expect(linkedinExtractor.parse(LINKEDIN_HTML, 'https://www.linkedin.com/jobs/view/1')).toEqual({
      company: 'Acme Corp',
      jobTitle: 'Backend Engineer',
      fullDescription: 'We are hiring a backend engineer to build APIs.\nDesign services\nWrite tests',
      hiringManager: 'Jane Doe',
      adSource: 'linkedin',
      method: 'cheerio-linkedin',
      isComplete: true,
    });
  });

  it('returns identical results for repeated calls', () => {
    const first = linkedinExtractor.parse(LINKEDIN_HTML, 'https://www.linkedin.com/jobs/view/1');
    const second = linkedinExtractor.parse(LINKEDIN_HTML, 'https://www.linkedin.com/jobs/view/1');

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('falls back to the "About the job" section and leaves missing fields as sentinels', () => {
    const html = `<h1 class="top-card-layout__title">Data Analyst</h1>
<section><h2>About the job</h2><p>Analyze sales data and report weekly.</p></section>`;

    const result = linkedinExtractor.parse(html, 'https://www.linkedin.com/jobs/view/2');

    expect(result.jobTitle).toBe('Data Analyst');
    expect(result.fullDescription).toBe('Analyze sales data and report weekly.');
    expect(result.company).toBe('Not specified');
    expect(result.hiringManager).toBe('');
    expect(result.isComplete).toBe(false);
  });

  it('splits the og:title of public job pages', () => {
    const html = '<head><meta property="og:title" content="Acme hiring Backend Engineer in Berlin, Germany | LinkedIn"></head>';

    const result = linkedinExtractor.parse(html, 'https://www.linkedin.com/jobs/view/3');

    expect(result.company).toBe('Acme');
    expect(result.jobTitle).toBe('Backend Engineer');
  });

  it('returns a failed result when there is no HTML', () => {
    expect(linkedinExtractor.parse(null, 'https://www.linkedin.com/jobs/view/1')).toEqual({
      company: 'Not specified',
      jobTitle: 'Not specified',
      fullDescription: 'Not specified',
      hiringManager: '',
      adSource: 'linkedin',
      method: 'cheerio-linkedin-failed',
      isComplete: false,
    });
  });
});

describe('indeedExtractor', () => {
  it('reads header, company, description and a labelled recruiter', () => {
    const html = `<h1 class="jobsearch-JobInfoHeader-title"><span>Warehouse Associate - job post</span></h1>
<div data-testid="inlineHeader-companyName"><a href="/cmp/globex">Globex</a></div>
<div id="jobDescriptionText"><p>Pick and pack orders in a fast-paced warehouse.</p><p>Recruiter: Sam Lee</p></div>`;

    expect(indeedExtractor.parse(html, 'https://www.indeed.com/viewjob?jk=1')).toEqual({
      company: 'Globex',
      jobTitle: 'Warehouse Associate',
      fullDescription: 'Pick and pack orders in a fast-paced warehouse.\nRecruiter: Sam Lee',
      hiringManager: 'Sam Lee',
      adSource: 'indeed',
      method: 'cheerio-indeed',
      isComplete: true,
    });
  });
});

const JOB_POSTING_LD = `<script type="application/ld+json">{"@type":"JobPosting","title":"Forklift Operator","description":"<p>Operate forklifts safely across two shifts.</p>","hiringOrganization":{"@type":"Organization","name":"Globex"}}</script>`;

const TEASER = '<p>Sidebar teaser text that matches the selector but is only a short teaser.</p>';

describe('JSON-LD description preference', () => {
  it('prefers the JobPosting description over the Indeed description block', () => {
    const html = `${JOB_POSTING_LD}<div id="jobDescriptionText">${TEASER}</div>`;

    expect(indeedExtractor.parse(html, 'https://www.indeed.com/viewjob?jk=2').fullDescription).toBe(
      'Operate forklifts safely across two shifts.',
    );
  });

  it('prefers the JobPosting description over the Glassdoor description block', () => {
    const html = `${JOB_POSTING_LD}<div data-test="job-description">${TEASER}</div>`;

    expect(glassdoorExtractor.parse(html, 'https://www.glassdoor.com/job-listing/2').fullDescription).toBe(
      'Operate forklifts safely across two shifts.',
    );
  });

  it('prefers the JobPosting description over the LinkedIn description block', () => {
    const html = `${JOB_POSTING_LD}<div class="description__text">${TEASER}</div>`;

    expect(linkedinExtractor.parse(html, 'https://www.linkedin.com/jobs/view/4').fullDescription).toBe(
      'Operate forklifts safely across two shifts.',
    );
  });
});

describe('stripRating', () => {
  it.each([
    ['Initech 4.1 ★', 'Initech'],
    ['Initech4.1★', 'Initech'],
    ['Initech 3.9', 'Initech'],
    ['Initech 4 ★', 'Initech'],
  ])('strips the rating from %s', (input, expected) => {
    expect(stripRating(input)).toBe(expected);
  });

  it.each(['Area 51', 'Web3', 'Studio 9', '3M'])('keeps the trailing digits of %s', (name) => {
    expect(stripRating(name)).toBe(name);
  });
});

describe('glassdoorExtractor', () => {
  it('reads data-test selectors and strips the employer rating', () => {
    const html = `<div data-test="employer-name">Initech 4.1 ★</div>
<h1 data-test="job-title">QA Engineer</h1>
<div data-test="job-description"><p>Test our banking software before every release and track defects.</p></div>`;

    expect(glassdoorExtractor.parse(html, 'https://www.glassdoor.com/job-listing/1')).toEqual({
      company: 'Initech',
      jobTitle: 'QA Engineer',
      fullDescription: 'Test our banking software before every release and track defects.',
      hiringManager: '',
      adSource: 'glassdoor',
      method: 'cheerio-glassdoor',
      isComplete: true,
    });
  });
});

describe('getStructuredExtractor', () => {
  it.each(['linkedin', 'indeed', 'glassdoor', 'generic'] as const)('returns the %s extractor', (site) => {
    const extractor = getStructuredExtractor(site);

    expect(extractor.site).toBe(site);
    expect(extractor.method).toBe(`cheerio-${site}`);
  });
});
