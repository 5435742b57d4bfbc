import { describe, expect, it } from 'vitest';
import { createStructuredExtractor } from '../createExtractor';
import { genericExtractor, GENERIC_DESCRIPTION_LIMIT } from '../generic';

const jsonLdPage = (payload: string, body = '<h1>Careers at Acme</h1>') =>
  `<html><head><title>Careers</title><script type="application/ld+json">${payload}</script></head><body>${body}</body></html>`;

describe('genericExtractor', () => {
  it('prefers a JSON-LD JobPosting', () => {
    const html = jsonLdPage(
      JSON.stringify({
        '@context': 'https://schema.org',
        '@type': 'JobPosting',
        title: 'Backend Engineer',
        hiringOrganization: { '@type': 'Organization', name: 'Acme' },
        description: '&lt;p&gt;Build and run our payment APIs.&lt;/p&gt;',
      }),
    );

    expect(genericExtractor.parse(html, 'https://jobs.example.com/backend')).toEqual({
      company: 'Acme',
      jobTitle: 'Backend Engineer',
      fullDescription: 'Build and run our payment APIs.',
      hiringManager: '',
      adSource: 'generic',
      method: 'cheerio-generic',
      isComplete: true,
    });
  });

  it('finds postings inside @graph with array types and string organizations', () => {
    const html = jsonLdPage(
      JSON.stringify({
        '@context': 'https://schema.org',
        '@graph': [
          { '@type': 'WebPage', name: 'Jobs' },
          {
            '@type': ['JobPosting'],
            name: 'Site Reliability Engineer',
            hiringOrganization: 'Umbrella',
            description: 'Keep production healthy.',
            applicationContact: { '@type': 'ContactPoint', name: 'Alex Kim' },
          },
        ],
      }),
    );

    const result = genericExtractor.parse(html, 'https://careers.example.org/sre');

    expect(result.company).toBe('Umbrella');
    expect(result.jobTitle).toBe('Site Reliability Engineer');
    expect(result.fullDescription).toBe('Keep production healthy.');
    expect(result.hiringManager).toBe('Alex Kim');
  });

  it('tolerates trailing commas in hand-written JSON-LD', () => {
    const html = jsonLdPage('{"@type": "JobPosting", "title": "Chef", "hiringOrganization": {"name": "Bistro",},}');

    const result = genericExtractor.parse(html, 'https://bistro.example.com/jobs');

    expect(result.jobTitle).toBe('Chef');
    expect(result.company).toBe('Bistro');
  });

  it('never reports the sentinel as a hiring manager', () => {
    const html = jsonLdPage(
      JSON.stringify({ '@type': 'JobPosting', title: 'Chef', applicationContact: { name: 'Not specified' } }),
    );

    expect(genericExtractor.parse(html, 'https://bistro.example.com/jobs').hiringManager).toBe('');
  });

  it('falls back to meta tags and the main content', () => {
    const html = `<html><head>
<meta property="og:title" content="Support Specialist">
<meta name="company" content="Hooli">
</head><body><main><p>Help customers resolve account issues over chat and email. You will own tickets end to end and improve our help center articles.</p></main></body></html>`;

    expect(genericExtractor.parse(html, 'https://hooli.example.com/jobs/42')).toEqual({
      company: 'Hooli',
      jobTitle: 'Support Specialist',
      fullDescription:
        'Help customers resolve account issues over chat and email. You will own tickets end to end and improve our help center articles.',
      hiringManager: '',
      adSource: 'generic',
      method: 'cheerio-generic',
      isComplete: true,
    });
  });

  it('caps long descriptions', () => {
    const html = `<main><p>${'Lorem ipsum dolor. '.repeat(400)}</p></main>`;

    const result = genericExtractor.parse(html, 'https://jobs.example.com/long');

    expect(result.fullDescription).toHaveLength(GENERIC_DESCRIPTION_LIMIT);
  });

  it('yields sentinels for an empty page', () => {
    const result = genericExtractor.parse('<html><body></body></html>', 'https://jobs.example.com/empty');

    expect(result.company).toBe('Not specified');
    expect(result.jobTitle).toBe('Not specified');
    expect(result.fullDescription).toBe('Not specified');
    expect(result.isComplete).toBe(false);
  });
});

describe('createStructuredExtractor', () => {
  it('keeps the other fields when one reader throws', () => {
    const extractor = createStructuredExtractor('generic', {
      company: () => {
        throw new Error('boom');
      },
      jobTitle: () => 'Title',
      fullDescription: () => 'Description',
      hiringManager: () => null,
    });

    expect(extractor.parse('<p></p>', 'https://jobs.example.com/1')).toEqual({
      company: 'Not specified',
      jobTitle: 'Title',
      fullDescription: 'Description',
      hiringManager: '',
      adSource: 'generic',
      method: 'cheerio-generic',
      isComplete: false,
    });
  });
});
