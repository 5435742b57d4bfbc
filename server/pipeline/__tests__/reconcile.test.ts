import { describe, expect, it } from 'vitest';
import { buildExtractionResult, failedResult } from '../../extractors/result';
import { CAPTCHA_MESSAGE, INCOMPLETE_MESSAGE, reconcile } from '../reconcile';

const context = { url: 'https://jobs.example.com/1', site: 'generic' as const, captchaSuspected: false };

const structuredComplete = buildExtractionResult(
  { company: 'Acme', jobTitle: 'Backend Engineer', fullDescription: 'Build APIs.', hiringManager: 'Jane Doe' },
  'generic',
  'cheerio-generic',
);

describe('reconcile', () => {
  it('keeps structured fields untouched when the AI result is all sentinels', () => {
    const record = reconcile(structuredComplete, failedResult('generic', 'gemini'), context);

    expect(record).toEqual({
      company: 'Acme',
      jobTitle: 'Backend Engineer',
      fullDescription: 'Build APIs.',
      hiringManager: 'Jane Doe',
      adSource: 'generic',
      method: 'cheerio-generic',
      isComplete: true,
      success: true,
      url: 'https://jobs.example.com/1',
      captchaRequired: false,
    });
  });

  it('prefers specified AI values field by field', () => {
    const ai = buildExtractionResult(
      { company: 'Acme Inc.', jobTitle: 'Not specified', fullDescription: '', hiringManager: '' },
      'generic',
      'gemini',
    );

    const record = reconcile(structuredComplete, ai, context);

    expect(record.company).toBe('Acme Inc.');
    expect(record.jobTitle).toBe('Backend Engineer');
    expect(record.fullDescription).toBe('Build APIs.');
    expect(record.hiringManager).toBe('Jane Doe');
    expect(record.method).toBe('hybrid-cheerio-generic-gemini');
  });

  it('never loses completeness the structured side achieved', () => {
    const ai = buildExtractionResult({ company: 'Acme' }, 'generic', 'gemini');

    const record = reconcile(structuredComplete, ai, context);

    expect(ai.isComplete).toBe(false);
    expect(record.isComplete).toBe(true);
    expect(record.success).toBe(true);
  });

  it('combines partial results into a complete record', () => {
    const structured = buildExtractionResult({ company: 'Acme', jobTitle: 'Chef' }, 'generic', 'cheerio-generic');
    const ai = buildExtractionResult({ fullDescription: 'Cook for our guests.' }, 'generic', 'gemini');

    const record = reconcile(structured, ai, context);

    expect(record.success).toBe(true);
    expect(record.fullDescription).toBe('Cook for our guests.');
  });

  it('uses the classified site as the ad source', () => {
    const record = reconcile(
      failedResult('generic', 'cheerio-generic'),
      failedResult('generic', 'gemini'),
      { ...context, site: 'indeed' },
    );

    expect(record.adSource).toBe('indeed');
    expect(record.hiringManager).toBe('');
  });

  it('requires a captcha only when the challenge left the record incomplete', () => {
    const failed = reconcile(failedResult('indeed', 'cheerio-indeed'), failedResult('indeed', 'gemini'), {
      ...context,
      captchaSuspected: true,
    });
    const recovered = reconcile(structuredComplete, failedResult('generic', 'gemini'), {
      ...context,
      captchaSuspected: true,
    });

    expect(failed.success).toBe(false);
    expect(failed.captchaRequired).toBe(true);
    expect(failed.message).toBe(CAPTCHA_MESSAGE);
    expect(recovered.success).toBe(true);
    expect(recovered.captchaRequired).toBe(false);
    expect(recovered.message).toBeUndefined();
  });

  it('explains why an incomplete record failed', () => {
    const structured = failedResult('linkedin', 'cheerio-linkedin');
    const ai = failedResult('linkedin', 'gemini');

    expect(reconcile(structured, ai, { ...context, site: 'linkedin', fetchError: 'timeout' }).message).toBe(
      'Failed to fetch page content: request timed out',
    );
    expect(reconcile(structured, ai, { ...context, site: 'linkedin' }).message).toBe(INCOMPLETE_MESSAGE);
  });
});
