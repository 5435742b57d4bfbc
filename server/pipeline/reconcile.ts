import type { ExtractionResult, FetchErrorKind, ReconciledRecord, SiteId } from '../../shared/types';
import { buildExtractionResult, isFailedMethod, isSpecified } from '../extractors/result';

export interface ReconcileContext {
  url: string;
  site: SiteId;
  captchaSuspected: boolean;
  fetchError?: FetchErrorKind | null;
}

export const CAPTCHA_MESSAGE =
  'The page appears to be protected by a CAPTCHA or bot check. Open it in a browser, complete the check, and submit the page HTML instead.';

export const INCOMPLETE_MESSAGE =
  'Unable to extract job data from the page. Paste the job description manually or submit the page HTML.';

const failureMessage = (captchaRequired: boolean, fetchError: FetchErrorKind | null | undefined): string => {
  if (captchaRequired) return CAPTCHA_MESSAGE;
  if (fetchError) return `Failed to fetch page content: ${fetchError === 'timeout' ? 'request timed out' : 'network error'}`;
  return INCOMPLETE_MESSAGE;
};

const pick = (preferred: string, fallback: string): string => (isSpecified(preferred) ? preferred : fallback);

export const mergedMethod = (structured: ExtractionResult, ai: ExtractionResult): string =>
  isFailedMethod(ai.method) ? structured.method : `hybrid-${structured.method}-${ai.method}`;

/**
 * Field-level merge: the AI value wins unless it is missing, then the
 * structured one. Completeness is recomputed from the merged fields.
 */
export const reconcile = (
  structured: ExtractionResult,
  ai: ExtractionResult,
  context: ReconcileContext,
): ReconciledRecord => {
  const merged = buildExtractionResult(
    {
      company: pick(ai.company, structured.company),
      jobTitle: pick(ai.jobTitle, structured.jobTitle),
      fullDescription: pick(ai.fullDescription, structured.fullDescription),
      hiringManager: pick(ai.hiringManager, structured.hiringManager),
    },
    context.site,
    mergedMethod(structured, ai),
  );

  const captchaRequired = context.captchaSuspected && !merged.isComplete;
  const message = merged.isComplete ? undefined : failureMessage(captchaRequired, context.fetchError);

  return {
    ...merged,
    success: merged.isComplete,
    url: context.url,
    captchaRequired,
    ...(message ? { message } : {}),
  };
};
