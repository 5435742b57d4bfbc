export type SiteId = 'linkedin' | 'indeed' | 'glassdoor' | 'generic';

/** Literal used for a field that could not be determined. */
export const NOT_SPECIFIED = 'Not specified';

export type StageName = 'fetching' | 'classifying' | 'extracting' | 'reconciling' | 'done';

export type StageStatus = 'start' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

/** Identity of whoever asked for the extraction. Only used for logging. */
export interface RequesterContext {
  userId?: string | null;
  userEmail?: string | null;
}

export interface SourceRequest {
  readonly url: string;
  readonly requesterContext?: RequesterContext;
  /**
   * HTML obtained by the caller (e.g. after a user solved a challenge page).
   * When present the page is not fetched.
   */
  readonly html?: string | null;
}

export type FetchErrorKind = 'timeout' | 'network';

export interface FetchOutcome {
  html: string | null;
  transportError: FetchErrorKind | null;
  captchaSuspected: boolean;
  status: number | null;
  finalUrl: string | null;
}

export interface ExtractionResult {
  readonly company: string;
  readonly jobTitle: string;
  readonly fullDescription: string;
  /** Empty string when absent, never {@link NOT_SPECIFIED}. */
  readonly hiringManager: string;
  readonly adSource: SiteId;
  readonly method: string;
  readonly isComplete: boolean;
}

export interface ReconciledRecord extends ExtractionResult {
  readonly success: boolean;
  readonly url: string;
  /** The page looked like an anti-bot challenge and nothing usable came out of it. */
  readonly captchaRequired: boolean;
  readonly message?: string;
}

export interface JobUrlAnalysisResponse {
  success: boolean;
  url: string;
  company: string;
  job_title: string;
  ad_source: SiteId;
  full_description: string;
  hiring_manager: string;
  extractionMethod: string;
  captcha_required: boolean;
  message?: string;
}
