/**
 * Signatures of anti-bot challenge pages (Cloudflare, reCAPTCHA, hCaptcha,
 * job-board interstitials). Extend the lists here; the fetcher only calls
 * {@link detectAntiBotPage}.
 */

/** Statuses challenge pages are typically served with. */
export const CHALLENGE_STATUS_CODES: ReadonlySet<number> = new Set([403, 429, 503]);

/** Always indicate a challenge, even on a page that mentions a job. */
export const STRONG_MARKERS: readonly string[] = [
  'recaptcha',
  'hcaptcha',
  'cf-browser-verification',
  'cf-challenge',
  'challenge-platform',
  'verify you are human',
  "verify you're human",
  "verify you're not a robot",
  'just a moment...',
  'checking your browser',
  'challenge-form',
  'cf-turnstile',
  'unusual traffic',
  'indeed.com/access-denied',
  'indeed.com/verify',
];

export const MARKER_PATTERNS: readonly RegExp[] = [
  /<iframe[^>]+recaptcha/i,
  /<div[^>]+(?:g-recaptcha|h-captcha)/i,
  /data-sitekey=/i,
  /data-callback=["'][^"']*captcha/i,
];

/** Only count when the page shows no sign of an actual posting. */
export const WEAK_MARKERS: readonly string[] = [
  'captcha',
  'cloudflare',
  'human verification',
  'please verify',
  'security check',
  'ddos protection',
  'ray id',
  'bot detection',
  'security verification',
  'access denied',
];

export const JOB_CONTENT_MARKERS: readonly string[] = [
  'job description',
  'apply now',
  'job posting',
  'qualifications',
  'responsibilities',
  'requirements',
  '"@type":"jobposting"',
  '"@type": "jobposting"',
  'jobsearch-jobdescriptiontext',
  'job-poster-name',
];

/** Paths anti-bot services redirect to. */
export const CHALLENGE_PATH_PATTERN = /\/(?:challenge|captcha|checkpoint|authwall|verify|cdn-cgi|access-denied)(?:[/?#]|$)/i;

/** Bodies shorter than this are suspicious when they arrive through a challenge redirect. */
export const SHORT_BODY_THRESHOLD = 2_000;

export type AntiBotSignal = 'strong-marker' | 'marker-pattern' | 'weak-marker' | 'challenge-redirect';

export interface AntiBotVerdict {
  suspected: boolean;
  signal: AntiBotSignal | null;
  marker: string | null;
}

const NO_SIGNAL: AntiBotVerdict = { suspected: false, signal: null, marker: null };

const challengeRedirect = (body: string, redirectedTo: string | null | undefined): boolean => {
  if (!redirectedTo || body.length >= SHORT_BODY_THRESHOLD) return false;
  try {
    return CHALLENGE_PATH_PATTERN.test(new URL(redirectedTo).pathname);
  } catch {
    return false;
  }
};

export const hasJobContent = (lowerBody: string): boolean =>
  JOB_CONTENT_MARKERS.some((marker) => lowerBody.includes(marker));

/** `redirectedTo` is the final URL only when the request was actually redirected. */
export const detectAntiBotPage = (body: string, redirectedTo?: string | null): AntiBotVerdict => {
  if (challengeRedirect(body, redirectedTo)) {
    return { suspected: true, signal: 'challenge-redirect', marker: redirectedTo ?? null };
  }
  if (!body) return NO_SIGNAL;

  const lower = body.toLowerCase();
  const strong = STRONG_MARKERS.find((marker) => lower.includes(marker));
  if (strong) {
    return { suspected: true, signal: 'strong-marker', marker: strong };
  }
  const pattern = MARKER_PATTERNS.find((re) => re.test(body));
  if (pattern) {
    return { suspected: true, signal: 'marker-pattern', marker: pattern.source };
  }
  if (hasJobContent(lower)) return NO_SIGNAL;

  const weak = WEAK_MARKERS.find((marker) => lower.includes(marker));
  if (weak) {
    return { suspected: true, signal: 'weak-marker', marker: weak };
  }
  return NO_SIGNAL;
};
