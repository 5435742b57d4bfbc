import type { FetchErrorKind, FetchOutcome } from '../../shared/types';
import { AnalysisAbortedError } from '../errors';
import { CHALLENGE_STATUS_CODES, detectAntiBotPage } from './antiBotMarkers';

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

const BROWSER_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Upgrade-Insecure-Requests': '1',
};

const charsetFromContentType = (contentType: string | null): string | null => {
  if (!contentType) return null;
  const match = contentType.match(/charset=["']?([\w.:-]+)/i);
  return match ? match[1].toLowerCase() : null;
};

const charsetFromMeta = (bytes: Uint8Array): string | null => {
  // Meta charset declarations are ASCII and sit near the top of the document
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 2048));
  const match = head.match(/<meta[^>]+charset=["']?([\w.:-]+)/i);
  return match ? match[1].toLowerCase() : null;
};

export const decodeBody = (bytes: Uint8Array, contentType: string | null): string => {
  const candidates = [charsetFromContentType(contentType), charsetFromMeta(bytes), 'utf-8'];
  for (const label of candidates) {
    if (!label) continue;
    try {
      return new TextDecoder(label, { fatal: false }).decode(bytes);
    } catch {
      // unknown label; try the next one
    }
  }
  return new TextDecoder('utf-8', { fatal: false }).decode(bytes);
};

const failure = (transportError: FetchErrorKind): FetchOutcome => ({
  html: null,
  transportError,
  captchaSuspected: false,
  status: null,
  finalUrl: null,
});

/**
 * Single GET of a job page. Transport failures come back as an outcome;
 * only an abort of `options.signal` rejects.
 */
export const fetchPage = async (url: string, options: FetchPageOptions): Promise<FetchOutcome> => {
  if (options.signal?.aborted) {
    throw new AnalysisAbortedError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const abortListener = () => controller.abort();
  options.signal?.addEventListener('abort', abortListener, { once: true });

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        ...BROWSER_HEADERS,
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    // Challenge pages come with 403/429/503; read the body whatever the status
    const bytes = new Uint8Array(await response.arrayBuffer());
    const html = decodeBody(bytes, response.headers.get('content-type'));
    const finalUrl = response.url || url;
    const verdict = detectAntiBotPage(html, response.redirected ? finalUrl : null);

    return {
      html,
      transportError: null,
      captchaSuspected: CHALLENGE_STATUS_CODES.has(response.status) || verdict.suspected,
      status: response.status,
      finalUrl,
    };
  } catch (error) {
    if (options.signal?.aborted) {
      throw new AnalysisAbortedError();
    }
    if (timedOut) {
      return failure('timeout');
    }
    if (error instanceof Error && (error.name === 'TimeoutError' || /timed? ?out/i.test(error.message))) {
      return failure('timeout');
    }
    return failure('network');
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', abortListener);
  }
};
