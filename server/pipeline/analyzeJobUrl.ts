import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type {
  ExtractionResult,
  FetchOutcome,
  JobUrlAnalysisResponse,
  ReconciledRecord,
  SiteId,
  SourceRequest,
} from '../../shared/types';
import type { AiExtractor } from '../ai/aiExtractor';
import { AnalysisAbortedError, InvalidJobUrlError } from '../errors';
import { getStructuredExtractor } from '../extractors/registry';
import { failedResult } from '../extractors/result';
import { errorMessage, withContext, type Logger } from '../obs/logger';
import { fetchPage as defaultFetchPage } from '../scraping/fetchPage';
import { classifySite } from '../scraping/siteClassifier';
import { reconcile } from './reconcile';
import { makeStageEmitter, type StageEventSender } from './stageEmitter';

export interface JobUrlAnalyzerDeps {
  config: Pick<AppConfig, 'fetcher'>;
  logger: Logger;
  aiExtractor: Pick<AiExtractor, 'extract'>;
  fetchPage?: typeof defaultFetchPage;
  getStructuredExtractor?: typeof getStructuredExtractor;
}

export interface AnalyzeOptions {
  runId?: string;
  signal?: AbortSignal;
  onStage?: StageEventSender;
}

export interface JobUrlAnalyzer {
  analyze(request: SourceRequest, options?: AnalyzeOptions): Promise<ReconciledRecord>;
}

/** Trimmed URL, or {@link InvalidJobUrlError} when it is not absolute http(s). */
export const assertHttpUrl = (value: string): string => {
  const url = value.trim();
  if (!/^https?:\/\//i.test(url)) {
    throw new InvalidJobUrlError(url);
  }
  try {
    new URL(url);
  } catch {
    throw new InvalidJobUrlError(url);
  }
  return url;
};

const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw new AnalysisAbortedError();
  }
};

export const createJobUrlAnalyzer = (deps: JobUrlAnalyzerDeps): JobUrlAnalyzer => {
  const fetchPage = deps.fetchPage ?? defaultFetchPage;
  const extractorFor = deps.getStructuredExtractor ?? getStructuredExtractor;

  const parseStructured = (site: SiteId, html: string | null, url: string, logger: Logger): ExtractionResult => {
    const extractor = extractorFor(site);
    try {
      return extractor.parse(html, url);
    } catch (error) {
      logger.error('Structured extraction crashed', { site, error: errorMessage(error) });
      return failedResult(site, extractor.method);
    }
  };

  const analyze = async (request: SourceRequest, options: AnalyzeOptions = {}): Promise<ReconciledRecord> => {
    const url = assertHttpUrl(request.url);
    const { signal } = options;
    const runId = options.runId ?? randomId();
    const logger = withContext(deps.logger, { runId, url });
    const send: StageEventSender = (event) => {
      logger.debug('Stage event', { stage: event.stage, status: event.status, message: event.message });
      options.onStage?.(event);
    };

    const providedHtml = request.html?.trim() ? request.html : null;
    logger.info('Job URL analysis started', {
      userId: request.requesterContext?.userId ?? undefined,
      userEmail: request.requesterContext?.userEmail ?? undefined,
      htmlProvided: providedHtml != null,
    });

    try {
      throwIfAborted(signal);

      const fetching = makeStageEmitter(runId, 'fetching', send);
      fetching.start();
      let outcome: FetchOutcome;
      if (providedHtml != null) {
        // Caller already got past any challenge page
        outcome = { html: providedHtml, transportError: null, captchaSuspected: false, status: null, finalUrl: null };
        fetching.success({ message: 'Using provided HTML', data: { length: providedHtml.length } });
      } else {
        outcome = await fetchPage(url, {
          timeoutMs: deps.config.fetcher.timeoutMs,
          userAgent: deps.config.fetcher.userAgent,
          signal,
        });
        const data = {
          status: outcome.status,
          finalUrl: outcome.finalUrl,
          captchaSuspected: outcome.captchaSuspected,
          length: outcome.html?.length ?? 0,
        };
        if (outcome.transportError) {
          logger.warn('Page fetch failed', { error: outcome.transportError });
          fetching.failure(new Error(`Failed to fetch page content: ${outcome.transportError}`), { data });
        } else {
          fetching.success({ data });
        }
      }
      throwIfAborted(signal);

      const classifying = makeStageEmitter(runId, 'classifying', send);
      classifying.start();
      const site = classifySite(url);
      classifying.success({ data: { site } });

      const extracting = makeStageEmitter(runId, 'extracting', send);
      extracting.start({ data: { site } });
      const [structured, ai] = await Promise.all([
        Promise.resolve().then(() => parseStructured(site, outcome.html, url, logger)),
        deps.aiExtractor.extract(outcome.html, url, signal),
      ]);
      extracting.success({
        data: {
          structured: { method: structured.method, isComplete: structured.isComplete },
          ai: { method: ai.method, isComplete: ai.isComplete },
        },
      });
      throwIfAborted(signal);

      const reconciling = makeStageEmitter(runId, 'reconciling', send);
      reconciling.start();
      const record = reconcile(structured, ai, {
        url,
        site,
        captchaSuspected: outcome.captchaSuspected,
        fetchError: outcome.transportError,
      });
      reconciling.success({ data: { method: record.method } });

      makeStageEmitter(runId, 'done', send).success({
        data: { success: record.success, captchaRequired: record.captchaRequired },
      });
      logger.info('Job URL analysis finished', {
        site,
        success: record.success,
        method: record.method,
        captchaRequired: record.captchaRequired,
      });
      return record;
    } catch (error) {
      if (signal?.aborted) {
        logger.info('Job URL analysis aborted');
        throw error instanceof AnalysisAbortedError ? error : new AnalysisAbortedError();
      }
      throw error;
    }
  };

  return { analyze };
};

export const toAnalysisResponse = (record: ReconciledRecord): JobUrlAnalysisResponse => ({
  success: record.success,
  url: record.url,
  company: record.company,
  job_title: record.jobTitle,
  ad_source: record.adSource,
  full_description: record.fullDescription,
  hiring_manager: record.hiringManager,
  extractionMethod: record.method,
  captcha_required: record.captchaRequired,
  ...(record.message ? { message: record.message } : {}),
});
