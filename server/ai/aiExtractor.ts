import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { ExtractionResult } from '../../shared/types';
import { AnalysisAbortedError } from '../errors';
import { buildExtractionResult, failedResult } from '../extractors/result';
import { errorMessage, type Logger } from '../obs/logger';
import { hydratePrompt, loadPrompt } from '../prompts/loader';
import { classifySite } from '../scraping/siteClassifier';
import { parseJsonResponse, type LlmClient } from '../services/llmService';
import { raceAbort, withTimeoutSignal } from '../utils/async';
import { buildExcerpt } from '../utils/text';
import { buildPageExcerpt } from './pageExcerpt';

export const AI_METHOD = 'gemini';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? null : String(value)));

/** Models answer in snake_case or camelCase; both are accepted. */
export const AiResponseSchema = z
  .object({
    company: optionalText,
    companyName: optionalText,
    job_title: optionalText,
    jobTitle: optionalText,
    full_description: optionalText,
    fullDescription: optionalText,
    jobDescription: optionalText,
    hiring_manager: optionalText,
    hiringManager: optionalText,
    ad_source: optionalText,
  })
  .transform((value) => ({
    company: value.company ?? value.companyName,
    jobTitle: value.job_title ?? value.jobTitle,
    fullDescription: value.full_description ?? value.fullDescription ?? value.jobDescription,
    hiringManager: value.hiring_manager ?? value.hiringManager,
  }));

export interface AiExtractorDeps {
  config: Pick<AppConfig, 'llm'>;
  logger: Logger;
  llm: LlmClient;
}

export class AiExtractor {
  readonly method = AI_METHOD;

  constructor(private readonly deps: AiExtractorDeps) {}

  /**
   * Never rejects for extraction reasons: missing HTML, a missing key, a
   * timeout or an unusable answer all produce a `gemini-failed` result.
   * Rejects with {@link AnalysisAbortedError} when `signal` aborts.
   */
  async extract(html: string | null, url: string, signal?: AbortSignal): Promise<ExtractionResult> {
    if (signal?.aborted) {
      throw new AnalysisAbortedError();
    }
    const { config, logger, llm } = this.deps;
    const adSource = classifySite(url);

    if (!html) {
      logger.debug('AI extraction skipped: no page content', { url });
      return failedResult(adSource, AI_METHOD);
    }
    if (!llm.isConfigured()) {
      logger.warn('AI extraction skipped: GEMINI_API_KEY missing', { url });
      return failedResult(adSource, AI_METHOD);
    }

    const prompt = hydratePrompt(loadPrompt('job_extraction.md'), {
      URL: url,
      PAGE_CONTENT: buildPageExcerpt(html, config.llm.maxInputChars),
    });

    const timeout = withTimeoutSignal(config.llm.timeoutMs, signal);
    let raw = '';
    try {
      raw = await raceAbort(llm.generateJson(prompt, { signal: timeout.signal }), timeout.signal);
      const parsed = AiResponseSchema.safeParse(parseJsonResponse(raw));
      if (!parsed.success) {
        logger.warn('AI extraction returned an unexpected shape', {
          url,
          issues: parsed.error.issues.map((issue) => issue.message),
          preview: buildExcerpt(raw, 200),
        });
        return failedResult(adSource, AI_METHOD);
      }

      const result = buildExtractionResult(parsed.data, adSource, AI_METHOD);
      logger.debug('AI extraction finished', { url, isComplete: result.isComplete });
      return result;
    } catch (error) {
      if (signal?.aborted) {
        throw new AnalysisAbortedError();
      }
      logger.warn('AI extraction failed', {
        url,
        error: timeout.timedOut() ? `Timed out after ${config.llm.timeoutMs}ms` : errorMessage(error),
        preview: raw ? buildExcerpt(raw, 200) : undefined,
      });
      return failedResult(adSource, AI_METHOD);
    } finally {
      timeout.dispose();
    }
  }
}
