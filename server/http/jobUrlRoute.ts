import { z } from 'zod';
import type { JobUrlAnalysisResponse } from '../../shared/types';
import { AnalysisAbortedError, InvalidJobUrlError } from '../errors';
import { errorMessage, type Logger } from '../obs/logger';
import { toAnalysisResponse, type JobUrlAnalyzer } from '../pipeline/analyzeJobUrl';

export const AnalyzeJobUrlBodySchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  user_id: z.string().nullish(),
  user_email: z.string().nullish(),
  html_content: z.string().nullish(),
});

export type AnalyzeJobUrlBody = z.infer<typeof AnalyzeJobUrlBodySchema>;

export type RouteResult =
  | { status: 200; body: JobUrlAnalysisResponse }
  | { status: 400 | 499 | 500; body: { error: string; details?: string[] } };

export interface AnalyzeJobUrlArgs {
  body: unknown;
  analyzer: JobUrlAnalyzer;
  logger: Logger;
  signal?: AbortSignal;
}

/** Framework-free handler behind `POST /api/job-url/analyze`. */
export const handleAnalyzeJobUrl = async ({ body, analyzer, logger, signal }: AnalyzeJobUrlArgs): Promise<RouteResult> => {
  const parsed = AnalyzeJobUrlBodySchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: {
        error: 'Invalid payload for job URL analysis',
        details: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      },
    };
  }

  const { url, user_id, user_email, html_content } = parsed.data;
  try {
    const record = await analyzer.analyze(
      {
        url,
        requesterContext: { userId: user_id, userEmail: user_email },
        html: html_content,
      },
      { signal },
    );
    return { status: 200, body: toAnalysisResponse(record) };
  } catch (error) {
    if (error instanceof InvalidJobUrlError) {
      return { status: 400, body: { error: error.message } };
    }
    if (error instanceof AnalysisAbortedError) {
      return { status: 499, body: { error: 'Request aborted' } };
    }
    logger.error('Job URL analysis failed', { url, error: errorMessage(error) });
    return { status: 500, body: { error: 'Failed to analyze job URL' } };
  }
};
