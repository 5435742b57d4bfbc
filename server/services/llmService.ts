import JSON5 from 'json5';
import type { AppConfig } from '../../shared/config';
import { AnalysisAbortedError } from '../errors';
import { errorMessage, type Logger } from '../obs/logger';
import { extractJson, extractJsonRobust } from '../utils/jsonExtract';
import { errorStatus, extractGenerateContentText, isTransientError, rateLimitedGenerateContent } from './genai';

export interface GenerateOptions {
  temperature?: number;
  maxOutputTokens?: number;
  responseMimeType?: string;
  signal?: AbortSignal;
}

/** The single call the extraction pipeline needs from a language model. */
export interface LlmClient {
  /** True when the client has what it needs (an API key) to make calls. */
  isConfigured(): boolean;
  /** Raw model text for a prompt that asks for a JSON object. */
  generateJson(prompt: string, options?: GenerateOptions): Promise<string>;
}

/** Parses the first JSON value in a model response, tolerating fences and truncation. */
export const parseJsonResponse = (raw: string): unknown => {
  const extracted = extractJson(raw) ?? extractJsonRobust(raw);
  if (!extracted) {
    throw new Error('No JSON found in model response');
  }
  try {
    return JSON5.parse(extracted);
  } catch (error) {
    const salvaged = extractJsonRobust(raw);
    if (salvaged && salvaged !== extracted) {
      return JSON5.parse(salvaged);
    }
    throw new Error(`Failed to parse JSON (${errorMessage(error)})`);
  }
};

export class LLMService implements LlmClient {
  constructor(
    private readonly config: Pick<AppConfig, 'llm'>,
    private readonly logger: Logger,
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.llm.apiKey);
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = this.config.llm.model;
    try {
      const response = await rateLimitedGenerateContent(this.config, {
        model,
        prompt,
        config: {
          temperature: options.temperature ?? this.config.llm.temperature,
          maxOutputTokens: options.maxOutputTokens ?? this.config.llm.maxOutputTokens,
          responseMimeType: options.responseMimeType,
        },
        signal: options.signal,
      });

      const text = extractGenerateContentText(response);
      if (text) return text;
      throw new Error('Empty response from LLM');
    } catch (error) {
      if (options.signal?.aborted || error instanceof AnalysisAbortedError) throw error;
      this.logger.warn('LLM generation error', {
        model,
        error: errorMessage(error),
        errorCode: errorStatus(error),
        isTransient: isTransientError(error),
      });
      throw error;
    }
  }

  generateJson(prompt: string, options: GenerateOptions = {}): Promise<string> {
    return this.generate(prompt, { ...options, responseMimeType: 'application/json' });
  }
}
