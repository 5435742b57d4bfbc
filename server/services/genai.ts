import { GoogleGenAI } from '@google/genai';
import type { GenerateContentConfig, GenerateContentResponse } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { AnalysisAbortedError } from '../errors';
import { sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Semaphore;
  lastUsedAt: number;
};

const stateByApiKey = new Map<string, KeyState>();
const MAX_KEYS = 32;
const WINDOW_MS = 60_000;

const trimStateCache = () => {
  if (stateByApiKey.size <= MAX_KEYS) {
    return;
  }
  let oldestKey: string | null = null;
  let oldestTs = Infinity;
  for (const [key, state] of stateByApiKey.entries()) {
    if (state.lastUsedAt < oldestTs) {
      oldestTs = state.lastUsedAt;
      oldestKey = key;
    }
  }
  if (oldestKey) {
    stateByApiKey.delete(oldestKey);
  }
};

const getStateForApiKey = (apiKey: string): KeyState => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) {
    existing.lastUsedAt = Date.now();
    return existing;
  }

  const created: KeyState = {
    client: new GoogleGenAI({ apiKey }),
    requestTimestamps: [],
    rateLimitMutex: new Semaphore(1),
    lastUsedAt: Date.now(),
  };
  stateByApiKey.set(apiKey, created);
  trimStateCache();
  return created;
};

type Loose = Record<string, unknown>;

const isLoose = (value: unknown): value is Loose => Boolean(value) && typeof value === 'object';

/** Status code of an SDK error, whichever shape it arrived in. */
export const errorStatus = (error: unknown): number | null => {
  if (!isLoose(error)) return null;
  if (typeof error.status === 'number') return error.status;
  const nested = error.error;
  if (isLoose(nested) && typeof nested.code === 'number') return nested.code;
  return null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = errorStatus(error);
  if (code === 429 || code === 500 || code === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return /quota|unavailable|overload|temporar/.test(message);
};

export interface GenerateContentParams {
  model: string;
  prompt: string;
  config?: GenerateContentConfig;
  /** Mapped to `config.abortSignal` for @google/genai. */
  signal?: AbortSignal;
}

const waitForSlot = async (state: KeyState, rpm: number, signal?: AbortSignal): Promise<void> => {
  // Check and reserve under the mutex so concurrent callers cannot overshoot the window
  while (true) {
    const release = await state.rateLimitMutex.acquire(signal);
    let waitMs = 0;
    try {
      const now = Date.now();
      while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > WINDOW_MS) {
        state.requestTimestamps.shift();
      }
      if (state.requestTimestamps.length < rpm) {
        state.requestTimestamps.push(now);
      } else {
        waitMs = Math.max(0, state.requestTimestamps[0] + WINDOW_MS - now);
      }
    } finally {
      release();
    }
    if (waitMs <= 0) {
      return;
    }
    await sleep(waitMs, signal);
  }
};

export const rateLimitedGenerateContent = async (
  config: Pick<AppConfig, 'llm'>,
  params: GenerateContentParams,
): Promise<GenerateContentResponse> => {
  const apiKey = config.llm.apiKey;
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY missing');
  }
  const state = getStateForApiKey(apiKey);
  const rpm = Math.max(1, Math.floor(config.llm.requestsPerMinute) || 1);

  if (params.signal?.aborted) {
    throw new AnalysisAbortedError();
  }

  // Single attempt; callers that want another try re-run the whole analysis
  try {
    await waitForSlot(state, rpm, params.signal);
    return await state.client.models.generateContent({
      model: params.model,
      contents: [{ role: 'user', parts: [{ text: params.prompt }] }],
      config: {
        ...params.config,
        abortSignal: params.config?.abortSignal ?? params.signal,
      },
    });
  } catch (error) {
    if (params.signal?.aborted) {
      throw new AnalysisAbortedError();
    }
    throw error instanceof Error ? error : new Error(String(error));
  }
};

const decodeBase64 = (value: string): string | null => {
  try {
    return Buffer.from(value, 'base64').toString('utf8');
  } catch {
    return null;
  }
};

/**
 * Textual payload of a generateContent response: the `text` accessor first,
 * then text and inline JSON parts of the first candidate.
 */
export const extractGenerateContentText = (response: GenerateContentResponse): string | undefined => {
  const direct = response.text;
  if (typeof direct === 'string' && direct.trim()) return direct;

  const parts = response.candidates?.[0]?.content?.parts ?? [];
  const chunks: string[] = [];
  for (const part of parts) {
    if (typeof part.text === 'string') {
      chunks.push(part.text);
      continue;
    }
    const data = part.inlineData?.data;
    if (typeof data === 'string') {
      const decoded = decodeBase64(data);
      if (decoded?.trim()) chunks.push(decoded);
    }
  }
  const joined = chunks.join('\n').trim();
  return joined || undefined;
};
