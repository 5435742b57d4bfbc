import { afterEach, describe, expect, it, vi } from 'vitest';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

import { errorStatus, isTransientError, rateLimitedGenerateContent } from '../genai';

const llmConfig = (apiKey: string) => ({
  llm: {
    apiKey,
    model: 'gemini-test',
    temperature: 0,
    maxOutputTokens: 1024,
    requestsPerMinute: 100,
    timeoutMs: 1_000,
    maxInputChars: 10_000,
  },
});

afterEach(() => {
  generateContent.mockReset();
});

describe('isTransientError', () => {
  it('treats rate limits and overloads as transient', () => {
    expect(isTransientError({ status: 429 })).toBe(true);
    expect(isTransientError({ error: { code: 503 } })).toBe(true);
    expect(isTransientError(new Error('The model is overloaded'))).toBe(true);
  });

  it('treats auth and request errors as permanent', () => {
    expect(isTransientError({ status: 400 })).toBe(false);
    expect(isTransientError(new Error('API key not valid'))).toBe(false);
  });
});

describe('errorStatus', () => {
  it('reads top-level and nested codes', () => {
    expect(errorStatus({ status: 401 })).toBe(401);
    expect(errorStatus({ error: { code: 429 } })).toBe(429);
    expect(errorStatus('nope')).toBeNull();
  });
});

describe('rateLimitedGenerateContent', () => {
  it('makes one model call and returns its response', async () => {
    generateContent.mockResolvedValueOnce({ text: '{"company":"Acme"}' });

    const response = await rateLimitedGenerateContent(llmConfig('test-secret-ok'), { model: 'gemini-test', prompt: 'hi' });

    expect(response).toEqual({ text: '{"company":"Acme"}' });
    expect(generateContent).toHaveBeenCalledTimes(1);
  });

  it('does not retry a transient failure', async () => {
    generateContent
      .mockRejectedValueOnce(Object.assign(new Error('Service unavailable'), { status: 503 }))
      .mockResolvedValueOnce({ text: '{}' });

    await expect(
      rateLimitedGenerateContent(llmConfig('test-secret-503'), { model: 'gemini-test', prompt: 'hi' }),
    ).rejects.toThrow('Service unavailable');
    expect(generateContent).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    generateContent.mockRejectedValueOnce({ status: 429 });

    await expect(
      rateLimitedGenerateContent(llmConfig('test-secret-429'), { model: 'gemini-test', prompt: 'hi' }),
    ).rejects.toThrow('[object Object]');
    expect(generateContent).toHaveBeenCalledTimes(1);
  });
});
