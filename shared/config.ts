import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  fetcher: z.object({
    timeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  llm: z.object({
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    requestsPerMinute: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    maxInputChars: z.number().int().positive(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  fetcher: {
    timeoutMs: number;
  };
  llm: {
    model: string;
    enabled: boolean;
    timeoutMs: number;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  fetcher: {
    timeoutMs: config.fetcher.timeoutMs,
  },
  llm: {
    model: config.llm.model,
    enabled: Boolean(config.llm.apiKey),
    timeoutMs: config.llm.timeoutMs,
  },
});
