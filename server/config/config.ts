import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const logLevelFromEnv = (value: string | undefined): AppConfig['observability']['logLevel'] => {
  const normalized = (value || 'info').trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
};

export type { AppConfig, PublicConfig };

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
    },
    fetcher: {
      timeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 10_000),
      // Job boards answer bare clients with 403s; look like a desktop browser
      userAgent: env.FETCH_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    },
    llm: {
      apiKey: env.GEMINI_API_KEY?.trim() || '',
      model: env.GEMINI_MODEL?.trim() || 'gemini-2.5-flash',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.1),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 8192),
      requestsPerMinute: Math.max(1, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10)),
      timeoutMs: numberFromEnv(env.AI_TIMEOUT_MS, 60_000),
      maxInputChars: numberFromEnv(env.AI_MAX_INPUT_CHARS, 60_000),
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
