import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import { AiExtractor } from './ai/aiExtractor';
import { getPublicConfig, loadConfig } from './config/config';
import { handleAnalyzeJobUrl } from './http/jobUrlRoute';
import { createLogger } from './obs/logger';
import { createJobUrlAnalyzer } from './pipeline/analyzeJobUrl';
import { LLMService } from './services/llmService';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  fetchTimeoutMs: config.fetcher.timeoutMs,
  llm: {
    model: config.llm.model,
    hasApiKey: Boolean(config.llm.apiKey),
    timeoutMs: config.llm.timeoutMs,
  },
});

const llm = new LLMService(config, logger);
const analyzer = createJobUrlAnalyzer({
  config,
  logger,
  aiExtractor: new AiExtractor({ config, logger, llm }),
});

const app = express();

app.use(cors());
app.use(express.json({ limit: '5mb' }));

if (config.observability.logLevel === 'debug') {
  app.use((req, res, next) => {
    const startedAt = Date.now();
    logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
    res.on('finish', () => {
      logger.debug('HTTP response', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        elapsedMs: Date.now() - startedAt,
      });
    });
    next();
  });
}

app.get('/api/healthz', (_req: Request, res: Response) => {
  res.json({ ok: true, ts: new Date().toISOString() });
});

app.get('/api/config', (_req: Request, res: Response) => {
  res.json(getPublicConfig(config));
});

app.post('/api/job-url/analyze', (req: Request, res: Response) => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });

  handleAnalyzeJobUrl({ body: req.body, analyzer, logger, signal: controller.signal })
    .then((result) => {
      if (res.writableEnded || controller.signal.aborted) return;
      res.status(result.status).json(result.body);
    })
    .catch((error: unknown) => {
      logger.error('Unhandled route error', { error: error instanceof Error ? error.message : String(error) });
      if (!res.headersSent) res.status(500).json({ error: 'Internal error' });
    });
});

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
