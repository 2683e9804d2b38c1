import cors from 'cors';
import express from 'express';
import type { ErrorRequestHandler, Request, Response } from 'express';
import { getPublicConfig, type AppConfig } from '../shared/config';
import type { Logger } from './obs/logger';
import type { Fetcher } from './retrieval/fetcher';
import { createUnfurlHandler } from './http/unfurlRoute';

export const SERVICE_NAME = 'Link Previewer API';
export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  fetcher: Fetcher;
}

const hasStatus = (value: unknown): value is { status: number; type?: unknown } =>
  typeof value === 'object' && value !== null && 'status' in value && typeof value.status === 'number';

export const createApp = ({ config, logger, fetcher }: AppDeps) => {
  const app = express();

  app.use(
    cors({
      origin: config.server.allowedOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '16kb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      let finished = false;
      res.on('finish', () => {
        finished = true;
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      res.on('close', () => {
        if (finished) return;
        logger.debug('HTTP closed early', {
          method: req.method,
          path: req.originalUrl,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/', (_req: Request, res: Response) => {
    res.json({ name: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  const handleUnfurl = createUnfurlHandler({ fetcher, logger });
  app.post('/unfurl', handleUnfurl);
  app.post('/api/unfurl', handleUnfurl);

  const handleError: ErrorRequestHandler = (err, req, res, _next) => {
    if (hasStatus(err) && err.type === 'entity.parse.failed') {
      res.status(400).json({ success: false, error: 'Invalid JSON body' });
      return;
    }
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ success: false, error: 'Invalid request' });
      return;
    }
    logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, error: err });
    res.status(500).json({ success: false, error: 'Internal server error' });
  };
  app.use(handleError);

  return app;
};
