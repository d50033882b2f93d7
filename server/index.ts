import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import type { ErrorRequestHandler, Request, Response } from 'express';
import { loadConfig, getPublicConfig } from './config/config';
import { createLogger } from './obs/logger';
import { createVideoUrlTransformer } from './cdn/videoUrl';
import { createArticlePresenterFactory } from './presenters/articlePresenter';
import { handlePresentArticles } from './http/presentArticles';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  appDomain: config.app.domain,
  cdn: {
    baseUrl: config.cdn.baseUrl,
    hasCloudName: Boolean(config.cdn.cloudName),
  },
});

const createPresenter = createArticlePresenterFactory({
  appDomain: config.app.domain,
  transformVideoUrl: createVideoUrlTransformer(config),
});

const app = express();

app.use(cors());
app.use(express.json({ limit: config.server.bodyLimit }));

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

app.post('/api/articles/present', (req: Request, res: Response) => {
  const result = handlePresentArticles({
    body: req.body,
    createPresenter,
    logger: logger.child({ route: 'articles.present' }),
  });
  res.status(result.status).json(result.payload);
});

const handleUnexpectedError: ErrorRequestHandler = (error, req, res, _next) => {
  logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, error });
  res.status(500).json({ error: 'Internal server error' });
};

app.use(handleUnexpectedError);

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
