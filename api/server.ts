// api/server.ts - express entry point for the risk analysis API
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { env } from './_lib/env';
import { logger, requestIdMiddleware } from './_lib/logger';
import { corsOptions } from './_lib/cors';
import { notFound } from './_lib/http';
import { handleError } from './_lib/middleware/errorHandler';
import { withLogging } from './_lib/wrappers';
import analyze from './v1/analyze';
import config from './v1/config';
import health from './v1/health';

export function createApp(): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors(corsOptions()));
  app.use(compression());
  app.use(express.json({ limit: '10mb' }));
  app.use(requestIdMiddleware());
  app.use(withLogging());

  app.all('/health', health);
  app.all('/v1/health', health);
  app.all('/v1/config', config);
  app.all('/v1/analyze', analyze);

  app.use((req, res) => notFound(res, `No route for ${req.method} ${req.path}`, req));
  app.use(handleError);

  return app;
}

if (require.main === module) {
  const app = createApp();
  app.listen(env.PORT, () => {
    logger.info(`Risk analysis API listening on port ${env.PORT}`);
  });
}
