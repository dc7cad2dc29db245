import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import path from 'path';
import { API_PREFIX } from '@shared/constants';
import { createErrorHandler, notFoundHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';
import type { ApiServices } from './services/index';

export function createApp(services: ApiServices) {
  const { config } = services;
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: config.clientUrl }));
  app.use(express.json({ limit: '100kb' }));
  if (config.nodeEnv !== 'test') app.use(requestLogger);

  app.use(API_PREFIX, createApiRouter(services));

  if (config.isProd) {
    const clientDist = path.resolve(process.cwd(), 'dist/client');
    app.use(express.static(clientDist));
    app.get('*', (_req, res) => {
      res.sendFile(path.join(clientDist, 'index.html'));
    });
  }

  app.use(notFoundHandler);
  app.use(createErrorHandler(config));

  return app;
}
