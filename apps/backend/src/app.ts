import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { ERROR_CODE_HEADER, REQUEST_ID_HEADER } from '@chart-relay/api-contracts';
import type { ServerConfig } from './config/env.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createGlobalLimiter } from './middleware/rateLimit.js';
import { requestContext } from './middleware/requestContext.js';
import { setupRoutes } from './routes/index.js';
import { createResourceStore, type ResourceStore } from './storage/index.js';

export type AppDeps = {
  config: Pick<ServerConfig, 'resourceFile' | 'resourceContentType' | 'allowedOrigins' | 'rateLimit'>;
  store?: ResourceStore;
};

export function createApp(deps: AppDeps): Express {
  const { config } = deps;
  const store = deps.store ?? createResourceStore(config.resourceFile);

  const app = express();

  // Behind one reverse proxy (nginx).
  app.set('trust proxy', 1);

  app.use(requestContext);
  // compression's default filter leaves image bodies alone.
  app.use(compression());
  app.use(
    helmet({
      // The viewer runs on another origin in development.
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    }),
  );
  app.use(
    cors({
      origin: config.allowedOrigins,
      exposedHeaders: ['ETag', 'Last-Modified', ERROR_CODE_HEADER, REQUEST_ID_HEADER],
    }),
  );
  app.use(createGlobalLimiter(config.rateLimit));

  setupRoutes(app, { store, contentType: config.resourceContentType });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
