import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { createFeaturesRouter } from './routes/features';
import { sendError } from './routes/respond';
import { createSettingsRouter } from './routes/settings';
import { createViewsRouter } from './routes/views';
import { CrudViewService } from './services/crudViews';
import { ConfigurationError } from './services/errors';
import { widgetRegistry } from './services/widgets';
import { MemoryStore } from './stores/memory';
import type { Stores } from './stores/types';

export function createService(config: AppConfig, stores: Stores = MemoryStore.fromFile(config.dataFile)): CrudViewService {
  return new CrudViewService(stores, widgetRegistry, config);
}

const isBodyParseError = (error: unknown) =>
  typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';

const handleErrors: ErrorRequestHandler = (error, _req, res, _next) => {
  if (isBodyParseError(error)) {
    sendError(res, new ConfigurationError([{ kind: 'InvalidBody', message: 'body: malformed JSON' }]), 'API');
    return;
  }
  sendError(res, error, 'API');
};

export function createApp(service: CrudViewService, config: AppConfig): express.Express {
  const app = express();

  // Browsers hit the API cross-origin in dev; behind API Gateway the headers are set per response
  if (!config.production) {
    app.use(cors({ origin: config.corsOrigins, credentials: true }));
  } else {
    app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', req.headers.origin ?? '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      res.header('Access-Control-Allow-Credentials', 'true');
      next();
    });
  }

  app.use(express.json({ limit: '10mb' }));

  app.use((req, _res, next) => {
    console.log(`[API] ${req.method} ${req.path}`);
    next();
  });

  app.use('/api', createSettingsRouter(service));
  app.use('/api', createViewsRouter(service));
  app.use('/api', createFeaturesRouter(service));
  app.use(handleErrors);

  return app;
}
