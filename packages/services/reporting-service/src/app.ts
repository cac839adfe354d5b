/**
 * Reporting Service - Express App Factory
 * Creates the Express app instance without starting a server, for tests and for main.ts
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import { errorHandler, notFoundHandler, requestLogger } from '@opsdash/platform-core';
import { SERVICE_NAME, type ServiceConfig } from './config/service-config';
import { createServiceRegistry, type ReportingServiceRegistry } from './infrastructure/ServiceFactory';
import { setupRoutes } from './presentation/routes';

/**
 * Builds the app from an explicit configuration. The registry defaults to the
 * one the configuration selects (PostgreSQL or the in-memory demo store).
 */
export function createApp(
  config: ServiceConfig,
  registry: ReportingServiceRegistry = createServiceRegistry(config)
): express.Application {
  const app = express();

  setupMiddleware(app, config);
  setupRoutes(app, config, registry);

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}

function setupMiddleware(app: express.Express, config: ServiceConfig): void {
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(compression() as express.RequestHandler);

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: config.corsOrigins !== true,
    })
  );

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: config.rateLimitPerMinute,
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(config.apiPrefix, limiter);

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger(SERVICE_NAME));
}
