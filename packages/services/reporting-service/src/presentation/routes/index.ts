/**
 * Reporting Service - Route Aggregator
 * Combines all route modules and mounts them on the Express app.
 */

import type { Express } from 'express';
import { createResponseHelpers } from '@opsdash/platform-core';
import { DOMAIN_NAMES } from '../../domains/entities';
import type { ReportingServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME, type ServiceConfig } from '../../config/service-config';
import { createHealthRoutes } from './health.routes';
import { createReportRoutes } from './reports.routes';

const { sendSuccess } = createResponseHelpers(SERVICE_NAME);

export function setupRoutes(app: Express, config: ServiceConfig, registry: ReportingServiceRegistry): void {
  const prefix = config.apiPrefix === '/' ? '' : config.apiPrefix;

  app.use('/', createHealthRoutes(registry));
  app.use(prefix || '/', createReportRoutes(registry));

  // Root endpoint
  app.get('/', (_req, res) => {
    sendSuccess(res, {
      service: SERVICE_NAME,
      name: config.appName,
      version: process.env.npm_package_version || '1.0.0',
      status: 'running',
      storeKind: registry.storeKind,
      domains: DOMAIN_NAMES,
      endpoints: {
        health: '/health',
        metrics: `${prefix}/:domain/metrics`,
        timeSeries: `${prefix}/:domain/time-series`,
        breakdown: `${prefix}/:domain/breakdown`,
        list: `${prefix}/:domain/list`,
        filters: `${prefix}/:domain/filters`,
      },
    });
  });
}
