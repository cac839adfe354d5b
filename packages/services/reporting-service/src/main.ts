// Load environment variables first (never override the real environment)
import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
loadEnv({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Reporting Service - Entry Point
 * Dashboard analytics over transactions and equipment readings
 */

import {
  createLogger,
  failFastValidation,
  logAndTrackError,
  setupGracefulShutdown,
  type EnvVarConfig,
} from '@opsdash/platform-core';
import { createApp } from './app';
import { SERVICE_NAME, loadServiceConfig } from './config/service-config';

const logger = createLogger(SERVICE_NAME);

const REQUIRED_ENV: EnvVarConfig[] = [
  { name: 'DATABASE_URL', required: true, description: 'PostgreSQL connection string', sensitive: true },
  { name: 'CORS_ORIGINS', required: false, description: 'Comma-separated allowed origins' },
  { name: 'LOG_LEVEL', required: false, description: 'winston log level' },
];

async function main(): Promise<void> {
  failFastValidation(SERVICE_NAME, REQUIRED_ENV);
  const config = loadServiceConfig();

  logger.info('Starting Reporting Service...', {
    service: SERVICE_NAME,
    port: config.port,
    env: config.nodeEnv,
    phase: 'initialization',
  });

  const app = createApp(config);

  const server = await new Promise<ReturnType<typeof app.listen>>((resolveServer, reject) => {
    const listening = app.listen(config.port, () => resolveServer(listening));
    listening.once('error', reject);
  });

  logger.info('Reporting Service started successfully', {
    service: SERVICE_NAME,
    port: config.port,
    apiPrefix: config.apiPrefix,
    phase: 'startup_complete',
  });

  setupGracefulShutdown(server);
}

main().catch(error => {
  const { correlationId } = logAndTrackError(
    error,
    'Reporting service startup failed',
    { service: SERVICE_NAME, phase: 'startup_failure' },
    'REPORTING_SERVICE_STARTUP_FAILURE',
    500
  );

  logger.error('Reporting service startup failed', {
    service: SERVICE_NAME,
    phase: 'startup_failed_exit',
    correlationId,
    exitCode: 1,
  });

  process.exit(1);
});
