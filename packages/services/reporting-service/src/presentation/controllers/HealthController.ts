/**
 * Health Controller - liveness and readiness probes
 * Handles /health, /health/live, /health/ready
 */

import type { Request, Response } from 'express';
import { createResponseHelpers, errorMessage } from '@opsdash/platform-core';
import { DOMAIN_NAMES } from '../../domains/entities';
import type { ReportingServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-config';

const { ServiceErrors } = createResponseHelpers(SERVICE_NAME);

export class HealthController {
  constructor(private readonly registry: ReportingServiceRegistry) {}

  async getHealth(req: Request, res: Response): Promise<void> {
    try {
      const stores = await this.checkStores();
      const healthy = Object.values(stores).every(store => store.healthy);
      res.status(healthy ? 200 : 503).json({
        service: SERVICE_NAME,
        status: healthy ? 'healthy' : 'unhealthy',
        version: process.env.npm_package_version || '1.0.0',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        components: { storeKind: this.registry.storeKind, stores },
      });
    } catch (error) {
      ServiceErrors.serviceUnavailable(res, errorMessage(error), req);
    }
  }

  getLiveness(_req: Request, res: Response): void {
    res.status(200).json({
      alive: true,
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  async getReadiness(req: Request, res: Response): Promise<void> {
    try {
      const stores = await this.checkStores();
      const ready = Object.values(stores).every(store => store.healthy);
      res.status(ready ? 200 : 503).json({
        ready,
        service: SERVICE_NAME,
        timestamp: new Date().toISOString(),
        components: stores,
      });
    } catch (error) {
      ServiceErrors.serviceUnavailable(res, errorMessage(error), req);
    }
  }

  private async checkStores(): Promise<Record<string, { healthy: boolean }>> {
    const results = await Promise.all(
      DOMAIN_NAMES.map(async domain => [domain, { healthy: await this.registry.engines[domain].ping() }] as const)
    );
    return Object.fromEntries(results);
  }
}
