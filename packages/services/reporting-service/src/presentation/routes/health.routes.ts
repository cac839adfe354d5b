/**
 * Health Routes
 * GET /health, /health/live, /health/ready
 */

import { Router } from 'express';
import { HealthController } from '../controllers/HealthController';
import type { ReportingServiceRegistry } from '../../infrastructure/ServiceFactory';

export function createHealthRoutes(registry: ReportingServiceRegistry): Router {
  const router = Router();
  const controller = new HealthController(registry);

  router.get('/health', (req, res) => controller.getHealth(req, res));
  router.get('/health/live', (req, res) => controller.getLiveness(req, res));
  router.get('/health/ready', (req, res) => controller.getReadiness(req, res));

  return router;
}
