/**
 * Report Routes
 * GET /:domain/{metrics,time-series,breakdown,list,filters} plus the breakdown aliases
 */

import { Router } from 'express';
import { ReportController } from '../controllers/ReportController';
import type { ReportingServiceRegistry } from '../../infrastructure/ServiceFactory';

export function createReportRoutes(registry: ReportingServiceRegistry): Router {
  const router = Router();
  const controller = new ReportController(registry);

  router.get('/transactions/category-breakdown', (req, res) =>
    controller.getFixedBreakdown(req, res, 'transactions', 'category')
  );
  router.get('/equipment/equipment-breakdown', (req, res) =>
    controller.getFixedBreakdown(req, res, 'equipment', 'equipmentId')
  );

  router.get('/:domain/metrics', (req, res) => controller.getReport(req, res, 'metrics'));
  router.get('/:domain/time-series', (req, res) => controller.getReport(req, res, 'time-series'));
  router.get('/:domain/breakdown', (req, res) => controller.getReport(req, res, 'breakdown'));
  router.get('/:domain/list', (req, res) => controller.getReport(req, res, 'list'));
  router.get('/:domain/filters', (req, res) => controller.getReport(req, res, 'filters'));

  return router;
}
