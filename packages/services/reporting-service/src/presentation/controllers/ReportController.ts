/**
 * Report Controller
 * Resolves the domain engine for a request and returns the report in the success envelope.
 */

import type { Request, Response } from 'express';
import { createResponseHelpers } from '@opsdash/platform-core';
import { DOMAIN_NAMES, isDomainName, type DomainName, type RawParams, type ReportShape } from '../../domains/entities';
import type { ReportEngine } from '../../application/services';
import { ReportingError } from '../../application/errors';
import type { ReportingServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-config';

const { sendSuccess, ServiceErrors } = createResponseHelpers(SERVICE_NAME);

const FAILURE_MESSAGES: Record<ReportShape, string> = {
  metrics: 'Failed to compute metrics',
  'time-series': 'Failed to build time series',
  breakdown: 'Failed to build breakdown',
  list: 'Failed to list records',
  filters: 'Failed to load filter options',
};

export class ReportController {
  constructor(private readonly registry: Pick<ReportingServiceRegistry, 'engines'>) {}

  async getReport(req: Request, res: Response, shape: ReportShape): Promise<void> {
    try {
      const engine = this.resolveEngine(req.params.domain);
      sendSuccess(res, await engine.run(shape, req.query));
    } catch (error) {
      ServiceErrors.fromException(res, error, FAILURE_MESSAGES[shape], req);
    }
  }

  /**
   * Breakdown pinned to one dimension, for the per-domain alias routes.
   */
  async getFixedBreakdown(req: Request, res: Response, domain: DomainName, dimension: string): Promise<void> {
    try {
      const raw: RawParams = { ...req.query, dimension };
      sendSuccess(res, await this.registry.engines[domain].breakdown(raw));
    } catch (error) {
      ServiceErrors.fromException(res, error, FAILURE_MESSAGES.breakdown, req);
    }
  }

  private resolveEngine(domain: string | undefined): ReportEngine {
    const name = domain ?? '';
    if (!isDomainName(name)) {
      throw ReportingError.unknownDomain(name, DOMAIN_NAMES);
    }
    return this.registry.engines[name];
  }
}
