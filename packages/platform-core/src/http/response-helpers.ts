/**
 * Shared Response Helpers
 *
 * Factory functions to create service-specific response helpers with a consistent
 * `{ success, data, timestamp }` envelope.
 *
 * Usage:
 *   import { createResponseHelpers } from '@opsdash/platform-core';
 *   const { sendSuccess, ServiceErrors } = createResponseHelpers('my-service');
 */

import type { Response } from 'express';
import { StructuredErrors, getCorrelationId } from './structured-errors';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string, req?: RequestWithHeaders) => void;
  notFound: (res: Response, resource: string, req?: RequestWithHeaders) => void;
  badRequest: (res: Response, message: string, req?: RequestWithHeaders, details?: Record<string, unknown>) => void;
  serviceUnavailable: (res: Response, message: string, req?: RequestWithHeaders) => void;
  internal: (res: Response, message: string, originalError?: unknown, req?: RequestWithHeaders) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  return {
    fromException: (res, error, fallbackMessage, req) => {
      StructuredErrors.fromException(res, error, fallbackMessage, {
        service: serviceName,
        correlationId: req ? getCorrelationId(req) : undefined,
      });
    },

    notFound: (res, resource, req) => {
      StructuredErrors.notFound(res, resource, {
        service: serviceName,
        correlationId: req ? getCorrelationId(req) : undefined,
      });
    },

    badRequest: (res, message, req, details) => {
      StructuredErrors.validation(res, message || 'Bad request', {
        service: serviceName,
        correlationId: req ? getCorrelationId(req) : undefined,
        details,
      });
    },

    serviceUnavailable: (res, message, req) => {
      StructuredErrors.serviceUnavailable(res, message || 'Service unavailable', {
        service: serviceName,
        correlationId: req ? getCorrelationId(req) : undefined,
      });
    },

    internal: (res, message, originalError, req) => {
      StructuredErrors.internal(res, message || 'Internal error', {
        service: serviceName,
        correlationId: req ? getCorrelationId(req) : undefined,
        originalError,
      });
    },
  };
}

function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json({
    success: true,
    data,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Create response helpers for a specific service
 *
 * @example
 * ```typescript
 * const { sendSuccess, ServiceErrors } = createResponseHelpers('reporting-service');
 *
 * async getMetrics(req: Request, res: Response) {
 *   try {
 *     sendSuccess(res, await this.engine.metrics(req.query));
 *   } catch (error) {
 *     ServiceErrors.fromException(res, error, 'Failed to compute metrics', req);
 *   }
 * }
 * ```
 */
export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess,
    ServiceErrors: createServiceErrors(serviceName),
  };
}
