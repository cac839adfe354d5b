import type { Request, Response, NextFunction } from 'express';
import { generateCorrelationId } from '../logging/correlation';
import { getLogger } from '../logging/logger';
import {
  getCorrelationId,
  createStructuredError,
  sendStructuredError,
  statusCodeToErrorCode,
  statusCodeToErrorType,
} from '../http/structured-errors';

const middlewareLogger = getLogger('error-handling:middleware');
const utilitiesLogger = getLogger('error-handling:utilities');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  TIMEOUT = 'TIMEOUT',
  DATABASE_ERROR = 'DATABASE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

/**
 * Builds a service-scoped error base class whose codes are drawn from
 * `domainErrorCodes`, with the common HTTP-flavoured factories attached.
 */
export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: Record<'INTERNAL_ERROR' | 'NOT_FOUND' | 'VALIDATION_ERROR' | 'SERVICE_UNAVAILABLE', T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code || domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    return new DomainError(error.message, 500, error);
  }
  return new DomainError(String(error) || fallbackMessage, 500);
}

export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof DomainError && error.code === code;
}

/**
 * Terminal Express error middleware. DomainErrors keep their status, code and details;
 * anything else becomes a 500 whose message is hidden in production.
 */
export function errorHandler() {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = getCorrelationId(req);

    if (error instanceof DomainError) {
      const statusCode = error.statusCode;
      const code = error.code || statusCodeToErrorCode(statusCode);

      middlewareLogger.log(statusCode >= 500 ? 'error' : 'warn', 'DomainError caught', {
        error: error.message,
        statusCode,
        code,
        correlationId,
        url: req.originalUrl,
        method: req.method,
      });

      sendStructuredError(
        res,
        statusCode,
        createStructuredError(code, statusCodeToErrorType(statusCode), error.message, {
          details: error.details,
          correlationId,
        })
      );
      return;
    }

    const message =
      process.env.NODE_ENV === 'production' ? 'Internal Server Error' : errorMessage(error) || 'Unknown error occurred';

    middlewareLogger.error('Unhandled error', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
      correlationId,
      url: req.originalUrl,
      method: req.method,
    });

    sendStructuredError(res, 500, createStructuredError('INTERNAL_ERROR', 'InternalError', message, { correlationId }));
  };
}

export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}

export function logAndTrackError(
  error: unknown,
  context?: string,
  metadata?: Record<string, unknown>,
  code?: string,
  statusCode?: number
): { error: unknown; correlationId: string } {
  const correlationId = generateCorrelationId();

  utilitiesLogger.error('Error occurred', {
    message: errorMessage(error),
    context: context || 'unknown context',
    metadata: metadata || {},
    code: code || 'UNKNOWN_ERROR',
    statusCode: statusCode || 500,
    correlationId,
  });

  return { error, correlationId };
}
