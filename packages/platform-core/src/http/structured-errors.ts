/**
 * Structured Error Factory
 *
 * Creates consistent error envelopes: { success: false, error: { type, code, message, ... }, timestamp }
 */

import type { Response } from 'express';

export type ErrorType =
  | 'ValidationError'
  | 'NotFoundError'
  | 'AuthenticationError'
  | 'AuthorizationError'
  | 'ConflictError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'ServiceUnavailableError'
  | 'DatabaseError'
  | 'InternalError';

export interface StructuredError {
  type: ErrorType;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  originalError?: string;
  stack?: string;
  service?: string;
  correlationId?: string;
}

export interface StructuredErrorOptions {
  details?: Record<string, unknown>;
  originalError?: unknown;
  service?: string;
  correlationId?: string;
}

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export function getCorrelationId(req: RequestWithHeaders): string | undefined {
  const value = req.headers['x-correlation-id'] || req.headers['x-request-id'];
  return Array.isArray(value) ? value[0] : value;
}

export function statusCodeToErrorCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
    case 422:
      return 'VALIDATION_ERROR';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 408:
    case 504:
      return 'TIMEOUT';
    case 409:
      return 'CONFLICT';
    case 429:
      return 'RATE_LIMITED';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export function statusCodeToErrorType(statusCode: number): ErrorType {
  switch (statusCode) {
    case 400:
    case 422:
      return 'ValidationError';
    case 401:
      return 'AuthenticationError';
    case 403:
      return 'AuthorizationError';
    case 404:
      return 'NotFoundError';
    case 408:
    case 504:
      return 'TimeoutError';
    case 409:
      return 'ConflictError';
    case 429:
      return 'RateLimitError';
    case 503:
      return 'ServiceUnavailableError';
    default:
      return 'InternalError';
  }
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function readDetails(source: object): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(source, 'details');
  return value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : undefined;
}

/**
 * Extract meaningful error information from any error type.
 * Drizzle wraps driver errors as "Failed query: ..." with the real error in .cause
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  originalError: string;
  stack?: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof Error) {
    const cause = error.cause;
    let actualMessage = error.message;
    let causeMessage: string | undefined;

    if (cause instanceof Error) {
      causeMessage = cause.message;
      if (error.message.startsWith('Failed query:')) {
        actualMessage = cause.message || error.message;
      }
    }

    return {
      message: actualMessage,
      originalError: causeMessage ? `${error.message} | Cause: ${causeMessage}` : error.message,
      stack: process.env.NODE_ENV !== 'production' ? error.stack : undefined,
      details: readDetails(error),
    };
  }

  if (typeof error === 'string') {
    return { message: error, originalError: error };
  }

  return {
    message: 'Unknown error occurred',
    originalError: String(error),
  };
}

export function createStructuredError(
  code: string,
  type: ErrorType,
  message: string,
  options: StructuredErrorOptions = {}
): StructuredError {
  const result: StructuredError = { type, code, message };

  if (options.details) {
    result.details = options.details;
  }

  if (options.originalError) {
    const errorInfo = extractErrorInfo(options.originalError);
    result.originalError = errorInfo.originalError;
    if (errorInfo.stack) {
      result.stack = errorInfo.stack;
    }
    if (errorInfo.details && !result.details) {
      result.details = errorInfo.details;
    }
  }

  if (options.service) {
    result.service = options.service;
  }

  if (options.correlationId) {
    result.correlationId = options.correlationId;
  }

  return result;
}

export function sendStructuredError(res: Response, statusCode: number, error: StructuredError): void {
  const extraDetails: Record<string, unknown> = {};
  if (error.originalError && process.env.NODE_ENV !== 'production') extraDetails.originalError = error.originalError;
  if (error.service) extraDetails.service = error.service;

  const hasDetails = error.details !== undefined || Object.keys(extraDetails).length > 0;

  res.status(statusCode).json({
    success: false,
    error: {
      type: error.type,
      code: error.code,
      message: error.message,
      ...(hasDetails && { details: { ...error.details, ...extraDetails } }),
      correlationId: error.correlationId,
      ...(error.stack && process.env.NODE_ENV !== 'production' && { stack: error.stack }),
    },
    timestamp: new Date().toISOString(),
  });
}

export const StructuredErrors = {
  validation: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 400, createStructuredError('VALIDATION_ERROR', 'ValidationError', message, options));
  },

  notFound: (res: Response, resource: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 404, createStructuredError('NOT_FOUND', 'NotFoundError', `${resource} not found`, options));
  },

  serviceUnavailable: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(
      res,
      503,
      createStructuredError('SERVICE_UNAVAILABLE', 'ServiceUnavailableError', message, options)
    );
  },

  internal: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 500, createStructuredError('INTERNAL_ERROR', 'InternalError', message, options));
  },

  /**
   * Create error from caught exception.
   * Typed errors carrying an HTTP statusCode keep their status and code; anything else is a 500.
   */
  fromException: (res: Response, error: unknown, fallbackMessage: string, options?: StructuredErrorOptions) => {
    const errorInfo = extractErrorInfo(error);
    const statusCode = error && typeof error === 'object' ? readNumber(error, 'statusCode') : undefined;

    if (statusCode !== undefined && statusCode >= 400 && statusCode < 600) {
      const code = (error !== null && typeof error === 'object' && readString(error, 'code')) || statusCodeToErrorCode(statusCode);
      const message = errorInfo.message || fallbackMessage;
      sendStructuredError(
        res,
        statusCode,
        createStructuredError(code, statusCodeToErrorType(statusCode), message, {
          details: errorInfo.details,
          ...options,
          originalError: statusCode >= 500 ? error : undefined,
        })
      );
      return;
    }

    sendStructuredError(
      res,
      500,
      createStructuredError('INTERNAL_ERROR', 'InternalError', fallbackMessage, {
        details: errorInfo.details,
        ...options,
        originalError: error,
      })
    );
  },
};
