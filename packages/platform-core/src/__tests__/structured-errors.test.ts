import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
  createResponseHelpers,
  createStructuredError,
  extractErrorInfo,
  statusCodeToErrorCode,
  statusCodeToErrorType,
} from '../http';
import { DomainError } from '../error-handling';

describe('status code mapping', () => {
  it('should map status codes to codes and types', () => {
    expect(statusCodeToErrorCode(400)).toBe('VALIDATION_ERROR');
    expect(statusCodeToErrorCode(503)).toBe('SERVICE_UNAVAILABLE');
    expect(statusCodeToErrorCode(418)).toBe('INTERNAL_ERROR');
    expect(statusCodeToErrorType(404)).toBe('NotFoundError');
    expect(statusCodeToErrorType(500)).toBe('InternalError');
  });
});

describe('extractErrorInfo', () => {
  it('should surface the driver message of a failed query', () => {
    const error = new Error('Failed query: select 1', { cause: new Error('relation does not exist') });
    expect(extractErrorInfo(error)).toMatchObject({
      message: 'relation does not exist',
      originalError: 'Failed query: select 1 | Cause: relation does not exist',
    });
  });

  it('should read details from typed errors', () => {
    expect(extractErrorInfo(new DomainError('x', 400, undefined, 'X', { field: 'a' })).details).toEqual({ field: 'a' });
  });

  it('should describe non-errors', () => {
    expect(extractErrorInfo('plain')).toEqual({ message: 'plain', originalError: 'plain' });
    expect(extractErrorInfo(undefined).message).toBe('Unknown error occurred');
  });
});

describe('createStructuredError', () => {
  it('should include only the options given', () => {
    expect(createStructuredError('NOT_FOUND', 'NotFoundError', 'gone', { service: 'test-service' })).toEqual({
      type: 'NotFoundError',
      code: 'NOT_FOUND',
      message: 'gone',
      service: 'test-service',
    });
  });
});

describe('createResponseHelpers', () => {
  const { sendSuccess, ServiceErrors } = createResponseHelpers('test-service');
  const app = express();
  app.get('/ok', (_req, res) => sendSuccess(res, { value: 1 }));
  app.get('/created', (_req, res) => sendSuccess(res, { id: 7 }, 201));
  app.get('/typed', (req, res) =>
    ServiceErrors.fromException(res, new DomainError('Out of range', 400, undefined, 'OUT_OF_RANGE'), 'fallback', req)
  );
  app.get('/untyped', (req, res) => ServiceErrors.fromException(res, 'weird', 'Something failed', req));
  app.get('/bad', (req, res) => ServiceErrors.badRequest(res, 'Missing id', req, { field: 'id' }));

  it('should wrap data in the success envelope', async () => {
    const res = await request(app).get('/ok');

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data).toEqual({ value: 1 });
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('should honour a custom status code', async () => {
    const res = await request(app).get('/created');
    expect(res.status).toBe(201);
  });

  it('should keep the status and code of typed errors', async () => {
    const res = await request(app).get('/typed').set('x-correlation-id', 'test-correlation');

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      type: 'ValidationError',
      code: 'OUT_OF_RANGE',
      message: 'Out of range',
      details: { service: 'test-service' },
      correlationId: 'test-correlation',
    });
  });

  it('should use the fallback message for untyped errors', async () => {
    const res = await request(app).get('/untyped');

    expect(res.status).toBe(500);
    expect(res.body.error).toMatchObject({ code: 'INTERNAL_ERROR', message: 'Something failed' });
  });

  it('should send validation errors with details', async () => {
    const res = await request(app).get('/bad');

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Missing id',
      details: { field: 'id', service: 'test-service' },
    });
  });
});
