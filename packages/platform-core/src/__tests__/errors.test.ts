import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
  DomainError,
  DomainErrorCode,
  createDomainServiceError,
  errorHandler,
  errorMessage,
  isErrorCode,
  logAndTrackError,
  notFoundHandler,
  wrapError,
} from '../error-handling';

const InventoryError = createDomainServiceError('Inventory', DomainErrorCode);

describe('DomainError', () => {
  it('should default to a 500 without code', () => {
    const error = new DomainError('broken');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBeUndefined();
    expect(error.name).toBe('DomainError');
  });

  it('should serialise to JSON with its cause message', () => {
    const error = new DomainError('broken', 503, new Error('socket closed'), 'SERVICE_UNAVAILABLE', { store: 'db' });
    expect(error.toJSON()).toMatchObject({
      name: 'DomainError',
      message: 'broken',
      statusCode: 503,
      code: 'SERVICE_UNAVAILABLE',
      details: { store: 'db' },
      cause: 'socket closed',
    });
  });
});

describe('createDomainServiceError', () => {
  it('should name errors after the service', () => {
    const error = new InventoryError('boom');
    expect(error.name).toBe('InventoryError');
    expect(error.code).toBe(DomainErrorCode.INTERNAL_ERROR);
    expect(error).toBeInstanceOf(DomainError);
  });

  it('should provide common factories', () => {
    expect(InventoryError.notFound('Item', '42')).toMatchObject({
      statusCode: 404,
      code: 'NOT_FOUND',
      message: 'Item not found: 42',
    });
    expect(InventoryError.validationError('sku', 'is required')).toMatchObject({
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Validation failed for sku: is required',
    });
    expect(InventoryError.serviceUnavailable('warehouse')).toMatchObject({
      statusCode: 503,
      message: 'Service unavailable: warehouse',
    });
  });
});

describe('error utilities', () => {
  it('errorMessage should read any thrown value', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(42)).toBe('42');
  });

  it('wrapError should keep domain errors and wrap the rest', () => {
    const domain = new DomainError('kept', 400);
    expect(wrapError(domain)).toBe(domain);

    const cause = new Error('raw');
    const wrapped = wrapError(cause);
    expect(wrapped).toBeInstanceOf(DomainError);
    expect(wrapped.statusCode).toBe(500);
    expect(wrapped.cause).toBe(cause);
  });

  it('isErrorCode should compare codes of domain errors', () => {
    expect(isErrorCode(InventoryError.notFound('Item'), 'NOT_FOUND')).toBe(true);
    expect(isErrorCode(new Error('x'), 'NOT_FOUND')).toBe(false);
  });

  it('logAndTrackError should return a correlation id', () => {
    const original = new Error('startup');
    const { error, correlationId } = logAndTrackError(original, 'test context');
    expect(error).toBe(original);
    expect(correlationId).toMatch(/^[a-z0-9]+$/);
  });
});

describe('error middleware', () => {
  const app = express();
  app.get('/domain', () => {
    throw new DomainError('Bad filter', 400, undefined, 'INVALID_FILTER', { field: 'date' });
  });
  app.get('/crash', () => {
    throw new Error('unexpected');
  });
  app.use(notFoundHandler());
  app.use(errorHandler());

  it('should keep the status, code and details of domain errors', async () => {
    const res = await request(app).get('/domain').set('x-correlation-id', 'test-correlation');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      success: false,
      error: {
        type: 'ValidationError',
        code: 'INVALID_FILTER',
        message: 'Bad filter',
        details: { field: 'date' },
        correlationId: 'test-correlation',
      },
    });
  });

  it('should turn other errors into a 500', async () => {
    const res = await request(app).get('/crash');

    expect(res.status).toBe(500);
    expect(res.body.error).toMatchObject({ type: 'InternalError', code: 'INTERNAL_ERROR', message: 'unexpected' });
  });

  it('should answer unmatched routes with 404', async () => {
    const res = await request(app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Route GET /missing not found' });
  });
});
