import { describe, it, expect, beforeEach, vi } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../config/service-config')>()),
  getLogger: () => mockLogger,
}));

import { QueryExecutor, isUsableRow, toPredicates } from '../application/query/QueryExecutor';
import { ReportingError } from '../application/errors';
import { transactionSchema, type Transaction } from '../domains/entities';
import type { IRecordStore } from '../domains/repositories/IRecordStore';
import { InMemoryRecordStore } from '../infrastructure/repositories';
import { sampleTransactions, transaction } from './helpers/records';

function failingStore(error: unknown): IRecordStore<Transaction> {
  return {
    findRows: vi.fn().mockRejectedValue(error),
    distinctValues: vi.fn().mockRejectedValue(error),
    ping: vi.fn().mockResolvedValue(false),
  };
}

describe('toPredicates', () => {
  it('should return no predicates for an empty filter', () => {
    expect(toPredicates(transactionSchema, { memberships: {} })).toEqual([]);
  });

  it('should order predicates as temporal, dimensions, numeric', () => {
    const dateFrom = new Date('2024-01-01T00:00:00.000Z');
    const dateTo = new Date('2024-01-31T23:59:59.999Z');
    const predicates = toPredicates(transactionSchema, {
      dateFrom,
      dateTo,
      memberships: { status: ['completed'], category: ['sales'] },
      minValue: 5,
    });

    expect(predicates).toEqual([
      { kind: 'range', field: 'date', min: dateFrom, max: dateTo },
      { kind: 'in', field: 'category', values: ['sales'] },
      { kind: 'in', field: 'status', values: ['completed'] },
      { kind: 'range', field: 'amount', min: 5, max: undefined },
    ]);
  });
});

describe('isUsableRow', () => {
  it('should require a valid date and a finite amount', () => {
    expect(isUsableRow(transactionSchema, transaction())).toBe(true);
    expect(isUsableRow(transactionSchema, transaction({ date: null }))).toBe(false);
    expect(isUsableRow(transactionSchema, transaction({ date: new Date('invalid') }))).toBe(false);
    expect(isUsableRow(transactionSchema, transaction({ amount: null }))).toBe(false);
    expect(isUsableRow(transactionSchema, transaction({ amount: Number.NaN }))).toBe(false);
    expect(isUsableRow(transactionSchema, transaction({ amount: Number.POSITIVE_INFINITY }))).toBe(false);
  });
});

describe('QueryExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return matching rows and count rejected ones', async () => {
    const rows = [...sampleTransactions(), transaction({ id: 6, amount: Number.NaN })];
    const executor = new QueryExecutor(transactionSchema, new InMemoryRecordStore(transactionSchema, rows));

    const result = await executor.fetch({ memberships: { category: ['sales'] } });

    expect(result.rows.map(row => row.id)).toEqual([1, 3, 4]);
    expect(result.rejected).toBe(2);
    expect(Object.isFrozen(result)).toBe(true);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'Rows excluded by data-quality checks',
      expect.objectContaining({ domain: 'transactions', rejected: 2, fetched: 5 })
    );
  });

  it('should not warn when every row is usable', async () => {
    const executor = new QueryExecutor(
      transactionSchema,
      new InMemoryRecordStore(transactionSchema, sampleTransactions().slice(0, 4))
    );

    const result = await executor.fetch({ memberships: {} });

    expect(result.rejected).toBe(0);
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it('should pass reporting errors from the store through unchanged', async () => {
    const unavailable = ReportingError.storeUnavailable('postgres:transactions');
    const executor = new QueryExecutor(transactionSchema, failingStore(unavailable));

    await expect(executor.fetch({ memberships: {} })).rejects.toBe(unavailable);
  });

  it('should wrap other store failures as QUERY_FAILED', async () => {
    const executor = new QueryExecutor(transactionSchema, failingStore(new Error('socket hang up')));

    await expect(executor.fetch({ memberships: {} })).rejects.toMatchObject({
      statusCode: 500,
      code: 'QUERY_FAILED',
      message: 'Query failed for transactions.findRows: socket hang up',
    });
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Record store query failed',
      expect.objectContaining({ domain: 'transactions', operation: 'findRows' })
    );
  });

  it('should wrap distinct value failures with the field name', async () => {
    const executor = new QueryExecutor(transactionSchema, failingStore('boom'));

    await expect(executor.distinctValues('category')).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      message: 'Query failed for transactions.distinctValues(category): boom',
    });
  });
});
