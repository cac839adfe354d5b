import { describe, it, expect } from 'vitest';
import { InMemoryRecordStore, matchesPredicate } from '../infrastructure/repositories/InMemoryRecordStore';
import { equipmentSchema, transactionSchema } from '../domains/entities';
import { sampleReadings, sampleTransactions } from './helpers/records';

describe('matchesPredicate', () => {
  it('should match membership on strings only', () => {
    const predicate = { kind: 'in', field: 'category', values: ['sales'] } as const;
    expect(matchesPredicate('sales', predicate)).toBe(true);
    expect(matchesPredicate('refund', predicate)).toBe(false);
    expect(matchesPredicate(null, predicate)).toBe(false);
  });

  it('should match inclusive ranges over numbers and dates', () => {
    expect(matchesPredicate(5, { kind: 'range', field: 'amount', min: 5, max: 10 })).toBe(true);
    expect(matchesPredicate(10, { kind: 'range', field: 'amount', min: 5, max: 10 })).toBe(true);
    expect(matchesPredicate(11, { kind: 'range', field: 'amount', max: 10 })).toBe(false);
    expect(
      matchesPredicate(new Date('2024-01-02T00:00:00.000Z'), {
        kind: 'range',
        field: 'date',
        min: new Date('2024-01-01T00:00:00.000Z'),
      })
    ).toBe(true);
  });

  it('should never match a missing value against a range', () => {
    expect(matchesPredicate(null, { kind: 'range', field: 'date', min: 0 })).toBe(false);
    expect(matchesPredicate(new Date('invalid'), { kind: 'range', field: 'date' })).toBe(false);
  });
});

describe('InMemoryRecordStore', () => {
  const store = new InMemoryRecordStore(transactionSchema, sampleTransactions());

  it('should return every row without predicates', async () => {
    expect(await store.findRows([])).toHaveLength(5);
    expect(store.size).toBe(5);
  });

  it('should apply every predicate', async () => {
    const rows = await store.findRows([
      { kind: 'in', field: 'category', values: ['sales'] },
      { kind: 'range', field: 'date', min: new Date('2024-01-01T00:00:00.000Z') },
    ]);
    expect(rows.map(r => r.id)).toEqual([1, 3]);
  });

  it('should list distinct string values', async () => {
    expect((await store.distinctValues('category')).sort()).toEqual(['refund', 'sales']);
    const readings = new InMemoryRecordStore(equipmentSchema, sampleReadings());
    expect((await readings.distinctValues('equipmentId')).sort()).toEqual(['MOTOR-M1', 'PUMP-A1']);
  });

  it('should fail with QUERY_FAILED for unknown fields', async () => {
    await expect(store.findRows([{ kind: 'in', field: 'colour', values: ['red'] }])).rejects.toMatchObject({
      code: 'QUERY_FAILED',
    });
    await expect(store.distinctValues('colour')).rejects.toMatchObject({ code: 'QUERY_FAILED' });
  });

  it('should always answer a ping', async () => {
    expect(await store.ping()).toBe(true);
  });
});
