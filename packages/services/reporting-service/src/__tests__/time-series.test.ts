import { describe, it, expect } from 'vitest';
import {
  bucketStart,
  buildTimeSeries,
  computeMetrics,
  countBuckets,
  formatPeriod,
  nextBucket,
} from '../application/aggregation';
import { parseFilter } from '../application/filters';
import { transactionSchema } from '../domains/entities';
import { caught, transaction } from './helpers/records';

const jan = (day: number, time = '12:00:00') => new Date(`2024-01-${String(day).padStart(2, '0')}T${time}.000Z`);

describe('time bucketing', () => {
  it('should truncate to the UTC day or month', () => {
    expect(bucketStart(new Date('2024-03-15T23:59:00.000Z'), 'day')).toEqual(new Date('2024-03-15T00:00:00.000Z'));
    expect(bucketStart(new Date('2024-03-15T23:59:00.000Z'), 'month')).toEqual(new Date('2024-03-01T00:00:00.000Z'));
  });

  it('should keep years below 100 as given', () => {
    expect(bucketStart(new Date('0050-06-15T08:00:00.000Z'), 'day')).toEqual(new Date('0050-06-15T00:00:00.000Z'));
    expect(bucketStart(new Date('0050-06-15T08:00:00.000Z'), 'month')).toEqual(new Date('0050-06-01T00:00:00.000Z'));
    expect(nextBucket(new Date('0099-12-01T00:00:00.000Z'), 'month')).toEqual(new Date('0100-01-01T00:00:00.000Z'));
  });

  it('should format periods', () => {
    expect(formatPeriod(new Date('2024-03-01T00:00:00.000Z'), 'day')).toBe('2024-03-01');
    expect(formatPeriod(new Date('2024-03-01T00:00:00.000Z'), 'month')).toBe('2024-03');
  });

  it('should count buckets inclusively', () => {
    expect(countBuckets(jan(1, '00:00:00'), jan(3, '00:00:00'), 'day')).toBe(3);
    expect(countBuckets(new Date('2023-11-01T00:00:00.000Z'), new Date('2024-02-01T00:00:00.000Z'), 'month')).toBe(4);
  });
});

describe('buildTimeSeries', () => {
  it('should fill empty days between the range bounds with zeros', () => {
    const rows = [
      transaction({ date: jan(1, '09:00:00'), amount: 4 }),
      transaction({ date: jan(1, '18:00:00'), amount: 6 }),
      transaction({ date: jan(3), amount: 5 }),
    ];

    const series = buildTimeSeries(transactionSchema, rows, {
      granularity: 'day',
      dateFrom: jan(1, '00:00:00'),
      dateTo: new Date('2024-01-03T23:59:59.999Z'),
      maxBuckets: 3660,
    });

    expect(series.map(p => [p.period, p.sum])).toEqual([
      ['2024-01-01', 10],
      ['2024-01-02', 0],
      ['2024-01-03', 5],
    ]);
    expect(series[0]).toEqual({
      bucketStart: jan(1, '00:00:00'),
      period: '2024-01-01',
      count: 2,
      sum: 10,
      average: 5,
      min: 4,
      max: 6,
    });
    expect(series[1]).toMatchObject({ count: 0, average: 0, min: null, max: null });
  });

  it('should stay contiguous across the year 99 to 100 boundary', () => {
    const { filter } = parseFilter(transactionSchema, { date_from: '0099-12-30', date_to: '0100-01-02' });
    const rows = [transaction({ date: new Date('0099-12-31T12:00:00.000Z'), amount: 7 })];

    const series = buildTimeSeries(transactionSchema, rows, {
      granularity: 'day',
      dateFrom: filter.dateFrom,
      dateTo: filter.dateTo,
      maxBuckets: 3660,
    });

    expect(series.map(p => [p.period, p.sum])).toEqual([
      ['0099-12-30', 0],
      ['0099-12-31', 7],
      ['0100-01-01', 0],
      ['0100-01-02', 0],
    ]);
  });

  it('should fall back to the data bounds when the range is open', () => {
    const rows = [
      transaction({ date: new Date('2024-01-15T00:00:00.000Z'), amount: 10 }),
      transaction({ date: new Date('2024-03-02T00:00:00.000Z'), amount: 5 }),
    ];

    const series = buildTimeSeries(transactionSchema, rows, { granularity: 'month', maxBuckets: 3660 });

    expect(series.map(p => [p.period, p.sum])).toEqual([
      ['2024-01', 10],
      ['2024-02', 0],
      ['2024-03', 5],
    ]);
  });

  it('should be empty when there are no rows and no complete range', () => {
    expect(buildTimeSeries(transactionSchema, [], { granularity: 'day', maxBuckets: 3660 })).toEqual([]);
    expect(buildTimeSeries(transactionSchema, [], { granularity: 'day', dateFrom: jan(1), maxBuckets: 3660 })).toEqual(
      []
    );
  });

  it('should produce zero buckets for a complete range without rows', () => {
    const series = buildTimeSeries(transactionSchema, [], {
      granularity: 'day',
      dateFrom: jan(1, '00:00:00'),
      dateTo: jan(2, '00:00:00'),
      maxBuckets: 3660,
    });
    expect(series.map(p => p.count)).toEqual([0, 0]);
  });

  it('should keep buckets contiguous and its total equal to the metrics sum', () => {
    const rows = [1, 4, 4, 9].map((day, i) => transaction({ id: i + 1, date: jan(day), amount: day * 2 }));
    const series = buildTimeSeries(transactionSchema, rows, { granularity: 'day', maxBuckets: 3660 });

    expect(series).toHaveLength(9);
    for (let i = 1; i < series.length; i++) {
      expect(series[i].bucketStart.getTime() - series[i - 1].bucketStart.getTime()).toBe(24 * 60 * 60 * 1000);
    }
    const total = series.reduce((sum, point) => sum + point.sum, 0);
    expect(total).toBe(computeMetrics(transactionSchema, rows).sum);
  });

  it('should fail with RANGE_TOO_LARGE beyond the bucket limit', () => {
    const error = caught(() =>
      buildTimeSeries(transactionSchema, [], {
        granularity: 'day',
        dateFrom: jan(1, '00:00:00'),
        dateTo: new Date('2024-01-10T00:00:00.000Z'),
        maxBuckets: 5,
      })
    );
    expect(error).toMatchObject({ code: 'RANGE_TOO_LARGE', details: { buckets: 10, maxBuckets: 5 } });
  });
});
