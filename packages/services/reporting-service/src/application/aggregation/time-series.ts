/**
 * Time-bucketed series over the temporal field, gap-filled so every bucket
 * between the range bounds appears, ascending.
 */

import type { Granularity, RecordSchema, TimeSeriesPoint } from '../../domains/entities';
import { ReportingError } from '../errors';
import { addValue, average, emptySummary, type Summary } from './summary';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TimeSeriesOptions {
  readonly granularity: Granularity;
  readonly dateFrom?: Date;
  readonly dateTo?: Date;
  readonly maxBuckets: number;
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear takes the year as given.
function utcMidnight(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  return date;
}

export function bucketStart(date: Date, granularity: Granularity): Date {
  return granularity === 'month'
    ? utcMidnight(date.getUTCFullYear(), date.getUTCMonth(), 1)
    : utcMidnight(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function nextBucket(start: Date, granularity: Granularity): Date {
  return granularity === 'month'
    ? utcMidnight(start.getUTCFullYear(), start.getUTCMonth() + 1, 1)
    : new Date(start.getTime() + DAY_MS);
}

export function formatPeriod(start: Date, granularity: Granularity): string {
  const iso = start.toISOString();
  return granularity === 'month' ? iso.slice(0, 7) : iso.slice(0, 10);
}

export function countBuckets(first: Date, last: Date, granularity: Granularity): number {
  if (granularity === 'month') {
    return (
      (last.getUTCFullYear() - first.getUTCFullYear()) * 12 + (last.getUTCMonth() - first.getUTCMonth()) + 1
    );
  }
  return Math.round((last.getTime() - first.getTime()) / DAY_MS) + 1;
}

function timestampBounds<TRecord>(
  schema: RecordSchema<TRecord>,
  rows: readonly TRecord[]
): { min: Date; max: Date } | undefined {
  let min: Date | undefined;
  let max: Date | undefined;
  for (const row of rows) {
    const timestamp = schema.temporal.read(row);
    if (!timestamp) continue;
    if (!min || timestamp.getTime() < min.getTime()) min = timestamp;
    if (!max || timestamp.getTime() > max.getTime()) max = timestamp;
  }
  return min && max ? { min, max } : undefined;
}

/**
 * Missing range bounds fall back to the earliest/latest timestamp in `rows`;
 * with no rows and no complete range the series is empty.
 *
 * @throws ReportingError RANGE_TOO_LARGE when the range spans more than `maxBuckets` buckets
 */
export function buildTimeSeries<TRecord>(
  schema: RecordSchema<TRecord>,
  rows: readonly TRecord[],
  options: TimeSeriesOptions
): TimeSeriesPoint[] {
  const { granularity } = options;
  const bounds = timestampBounds(schema, rows);
  const from = options.dateFrom ?? bounds?.min;
  const to = options.dateTo ?? bounds?.max;
  if (!from || !to || from.getTime() > to.getTime()) return [];

  const first = bucketStart(from, granularity);
  const last = bucketStart(to, granularity);
  const bucketCount = countBuckets(first, last, granularity);
  if (bucketCount > options.maxBuckets) {
    throw ReportingError.rangeTooLarge(bucketCount, options.maxBuckets);
  }

  const buckets = new Map<number, Summary>();
  for (let start = first; start.getTime() <= last.getTime(); start = nextBucket(start, granularity)) {
    buckets.set(start.getTime(), emptySummary());
  }

  for (const row of rows) {
    const timestamp = schema.temporal.read(row);
    const value = schema.numeric.read(row);
    if (!timestamp || value === null) continue;
    const summary = buckets.get(bucketStart(timestamp, granularity).getTime());
    if (summary) addValue(summary, value);
  }

  return Array.from(buckets, ([start, summary]) => {
    const bucket = new Date(start);
    return {
      bucketStart: bucket,
      period: formatPeriod(bucket, granularity),
      count: summary.count,
      sum: summary.sum,
      average: average(summary),
      min: summary.min,
      max: summary.max,
    };
  });
}
