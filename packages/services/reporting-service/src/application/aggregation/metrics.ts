import type { ComparisonWindow, MetricResult, RecordSchema, Trend } from '../../domains/entities';
import { average, summarize } from './summary';

export interface ComparisonRows<TRecord> {
  readonly window: ComparisonWindow;
  readonly rows: readonly TRecord[];
}

function numericValues<TRecord>(schema: RecordSchema<TRecord>, rows: readonly TRecord[]): number[] {
  const values: number[] = [];
  for (const row of rows) {
    const value = schema.numeric.read(row);
    if (value !== null) values.push(value);
  }
  return values;
}

export function computeTrend(currentSum: number, previousSum: number, window: ComparisonWindow): Trend {
  const change = currentSum - previousSum;
  return {
    comparisonFrom: window.from,
    comparisonTo: window.to,
    previousSum,
    change,
    changePercent: previousSum === 0 ? null : (change / Math.abs(previousSum)) * 100,
  };
}

/**
 * Count, sum, average, min and max of the numeric field. The trend is only
 * present when comparison rows are given.
 */
export function computeMetrics<TRecord>(
  schema: RecordSchema<TRecord>,
  rows: readonly TRecord[],
  comparison?: ComparisonRows<TRecord>
): MetricResult {
  const summary = summarize(numericValues(schema, rows));
  const result: MetricResult = {
    count: summary.count,
    sum: summary.sum,
    average: average(summary),
    min: summary.min,
    max: summary.max,
  };

  if (!comparison) return result;

  const previous = summarize(numericValues(schema, comparison.rows));
  return { ...result, trend: computeTrend(summary.sum, previous.sum, comparison.window) };
}
