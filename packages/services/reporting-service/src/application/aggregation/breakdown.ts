/**
 * Dimensional breakdown: one entry per dimension value present in the rows,
 * sorted by the primary measure descending, then by value ascending.
 */

import { findDimension, type BreakdownEntry, type BreakdownMeasure, type RecordSchema } from '../../domains/entities';
import { ReportingError } from '../errors';
import { addValue, average, emptySummary, type Summary } from './summary';

export interface BreakdownRequest {
  readonly dimension: string;
  readonly measure: BreakdownMeasure;
}

function compareValues(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Percentages are shares of the measure's total; when that total is 0 they
 * fall back to shares of the row count.
 *
 * @throws ReportingError UNKNOWN_DIMENSION
 */
export function buildBreakdown<TRecord>(
  schema: RecordSchema<TRecord>,
  rows: readonly TRecord[],
  request: BreakdownRequest
): BreakdownEntry[] {
  const dimension = findDimension(schema, request.dimension);
  if (!dimension) {
    throw ReportingError.unknownDimension(request.dimension, schema.dimensions.map(d => d.field));
  }

  const groups = new Map<string, Summary>();
  for (const row of rows) {
    const value = schema.numeric.read(row);
    if (value === null) continue;
    const key = dimension.read(row);
    let summary = groups.get(key);
    if (!summary) {
      summary = emptySummary();
      groups.set(key, summary);
    }
    addValue(summary, value);
  }

  const measureOf = (summary: Summary): number => (request.measure === 'sum' ? summary.sum : summary.count);
  const measureTotal = Array.from(groups.values()).reduce((total, summary) => total + measureOf(summary), 0);
  const countTotal = Array.from(groups.values()).reduce((total, summary) => total + summary.count, 0);
  const share = (summary: Summary): number =>
    measureTotal !== 0 ? (measureOf(summary) / measureTotal) * 100 : (summary.count / countTotal) * 100;

  return Array.from(groups, ([value, summary]) => ({
    value,
    count: summary.count,
    sum: summary.sum,
    average: average(summary),
    percentage: share(summary),
    measure: measureOf(summary),
  }))
    .sort((a, b) => b.measure - a.measure || compareValues(a.value, b.value))
    .map(({ measure: _measure, ...entry }) => entry);
}
