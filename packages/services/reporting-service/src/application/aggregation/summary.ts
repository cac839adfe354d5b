/**
 * Running count/sum/min/max over numeric values.
 */

export interface Summary {
  count: number;
  sum: number;
  min: number | null;
  max: number | null;
}

export function emptySummary(): Summary {
  return { count: 0, sum: 0, min: null, max: null };
}

export function addValue(summary: Summary, value: number): void {
  summary.count += 1;
  summary.sum += value;
  summary.min = summary.min === null ? value : Math.min(summary.min, value);
  summary.max = summary.max === null ? value : Math.max(summary.max, value);
}

export function average(summary: Summary): number {
  return summary.count === 0 ? 0 : summary.sum / summary.count;
}

export function summarize(values: Iterable<number>): Summary {
  const summary = emptySummary();
  for (const value of values) addValue(summary, value);
  return summary;
}
