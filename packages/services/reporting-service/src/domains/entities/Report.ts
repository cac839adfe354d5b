/**
 * Domain Entity: report results
 * Transient values built per request from a filtered row set
 */

import type { BreakdownMeasure, DomainName } from './RecordSchema';
import type { FilterWarning } from './FilterSpecification';

export type Granularity = 'day' | 'month';
export type ReportShape = 'metrics' | 'time-series' | 'breakdown' | 'list' | 'filters';

export const REPORT_SHAPES: readonly ReportShape[] = ['metrics', 'time-series', 'breakdown', 'list', 'filters'];

export interface Trend {
  readonly comparisonFrom: Date;
  readonly comparisonTo: Date;
  readonly previousSum: number;
  readonly change: number;
  /** null when the comparison window sums to zero */
  readonly changePercent: number | null;
}

export interface MetricResult {
  readonly count: number;
  readonly sum: number;
  readonly average: number;
  readonly min: number | null;
  readonly max: number | null;
  readonly trend?: Trend;
}

export interface TimeSeriesPoint {
  readonly bucketStart: Date;
  /** `YYYY-MM-DD` for days, `YYYY-MM` for months */
  readonly period: string;
  readonly count: number;
  readonly sum: number;
  readonly average: number;
  readonly min: number | null;
  readonly max: number | null;
}

export interface BreakdownEntry {
  readonly value: string;
  readonly count: number;
  readonly sum: number;
  readonly average: number;
  readonly percentage: number;
}

export interface Page<TRecord> {
  readonly items: readonly TRecord[];
  readonly totalCount: number;
  readonly page: number;
  readonly pageSize: number;
  readonly totalPages: number;
}

export type FilterOptions = Readonly<Record<string, readonly string[]>>;

interface ReportEnvelope {
  readonly domain: DomainName;
  readonly warnings: readonly FilterWarning[];
  /** Rows dropped for a missing timestamp or non-finite value */
  readonly rejected: number;
}

export interface MetricsReport extends ReportEnvelope {
  readonly shape: 'metrics';
  readonly metrics: MetricResult;
}

export interface TimeSeriesReport extends ReportEnvelope {
  readonly shape: 'time-series';
  readonly granularity: Granularity;
  readonly series: readonly TimeSeriesPoint[];
}

export interface BreakdownReport extends ReportEnvelope {
  readonly shape: 'breakdown';
  readonly dimension: string;
  readonly measure: BreakdownMeasure;
  readonly entries: readonly BreakdownEntry[];
}

export interface ListReport<TRecord> extends ReportEnvelope, Page<TRecord> {
  readonly shape: 'list';
  readonly sort: string;
  readonly direction: 'asc' | 'desc';
}

export interface FilterOptionsReport {
  readonly shape: 'filters';
  readonly domain: DomainName;
  readonly options: FilterOptions;
}

export type Report<TRecord = unknown> =
  | MetricsReport
  | TimeSeriesReport
  | BreakdownReport
  | ListReport<TRecord>
  | FilterOptionsReport;
