/**
 * Reporting Engine
 *
 * One instance per domain. Each report parses the raw parameters, fetches the
 * filtered rows once (twice for a trend comparison) and hands them to the
 * aggregation or pagination step.
 */

import type {
  BreakdownReport,
  DomainName,
  FilterOptionsReport,
  FilterWarning,
  ListReport,
  MetricsReport,
  RawParams,
  RecordSchema,
  Report,
  ReportShape,
  TimeSeriesReport,
} from '../../domains/entities';
import type { IRecordStore } from '../../domains/repositories/IRecordStore';
import {
  parseBreakdownOptions,
  parseComparisonWindow,
  parseFilter,
  parseGranularity,
  parsePageRequest,
  parseSortRequest,
} from '../filters';
import { QueryExecutor } from '../query/QueryExecutor';
import {
  buildBreakdown,
  buildTimeSeries,
  collectFilterOptions,
  computeMetrics,
  type ComparisonRows,
} from '../aggregation';
import { pageRows } from '../pagination';
import { getLogger } from '../../config/service-config';

const logger = getLogger('reporting-service:engine');

export interface EngineLimits {
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
  readonly maxSeriesBuckets: number;
}

/**
 * Domain-independent view of an engine, so callers can pick one by name.
 */
export interface ReportEngine {
  readonly domain: DomainName;
  metrics(raw: RawParams): Promise<MetricsReport>;
  timeSeries(raw: RawParams): Promise<TimeSeriesReport>;
  breakdown(raw: RawParams): Promise<BreakdownReport>;
  list(raw: RawParams): Promise<ListReport<unknown>>;
  filterOptions(): Promise<FilterOptionsReport>;
  run(shape: ReportShape, raw: RawParams): Promise<Report>;
  ping(): Promise<boolean>;
}

export class ReportingEngine<TRecord> implements ReportEngine {
  private readonly executor: QueryExecutor<TRecord>;

  constructor(
    private readonly schema: RecordSchema<TRecord>,
    private readonly store: IRecordStore<TRecord>,
    private readonly limits: EngineLimits
  ) {
    this.executor = new QueryExecutor(schema, store);
  }

  get domain(): DomainName {
    return this.schema.domain;
  }

  async metrics(raw: RawParams): Promise<MetricsReport> {
    const { filter, warnings: filterWarnings } = parseFilter(this.schema, raw);
    const warnings: FilterWarning[] = [...filterWarnings];
    const window = parseComparisonWindow(raw, filter, warnings);

    const rowSet = await this.executor.fetch(filter);
    let rejected = rowSet.rejected;

    let comparison: ComparisonRows<TRecord> | undefined;
    if (window) {
      const previous = await this.executor.fetch({ ...filter, dateFrom: window.from, dateTo: window.to });
      rejected += previous.rejected;
      comparison = { window, rows: previous.rows };
    }

    this.logWarnings('metrics', warnings);
    return {
      shape: 'metrics',
      domain: this.domain,
      warnings,
      rejected,
      metrics: computeMetrics(this.schema, rowSet.rows, comparison),
    };
  }

  async timeSeries(raw: RawParams): Promise<TimeSeriesReport> {
    const { filter, warnings: filterWarnings } = parseFilter(this.schema, raw);
    const warnings: FilterWarning[] = [...filterWarnings];
    const granularity = parseGranularity(raw, warnings);

    const rowSet = await this.executor.fetch(filter);
    const series = buildTimeSeries(this.schema, rowSet.rows, {
      granularity,
      dateFrom: filter.dateFrom,
      dateTo: filter.dateTo,
      maxBuckets: this.limits.maxSeriesBuckets,
    });

    this.logWarnings('time-series', warnings);
    return { shape: 'time-series', domain: this.domain, warnings, rejected: rowSet.rejected, granularity, series };
  }

  async breakdown(raw: RawParams): Promise<BreakdownReport> {
    const { filter, warnings: filterWarnings } = parseFilter(this.schema, raw);
    const warnings: FilterWarning[] = [...filterWarnings];
    const options = parseBreakdownOptions(this.schema, raw, warnings);

    const rowSet = await this.executor.fetch(filter);
    const entries = buildBreakdown(this.schema, rowSet.rows, options);

    this.logWarnings('breakdown', warnings);
    return {
      shape: 'breakdown',
      domain: this.domain,
      warnings,
      rejected: rowSet.rejected,
      dimension: options.dimension,
      measure: options.measure,
      entries,
    };
  }

  async list(raw: RawParams): Promise<ListReport<TRecord>> {
    const { filter, warnings: filterWarnings } = parseFilter(this.schema, raw);
    const warnings: FilterWarning[] = [...filterWarnings];
    const sort = parseSortRequest(this.schema, raw, warnings);
    const pageRequest = parsePageRequest(raw, this.limits.defaultPageSize, warnings);

    const rowSet = await this.executor.fetch(filter);
    const page = pageRows(this.schema, rowSet.rows, {
      sortField: sort.field,
      direction: sort.direction,
      page: pageRequest.page,
      pageSize: pageRequest.pageSize,
      maxPageSize: this.limits.maxPageSize,
    });

    this.logWarnings('list', warnings);
    return {
      shape: 'list',
      domain: this.domain,
      warnings,
      rejected: rowSet.rejected,
      sort: sort.field,
      direction: sort.direction,
      ...page,
    };
  }

  async filterOptions(): Promise<FilterOptionsReport> {
    const options = await collectFilterOptions(this.schema, field => this.executor.distinctValues(field));
    return { shape: 'filters', domain: this.domain, options };
  }

  run(shape: ReportShape, raw: RawParams): Promise<Report<TRecord>> {
    switch (shape) {
      case 'metrics':
        return this.metrics(raw);
      case 'time-series':
        return this.timeSeries(raw);
      case 'breakdown':
        return this.breakdown(raw);
      case 'list':
        return this.list(raw);
      case 'filters':
        return this.filterOptions();
    }
  }

  ping(): Promise<boolean> {
    return this.store.ping();
  }

  private logWarnings(report: ReportShape, warnings: readonly FilterWarning[]): void {
    if (warnings.length === 0) return;
    logger.warn('Dropped malformed request parameters', { domain: this.domain, report, warnings });
  }
}
