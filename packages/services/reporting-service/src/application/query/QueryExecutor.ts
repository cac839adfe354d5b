/**
 * Query Executor
 *
 * The only component that talks to the record store. Translates a filter into
 * field predicates, fetches the matching rows and sets aside rows that fail
 * data-quality checks.
 */

import { serializeError } from '@opsdash/platform-core';
import type { FilterSpecification, RecordSchema } from '../../domains/entities';
import type { FieldPredicate, IRecordStore } from '../../domains/repositories/IRecordStore';
import { ReportingError } from '../errors';
import { getLogger } from '../../config/service-config';

const logger = getLogger('reporting-service:query-executor');

export interface RowSet<TRecord> {
  /** Rows with a valid timestamp and a finite numeric value, in store order */
  readonly rows: readonly TRecord[];
  readonly rejected: number;
}

export function toPredicates<TRecord>(schema: RecordSchema<TRecord>, filter: FilterSpecification): FieldPredicate[] {
  const predicates: FieldPredicate[] = [];

  if (filter.dateFrom || filter.dateTo) {
    predicates.push({ kind: 'range', field: schema.temporal.field, min: filter.dateFrom, max: filter.dateTo });
  }

  for (const dimension of schema.dimensions) {
    const values = filter.memberships[dimension.field];
    if (values && values.length > 0) {
      predicates.push({ kind: 'in', field: dimension.field, values });
    }
  }

  if (filter.minValue !== undefined || filter.maxValue !== undefined) {
    predicates.push({ kind: 'range', field: schema.numeric.field, min: filter.minValue, max: filter.maxValue });
  }

  return predicates;
}

export function isUsableRow<TRecord>(schema: RecordSchema<TRecord>, row: TRecord): boolean {
  const timestamp = schema.temporal.read(row);
  const value = schema.numeric.read(row);
  return (
    timestamp instanceof Date &&
    !Number.isNaN(timestamp.getTime()) &&
    typeof value === 'number' &&
    Number.isFinite(value)
  );
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export class QueryExecutor<TRecord> {
  constructor(
    private readonly schema: RecordSchema<TRecord>,
    private readonly store: IRecordStore<TRecord>
  ) {}

  /**
   * @throws ReportingError STORE_UNAVAILABLE or QUERY_FAILED; never retried here
   */
  async fetch(filter: FilterSpecification): Promise<RowSet<TRecord>> {
    const predicates = toPredicates(this.schema, filter);

    let fetched: TRecord[];
    try {
      fetched = await this.store.findRows(predicates);
    } catch (error) {
      throw this.wrapStoreError(error, 'findRows');
    }

    const rows = fetched.filter(row => isUsableRow(this.schema, row));
    const rejected = fetched.length - rows.length;
    if (rejected > 0) {
      logger.warn('Rows excluded by data-quality checks', {
        domain: this.schema.domain,
        rejected,
        fetched: fetched.length,
      });
    }

    return Object.freeze({ rows: Object.freeze(rows), rejected });
  }

  /**
   * Distinct values of a field over the whole, unfiltered domain.
   */
  async distinctValues(field: string): Promise<string[]> {
    try {
      return await this.store.distinctValues(field);
    } catch (error) {
      throw this.wrapStoreError(error, `distinctValues(${field})`);
    }
  }

  private wrapStoreError(error: unknown, operation: string): ReportingError {
    if (error instanceof ReportingError) return error;

    logger.error('Record store query failed', {
      domain: this.schema.domain,
      operation,
      error: serializeError(error),
    });
    return ReportingError.queryFailed(
      `${this.schema.domain}.${operation}`,
      error instanceof Error ? error.message : String(error),
      toError(error)
    );
  }
}
