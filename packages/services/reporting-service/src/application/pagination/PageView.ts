/**
 * Pagination/Sort View
 *
 * Orders a filtered row set and slices one page out of it. Sorting is stable
 * and puts missing values last whichever the direction.
 */

import type { FieldValue, Page, RecordSchema, SortDirection } from '../../domains/entities';
import { ReportingError } from '../errors';

export interface PageOptions {
  readonly sortField: string;
  readonly direction: SortDirection;
  /** 1-based */
  readonly page: number;
  readonly pageSize: number;
  readonly maxPageSize: number;
}

function isMissing(value: FieldValue): value is null | undefined {
  return value === null || value === undefined || (value instanceof Date && Number.isNaN(value.getTime()));
}

function sortKey(value: string | number | Date): string | number {
  return value instanceof Date ? value.getTime() : value;
}

export function compareFieldValues(a: FieldValue, b: FieldValue, direction: SortDirection): number {
  if (isMissing(a)) return isMissing(b) ? 0 : 1;
  if (isMissing(b)) return -1;

  const left = sortKey(a);
  const right = sortKey(b);
  let order = 0;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else {
    const l = String(left);
    const r = String(right);
    order = l < r ? -1 : l > r ? 1 : 0;
  }
  return direction === 'asc' ? order : -order;
}

/**
 * @throws ReportingError INVALID_SORT_FIELD when `sortField` is not in the schema's allow-list
 */
export function sortRows<TRecord>(
  schema: RecordSchema<TRecord>,
  rows: readonly TRecord[],
  sortField: string,
  direction: SortDirection
): TRecord[] {
  const read = schema.fields[sortField];
  if (!schema.sortable.includes(sortField) || !read) {
    throw ReportingError.invalidSortField(sortField, schema.sortable);
  }
  // Array.prototype.sort is stable
  return [...rows].sort((a, b) => compareFieldValues(read(a), read(b), direction));
}

export function pageRows<TRecord>(
  schema: RecordSchema<TRecord>,
  rows: readonly TRecord[],
  options: PageOptions
): Page<TRecord> {
  const pageSize = Math.min(Math.max(1, Math.floor(options.pageSize)), options.maxPageSize);
  const page = Math.max(1, Math.floor(options.page));
  const sorted = sortRows(schema, rows, options.sortField, options.direction);

  const offset = (page - 1) * pageSize;
  return {
    items: sorted.slice(offset, offset + pageSize),
    totalCount: sorted.length,
    page,
    pageSize,
    totalPages: Math.ceil(sorted.length / pageSize),
  };
}
