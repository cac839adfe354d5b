/**
 * Report-shape options read from the same raw parameters as the filter:
 * series granularity, breakdown dimension and measure, list sort and paging.
 */

import { z } from 'zod';
import {
  findDimension,
  findSortField,
  type BreakdownMeasure,
  type FilterWarning,
  type Granularity,
  type RawParams,
  type RecordSchema,
  type SortDirection,
} from '../../domains/entities';
import { ReportingError } from '../errors';
import { readSingleParam } from './raw-params';

const granularitySchema = z.enum(['day', 'month']);
const measureSchema = z.enum(['sum', 'count']);
const directionSchema = z.enum(['asc', 'desc']);
const positiveIntSchema = z.coerce.number().int().positive();

function parseEnum<T extends string>(
  raw: RawParams,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, T>,
  fallback: T,
  warnings: FilterWarning[]
): T {
  const param = readSingleParam(raw, [key], warnings);
  if (!param) return fallback;

  const result = schema.safeParse(param.value.toLowerCase());
  if (!result.success) {
    warnings.push({ param: key, value: param.value, reason: 'unrecognized value' });
    return fallback;
  }
  return result.data;
}

export function parseGranularity(raw: RawParams, warnings: FilterWarning[]): Granularity {
  return parseEnum(raw, 'group_by', granularitySchema, 'day', warnings);
}

export interface BreakdownOptions {
  readonly dimension: string;
  readonly measure: BreakdownMeasure;
}

/**
 * @throws ReportingError UNKNOWN_DIMENSION when `dimension` names no dimension of the domain
 */
export function parseBreakdownOptions<TRecord>(
  schema: RecordSchema<TRecord>,
  raw: RawParams,
  warnings: FilterWarning[]
): BreakdownOptions {
  const requested = readSingleParam(raw, ['dimension'], warnings);
  const name = requested?.value ?? schema.defaultBreakdown.dimension;
  const dimension = findDimension(schema, name);
  if (!dimension) {
    throw ReportingError.unknownDimension(name, schema.dimensions.map(d => d.field));
  }

  return {
    dimension: dimension.field,
    measure: parseEnum(raw, 'measure', measureSchema, schema.defaultBreakdown.measure, warnings),
  };
}

export interface SortRequest {
  readonly field: string;
  readonly direction: SortDirection;
}

/**
 * @throws ReportingError INVALID_SORT_FIELD when `sort` is outside the domain's allow-list
 */
export function parseSortRequest<TRecord>(
  schema: RecordSchema<TRecord>,
  raw: RawParams,
  warnings: FilterWarning[]
): SortRequest {
  const requested = readSingleParam(raw, ['sort'], warnings);
  const name = requested?.value ?? schema.defaultSort.field;
  const field = findSortField(schema, name);
  if (!field) {
    throw ReportingError.invalidSortField(name, schema.sortable);
  }

  const defaultDirection = requested ? 'asc' : schema.defaultSort.direction;
  return { field, direction: parseEnum(raw, 'direction', directionSchema, defaultDirection, warnings) };
}

export interface PageRequest {
  readonly page: number;
  readonly pageSize: number;
}

/**
 * `limit` is accepted in place of `page_size`.
 */
export function parsePageRequest(raw: RawParams, defaultPageSize: number, warnings: FilterWarning[]): PageRequest {
  const readPositive = (keys: readonly string[], fallback: number): number => {
    const param = readSingleParam(raw, keys, warnings);
    if (!param) return fallback;
    const result = positiveIntSchema.safeParse(param.value);
    if (!result.success) {
      warnings.push({ param: param.key, value: param.value, reason: 'not a positive integer' });
      return fallback;
    }
    return result.data;
  };

  return { page: readPositive(['page'], 1), pageSize: readPositive(['page_size', 'limit'], defaultPageSize) };
}
