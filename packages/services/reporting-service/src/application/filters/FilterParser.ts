/**
 * Filter Parser
 *
 * Turns raw request parameters into a frozen FilterSpecification. Malformed
 * values are dropped with a warning; inverted ranges fail with INVALID_RANGE.
 */

import { z } from 'zod';
import type {
  ComparisonWindow,
  FilterSpecification,
  FilterWarning,
  ParsedFilter,
  RawParams,
  RecordSchema,
} from '../../domains/entities';
import { ReportingError } from '../errors';
import { readParam, readSingleParam, warnDropped } from './raw-params';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DATE_FROM_KEYS = ['date_from', 'start_date'] as const;
export const DATE_TO_KEYS = ['date_to', 'end_date'] as const;

const isoDateSchema = z.string().date();
const isoDateTimeSchema = z.string().datetime({ offset: true, local: true });

const ZONE_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/;

interface ParsedTimestamp {
  date: Date;
  dateOnly: boolean;
}

// '2024-01-01 10:30' -> '2024-01-01T10:30:00'
function normalizeDateTime(value: string): string {
  const withSeparator = value.replace(' ', 'T');
  return withSeparator.replace(/(T\d{2}:\d{2})(?=$|[.Z+-])/, '$1:00');
}

function toUtcDateTimeString(value: string): string {
  const millis = value.replace(/\.(\d+)/, (_, fraction: string) => `.${fraction.slice(0, 3).padEnd(3, '0')}`);
  if (!ZONE_SUFFIX.test(millis)) return `${millis}Z`;
  return millis.replace(
    /([+-]\d{2}):?(\d{2})?$/,
    (_, hours: string, minutes: string | undefined) => `${hours}:${minutes ?? '00'}`
  );
}

/**
 * ISO-8601 date or datetime. Datetimes without an offset are read as UTC.
 */
export function parseTimestamp(value: string): ParsedTimestamp | undefined {
  if (isoDateSchema.safeParse(value).success) {
    return { date: new Date(`${value}T00:00:00.000Z`), dateOnly: true };
  }

  const normalized = normalizeDateTime(value);
  if (!isoDateTimeSchema.safeParse(normalized).success) return undefined;

  const date = new Date(toUtcDateTimeString(normalized));
  return Number.isNaN(date.getTime()) ? undefined : { date, dateOnly: false };
}

const timestampSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not an ISO date or datetime' });
      return z.NEVER;
    }
    return parsed;
  });

const numberSchema = z.string().trim().min(1).pipe(z.coerce.number().finite('not a finite number'));

const dimensionValueSchema = z.string().trim().min(1, 'empty value').max(100, 'value longer than 100 characters');

function issueReason(error: z.ZodError): string {
  return error.errors.map(e => e.message).join('; ');
}

function parseSingle<T>(
  raw: RawParams,
  keys: readonly string[],
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  warnings: FilterWarning[]
): T | undefined {
  const param = readSingleParam(raw, keys, warnings);
  if (!param) return undefined;

  const result = schema.safeParse(param.value);
  if (!result.success) {
    warnings.push({ param: param.key, value: param.value, reason: issueReason(result.error) });
    return undefined;
  }
  return result.data;
}

function endOfUtcDay(day: Date): Date {
  return new Date(day.getTime() + DAY_MS - 1);
}

function parseBound(
  raw: RawParams,
  keys: readonly string[],
  warnings: FilterWarning[],
  upper: boolean
): Date | undefined {
  const parsed = parseSingle(raw, keys, timestampSchema, warnings);
  if (!parsed) return undefined;
  return upper && parsed.dateOnly ? endOfUtcDay(parsed.date) : parsed.date;
}

function parseMemberships<TRecord>(
  schema: RecordSchema<TRecord>,
  raw: RawParams,
  warnings: FilterWarning[]
): Record<string, readonly string[]> {
  const memberships: Record<string, readonly string[]> = {};

  for (const dimension of schema.dimensions) {
    const param = readParam(raw, [dimension.param]);
    if (!param) continue;
    warnDropped(param, warnings);

    const accepted: string[] = [];
    for (const value of param.values) {
      const result = dimensionValueSchema.safeParse(value);
      if (!result.success) {
        if (value.trim() !== '') {
          warnings.push({ param: param.key, value, reason: issueReason(result.error) });
        }
        continue;
      }
      if (dimension.allowedValues && !dimension.allowedValues.includes(result.data)) {
        warnings.push({ param: param.key, value: result.data, reason: 'unrecognized value' });
        continue;
      }
      if (!accepted.includes(result.data)) accepted.push(result.data);
    }

    if (accepted.length > 0) {
      memberships[dimension.field] = Object.freeze(accepted);
    }
  }

  return memberships;
}

/**
 * Parse raw request parameters for one domain.
 *
 * @throws ReportingError INVALID_RANGE when date_from > date_to or min_value > max_value
 */
export function parseFilter<TRecord>(schema: RecordSchema<TRecord>, raw: RawParams): ParsedFilter {
  const warnings: FilterWarning[] = [];

  const dateFrom = parseBound(raw, DATE_FROM_KEYS, warnings, false);
  const dateTo = parseBound(raw, DATE_TO_KEYS, warnings, true);
  if (dateFrom && dateTo && dateFrom.getTime() > dateTo.getTime()) {
    throw ReportingError.invalidRange(schema.temporal.field, dateFrom.toISOString(), dateTo.toISOString());
  }

  const minValue = parseSingle(raw, ['min_value'], numberSchema, warnings);
  const maxValue = parseSingle(raw, ['max_value'], numberSchema, warnings);
  if (minValue !== undefined && maxValue !== undefined && minValue > maxValue) {
    throw ReportingError.invalidRange(schema.numeric.field, minValue, maxValue);
  }

  const filter: FilterSpecification = {
    ...(dateFrom && { dateFrom }),
    ...(dateTo && { dateTo }),
    memberships: Object.freeze(parseMemberships(schema, raw, warnings)),
    ...(minValue !== undefined && { minValue }),
    ...(maxValue !== undefined && { maxValue }),
  };

  return Object.freeze({ filter: Object.freeze(filter), warnings: Object.freeze(warnings) });
}

/**
 * Comparison window for the metrics trend. Explicit `compare_from`/`compare_to`
 * win over `compare=previous`, which takes the equal-length window right before
 * the filter's date range. No window means no trend.
 */
export function parseComparisonWindow(
  raw: RawParams,
  filter: FilterSpecification,
  warnings: FilterWarning[]
): ComparisonWindow | undefined {
  const hasExplicit = raw.compare_from !== undefined || raw.compare_to !== undefined;
  if (hasExplicit) {
    const from = parseBound(raw, ['compare_from'], warnings, false);
    const to = parseBound(raw, ['compare_to'], warnings, true);
    if (!from || !to) {
      warnings.push({
        param: from ? 'compare_to' : 'compare_from',
        value: '',
        reason: 'compare_from and compare_to must both be given',
      });
      return undefined;
    }
    if (from.getTime() > to.getTime()) {
      throw ReportingError.invalidRange('compare', from.toISOString(), to.toISOString());
    }
    return { from, to };
  }

  const mode = readSingleParam(raw, ['compare'], warnings);
  if (!mode) return undefined;
  if (mode.value !== 'previous') {
    warnings.push({ param: 'compare', value: mode.value, reason: 'unrecognized value' });
    return undefined;
  }
  if (!filter.dateFrom || !filter.dateTo) {
    throw ReportingError.invalidComparison('compare=previous requires date_from and date_to');
  }

  const length = filter.dateTo.getTime() - filter.dateFrom.getTime() + 1;
  return {
    from: new Date(filter.dateFrom.getTime() - length),
    to: new Date(filter.dateFrom.getTime() - 1),
  };
}
