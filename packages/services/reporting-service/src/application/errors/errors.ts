import { DomainErrorCode, createDomainServiceError } from '@opsdash/platform-core';

const ReportingDomainCodes = {
  INVALID_RANGE: 'INVALID_RANGE',
  INVALID_SORT_FIELD: 'INVALID_SORT_FIELD',
  RANGE_TOO_LARGE: 'RANGE_TOO_LARGE',
  UNKNOWN_DOMAIN: 'UNKNOWN_DOMAIN',
  UNKNOWN_DIMENSION: 'UNKNOWN_DIMENSION',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  QUERY_FAILED: 'QUERY_FAILED',
} as const;

export const ReportingErrorCode = { ...DomainErrorCode, ...ReportingDomainCodes } as const;
export type ReportingErrorCodeType = (typeof ReportingErrorCode)[keyof typeof ReportingErrorCode];

export type ReportingErrorKind =
  | 'InvalidRange'
  | 'InvalidSortField'
  | 'RangeTooLarge'
  | 'UnknownDomain'
  | 'UnknownDimension'
  | 'StoreUnavailable'
  | 'QueryFailed';

const ReportingErrorBase = createDomainServiceError<ReportingErrorCodeType>('Reporting', ReportingErrorCode);

export class ReportingError extends ReportingErrorBase {
  /** ValidationError for 4xx, ExecutionError otherwise */
  get category(): 'ValidationError' | 'ExecutionError' {
    return this.statusCode < 500 ? 'ValidationError' : 'ExecutionError';
  }

  static invalidRange(field: string, from: unknown, to: unknown) {
    return new ReportingError(
      `Invalid range for ${field}: lower bound is after upper bound`,
      400,
      ReportingErrorCode.INVALID_RANGE,
      undefined,
      { kind: 'InvalidRange', field, from, to }
    );
  }

  static invalidSortField(field: string, allowed: readonly string[]) {
    return new ReportingError(`Cannot sort by ${field}`, 400, ReportingErrorCode.INVALID_SORT_FIELD, undefined, {
      kind: 'InvalidSortField',
      field,
      allowed: [...allowed],
    });
  }

  static rangeTooLarge(buckets: number, maxBuckets: number) {
    return new ReportingError(
      `Time series would contain ${buckets} buckets, more than the allowed ${maxBuckets}`,
      400,
      ReportingErrorCode.RANGE_TOO_LARGE,
      undefined,
      { kind: 'RangeTooLarge', buckets, maxBuckets }
    );
  }

  static unknownDomain(domain: string, known: readonly string[]) {
    return new ReportingError(`Unknown domain: ${domain}`, 400, ReportingErrorCode.UNKNOWN_DOMAIN, undefined, {
      kind: 'UnknownDomain',
      domain,
      known: [...known],
    });
  }

  static unknownDimension(dimension: string, known: readonly string[]) {
    return new ReportingError(`Unknown dimension: ${dimension}`, 400, ReportingErrorCode.UNKNOWN_DIMENSION, undefined, {
      kind: 'UnknownDimension',
      dimension,
      known: [...known],
    });
  }

  static invalidComparison(reason: string) {
    return new ReportingError(`Invalid comparison window: ${reason}`, 400, ReportingErrorCode.VALIDATION_ERROR, undefined, {
      field: 'compare',
    });
  }

  static storeUnavailable(store: string, cause?: Error) {
    return new ReportingError(`Record store unavailable: ${store}`, 503, ReportingErrorCode.STORE_UNAVAILABLE, cause, {
      kind: 'StoreUnavailable',
      store,
    });
  }

  static queryFailed(operation: string, reason: string, cause?: Error) {
    return new ReportingError(`Query failed for ${operation}: ${reason}`, 500, ReportingErrorCode.QUERY_FAILED, cause, {
      kind: 'QueryFailed',
      operation,
    });
  }
}

const ERROR_KINDS: readonly ReportingErrorKind[] = [
  'InvalidRange',
  'InvalidSortField',
  'RangeTooLarge',
  'UnknownDomain',
  'UnknownDimension',
  'StoreUnavailable',
  'QueryFailed',
];

export function errorKind(error: unknown): ReportingErrorKind | undefined {
  if (!(error instanceof ReportingError) || !error.details) return undefined;
  const kind = error.details.kind;
  return ERROR_KINDS.find(k => k === kind);
}
