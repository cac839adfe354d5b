/**
 * Domain Entity: RecordSchema
 * Describes which fields of a domain record play the temporal, numeric,
 * dimension and status roles, so one engine can serve every domain.
 */

export const DOMAIN_NAMES = ['transactions', 'equipment'] as const;
export type DomainName = (typeof DOMAIN_NAMES)[number];

export type FieldValue = string | number | Date | null | undefined;
export type SortDirection = 'asc' | 'desc';
export type BreakdownMeasure = 'sum' | 'count';

export interface DimensionField<TRecord> {
  /** Record property, e.g. `equipmentId` */
  readonly field: string;
  /** Query parameter, e.g. `equipment_id` */
  readonly param: string;
  readonly read: (row: TRecord) => string;
  /** Closed value set; values outside it are dropped from filters */
  readonly allowedValues?: readonly string[];
}

export interface RecordSchema<TRecord> {
  readonly domain: DomainName;
  readonly temporal: { readonly field: string; readonly read: (row: TRecord) => Date | null };
  readonly numeric: { readonly field: string; readonly read: (row: TRecord) => number | null };
  /** Filterable and breakdown-able fields, status included */
  readonly dimensions: readonly DimensionField<TRecord>[];
  readonly statusField: string;
  /** Every readable field by record property name */
  readonly fields: Readonly<Record<string, (row: TRecord) => FieldValue>>;
  readonly sortable: readonly string[];
  readonly defaultSort: { readonly field: string; readonly direction: SortDirection };
  readonly defaultBreakdown: { readonly dimension: string; readonly measure: BreakdownMeasure };
}

export function isDomainName(value: string): value is DomainName {
  return DOMAIN_NAMES.some(name => name === value);
}

/**
 * Look up a dimension by record property or query parameter name.
 */
export function findDimension<TRecord>(
  schema: RecordSchema<TRecord>,
  name: string
): DimensionField<TRecord> | undefined {
  return schema.dimensions.find(d => d.field === name || d.param === name);
}

/**
 * Sortable record property named either as the property (`customerId`) or in
 * query-parameter style (`customer_id`).
 */
export function findSortField<TRecord>(schema: RecordSchema<TRecord>, name: string): string | undefined {
  const property = name.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
  return schema.sortable.find(field => field === name || field === property);
}
