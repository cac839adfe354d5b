/**
 * Store contract for one domain's records.
 * Implementations raise ReportingError STORE_UNAVAILABLE when the backend cannot be reached.
 */

export type RangeBound = number | Date;

export type FieldPredicate =
  | { readonly kind: 'range'; readonly field: string; readonly min?: RangeBound; readonly max?: RangeBound }
  | { readonly kind: 'in'; readonly field: string; readonly values: readonly string[] };

export interface IRecordStore<TRecord> {
  /** Rows matching every predicate; no implicit limit */
  findRows(predicates: readonly FieldPredicate[]): Promise<TRecord[]>;
  distinctValues(field: string): Promise<string[]>;
  ping(): Promise<boolean>;
}
