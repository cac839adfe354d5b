/**
 * Domain Entity: FilterSpecification
 * Validated, immutable constraints of one request. Membership keys are record property names.
 */

export interface FilterSpecification {
  readonly dateFrom?: Date;
  readonly dateTo?: Date;
  readonly memberships: Readonly<Record<string, readonly string[]>>;
  readonly minValue?: number;
  readonly maxValue?: number;
}

export interface FilterWarning {
  readonly param: string;
  readonly value: string;
  readonly reason: string;
}

export interface ParsedFilter {
  readonly filter: FilterSpecification;
  readonly warnings: readonly FilterWarning[];
}

export interface ComparisonWindow {
  readonly from: Date;
  readonly to: Date;
}

/** Raw request parameters, e.g. an Express query object */
export type RawParams = Readonly<Record<string, unknown>>;
