import type { FilterOptions, RecordSchema } from '../../domains/entities';

/**
 * De-duplicated, non-empty, ascending.
 */
export function normalizeOptionValues(values: readonly string[]): string[] {
  const unique = new Set(values.map(v => v.trim()).filter(v => v !== ''));
  return Array.from(unique).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Option lists for every filterable dimension, keyed by query parameter.
 * `distinctValues` must read the unfiltered domain data.
 */
export async function collectFilterOptions<TRecord>(
  schema: RecordSchema<TRecord>,
  distinctValues: (field: string) => Promise<string[]>
): Promise<FilterOptions> {
  const options: Record<string, readonly string[]> = {};
  for (const dimension of schema.dimensions) {
    options[dimension.param] = normalizeOptionValues(await distinctValues(dimension.field));
  }
  return options;
}
