/**
 * In-memory record store, used by tests and by development runs without a database.
 */

import type { FieldValue, RecordSchema } from '../../domains/entities';
import type { FieldPredicate, IRecordStore, RangeBound } from '../../domains/repositories/IRecordStore';
import { ReportingError } from '../../application/errors';

function toComparable(value: FieldValue | RangeBound): number | undefined {
  if (value instanceof Date) return value.getTime();
  return typeof value === 'number' ? value : undefined;
}

export function matchesPredicate(value: FieldValue, predicate: FieldPredicate): boolean {
  if (predicate.kind === 'in') {
    return typeof value === 'string' && predicate.values.includes(value);
  }

  const comparable = toComparable(value);
  if (comparable === undefined || Number.isNaN(comparable)) return false;
  const min = predicate.min === undefined ? undefined : toComparable(predicate.min);
  const max = predicate.max === undefined ? undefined : toComparable(predicate.max);
  return (min === undefined || comparable >= min) && (max === undefined || comparable <= max);
}

export class InMemoryRecordStore<TRecord> implements IRecordStore<TRecord> {
  private readonly rows: readonly TRecord[];

  constructor(
    private readonly schema: RecordSchema<TRecord>,
    rows: readonly TRecord[]
  ) {
    this.rows = [...rows];
  }

  async findRows(predicates: readonly FieldPredicate[]): Promise<TRecord[]> {
    const readers = predicates.map(predicate => ({ predicate, read: this.reader(predicate.field) }));
    return this.rows.filter(row => readers.every(({ predicate, read }) => matchesPredicate(read(row), predicate)));
  }

  async distinctValues(field: string): Promise<string[]> {
    const read = this.reader(field);
    const values = new Set<string>();
    for (const row of this.rows) {
      const value = read(row);
      if (typeof value === 'string') values.add(value);
    }
    return Array.from(values);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.rows.length;
  }

  private reader(field: string): (row: TRecord) => FieldValue {
    const read = this.schema.fields[field];
    if (!read) {
      throw ReportingError.queryFailed(`${this.schema.domain}.${field}`, 'unknown field');
    }
    return read;
  }
}
