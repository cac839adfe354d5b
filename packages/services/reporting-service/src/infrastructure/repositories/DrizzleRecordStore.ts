/**
 * PostgreSQL record stores on Drizzle ORM.
 * Field predicates become WHERE clauses; connection failures surface as STORE_UNAVAILABLE.
 */

import { and, gte, inArray, lte, sql, type SQL } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { AnyPgColumn, PgTable } from 'drizzle-orm/pg-core';
import { serializeError } from '@opsdash/platform-core';
import type { DomainName, EquipmentMetric, Transaction } from '../../domains/entities';
import type { FieldPredicate, IRecordStore } from '../../domains/repositories/IRecordStore';
import { ReportingError } from '../../application/errors';
import * as schema from '../../schema/reporting-schema';
import { getLogger } from '../../config/service-config';

const logger = getLogger('reporting-service:drizzle-store');

export type ReportingDatabase = NodePgDatabase<typeof schema>;
export type ColumnMap = Readonly<Record<string, AnyPgColumn>>;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  // PostgreSQL SQLSTATE class 08 (connection exception) and shutdown codes
  '08000',
  '08001',
  '08003',
  '08004',
  '08006',
  '57P01',
  '57P02',
  '57P03',
]);

const CONNECTION_ERROR_MESSAGES = [
  'Connection terminated',
  'timeout exceeded when trying to connect',
  'Client has encountered a connection error',
];

export function isConnectionError(error: unknown): boolean {
  for (let current: unknown = error, depth = 0; current instanceof Error && depth < 5; depth++) {
    const code: unknown = Reflect.get(current, 'code');
    if (typeof code === 'string' && CONNECTION_ERROR_CODES.has(code)) return true;
    if (CONNECTION_ERROR_MESSAGES.some(m => current instanceof Error && current.message.includes(m))) return true;
    current = current.cause;
  }
  return false;
}

/**
 * Conjunction of the predicates, or undefined when there are none.
 */
export function buildWhere(columns: ColumnMap, predicates: readonly FieldPredicate[]): SQL | undefined {
  const conditions: SQL[] = [];

  for (const predicate of predicates) {
    const column = columns[predicate.field];
    if (!column) {
      throw ReportingError.queryFailed(predicate.field, 'no column mapped for field');
    }

    if (predicate.kind === 'in') {
      conditions.push(inArray(column, [...predicate.values]));
      continue;
    }
    if (predicate.min !== undefined) conditions.push(gte(column, predicate.min));
    if (predicate.max !== undefined) conditions.push(lte(column, predicate.max));
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

abstract class DrizzleRecordStore<TRecord> implements IRecordStore<TRecord> {
  protected abstract readonly domain: DomainName;
  protected abstract readonly table: PgTable;
  protected abstract readonly columns: ColumnMap;

  constructor(protected readonly db: ReportingDatabase) {}

  protected abstract selectRows(where: SQL | undefined): Promise<TRecord[]>;

  async findRows(predicates: readonly FieldPredicate[]): Promise<TRecord[]> {
    const where = buildWhere(this.columns, predicates);
    try {
      return await this.selectRows(where);
    } catch (error) {
      throw this.classify(error, 'findRows');
    }
  }

  async distinctValues(field: string): Promise<string[]> {
    const column = this.columns[field];
    if (!column) {
      throw ReportingError.queryFailed(`${this.domain}.${field}`, 'no column mapped for field');
    }

    try {
      const rows = await this.db.selectDistinct({ value: column }).from(this.table).orderBy(column);
      return rows.map(row => row.value).filter((value): value is string => typeof value === 'string');
    } catch (error) {
      throw this.classify(error, `distinctValues(${field})`);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch (error) {
      logger.warn('Database ping failed', { domain: this.domain, error: serializeError(error) });
      return false;
    }
  }

  private classify(error: unknown, operation: string): ReportingError {
    if (error instanceof ReportingError) return error;
    const cause = error instanceof Error ? error : undefined;
    if (isConnectionError(error)) {
      logger.error('Database unreachable', { domain: this.domain, operation, error: serializeError(error) });
      return ReportingError.storeUnavailable(`postgres:${this.domain}`, cause);
    }
    return ReportingError.queryFailed(
      `${this.domain}.${operation}`,
      error instanceof Error ? error.message : String(error),
      cause
    );
  }
}

export const TRANSACTION_COLUMNS: ColumnMap = {
  id: schema.transactions.id,
  date: schema.transactions.date,
  category: schema.transactions.category,
  amount: schema.transactions.amount,
  status: schema.transactions.status,
  description: schema.transactions.description,
  customerId: schema.transactions.customerId,
};

export const EQUIPMENT_COLUMNS: ColumnMap = {
  id: schema.equipmentMetrics.id,
  timestamp: schema.equipmentMetrics.timestamp,
  equipmentId: schema.equipmentMetrics.equipmentId,
  metricName: schema.equipmentMetrics.metricName,
  value: schema.equipmentMetrics.value,
  unit: schema.equipmentMetrics.unit,
  status: schema.equipmentMetrics.status,
};

export class DrizzleTransactionStore extends DrizzleRecordStore<Transaction> {
  protected readonly domain = 'transactions';
  protected readonly table = schema.transactions;
  protected readonly columns = TRANSACTION_COLUMNS;

  protected async selectRows(where: SQL | undefined): Promise<Transaction[]> {
    return this.db.select().from(schema.transactions).where(where);
  }
}

export class DrizzleEquipmentStore extends DrizzleRecordStore<EquipmentMetric> {
  protected readonly domain = 'equipment';
  protected readonly table = schema.equipmentMetrics;
  protected readonly columns = EQUIPMENT_COLUMNS;

  protected async selectRows(where: SQL | undefined): Promise<EquipmentMetric[]> {
    return this.db.select().from(schema.equipmentMetrics).where(where);
  }
}
