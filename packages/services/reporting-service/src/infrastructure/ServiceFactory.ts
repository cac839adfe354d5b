/**
 * Reporting Service - Service Factory (Composition Root)
 * Builds one engine per domain on top of PostgreSQL, or on the in-memory
 * demo store when no database is configured outside production.
 */

import { createDatabaseConnectionFactory } from '@opsdash/platform-core';
import {
  equipmentSchema,
  transactionSchema,
  type DomainName,
  type EquipmentMetric,
  type Transaction,
} from '../domains/entities';
import { ReportingEngine, type EngineLimits, type ReportEngine } from '../application/services';
import { ReportingError } from '../application/errors';
import { SERVICE_NAME, getLogger, type ServiceConfig } from '../config/service-config';
import * as schema from '../schema/reporting-schema';
import { DrizzleEquipmentStore, DrizzleTransactionStore, InMemoryRecordStore } from './repositories';
import { generateEquipmentMetrics, generateTransactions } from './seed/demo-data';

const logger = getLogger('reporting-service:service-factory');

export type StoreKind = 'postgres' | 'memory';

export interface ReportingServiceRegistry {
  readonly storeKind: StoreKind;
  readonly engines: Readonly<Record<DomainName, ReportEngine>>;
}

export interface DemoDataset {
  readonly transactions: readonly Transaction[];
  readonly equipment: readonly EquipmentMetric[];
}

function engineLimits(config: ServiceConfig): EngineLimits {
  return {
    defaultPageSize: config.defaultPageSize,
    maxPageSize: config.maxPageSize,
    maxSeriesBuckets: config.maxSeriesBuckets,
  };
}

export function createDemoDataset(now: Date = new Date()): DemoDataset {
  return {
    transactions: generateTransactions({ count: 200, now }),
    equipment: generateEquipmentMetrics({ count: 1000, now }),
  };
}

export function createInMemoryRegistry(
  config: ServiceConfig,
  dataset: DemoDataset = createDemoDataset()
): ReportingServiceRegistry {
  const limits = engineLimits(config);
  return {
    storeKind: 'memory',
    engines: {
      transactions: new ReportingEngine(
        transactionSchema,
        new InMemoryRecordStore(transactionSchema, dataset.transactions),
        limits
      ),
      equipment: new ReportingEngine(equipmentSchema, new InMemoryRecordStore(equipmentSchema, dataset.equipment), limits),
    },
  };
}

export function createPostgresRegistry(config: ServiceConfig, connectionString: string): ReportingServiceRegistry {
  const { getDatabase } = createDatabaseConnectionFactory({
    serviceName: SERVICE_NAME,
    connectionString,
    schema,
  });
  const db = getDatabase();
  const limits = engineLimits(config);

  return {
    storeKind: 'postgres',
    engines: {
      transactions: new ReportingEngine(transactionSchema, new DrizzleTransactionStore(db), limits),
      equipment: new ReportingEngine(equipmentSchema, new DrizzleEquipmentStore(db), limits),
    },
  };
}

/**
 * @throws ReportingError when production runs without DATABASE_URL
 */
export function createServiceRegistry(config: ServiceConfig): ReportingServiceRegistry {
  if (config.databaseUrl) {
    logger.info('Using PostgreSQL record stores');
    return createPostgresRegistry(config, config.databaseUrl);
  }

  if (config.nodeEnv === 'production') {
    throw ReportingError.storeUnavailable('DATABASE_URL is required in production');
  }

  logger.info('Using in-memory demo record stores (no DATABASE_URL configured)');
  return createInMemoryRegistry(config);
}
