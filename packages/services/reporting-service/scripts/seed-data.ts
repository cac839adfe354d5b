#!/usr/bin/env tsx
/**
 * Demo Data Seeder
 *
 * Fills the transactions and equipment_metrics tables with the same deterministic
 * rows the in-memory store serves. Existing rows are replaced unless SEED_APPEND=true.
 */

import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import {
  createDatabaseConnectionFactory,
  getBooleanConfig,
  getIntConfig,
  getRequiredConfig,
} from '@opsdash/platform-core';
import * as schema from '../src/schema/reporting-schema';
import { generateEquipmentMetrics, generateTransactions } from '../src/infrastructure/seed/demo-data';

loadEnv({ path: resolve(process.cwd(), '.env'), override: false });

const BATCH_SIZE = 500;

function chunk<T>(rows: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    batches.push(rows.slice(i, i + size));
  }
  return batches;
}

async function seedDemoData(): Promise<void> {
  const factory = createDatabaseConnectionFactory({
    serviceName: 'reporting-seed',
    connectionString: getRequiredConfig('DATABASE_URL'),
    schema,
  });
  const db = factory.getDatabase();

  const transactionCount = getIntConfig('SEED_TRANSACTIONS', 200);
  const equipmentCount = getIntConfig('SEED_EQUIPMENT_METRICS', 1000);
  const append = getBooleanConfig('SEED_APPEND', false);

  try {
    console.log('🌱 Seeding reporting demo data...\n');

    if (!append) {
      await db.delete(schema.transactions);
      await db.delete(schema.equipmentMetrics);
      console.log('   🧹 Cleared existing rows');
    }

    const transactions: schema.NewTransactionRow[] = [];
    for (const row of generateTransactions({ count: transactionCount })) {
      if (!row.date || row.amount === null) continue;
      transactions.push({
        date: row.date,
        category: row.category,
        amount: row.amount,
        status: row.status,
        description: row.description,
        customerId: row.customerId,
      });
    }

    const readings: schema.NewEquipmentMetricRow[] = [];
    for (const row of generateEquipmentMetrics({ count: equipmentCount })) {
      if (!row.timestamp || row.value === null) continue;
      readings.push({
        timestamp: row.timestamp,
        equipmentId: row.equipmentId,
        metricName: row.metricName,
        value: row.value,
        unit: row.unit,
        status: row.status,
      });
    }

    for (const batch of chunk(transactions, BATCH_SIZE)) {
      await db.insert(schema.transactions).values(batch);
    }
    console.log(`   ✅ Transactions: ${transactions.length}`);

    for (const batch of chunk(readings, BATCH_SIZE)) {
      await db.insert(schema.equipmentMetrics).values(batch);
    }
    console.log(`   ✅ Equipment readings: ${readings.length}`);

    console.log('\n✅ Demo data seeded successfully!');
  } finally {
    await factory.close();
  }
}

seedDemoData().catch(error => {
  console.error('❌ Seeding failed:', error);
  process.exit(1);
});
