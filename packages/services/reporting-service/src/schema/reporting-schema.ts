/**
 * Reporting Service Database Schema
 * Transactions and equipment telemetry, one row per event
 */

import { pgTable, serial, varchar, timestamp, doublePrecision, index } from 'drizzle-orm/pg-core';

// ================================
// FINANCIAL TRANSACTIONS
// ================================

export const transactions = pgTable(
  'transactions',
  {
    id: serial('id').primaryKey(),
    date: timestamp('date', { withTimezone: true }).notNull(),
    category: varchar('category', { length: 50 }).notNull(),
    amount: doublePrecision('amount').notNull(),
    status: varchar('status', { length: 20 }).notNull().default('completed'),
    description: varchar('description', { length: 255 }),
    customerId: varchar('customer_id', { length: 50 }),
  },
  table => [
    index('transactions_date_idx').on(table.date),
    index('transactions_category_idx').on(table.category),
    index('transactions_status_idx').on(table.status),
  ]
);

// ================================
// EQUIPMENT TELEMETRY
// ================================

export const equipmentMetrics = pgTable(
  'equipment_metrics',
  {
    id: serial('id').primaryKey(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    equipmentId: varchar('equipment_id', { length: 50 }).notNull(),
    metricName: varchar('metric_name', { length: 50 }).notNull(),
    value: doublePrecision('value').notNull(),
    unit: varchar('unit', { length: 20 }),
    status: varchar('status', { length: 20 }).notNull().default('normal'),
  },
  table => [
    index('equipment_metrics_timestamp_idx').on(table.timestamp),
    index('equipment_metrics_equipment_id_idx').on(table.equipmentId),
    index('equipment_metrics_metric_name_idx').on(table.metricName),
    index('equipment_metrics_status_idx').on(table.status),
  ]
);

export type TransactionRow = typeof transactions.$inferSelect;
export type NewTransactionRow = typeof transactions.$inferInsert;
export type EquipmentMetricRow = typeof equipmentMetrics.$inferSelect;
export type NewEquipmentMetricRow = typeof equipmentMetrics.$inferInsert;
