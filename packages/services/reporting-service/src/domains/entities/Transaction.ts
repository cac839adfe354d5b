/**
 * Domain Entity: Transaction
 * A single financial event (sale, refund, subscription charge...)
 */

import type { RecordSchema } from './RecordSchema';

export const TRANSACTION_STATUSES = ['pending', 'completed', 'failed', 'cancelled'] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

export interface Transaction {
  readonly id: number;
  readonly date: Date | null;
  readonly category: string;
  readonly amount: number | null;
  readonly status: string;
  readonly description: string | null;
  readonly customerId: string | null;
}

export const transactionSchema: RecordSchema<Transaction> = {
  domain: 'transactions',
  temporal: { field: 'date', read: row => row.date },
  numeric: { field: 'amount', read: row => row.amount },
  dimensions: [
    { field: 'category', param: 'category', read: row => row.category },
    { field: 'status', param: 'status', read: row => row.status, allowedValues: TRANSACTION_STATUSES },
  ],
  statusField: 'status',
  fields: {
    id: row => row.id,
    date: row => row.date,
    category: row => row.category,
    amount: row => row.amount,
    status: row => row.status,
    description: row => row.description,
    customerId: row => row.customerId,
  },
  sortable: ['id', 'date', 'category', 'amount', 'status', 'customerId'],
  defaultSort: { field: 'date', direction: 'desc' },
  defaultBreakdown: { dimension: 'category', measure: 'sum' },
};
