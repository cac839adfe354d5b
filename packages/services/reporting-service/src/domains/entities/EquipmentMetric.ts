/**
 * Domain Entity: EquipmentMetric
 * One telemetry reading taken from a machine
 */

import type { RecordSchema } from './RecordSchema';

export const EQUIPMENT_STATUSES = ['normal', 'warning', 'critical'] as const;
export type EquipmentStatus = (typeof EQUIPMENT_STATUSES)[number];

export interface EquipmentMetric {
  readonly id: number;
  readonly timestamp: Date | null;
  readonly equipmentId: string;
  readonly metricName: string;
  readonly value: number | null;
  readonly unit: string | null;
  readonly status: string;
}

export const equipmentSchema: RecordSchema<EquipmentMetric> = {
  domain: 'equipment',
  temporal: { field: 'timestamp', read: row => row.timestamp },
  numeric: { field: 'value', read: row => row.value },
  dimensions: [
    { field: 'equipmentId', param: 'equipment_id', read: row => row.equipmentId },
    { field: 'metricName', param: 'metric_name', read: row => row.metricName },
    { field: 'status', param: 'status', read: row => row.status, allowedValues: EQUIPMENT_STATUSES },
  ],
  statusField: 'status',
  fields: {
    id: row => row.id,
    timestamp: row => row.timestamp,
    equipmentId: row => row.equipmentId,
    metricName: row => row.metricName,
    value: row => row.value,
    unit: row => row.unit,
    status: row => row.status,
  },
  sortable: ['id', 'timestamp', 'equipmentId', 'metricName', 'value', 'status'],
  defaultSort: { field: 'timestamp', direction: 'desc' },
  defaultBreakdown: { dimension: 'equipmentId', measure: 'count' },
};
