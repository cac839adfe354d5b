/**
 * Domain Entities - Reporting Service
 */

export * from './RecordSchema';
export * from './Transaction';
export * from './EquipmentMetric';
export * from './FilterSpecification';
export * from './Report';
