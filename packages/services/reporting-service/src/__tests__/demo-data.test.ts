import { describe, it, expect } from 'vitest';
import {
  EQUIPMENT_IDS,
  METRIC_PROFILES,
  TRANSACTION_CATEGORIES,
  classifyReading,
  createRandom,
  generateEquipmentMetrics,
  generateTransactions,
} from '../infrastructure/seed/demo-data';
import { EQUIPMENT_STATUSES, TRANSACTION_STATUSES } from '../domains/entities';

const DAY_MS = 24 * 60 * 60 * 1000;
const now = new Date('2024-06-30T12:00:00.000Z');

describe('createRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = createRandom(1);
    const b = createRandom(1);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('generateTransactions', () => {
  const rows = generateTransactions({ count: 50, now });

  it('should be deterministic for a seed and reference time', () => {
    expect(generateTransactions({ count: 50, now })).toEqual(rows);
    expect(generateTransactions({ count: 5, seed: 1, now })).not.toEqual(generateTransactions({ count: 5, seed: 2, now }));
  });

  it('should number rows from 1', () => {
    expect(rows.map(r => r.id)).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
  });

  it('should spread rows over the 90 days before the reference time', () => {
    for (const row of rows) {
      const time = row.date?.getTime() ?? Number.NaN;
      expect(time).toBeGreaterThanOrEqual(now.getTime() - 90 * DAY_MS);
      expect(time).toBeLessThanOrEqual(now.getTime());
    }
  });

  it('should use the known categories and statuses with positive amounts', () => {
    for (const row of rows) {
      expect(TRANSACTION_CATEGORIES).toContain(row.category);
      expect(TRANSACTION_STATUSES).toContain(row.status);
      expect(row.amount).toBeGreaterThan(0);
    }
  });
});

describe('generateEquipmentMetrics', () => {
  const rows = generateEquipmentMetrics({ count: 100, now });

  it('should be deterministic', () => {
    expect(generateEquipmentMetrics({ count: 100, now })).toEqual(rows);
  });

  it('should take hourly readings within the last 30 days', () => {
    for (const row of rows) {
      const time = row.timestamp?.getTime() ?? Number.NaN;
      expect(time).toBeGreaterThanOrEqual(now.getTime() - 30 * DAY_MS);
      expect(time).toBeLessThanOrEqual(now.getTime());
      expect((now.getTime() - time) % (60 * 60 * 1000)).toBe(0);
    }
  });

  it('should label each reading with its profile unit and status', () => {
    for (const row of rows) {
      const profile = METRIC_PROFILES[row.metricName];
      expect(EQUIPMENT_IDS).toContain(row.equipmentId);
      expect(row.unit).toBe(profile.unit);
      expect(EQUIPMENT_STATUSES).toContain(row.status);
      expect(row.status).toBe(classifyReading(row.value ?? Number.NaN, profile));
    }
  });
});

describe('classifyReading', () => {
  const temperature = METRIC_PROFILES.temperature;

  it('should grade readings against the profile range', () => {
    expect(classifyReading(50, temperature)).toBe('normal');
    expect(classifyReading(72, temperature)).toBe('warning');
    expect(classifyReading(31, temperature)).toBe('warning');
    expect(classifyReading(100, temperature)).toBe('critical');
    expect(classifyReading(20, temperature)).toBe('critical');
  });
});
