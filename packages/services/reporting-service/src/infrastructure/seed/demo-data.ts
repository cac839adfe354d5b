/**
 * Deterministic demo data. The same seed and reference time always produce
 * the same rows, so the in-memory store and a seeded database agree.
 */

import type { EquipmentMetric, EquipmentStatus, Transaction, TransactionStatus } from '../../domains/entities';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export const TRANSACTION_CATEGORIES = ['sales', 'refund', 'subscription', 'service', 'product'] as const;

const WEIGHTED_STATUSES: ReadonlyArray<readonly [TransactionStatus, number]> = [
  ['completed', 70],
  ['pending', 15],
  ['failed', 10],
  ['cancelled', 5],
];

export const EQUIPMENT_IDS = [
  'PUMP-A1',
  'PUMP-A2',
  'PUMP-B1',
  'COMPRESSOR-01',
  'COMPRESSOR-02',
  'TURBINE-T1',
  'TURBINE-T2',
  'MOTOR-M1',
  'MOTOR-M2',
  'MOTOR-M3',
] as const;

interface MetricProfile {
  readonly unit: string;
  readonly min: number;
  readonly max: number;
  readonly decimals: number;
}

export const METRIC_PROFILES: Readonly<Record<string, MetricProfile>> = {
  temperature: { unit: '°C', min: 35, max: 75, decimals: 2 },
  cpu_load: { unit: '%', min: 20, max: 85, decimals: 2 },
  memory_usage: { unit: '%', min: 30, max: 80, decimals: 2 },
  vibration: { unit: 'mm/s', min: 0.5, max: 4.0, decimals: 2 },
  pressure: { unit: 'bar', min: 2.5, max: 8.5, decimals: 2 },
  rpm: { unit: 'rpm', min: 1200, max: 3000, decimals: 0 },
  power_consumption: { unit: 'kW', min: 15, max: 95, decimals: 2 },
  efficiency: { unit: '%', min: 70, max: 95, decimals: 2 },
};

/**
 * mulberry32: small, fast and good enough for demo data.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function pickWeighted<T>(random: () => number, items: ReadonlyArray<readonly [T, number]>): T {
  const total = items.reduce((sum, [, weight]) => sum + weight, 0);
  let threshold = random() * total;
  for (const [item, weight] of items) {
    threshold -= weight;
    if (threshold < 0) return item;
  }
  return items[items.length - 1][0];
}

function logNormal(random: () => number, mu: number, sigma: number): number {
  const u1 = 1 - random();
  const u2 = random();
  const normal = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return Math.exp(mu + sigma * normal);
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function uniform(random: () => number, min: number, max: number): number {
  return min + random() * (max - min);
}

export interface DemoDataOptions {
  readonly count: number;
  readonly seed?: number;
  /** End of the generated period */
  readonly now?: Date;
}

/**
 * Transactions spread over the 90 days before `now`, amounts log-normal.
 */
export function generateTransactions(options: DemoDataOptions): Transaction[] {
  const random = createRandom(options.seed ?? 42);
  const end = (options.now ?? new Date()).getTime();
  const start = end - 90 * DAY_MS;

  return Array.from({ length: options.count }, (_, index): Transaction => {
    const category = pick(random, TRANSACTION_CATEGORIES);
    const date = new Date(start + Math.floor(random() * 91) * DAY_MS);
    const amount = round(logNormal(random, 4, 1.5), 2);
    const status = pickWeighted(random, WEIGHTED_STATUSES);
    const customerId = random() > 0.2 ? `CUST${1000 + Math.floor(random() * 9000)}` : null;
    const descriptions = [
      `${category.charAt(0).toUpperCase()}${category.slice(1)} transaction`,
      `Monthly ${category}`,
      `One-time ${category}`,
      null,
    ];

    return {
      id: index + 1,
      date,
      category,
      amount,
      status,
      description: pick(random, descriptions),
      customerId,
    };
  });
}

export function classifyReading(value: number, profile: MetricProfile): EquipmentStatus {
  if (value > profile.max * 1.1 || value < profile.min * 0.8) return 'critical';
  if (value > profile.max * 0.95 || value < profile.min * 0.9) return 'warning';
  return 'normal';
}

/**
 * Equipment readings on the hour over the 30 days before `now`; about 15% fall outside the normal range.
 */
export function generateEquipmentMetrics(options: DemoDataOptions): EquipmentMetric[] {
  const random = createRandom(options.seed ?? 7);
  const end = (options.now ?? new Date()).getTime();
  const start = end - 30 * DAY_MS;
  const metricNames = Object.keys(METRIC_PROFILES);

  return Array.from({ length: options.count }, (_, index): EquipmentMetric => {
    const timestamp = new Date(start + Math.floor(random() * (30 * 24 + 1)) * HOUR_MS);
    const equipmentId = pick(random, EQUIPMENT_IDS);
    const metricName = pick(random, metricNames);
    const profile = METRIC_PROFILES[metricName];

    let raw: number;
    if (random() > 0.85) {
      raw =
        random() > 0.5
          ? uniform(random, profile.max * 1.05, profile.max * 1.25)
          : uniform(random, profile.min * 0.5, profile.min * 0.9);
    } else {
      raw = uniform(random, profile.min, profile.max);
    }
    const value = round(raw, profile.decimals);

    return {
      id: index + 1,
      timestamp,
      equipmentId,
      metricName,
      value,
      unit: profile.unit,
      status: classifyReading(value, profile),
    };
  });
}
