/**
 * Helpers for reading raw request parameters: strings, repeated keys, comma
 * separated lists and numbers are all accepted.
 */

import type { FilterWarning, RawParams } from '../../domains/entities';

export interface CollectedValues {
  readonly values: string[];
  readonly dropped: string[];
}

export function collectValues(raw: unknown): CollectedValues {
  const values: string[] = [];
  const dropped: string[] = [];

  const visit = (value: unknown): void => {
    if (value === undefined || value === null) return;
    if (typeof value === 'string') {
      values.push(...value.split(','));
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      values.push(String(value));
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else {
      dropped.push(typeof value === 'object' ? JSON.stringify(value) : String(value));
    }
  };

  visit(raw);
  return { values, dropped };
}

/**
 * Values of the first key present in `raw`, so aliases can be listed after the preferred name.
 * Aliases given alongside it are ignored with a warning.
 */
export function readParam(
  raw: RawParams,
  keys: readonly string[],
  warnings?: FilterWarning[]
): (CollectedValues & { key: string }) | undefined {
  const [key, ...ignored] = keys.filter(k => raw[k] !== undefined);
  if (key === undefined) return undefined;

  for (const alias of ignored) {
    warnings?.push({
      param: alias,
      value: collectValues(raw[alias]).values.join(','),
      reason: `ignored, ${key} given`,
    });
  }
  return { key, ...collectValues(raw[key]) };
}

export function warnDropped(param: { key: string; dropped: readonly string[] }, warnings: FilterWarning[]): void {
  for (const value of param.dropped) {
    warnings.push({ param: param.key, value, reason: 'unsupported value type' });
  }
}

/**
 * Single-valued parameter: blank values are ignored, and when several are given the first wins.
 */
export function readSingleParam(
  raw: RawParams,
  keys: readonly string[],
  warnings: FilterWarning[]
): { key: string; value: string } | undefined {
  const param = readParam(raw, keys, warnings);
  if (!param) return undefined;
  warnDropped(param, warnings);

  const present = param.values.map(v => v.trim()).filter(v => v !== '');
  if (present.length === 0) return undefined;
  if (present.length > 1) {
    warnings.push({ param: param.key, value: present.slice(1).join(','), reason: 'multiple values given, first used' });
  }
  return { key: param.key, value: present[0] };
}
