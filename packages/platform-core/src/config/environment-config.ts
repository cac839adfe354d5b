/**
 * Environment Configuration Utilities
 *
 * Environment variable validation and parsing.
 */

import { getLogger } from '../logging/logger';
import { DomainError } from '../error-handling/errors';

const logger = getLogger('environment-config');

export interface EnvVarConfig {
  name: string;
  required: boolean;
  description: string;
  sensitive?: boolean;
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

/**
 * Validate environment using structured configuration
 */
export function validateEnvironmentConfig(configs: EnvVarConfig[]): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const config of configs) {
    const value = process.env[config.name];

    if (config.required && !value) {
      errors.push(`Missing required: ${config.name} - ${config.description}`);
    } else if (!config.required && !value) {
      warnings.push(`Optional not set: ${config.name} - ${config.description}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Fail fast validation - call at service startup.
 * In production: throws on missing required vars.
 * In development: logs them at debug level (unless STRICT_ENV_VALIDATION=true).
 */
export function failFastValidation(serviceName: string, configs: EnvVarConfig[]): void {
  const strictMode = process.env.STRICT_ENV_VALIDATION === 'true';
  const { valid, errors, warnings } = validateEnvironmentConfig(configs);

  if (!isProduction() && !strictMode) {
    if (errors.length > 0) {
      logger.debug('Development mode - missing env vars (would fail in production)', {
        serviceName,
        missing: errors.map(e => e.replace(/^Missing required: /, '').replace(/ - .*$/, '')),
      });
    }
    if (warnings.length > 0) {
      logger.debug('Optional env vars not configured', { serviceName, count: warnings.length });
    }
    return;
  }

  if (warnings.length > 0) {
    logger.warn('Optional variables not configured', { serviceName, warnings });
  }

  if (!valid) {
    throw new DomainError(
      `Environment validation failed for ${serviceName}:\n${errors.map(e => `  - ${e}`).join('\n')}`,
      500
    );
  }

  logger.info('Environment validation passed', { serviceName });
}

/**
 * Get configuration with a parser and a default. Parser failures fall back to the default.
 */
export function getConfig<T>(key: string, defaultValue: T, parser: (value: string) => T): T {
  const value = process.env[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch (error) {
    logger.warn('Invalid configuration value, using default', {
      key,
      error: error instanceof Error ? error.message : String(error),
    });
    return defaultValue;
  }
}

export function getIntConfig(key: string, defaultValue: number): number {
  return getConfig(key, defaultValue, value => {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) throw new Error(`${key} is not an integer: ${value}`);
    return parsed;
  });
}

export function getBooleanConfig(key: string, defaultValue: boolean): boolean {
  return getConfig(key, defaultValue, value => value.toLowerCase() === 'true');
}

/**
 * Get required configuration - throws if not present
 */
export function getRequiredConfig(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new DomainError(`Required environment variable not set: ${key}`, 500);
  }
  return value;
}
