import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  failFastValidation,
  getBooleanConfig,
  getConfig,
  getIntConfig,
  getRequiredConfig,
  validateEnvironmentConfig,
} from '../config';
import { DomainError } from '../error-handling';

describe('environment config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('getConfig', () => {
    it('should return the default when unset or empty', () => {
      vi.stubEnv('REPORT_TEST_VALUE', '');
      expect(getConfig('REPORT_TEST_VALUE', 'fallback', v => v)).toBe('fallback');
      expect(getConfig('REPORT_TEST_MISSING', 'fallback', v => v)).toBe('fallback');
    });

    it('should fall back to the default when the parser throws', () => {
      vi.stubEnv('REPORT_TEST_VALUE', 'abc');
      expect(
        getConfig('REPORT_TEST_VALUE', 1, () => {
          throw new Error('bad');
        })
      ).toBe(1);
    });
  });

  it('getIntConfig should parse integers', () => {
    vi.stubEnv('REPORT_TEST_INT', '250');
    expect(getIntConfig('REPORT_TEST_INT', 10)).toBe(250);
    vi.stubEnv('REPORT_TEST_INT', 'many');
    expect(getIntConfig('REPORT_TEST_INT', 10)).toBe(10);
  });

  it('getBooleanConfig should accept true in any case', () => {
    vi.stubEnv('REPORT_TEST_FLAG', 'TRUE');
    expect(getBooleanConfig('REPORT_TEST_FLAG', false)).toBe(true);
    vi.stubEnv('REPORT_TEST_FLAG', 'yes');
    expect(getBooleanConfig('REPORT_TEST_FLAG', true)).toBe(false);
  });

  it('getRequiredConfig should throw when missing', () => {
    vi.stubEnv('REPORT_TEST_REQUIRED', 'postgres://localhost/dashboard');
    expect(getRequiredConfig('REPORT_TEST_REQUIRED')).toBe('postgres://localhost/dashboard');
    expect(() => getRequiredConfig('REPORT_TEST_ABSENT')).toThrow(DomainError);
  });

  it('validateEnvironmentConfig should split errors from warnings', () => {
    vi.stubEnv('REPORT_TEST_PRESENT', 'yes');
    const result = validateEnvironmentConfig([
      { name: 'REPORT_TEST_PRESENT', required: true, description: 'present' },
      { name: 'REPORT_TEST_ABSENT', required: true, description: 'database' },
      { name: 'REPORT_TEST_OPTIONAL', required: false, description: 'optional' },
    ]);

    expect(result).toEqual({
      valid: false,
      errors: ['Missing required: REPORT_TEST_ABSENT - database'],
      warnings: ['Optional not set: REPORT_TEST_OPTIONAL - optional'],
    });
  });

  it('failFastValidation should throw in production only', () => {
    const configs = [{ name: 'REPORT_TEST_ABSENT', required: true, description: 'database' }];

    vi.stubEnv('NODE_ENV', 'test');
    expect(() => failFastValidation('test-service', configs)).not.toThrow();

    vi.stubEnv('NODE_ENV', 'production');
    expect(() => failFastValidation('test-service', configs)).toThrow(
      'Environment validation failed for test-service:\n  - Missing required: REPORT_TEST_ABSENT - database'
    );
  });
});
