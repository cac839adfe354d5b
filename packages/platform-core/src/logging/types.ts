/**
 * Logging Types
 *
 * Interfaces and types for logging functionality
 */

export type { Logger } from 'winston';

export interface LogContext {
  correlationId?: string;
  service?: string;
  module?: string;
  [key: string]: unknown;
}

export interface LoggerMeta {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}
