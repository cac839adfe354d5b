/**
 * Correlation Context
 *
 * Async correlation ID management across requests
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}

export function generateCorrelationId(): string {
  return Math.random().toString(36).substring(2, 15) + Math.random().toString(36).substring(2, 15);
}
