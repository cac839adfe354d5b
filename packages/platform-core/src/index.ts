/**
 * Platform Core - shared utilities for the dashboard services
 *
 * - Structured logging with correlation tracking
 * - Error handling patterns and structured HTTP error responses
 * - Configuration helpers
 * - Database connection management
 * - Graceful shutdown
 */

export * from './config/index';
export * from './error-handling/index';
export * from './http/index';
export * from './logging/index';
export * from './database/index';
export * from './lifecycle/index';
