/**
 * Database Module
 *
 * Shared PostgreSQL connection management.
 */

export {
  createDatabaseConnectionFactory,
  getSslConfig,
  appendStatementTimeout,
  type DatabaseConfig,
  type DatabaseConnectionFactoryInstance,
} from './DatabaseConnectionFactory';
