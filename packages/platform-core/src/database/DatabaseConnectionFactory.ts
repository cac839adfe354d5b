/**
 * Database Connection Factory
 *
 * Each service creates its own factory instance with service-specific configuration.
 *
 * @example
 * import { createDatabaseConnectionFactory } from '@opsdash/platform-core';
 * import * as schema from './schema/reporting-schema';
 *
 * const { getDatabase } = createDatabaseConnectionFactory({
 *   serviceName: 'reporting-service',
 *   connectionString: config.databaseUrl,
 *   schema,
 * });
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import { registerShutdownHook } from '../lifecycle/gracefulShutdown';

type SQLConnection = Pool;

export interface DatabaseConfig<TSchema extends Record<string, unknown> = Record<string, unknown>> {
  serviceName: string;
  /** Falls back to process.env[envVarName] (default DATABASE_URL) when omitted */
  connectionString?: string;
  envVarName?: string;
  schema: TSchema;
}

export interface DatabaseConnectionFactoryInstance<TSchema extends Record<string, unknown>> {
  getDatabase: () => NodePgDatabase<TSchema>;
  close: () => Promise<void>;
}

export function getSslConfig(connStr: string): false | { rejectUnauthorized: boolean } {
  if (process.env.DATABASE_SSL === 'false') {
    return false;
  }
  try {
    const url = new URL(connStr);
    const host = url.hostname;
    if (host === 'localhost' || host === '127.0.0.1') {
      return false;
    }
    if (url.searchParams.get('sslmode') === 'disable') {
      return false;
    }
  } catch {
    return false;
  }
  return { rejectUnauthorized: false };
}

export function appendStatementTimeout(connStr: string, timeoutMs: number): string {
  if (connStr.includes('statement_timeout=')) return connStr;
  return connStr.includes('?') ? `${connStr}&statement_timeout=${timeoutMs}` : `${connStr}?statement_timeout=${timeoutMs}`;
}

class DatabaseConnectionFactoryClass<TSchema extends Record<string, unknown>> {
  private sqlConnection: SQLConnection | null = null;
  private dbConnection: NodePgDatabase<TSchema> | null = null;
  private isClosed = false;
  private readonly logger;

  constructor(private readonly config: DatabaseConfig<TSchema>) {
    this.logger = createLogger(`${config.serviceName}-database`);
  }

  private getConnectionString(): string {
    const envVarName = this.config.envVarName || 'DATABASE_URL';
    const connectionString = this.config.connectionString || process.env[envVarName];

    if (!connectionString) {
      this.logger.error('Database URL not configured', {
        serviceName: this.config.serviceName,
        requiredEnvVar: envVarName,
      });
      throw new Error(`${envVarName} environment variable is required for ${this.config.serviceName}`);
    }

    const statementTimeout = parseInt(process.env.STATEMENT_TIMEOUT_MS || '30000', 10);
    return appendStatementTimeout(connectionString, statementTimeout);
  }

  private getSQLConnection(): SQLConnection {
    if (!this.sqlConnection) {
      const connStr = this.getConnectionString();
      const maxConnections = parseInt(
        process.env.DATABASE_POOL_MAX || (process.env.NODE_ENV === 'production' ? '20' : '5'),
        10
      );
      const pool = new Pool({
        connectionString: connStr,
        max: maxConnections,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
        ssl: getSslConfig(connStr),
      });
      pool.on('error', error => {
        this.logger.error('Idle database client error', {
          serviceName: this.config.serviceName,
          error: serializeError(error),
        });
      });
      this.sqlConnection = pool;
      this.logger.debug('SQL connection pool established', { serviceName: this.config.serviceName, maxConnections });
    }
    return this.sqlConnection;
  }

  public getDatabase(): NodePgDatabase<TSchema> {
    if (!this.dbConnection) {
      try {
        this.dbConnection = drizzle(this.getSQLConnection(), { schema: this.config.schema });
        this.logger.debug('Drizzle database connection established');
      } catch (error: unknown) {
        this.logger.error('Drizzle connection failed', {
          serviceName: this.config.serviceName,
          error: serializeError(error),
        });
        throw error;
      }
    }
    return this.dbConnection;
  }

  public async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.logger.info('Closing database connections', { serviceName: this.config.serviceName });
    if (this.sqlConnection) await this.sqlConnection.end();
    this.sqlConnection = null;
    this.dbConnection = null;
    this.logger.info('Database connection pool closed', { serviceName: this.config.serviceName });
  }
}

export function createDatabaseConnectionFactory<TSchema extends Record<string, unknown>>(
  config: DatabaseConfig<TSchema>
): DatabaseConnectionFactoryInstance<TSchema> {
  const instance = new DatabaseConnectionFactoryClass(config);

  registerShutdownHook(() => instance.close(), 'connections', `database:${config.serviceName}`);

  return {
    getDatabase: () => instance.getDatabase(),
    close: () => instance.close(),
  };
}
