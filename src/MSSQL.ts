import sql from 'mssql';
import { logger } from './logger.js';

export interface MSSQLConfig {
  user: string;
  password: string;
  server: string;
  database: string;
  port?: number;
  options?: sql.IOptions; // Leverage the existing type
  pool?: {
    max?: number;
    min?: number;
    idleTimeoutMillis?: number;
  };
}

export type QueryParameter = string | number | boolean | Date | null;

/**
 * Anything that can run a read-only query and hand back its rows.
 * Features depend on this rather than on MSSQL so they run against fakes.
 */
export interface QueryExecutor {
  executeQuery<T>(args: {
    query: string;
    parameters?: Record<string, QueryParameter>;
  }): Promise<T[]>;
}

/**
 * Represents a connection to an MSSQL database.
 * Singleton pattern ensures only one instance exists.
 */
export class MSSQL implements QueryExecutor {
  private static instance: MSSQL | null = null;
  private pool: sql.ConnectionPool | null = null;
  private config: MSSQLConfig;

  private constructor(config: MSSQLConfig) {
    this.config = config;
  }

  /**
   * Gets the singleton instance of MSSQL.
   * @param config - Configuration for the database connection (required on first call)
   */
  public static getInstance(config: MSSQLConfig): MSSQL {
    if (!MSSQL.instance) {
      MSSQL.instance = new MSSQL(config);
    }
    return MSSQL.instance;
  }

  /**
   * Closes the pool and forgets the singleton (useful for testing or reconfiguration).
   */
  public static async resetInstance(): Promise<void> {
    const instance = MSSQL.instance;
    MSSQL.instance = null;
    if (instance?.isConnected()) {
      await instance.disconnect();
    }
  }

  async executeQuery<T>({
    query,
    parameters,
  }: {
    query: string;
    parameters?: Record<string, QueryParameter>;
  }): Promise<T[]> {
    const pool = await this.connect();
    const request = pool.request();
    if (parameters) {
      for (const [key, value] of Object.entries(parameters)) {
        request.input(key, value);
      }
    }
    const started = Date.now();
    const result = await request.query<T>(query);
    logger.debug('query executed', {
      rows: result.recordset.length,
      durationMs: Date.now() - started,
    });
    return result.recordset;
  }
  // Utilities for connection management
  async connect(): Promise<sql.ConnectionPool> {
    if (this.pool) {
      return this.pool;
    }
    const { server, database, port } = this.config;
    this.pool = await sql.connect(this.config);
    logger.info('connected to SQL Server', { server, database, port });
    return this.pool;
  }

  async disconnect(): Promise<void> {
    const pool = this.pool;
    if (!pool) {
      return;
    }
    this.pool = null;
    await pool.close();
    logger.info('disconnected from SQL Server');
  }

  isConnected(): boolean {
    return this.pool !== null;
  }
}
