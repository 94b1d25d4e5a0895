import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { config } from 'dotenv';
import { createLogger } from '@dayboard/shared-utils';

config();

const logger = createLogger('database');

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

function resolveConfig(overrides?: Partial<DatabaseConfig>): DatabaseConfig {
  return {
    connectionString: overrides?.connectionString || process.env.DATABASE_URL || undefined,
    host: overrides?.host || process.env.DB_HOST || 'localhost',
    port: overrides?.port || parseInt(process.env.DB_PORT || '5432', 10),
    database: overrides?.database || process.env.DB_NAME || 'dayboard',
    user: overrides?.user || process.env.DB_USER || 'postgres',
    password: overrides?.password || process.env.DB_PASSWORD || 'postgres',
  };
}

/** Anything rows can be read from: the shared pool or a client inside a transaction. */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export class Database implements Queryable {
  private pool: Pool;

  constructor(overrides?: Partial<DatabaseConfig>) {
    this.pool = new Pool({
      ...resolveConfig(overrides),
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('Executed query', { text, duration: Date.now() - start, rows: result.rowCount });
      return result;
    } catch (error) {
      logger.error('Query error', error, { text });
      throw error;
    }
  }

  async getClient(): Promise<PoolClient> {
    return this.pool.connect();
  }

  /** Runs `callback` inside BEGIN/COMMIT on one pooled client, rolling back if it throws. */
  async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.getClient();
    const scoped: Queryable = {
      query: (text, params) => client.query(text, params),
    };
    try {
      await client.query('BEGIN');
      const result = await callback(scoped);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export const db = new Database();

export async function healthCheck(database: Queryable = db): Promise<boolean> {
  try {
    const result = await database.query('SELECT 1');
    return result.rows.length > 0;
  } catch (error) {
    logger.warn('Database health check failed', { error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

export { SCHEMA_PATH, TAX_TABLES_PATH } from './paths';
