import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { Config } from './config';
import { logger } from '../utils/logger';

type DatabaseSettings = Config['database'];

// Only the start of a statement goes into the debug log
const LOGGED_SQL_LENGTH = 80;

function toPoolConfig(settings: DatabaseSettings): PoolConfig {
  const poolConfig: PoolConfig = {
    max: settings.max,
    idleTimeoutMillis: settings.idleTimeoutMillis,
    connectionTimeoutMillis: settings.connectionTimeoutMillis,
    ssl: settings.ssl ? { rejectUnauthorized: false } : false,
  };

  if (settings.connectionString) {
    return { ...poolConfig, connectionString: settings.connectionString };
  }

  return {
    ...poolConfig,
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password,
  };
}

function describeSql(text: string): string {
  return text.replace(/\s+/g, ' ').trim().substring(0, LOGGED_SQL_LENGTH);
}

/**
 * PostgreSQL pool holding the user credential store
 */
export class Database {
  private pool: Pool;

  constructor(settings: DatabaseSettings) {
    this.pool = new Pool(toPoolConfig(settings));

    // Idle clients can fail (server restart); the pool replaces them
    this.pool.on('error', (err) => {
      logger.error('Idle database client failed', { error: err.message });
    });
  }

  /**
   * Run a parameterized statement
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = []
  ): Promise<QueryResult<T>> {
    const startedAt = Date.now();

    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('SQL', {
        sql: describeSql(text),
        rows: result.rowCount,
        duration: `${Date.now() - startedAt}ms`,
      });
      return result;
    } catch (error) {
      logger.error('SQL failed', {
        sql: describeSql(text),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  /**
   * Round-trip to the server; false when it cannot be reached
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query<{ now: Date }>('SELECT NOW() AS now');
      logger.info('Database reachable', { serverTime: result.rows[0]?.now });
      return true;
    } catch (error) {
      logger.error('Database unreachable', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database pool closed');
  }
}
