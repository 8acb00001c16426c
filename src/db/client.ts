import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { validateEnv } from '../config/env.js';
import { logger } from '../config/logger.js';

let pool: Pool | null = null;

function getPool(): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    connectionString: validateEnv().DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message, stack: err.stack });
  });

  pool.on('connect', () => {
    logger.debug('New database client connected');
  });

  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await getPool().query<T>(text, params);
    const duration = Date.now() - start;
    logger.debug('Executed query', { text, duration, rows: result.rowCount });
    return result;
  } catch (error) {
    logger.error('Query error', {
      text,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

export async function getClient(): Promise<PoolClient> {
  return getPool().connect();
}

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client; rolls back and rethrows on error.
 */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getClient();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error('Rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    });
    throw error;
  } finally {
    client.release();
  }
}

export async function disconnect(): Promise<void> {
  if (!pool) {
    return;
  }
  await pool.end();
  pool = null;
  logger.info('Database pool closed');
}
