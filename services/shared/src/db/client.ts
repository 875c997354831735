import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

const isTest = process.env.NODE_ENV === 'test';

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     // Tests never hold connections open between cases
     min: isTest ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
     max: isTest ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
     idleTimeoutMillis: isTest ? 100 : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
     connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
};

export const pool = new Pool(config);

pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

export async function checkConnection(): Promise<boolean> {
     try {
          await withConnection((client) => client.query('SELECT 1'));
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Row locks taken by the
 * stock services (`FOR UPDATE`) are held until this returns.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          try {
               await client.query('ROLLBACK');
          } catch (rollbackError) {
               logger.error({ error: rollbackError }, 'Rollback failed');
          }
          throw err;
     } finally {
          client.release();
     }
}

// Non-transactional reads
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
