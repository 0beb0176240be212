import { Pool } from 'pg';
import type { Logger } from 'pino';
import { errorMessage } from '../utils/errors';

export interface QueryRows {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** The subset of a pg PoolClient the store code relies on. */
export interface DbClient {
  query(text: string, values?: unknown[]): Promise<QueryRows>;
  release(err?: Error | boolean): void;
}

/** The subset of a pg Pool the store code relies on. */
export interface DbPool {
  connect(): Promise<DbClient>;
}

export function createDbPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

export async function pingDb(pool: DbPool): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      const result = await client.query('SELECT 1');
      return (result.rowCount ?? 0) > 0;
    } finally {
      client.release();
    }
  } catch {
    return false;
  }
}

/**
 * Runs `fn` on a pooled client without a transaction. The client is always
 * released.
 */
export async function withClient<T>(pool: DbPool, fn: (client: DbClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT. Any failure, including a failing COMMIT,
 * rolls back and rethrows the original error. The client is released on every
 * path; when ROLLBACK itself fails the client is released as broken so the
 * pool discards it.
 */
export async function withTransaction<T>(
  pool: DbPool,
  log: Logger,
  fn: (client: DbClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      log.error({ err: errorMessage(rollbackError) }, '[DB] rollback failed, discarding client');
    }
    log.error({ err: errorMessage(error) }, '[DB] transaction failed');
    throw error;
  } finally {
    client.release(broken);
  }
}
