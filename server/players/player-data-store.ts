/**
 * player_data table access
 * Column names only ever come from the attribute catalog, values are always
 * bound parameters
 */

import type { Logger } from 'pino';
import { withClient, withTransaction, type DbClient, type DbPool } from '../db';
import { errorMessage, StoreError } from '../utils/errors';
import { DEFAULT_STORE_RETRY, isTransientStoreError, withRetry, type RetryPolicy } from '../utils/retry';
import { columnOf, type AttributeType } from './attribute-types';

export interface PlayerDataStoreOptions {
  table?: string;
  retry?: RetryPolicy;
}

export class PlayerDataStore {
  readonly table: string;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly pool: DbPool,
    private readonly log: Logger,
    options: PlayerDataStoreOptions = {}
  ) {
    this.table = options.table ?? 'player_data';
    this.retry = options.retry ?? DEFAULT_STORE_RETRY;
  }

  /** Reads one column for a player; `undefined` when there is no row. */
  async selectAttribute(playerId: string, attribute: AttributeType): Promise<unknown> {
    const column = columnOf(attribute);
    return this.run(`select ${column}`, () =>
      withClient(this.pool, async client => {
        const result = await client.query(`SELECT ${column} FROM ${this.table} WHERE uuid = $1`, [playerId]);
        return result.rows.length > 0 ? result.rows[0][column] : undefined;
      }));
  }

  async selectIdentityByName(name: string): Promise<unknown> {
    return this.run('select uuid', () =>
      withClient(this.pool, async client => {
        const result = await client.query(`SELECT uuid FROM ${this.table} WHERE name = $1`, [name]);
        return result.rows.length > 0 ? result.rows[0].uuid : undefined;
      }));
  }

  /**
   * Insert-or-update of a single column in its own transaction. The whole
   * transaction is retried on transient failures; the upsert is idempotent.
   */
  async upsertAttribute(playerId: string, attribute: AttributeType, value: string): Promise<void> {
    const column = columnOf(attribute);
    await this.run(`upsert ${column}`, () =>
      withTransaction(this.pool, this.log, async (client: DbClient) => {
        await client.query(
          `INSERT INTO ${this.table} (uuid, ${column}) VALUES ($1, $2) ` +
            `ON CONFLICT (uuid) DO UPDATE SET ${column} = EXCLUDED.${column}`,
          [playerId, value]
        );
      }));
  }

  /**
   * Retries `fn` under the store policy. Driver errors surface as StoreError
   * with the pg error as cause.
   */
  private run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, async () => {
      try {
        return await fn();
      } catch (error) {
        if (error instanceof StoreError) throw error;
        throw new StoreError(
          `${this.table} ${operation} failed: ${errorMessage(error)}`,
          isTransientStoreError(error),
          { cause: error }
        );
      }
    }, this.retry, this.log);
  }
}
