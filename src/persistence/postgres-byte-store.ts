import pg from 'pg';
import { Config, PersistenceError, StoreLockedError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { ByteStore, Unlock } from './byte-store.js';

const { Pool } = pg;
const logger = createChildLogger('postgres-store');

export const KV_TABLE = 'monitor_kv';

/**
 * Key/value rows in `monitor_kv`. Each put is a single upsert statement.
 * The writer lock is a session advisory lock held on a dedicated client.
 */
export class PostgresByteStore implements ByteStore {
  private pool: pg.Pool;

  constructor(config: Config['postgres']) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: 2,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    this.pool.on('error', (err) => {
      logger.error({ err }, 'Unexpected error on idle client');
    });
  }

  async get(key: string): Promise<string | null> {
    try {
      const result = await this.pool.query<{ value: string }>(
        `SELECT value FROM ${KV_TABLE} WHERE key = $1`,
        [key]
      );
      return result.rows[0]?.value ?? null;
    } catch (error) {
      throw new PersistenceError(`Failed to read key ${key}: ${errorMessage(error)}`, error);
    }
  }

  async put(key: string, value: string): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO ${KV_TABLE} (key, value, updated_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
        [key, value]
      );
    } catch (error) {
      throw new PersistenceError(`Failed to write key ${key}: ${errorMessage(error)}`, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.pool.query(`DELETE FROM ${KV_TABLE} WHERE key = $1`, [key]);
    } catch (error) {
      throw new PersistenceError(`Failed to delete key ${key}: ${errorMessage(error)}`, error);
    }
  }

  async lock(key: string): Promise<Unlock> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceError(`Failed to connect for lock on ${key}: ${errorMessage(error)}`, error);
    }

    let locked: boolean;
    try {
      const result = await client.query<{ locked: boolean }>(
        'SELECT pg_try_advisory_lock(hashtext($1)) AS locked',
        [`${KV_TABLE}:${key}`]
      );
      locked = result.rows[0]?.locked === true;
    } catch (error) {
      client.release();
      throw new PersistenceError(`Failed to lock key ${key}: ${errorMessage(error)}`, error);
    }

    if (!locked) {
      client.release();
      throw new StoreLockedError(`Snapshot "${key}" is locked by another monitor process`, { key });
    }

    logger.debug({ key }, 'Advisory lock taken');
    return async () => {
      try {
        await client.query('SELECT pg_advisory_unlock(hashtext($1))', [`${KV_TABLE}:${key}`]);
      } finally {
        client.release();
      }
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
