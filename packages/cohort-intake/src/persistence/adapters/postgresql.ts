/**
 * PostgreSQL Database Adapter
 *
 * Implements DatabaseAdapter interface using node-postgres (pg).
 * Pooled connections; a transaction pins one client until it completes.
 * The pinned client is tracked per async context, so concurrent
 * transactions each get their own client and statements outside a
 * transaction go to the pool.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import pg from 'pg';
import type { Pool, PoolClient, PoolConfig, QueryResult } from 'pg';
import type { DatabaseAdapter } from '../repository.js';
import { createLogger } from '../../core/utils/logger.js';

const logger = createLogger({ module: 'postgresql' });

interface TransactionScope {
  readonly client: PoolClient;
  /** Savepoints opened so far inside the top-level transaction */
  readonly depth: number;
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private readonly pool: Pool;
  private readonly scope = new AsyncLocalStorage<TransactionScope>();

  constructor(config: PoolConfig) {
    this.pool = new pg.Pool({
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      ...config,
    });

    this.pool.on('error', (err: Error) => {
      logger.error('Unexpected PostgreSQL pool error', {
        error: err.message,
        stack: err.stack,
      });
    });
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    const result = await this.run(sql, params);
    return (result.rows[0] as T | undefined) ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    const result = await this.run(sql, params);
    return result.rows as T[];
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    const result = await this.run(sql, params);
    return result.rowCount ?? 0;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const current = this.scope.getStore();
    if (current) {
      return this.savepoint(current, fn);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      try {
        const result = await this.scope.run({ client, depth: 0 }, fn);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Initialize database schema from SQL file (same SQL as SQLite).
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    await this.pool.query(schemaSQL);
  }

  private async savepoint<T>(current: TransactionScope, fn: () => Promise<T>): Promise<T> {
    const name = `sp_${current.depth}`;
    await current.client.query(`SAVEPOINT ${name}`);
    try {
      const result = await this.scope.run({ client: current.client, depth: current.depth + 1 }, fn);
      await current.client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      await current.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      await current.client.query(`RELEASE SAVEPOINT ${name}`);
      throw error;
    }
  }

  private run(sql: string, params: ReadonlyArray<unknown>): Promise<QueryResult> {
    const text = this.parameterize(sql);
    const current = this.scope.getStore();
    return current ? current.client.query(text, [...params]) : this.pool.query(text, [...params]);
  }

  /**
   * Convert SQLite-style ? placeholders to PostgreSQL $1, $2, etc.
   */
  private parameterize(sql: string): string {
    let paramIndex = 1;
    return sql.replace(/\?/g, () => `$${paramIndex++}`);
  }
}
