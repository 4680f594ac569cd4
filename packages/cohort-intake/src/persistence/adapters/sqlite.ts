/**
 * SQLite Database Adapter
 *
 * Implements DatabaseAdapter interface using better-sqlite3.
 * Statements run synchronously; nested transactions use savepoints.
 *
 * CONCURRENCY: one connection serves every caller. A top-level transaction
 * holds the connection until it settles; statements and transactions from
 * other async contexts queue behind it, so they neither join nor roll back
 * with it. Calls made inside a transaction's callback run immediately.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import Database from 'better-sqlite3';
import type { DatabaseAdapter } from '../repository.js';

interface TransactionScope {
  /** Savepoints opened so far inside the top-level transaction */
  readonly depth: number;
}

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;
  private readonly scope = new AsyncLocalStorage<TransactionScope>();
  /** Settles once the last queued connection holder is done */
  private tail: Promise<void> = Promise.resolve();

  constructor(filepath: string) {
    this.db = new Database(filepath);

    // Metadata rows cascade with their file records
    this.db.pragma('foreign_keys = ON');

    if (filepath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    return this.exclusive(() => {
      const stmt = this.db.prepare(sql);
      const row = stmt.get(...params) as T | undefined;
      return row ?? null;
    });
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    return this.exclusive(() => {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params) as T[];
    });
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    return this.exclusive(() => {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return result.changes;
    });
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const current = this.scope.getStore();
    if (current) {
      return this.savepoint(current.depth, fn);
    }

    return this.exclusive(() =>
      this.scope.run({ depth: 0 }, async () => {
        this.db.exec('BEGIN');
        try {
          const result = await fn();
          this.db.exec('COMMIT');
          return result;
        } catch (error) {
          this.db.exec('ROLLBACK');
          throw error;
        }
      })
    );
  }

  async close(): Promise<void> {
    await this.exclusive(() => this.db.close());
  }

  /**
   * Initialize database schema from SQL file.
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    await this.exclusive(() => this.db.exec(schemaSQL));
  }

  private async savepoint<T>(depth: number, fn: () => Promise<T>): Promise<T> {
    const name = `sp_${depth}`;
    this.db.exec(`SAVEPOINT ${name}`);
    try {
      const result = await this.scope.run({ depth: depth + 1 }, fn);
      this.db.exec(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      this.db.exec(`ROLLBACK TO SAVEPOINT ${name}`);
      this.db.exec(`RELEASE SAVEPOINT ${name}`);
      throw error;
    }
  }

  /**
   * Run `fn` with the connection to itself. Inside a transaction the caller
   * already holds it.
   */
  private async exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    if (this.scope.getStore()) {
      return fn();
    }

    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
