import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { StorageError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * SQLite database adapter backing the job store, session store and task queue
 * Domain layer never imports this - accessed via dependency injection
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    try {
      if (env.SQLITE_DB_PATH !== ':memory:') {
        mkdirSync(dirname(env.SQLITE_DB_PATH), { recursive: true });
      }
      this.db = new Database(env.SQLITE_DB_PATH);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
    } catch (error) {
      throw new StorageError('Failed to open database', { error });
    }
    this.initializeSchema();
    logger.info('Database initialized', { path: env.SQLITE_DB_PATH });
  }

  private initializeSchema(): void {
    try {
      const schemaPath = join(__dirname, 'db', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');
      this.db.exec(schema);
    } catch (error) {
      throw new StorageError('Failed to initialize database schema', { error });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare<unknown[], T>(sql);
      return stmt.all(...params);
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new StorageError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare<unknown[], T>(sql);
      return stmt.get(...params) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new StorageError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows; compare-and-set callers rely on it.
   */
  execute(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare<unknown[]>(sql);
      const result = stmt.run(...params);
      return result.changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new StorageError('Execute failed', { sql, error });
    }
  }

  /**
   * Execute multiple statements in a transaction
   * Rolls back on any error
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      logger.error('Transaction failed, rolling back', { error });
      throw new StorageError('Transaction failed', { error });
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
