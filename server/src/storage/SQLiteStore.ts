import sqlite3 from 'sqlite3';
import { readFileSync } from 'fs';
import { join } from 'path';
import { isErrorLike } from '../shared/errors';

const DEFAULT_SCHEMA_PATH = join(__dirname, '../../database/schema.sql');

export interface RunOutcome {
  lastID: number;
  changes: number;
}

/**
 * The statements available to callers, either directly on the store or
 * inside a transaction.
 */
export interface StatementRunner {
  run(sql: string, params?: unknown[]): Promise<RunOutcome>;
  get<T>(sql: string, params?: unknown[]): Promise<T | undefined>;
  all<T>(sql: string, params?: unknown[]): Promise<T[]>;
}

/**
 * Serializes use of the single connection. A transaction holds the lane from
 * BEGIN to COMMIT/ROLLBACK so no other caller's statement lands inside it.
 */
class ConnectionLane {
  private locked: boolean = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>(resolve => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}

/**
 * SQLite-based persistence layer for shopping lists and items.
 */
export class SQLiteStore {
  private db: sqlite3.Database;
  private lane = new ConnectionLane();

  private constructor(db: sqlite3.Database) {
    this.db = db;
  }

  /**
   * Opens the database, enforces foreign keys and applies the schema.
   * Rejects if any of that fails; callers treat it as fatal at startup.
   */
  static async open(dbPath: string, schemaPath: string = DEFAULT_SCHEMA_PATH): Promise<SQLiteStore> {
    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, (err) => {
        if (err) reject(err);
        else resolve(handle);
      });
    });

    const store = new SQLiteStore(db);
    try {
      await store.initDatabase(schemaPath);
    } catch (error) {
      await store.close();
      throw error;
    }
    return store;
  }

  private async initDatabase(schemaPath: string): Promise<void> {
    // Enforce referential integrity
    await this.exec('PRAGMA foreign_keys = ON;');

    const schema = readFileSync(schemaPath, 'utf-8');
    await this.exec(schema);
  }

  async exec(sql: string, signal?: AbortSignal): Promise<void> {
    return this.withLane(signal, () => this.execNow(sql));
  }

  async run(sql: string, params: unknown[] = [], signal?: AbortSignal): Promise<RunOutcome> {
    return this.withLane(signal, () => this.runNow(sql, params));
  }

  async get<T>(sql: string, params: unknown[] = [], signal?: AbortSignal): Promise<T | undefined> {
    return this.withLane(signal, () => this.getNow<T>(sql, params));
  }

  async all<T>(sql: string, params: unknown[] = [], signal?: AbortSignal): Promise<T[]> {
    return this.withLane(signal, () => this.allNow<T>(sql, params));
  }

  /**
   * Runs `work` inside BEGIN IMMEDIATE ... COMMIT. Any rejection from `work`,
   * or an abort of `signal` observed before a statement or before COMMIT,
   * rolls the transaction back and rethrows.
   */
  async transaction<T>(work: (tx: StatementRunner) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.withLane(signal, async () => {
      await this.execNow('BEGIN IMMEDIATE');

      const tx: StatementRunner = {
        run: async (sql: string, params: unknown[] = []) => {
          signal?.throwIfAborted();
          return this.runNow(sql, params);
        },
        get: async <R>(sql: string, params: unknown[] = []) => {
          signal?.throwIfAborted();
          return this.getNow<R>(sql, params);
        },
        all: async <R>(sql: string, params: unknown[] = []) => {
          signal?.throwIfAborted();
          return this.allNow<R>(sql, params);
        }
      };

      try {
        const result = await work(tx);
        signal?.throwIfAborted();
        await this.execNow('COMMIT');
        return result;
      } catch (error) {
        await this.rollback(error);
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Rolls back after `cause`. SQLite may already have ended the transaction
   * itself; any other ROLLBACK failure leaves the connection inside the
   * transaction and rejects with both errors.
   */
  private async rollback(cause: unknown): Promise<void> {
    try {
      await this.execNow('ROLLBACK');
    } catch (err) {
      if (isErrorLike(err) && err.message.includes('no transaction is active')) return;
      console.error('❌ Failed to roll back transaction:', err);
      const reason = isErrorLike(err) ? err.message : String(err);
      throw new AggregateError([cause, err], `transaction rollback failed: ${reason}`);
    }
  }

  private async withLane<T>(signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
    signal?.throwIfAborted();
    await this.lane.acquire();
    try {
      signal?.throwIfAborted();
      return await work();
    } finally {
      this.lane.release();
    }
  }

  private execNow(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private runNow(sql: string, params: unknown[]): Promise<RunOutcome> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  private getNow<T>(sql: string, params: unknown[]): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  private allNow<T>(sql: string, params: unknown[]): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }
}

/**
 * True for the error sqlite3 raises when an insert or update references a
 * missing parent row.
 */
export function isForeignKeyViolation(error: unknown): boolean {
  return (
    isErrorLike(error) &&
    'code' in error &&
    error.code === 'SQLITE_CONSTRAINT' &&
    error.message.includes('FOREIGN KEY')
  );
}
