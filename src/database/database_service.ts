import { AsyncLocalStorage } from "node:async_hooks";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { Mutex } from "async-mutex";
import type {
  BindValue,
  DatabaseServiceOptions,
  ExecuteResult,
  Row,
} from "./types.ts";
import {
  DatabaseAccessError,
  DatabaseNotOpenError,
  NestedTransactionError,
  QueryError,
  TransactionError,
} from "./errors.ts";
import { TransactionContext } from "./transaction_context.ts";

/**
 * A SQLite database service with mutex-protected write operations.
 *
 * Features:
 * - WAL mode for concurrent read performance
 * - Mutex-protected writes so concurrent async callers never interleave a
 *   statement into someone else's transaction
 * - `BEGIN IMMEDIATE` transactions, which take the database write lock up front.
 *   Within one connection this is the row-lock equivalent used by the job state
 *   machine and the scheduler; across processes `busy_timeout` queues writers.
 *
 * The database should be opened once at application startup and remain open
 * for the application's lifetime. close() is only called during graceful shutdown.
 *
 * @example
 * ```typescript
 * const db = new DatabaseService({ databasePath: "data/scheduler.db" });
 * await db.open();
 *
 * // Write (mutex-protected)
 * await db.execute("UPDATE schedules SET enabled = 0 WHERE id = ?", [7]);
 *
 * // Read (no mutex needed)
 * const due = await db.queryAll("SELECT * FROM schedules WHERE enabled = 1");
 *
 * await db.close();
 * ```
 */
export class DatabaseService {
  private readonly databasePath: string;
  private readonly enableWal: boolean;
  private readonly busyTimeoutMs: number;
  private readonly writeMutex = new Mutex();
  private readonly transactionScope = new AsyncLocalStorage<true>();

  private db: Database.Database | null = null;

  constructor(options: DatabaseServiceOptions) {
    this.databasePath = options.databasePath;
    this.enableWal = options.enableWal ?? true;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 5000;
  }

  // ============== Connection Management ==============

  /**
   * Opens the database connection.
   * Creates the parent directory if it doesn't exist.
   */
  async open(): Promise<void> {
    if (this.db) return;

    await this.ensureParentDirectory();

    try {
      const db = new Database(this.databasePath);
      if (this.enableWal) {
        db.pragma("journal_mode = WAL");
        db.pragma("synchronous = NORMAL");
      }
      db.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
      db.pragma("foreign_keys = ON");
      this.db = db;
    } catch (error) {
      throw new DatabaseAccessError(this.databasePath, error);
    }
  }

  /**
   * Closes the database connection.
   * Safe to call multiple times. Waits for an in-flight write to finish.
   */
  async close(): Promise<void> {
    if (!this.db) return;

    await this.writeMutex.runExclusive(() => {
      this.db?.close();
      this.db = null;
    });
  }

  /**
   * Returns true if the database connection is open.
   */
  get isOpen(): boolean {
    return this.db !== null;
  }

  // ============== Query Execution ==============

  /**
   * Executes a SQL statement that modifies data (INSERT, UPDATE, DELETE).
   * Acquires write mutex automatically to prevent concurrent write conflicts.
   *
   * @returns ExecuteResult with changes count and lastInsertRowId
   * @throws DatabaseNotOpenError if the connection is not open
   * @throws NestedTransactionError if called from inside a transaction callback
   * @throws QueryError if the query fails
   */
  async execute(sql: string, params: BindValue[] = []): Promise<ExecuteResult> {
    const db = this.ensureOpen();
    this.ensureNotInTransaction("execute");

    return await this.writeMutex.runExclusive(() => {
      try {
        const result = db.prepare<BindValue[]>(sql).run(...params);
        return {
          changes: result.changes,
          lastInsertRowId: Number(result.lastInsertRowid),
        };
      } catch (error) {
        throw new QueryError(sql, error);
      }
    });
  }

  /**
   * Executes a SQL query and returns all matching rows.
   * Does not acquire mutex (reads are safe in WAL mode).
   *
   * @returns Array of row objects, empty array if no matches
   * @throws DatabaseNotOpenError if the connection is not open
   * @throws QueryError if the query fails
   */
  async queryAll<T extends Row = Row>(
    sql: string,
    params: BindValue[] = []
  ): Promise<T[]> {
    const db = this.ensureOpen();

    // Synchronous operation, but kept async for API consistency
    await Promise.resolve();

    try {
      return db.prepare<BindValue[], T>(sql).all(...params);
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }

  /**
   * Executes a SQL query and returns the first matching row.
   * Does not acquire mutex (reads are safe in WAL mode).
   *
   * @returns Single row object or null if no match
   * @throws DatabaseNotOpenError if the connection is not open
   * @throws QueryError if the query fails
   */
  async queryOne<T extends Row = Row>(
    sql: string,
    params: BindValue[] = []
  ): Promise<T | null> {
    const db = this.ensureOpen();

    await Promise.resolve();

    try {
      return db.prepare<BindValue[], T>(sql).get(...params) ?? null;
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }

  /**
   * Executes SQL for DDL operations. Accepts multiple statements.
   * Acquires write mutex automatically.
   *
   * @throws DatabaseNotOpenError if the connection is not open
   * @throws QueryError if the execution fails
   */
  async exec(sql: string): Promise<void> {
    const db = this.ensureOpen();
    this.ensureNotInTransaction("exec");

    await this.writeMutex.runExclusive(() => {
      try {
        db.exec(sql);
      } catch (error) {
        throw new QueryError(sql, error);
      }
    });
  }

  // ============== Transactions ==============

  /**
   * Executes a callback within a database transaction.
   * Automatically commits on success, rolls back on error.
   *
   * Transactions are serialized - concurrent calls queue on the write mutex.
   * Nested transactions are not supported (SQLite has no true nesting); a call
   * made from inside a transaction callback is rejected instead of deadlocking.
   *
   * @throws NestedTransactionError if called within another transaction
   * @throws TransactionError if ROLLBACK fails
   * @throws Original error from callback (after rollback)
   *
   * @example
   * ```typescript
   * await db.transaction(async (tx) => {
   *   const job = await tx.queryOne("SELECT * FROM jobs WHERE id = ?", [id]);
   *   await tx.execute("UPDATE jobs SET status = 'running' WHERE id = ?", [id]);
   * });
   * ```
   */
  async transaction<T>(
    callback: (tx: TransactionContext) => Promise<T>
  ): Promise<T> {
    this.ensureNotInTransaction("transaction");
    this.ensureOpen();

    return await this.writeMutex.runExclusive(() =>
      this.transactionScope.run(true, async () => {
        // The connection may have been closed while queued on the mutex
        const db = this.ensureOpen();

        try {
          db.exec("BEGIN IMMEDIATE");
        } catch (error) {
          throw new TransactionError("Failed to begin transaction", error);
        }

        try {
          const result = await callback(new TransactionContext(db));
          db.exec("COMMIT");
          return result;
        } catch (error) {
          try {
            if (db.inTransaction) {
              db.exec("ROLLBACK");
            }
          } catch (rollbackError) {
            throw new TransactionError(
              "Transaction rollback failed after error",
              rollbackError
            );
          }
          throw error;
        }
      })
    );
  }

  // ============== Private Helpers ==============

  private ensureOpen(): Database.Database {
    if (!this.db) {
      throw new DatabaseNotOpenError();
    }
    return this.db;
  }

  private ensureNotInTransaction(operation: string): void {
    if (this.transactionScope.getStore()) {
      throw new NestedTransactionError(
        `${operation}() called inside a transaction; use the transaction context instead`
      );
    }
  }

  private async ensureParentDirectory(): Promise<void> {
    if (this.databasePath === ":memory:") return;

    const parentDir = dirname(this.databasePath);
    try {
      await mkdir(parentDir, { recursive: true });
    } catch (error) {
      throw new DatabaseAccessError(parentDir, error);
    }
  }
}
