import type BetterSqlite3 from "better-sqlite3";
import type { BindValue, ExecuteResult, Row } from "./types.ts";
import { QueryError } from "./errors.ts";

/**
 * Transaction context for executing database operations within a transaction.
 * Provides the same query API as DatabaseService but operates within an
 * active transaction without acquiring mutex locks.
 *
 * This class should not be instantiated directly - it's created by
 * DatabaseService.transaction() and passed to the transaction callback.
 *
 * @example
 * ```typescript
 * await db.transaction(async (tx) => {
 *   await tx.execute("INSERT INTO jobs (scheduleId, plannedAt) VALUES (?, ?)", [1, at]);
 *   await tx.execute("UPDATE schedules SET lastRunAt = ? WHERE id = ?", [at, 1]);
 *   // Both statements commit together, or roll back together on error
 * });
 * ```
 */
export class TransactionContext {
  private readonly db: BetterSqlite3.Database;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
  }

  /**
   * Executes a SQL statement within the transaction (INSERT, UPDATE, DELETE).
   * Does NOT acquire mutex - the parent transaction already holds it.
   *
   * @throws QueryError if the query fails
   */
  async execute(sql: string, params: BindValue[] = []): Promise<ExecuteResult> {
    // Synchronous operation, wrapped in promise for API consistency
    await Promise.resolve();

    try {
      const result = this.db.prepare<BindValue[]>(sql).run(...params);
      return {
        changes: result.changes,
        lastInsertRowId: Number(result.lastInsertRowid),
      };
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }

  /**
   * Executes a SQL query and returns all matching rows within the transaction.
   * Also used for `UPDATE ... RETURNING` statements.
   *
   * @throws QueryError if the query fails
   */
  async queryAll<T extends Row = Row>(
    sql: string,
    params: BindValue[] = []
  ): Promise<T[]> {
    await Promise.resolve();

    try {
      return this.db.prepare<BindValue[], T>(sql).all(...params);
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }

  /**
   * Executes a SQL query and returns the first matching row within the transaction.
   *
   * @returns Single row object or null if no match
   * @throws QueryError if the query fails
   */
  async queryOne<T extends Row = Row>(
    sql: string,
    params: BindValue[] = []
  ): Promise<T | null> {
    await Promise.resolve();

    try {
      return this.db.prepare<BindValue[], T>(sql).get(...params) ?? null;
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }

  /**
   * Executes SQL for DDL operations within the transaction.
   * Accepts multiple statements separated by semicolons.
   *
   * @throws QueryError if the execution fails
   */
  async exec(sql: string): Promise<void> {
    await Promise.resolve();

    try {
      this.db.exec(sql);
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }
}
