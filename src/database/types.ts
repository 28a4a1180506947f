/**
 * Configuration options for the DatabaseService
 */
export interface DatabaseServiceOptions {
  /** Path to the database file (e.g., "data/scheduler.db") */
  databasePath: string;
  /** Whether to enable WAL mode for better concurrent read performance (default: true) */
  enableWal?: boolean;
  /** How long a writer waits for another connection's lock, in ms (default: 5000) */
  busyTimeoutMs?: number;
}

/**
 * Values accepted as bound statement parameters
 */
export type BindValue = string | number | bigint | Buffer | null;

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecuteResult {
  /** Number of rows changed by the operation */
  changes: number;
  /** Row ID of the last inserted row (for INSERT operations) */
  lastInsertRowId: number;
}

/**
 * A generic row object from a query result
 */
export type Row = Record<string, unknown>;

export type { TransactionContext } from "./transaction_context.ts";

/**
 * The query surface shared by DatabaseService and TransactionContext.
 * Stores accept it so the same method runs standalone or inside a transaction.
 */
export interface SqlExecutor {
  execute(sql: string, params?: BindValue[]): Promise<ExecuteResult>;
  queryAll<T extends Row = Row>(sql: string, params?: BindValue[]): Promise<T[]>;
  queryOne<T extends Row = Row>(sql: string, params?: BindValue[]): Promise<T | null>;
}
