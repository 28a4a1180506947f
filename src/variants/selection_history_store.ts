import type { DatabaseService } from "../database/database_service.ts";
import type { SqlExecutor, TransactionContext } from "../database/types.ts";
import { formatForSqlite, parseSqliteTimestamp } from "../utils/datetime.ts";
import type { NoRepeatScope } from "./types.ts";

/**
 * One recorded selection.
 */
export interface SelectionHistoryEntry {
  id: number;
  templateId: number;
  variantId: number;
  scheduleId: number;
  jobId: number;
  plannedAt: Date;
  recordedAt: Date;
}

/**
 * Query for the variants recently chosen within a no-repeat scope.
 */
export interface RecentSelectionQuery {
  scope: NoRepeatScope;
  scheduleId: number;
  templateId: number;
  /** Only selections for occurrences strictly before this instant count */
  before: Date;
  limit: number;
}

type HistoryRow = {
  id: number;
  templateId: number;
  variantId: number;
  scheduleId: number;
  jobId: number;
  plannedAt: string;
  recordedAt: string;
};

/**
 * Append-only selection history backing the no-repeat window.
 */
export class SelectionHistoryStore {
  private readonly db: DatabaseService;

  constructor(options: { db: DatabaseService }) {
    this.db = options.db;
  }

  /**
   * Records a selection. Runs inside the job-creation transaction, after the
   * job row exists.
   */
  async record(
    tx: TransactionContext,
    entry: Omit<SelectionHistoryEntry, "id" | "recordedAt">,
    recordedAt: Date,
  ): Promise<void> {
    await tx.execute(
      `INSERT INTO selectionHistory (templateId, variantId, scheduleId, jobId, plannedAt, recordedAt)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        entry.templateId,
        entry.variantId,
        entry.scheduleId,
        entry.jobId,
        formatForSqlite(entry.plannedAt),
        formatForSqlite(recordedAt),
      ],
    );
  }

  /**
   * Variant ids of the most recent selections in scope, newest first.
   */
  async recentVariantIds(
    query: RecentSelectionQuery,
    executor: SqlExecutor = this.db,
  ): Promise<number[]> {
    if (query.limit <= 0) {
      return [];
    }

    const column = query.scope === "schedule" ? "scheduleId" : "templateId";
    const key = query.scope === "schedule" ? query.scheduleId : query.templateId;
    const rows = await executor.queryAll<{ variantId: number }>(
      `SELECT variantId FROM selectionHistory
       WHERE ${column} = ? AND plannedAt < ?
       ORDER BY plannedAt DESC, id DESC
       LIMIT ?`,
      [key, formatForSqlite(query.before), query.limit],
    );
    return rows.map((row) => row.variantId);
  }

  /**
   * Texts of the most recently published variants, newest first.
   */
  async recentPublishedTexts(
    limit: number,
    executor: SqlExecutor = this.db,
  ): Promise<string[]> {
    const rows = await executor.queryAll<{ text: string }>(
      `SELECT v.text AS text
       FROM publishedRecords p
       JOIN variants v ON v.id = p.variantId
       ORDER BY p.publishedAt DESC, p.id DESC
       LIMIT ?`,
      [limit],
    );
    return rows.map((row) => row.text);
  }

  async listForSchedule(scheduleId: number, limit = 50): Promise<SelectionHistoryEntry[]> {
    const rows = await this.db.queryAll<HistoryRow>(
      `SELECT id, templateId, variantId, scheduleId, jobId, plannedAt, recordedAt
       FROM selectionHistory WHERE scheduleId = ?
       ORDER BY plannedAt DESC, id DESC LIMIT ?`,
      [scheduleId, limit],
    );
    return rows.map((row) => ({
      id: row.id,
      templateId: row.templateId,
      variantId: row.variantId,
      scheduleId: row.scheduleId,
      jobId: row.jobId,
      plannedAt: parseSqliteTimestamp(row.plannedAt),
      recordedAt: parseSqliteTimestamp(row.recordedAt),
    }));
  }
}
