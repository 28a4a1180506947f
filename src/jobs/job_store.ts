import type { DatabaseService } from "../database/database_service.ts";
import { QueryError } from "../database/errors.ts";
import type {
  BindValue,
  SqlExecutor,
  TransactionContext,
} from "../database/types.ts";
import {
  formatForSqlite,
  parseNullableTimestamp,
  parseSqliteTimestamp,
} from "../utils/datetime.ts";
import { DuplicateJobError, JobNotFoundError } from "./errors.ts";
import {
  isJobStatus,
  type Job,
  type JobStatus,
  type JobStoreOptions,
  type NewJob,
  type PublishedRecord,
} from "./types.ts";

type JobRow = {
  id: number;
  scheduleId: number;
  plannedAt: string;
  variantId: number | null;
  selectionPolicy: string | null;
  selectionSeed: string | null;
  status: string;
  attempt: number;
  availableAt: string | null;
  enqueuedAt: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  lastError: string | null;
  processInstanceId: string | null;
  createdAt: string;
  updatedAt: string;
};

type PublishedRecordRow = {
  id: number;
  jobId: number;
  externalId: string;
  variantId: number | null;
  publishedAt: string;
};

/**
 * Column values a status change writes. Undefined keys are left untouched.
 */
export interface JobPatch {
  status: JobStatus;
  attempt?: number;
  availableAt?: Date | null;
  enqueuedAt?: Date | null;
  startedAt?: Date | null;
  finishedAt?: Date | null;
  lastError?: string | null;
  processInstanceId?: string | null;
}

const JOB_COLUMNS = `id, scheduleId, plannedAt, variantId, selectionPolicy, selectionSeed,
  status, attempt, availableAt, enqueuedAt, startedAt, finishedAt, lastError,
  processInstanceId, createdAt, updatedAt`;

/**
 * Durable storage for publish jobs and their published records.
 *
 * `(scheduleId, plannedAt)` is unique: inserting a second job for the same
 * occurrence raises DuplicateJobError. plannedAt is stored at second precision,
 * so instants that differ only in milliseconds collide as intended.
 *
 * Jobs are never deleted; terminal jobs stay as the audit trail.
 *
 * Status changes go through JobStateMachine, which calls {@link applyPatch}
 * inside its transaction.
 *
 * @example
 * ```typescript
 * const jobStore = new JobStore({ db });
 *
 * await db.transaction(async (tx) => {
 *   const job = await jobStore.insertPlanned(tx, {
 *     scheduleId: 1,
 *     plannedAt: new Date("2024-03-10T14:00:00Z"),
 *     variantId: 5,
 *     selectionPolicy: "uniform_random",
 *     selectionSeed: "0123456789abcdef",
 *   }, new Date());
 * });
 * ```
 */
export class JobStore {
  private readonly db: DatabaseService;

  constructor(options: JobStoreOptions) {
    this.db = options.db;
  }

  // ============== Creation ==============

  /**
   * Inserts a job in the planned state.
   *
   * @throws DuplicateJobError if a job for the same occurrence exists
   */
  async insertPlanned(tx: TransactionContext, job: NewJob, now: Date): Promise<Job> {
    const timestamp = formatForSqlite(now);
    let rows: JobRow[];
    try {
      rows = await tx.queryAll<JobRow>(
        `INSERT INTO jobs (scheduleId, plannedAt, variantId, selectionPolicy, selectionSeed,
           status, attempt, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, 'planned', 0, ?, ?)
         RETURNING ${JOB_COLUMNS}`,
        [
          job.scheduleId,
          formatForSqlite(job.plannedAt),
          job.variantId,
          job.selectionPolicy,
          job.selectionSeed,
          timestamp,
          timestamp,
        ],
      );
    } catch (error) {
      if (error instanceof QueryError && error.isUniqueViolation) {
        throw new DuplicateJobError(job.scheduleId, job.plannedAt);
      }
      throw error;
    }
    return rowToJob(rows[0]);
  }

  // ============== Reads ==============

  async getById(id: number, executor: SqlExecutor = this.db): Promise<Job | null> {
    const row = await executor.queryOne<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = ?`,
      [id],
    );
    return row ? rowToJob(row) : null;
  }

  /**
   * @throws JobNotFoundError if the job does not exist
   */
  async getByIdOrThrow(id: number, executor: SqlExecutor = this.db): Promise<Job> {
    const job = await this.getById(id, executor);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  async getByOccurrence(
    scheduleId: number,
    plannedAt: Date,
    executor: SqlExecutor = this.db,
  ): Promise<Job | null> {
    const row = await executor.queryOne<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE scheduleId = ? AND plannedAt = ?`,
      [scheduleId, formatForSqlite(plannedAt)],
    );
    return row ? rowToJob(row) : null;
  }

  /**
   * Jobs for a schedule, most recent occurrence first.
   */
  async listBySchedule(scheduleId: number, limit = 100): Promise<Job[]> {
    const rows = await this.db.queryAll<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE scheduleId = ?
       ORDER BY plannedAt DESC LIMIT ?`,
      [scheduleId, limit],
    );
    return rows.map(rowToJob);
  }

  async listByStatus(status: JobStatus, limit = 100): Promise<Job[]> {
    const rows = await this.db.queryAll<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE status = ?
       ORDER BY updatedAt DESC, id DESC LIMIT ?`,
      [status, limit],
    );
    return rows.map(rowToJob);
  }

  /**
   * Next job a worker may run: enqueued, or failed with its retry delay
   * elapsed. Oldest availability first.
   */
  async nextRunnable(now: Date): Promise<Job | null> {
    const row = await this.db.queryOne<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs
       WHERE status IN ('enqueued', 'failed')
         AND (availableAt IS NULL OR availableAt <= ?)
       ORDER BY COALESCE(availableAt, plannedAt) ASC, id ASC
       LIMIT 1`,
      [formatForSqlite(now)],
    );
    return row ? rowToJob(row) : null;
  }

  /**
   * Running jobs whose current attempt started before `startedBefore`.
   */
  async listStaleRunning(startedBefore: Date, limit = 100): Promise<Job[]> {
    const rows = await this.db.queryAll<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs
       WHERE status = 'running' AND startedAt < ?
       ORDER BY startedAt ASC LIMIT ?`,
      [formatForSqlite(startedBefore), limit],
    );
    return rows.map(rowToJob);
  }

  /**
   * Job counts per status; statuses with no jobs report 0.
   */
  async countByStatus(): Promise<Record<JobStatus, number>> {
    const rows = await this.db.queryAll<{ status: string; count: number }>(
      "SELECT status, COUNT(*) AS count FROM jobs GROUP BY status",
    );

    const result: Record<JobStatus, number> = {
      planned: 0,
      enqueued: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      dead_letter: 0,
      cancelled: 0,
    };

    for (const row of rows) {
      if (isJobStatus(row.status)) {
        result[row.status] = row.count;
      }
    }
    return result;
  }

  // ============== Writes ==============

  /**
   * Writes a status change, guarded on the status the caller read.
   *
   * @returns The updated job, or null when the row was no longer in `expected`
   */
  async applyPatch(
    tx: TransactionContext,
    id: number,
    expected: JobStatus,
    patch: JobPatch,
    now: Date,
  ): Promise<Job | null> {
    const assignments: string[] = ["status = ?", "updatedAt = ?"];
    const params: BindValue[] = [patch.status, formatForSqlite(now)];

    const optional: [keyof Omit<JobPatch, "status">, BindValue | undefined][] = [
      ["attempt", patch.attempt],
      ["availableAt", toTimestamp(patch.availableAt)],
      ["enqueuedAt", toTimestamp(patch.enqueuedAt)],
      ["startedAt", toTimestamp(patch.startedAt)],
      ["finishedAt", toTimestamp(patch.finishedAt)],
      ["lastError", patch.lastError],
      ["processInstanceId", patch.processInstanceId],
    ];
    for (const [column, value] of optional) {
      if (value !== undefined) {
        assignments.push(`${column} = ?`);
        params.push(value);
      }
    }

    const rows = await tx.queryAll<JobRow>(
      `UPDATE jobs SET ${assignments.join(", ")}
       WHERE id = ? AND status = ?
       RETURNING ${JOB_COLUMNS}`,
      [...params, id, expected],
    );
    return rows.length > 0 ? rowToJob(rows[0]) : null;
  }

  // ============== Published Records ==============

  async recordPublication(
    tx: TransactionContext,
    record: Omit<PublishedRecord, "id">,
  ): Promise<PublishedRecord> {
    const result = await tx.execute(
      `INSERT INTO publishedRecords (jobId, externalId, variantId, publishedAt)
       VALUES (?, ?, ?, ?)`,
      [
        record.jobId,
        record.externalId,
        record.variantId,
        formatForSqlite(record.publishedAt),
      ],
    );
    return { id: result.lastInsertRowId, ...record };
  }

  async getPublishedRecord(jobId: number): Promise<PublishedRecord | null> {
    const row = await this.db.queryOne<PublishedRecordRow>(
      `SELECT id, jobId, externalId, variantId, publishedAt
       FROM publishedRecords WHERE jobId = ?`,
      [jobId],
    );
    return row ? rowToPublishedRecord(row) : null;
  }

  async listPublishedRecords(limit = 100): Promise<PublishedRecord[]> {
    const rows = await this.db.queryAll<PublishedRecordRow>(
      `SELECT id, jobId, externalId, variantId, publishedAt
       FROM publishedRecords ORDER BY publishedAt DESC, id DESC LIMIT ?`,
      [limit],
    );
    return rows.map(rowToPublishedRecord);
  }
}

// ============== Row Mapping ==============

function toTimestamp(value: Date | null | undefined): string | null | undefined {
  if (value === undefined || value === null) return value;
  return formatForSqlite(value);
}

function rowToJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) {
    throw new Error(`Job ${row.id} has unknown status '${row.status}'`);
  }
  return {
    id: row.id,
    scheduleId: row.scheduleId,
    plannedAt: parseSqliteTimestamp(row.plannedAt),
    variantId: row.variantId,
    selectionPolicy: row.selectionPolicy,
    selectionSeed: row.selectionSeed,
    status: row.status,
    attempt: row.attempt,
    availableAt: parseNullableTimestamp(row.availableAt),
    enqueuedAt: parseNullableTimestamp(row.enqueuedAt),
    startedAt: parseNullableTimestamp(row.startedAt),
    finishedAt: parseNullableTimestamp(row.finishedAt),
    lastError: row.lastError,
    processInstanceId: row.processInstanceId,
    createdAt: parseSqliteTimestamp(row.createdAt),
    updatedAt: parseSqliteTimestamp(row.updatedAt),
  };
}

function rowToPublishedRecord(row: PublishedRecordRow): PublishedRecord {
  return {
    id: row.id,
    jobId: row.jobId,
    externalId: row.externalId,
    variantId: row.variantId,
    publishedAt: parseSqliteTimestamp(row.publishedAt),
  };
}
