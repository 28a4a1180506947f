import type { DatabaseService } from "../database/database_service.ts";
import type {
  BindValue,
  SqlExecutor,
  TransactionContext,
} from "../database/types.ts";
import type { RecurrenceResolver } from "../recurrence/recurrence_resolver.ts";
import {
  formatForSqlite,
  parseNullableTimestamp,
  parseSqliteTimestamp,
  truncateToSeconds,
} from "../utils/datetime.ts";
import {
  formatSelectionPolicy,
  isNoRepeatScope,
  parseSelectionPolicy,
  type SelectionPolicy,
} from "../variants/types.ts";
import { InvalidScheduleConfigError, ScheduleNotFoundError } from "./errors.ts";
import {
  type DisabledReason,
  isRecurrenceKind,
  type NewSchedule,
  type Schedule,
  type ScheduleAdvance,
  type ScheduleStoreOptions,
} from "./types.ts";

type ScheduleRow = {
  id: number;
  name: string;
  kind: string;
  spec: string;
  timezone: string;
  contentItemId: number | null;
  templateId: number | null;
  selectionPolicy: string;
  noRepeatWindow: number;
  noRepeatScope: string;
  roundRobinCursor: number | null;
  nextRunAt: string | null;
  lastRunAt: string | null;
  enabled: number;
  disabledReason: string | null;
  claimedBy: string | null;
  claimedUntil: string | null;
  createdAt: string;
  updatedAt: string;
};

const SCHEDULE_COLUMNS = `id, name, kind, spec, timezone, contentItemId, templateId,
  selectionPolicy, noRepeatWindow, noRepeatScope, roundRobinCursor, nextRunAt,
  lastRunAt, enabled, disabledReason, claimedBy, claimedUntil, createdAt, updatedAt`;

/**
 * Database operations for schedules.
 *
 * Owns all database access to the schedules table. Other code should
 * never query this table directly - always go through this store.
 *
 * Features:
 * - Validated creation (recurrence spec, timezone, content reference, policy)
 * - Lease-based claiming so concurrent ticks split due schedules between them
 * - State updates that run inside the scheduler's job-creation transaction
 *
 * @example
 * ```typescript
 * const store = new ScheduleStore({ db, resolver });
 * const schedule = await store.create({
 *   name: "morning-post",
 *   kind: "recurrence_rule",
 *   spec: "FREQ=DAILY;BYHOUR=9;BYMINUTE=0",
 *   timezone: "America/Chicago",
 *   templateId: 1,
 *   selectionPolicy: "weighted_random",
 * });
 * ```
 */
export class ScheduleStore {
  private readonly db: DatabaseService;
  private readonly resolver: RecurrenceResolver;

  constructor(options: ScheduleStoreOptions) {
    this.db = options.db;
    this.resolver = options.resolver;
  }

  // ============== Creation ==============

  /**
   * Creates a schedule and sets its first `nextRunAt`. A schedule with no
   * occurrence after `now` is stored disabled as exhausted.
   *
   * @throws InvalidRecurrenceError for a malformed spec or unknown timezone
   * @throws InvalidSelectionPolicyError for an unknown policy string
   * @throws InvalidScheduleConfigError for other invalid settings
   */
  async create(input: NewSchedule, now: Date = new Date()): Promise<Schedule> {
    const timezone = input.timezone ?? "UTC";
    const contentItemId = input.contentItemId ?? null;
    const templateId = input.templateId ?? null;
    const policy = normalizePolicy(input.selectionPolicy);
    const noRepeatWindow = input.noRepeatWindow ?? 0;

    if (input.name.trim().length === 0) {
      throw new InvalidScheduleConfigError("Schedule name must not be empty");
    }
    if ((contentItemId === null) === (templateId === null)) {
      throw new InvalidScheduleConfigError(
        "A schedule needs exactly one of contentItemId or templateId",
      );
    }
    if (!Number.isInteger(noRepeatWindow) || noRepeatWindow < 0) {
      throw new InvalidScheduleConfigError(
        `noRepeatWindow must be a non-negative integer, got ${noRepeatWindow}`,
      );
    }
    this.resolver.validate(input.kind, input.spec, timezone);

    const createdAt = truncateToSeconds(now);
    const timestamp = formatForSqlite(createdAt);

    const id = await this.db.transaction(async (tx) => {
      await this.assertContentExists(tx, contentItemId, templateId);

      const inserted = await tx.queryAll<{ id: number }>(
        `INSERT INTO schedules (name, kind, spec, timezone, contentItemId, templateId,
           selectionPolicy, noRepeatWindow, noRepeatScope, enabled, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         RETURNING id`,
        [
          input.name,
          input.kind,
          input.spec,
          timezone,
          contentItemId,
          templateId,
          formatSelectionPolicy(policy),
          noRepeatWindow,
          input.noRepeatScope ?? "schedule",
          input.enabled === false ? 0 : 1,
          timestamp,
          timestamp,
        ],
      );
      const scheduleId = inserted[0].id;

      const nextRunAt = this.resolver.resolve(
        { id: scheduleId, kind: input.kind, spec: input.spec, timezone, createdAt },
        now,
      );
      await tx.execute(
        `UPDATE schedules SET nextRunAt = ?, enabled = enabled AND ?, disabledReason = ?
         WHERE id = ?`,
        [
          nextRunAt ? formatForSqlite(nextRunAt) : null,
          nextRunAt ? 1 : 0,
          nextRunAt ? null : "exhausted",
          scheduleId,
        ],
      );
      return scheduleId;
    });

    return await this.getByIdOrThrow(id);
  }

  // ============== Reads ==============

  /**
   * @throws InvalidScheduleConfigError or InvalidSelectionPolicyError if the
   *   stored row can't be interpreted
   */
  async getById(id: number, executor: SqlExecutor = this.db): Promise<Schedule | null> {
    const row = await executor.queryOne<ScheduleRow>(
      `SELECT ${SCHEDULE_COLUMNS} FROM schedules WHERE id = ?`,
      [id],
    );
    return row ? rowToSchedule(row) : null;
  }

  /**
   * @throws ScheduleNotFoundError if the schedule does not exist
   */
  async getByIdOrThrow(id: number, executor: SqlExecutor = this.db): Promise<Schedule> {
    const schedule = await this.getById(id, executor);
    if (!schedule) {
      throw new ScheduleNotFoundError(id);
    }
    return schedule;
  }

  async list(options: { enabledOnly?: boolean } = {}): Promise<Schedule[]> {
    const rows = await this.db.queryAll<ScheduleRow>(
      `SELECT ${SCHEDULE_COLUMNS} FROM schedules
       ${options.enabledOnly ? "WHERE enabled = 1" : ""}
       ORDER BY id`,
    );
    return rows.map(rowToSchedule);
  }

  /**
   * Enabled schedules that have never been given a next run.
   */
  async listMissingNextRun(): Promise<number[]> {
    const rows = await this.db.queryAll<{ id: number }>(
      "SELECT id FROM schedules WHERE enabled = 1 AND nextRunAt IS NULL ORDER BY id",
    );
    return rows.map((row) => row.id);
  }

  /**
   * Enabled schedules whose next run is earlier than `before`.
   */
  async countOverdue(before: Date): Promise<number> {
    const row = await this.db.queryOne<{ count: number }>(
      `SELECT COUNT(*) AS count FROM schedules
       WHERE enabled = 1 AND nextRunAt IS NOT NULL AND nextRunAt < ?`,
      [formatForSqlite(before)],
    );
    return row?.count ?? 0;
  }

  // ============== Claims ==============

  /**
   * Reserves due schedules for one instance.
   *
   * A schedule is claimable when it is enabled, due, and no other instance
   * holds an unexpired claim on it. Claimed rows are skipped by other callers
   * until `claimTtlMs` elapses or the claim is released.
   *
   * @returns Claimed schedule ids, earliest due first
   */
  async claimDue(
    instanceId: string,
    now: Date,
    claimTtlMs: number,
    limit: number,
  ): Promise<number[]> {
    const nowText = formatForSqlite(now);
    const claimedUntil = formatForSqlite(new Date(now.getTime() + claimTtlMs));

    return await this.db.transaction(async (tx) => {
      const due = await tx.queryAll<{ id: number }>(
        `SELECT id FROM schedules
         WHERE enabled = 1
           AND nextRunAt IS NOT NULL AND nextRunAt <= ?
           AND (claimedUntil IS NULL OR claimedUntil <= ?)
         ORDER BY nextRunAt ASC, id ASC
         LIMIT ?`,
        [nowText, nowText, limit],
      );
      if (due.length === 0) {
        return [];
      }

      const ids = due.map((row) => row.id);
      await tx.execute(
        `UPDATE schedules SET claimedBy = ?, claimedUntil = ?
         WHERE id IN (${ids.map(() => "?").join(", ")})`,
        [instanceId, claimedUntil, ...ids],
      );
      return ids;
    });
  }

  /**
   * Drops this instance's claim. Claims held by others are left alone.
   */
  async releaseClaim(id: number, instanceId: string): Promise<void> {
    await this.db.execute(
      `UPDATE schedules SET claimedBy = NULL, claimedUntil = NULL
       WHERE id = ? AND claimedBy = ?`,
      [id, instanceId],
    );
  }

  // ============== Updates ==============

  /**
   * Moves a schedule past an occurrence. Runs in the job-creation transaction.
   */
  async advance(
    tx: TransactionContext,
    id: number,
    advance: ScheduleAdvance,
    now: Date,
  ): Promise<void> {
    const assignments = ["nextRunAt = ?", "lastRunAt = COALESCE(?, lastRunAt)", "updatedAt = ?"];
    const params: BindValue[] = [
      advance.nextRunAt ? formatForSqlite(advance.nextRunAt) : null,
      advance.lastRunAt ? formatForSqlite(advance.lastRunAt) : null,
      formatForSqlite(now),
    ];

    if (advance.roundRobinCursor !== undefined) {
      assignments.push("roundRobinCursor = ?");
      params.push(advance.roundRobinCursor);
    }
    if (advance.disabledReason !== undefined) {
      assignments.push("enabled = 0", "disabledReason = ?");
      params.push(advance.disabledReason);
    }

    await tx.execute(
      `UPDATE schedules SET ${assignments.join(", ")} WHERE id = ?`,
      [...params, id],
    );
  }

  /**
   * Sets the next run of an enabled schedule.
   */
  async setNextRunAt(id: number, nextRunAt: Date, now: Date): Promise<void> {
    await this.db.execute(
      "UPDATE schedules SET nextRunAt = ?, updatedAt = ? WHERE id = ?",
      [formatForSqlite(nextRunAt), formatForSqlite(now), id],
    );
  }

  /**
   * Disables a schedule. Works on rows that can no longer be parsed.
   *
   * @throws ScheduleNotFoundError if the schedule does not exist
   */
  async disable(
    id: number,
    reason: DisabledReason,
    now: Date = new Date(),
    executor: SqlExecutor = this.db,
  ): Promise<void> {
    const result = await executor.execute(
      `UPDATE schedules
       SET enabled = 0, disabledReason = ?, nextRunAt = NULL,
           claimedBy = NULL, claimedUntil = NULL, updatedAt = ?
       WHERE id = ?`,
      [reason, formatForSqlite(now), id],
    );
    if (result.changes === 0) {
      throw new ScheduleNotFoundError(id);
    }
  }

  /**
   * Re-enables a schedule from its next occurrence after `now`.
   *
   * @returns The schedule; still disabled (as exhausted) if nothing is left
   * @throws ScheduleNotFoundError if the schedule does not exist
   */
  async enable(id: number, now: Date = new Date()): Promise<Schedule> {
    const schedule = await this.getByIdOrThrow(id);
    const nextRunAt = this.resolver.resolve(schedule, now);

    await this.db.execute(
      `UPDATE schedules SET enabled = ?, disabledReason = ?, nextRunAt = ?, updatedAt = ?
       WHERE id = ?`,
      [
        nextRunAt ? 1 : 0,
        nextRunAt ? null : "exhausted",
        nextRunAt ? formatForSqlite(nextRunAt) : null,
        formatForSqlite(now),
        id,
      ],
    );
    return await this.getByIdOrThrow(id);
  }

  // ============== Private Helpers ==============

  private async assertContentExists(
    tx: TransactionContext,
    contentItemId: number | null,
    templateId: number | null,
  ): Promise<void> {
    if (templateId !== null) {
      const row = await tx.queryOne("SELECT id FROM templates WHERE id = ?", [templateId]);
      if (!row) {
        throw new InvalidScheduleConfigError(`Template ${templateId} does not exist`);
      }
    }
    if (contentItemId !== null) {
      const row = await tx.queryOne("SELECT id FROM contentItems WHERE id = ?", [
        contentItemId,
      ]);
      if (!row) {
        throw new InvalidScheduleConfigError(`Content item ${contentItemId} does not exist`);
      }
    }
  }
}

// ============== Row Mapping ==============

function normalizePolicy(policy: SelectionPolicy | string | undefined): SelectionPolicy {
  if (policy === undefined) {
    return { kind: "uniform_random" };
  }
  return typeof policy === "string" ? parseSelectionPolicy(policy) : policy;
}

function rowToSchedule(row: ScheduleRow): Schedule {
  if (!isRecurrenceKind(row.kind)) {
    throw new InvalidScheduleConfigError(
      `Schedule ${row.id} has unknown recurrence kind '${row.kind}'`,
    );
  }
  if (!isNoRepeatScope(row.noRepeatScope)) {
    throw new InvalidScheduleConfigError(
      `Schedule ${row.id} has unknown no-repeat scope '${row.noRepeatScope}'`,
    );
  }

  return {
    id: row.id,
    name: row.name,
    kind: row.kind,
    spec: row.spec,
    timezone: row.timezone,
    contentItemId: row.contentItemId,
    templateId: row.templateId,
    selectionPolicy: parseSelectionPolicy(row.selectionPolicy),
    noRepeatWindow: row.noRepeatWindow,
    noRepeatScope: row.noRepeatScope,
    roundRobinCursor: row.roundRobinCursor,
    nextRunAt: parseNullableTimestamp(row.nextRunAt),
    lastRunAt: parseNullableTimestamp(row.lastRunAt),
    enabled: row.enabled === 1,
    disabledReason: row.disabledReason,
    claimedBy: row.claimedBy,
    claimedUntil: parseNullableTimestamp(row.claimedUntil),
    createdAt: parseSqliteTimestamp(row.createdAt),
    updatedAt: parseSqliteTimestamp(row.updatedAt),
  };
}
