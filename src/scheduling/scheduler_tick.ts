import type { DatabaseService } from "../database/database_service.ts";
import type { TransactionContext } from "../database/types.ts";
import type { DedupeGuard } from "../dedupe/dedupe_guard.ts";
import type { EventBus } from "../events/event_bus.ts";
import { EventType } from "../events/event_types.ts";
import type { InstanceIdService } from "../instance/instance_id_service.ts";
import { DuplicateJobError } from "../jobs/errors.ts";
import type { JobStateMachine } from "../jobs/job_state_machine.ts";
import type { JobStore } from "../jobs/job_store.ts";
import type { RecurrenceResolver } from "../recurrence/recurrence_resolver.ts";
import { truncateToSeconds } from "../utils/datetime.ts";
import { logger } from "../utils/logger.ts";
import { ValidationError } from "../validation/errors.ts";
import type { SelectionHistoryStore } from "../variants/selection_history_store.ts";
import { formatSelectionPolicy } from "../variants/types.ts";
import type { ScheduleStore } from "./schedule_store.ts";
import type { SelectionService } from "./selection_service.ts";
import type {
  HealthReport,
  OccurrenceOutcome,
  Schedule,
  SchedulerTickConfig,
  TickResult,
} from "./types.ts";

export interface SchedulerTickOptions {
  db: DatabaseService;
  scheduleStore: ScheduleStore;
  jobStore: JobStore;
  stateMachine: JobStateMachine;
  selectionService: SelectionService;
  historyStore: SelectionHistoryStore;
  resolver: RecurrenceResolver;
  dedupeGuard: DedupeGuard;
  instanceIdService: InstanceIdService;
  config: SchedulerTickConfig;
  eventBus?: EventBus;
  now?: () => Date;
}

/**
 * Turns due schedule occurrences into enqueued publish jobs.
 *
 * Each tick:
 * 1. Claims up to `batchSize` due schedules with a lease other instances skip
 * 2. Per schedule, takes the dedupe key for the occurrence (best effort)
 * 3. In one transaction: re-reads the schedule, selects a variant, inserts the
 *    job, records the selection, advances `nextRunAt` and enqueues the job
 * 4. Releases the key and the claim, then moves on to the next schedule
 *
 * Failures are contained per schedule. A schedule whose spec or settings can't
 * be evaluated is disabled as `invalid_spec`.
 *
 * Safe to run from several processes against one database: the
 * `(scheduleId, plannedAt)` unique constraint is the final word on duplicates.
 *
 * @example
 * ```typescript
 * const tick = new SchedulerTick({ ...services, config: {
 *   tickIntervalMs: 60_000,
 *   claimTtlMs: 120_000,
 *   batchSize: 100,
 *   skipMissedOccurrences: true,
 * }});
 *
 * await tick.initializeSchedules();
 * tick.start();
 * // ... later ...
 * await tick.stop();
 * ```
 */
export class SchedulerTick {
  private readonly db: DatabaseService;
  private readonly scheduleStore: ScheduleStore;
  private readonly jobStore: JobStore;
  private readonly stateMachine: JobStateMachine;
  private readonly selectionService: SelectionService;
  private readonly historyStore: SelectionHistoryStore;
  private readonly resolver: RecurrenceResolver;
  private readonly dedupeGuard: DedupeGuard;
  private readonly instanceIdService: InstanceIdService;
  private readonly config: Required<SchedulerTickConfig>;
  private readonly eventBus?: EventBus;
  private readonly now: () => Date;

  private timerId: ReturnType<typeof setInterval> | null = null;
  private isProcessing = false;
  private consecutiveFailures = 0;

  private static readonly MAX_CONSECUTIVE_FAILURES = 5;
  private static readonly STOP_TIMEOUT_MS = 30000;
  private static readonly OVERDUE_WARN_THRESHOLD = 10;
  private static readonly STUCK_WARN_THRESHOLD = 5;

  static readonly DEFAULT_CONFIG: Required<
    Pick<SchedulerTickConfig, "overdueGraceMs" | "stuckJobMs">
  > = {
    overdueGraceMs: 5 * 60 * 1000,
    stuckJobMs: 10 * 60 * 1000,
  };

  constructor(options: SchedulerTickOptions) {
    this.db = options.db;
    this.scheduleStore = options.scheduleStore;
    this.jobStore = options.jobStore;
    this.stateMachine = options.stateMachine;
    this.selectionService = options.selectionService;
    this.historyStore = options.historyStore;
    this.resolver = options.resolver;
    this.dedupeGuard = options.dedupeGuard;
    this.instanceIdService = options.instanceIdService;
    this.config = { ...SchedulerTick.DEFAULT_CONFIG, ...options.config };
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => new Date());
  }

  // ============== Lifecycle ==============

  /**
   * Start ticking: once now, then every `tickIntervalMs`.
   */
  start(): void {
    if (this.timerId !== null) {
      logger.warn("[Scheduler] Already running");
      return;
    }

    logger.info(
      `[Scheduler] Starting with tick interval ${this.config.tickIntervalMs}ms, ` +
        `dedupe guard '${this.dedupeGuard.name}', ` +
        `instance ID: ${this.instanceIdService.getId().slice(0, 8)}...`,
    );

    this.timerId = setInterval(() => {
      this.runTick();
    }, this.config.tickIntervalMs);
    this.runTick();
  }

  /**
   * Stop ticking and wait for an in-progress tick to finish.
   */
  async stop(): Promise<void> {
    if (this.timerId !== null) {
      clearInterval(this.timerId);
      this.timerId = null;
    }

    const startTime = Date.now();
    while (this.isProcessing) {
      if (Date.now() - startTime > SchedulerTick.STOP_TIMEOUT_MS) {
        logger.warn("[Scheduler] Stop timeout exceeded");
        break;
      }
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    logger.info("[Scheduler] Stopped");
  }

  isRunning(): boolean {
    return this.timerId !== null;
  }

  getStatus(): {
    isRunning: boolean;
    isProcessing: boolean;
    consecutiveFailures: number;
  } {
    return {
      isRunning: this.timerId !== null,
      isProcessing: this.isProcessing,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  // ============== Public API ==============

  /**
   * Processes every schedule due at `now`.
   *
   * Per-schedule failures are logged and counted; only failures to claim
   * schedules at all are thrown.
   */
  async tick(now: Date = this.now()): Promise<TickResult> {
    const instanceId = this.instanceIdService.getId();
    const claimed = await this.scheduleStore.claimDue(
      instanceId,
      now,
      this.config.claimTtlMs,
      this.config.batchSize,
    );

    const result: TickResult = {
      claimed: claimed.length,
      outcomes: {
        created: 0,
        skipped: 0,
        duplicate: 0,
        locked: 0,
        stale: 0,
        disabled: 0,
        error: 0,
      },
      jobIds: [],
    };

    for (const scheduleId of claimed) {
      let outcome: OccurrenceOutcome;
      try {
        outcome = await this.processSchedule(scheduleId, now, result.jobIds);
      } catch (error) {
        outcome = await this.handleScheduleError(scheduleId, error, now);
      } finally {
        await this.releaseClaim(scheduleId, instanceId);
      }
      result.outcomes[outcome]++;
    }

    if (claimed.length > 0) {
      logger.info(
        `[Scheduler] Tick processed ${claimed.length} schedules: ` +
          `${result.outcomes.created} jobs created, ${result.outcomes.skipped} skipped, ` +
          `${result.outcomes.duplicate + result.outcomes.locked + result.outcomes.stale} already handled, ` +
          `${result.outcomes.disabled} disabled, ${result.outcomes.error} failed`,
      );
    }
    return result;
  }

  /**
   * Sets `nextRunAt` for enabled schedules that lack one. Schedules with no
   * future occurrence are disabled as exhausted, unparseable ones as invalid.
   *
   * @returns Number of schedules given a next run
   */
  async initializeSchedules(now: Date = this.now()): Promise<number> {
    const ids = await this.scheduleStore.listMissingNextRun();
    let initialized = 0;

    for (const id of ids) {
      try {
        const schedule = await this.scheduleStore.getByIdOrThrow(id);
        const next = this.resolver.resolve(schedule, now);
        if (next) {
          await this.scheduleStore.setNextRunAt(id, next, now);
          initialized++;
          logger.info(
            `[Scheduler] Initialized schedule ${id} with next run ${next.toISOString()}`,
          );
        } else {
          await this.scheduleStore.disable(id, "exhausted", now);
          logger.warn(`[Scheduler] Disabled schedule ${id}: no future occurrence`);
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          await this.scheduleStore.disable(id, "invalid_spec", now);
          logger.error(`[Scheduler] Disabled schedule ${id}: ${error.message}`);
        } else {
          logger.error(`[Scheduler] Failed to initialize schedule ${id}:`, error);
        }
      }
    }

    if (ids.length > 0) {
      logger.info(`[Scheduler] Initialized ${initialized} of ${ids.length} schedules`);
    }
    return initialized;
  }

  /**
   * Counts overdue schedules and stuck jobs, warning past fixed thresholds.
   */
  async healthCheck(now: Date = this.now()): Promise<HealthReport> {
    const overdueSchedules = await this.scheduleStore.countOverdue(
      new Date(now.getTime() - this.config.overdueGraceMs),
    );
    const stuckJobs = (
      await this.jobStore.listStaleRunning(
        new Date(now.getTime() - this.config.stuckJobMs),
      )
    ).length;

    logger.info(
      `[Scheduler] Health check: ${overdueSchedules} overdue schedules, ${stuckJobs} stuck jobs`,
    );

    let healthy = true;
    if (overdueSchedules > SchedulerTick.OVERDUE_WARN_THRESHOLD) {
      logger.warn(`[Scheduler] High number of overdue schedules: ${overdueSchedules}`);
      healthy = false;
    }
    if (stuckJobs > SchedulerTick.STUCK_WARN_THRESHOLD) {
      logger.warn(`[Scheduler] High number of stuck jobs: ${stuckJobs}`);
      healthy = false;
    }
    return { overdueSchedules, stuckJobs, healthy };
  }

  // ============== Private Implementation ==============

  private runTick(): void {
    if (this.isProcessing) {
      logger.debug("[Scheduler] Skipping tick, previous one still running");
      return;
    }

    this.isProcessing = true;
    this.tick()
      .then(() => {
        this.consecutiveFailures = 0;
      })
      .catch((error) => {
        this.consecutiveFailures++;
        logger.error(
          `[Scheduler] Tick failed (${this.consecutiveFailures}/${SchedulerTick.MAX_CONSECUTIVE_FAILURES}):`,
          error,
        );

        if (this.consecutiveFailures >= SchedulerTick.MAX_CONSECUTIVE_FAILURES) {
          logger.error("[Scheduler] Max consecutive failures reached, stopping service");
          if (this.timerId !== null) {
            clearInterval(this.timerId);
            this.timerId = null;
          }
        }
      })
      .finally(() => {
        this.isProcessing = false;
      });
  }

  private async processSchedule(
    scheduleId: number,
    now: Date,
    jobIds: number[],
  ): Promise<OccurrenceOutcome> {
    const claimedView = await this.scheduleStore.getById(scheduleId);
    if (!claimedView?.enabled || !claimedView.nextRunAt || claimedView.nextRunAt > now) {
      return "stale";
    }

    const plannedAt = truncateToSeconds(claimedView.nextRunAt);
    const acquired = await this.acquireGuard(scheduleId, plannedAt);
    if (!acquired) {
      // The holder's own lease on this schedule has lapsed by now
      if (now.getTime() - plannedAt.getTime() < this.config.claimTtlMs) {
        logger.debug(
          `[Scheduler] Schedule ${scheduleId} at ${plannedAt.toISOString()} is being handled elsewhere`,
        );
        return "locked";
      }
      logger.warn(
        `[Scheduler] Dedupe key for schedule ${scheduleId} at ${plannedAt.toISOString()} ` +
          "outlived the claim lease; relying on the unique constraint",
      );
    }

    try {
      return await this.createOccurrence(scheduleId, plannedAt, now, jobIds);
    } finally {
      if (acquired) {
        await this.releaseGuard(scheduleId, plannedAt);
      }
    }
  }

  /**
   * The job-creation transaction for one occurrence.
   */
  private async createOccurrence(
    scheduleId: number,
    plannedAt: Date,
    now: Date,
    jobIds: number[],
  ): Promise<OccurrenceOutcome> {
    const created = await this.db.transaction(async (tx) => {
      const schedule = await this.scheduleStore.getById(scheduleId, tx);
      if (
        !schedule?.enabled ||
        schedule.nextRunAt?.getTime() !== plannedAt.getTime()
      ) {
        return { outcome: "stale" as const, jobId: null };
      }

      const selection = schedule.templateId === null
        ? null
        : await this.selectionService.selectForOccurrence(schedule, plannedAt, tx);

      if (schedule.templateId !== null && selection === null) {
        await this.advanceSchedule(tx, schedule, plannedAt, now, {});
        logger.warn(
          `[Scheduler] Schedule ${scheduleId} has no eligible variants; ` +
            `skipped occurrence ${plannedAt.toISOString()}`,
        );
        return { outcome: "skipped" as const, jobId: null };
      }

      let jobId: number;
      try {
        const job = await this.jobStore.insertPlanned(tx, {
          scheduleId,
          plannedAt,
          variantId: selection?.variant.id ?? null,
          selectionPolicy: selection ? formatSelectionPolicy(schedule.selectionPolicy) : null,
          selectionSeed: selection?.seed ?? null,
        }, now);
        jobId = job.id;
      } catch (error) {
        if (!(error instanceof DuplicateJobError)) {
          throw error;
        }
        // A failed INSERT leaves the transaction open in SQLite
        logger.debug(`[Scheduler] ${error.message}`);
        await this.advanceSchedule(tx, schedule, plannedAt, now, { lastRunAt: plannedAt });
        return { outcome: "duplicate" as const, jobId: null };
      }

      if (selection && schedule.templateId !== null) {
        await this.historyStore.record(tx, {
          templateId: schedule.templateId,
          variantId: selection.variant.id,
          scheduleId,
          jobId,
          plannedAt,
        }, now);
      }

      await this.advanceSchedule(tx, schedule, plannedAt, now, {
        lastRunAt: plannedAt,
        roundRobinCursor: selection ? selection.roundRobinCursor : undefined,
      });
      await this.stateMachine.transitionInTransaction(tx, jobId, "enqueued");

      return { outcome: "created" as const, jobId };
    });

    if (created.jobId !== null) {
      jobIds.push(created.jobId);
      logger.info(
        `[Scheduler] Created job ${created.jobId} for schedule ${scheduleId} at ${plannedAt.toISOString()}`,
      );
      this.eventBus?.publish(EventType.JOB_ENQUEUED, {
        jobId: created.jobId,
        scheduleId,
      });
    }
    return created.outcome;
  }

  /**
   * Moves `nextRunAt` past the occurrence, disabling the schedule when the
   * recurrence is exhausted.
   */
  private async advanceSchedule(
    tx: TransactionContext,
    schedule: Schedule,
    plannedAt: Date,
    now: Date,
    fields: { lastRunAt?: Date; roundRobinCursor?: number | null },
  ): Promise<void> {
    const after = this.config.skipMissedOccurrences
      ? new Date(Math.max(plannedAt.getTime(), now.getTime() - 1))
      : plannedAt;
    const nextRunAt = this.resolver.resolve(schedule, after);

    await this.scheduleStore.advance(tx, schedule.id, {
      nextRunAt,
      lastRunAt: fields.lastRunAt ?? null,
      roundRobinCursor: fields.roundRobinCursor,
      disabledReason: nextRunAt === null ? "exhausted" : undefined,
    }, now);

    if (nextRunAt === null) {
      logger.info(`[Scheduler] Schedule ${schedule.id} is exhausted and has been disabled`);
    }
  }

  private async handleScheduleError(
    scheduleId: number,
    error: unknown,
    now: Date,
  ): Promise<OccurrenceOutcome> {
    if (error instanceof ValidationError) {
      logger.error(
        `[Scheduler] Disabling schedule ${scheduleId}: ${error.name}: ${error.message}`,
      );
      try {
        await this.scheduleStore.disable(scheduleId, "invalid_spec", now);
      } catch (disableError) {
        logger.error(`[Scheduler] Failed to disable schedule ${scheduleId}:`, disableError);
        return "error";
      }
      return "disabled";
    }

    logger.error(`[Scheduler] Error processing schedule ${scheduleId}:`, error);
    return "error";
  }

  private async acquireGuard(scheduleId: number, plannedAt: Date): Promise<boolean> {
    try {
      return await this.dedupeGuard.tryAcquire(scheduleId, plannedAt);
    } catch (error) {
      logger.warn(
        `[Scheduler] Dedupe guard unavailable for schedule ${scheduleId}, continuing without it:`,
        error,
      );
      return true;
    }
  }

  private async releaseGuard(scheduleId: number, plannedAt: Date): Promise<void> {
    try {
      await this.dedupeGuard.release(scheduleId, plannedAt);
    } catch (error) {
      logger.warn(`[Scheduler] Failed to release dedupe key for schedule ${scheduleId}:`, error);
    }
  }

  private async releaseClaim(scheduleId: number, instanceId: string): Promise<void> {
    try {
      await this.scheduleStore.releaseClaim(scheduleId, instanceId);
    } catch (error) {
      logger.warn(`[Scheduler] Failed to release claim on schedule ${scheduleId}:`, error);
    }
  }
}
