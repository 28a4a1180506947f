import type { DatabaseService } from "../database/database_service.ts";
import type { TransactionContext } from "../database/types.ts";
import { logger } from "../utils/logger.ts";
import {
  InvalidTransitionError,
  JobAlreadyClaimedError,
  JobNotCancellableError,
  JobNotFoundError,
} from "./errors.ts";
import type { JobPatch, JobStore } from "./job_store.ts";
import type { Job, JobStatus, TransitionFields } from "./types.ts";

/**
 * Every legal status change. Anything not listed is rejected.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  planned: ["enqueued", "cancelled"],
  enqueued: ["running", "cancelled"],
  running: ["succeeded", "failed"],
  failed: ["running", "dead_letter"],
  succeeded: [],
  dead_letter: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export interface JobStateMachineOptions {
  db: DatabaseService;
  jobStore: JobStore;
  /** Clock used for timestamps (default: wall clock) */
  now?: () => Date;
}

/**
 * Moves jobs between statuses.
 *
 * Each transition re-reads the job and writes the new status inside one
 * `BEGIN IMMEDIATE` transaction, so two workers can never both move the same
 * job out of the same status. Entering `running` increments `attempt` and
 * stamps `startedAt` in the same write.
 *
 * @example
 * ```typescript
 * const machine = new JobStateMachine({ db, jobStore });
 * const job = await machine.claim(jobId, instanceId.getId());
 * await machine.transition(job.id, "succeeded");
 * ```
 */
export class JobStateMachine {
  private readonly db: DatabaseService;
  private readonly jobStore: JobStore;
  private readonly now: () => Date;

  constructor(options: JobStateMachineOptions) {
    this.db = options.db;
    this.jobStore = options.jobStore;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Transitions a job in its own transaction.
   *
   * @throws JobNotFoundError if the job does not exist
   * @throws InvalidTransitionError if the edge is not in the table
   */
  async transition(
    jobId: number,
    target: JobStatus,
    fields: TransitionFields = {},
  ): Promise<Job> {
    return await this.db.transaction((tx) =>
      this.transitionInTransaction(tx, jobId, target, fields)
    );
  }

  /**
   * Transitions a job inside a caller's transaction, so the status write
   * commits together with the caller's other writes.
   */
  async transitionInTransaction(
    tx: TransactionContext,
    jobId: number,
    target: JobStatus,
    fields: TransitionFields = {},
  ): Promise<Job> {
    const job = await this.jobStore.getById(jobId, tx);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    if (!canTransition(job.status, target)) {
      logger.error(
        `[JobStateMachine] Rejected transition of job ${jobId}: ${job.status} -> ${target}`,
      );
      throw new InvalidTransitionError(jobId, job.status, target);
    }

    const updated = await this.jobStore.applyPatch(
      tx,
      jobId,
      job.status,
      this.buildPatch(job, target, fields),
      this.now(),
    );
    if (!updated) {
      throw new InvalidTransitionError(jobId, job.status, target);
    }

    logger.debug(
      `[JobStateMachine] Job ${jobId}: ${job.status} -> ${target} (attempt ${updated.attempt})`,
    );
    return updated;
  }

  /**
   * Moves a runnable job (enqueued, or failed awaiting retry) to running and
   * records the claiming instance.
   *
   * @throws JobNotFoundError if the job does not exist
   * @throws JobAlreadyClaimedError if the job is not runnable any more
   */
  async claim(jobId: number, instanceId: string): Promise<Job> {
    return await this.db.transaction(async (tx) => {
      const job = await this.jobStore.getById(jobId, tx);
      if (!job) {
        throw new JobNotFoundError(jobId);
      }
      if (!canTransition(job.status, "running")) {
        throw new JobAlreadyClaimedError(jobId, job.status);
      }
      return await this.transitionInTransaction(tx, jobId, "running", {
        processInstanceId: instanceId,
      });
    });
  }

  /**
   * Cancels a job that has not started running.
   *
   * @throws JobNotFoundError if the job does not exist
   * @throws JobNotCancellableError if the job is running or finished
   */
  async cancel(jobId: number, reason?: string): Promise<Job> {
    return await this.db.transaction(async (tx) => {
      const job = await this.jobStore.getById(jobId, tx);
      if (!job) {
        throw new JobNotFoundError(jobId);
      }
      if (!canTransition(job.status, "cancelled")) {
        throw new JobNotCancellableError(jobId, job.status);
      }
      return await this.transitionInTransaction(tx, jobId, "cancelled", {
        lastError: reason ?? null,
      });
    });
  }

  private buildPatch(job: Job, target: JobStatus, fields: TransitionFields): JobPatch {
    const now = this.now();
    const patch: JobPatch = {
      status: target,
      lastError: fields.lastError,
      processInstanceId: fields.processInstanceId,
    };

    switch (target) {
      case "enqueued":
        patch.enqueuedAt = now;
        patch.availableAt = fields.availableAt ?? now;
        break;
      case "running":
        patch.attempt = job.attempt + 1;
        patch.startedAt = now;
        patch.finishedAt = null;
        break;
      case "failed":
        patch.finishedAt = now;
        patch.availableAt = fields.availableAt ?? now;
        break;
      case "succeeded":
        patch.finishedAt = now;
        patch.lastError = fields.lastError ?? null;
        break;
      case "dead_letter":
      case "cancelled":
        patch.finishedAt = now;
        break;
      case "planned":
        break;
    }

    return patch;
  }
}
