import type { JobStatus } from "./types.ts";

/**
 * Base error class for job-related errors.
 */
export class JobError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobError";
  }
}

/**
 * Thrown when a job is not found by ID.
 */
export class JobNotFoundError extends JobError {
  public readonly jobId: number;

  constructor(jobId: number) {
    super(`Job with id ${jobId} not found`);
    this.name = "JobNotFoundError";
    this.jobId = jobId;
  }
}

/**
 * Thrown when a job already exists for the same (schedule, occurrence).
 * Another scheduler instance handled the occurrence; callers treat it as benign.
 */
export class DuplicateJobError extends JobError {
  public readonly scheduleId: number;
  public readonly plannedAt: Date;

  constructor(scheduleId: number, plannedAt: Date) {
    super(
      `A job for schedule ${scheduleId} at ${plannedAt.toISOString()} already exists`,
    );
    this.name = "DuplicateJobError";
    this.scheduleId = scheduleId;
    this.plannedAt = plannedAt;
  }
}

/**
 * Thrown when a status change is not an edge of the job state machine.
 */
export class InvalidTransitionError extends JobError {
  public readonly jobId: number;
  public readonly from: JobStatus;
  public readonly to: JobStatus;

  constructor(jobId: number, from: JobStatus, to: JobStatus) {
    super(`Job ${jobId} cannot transition from '${from}' to '${to}'`);
    this.name = "InvalidTransitionError";
    this.jobId = jobId;
    this.from = from;
    this.to = to;
  }
}

/**
 * Thrown when attempting to claim a job that is no longer runnable
 * (another worker claimed it, or it reached a terminal state).
 */
export class JobAlreadyClaimedError extends JobError {
  public readonly jobId: number;
  public readonly currentStatus: JobStatus;

  constructor(jobId: number, currentStatus: JobStatus) {
    super(`Job ${jobId} is not claimable: current status is '${currentStatus}'`);
    this.name = "JobAlreadyClaimedError";
    this.jobId = jobId;
    this.currentStatus = currentStatus;
  }
}

/**
 * Thrown when attempting to cancel a job that has already started or finished.
 */
export class JobNotCancellableError extends JobError {
  public readonly jobId: number;
  public readonly currentStatus: JobStatus;

  constructor(jobId: number, currentStatus: JobStatus) {
    super(
      `Job ${jobId} cannot be cancelled: current status is '${currentStatus}'`,
    );
    this.name = "JobNotCancellableError";
    this.jobId = jobId;
    this.currentStatus = currentStatus;
  }
}
