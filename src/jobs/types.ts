import type { DatabaseService } from "../database/database_service.ts";

/**
 * Publish-job status.
 *
 * State transitions:
 * - planned -> enqueued (scheduler commits the occurrence)
 * - planned | enqueued -> cancelled (operator cancels before execution)
 * - enqueued -> running (worker claims it; attempt is incremented)
 * - running -> succeeded (publish confirmed)
 * - running -> failed (publish failed or the run went stale)
 * - failed -> running (retry once available)
 * - failed -> dead_letter (permanent error or attempts exhausted)
 *
 * succeeded, dead_letter and cancelled are terminal.
 */
export type JobStatus =
  | "planned"
  | "enqueued"
  | "running"
  | "succeeded"
  | "failed"
  | "dead_letter"
  | "cancelled";

export const JOB_STATUSES: readonly JobStatus[] = [
  "planned",
  "enqueued",
  "running",
  "succeeded",
  "failed",
  "dead_letter",
  "cancelled",
];

/**
 * Type guard for JobStatus values.
 * Used for runtime validation of database values.
 */
export function isJobStatus(status: string): status is JobStatus {
  return JOB_STATUSES.some((known) => known === status);
}

/**
 * One firing of a schedule and its execution state.
 */
export interface Job {
  /** Unique job identifier */
  id: number;
  scheduleId: number;
  /** Occurrence this job publishes; immutable and unique per schedule */
  plannedAt: Date;
  /** Chosen variant for template-based schedules, null for fixed content */
  variantId: number | null;
  /** Policy in effect when the variant was chosen */
  selectionPolicy: string | null;
  /** Seed the selection used (16 hex chars) */
  selectionSeed: string | null;
  status: JobStatus;
  /** Number of times the job has entered running */
  attempt: number;
  /** Earliest time a worker may pick the job up */
  availableAt: Date | null;
  enqueuedAt: Date | null;
  startedAt: Date | null;
  finishedAt: Date | null;
  lastError: string | null;
  /** Instance ID of the process that last claimed this job */
  processInstanceId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input for creating a job in the planned state.
 */
export interface NewJob {
  scheduleId: number;
  plannedAt: Date;
  variantId: number | null;
  selectionPolicy: string | null;
  selectionSeed: string | null;
}

/**
 * Extra fields written alongside a status change.
 */
export interface TransitionFields {
  lastError?: string | null;
  availableAt?: Date | null;
  processInstanceId?: string | null;
}

/**
 * Proof that a job was published.
 */
export interface PublishedRecord {
  id: number;
  jobId: number;
  externalId: string;
  variantId: number | null;
  publishedAt: Date;
}

/**
 * Options for services that only need the database.
 */
export interface JobStoreOptions {
  db: DatabaseService;
}
