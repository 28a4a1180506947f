/**
 * Jobs Module
 *
 * Durable publish jobs and their execution:
 * - SQLite persistence with one job per (schedule, occurrence)
 * - A guarded state machine for every status change
 * - A polling worker with retry backoff and dead-lettering
 * - Recovery of jobs abandoned mid-publish
 */

// Service classes
export { JobStore } from "./job_store.ts";
export type { JobPatch } from "./job_store.ts";
export {
  ALLOWED_TRANSITIONS,
  canTransition,
  isTerminalStatus,
  JobStateMachine,
} from "./job_state_machine.ts";
export type { JobStateMachineOptions } from "./job_state_machine.ts";
export { PublishWorker } from "./publish_worker.ts";
export type { PublishWorkerConfig, PublishWorkerOptions } from "./publish_worker.ts";
export { JobReaper } from "./job_reaper.ts";
export type { JobReaperConfig, JobReaperOptions, ReapResult } from "./job_reaper.ts";
export { RetryPolicy } from "./retry_policy.ts";
export type { RetryPolicyOptions } from "./retry_policy.ts";

// Errors
export {
  DuplicateJobError,
  InvalidTransitionError,
  JobAlreadyClaimedError,
  JobError,
  JobNotCancellableError,
  JobNotFoundError,
} from "./errors.ts";

// Types
export { isJobStatus, JOB_STATUSES } from "./types.ts";
export type {
  Job,
  JobStatus,
  JobStoreOptions,
  NewJob,
  PublishedRecord,
  TransitionFields,
} from "./types.ts";
