import type { DatabaseService } from "../database/database_service.ts";
import type { RecurrenceResolver } from "../recurrence/recurrence_resolver.ts";
import type { RecurrenceKind, RecurrenceTarget } from "../recurrence/types.ts";
import { RECURRENCE_KINDS } from "../recurrence/types.ts";
import type { NoRepeatScope, SelectionPolicy } from "../variants/types.ts";

/**
 * Why a schedule stopped firing.
 *
 * - exhausted: the recurrence has no further occurrences
 * - invalid_spec: the spec, timezone or selection settings can't be evaluated
 * - manual: disabled by an operator
 */
export type DisabledReason = "exhausted" | "invalid_spec" | "manual";

/**
 * Type guard for RecurrenceKind values.
 * Used for runtime validation of database values.
 */
export function isRecurrenceKind(kind: string): kind is RecurrenceKind {
  return RECURRENCE_KINDS.some((known) => known === kind);
}

/**
 * A schedule definition with its runtime state.
 */
export interface Schedule extends RecurrenceTarget {
  /** Human-readable label */
  name: string;
  /** Fixed content to publish; set iff templateId is null */
  contentItemId: number | null;
  /** Template to pick variants from; set iff contentItemId is null */
  templateId: number | null;
  selectionPolicy: SelectionPolicy;
  /** Number of recent selections excluded from the pool; 0 disables */
  noRepeatWindow: number;
  noRepeatScope: NoRepeatScope;
  /** Pool position of the last round-robin pick */
  roundRobinCursor: number | null;
  /** Next occurrence to fire; null when disabled or not yet initialised */
  nextRunAt: Date | null;
  /** Occurrence most recently fired */
  lastRunAt: Date | null;
  enabled: boolean;
  disabledReason: string | null;
  /** Instance currently holding the tick lease */
  claimedBy: string | null;
  claimedUntil: Date | null;
  updatedAt: Date;
}

/**
 * Input for creating a schedule.
 */
export interface NewSchedule {
  name: string;
  kind: RecurrenceKind;
  spec: string;
  /** IANA zone (default: "UTC") */
  timezone?: string;
  contentItemId?: number | null;
  templateId?: number | null;
  /** Policy object or its stored string form (default: uniform_random) */
  selectionPolicy?: SelectionPolicy | string;
  noRepeatWindow?: number;
  noRepeatScope?: NoRepeatScope;
  /** Default: true */
  enabled?: boolean;
}

/**
 * State written when a schedule moves past an occurrence.
 */
export interface ScheduleAdvance {
  nextRunAt: Date | null;
  lastRunAt: Date | null;
  /** Undefined leaves the cursor as it is */
  roundRobinCursor?: number | null;
  /** Set to disable the schedule */
  disabledReason?: DisabledReason;
}

export interface ScheduleStoreOptions {
  db: DatabaseService;
  resolver: RecurrenceResolver;
}

/**
 * Configuration for the scheduler tick.
 */
export interface SchedulerTickConfig {
  /** Time between ticks, in ms */
  tickIntervalMs: number;
  /** How long a claimed schedule stays reserved for this instance, in ms */
  claimTtlMs: number;
  /** Most schedules claimed per tick */
  batchSize: number;
  /**
   * Resolve the next occurrence after `max(plannedAt, now)` so an outage fires
   * once rather than once per missed slot
   */
  skipMissedOccurrences: boolean;
  /** Overdue-schedule grace period for healthCheck(), in ms (default: 5 min) */
  overdueGraceMs?: number;
  /** Running-job age healthCheck() reports as stuck, in ms (default: 10 min) */
  stuckJobMs?: number;
}

/**
 * What happened to one due schedule during a tick.
 *
 * - created: a job was inserted and enqueued
 * - skipped: no eligible variant; the occurrence was passed over
 * - duplicate: a job for the occurrence already existed
 * - locked: another instance holds the dedupe key
 * - stale: the schedule changed since it was claimed
 * - disabled: the schedule could not be evaluated and was disabled
 * - error: an unexpected failure; the schedule is retried next tick
 */
export type OccurrenceOutcome =
  | "created"
  | "skipped"
  | "duplicate"
  | "locked"
  | "stale"
  | "disabled"
  | "error";

export interface TickResult {
  claimed: number;
  outcomes: Record<OccurrenceOutcome, number>;
  /** Ids of jobs created by this tick */
  jobIds: number[];
}

export interface HealthReport {
  overdueSchedules: number;
  stuckJobs: number;
  healthy: boolean;
}
