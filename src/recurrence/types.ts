/**
 * How a schedule's occurrences are described.
 * - `one_shot`: a single ISO-8601 instant
 * - `cron`: a 5-field (or 6-field, with seconds) cron expression
 * - `recurrence_rule`: an RFC 5545 RRULE
 */
export type RecurrenceKind = "one_shot" | "cron" | "recurrence_rule";

export const RECURRENCE_KINDS: readonly RecurrenceKind[] = [
  "one_shot",
  "cron",
  "recurrence_rule",
];

/**
 * The parts of a schedule the resolver reads.
 */
export interface RecurrenceTarget {
  id: number;
  kind: RecurrenceKind;
  spec: string;
  /** IANA zone name the spec's wall-clock fields are evaluated in */
  timezone: string;
  /** Anchor for recurrence rules that carry no DTSTART of their own */
  createdAt: Date;
}

/**
 * A parsed recurrence, ready to step forward.
 *
 * Works on "floating" wall-clock dates: UTC fields of the Date hold the local
 * time in the schedule's zone. Conversion to real instants happens in the resolver.
 */
export interface CompiledRule {
  /** Next wall-clock occurrence strictly after `afterLocal`, or null when exhausted */
  nextAfter(afterLocal: Date): Date | null;
}

/**
 * Cache counters, exposed for tests and health output.
 */
export interface RuleCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
}
