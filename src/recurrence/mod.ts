/**
 * Recurrence resolution.
 *
 * Turns a schedule's one-shot, cron or RRULE spec into concrete UTC instants,
 * evaluated in the schedule's IANA timezone.
 *
 * @example
 * ```typescript
 * import { RecurrenceResolver } from "./recurrence/mod.ts";
 *
 * const resolver = new RecurrenceResolver();
 * resolver.validate("cron", "0 9 * * 1-5", "Europe/Berlin");
 * const next = resolver.resolve(schedule, new Date());
 * ```
 *
 * @module
 */

export { RecurrenceResolver } from "./recurrence_resolver.ts";
export type { RecurrenceResolverOptions } from "./recurrence_resolver.ts";
export { InvalidRecurrenceError } from "./errors.ts";
export {
  instantToWallClock,
  isValidTimezone,
  wallClockToInstant,
} from "./timezone.ts";
export { RECURRENCE_KINDS } from "./types.ts";
export type {
  CompiledRule,
  RecurrenceKind,
  RecurrenceTarget,
  RuleCacheStats,
} from "./types.ts";
