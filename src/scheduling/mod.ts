/**
 * Scheduling Module
 *
 * Turns schedules into publish jobs:
 * - Schedule persistence with lease-based claiming
 * - Per-occurrence job creation with variant selection
 * - Selection previews
 */

// Service classes
export { ScheduleStore } from "./schedule_store.ts";
export { SchedulerTick } from "./scheduler_tick.ts";
export type { SchedulerTickOptions } from "./scheduler_tick.ts";
export { SelectionService } from "./selection_service.ts";
export type { PreviewEntry, SelectionServiceOptions } from "./selection_service.ts";

// Errors
export {
  InvalidScheduleConfigError,
  ScheduleNotFoundError,
  SchedulingError,
} from "./errors.ts";

// Types
export { isRecurrenceKind } from "./types.ts";
export type {
  DisabledReason,
  HealthReport,
  NewSchedule,
  OccurrenceOutcome,
  Schedule,
  ScheduleAdvance,
  SchedulerTickConfig,
  ScheduleStoreOptions,
  TickResult,
} from "./types.ts";
