import { ValidationError } from "../validation/errors.ts";

/**
 * Base error class for scheduling-related errors.
 */
export class SchedulingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchedulingError";
  }
}

/**
 * Thrown when a schedule is not found by ID.
 */
export class ScheduleNotFoundError extends SchedulingError {
  public readonly scheduleId: number;

  constructor(scheduleId: number) {
    super(`Schedule ${scheduleId} not found`);
    this.name = "ScheduleNotFoundError";
    this.scheduleId = scheduleId;
  }
}

/**
 * Thrown when schedule configuration is invalid.
 */
export class InvalidScheduleConfigError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidScheduleConfigError";
  }
}
