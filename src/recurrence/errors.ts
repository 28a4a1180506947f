import { ValidationError } from "../validation/errors.ts";
import type { RecurrenceKind } from "./types.ts";

/**
 * Thrown when a recurrence spec or timezone cannot be interpreted.
 */
export class InvalidRecurrenceError extends ValidationError {
  public readonly kind: RecurrenceKind;
  public readonly spec: string;

  constructor(kind: RecurrenceKind, spec: string, reason: string) {
    super(`Invalid ${kind} spec '${spec}': ${reason}`);
    this.name = "InvalidRecurrenceError";
    this.kind = kind;
    this.spec = spec;
  }
}
