/**
 * Base class for input that can never succeed as given, such as a malformed
 * recurrence spec or a contradictory schedule configuration.
 *
 * The scheduler disables the offending schedule instead of retrying it.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
