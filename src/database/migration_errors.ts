import { DatabaseError } from "./errors.ts";

export class MigrationError extends DatabaseError {
  constructor(message: string) {
    super(message);
    this.name = "MigrationError";
  }
}

/** A migration file exists but could not be read. */
export class MigrationFileError extends MigrationError {
  constructor(
    public readonly filePath: string,
    public readonly originalError: unknown,
  ) {
    super(`Cannot read migration file ${filePath}`);
    this.name = "MigrationFileError";
  }
}

/** A migration's SQL failed; its transaction was rolled back. */
export class MigrationExecutionError extends MigrationError {
  constructor(
    public readonly version: number,
    public readonly filename: string,
    public readonly originalError: unknown,
  ) {
    super(
      `Migration ${filename} (version ${version}) failed` +
        (originalError instanceof Error ? `: ${originalError.message}` : ""),
    );
    this.name = "MigrationExecutionError";
  }
}
