import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../utils/logger.ts";
import type { DatabaseService } from "./database_service.ts";
import {
  MigrationError,
  MigrationExecutionError,
  MigrationFileError,
} from "./migration_errors.ts";

export interface MigrationServiceOptions {
  db: DatabaseService;
  /** Directory holding `NNN-name.sql` files */
  migrationsDir: string;
}

export interface Migration {
  version: number;
  filename: string;
  path: string;
}

export interface MigrationResult {
  appliedCount: number;
  /** Schema version before the run, null on a fresh database */
  fromVersion: number | null;
  toVersion: number;
}

const MIGRATION_FILE = /^(\d{3})-.+\.sql$/;

/**
 * Forward-only SQL migrations for the scheduler database.
 *
 * Files are applied in version order; gaps between versions are allowed.
 * `000-init.sql` creates the `schemaVersion` table that records progress, and
 * each file runs in the same transaction as its version bump.
 *
 * @example
 * ```typescript
 * const migrations = new MigrationService({ db, migrationsDir: "./migrations" });
 * const { appliedCount, toVersion } = await migrations.migrate();
 * ```
 */
export class MigrationService {
  private readonly db: DatabaseService;
  private readonly migrationsDir: string;

  constructor(options: MigrationServiceOptions) {
    this.db = options.db;
    this.migrationsDir = options.migrationsDir;
  }

  /** @returns The applied schema version, or null before `000-init.sql` ran */
  async getCurrentVersion(): Promise<number | null> {
    const tracked = await this.db.queryOne<{ present: number }>(
      "SELECT 1 AS present FROM sqlite_master WHERE type = 'table' AND name = 'schemaVersion'"
    );
    if (!tracked) {
      return null;
    }

    const row = await this.db.queryOne<{ version: number }>(
      "SELECT MAX(version) AS version FROM schemaVersion"
    );
    return row?.version ?? null;
  }

  /**
   * Migration files in ascending version order. Anything not matching
   * `NNN-name.sql` is ignored.
   *
   * @throws MigrationError if the directory cannot be listed
   */
  async getAvailableMigrations(): Promise<Migration[]> {
    const names = await readdir(this.migrationsDir, { withFileTypes: true }).catch(
      (error: unknown) => {
        throw new MigrationError(
          `Cannot list migrations in ${this.migrationsDir}: ${String(error)}`
        );
      }
    );

    return names
      .filter((entry) => entry.isFile())
      .flatMap((entry): Migration[] => {
        const match = MIGRATION_FILE.exec(entry.name);
        return match
          ? [
              {
                version: Number(match[1]),
                filename: entry.name,
                path: join(this.migrationsDir, entry.name),
              },
            ]
          : [];
      })
      .sort((a, b) => a.version - b.version);
  }

  /**
   * Applies every migration newer than the current version.
   *
   * @throws MigrationFileError if a file cannot be read
   * @throws MigrationExecutionError if a file's SQL fails; earlier files stay applied
   */
  async migrate(): Promise<MigrationResult> {
    const fromVersion = await this.getCurrentVersion();
    const pending = (await this.getAvailableMigrations()).filter(
      (migration) => fromVersion === null || migration.version > fromVersion
    );

    let toVersion = fromVersion ?? 0;
    for (const migration of pending) {
      await this.apply(migration);
      toVersion = migration.version;
      logger.debug(`[Migration] Applied ${migration.filename}`);
    }

    return { appliedCount: pending.length, fromVersion, toVersion };
  }

  private async apply(migration: Migration): Promise<void> {
    const sql = await readFile(migration.path, "utf8").catch((error: unknown) => {
      throw new MigrationFileError(migration.path, error);
    });

    try {
      await this.db.transaction(async (tx) => {
        await tx.exec(sql);
        await tx.execute("DELETE FROM schemaVersion");
        await tx.execute("INSERT INTO schemaVersion (version) VALUES (?)", [
          migration.version,
        ]);
      });
    } catch (error) {
      throw new MigrationExecutionError(migration.version, migration.filename, error);
    }
  }
}
