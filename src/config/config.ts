import { z } from "zod";
import { ConfigError } from "./errors.ts";

/**
 * Boolean flag read from the environment.
 * Accepts "true"/"false"/"1"/"0" (case-insensitive).
 */
const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0", "TRUE", "FALSE", "True", "False"])
  .transform((value) => value === "1" || value.toLowerCase() === "true");

const PositiveIntSchema = z.coerce.number().int().positive();

/**
 * Environment schema. Keys mirror the variable names; defaults apply when
 * a variable is unset.
 */
export const EnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("./data/scheduler.db"),
  MIGRATIONS_DIR: z.string().min(1).default("./migrations"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "none"]).default("info"),
  REDIS_URL: z.string().url().optional(),
  DEDUPE_LOCK_TTL_SECONDS: PositiveIntSchema.optional(),
  SCHEDULER_TICK_SECONDS: PositiveIntSchema.default(60),
  SCHEDULE_CLAIM_SECONDS: PositiveIntSchema.default(120),
  SCHEDULER_BATCH_SIZE: PositiveIntSchema.max(1000).default(100),
  SKIP_MISSED_OCCURRENCES: BooleanFlagSchema.default("true"),
  WORKER_POLL_SECONDS: PositiveIntSchema.default(5),
  PUBLISH_TIMEOUT_MS: PositiveIntSchema.default(30_000),
  MAX_PUBLISH_ATTEMPTS: PositiveIntSchema.max(100).default(5),
  RETRY_BASE_DELAY_MS: PositiveIntSchema.default(60_000),
  RETRY_MAX_DELAY_MS: PositiveIntSchema.default(3_600_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.1),
  STALE_JOB_SECONDS: PositiveIntSchema.default(600),
  REAPER_INTERVAL_SECONDS: PositiveIntSchema.default(300),
  MAX_CONTENT_LENGTH: PositiveIntSchema.default(280),
  RULE_CACHE_SIZE: PositiveIntSchema.default(512),
  DRY_RUN: BooleanFlagSchema.default("true"),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Typed application configuration, grouped by the service that consumes it.
 */
export interface AppConfig {
  database: {
    path: string;
    migrationsDir: string;
  };
  logLevel: Env["LOG_LEVEL"];
  dedupe: {
    redisUrl: string | null;
    lockTtlSeconds: number;
  };
  scheduler: {
    tickIntervalMs: number;
    claimTtlMs: number;
    batchSize: number;
    skipMissedOccurrences: boolean;
    ruleCacheSize: number;
  };
  worker: {
    pollIntervalMs: number;
    publishTimeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterRatio: number;
    staleJobMs: number;
    reaperIntervalMs: number;
  };
  content: {
    maxLength: number;
  };
  dryRun: boolean;
}

/**
 * Parses configuration from an environment-like record.
 *
 * Every invalid key is reported at once.
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env);
 * initializeLogger(config.logLevel);
 * ```
 *
 * @throws ConfigError if any variable fails validation
 */
export function loadConfig(
  source: Record<string, string | undefined>,
): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  const env = parsed.data;

  if (env.RETRY_MAX_DELAY_MS < env.RETRY_BASE_DELAY_MS) {
    throw new ConfigError([
      "RETRY_MAX_DELAY_MS: must be greater than or equal to RETRY_BASE_DELAY_MS",
    ]);
  }

  return {
    database: {
      path: env.DATABASE_PATH,
      migrationsDir: env.MIGRATIONS_DIR,
    },
    logLevel: env.LOG_LEVEL,
    dedupe: {
      redisUrl: env.REDIS_URL ?? null,
      // A key left by a crashed holder must not outlive the schedule lease
      lockTtlSeconds: env.DEDUPE_LOCK_TTL_SECONDS ?? env.SCHEDULE_CLAIM_SECONDS,
    },
    scheduler: {
      tickIntervalMs: env.SCHEDULER_TICK_SECONDS * 1000,
      claimTtlMs: env.SCHEDULE_CLAIM_SECONDS * 1000,
      batchSize: env.SCHEDULER_BATCH_SIZE,
      skipMissedOccurrences: env.SKIP_MISSED_OCCURRENCES,
      ruleCacheSize: env.RULE_CACHE_SIZE,
    },
    worker: {
      pollIntervalMs: env.WORKER_POLL_SECONDS * 1000,
      publishTimeoutMs: env.PUBLISH_TIMEOUT_MS,
      maxAttempts: env.MAX_PUBLISH_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      jitterRatio: env.RETRY_JITTER_RATIO,
      staleJobMs: env.STALE_JOB_SECONDS * 1000,
      reaperIntervalMs: env.REAPER_INTERVAL_SECONDS * 1000,
    },
    content: {
      maxLength: env.MAX_CONTENT_LENGTH,
    },
    dryRun: env.DRY_RUN,
  };
}
