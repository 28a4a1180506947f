import "dotenv/config";
import { loadConfig } from "./src/config/config.ts";
import { ConfigError } from "./src/config/errors.ts";
import { DatabaseService } from "./src/database/database_service.ts";
import { MigrationService } from "./src/database/migration_service.ts";
import {
  type DedupeGuard,
  InMemoryDedupeGuard,
  RedisDedupeGuard,
} from "./src/dedupe/dedupe_guard.ts";
import { EventBus } from "./src/events/event_bus.ts";
import { InstanceIdService } from "./src/instance/instance_id_service.ts";
import { JobReaper } from "./src/jobs/job_reaper.ts";
import { JobStateMachine } from "./src/jobs/job_state_machine.ts";
import { JobStore } from "./src/jobs/job_store.ts";
import { PublishWorker } from "./src/jobs/publish_worker.ts";
import { RetryPolicy } from "./src/jobs/retry_policy.ts";
import { DryRunPublisher } from "./src/publishing/dry_run_publisher.ts";
import { RecurrenceResolver } from "./src/recurrence/recurrence_resolver.ts";
import { ScheduleStore } from "./src/scheduling/schedule_store.ts";
import { SchedulerTick } from "./src/scheduling/scheduler_tick.ts";
import { SelectionService } from "./src/scheduling/selection_service.ts";
import { initializeLogger, logger } from "./src/utils/logger.ts";
import { ContentStore } from "./src/variants/content_store.ts";
import { ContentValidator } from "./src/variants/content_validator.ts";
import { SelectionHistoryStore } from "./src/variants/selection_history_store.ts";
import { VariantSelector } from "./src/variants/variant_selector.ts";

async function main(): Promise<void> {
  // ============================================================================
  // Configuration
  // ============================================================================

  const config = loadConfig(process.env);
  initializeLogger(config.logLevel);

  if (!config.dryRun) {
    throw new ConfigError([
      "DRY_RUN: no live publisher is configured; set DRY_RUN=true",
    ]);
  }

  const instanceIdService = new InstanceIdService();
  logger.info(`[Startup] Instance ${instanceIdService.getId()} starting`);

  // ============================================================================
  // Database
  // ============================================================================

  const db = new DatabaseService({ databasePath: config.database.path });
  await db.open();

  const migrationService = new MigrationService({
    db,
    migrationsDir: config.database.migrationsDir,
  });
  const migration = await migrationService.migrate();
  if (migration.appliedCount > 0) {
    logger.info(
      `[Migration] Applied ${migration.appliedCount} migrations ` +
        `(${migration.fromVersion ?? "none"} -> ${migration.toVersion})`,
    );
  }

  // ============================================================================
  // Services
  // ============================================================================

  const eventBus = new EventBus();
  const resolver = new RecurrenceResolver({ cacheSize: config.scheduler.ruleCacheSize });
  const validator = new ContentValidator({ maxLength: config.content.maxLength });
  const selector = new VariantSelector({ validator });
  const contentStore = new ContentStore({ db });
  const historyStore = new SelectionHistoryStore({ db });
  const scheduleStore = new ScheduleStore({ db, resolver });
  const selectionService = new SelectionService({
    scheduleStore,
    contentStore,
    historyStore,
    selector,
    validator,
    resolver,
  });
  const jobStore = new JobStore({ db });
  const stateMachine = new JobStateMachine({ db, jobStore });
  const retryPolicy = new RetryPolicy({
    baseDelayMs: config.worker.baseDelayMs,
    maxDelayMs: config.worker.maxDelayMs,
    maxAttempts: config.worker.maxAttempts,
    jitterRatio: config.worker.jitterRatio,
  });

  const dedupeGuard: DedupeGuard = config.dedupe.redisUrl
    ? RedisDedupeGuard.fromUrl(config.dedupe.redisUrl, config.dedupe.lockTtlSeconds)
    : new InMemoryDedupeGuard({ ttlSeconds: config.dedupe.lockTtlSeconds });
  logger.info(`[Startup] Using '${dedupeGuard.name}' dedupe guard`);

  const schedulerTick = new SchedulerTick({
    db,
    scheduleStore,
    jobStore,
    stateMachine,
    selectionService,
    historyStore,
    resolver,
    dedupeGuard,
    instanceIdService,
    config: {
      tickIntervalMs: config.scheduler.tickIntervalMs,
      claimTtlMs: config.scheduler.claimTtlMs,
      batchSize: config.scheduler.batchSize,
      skipMissedOccurrences: config.scheduler.skipMissedOccurrences,
    },
    eventBus,
  });

  const worker = new PublishWorker({
    db,
    jobStore,
    stateMachine,
    contentStore,
    publisher: new DryRunPublisher(),
    retryPolicy,
    instanceIdService,
    config: {
      pollIntervalMs: config.worker.pollIntervalMs,
      publishTimeoutMs: config.worker.publishTimeoutMs,
    },
    validator,
    eventBus,
  });

  const reaper = new JobReaper({
    db,
    jobStore,
    stateMachine,
    retryPolicy,
    config: {
      staleJobMs: config.worker.staleJobMs,
      intervalMs: config.worker.reaperIntervalMs,
    },
  });

  // ============================================================================
  // Start
  // ============================================================================

  await schedulerTick.initializeSchedules();
  schedulerTick.start();
  worker.start();
  reaper.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`[Shutdown] Received ${signal}, stopping services`);

    await schedulerTick.stop();
    await worker.stop();
    await reaper.stop();
    await dedupeGuard.close();
    await db.close();

    logger.info("[Shutdown] Complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("[Shutdown] Failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error("[Startup] Failed to start:", error);
  process.exit(1);
});
