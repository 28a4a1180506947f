import type { DatabaseService } from "../database/database_service.ts";
import type { EventBus } from "../events/event_bus.ts";
import { EventType } from "../events/event_types.ts";
import type { InstanceIdService } from "../instance/instance_id_service.ts";
import {
  classifyPublishError,
  PermanentPublishError,
  PublishTimeoutError,
} from "../publishing/errors.ts";
import type {
  PublishContent,
  Publisher,
  PublishResult,
} from "../publishing/types.ts";
import { logger } from "../utils/logger.ts";
import type { ContentStore } from "../variants/content_store.ts";
import type { ContentValidator } from "../variants/content_validator.ts";
import { JobAlreadyClaimedError } from "./errors.ts";
import { isTerminalStatus, type JobStateMachine } from "./job_state_machine.ts";
import type { JobStore } from "./job_store.ts";
import type { RetryPolicy } from "./retry_policy.ts";
import type { Job } from "./types.ts";

export interface PublishWorkerConfig {
  /** How often to poll for runnable jobs, in ms */
  pollIntervalMs: number;
  /** Abort a publish call after this many ms */
  publishTimeoutMs: number;
  /** How long stop() waits for the in-flight job (default: 60000) */
  shutdownTimeoutMs?: number;
}

export interface PublishWorkerOptions {
  db: DatabaseService;
  jobStore: JobStore;
  stateMachine: JobStateMachine;
  contentStore: ContentStore;
  publisher: Publisher;
  retryPolicy: RetryPolicy;
  instanceIdService: InstanceIdService;
  config: PublishWorkerConfig;
  /** Re-checks fixed content before publishing */
  validator?: ContentValidator;
  eventBus?: EventBus;
  now?: () => Date;
}

/**
 * Background service that publishes runnable jobs.
 *
 * Follows the background service pattern:
 * - setInterval() polling with a private timerId
 * - isProcessing flag prevents overlapping runs
 * - stopRequested flag for graceful shutdown
 * - Consecutive failure counter with auto-stop after 5 failures
 * - JOB_ENQUEUED events wake the loop without waiting for the next poll
 *
 * For each job the worker:
 * 1. Re-reads the job; a terminal job is left alone
 * 2. Claims it (-> running, attempt + 1)
 * 3. Resolves the content (stored variant, or the schedule's fixed item)
 * 4. Calls the publisher with a timeout, outside any transaction
 * 5. Records the outcome: succeeded with a published record, failed with a
 *    retry time, or dead_letter
 *
 * @example
 * ```typescript
 * const worker = new PublishWorker({
 *   db, jobStore, stateMachine, contentStore,
 *   publisher: new DryRunPublisher(),
 *   retryPolicy: new RetryPolicy(),
 *   instanceIdService,
 *   config: { pollIntervalMs: 5000, publishTimeoutMs: 30000 },
 *   eventBus,
 * });
 *
 * worker.start();
 * // ... later ...
 * await worker.stop();
 * ```
 */
export class PublishWorker {
  private readonly db: DatabaseService;
  private readonly jobStore: JobStore;
  private readonly stateMachine: JobStateMachine;
  private readonly contentStore: ContentStore;
  private readonly publisher: Publisher;
  private readonly retryPolicy: RetryPolicy;
  private readonly instanceIdService: InstanceIdService;
  private readonly config: PublishWorkerConfig;
  private readonly validator?: ContentValidator;
  private readonly eventBus?: EventBus;
  private readonly now: () => Date;

  private timerId: ReturnType<typeof setInterval> | null = null;
  private isProcessing = false;
  private stopRequested = false;
  private consecutiveFailures = 0;
  private wakeupRequested = false;
  private processedCount = 0;

  /** Unsubscribe function for job enqueued events */
  private enqueuedUnsubscribe: (() => void) | null = null;

  private static readonly MAX_CONSECUTIVE_FAILURES = 5;
  private static readonly DEFAULT_SHUTDOWN_TIMEOUT_MS = 60000;

  constructor(options: PublishWorkerOptions) {
    this.db = options.db;
    this.jobStore = options.jobStore;
    this.stateMachine = options.stateMachine;
    this.contentStore = options.contentStore;
    this.publisher = options.publisher;
    this.retryPolicy = options.retryPolicy;
    this.instanceIdService = options.instanceIdService;
    this.config = options.config;
    this.validator = options.validator;
    this.eventBus = options.eventBus;
    this.now = options.now ?? (() => new Date());
  }

  // ============== Lifecycle ==============

  /**
   * Start the worker: drain runnable jobs now, then poll.
   */
  start(): void {
    if (this.timerId !== null) {
      logger.warn("[PublishWorker] Already running");
      return;
    }

    logger.info(
      `[PublishWorker] Starting with publisher '${this.publisher.name}', ` +
        `polling every ${this.config.pollIntervalMs}ms, ` +
        `instance ID: ${this.instanceIdService.getId().slice(0, 8)}...`,
    );

    if (this.eventBus) {
      this.enqueuedUnsubscribe = this.eventBus.subscribe(EventType.JOB_ENQUEUED, () => {
        this.requestWakeup();
      });
    }

    this.timerId = setInterval(() => {
      this.runLoop("Polling");
    }, this.config.pollIntervalMs);

    this.runLoop("Initial");
  }

  /**
   * Stop the worker gracefully.
   *
   * Clears the polling interval and waits for the in-flight job to finish
   * (bounded by shutdownTimeoutMs).
   */
  async stop(): Promise<void> {
    if (this.timerId !== null) {
      clearInterval(this.timerId);
      this.timerId = null;
    }

    this.stopRequested = true;

    const timeoutMs = this.config.shutdownTimeoutMs ??
      PublishWorker.DEFAULT_SHUTDOWN_TIMEOUT_MS;

    const startTime = Date.now();
    while (this.isProcessing) {
      if (Date.now() - startTime > timeoutMs) {
        logger.warn(
          "[PublishWorker] Stop timeout exceeded, a publish may still be running",
        );
        break;
      }
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.enqueuedUnsubscribe?.();
    this.enqueuedUnsubscribe = null;

    this.stopRequested = false;
    logger.info("[PublishWorker] Stopped");
  }

  /**
   * Process the next runnable job, if any (for testing).
   * Does not start the polling loop.
   *
   * @returns The job in its state after processing, or null if nothing was runnable
   */
  async processOne(): Promise<Job | null> {
    const job = await this.jobStore.nextRunnable(this.now());
    if (!job) {
      return null;
    }
    await this.processJob(job);
    return await this.jobStore.getById(job.id);
  }

  // ============== Status ==============

  isRunning(): boolean {
    return this.timerId !== null;
  }

  getStatus(): {
    isRunning: boolean;
    isProcessing: boolean;
    consecutiveFailures: number;
    processedCount: number;
  } {
    return {
      isRunning: this.timerId !== null,
      isProcessing: this.isProcessing,
      consecutiveFailures: this.consecutiveFailures,
      processedCount: this.processedCount,
    };
  }

  // ============== Private Implementation ==============

  /**
   * Runs the processing loop and tracks consecutive failures.
   */
  private runLoop(trigger: string): void {
    this.processLoop()
      .then(() => {
        this.consecutiveFailures = 0;
      })
      .catch((error) => {
        this.consecutiveFailures++;
        logger.error(
          `[PublishWorker] ${trigger} run failed (${this.consecutiveFailures}/${PublishWorker.MAX_CONSECUTIVE_FAILURES}):`,
          error,
        );

        if (this.consecutiveFailures >= PublishWorker.MAX_CONSECUTIVE_FAILURES) {
          logger.error(
            "[PublishWorker] Max consecutive failures reached, stopping service",
          );
          if (this.timerId !== null) {
            clearInterval(this.timerId);
            this.timerId = null;
          }
        }
      });
  }

  /**
   * Request an immediate check. Requests made while a run is in progress are
   * coalesced into one more pass.
   */
  private requestWakeup(): void {
    if (this.isProcessing) {
      this.wakeupRequested = true;
      logger.debug("[PublishWorker] Wakeup requested (will check after current job)");
    } else {
      logger.debug("[PublishWorker] Wakeup requested (triggering immediate check)");
      this.runLoop("Event-triggered");
    }
  }

  private async processLoop(): Promise<void> {
    if (this.isProcessing) {
      logger.debug("[PublishWorker] Skipping, already processing");
      return;
    }

    this.isProcessing = true;
    try {
      do {
        this.wakeupRequested = false;

        while (!this.stopRequested) {
          const job = await this.jobStore.nextRunnable(this.now());
          if (!job) {
            break;
          }
          await this.processJob(job);
        }
      } while (this.wakeupRequested && !this.stopRequested);
    } finally {
      this.isProcessing = false;
    }
  }

  private async processJob(job: Job): Promise<void> {
    const current = await this.jobStore.getById(job.id);
    if (!current || isTerminalStatus(current.status)) {
      logger.debug(`[PublishWorker] Job ${job.id} already finished, skipping`);
      return;
    }

    let claimed: Job;
    try {
      claimed = await this.stateMachine.claim(job.id, this.instanceIdService.getId());
    } catch (error) {
      if (error instanceof JobAlreadyClaimedError) {
        logger.debug(`[PublishWorker] Job ${job.id} claimed by another worker`);
        return;
      }
      throw error;
    }

    logger.debug(
      `[PublishWorker] Publishing job ${claimed.id} (attempt ${claimed.attempt})`,
    );

    let result: PublishResult;
    try {
      const content = await this.resolveContent(claimed);
      result = await this.publishWithTimeout(content);
    } catch (error) {
      await this.handleFailure(claimed, error);
      this.processedCount++;
      return;
    }

    const publishedAt = this.now();
    await this.db.transaction(async (tx) => {
      await this.stateMachine.transitionInTransaction(tx, claimed.id, "succeeded");
      await this.jobStore.recordPublication(tx, {
        jobId: claimed.id,
        externalId: result.externalId,
        variantId: claimed.variantId,
        publishedAt,
      });
    });

    this.processedCount++;
    logger.info(
      `[PublishWorker] Published job ${claimed.id} as ${result.externalId}`,
    );
    this.eventBus?.publish(EventType.JOB_FINISHED, {
      jobId: claimed.id,
      scheduleId: claimed.scheduleId,
      status: "succeeded",
    });
  }

  /**
   * Content for a job: the variant chosen at creation, or the schedule's
   * fixed content item.
   *
   * @throws PermanentPublishError if the content is gone or not publishable
   */
  private async resolveContent(job: Job): Promise<PublishContent> {
    const idempotencyKey = `job-${job.id}`;

    if (job.variantId !== null) {
      const variant = await this.contentStore.getVariant(job.variantId);
      if (!variant) {
        throw new PermanentPublishError(`Variant ${job.variantId} no longer exists`);
      }
      return { text: variant.text, mediaRefs: [], idempotencyKey };
    }

    const item = await this.contentStore.getContentItemForSchedule(job.scheduleId);
    if (!item) {
      throw new PermanentPublishError(
        `Schedule ${job.scheduleId} has no content item to publish`,
      );
    }
    const problem = this.validator?.checkText(item.text) ?? null;
    if (problem !== null) {
      throw new PermanentPublishError(`Content item ${item.id} rejected: ${problem}`);
    }
    return { text: item.text, mediaRefs: item.mediaRefs, idempotencyKey };
  }

  private async publishWithTimeout(content: PublishContent): Promise<PublishResult> {
    const timeoutMs = this.config.publishTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new PublishTimeoutError(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.publisher.publish(content, controller.signal),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Records a failed attempt: failed with a retry time, or straight on to
   * dead_letter for permanent errors and exhausted attempts.
   */
  private async handleFailure(job: Job, error: unknown): Promise<void> {
    const errorClass = classifyPublishError(error);
    const message = error instanceof Error
      ? `${error.name}: ${error.message}`
      : String(error);
    const exhausted = !this.retryPolicy.shouldRetry(job.attempt);
    const deadLetter = errorClass === "permanent" || exhausted;
    const availableAt = new Date(
      this.now().getTime() + this.retryPolicy.delayFor(job.attempt),
    );

    await this.db.transaction(async (tx) => {
      await this.stateMachine.transitionInTransaction(tx, job.id, "failed", {
        lastError: message,
        ...(deadLetter ? {} : { availableAt }),
      });
      if (deadLetter) {
        await this.stateMachine.transitionInTransaction(tx, job.id, "dead_letter");
      }
    });

    if (deadLetter) {
      logger.error(
        `[PublishWorker] Job ${job.id} dead-lettered after attempt ${job.attempt} ` +
          `(${exhausted ? "attempts exhausted" : "permanent error"}): ${message}`,
      );
    } else {
      logger.warn(
        `[PublishWorker] Job ${job.id} failed on attempt ${job.attempt}, ` +
          `retrying at ${availableAt.toISOString()}: ${message}`,
      );
    }

    this.eventBus?.publish(EventType.JOB_FINISHED, {
      jobId: job.id,
      scheduleId: job.scheduleId,
      status: deadLetter ? "dead_letter" : "failed",
    });
  }
}
