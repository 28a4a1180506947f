import type { DatabaseService } from "../database/database_service.ts";
import { logger } from "../utils/logger.ts";
import type { JobStateMachine } from "./job_state_machine.ts";
import type { JobStore } from "./job_store.ts";
import type { RetryPolicy } from "./retry_policy.ts";

export interface JobReaperConfig {
  /** A running job older than this is considered lost, in ms */
  staleJobMs: number;
  /** How often to look for stale jobs, in ms */
  intervalMs: number;
}

export interface JobReaperOptions {
  db: DatabaseService;
  jobStore: JobStore;
  stateMachine: JobStateMachine;
  retryPolicy: RetryPolicy;
  config: JobReaperConfig;
  now?: () => Date;
}

export interface ReapResult {
  /** Jobs made runnable again */
  retried: number[];
  /** Jobs out of attempts */
  deadLettered: number[];
}

/**
 * Recovers jobs whose worker died mid-publish.
 *
 * A job stuck in running past `staleJobMs` is moved to failed with an
 * immediate retry time, or on to dead_letter when it has used all attempts.
 * Runs once on start, then on an interval.
 */
export class JobReaper {
  private readonly db: DatabaseService;
  private readonly jobStore: JobStore;
  private readonly stateMachine: JobStateMachine;
  private readonly retryPolicy: RetryPolicy;
  private readonly config: JobReaperConfig;
  private readonly now: () => Date;

  private timerId: ReturnType<typeof setInterval> | null = null;
  private isReaping = false;

  constructor(options: JobReaperOptions) {
    this.db = options.db;
    this.jobStore = options.jobStore;
    this.stateMachine = options.stateMachine;
    this.retryPolicy = options.retryPolicy;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timerId !== null) {
      logger.warn("[JobReaper] Already running");
      return;
    }

    logger.info(
      `[JobReaper] Starting: jobs running longer than ${this.config.staleJobMs}ms ` +
        `are recovered every ${this.config.intervalMs}ms`,
    );

    this.timerId = setInterval(() => {
      this.runOnce();
    }, this.config.intervalMs);
    this.runOnce();
  }

  async stop(): Promise<void> {
    if (this.timerId !== null) {
      clearInterval(this.timerId);
      this.timerId = null;
    }

    while (this.isReaping) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }
    logger.info("[JobReaper] Stopped");
  }

  /**
   * Recovers every currently stale job.
   */
  async reap(): Promise<ReapResult> {
    const result: ReapResult = { retried: [], deadLettered: [] };
    const cutoff = new Date(this.now().getTime() - this.config.staleJobMs);
    const staleJobs = await this.jobStore.listStaleRunning(cutoff);

    for (const stale of staleJobs) {
      const outcome = await this.db.transaction(async (tx) => {
        // The worker may have finished it since the scan
        const job = await this.jobStore.getById(stale.id, tx);
        if (!job || job.status !== "running") {
          return null;
        }

        await this.stateMachine.transitionInTransaction(tx, job.id, "failed", {
          lastError: `Stale: still running after ${this.config.staleJobMs}ms ` +
            `(instance ${job.processInstanceId ?? "unknown"})`,
        });
        if (!this.retryPolicy.shouldRetry(job.attempt)) {
          await this.stateMachine.transitionInTransaction(tx, job.id, "dead_letter");
          return "dead_letter";
        }
        return "retried";
      });

      if (outcome === "retried") {
        result.retried.push(stale.id);
        logger.warn(`[JobReaper] Recovered stale job ${stale.id}, retry is due now`);
      } else if (outcome === "dead_letter") {
        result.deadLettered.push(stale.id);
        logger.error(
          `[JobReaper] Stale job ${stale.id} dead-lettered after ${stale.attempt} attempts`,
        );
      }
    }

    return result;
  }

  private runOnce(): void {
    if (this.isReaping) return;

    this.isReaping = true;
    this.reap()
      .catch((error) => {
        logger.error("[JobReaper] Reap failed:", error);
      })
      .finally(() => {
        this.isReaping = false;
      });
  }
}
